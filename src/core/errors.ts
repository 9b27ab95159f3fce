/**
 * Error types for the object builders.
 *
 * Builders are pure, so the only failures are bad inputs. They are thrown
 * as soon as they are detected and never retried.
 */

import { type } from 'arktype';

export type ArktypeErrors = InstanceType<typeof type.errors>;

export class SpawnerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SpawnerError';
  }
}

export class ValidationError extends SpawnerError {
  constructor(
    message: string,
    public readonly resourceKind: string,
    public readonly resourceName: string,
    public readonly field?: string,
    public readonly suggestions?: string[],
    options?: { cause?: unknown }
  ) {
    super(
      message,
      'VALIDATION_ERROR',
      {
        resourceKind,
        resourceName,
        field,
        suggestions,
      },
      options
    );
    this.name = 'ValidationError';
  }
}

/**
 * Format arktype validation errors for a single builder input
 */
export function formatArktypeError(
  errors: ArktypeErrors,
  resourceKind: string,
  resourceName: string,
  field: string
): ValidationError {
  const first = errors[0];

  if (!first) {
    return new ValidationError(
      `Invalid ${resourceKind} '${resourceName}' at field '${field}': ${errors.summary}`,
      resourceKind,
      resourceName,
      field,
      undefined,
      { cause: errors }
    );
  }

  const nested = first.path.length > 0 ? `${field}.${first.path.join('.')}` : field;

  let message = `Invalid ${resourceKind} '${resourceName}' at field '${nested}':`;
  message += `\n  Expected: ${first.expected ?? 'unknown'}`;
  message += `\n  Received: ${first.actual ?? 'unknown'}`;

  const suggestions: string[] = [];
  if (first.code === 'domain' || first.code === 'divisor' || first.code === 'pattern') {
    suggestions.push(`Change '${nested}' to be ${first.expected ?? 'a valid value'}`);
  }

  if (errors.length > 1) {
    message += '\n\nAdditional validation errors:';
    Array.from(errors).slice(1).forEach((problem, index) => {
      message += `\n  ${index + 2}. ${problem.message}`;
    });
  }

  return new ValidationError(message, resourceKind, resourceName, nested, suggestions, {
    cause: errors,
  });
}

/**
 * Type guard for errors raised by this package
 */
export function isSpawnerError(error: unknown): error is SpawnerError {
  return error instanceof SpawnerError;
}
