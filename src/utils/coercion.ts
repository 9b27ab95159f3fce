import { type } from 'arktype';
import { formatArktypeError } from '../core/errors.js';
import { getComponentLogger } from '../core/logging/index.js';

const logger = getComponentLogger('input-coercion');

// optional sign, digits, single underscores between digit groups
const INTEGER_LITERAL = /^[+-]?\d+(_\d+)*$/;

const integerInput = type('number')
  .pipe((n, ctx) => (Number.isFinite(n) ? Math.trunc(n) : ctx.error('a finite number')))
  .or(
    type('string').pipe((s, ctx) => {
      const trimmed = s.trim();
      return INTEGER_LITERAL.test(trimmed)
        ? Number.parseInt(trimmed.replace(/_/g, ''), 10)
        : ctx.error('an integer string');
    })
  );

/**
 * Coerces a numeric id (uid, gid) to an integer.
 *
 * Numbers are truncated toward zero. Strings may carry surrounding
 * whitespace, a sign, leading zeros and `_` digit separators (`' 1_000 '`).
 *
 * @throws ValidationError when the value is not numeric
 */
export function toInteger(
  value: number | string,
  resourceKind: string,
  resourceName: string,
  field: string
): number {
  const result = integerInput(value);

  if (result instanceof type.errors) {
    logger.debug('Rejected non-numeric input', { resourceKind, resourceName, field });
    throw formatArktypeError(result, resourceKind, resourceName, field);
  }

  return result;
}
