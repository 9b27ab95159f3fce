/**
 * Shared utilities for factory functions
 */

import { getComponentLogger } from '../core/logging/index.js';
import type { KubernetesResource } from '../core/types/kubernetes.js';

const logger = getComponentLogger('resource-factory');

/**
 * Finalizes a resource body produced by a kind factory.
 *
 * Metadata is copied one level down so labels and annotations handed in by a
 * caller are never shared with the returned object.
 */
export function createResource<T extends KubernetesResource>(resource: T): T {
  const metadata = {
    ...resource.metadata,
    ...(resource.metadata.labels && { labels: { ...resource.metadata.labels } }),
    ...(resource.metadata.annotations && { annotations: { ...resource.metadata.annotations } }),
  };

  logger.trace('Created resource', {
    kind: resource.kind,
    name: metadata.name,
    namespace: metadata.namespace,
  });

  return Object.assign({ apiVersion: resource.apiVersion, kind: resource.kind }, resource, { metadata });
}

/**
 * Copies a string mapping. Absent and empty mappings come back as undefined.
 */
export function copyNonEmpty(
  mapping: Readonly<Record<string, string>> | undefined
): Record<string, string> | undefined {
  if (!mapping || Object.keys(mapping).length === 0) {
    return undefined;
  }
  return { ...mapping };
}
