/**
 * YAML rendering of built objects
 */

import * as yaml from 'js-yaml';
import type { KubernetesResource } from '../types/kubernetes.js';

export interface YamlSerializationOptions {
  /** Spaces per indentation level (default: 2) */
  indent?: number;
  /** Wrap width; -1 disables folding (default: -1) */
  lineWidth?: number;
}

/**
 * Serializes resources to a multi-document YAML stream, one document per resource
 */
export function serializeResourcesToYaml(
  resources: readonly KubernetesResource[],
  options?: YamlSerializationOptions
): string {
  return resources
    .map((resource) =>
      yaml.dump(resource, {
        indent: options?.indent ?? 2,
        lineWidth: options?.lineWidth ?? -1,
        noRefs: true,
        sortKeys: false,
        skipInvalid: true,
        quotingType: '"',
        forceQuotes: false,
      })
    )
    .join('---\n');
}
