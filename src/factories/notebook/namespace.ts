import { getComponentLogger } from '../../core/logging/index.js';
import type { NamespaceResource } from '../../core/types/kubernetes.js';
import { namespace } from '../kubernetes/core/namespace.js';
import type { NamespaceConfig } from './types.js';

const logger = getComponentLogger('namespace-factory');

/**
 * Creates a namespace for per-user spawning
 */
export function makeNamespace(config: NamespaceConfig): NamespaceResource {
  const result = namespace({
    metadata: {
      name: config.name,
      labels: { ...config.labels },
      annotations: { ...config.annotations },
    },
  });

  logger.debug('Built namespace', { name: config.name });
  return result;
}
