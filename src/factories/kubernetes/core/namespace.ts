import type { V1Namespace } from '@kubernetes/client-node';
import type { NamespaceResource } from '../../../core/types/kubernetes.js';
import { createResource } from '../../shared.js';

export function namespace(resource: V1Namespace): NamespaceResource {
  return createResource({
    ...resource,
    apiVersion: 'v1',
    kind: 'Namespace',
    metadata: resource.metadata ?? { name: 'unnamed-namespace' },
  });
}
