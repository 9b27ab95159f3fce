import type { V1Pod } from '@kubernetes/client-node';
import type { PodResource } from '../../../core/types/kubernetes.js';
import { createResource } from '../../shared.js';

export function pod(resource: V1Pod): PodResource {
  return createResource({
    ...resource,
    apiVersion: 'v1',
    kind: 'Pod',
    metadata: resource.metadata ?? { name: 'unnamed-pod' },
  });
}
