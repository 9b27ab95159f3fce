import type { V1PersistentVolumeClaim } from '@kubernetes/client-node';
import type { PersistentVolumeClaimResource } from '../../../core/types/kubernetes.js';
import { createResource } from '../../shared.js';

export function persistentVolumeClaim(
  resource: V1PersistentVolumeClaim
): PersistentVolumeClaimResource {
  return createResource({
    ...resource,
    apiVersion: 'v1',
    kind: 'PersistentVolumeClaim',
    metadata: resource.metadata ?? { name: 'unnamed-pvc' },
  });
}
