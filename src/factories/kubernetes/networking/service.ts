import type { V1Service } from '@kubernetes/client-node';
import type { ServiceResource } from '../../../core/types/kubernetes.js';
import { createResource } from '../../shared.js';

export function service(resource: V1Service): ServiceResource {
  return createResource({
    ...resource,
    apiVersion: 'v1',
    kind: 'Service',
    metadata: resource.metadata ?? { name: 'unnamed-service' },
  });
}
