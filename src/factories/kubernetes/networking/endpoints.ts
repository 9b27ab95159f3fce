import type { V1Endpoints } from '@kubernetes/client-node';
import type { EndpointsResource } from '../../../core/types/kubernetes.js';
import { createResource } from '../../shared.js';

export function endpoints(resource: V1Endpoints): EndpointsResource {
  return createResource({
    ...resource,
    apiVersion: 'v1',
    kind: 'Endpoints',
    metadata: resource.metadata ?? { name: 'unnamed-endpoints' },
  });
}
