import type { V1Ingress } from '@kubernetes/client-node';
import type { IngressResource } from '../../../core/types/kubernetes.js';
import { createResource } from '../../shared.js';

export function ingress(resource: V1Ingress): IngressResource {
  return createResource({
    ...resource,
    apiVersion: 'networking.k8s.io/v1',
    kind: 'Ingress',
    metadata: resource.metadata ?? { name: 'unnamed-ingress' },
  });
}
