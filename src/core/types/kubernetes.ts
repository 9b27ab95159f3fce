/**
 * Kubernetes-specific types shared by the builders
 */

import type {
  V1Endpoints,
  V1Ingress,
  V1Namespace,
  V1ObjectMeta,
  V1PersistentVolumeClaim,
  V1Pod,
  V1Service,
} from '@kubernetes/client-node';

/**
 * Any object the builders produce: a typed body with apiVersion, kind and metadata always set
 */
export interface KubernetesResource {
  apiVersion: string;
  kind: string;
  metadata: V1ObjectMeta;
}

export type PodResource = V1Pod & KubernetesResource;
export type PersistentVolumeClaimResource = V1PersistentVolumeClaim & KubernetesResource;
export type EndpointsResource = V1Endpoints & KubernetesResource;
export type ServiceResource = V1Service & KubernetesResource;
export type IngressResource = V1Ingress & KubernetesResource;
export type NamespaceResource = V1Namespace & KubernetesResource;

export type ImagePullPolicy = 'Always' | 'IfNotPresent' | 'Never';

export type AccessMode = 'ReadWriteOnce' | 'ReadOnlyMany' | 'ReadWriteMany' | 'ReadWriteOncePod';

/**
 * Any value JSON.stringify renders to a string
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };
