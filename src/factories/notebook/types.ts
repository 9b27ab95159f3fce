/**
 * Notebook Factory Configuration Types
 *
 * Inputs for the builders a notebook spawner calls once per spawn request.
 */

import type {
  V1Container,
  V1Lifecycle,
  V1Toleration,
  V1Volume,
  V1VolumeMount,
} from '@kubernetes/client-node';
import type { AccessMode, ImagePullPolicy, JsonValue } from '../../core/types/kubernetes.js';

/**
 * Configuration for a single-user notebook pod
 */
export interface NotebookPodConfig {
  /** Pod name; must be a valid DNS label unique within the namespace */
  name: string;
  namespace?: string;
  /** Image reference, usually `image:tag` */
  image: string;
  imagePullPolicy: ImagePullPolicy;
  /** Secret used to pull from a private registry */
  imagePullSecret?: string;
  /** Port the notebook server listens on */
  port: number;
  /** Arguments for the notebook container */
  cmd?: string[];
  nodeSelector?: Record<string, string>;
  /** UID to run as; the image's user when omitted */
  runAsUid?: number | string;
  /** GID owning freshly mounted volumes that support ownership management */
  fsGid?: number | string;
  supplementalGids?: Array<number | string>;
  env?: Record<string, string>;
  workingDir?: string;
  volumes?: V1Volume[];
  volumeMounts?: V1VolumeMount[];
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
  /** Max CPU cores the pod may use */
  cpuLimit?: number;
  /** CPU cores the scheduler guarantees */
  cpuGuarantee?: number;
  /** Max memory, unit-suffixed (e.g. `2Gi`) */
  memLimit?: string;
  /** Guaranteed memory, unit-suffixed */
  memGuarantee?: string;
  /** Extra resource requests such as `nvidia.com/gpu` */
  extraResourceGuarantees?: Record<string, string>;
  extraResourceLimits?: Record<string, string>;
  lifecycleHooks?: V1Lifecycle;
  initContainers?: V1Container[];
  /** Sidecars placed after the notebook container */
  extraContainers?: V1Container[];
  serviceAccount?: string;
  tolerations?: V1Toleration[];
  priorityClassName?: string;
  schedulerName?: string;
}

/**
 * Configuration for a notebook's persistent volume claim
 */
export interface NotebookPvcConfig {
  name: string;
  namespace?: string;
  storageClass?: string;
  accessModes: AccessMode[];
  /** Requested size, e.g. `10Gi` */
  storage: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
}

/**
 * Configuration for a proxy route exposing a target under a routespec
 */
export interface RouteConfig {
  name: string;
  namespace?: string;
  /** `/path` or `host/path` */
  routespec: string;
  /** Backend URL, e.g. `http://10.0.0.5:8000` */
  target: string;
  /** Opaque payload stored JSON-encoded on every object of the route */
  data: JsonValue;
  ingressClassName?: string;
}

export interface NamespaceConfig {
  name: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
}
