/**
 * kube-notebook-objects - typed builders for the Kubernetes objects a notebook spawner submits.
 */

// =============================================================================
// BUILDERS
// =============================================================================
export {
  makeIngress,
  makeNamespace,
  makePod,
  makePvc,
  routeResources,
  type NamespaceConfig,
  type NotebookPodConfig,
  type NotebookPvcConfig,
  type RouteConfig,
  type RouteSet,
} from './factories/notebook/index.js';

// Kind factories the builders are written on
export { namespace, pod } from './factories/kubernetes/core/index.js';
export { endpoints, ingress, service } from './factories/kubernetes/networking/index.js';
export { persistentVolumeClaim } from './factories/kubernetes/storage/index.js';

// =============================================================================
// ROUTES
// =============================================================================
export { parseRouteSpec, parseTarget, type RouteSpec, type RouteTarget } from './utils/index.js';

// =============================================================================
// CORE
// =============================================================================
export {
  NOTEBOOK_CONTAINER_NAME,
  NOTEBOOK_PORT_NAME,
  PROXY_ANNOTATIONS,
  PROXY_ROUTE_LABELS,
  STORAGE_CLASS_ANNOTATION,
} from './core/constants.js';
export {
  formatArktypeError,
  isSpawnerError,
  SpawnerError,
  ValidationError,
} from './core/errors.js';
export {
  createLogger,
  getComponentLogger,
  logger,
  type LoggerConfig,
  type SpawnerLogger,
} from './core/logging/index.js';
export { serializeResourcesToYaml, type YamlSerializationOptions } from './core/serialization/index.js';
export type {
  AccessMode,
  EndpointsResource,
  ImagePullPolicy,
  IngressResource,
  JsonValue,
  KubernetesResource,
  NamespaceResource,
  PersistentVolumeClaimResource,
  PodResource,
  ServiceResource,
} from './core/types/kubernetes.js';
