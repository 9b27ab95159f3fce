export { makeNamespace } from './namespace.js';
export { makePvc } from './persistent-volume-claim.js';
export { makePod } from './pod.js';
export { makeIngress, type RouteSet, routeResources } from './route.js';
export type { NamespaceConfig, NotebookPodConfig, NotebookPvcConfig, RouteConfig } from './types.js';
