/**
 * Input helpers shared by the builders
 */

export { toInteger } from './coercion.js';
export { parseRouteSpec, parseTarget, type RouteSpec, type RouteTarget } from './route-spec.js';
