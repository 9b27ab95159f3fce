/**
 * Proxy Route Factory
 *
 * A route is three objects that only work together: an Endpoints object
 * pinning the target address, a selector-less Service of the same name that
 * the Endpoints bind to, and an Ingress sending the routespec to that Service.
 */

import type { V1ObjectMeta } from '@kubernetes/client-node';
import { PROXY_ANNOTATIONS, PROXY_ROUTE_LABELS, ROUTE_PATH_TYPE } from '../../core/constants.js';
import { getComponentLogger } from '../../core/logging/index.js';
import type {
  EndpointsResource,
  IngressResource,
  ServiceResource,
} from '../../core/types/kubernetes.js';
import { parseRouteSpec, parseTarget } from '../../utils/route-spec.js';
import { endpoints } from '../kubernetes/networking/endpoints.js';
import { ingress } from '../kubernetes/networking/ingress.js';
import { service } from '../kubernetes/networking/service.js';
import type { RouteConfig } from './types.js';

const logger = getComponentLogger('route-factory');

export interface RouteSet {
  endpoints: EndpointsResource;
  service: ServiceResource;
  ingress: IngressResource;
}

/**
 * Creates the Endpoints, Service and Ingress exposing `target` under `routespec`
 *
 * @throws ValidationError when the target is not a URL with a hostname and a port
 */
export function makeIngress(config: RouteConfig): RouteSet {
  const metadata: V1ObjectMeta = {
    name: config.name,
    ...(config.namespace && { namespace: config.namespace }),
    annotations: {
      [PROXY_ANNOTATIONS.data]: JSON.stringify(config.data),
      [PROXY_ANNOTATIONS.routespec]: config.routespec,
      [PROXY_ANNOTATIONS.target]: config.target,
    },
    labels: { ...PROXY_ROUTE_LABELS },
  };

  const { host, path } = parseRouteSpec(config.routespec);
  const { ip, port } = parseTarget(config.target, config.name);

  const routeSet: RouteSet = {
    endpoints: endpoints({
      metadata,
      subsets: [
        {
          addresses: [{ ip }],
          ports: [{ port }],
        },
      ],
    }),
    service: service({
      metadata,
      spec: {
        ports: [{ port, targetPort: port }],
      },
    }),
    ingress: ingress({
      metadata,
      spec: {
        ...(config.ingressClassName && { ingressClassName: config.ingressClassName }),
        rules: [
          {
            ...(host !== undefined && { host }),
            http: {
              paths: [
                {
                  path,
                  pathType: ROUTE_PATH_TYPE,
                  backend: {
                    service: {
                      name: config.name,
                      port: { number: port },
                    },
                  },
                },
              ],
            },
          },
        ],
      },
    }),
  };

  logger.debug('Built proxy route', { name: config.name, routespec: config.routespec, ip, port });
  return routeSet;
}

/**
 * Lists the objects of a route in the order they should be created
 */
export function routeResources(
  routeSet: RouteSet
): [EndpointsResource, ServiceResource, IngressResource] {
  return [routeSet.endpoints, routeSet.service, routeSet.ingress];
}
