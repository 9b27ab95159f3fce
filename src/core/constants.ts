/**
 * Names shared between the builders and whatever later looks the objects up again
 */

/** Name of the single notebook container in a spawned pod */
export const NOTEBOOK_CONTAINER_NAME = 'notebook';

/** Port name used for service discovery of the notebook server */
export const NOTEBOOK_PORT_NAME = 'notebook-port';

export const STORAGE_CLASS_ANNOTATION = 'volume.beta.kubernetes.io/storage-class';

export const PROXY_ANNOTATIONS = {
  data: 'hub.jupyter.org/proxy-data',
  routespec: 'hub.jupyter.org/proxy-routespec',
  target: 'hub.jupyter.org/proxy-target',
} as const;

export const PROXY_ROUTE_LABELS: Readonly<Record<string, string>> = {
  heritage: 'jupyterhub',
  component: 'singleuser-server',
  'hub.jupyter.org/proxy-route': 'true',
};

/** Path type for route ingress paths; prefix matching is left to the controller */
export const ROUTE_PATH_TYPE = 'ImplementationSpecific';
