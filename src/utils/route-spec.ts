/**
 * Parsing of proxy route specifications and route targets
 */

import { ValidationError } from '../core/errors.js';
import { getComponentLogger } from '../core/logging/index.js';

const logger = getComponentLogger('route-spec');

export interface RouteSpec {
  /** Absent for host-less routes such as `/user/alice/` */
  host?: string;
  path: string;
}

export interface RouteTarget {
  ip: string;
  port: number;
}

// URL drops a port equal to the scheme default, so look for one written out
const EXPLICIT_PORT = /^[a-z][a-z0-9+.-]*:\/\/(?:[^@/?#]*@)?(?:\[[^\]]*\]|[^:/?#]*):(\d+)(?:[/?#]|$)/i;

/**
 * Splits a routespec into host and path.
 *
 * `/foo/bar` has no host. `example.com/foo` splits at the first slash into
 * `example.com` and `/foo`. A routespec with no slash at all is taken as a
 * bare host with an empty path.
 */
export function parseRouteSpec(routespec: string): RouteSpec {
  if (routespec.startsWith('/')) {
    return { path: routespec };
  }

  const slash = routespec.indexOf('/');
  if (slash === -1) {
    return { host: routespec, path: '' };
  }

  return { host: routespec.slice(0, slash), path: routespec.slice(slash) };
}

/**
 * Extracts the address and port a route forwards to.
 *
 * @param target - URL of the backend, e.g. `http://10.0.0.5:8000`
 * @param routeName - name of the route being built, for error context
 * @throws ValidationError when target is not a URL with both a hostname and a port
 */
export function parseTarget(target: string, routeName = 'unnamed'): RouteTarget {
  let url: URL;
  try {
    url = new URL(target);
  } catch (error) {
    logger.debug('Rejected malformed route target', { routeName, target });
    throw new ValidationError(
      `Invalid route '${routeName}': target '${target}' is not a valid URL`,
      'Route',
      routeName,
      'target',
      ['Use a full URL including scheme and port, e.g. http://10.0.0.5:8000'],
      { cause: error }
    );
  }

  const ip = url.hostname.replace(/^\[(.*)\]$/, '$1');
  if (ip === '') {
    logger.debug('Rejected route target without hostname', { routeName, target });
    throw new ValidationError(
      `Invalid route '${routeName}': target '${target}' has no hostname`,
      'Route',
      routeName,
      'target'
    );
  }

  const explicit = url.port === '' ? EXPLICIT_PORT.exec(target)?.[1] : url.port;
  if (explicit === undefined) {
    logger.debug('Rejected route target without port', { routeName, target });
    throw new ValidationError(
      `Invalid route '${routeName}': target '${target}' has no port`,
      'Route',
      routeName,
      'target',
      [`Add the port the backend listens on, e.g. ${url.protocol}//${url.host}:8000`]
    );
  }

  return { ip, port: Number(explicit) };
}
