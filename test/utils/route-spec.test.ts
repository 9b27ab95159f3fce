import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { ValidationError } from '../../src/core/errors.js';
import { parseRouteSpec, parseTarget } from '../../src/utils/route-spec.js';

const segment = fc.stringMatching(/^[a-z0-9-]{1,12}$/);
const path = fc.array(segment, { maxLength: 4 }).map((segments) => `/${segments.join('/')}`);

describe('parseRouteSpec', () => {
  it('should treat a leading slash as a host-less path', () => {
    expect(parseRouteSpec('/foo/bar')).toEqual({ path: '/foo/bar' });
    expect(parseRouteSpec('/foo/bar').host).toBeUndefined();
  });

  it('should split host and path at the first slash', () => {
    expect(parseRouteSpec('example.com/foo')).toEqual({ host: 'example.com', path: '/foo' });
    expect(parseRouteSpec('example.com/a/b/')).toEqual({ host: 'example.com', path: '/a/b/' });
  });

  it('should take a routespec without a slash as a host with an empty path', () => {
    expect(parseRouteSpec('example.com')).toEqual({ host: 'example.com', path: '' });
  });

  it('should keep any path beginning with a slash whole', () => {
    fc.assert(
      fc.property(path, (routespec) => {
        expect(parseRouteSpec(routespec)).toEqual({ path: routespec });
      })
    );
  });

  it('should recover host and path from host + path', () => {
    fc.assert(
      fc.property(fc.domain(), path, (host, routePath) => {
        expect(parseRouteSpec(`${host}${routePath}`)).toEqual({ host, path: routePath });
      })
    );
  });
});

describe('parseTarget', () => {
  it('should extract address and port', () => {
    expect(parseTarget('http://10.0.0.5:8000')).toEqual({ ip: '10.0.0.5', port: 8000 });
  });

  it('should ignore the path of the target', () => {
    expect(parseTarget('https://hub.example.org:8443/user/alice/')).toEqual({
      ip: 'hub.example.org',
      port: 8443,
    });
  });

  it('should strip brackets from IPv6 addresses', () => {
    expect(parseTarget('http://[fd00::5]:8888')).toEqual({ ip: 'fd00::5', port: 8888 });
  });

  it('should keep a port written out even when it is the scheme default', () => {
    expect(parseTarget('http://hub.local:80/path')).toEqual({ ip: 'hub.local', port: 80 });
  });

  it('should reject a target without a port', () => {
    expect(() => parseTarget('https://example.com', 'route-alice')).toThrow(
      "Invalid route 'route-alice': target 'https://example.com' has no port"
    );
  });

  it('should reject a target without a hostname', () => {
    expect(() => parseTarget('file:///tmp/socket')).toThrow(
      "Invalid route 'unnamed': target 'file:///tmp/socket' has no hostname"
    );
  });

  it('should reject something that is not a URL', () => {
    try {
      parseTarget('not a url', 'route-alice');
      expect.unreachable('parseTarget should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.field).toBe('target');
        expect(error.resourceKind).toBe('Route');
        expect(error.resourceName).toBe('route-alice');
        expect(error.cause).toBeInstanceOf(TypeError);
      }
    }
  });
});
