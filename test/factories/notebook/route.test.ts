import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { ValidationError } from '../../../src/core/errors.js';
import { makeIngress, routeResources } from '../../../src/factories/notebook/route.js';
import type { RouteConfig } from '../../../src/factories/notebook/types.js';

function routeConfig(overrides: Partial<RouteConfig> = {}): RouteConfig {
  return {
    name: 'route-alice',
    routespec: '/user/alice/',
    target: 'http://10.0.0.5:8000',
    data: { user: 'alice', last_activity: null },
    ...overrides,
  };
}

describe('makeIngress', () => {
  it('should bind the target address and port on the endpoints', () => {
    const { endpoints } = makeIngress(routeConfig());

    expect(endpoints.apiVersion).toBe('v1');
    expect(endpoints.kind).toBe('Endpoints');
    expect(endpoints.subsets).toEqual([
      { addresses: [{ ip: '10.0.0.5' }], ports: [{ port: 8000 }] },
    ]);
  });

  it('should expose the target port on the service', () => {
    const { service } = makeIngress(routeConfig());

    expect(service.kind).toBe('Service');
    expect(service.spec).toEqual({ ports: [{ port: 8000, targetPort: 8000 }] });
  });

  it('should route a host-less path to the service', () => {
    const { ingress } = makeIngress(routeConfig());

    expect(ingress.apiVersion).toBe('networking.k8s.io/v1');
    expect(ingress.kind).toBe('Ingress');
    expect(ingress.spec).toEqual({
      rules: [
        {
          http: {
            paths: [
              {
                path: '/user/alice/',
                pathType: 'ImplementationSpecific',
                backend: { service: { name: 'route-alice', port: { number: 8000 } } },
              },
            ],
          },
        },
      ],
    });
    expect(Object.keys(ingress.spec?.rules?.[0] ?? {})).not.toContain('host');
  });

  it('should split a host routespec into host and path', () => {
    const { ingress } = makeIngress(routeConfig({ routespec: 'example.com/foo' }));
    const rule = ingress.spec?.rules?.[0];

    expect(rule?.host).toBe('example.com');
    expect(rule?.http?.paths[0]?.path).toBe('/foo');
  });

  it('should take a routespec without a slash as a bare host with an empty path', () => {
    const { ingress } = makeIngress(routeConfig({ routespec: 'example.com' }));
    const rule = ingress.spec?.rules?.[0];

    expect(rule?.host).toBe('example.com');
    expect(rule?.http?.paths[0]?.path).toBe('');
  });

  it('should give all three objects the same metadata', () => {
    const { endpoints, service, ingress } = makeIngress(routeConfig());
    const expected = {
      name: 'route-alice',
      annotations: {
        'hub.jupyter.org/proxy-data': '{"user":"alice","last_activity":null}',
        'hub.jupyter.org/proxy-routespec': '/user/alice/',
        'hub.jupyter.org/proxy-target': 'http://10.0.0.5:8000',
      },
      labels: {
        heritage: 'jupyterhub',
        component: 'singleuser-server',
        'hub.jupyter.org/proxy-route': 'true',
      },
    };

    expect(endpoints.metadata).toEqual(expected);
    expect(service.metadata).toEqual(expected);
    expect(ingress.metadata).toEqual(expected);
  });

  it('should not let one object metadata leak into another', () => {
    const { endpoints, service } = makeIngress(routeConfig());

    if (endpoints.metadata.labels) {
      endpoints.metadata.labels.extra = 'yes';
    }

    expect(service.metadata.labels).toEqual({
      heritage: 'jupyterhub',
      component: 'singleuser-server',
      'hub.jupyter.org/proxy-route': 'true',
    });
  });

  it('should round-trip the data payload through the annotation', () => {
    const payload = fc.dictionary(
      fc.string().filter((key) => key !== '__proto__'),
      fc.oneof(fc.string(), fc.integer(), fc.boolean(), fc.constant(null), fc.array(fc.string()))
    );

    fc.assert(
      fc.property(payload, (data) => {
        const { endpoints, service, ingress } = makeIngress(routeConfig({ data }));

        for (const resource of [endpoints, service, ingress]) {
          const encoded = resource.metadata.annotations?.['hub.jupyter.org/proxy-data'];
          expect(JSON.parse(encoded ?? 'undefined')).toEqual(data);
        }
      })
    );
  });

  it('should carry namespace and ingress class when given', () => {
    const { endpoints, service, ingress } = makeIngress(
      routeConfig({ namespace: 'hub', ingressClassName: 'nginx' })
    );

    expect([endpoints, service, ingress].map((resource) => resource.metadata.namespace)).toEqual([
      'hub',
      'hub',
      'hub',
    ]);
    expect(ingress.spec?.ingressClassName).toBe('nginx');
  });

  it('should reject a target without a port', () => {
    expect(() => makeIngress(routeConfig({ target: 'http://10.0.0.5' }))).toThrow(ValidationError);
  });

  it('should reject a target that is not a URL', () => {
    expect(() => makeIngress(routeConfig({ target: '10.0.0.5 port 8000' }))).toThrow(
      "Invalid route 'route-alice': target '10.0.0.5 port 8000' is not a valid URL"
    );
  });

  it('should list the objects in creation order', () => {
    const routeSet = makeIngress(routeConfig());

    expect(routeResources(routeSet).map((resource) => resource.kind)).toEqual([
      'Endpoints',
      'Service',
      'Ingress',
    ]);
  });
});
