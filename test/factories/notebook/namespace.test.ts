import { describe, expect, it } from 'vitest';
import { makeNamespace } from '../../../src/factories/notebook/namespace.js';

describe('makeNamespace', () => {
  it('should build a namespace with copied labels', () => {
    const labels = { 'hub.jupyter.org/username': 'alice' };
    const ns = makeNamespace({ name: 'jupyter-alice', labels });

    labels['hub.jupyter.org/username'] = 'bob';

    expect(ns).toEqual({
      apiVersion: 'v1',
      kind: 'Namespace',
      metadata: {
        name: 'jupyter-alice',
        labels: { 'hub.jupyter.org/username': 'alice' },
        annotations: {},
      },
    });
  });
});
