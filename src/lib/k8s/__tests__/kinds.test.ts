import { describe, expect, it } from 'vitest';
import { aggregatedKinds, customKind, findKind, Kinds, resolveKind } from '../kinds.js';

describe('resolveKind', () => {
  it('returns registry entries by lowercase key', () => {
    expect(resolveKind('Deployment')).toEqual({
      key: 'deployment',
      apiVersion: 'apps/v1',
      kind: 'Deployment',
      namespaced: true,
      listKey: 'deployments',
      workload: true,
      aggregated: true,
    });
  });

  it('fills registry defaults for workload and aggregated', () => {
    expect(resolveKind('event')).toMatchObject({ workload: false, aggregated: false, listKey: 'events' });
  });

  it('treats unknown keys as namespaced core kinds', () => {
    expect(resolveKind('widget')).toEqual({
      key: 'widget',
      apiVersion: 'v1',
      kind: 'Widget',
      namespaced: true,
      listKey: 'items',
      workload: false,
      aggregated: false,
    });
  });

  it('splits dotted keys into group and kind', () => {
    const kind = resolveKind('example.com.gadget');
    expect(kind.apiVersion).toBe('example.com/v1');
    expect(kind.kind).toBe('Gadget');
  });
});

describe('registry helpers', () => {
  it('findKind only knows registry keys', () => {
    expect(findKind('NODE')?.namespaced).toBe(false);
    expect(findKind('widget')).toBeUndefined();
  });

  it('aggregatedKinds lists flagged kinds only', () => {
    const keys = aggregatedKinds().map((kind) => kind.key);
    expect(keys).toContain('pod');
    expect(keys).toContain('application');
    expect(keys).not.toContain('event');
    expect(keys).not.toContain('cluster');
  });

  it('exposes common kinds', () => {
    expect(Kinds.cluster.apiVersion).toBe('cluster.karmada.io/v1alpha1');
    expect(Kinds.crd.kind).toBe('CustomResourceDefinition');
  });

  it('customKind joins group and version', () => {
    expect(customKind('example.com', 'v1beta1', 'Gadget', false)).toMatchObject({
      key: 'gadget',
      apiVersion: 'example.com/v1beta1',
      namespaced: false,
    });
    expect(customKind('', 'v1', 'Thing', true).apiVersion).toBe('v1');
  });
});
