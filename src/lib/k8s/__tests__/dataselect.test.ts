import { describe, expect, it } from 'vitest';
import { applyDataSelect, objectFields, parseDataSelect, selectObjects } from '../dataselect.js';
import type { K8sObject } from '../types.js';

const object = (name: string, namespace: string, created: string): K8sObject => ({
  metadata: { name, namespace, creationTimestamp: new Date(created) },
});

const objects = [
  object('web-b', 'default', '2024-01-02T00:00:00Z'),
  object('api', 'kube-system', '2024-01-03T00:00:00Z'),
  object('web-a', 'default', '2024-01-01T00:00:00Z'),
];

const names = (items: K8sObject[]) => items.map((item) => item.metadata?.name);

describe('parseDataSelect', () => {
  it('reads sort pairs, filter pairs and paging', () => {
    expect(
      parseDataSelect({
        sortBy: 'd,creationTimestamp,a,name',
        filterBy: 'name,web',
        itemsPerPage: '10',
        page: '2',
      })
    ).toEqual({
      sortBy: [
        { property: 'creationTimestamp', ascending: false },
        { property: 'name', ascending: true },
      ],
      filterBy: [{ property: 'name', value: 'web' }],
      itemsPerPage: 10,
      page: 2,
    });
  });

  it('drops unknown properties and bad numbers', () => {
    expect(parseDataSelect({ sortBy: 'a,size', filterBy: 'name,', itemsPerPage: '-1', page: 'x' })).toEqual({
      sortBy: [],
      filterBy: [],
      itemsPerPage: undefined,
      page: 1,
    });
  });
});

describe('applyDataSelect', () => {
  it('filters names by substring and namespaces exactly', () => {
    const query = parseDataSelect({ filterBy: 'name,web,namespace,default' });
    expect(names(selectObjects(objects, query).items)).toEqual(['web-b', 'web-a']);
  });

  it('sorts by the terms in order', () => {
    expect(names(selectObjects(objects, parseDataSelect({ sortBy: 'a,name' })).items)).toEqual([
      'api',
      'web-a',
      'web-b',
    ]);
    expect(names(selectObjects(objects, parseDataSelect({ sortBy: 'd,creationTimestamp' })).items)).toEqual([
      'api',
      'web-b',
      'web-a',
    ]);
    expect(
      names(selectObjects(objects, parseDataSelect({ sortBy: 'a,namespace,d,name' })).items)
    ).toEqual(['web-b', 'web-a', 'api']);
  });

  it('pages after counting the filtered total', () => {
    const selection = selectObjects(objects, parseDataSelect({ sortBy: 'a,name', itemsPerPage: '2', page: '2' }));
    expect(selection.totalItems).toBe(3);
    expect(names(selection.items)).toEqual(['web-b']);
  });

  it('returns an empty page past the end', () => {
    const selection = applyDataSelect([1, 2], parseDataSelect({ itemsPerPage: '5', page: '3' }), (n) => ({
      name: String(n),
      namespace: '',
      creationTimestamp: 0,
    }));
    expect(selection).toEqual({ items: [], totalItems: 2 });
  });
});

describe('objectFields', () => {
  it('defaults missing metadata', () => {
    expect(objectFields({})).toEqual({ name: '', namespace: '', creationTimestamp: 0 });
  });
});
