/**
 * List filtering, sorting and paging driven by the UI's query parameters:
 * `filterBy=name,web`, `sortBy=d,creationTimestamp,a,name`,
 * `itemsPerPage=10&page=2`.
 */

import type { K8sObject } from './types.js';

export type SelectProperty = 'name' | 'namespace' | 'creationTimestamp';

export interface SortTerm {
  property: SelectProperty;
  ascending: boolean;
}

export interface FilterTerm {
  property: SelectProperty;
  value: string;
}

export interface DataSelectQuery {
  filterBy: FilterTerm[];
  sortBy: SortTerm[];
  itemsPerPage?: number;
  page: number;
}

export interface SelectableFields {
  name: string;
  namespace: string;
  creationTimestamp: number;
}

const PROPERTIES: ReadonlySet<string> = new Set(['name', 'namespace', 'creationTimestamp']);

function isProperty(value: string | undefined): value is SelectProperty {
  return value !== undefined && PROPERTIES.has(value);
}

function pairs(raw: string | undefined): Array<[string, string]> {
  if (!raw) return [];
  const parts = raw.split(',');
  const result: Array<[string, string]> = [];
  for (let i = 0; i + 1 < parts.length; i += 2) {
    const first = parts[i];
    const second = parts[i + 1];
    if (first !== undefined && second !== undefined) result.push([first.trim(), second.trim()]);
  }
  return result;
}

function positiveInt(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

export function parseDataSelect(query: Record<string, string | undefined>): DataSelectQuery {
  const sortBy: SortTerm[] = [];
  for (const [direction, property] of pairs(query.sortBy)) {
    if (isProperty(property)) sortBy.push({ property, ascending: direction !== 'd' });
  }

  const filterBy: FilterTerm[] = [];
  for (const [property, value] of pairs(query.filterBy)) {
    if (isProperty(property) && value) filterBy.push({ property, value });
  }

  return {
    filterBy,
    sortBy,
    itemsPerPage: positiveInt(query.itemsPerPage),
    page: positiveInt(query.page) ?? 1,
  };
}

export function objectFields(object: K8sObject): SelectableFields {
  const created = object.metadata?.creationTimestamp;
  const timestamp = created === undefined ? Number.NaN : new Date(created).getTime();
  return {
    name: object.metadata?.name ?? '',
    namespace: object.metadata?.namespace ?? '',
    creationTimestamp: Number.isNaN(timestamp) ? 0 : timestamp,
  };
}

function matches(fields: SelectableFields, filter: FilterTerm): boolean {
  switch (filter.property) {
    case 'name':
      return fields.name.includes(filter.value);
    case 'namespace':
      return fields.namespace === filter.value;
    case 'creationTimestamp':
      return String(fields.creationTimestamp) === filter.value;
  }
}

function compare(a: SelectableFields, b: SelectableFields, term: SortTerm): number {
  const left = a[term.property];
  const right = b[term.property];
  const order = left < right ? -1 : left > right ? 1 : 0;
  return term.ascending ? order : -order;
}

export interface Selection<T> {
  items: T[];
  totalItems: number;
}

/** Apply filters, then sort terms in order, then the page window. */
export function applyDataSelect<T>(
  items: T[],
  query: DataSelectQuery,
  fields: (item: T) => SelectableFields
): Selection<T> {
  const withFields = items
    .map((item) => ({ item, fields: fields(item) }))
    .filter((entry) => query.filterBy.every((filter) => matches(entry.fields, filter)));

  if (query.sortBy.length > 0) {
    withFields.sort((a, b) => {
      for (const term of query.sortBy) {
        const result = compare(a.fields, b.fields, term);
        if (result !== 0) return result;
      }
      return 0;
    });
  }

  const totalItems = withFields.length;
  let selected = withFields;
  if (query.itemsPerPage !== undefined) {
    const start = (query.page - 1) * query.itemsPerPage;
    selected = withFields.slice(start, start + query.itemsPerPage);
  }

  return { items: selected.map((entry) => entry.item), totalItems };
}

export const selectObjects = (items: K8sObject[], query: DataSelectQuery) =>
  applyDataSelect(items, query, objectFields);
