import { describe, it, expect } from 'vitest';
import { anyOf, applyFilters, atLeast, atMost, containsText, equals } from '@core/filters';
import type { FilterDefinitions } from '@core/filters';

interface Item {
  name: string;
  size: number;
  owner: string | null;
  tags: { label: string }[];
}

interface ItemFilters {
  name?: string;
  owner?: string;
  size?: number;
  min_size?: number;
  max_size?: number;
  label?: string;
}

const definitions: FilterDefinitions<Item, ItemFilters> = {
  name: containsText((i: Item) => i.name),
  owner: equals((i: Item) => i.owner),
  size: equals((i: Item) => i.size),
  min_size: atLeast((i: Item) => i.size),
  max_size: atMost((i: Item) => i.size),
  label: anyOf((i: Item) => i.tags, (t) => t.label),
};

const items: Item[] = [
  { name: 'Red Box', size: 3, owner: 'ana', tags: [{ label: 'red' }, { label: 'big' }] },
  { name: 'blue box', size: 1, owner: null, tags: [] },
  { name: 'Red Ball', size: 5, owner: 'Ana', tags: [{ label: 'red' }] },
  { name: 'Green Cube', size: 3, owner: 'ben', tags: [{ label: 'green' }] },
];

const names = (result: Item[]) => result.map((i) => i.name);

describe('applyFilters', () => {
  it('returns every record in order when no filter is given', () => {
    expect(applyFilters(items, {}, definitions)).toEqual(items);
  });

  it('ignores filters that are undefined', () => {
    expect(applyFilters(items, { name: undefined, size: undefined }, definitions)).toEqual(items);
  });

  it('matches text filters case-insensitively as substrings', () => {
    expect(names(applyFilters(items, { name: 'BOX' }, definitions))).toEqual(['Red Box', 'blue box']);
  });

  it('matches exact filters case-sensitively', () => {
    expect(names(applyFilters(items, { owner: 'ana' }, definitions))).toEqual(['Red Box']);
  });

  it('treats range bounds as inclusive', () => {
    expect(names(applyFilters(items, { min_size: 3, max_size: 3 }, definitions))).toEqual([
      'Red Box',
      'Green Cube',
    ]);
    expect(names(applyFilters(items, { min_size: 4 }, definitions))).toEqual(['Red Ball']);
    expect(names(applyFilters(items, { max_size: 1 }, definitions))).toEqual(['blue box']);
  });

  it('matches nested lists when any element matches', () => {
    expect(names(applyFilters(items, { label: 'red' }, definitions))).toEqual(['Red Box', 'Red Ball']);
  });

  it('combines filters with AND', () => {
    expect(names(applyFilters(items, { label: 'red', size: 5 }, definitions))).toEqual(['Red Ball']);
    expect(names(applyFilters(items, { label: 'green', name: 'red' }, definitions))).toEqual([]);
  });

  it('returns an empty list when nothing matches', () => {
    expect(applyFilters(items, { owner: 'zoe' }, definitions)).toEqual([]);
    expect(applyFilters([], { owner: 'zoe' }, definitions)).toEqual([]);
  });
});

describe('predicate builders', () => {
  it('containsText never matches a missing value', () => {
    const hasOwner = containsText((i: Item) => i.owner);
    expect(hasOwner(items[1], 'a')).toBe(false);
    expect(hasOwner(items[2], 'AN')).toBe(true);
  });

  it('anyOf is false for an empty list', () => {
    const labelled = anyOf((i: Item) => i.tags, (t) => t.label);
    expect(labelled(items[1], 'red')).toBe(false);
  });
});
