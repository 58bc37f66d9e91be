// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Predicate<T, V> = (record: T, value: V) => boolean;

/** One predicate per filter parameter the resource accepts. */
export type FilterDefinitions<T, F> = {
  [K in keyof F]-?: Predicate<T, NonNullable<F[K]>>;
};

// ---------------------------------------------------------------------------
// Predicate builders
// ---------------------------------------------------------------------------

/** Case-sensitive equality; accepts any filter value the field is compared to. */
export function equals<T>(select: (record: T) => unknown): Predicate<T, unknown> {
  return (record, value) => select(record) === value;
}

/** Case-insensitive substring containment. */
export function containsText<T>(
  select: (record: T) => string | null | undefined,
): Predicate<T, string> {
  return (record, value) => {
    const text = select(record);
    if (text === null || text === undefined) return false;
    return text.toLowerCase().includes(value.toLowerCase());
  };
}

export function atLeast<T>(select: (record: T) => number): Predicate<T, number> {
  return (record, value) => select(record) >= value;
}

export function atMost<T>(select: (record: T) => number): Predicate<T, number> {
  return (record, value) => select(record) <= value;
}

/** True when any element of an embedded list equals the filter value. */
export function anyOf<T, I>(
  items: (record: T) => readonly I[],
  select: (item: I) => unknown,
): Predicate<T, unknown> {
  return (record, value) => items(record).some((item) => select(item) === value);
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

function bindPredicate<T, F, K extends keyof F>(
  definitions: FilterDefinitions<T, F>,
  key: K,
  value: NonNullable<F[K]>,
): (record: T) => boolean {
  const predicate: Predicate<T, NonNullable<F[K]>> = definitions[key];
  return (record) => predicate(record, value);
}

/**
 * Returns the records matching every supplied filter, in their original
 * order. Filters that are absent (or null) impose no constraint.
 */
export function applyFilters<T, F extends object>(
  records: Iterable<T>,
  filters: F,
  definitions: FilterDefinitions<T, F>,
): T[] {
  const active: ((record: T) => boolean)[] = [];
  for (const key in definitions) {
    const value = filters[key];
    if (value === undefined || value === null) continue;
    active.push(bindPredicate(definitions, key, value));
  }

  const matches: T[] = [];
  for (const record of records) {
    if (active.every((test) => test(record))) {
      matches.push(record);
    }
  }
  return matches;
}
