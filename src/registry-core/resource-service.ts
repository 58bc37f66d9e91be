import { randomUUID } from 'crypto';
import type { z } from 'zod';
import { NotFoundError } from './errors';
import { applyFilters } from './filters';
import type { FilterDefinitions } from './filters';
import { mergeRecord } from './merge';
import type { RecordStore, StoredRecord } from './store';
import { validate } from './validation';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface ResourceDefinition<
  TRecord extends StoredRecord,
  TCreate extends object,
  TUpdate extends object,
  TFilters extends object,
> {
  /** Singular name used in error messages, e.g. "Course". */
  name: string;
  createSchema: Schema<TCreate>;
  updateSchema: Schema<TUpdate>;
  recordSchema: Schema<TRecord>;
  filterSchema: Schema<TFilters>;
  filters: FilterDefinitions<TRecord, TFilters>;
  /** Records carry `created_at` / `updated_at`. */
  timestamped: boolean;
  /**
   * Constraints spanning several records, checked against the current
   * contents of the store before every write. Throws to reject the write.
   */
  checkConstraints?: (
    candidate: TRecord,
    existing: readonly TRecord[],
    excludeId?: string,
  ) => void;
}

/** The operations the HTTP layer drives for each resource. */
export interface ResourceOperations<TRecord> {
  create(payload: unknown): TRecord;
  list(query?: unknown): TRecord[];
  get(id: string): TRecord;
  update(id: string, payload: unknown): TRecord;
}

export interface ServiceOptions {
  now?: () => Date;
  generateId?: () => string;
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

/**
 * create / list / get / update for one resource type. Every operation runs
 * synchronously to completion, and a failing operation leaves the store as
 * it was.
 */
export class ResourceService<
  TRecord extends StoredRecord,
  TCreate extends object,
  TUpdate extends object,
  TFilters extends object,
> implements ResourceOperations<TRecord>
{
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    readonly definition: ResourceDefinition<TRecord, TCreate, TUpdate, TFilters>,
    readonly store: RecordStore<TRecord>,
    options: ServiceOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  create(payload: unknown): TRecord {
    const input = validate(this.definition.createSchema, payload);

    const defaults: Record<string, unknown> = { id: this.generateId() };
    if (this.definition.timestamped) {
      const stamp = this.now().toISOString();
      defaults.created_at = stamp;
      defaults.updated_at = stamp;
    }

    // A client-chosen id (standalone addresses) overrides the generated one.
    const record = validate(this.definition.recordSchema, mergeRecord(defaults, input));
    this.definition.checkConstraints?.(record, this.store.values());
    return this.store.insert(record);
  }

  list(query: unknown = {}): TRecord[] {
    const filters = validate(this.definition.filterSchema, query);
    return applyFilters(this.store.values(), filters, this.definition.filters);
  }

  get(id: string): TRecord {
    const record = this.store.find(id);
    if (!record) {
      throw new NotFoundError(this.definition.name, id);
    }
    return record;
  }

  update(id: string, payload: unknown): TRecord {
    const stored = this.get(id);
    const patch = validate(this.definition.updateSchema, payload);

    const merged = mergeRecord(stored, patch);
    if (this.definition.timestamped) {
      merged.updated_at = this.now().toISOString();
    }

    const record = validate(this.definition.recordSchema, merged);
    this.definition.checkConstraints?.(record, this.store.values(), id);
    return this.store.replace(record);
  }
}
