import { ConflictError, NotFoundError } from './errors';

export interface StoredRecord {
  id: string;
}

/**
 * Process-local record store for one resource type. Iteration follows
 * insertion order; replacing a record keeps its position.
 *
 * Records go in and come out as deep copies, so the only way to change a
 * stored record is `replace`.
 */
export class RecordStore<T extends StoredRecord> {
  private readonly records = new Map<string, T>();

  constructor(readonly resource: string) {}

  get size(): number {
    return this.records.size;
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  find(id: string): T | undefined {
    const record = this.records.get(id);
    return record === undefined ? undefined : structuredClone(record);
  }

  insert(record: T): T {
    if (this.records.has(record.id)) {
      throw new ConflictError(`${this.resource} with this ID already exists`);
    }
    this.records.set(record.id, structuredClone(record));
    return structuredClone(record);
  }

  replace(record: T): T {
    if (!this.records.has(record.id)) {
      throw new NotFoundError(this.resource, record.id);
    }
    this.records.set(record.id, structuredClone(record));
    return structuredClone(record);
  }

  values(): T[] {
    return Array.from(this.records.values(), (record) => structuredClone(record));
  }
}
