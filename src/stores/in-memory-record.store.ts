import type { Identifiable } from '../types/school.types';
import type { RecordStore } from './store.types';

/**
 * Process-local record store. Insertion order is preserved by list().
 * Records are shallow-copied, which is enough for the flat entity types stored here.
 */
export class InMemoryRecordStore<T extends Identifiable> implements RecordStore<T> {
  private readonly records = new Map<string, T>();

  async list(): Promise<T[]> {
    return Array.from(this.records.values(), (record) => ({ ...record }));
  }

  async findById(id: string): Promise<T | null> {
    const record = this.records.get(id);
    return record ? { ...record } : null;
  }

  async insert(record: T): Promise<T> {
    this.records.set(record.id, { ...record });
    return { ...record };
  }

  async update(id: string, record: T): Promise<T | null> {
    if (!this.records.has(id)) {
      return null;
    }
    const stored = { ...record, id };
    this.records.set(id, stored);
    return { ...stored };
  }

  async remove(id: string): Promise<boolean> {
    return this.records.delete(id);
  }
}
