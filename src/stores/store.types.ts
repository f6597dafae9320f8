import type { User } from '../types/user.types';
import type { Identifiable } from '../types/school.types';

/**
 * Credential store.
 * insert() must reject a username that already exists; concurrent inserts
 * of distinct usernames must not affect each other.
 */
export interface UserStore {
  findByIdentity(username: string): Promise<User | null>;
  insert(user: User): Promise<void>;
  listAll(): Promise<User[]>;
}

/**
 * Generic record store used for students and assignments
 */
export interface RecordStore<T extends Identifiable> {
  list(): Promise<T[]>;
  findById(id: string): Promise<T | null>;
  insert(record: T): Promise<T>;
  /** Returns null when no record has this id */
  update(id: string, record: T): Promise<T | null>;
  /** Returns false when no record has this id */
  remove(id: string): Promise<boolean>;
}
