import { randomUUID } from 'crypto';
import type { RecordStore } from '../stores/store.types';
import type { Student, StudentInput } from '../types/school.types';
import { NotFoundError } from '../middleware/error.middleware';
import { logger } from '../utils/logger';

/**
 * Students Service
 * Stores what was posted and returns what was stored
 */
export class StudentsService {
  constructor(
    private readonly store: RecordStore<Student>,
    private readonly now: () => Date = () => new Date()
  ) {}

  async list(): Promise<Student[]> {
    return this.store.list();
  }

  /**
   * @throws NotFoundError
   */
  async get(id: string): Promise<Student> {
    const student = await this.store.findById(id);
    if (!student) {
      throw new NotFoundError(`Student not found: ${id}`);
    }
    return student;
  }

  async create(input: StudentInput): Promise<Student> {
    const timestamp = this.now().toISOString();
    const student = await this.store.insert({
      ...input,
      id: randomUUID(),
      createdAt: timestamp,
      updatedAt: timestamp,
    });

    logger.info('Student created', { id: student.id });
    return student;
  }

  /**
   * Replace the client-editable fields of an existing student
   *
   * @throws NotFoundError
   */
  async update(id: string, input: StudentInput): Promise<Student> {
    const existing = await this.get(id);
    const updated = await this.store.update(id, {
      ...input,
      id,
      createdAt: existing.createdAt,
      updatedAt: this.now().toISOString(),
    });

    if (!updated) {
      throw new NotFoundError(`Student not found: ${id}`);
    }
    logger.info('Student updated', { id });
    return updated;
  }

  /**
   * @throws NotFoundError
   */
  async remove(id: string): Promise<void> {
    const removed = await this.store.remove(id);
    if (!removed) {
      throw new NotFoundError(`Student not found: ${id}`);
    }
    logger.info('Student deleted', { id });
  }
}
