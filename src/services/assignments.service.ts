import { randomUUID } from 'crypto';
import type { RecordStore } from '../stores/store.types';
import type { Assignment, AssignmentInput } from '../types/school.types';
import { NotFoundError } from '../middleware/error.middleware';
import { logger } from '../utils/logger';

/**
 * Assignments Service
 * The studentId reference is stored as posted and not checked against the student store.
 */
export class AssignmentsService {
  constructor(
    private readonly store: RecordStore<Assignment>,
    private readonly now: () => Date = () => new Date()
  ) {}

  async list(): Promise<Assignment[]> {
    return this.store.list();
  }

  async listForStudent(studentId: string): Promise<Assignment[]> {
    const assignments = await this.store.list();
    return assignments.filter((assignment) => assignment.studentId === studentId);
  }

  /**
   * @throws NotFoundError
   */
  async get(id: string): Promise<Assignment> {
    const assignment = await this.store.findById(id);
    if (!assignment) {
      throw new NotFoundError(`Assignment not found: ${id}`);
    }
    return assignment;
  }

  async create(input: AssignmentInput): Promise<Assignment> {
    const timestamp = this.now().toISOString();
    const assignment = await this.store.insert({
      ...input,
      id: randomUUID(),
      createdAt: timestamp,
      updatedAt: timestamp,
    });

    logger.info('Assignment created', { id: assignment.id, studentId: assignment.studentId });
    return assignment;
  }

  /**
   * @throws NotFoundError
   */
  async update(id: string, input: AssignmentInput): Promise<Assignment> {
    const existing = await this.get(id);
    const updated = await this.store.update(id, {
      ...input,
      id,
      createdAt: existing.createdAt,
      updatedAt: this.now().toISOString(),
    });

    if (!updated) {
      throw new NotFoundError(`Assignment not found: ${id}`);
    }
    logger.info('Assignment updated', { id });
    return updated;
  }

  /**
   * @throws NotFoundError
   */
  async remove(id: string): Promise<void> {
    const removed = await this.store.remove(id);
    if (!removed) {
      throw new NotFoundError(`Assignment not found: ${id}`);
    }
    logger.info('Assignment deleted', { id });
  }
}
