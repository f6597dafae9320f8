import type { Request, Response } from 'express';
import { StudentsService } from '../services/students.service';
import { AssignmentsService } from '../services/assignments.service';
import { toStudentInput } from '../utils/request.utils';

/**
 * Students Controller
 */
export class StudentsController {
  constructor(
    private readonly studentsService: StudentsService,
    private readonly assignmentsService: AssignmentsService
  ) {}

  /**
   * GET /students
   */
  async list(req: Request, res: Response): Promise<void> {
    res.status(200).json(await this.studentsService.list());
  }

  /**
   * GET /students/:id
   */
  async get(req: Request, res: Response): Promise<void> {
    res.status(200).json(await this.studentsService.get(req.params.id));
  }

  /**
   * GET /students/:id/assignments
   * 404 if the student does not exist
   */
  async listAssignments(req: Request, res: Response): Promise<void> {
    const student = await this.studentsService.get(req.params.id);
    res.status(200).json(await this.assignmentsService.listForStudent(student.id));
  }

  /**
   * POST /students
   */
  async create(req: Request, res: Response): Promise<void> {
    const student = await this.studentsService.create(toStudentInput(req.body));
    res.status(201).location(`/students/${student.id}`).json(student);
  }

  /**
   * PUT /students/:id
   */
  async update(req: Request, res: Response): Promise<void> {
    const student = await this.studentsService.update(req.params.id, toStudentInput(req.body));
    res.status(200).json(student);
  }

  /**
   * DELETE /students/:id
   */
  async remove(req: Request, res: Response): Promise<void> {
    await this.studentsService.remove(req.params.id);
    res.status(204).end();
  }
}
