import type { Request, Response } from 'express';
import { AssignmentsService } from '../services/assignments.service';
import { toAssignmentInput } from '../utils/request.utils';

/**
 * Assignments Controller
 */
export class AssignmentsController {
  constructor(private readonly assignmentsService: AssignmentsService) {}

  async list(req: Request, res: Response): Promise<void> {
    res.status(200).json(await this.assignmentsService.list());
  }

  async get(req: Request, res: Response): Promise<void> {
    res.status(200).json(await this.assignmentsService.get(req.params.id));
  }

  async create(req: Request, res: Response): Promise<void> {
    const assignment = await this.assignmentsService.create(toAssignmentInput(req.body));
    res.status(201).location(`/assignments/${assignment.id}`).json(assignment);
  }

  async update(req: Request, res: Response): Promise<void> {
    const assignment = await this.assignmentsService.update(
      req.params.id,
      toAssignmentInput(req.body)
    );
    res.status(200).json(assignment);
  }

  async remove(req: Request, res: Response): Promise<void> {
    await this.assignmentsService.remove(req.params.id);
    res.status(204).end();
  }
}
