import { RequestHandler, Router } from 'express';
import { AssignmentsController } from '../controllers/assignments.controller';
import { asyncHandler } from '../middleware/error.middleware';

/**
 * Assignments routes
 * Every endpoint requires a valid bearer token.
 */
export function createAssignmentsRoutes(
  controller: AssignmentsController,
  authenticate: RequestHandler
): Router {
  const router = Router();

  router.use(authenticate);

  router.get('/', asyncHandler((req, res) => controller.list(req, res)));
  router.post('/', asyncHandler((req, res) => controller.create(req, res)));
  router.get('/:id', asyncHandler((req, res) => controller.get(req, res)));
  router.put('/:id', asyncHandler((req, res) => controller.update(req, res)));
  router.delete('/:id', asyncHandler((req, res) => controller.remove(req, res)));

  return router;
}
