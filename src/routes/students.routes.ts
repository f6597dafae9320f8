import { RequestHandler, Router } from 'express';
import { StudentsController } from '../controllers/students.controller';
import { asyncHandler } from '../middleware/error.middleware';

/**
 * Students routes
 * Every endpoint requires a valid bearer token.
 */
export function createStudentsRoutes(
  controller: StudentsController,
  authenticate: RequestHandler
): Router {
  const router = Router();

  router.use(authenticate);

  router.get('/', asyncHandler((req, res) => controller.list(req, res)));
  router.post('/', asyncHandler((req, res) => controller.create(req, res)));
  router.get('/:id', asyncHandler((req, res) => controller.get(req, res)));
  router.put('/:id', asyncHandler((req, res) => controller.update(req, res)));
  router.delete('/:id', asyncHandler((req, res) => controller.remove(req, res)));
  router.get('/:id/assignments', asyncHandler((req, res) => controller.listAssignments(req, res)));

  return router;
}
