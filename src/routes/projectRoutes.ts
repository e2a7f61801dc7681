import { RequestHandler, Router } from 'express';
import { ProjectController } from '../controllers/ProjectController';
import { requireOperation } from '../middleware/auth';
import { Operation } from '../services/AccessGate';

export const createProjectRoutes = (controller: ProjectController, authenticate: RequestHandler): Router => {
  const router = Router();
  router.use(authenticate);

  router.get('/', controller.list);
  router.get('/:id', controller.get);

  /**
   * Requires: manage-projects. Managers only for projects they manage.
   */
  router.post('/', requireOperation(Operation.MANAGE_PROJECTS), controller.create);
  router.put('/:id', requireOperation(Operation.MANAGE_PROJECTS), controller.update);
  router.post('/:id/members', requireOperation(Operation.MANAGE_PROJECTS), controller.addMember);
  router.delete('/:id/members/:employeeId', requireOperation(Operation.MANAGE_PROJECTS), controller.removeMember);

  return router;
};
