import { RequestHandler, Router } from 'express';
import { EmployeeController } from '../controllers/EmployeeController';
import { requireOperation } from '../middleware/auth';
import { Operation } from '../services/AccessGate';

export const createEmployeeRoutes = (controller: EmployeeController, authenticate: RequestHandler): Router => {
  const router = Router();
  router.use(authenticate);

  // Self-service
  router.get('/me', controller.getOwnProfile);
  router.put('/me', controller.updateOwnProfile);

  /**
   * GET /api/employees
   * Directory with search, department and role filters. Requires: view-team-directory
   */
  router.get('/', requireOperation(Operation.VIEW_TEAM_DIRECTORY), controller.directory);

  /**
   * GET /api/employees/search?q=
   * Requires: view-team-directory
   */
  router.get('/search', requireOperation(Operation.VIEW_TEAM_DIRECTORY), controller.quickSearch);

  /**
   * GET /api/employees/:id
   * Requires: view-employee-detail (HR, Admin)
   */
  router.get('/:id', requireOperation(Operation.VIEW_EMPLOYEE_DETAIL), controller.getEmployee);

  return router;
};
