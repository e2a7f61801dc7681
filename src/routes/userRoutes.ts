import { RequestHandler, Router } from 'express';
import { UserController } from '../controllers/UserController';
import { requireOperation } from '../middleware/auth';
import { Operation } from '../services/AccessGate';

export const createUserRoutes = (controller: UserController, authenticate: RequestHandler): Router => {
  const router = Router();
  router.use(authenticate);

  /**
   * POST /api/users
   * Requires: manage-users (HR, Admin); assign-role as well for HR/Admin accounts
   */
  router.post('/', requireOperation(Operation.MANAGE_USERS), controller.createUser);

  /**
   * PUT /api/users/:id/role
   * Requires: assign-role (Admin)
   */
  router.put('/:id/role', requireOperation(Operation.ASSIGN_ROLE), controller.assignRole);

  /**
   * PUT /api/users/:id/manager
   * Requires: assign-manager (HR, Admin)
   */
  router.put('/:id/manager', requireOperation(Operation.ASSIGN_MANAGER), controller.assignManager);

  /**
   * DELETE /api/users/:id
   * Soft delete. Requires: manage-users
   */
  router.delete('/:id', requireOperation(Operation.MANAGE_USERS), controller.deactivateUser);

  return router;
};
