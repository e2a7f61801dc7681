import { RequestHandler, Router } from 'express';
import { LeaveController } from '../controllers/LeaveController';
import { requireOperation } from '../middleware/auth';
import { Operation } from '../services/AccessGate';

export const createLeaveRoutes = (controller: LeaveController, authenticate: RequestHandler): Router => {
  const router = Router();
  router.use(authenticate);

  router.post('/requests', requireOperation(Operation.APPLY_LEAVE), controller.submit);
  router.get('/requests', requireOperation(Operation.VIEW_OWN_LEAVE), controller.listOwn);

  // Before /requests/:id routes
  router.get('/requests/pending', requireOperation(Operation.APPROVE_LEAVE), controller.listPending);

  router.put('/requests/:id/approve', requireOperation(Operation.APPROVE_LEAVE), controller.approve);
  router.put('/requests/:id/reject', requireOperation(Operation.APPROVE_LEAVE), controller.reject);
  router.put('/requests/:id/cancel', requireOperation(Operation.CANCEL_OWN_LEAVE), controller.cancel);

  // Self, direct manager, HR and Admin; checked against the employee in the service
  router.get('/balance', controller.balance);

  return router;
};
