import { RequestHandler, Router } from 'express';
import { AttendanceController } from '../controllers/AttendanceController';
import { requireOperation } from '../middleware/auth';
import { Operation } from '../services/AccessGate';

export const createAttendanceRoutes = (controller: AttendanceController, authenticate: RequestHandler): Router => {
  const router = Router();
  router.use(authenticate);

  router.post('/clock-in', requireOperation(Operation.CLOCK_ATTENDANCE), controller.clockIn);
  router.post('/clock-out', requireOperation(Operation.CLOCK_ATTENDANCE), controller.clockOut);
  router.get('/status', requireOperation(Operation.VIEW_OWN_ATTENDANCE), controller.status);
  router.get('/me', requireOperation(Operation.VIEW_OWN_ATTENDANCE), controller.history);

  /**
   * GET /api/attendance/team?date=
   * HR and Admin see everyone, a Manager their direct reports
   */
  router.get('/team', requireOperation(Operation.VIEW_TEAM_ATTENDANCE), controller.team);

  return router;
};
