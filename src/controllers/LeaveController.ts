import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { LedgerOutcome, LeaveLedgerService } from '../services/leave/LeaveLedgerService';
import { requirePrincipal } from '../middleware/auth';
import { LEAVE_STATUSES, LEAVE_TYPES } from '../models/leave/LeaveRequest';
import { validateRequest, zCalendarDate, zUuid } from '../utils/validation';

const idParams = z.object({ id: zUuid });

const applicationSchema = z.object({
  leaveType: z.enum(LEAVE_TYPES),
  fromDate: zCalendarDate,
  toDate: zCalendarDate,
  reason: z.string().trim().max(2000).default('')
});

const listQuery = z.object({
  status: z.enum(LEAVE_STATUSES).optional(),
  year: z.coerce.number().int().min(1900).max(9999).optional()
});

const rejectionSchema = z.object({
  rejectionReason: z.string().trim().max(2000).optional()
});

const balanceQuery = z.object({
  employeeId: zUuid.optional(),
  year: z.coerce.number().int().min(1900).max(9999).optional()
});

export class LeaveController {
  constructor(private readonly leaveService: LeaveLedgerService) {}

  /**
   * POST /api/leave/requests
   */
  public submit = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const application = validateRequest(req.body, applicationSchema);
      const outcome = await this.leaveService.submit(requirePrincipal(req), application);
      this.send(outcome, res, next, 201, 'Leave request submitted successfully');
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/leave/requests
   */
  public listOwn = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const filters = validateRequest(req.query, listQuery);
      const outcome = await this.leaveService.listOwn(requirePrincipal(req), filters);
      this.send(outcome, res, next);
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/leave/requests/pending
   */
  public listPending = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const outcome = await this.leaveService.listPendingForApprover(requirePrincipal(req));
      this.send(outcome, res, next);
    } catch (error) {
      next(error);
    }
  };

  /**
   * PUT /api/leave/requests/:id/approve
   */
  public approve = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = validateRequest(req.params, idParams);
      const outcome = await this.leaveService.decide(requirePrincipal(req), id, 'APPROVE');
      this.send(outcome, res, next, 200, 'Leave request approved');
    } catch (error) {
      next(error);
    }
  };

  /**
   * PUT /api/leave/requests/:id/reject
   */
  public reject = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = validateRequest(req.params, idParams);
      const { rejectionReason } = validateRequest(req.body ?? {}, rejectionSchema);
      const outcome = await this.leaveService.decide(requirePrincipal(req), id, 'REJECT', rejectionReason);
      this.send(outcome, res, next, 200, 'Leave request rejected');
    } catch (error) {
      next(error);
    }
  };

  /**
   * PUT /api/leave/requests/:id/cancel
   */
  public cancel = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = validateRequest(req.params, idParams);
      const outcome = await this.leaveService.cancel(requirePrincipal(req), id);
      this.send(outcome, res, next, 200, 'Leave request cancelled');
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/leave/balance?employeeId=&year=
   * Defaults to the caller and the current year.
   */
  public balance = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const principal = requirePrincipal(req);
      const query = validateRequest(req.query, balanceQuery);
      const outcome = await this.leaveService.balanceSummary(
        principal,
        query.employeeId ?? principal.id,
        query.year
      );
      this.send(outcome, res, next);
    } catch (error) {
      next(error);
    }
  };

  private send<T>(outcome: LedgerOutcome<T>, res: Response, next: NextFunction, status = 200, message?: string): void {
    if (!outcome.success) {
      next(outcome.error);
      return;
    }
    res.status(status).json({
      success: true,
      ...(message ? { message } : {}),
      data: outcome.data
    });
  }
}
