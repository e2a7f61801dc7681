import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AttendanceService } from '../services/AttendanceService';
import { requirePrincipal } from '../middleware/auth';
import { validateRequest, zCalendarDate } from '../utils/validation';

const clockInSchema = z.object({
  location: z.string().trim().max(255).optional()
});

const rangeQuery = z.object({
  from: zCalendarDate.optional(),
  to: zCalendarDate.optional()
});

const teamQuery = z.object({
  date: zCalendarDate.optional()
});

export class AttendanceController {
  constructor(private readonly attendanceService: AttendanceService) {}

  /**
   * POST /api/attendance/clock-in
   */
  public clockIn = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { location } = validateRequest(req.body ?? {}, clockInSchema);
      const record = await this.attendanceService.clockIn(requirePrincipal(req), {
        ip: req.ip ?? null,
        deviceInfo: req.get('user-agent') ?? null,
        location: location ?? null
      });

      res.status(201).json({
        success: true,
        message: 'Clocked in successfully',
        data: record
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/attendance/clock-out
   */
  public clockOut = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const record = await this.attendanceService.clockOut(requirePrincipal(req));

      res.status(200).json({
        success: true,
        message: 'Clocked out successfully',
        data: record
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/attendance/status
   */
  public status = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const day = await this.attendanceService.status(requirePrincipal(req));

      res.status(200).json({
        success: true,
        data: day
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/attendance/me?from=&to=
   */
  public history = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const range = validateRequest(req.query, rangeQuery);
      const records = await this.attendanceService.history(requirePrincipal(req), range);

      res.status(200).json({
        success: true,
        data: records
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/attendance/team?date=
   */
  public team = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { date } = validateRequest(req.query, teamQuery);
      const records = await this.attendanceService.team(requirePrincipal(req), date);

      res.status(200).json({
        success: true,
        data: records
      });
    } catch (error) {
      next(error);
    }
  };
}
