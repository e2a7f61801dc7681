import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { EmployeeService } from '../services/EmployeeService';
import { requirePrincipal } from '../middleware/auth';
import { ROLES } from '../models/User';
import { validateRequest, zPage, zUuid } from '../utils/validation';

const directoryQuery = z.object({
  search: z.string().trim().optional(),
  department: z.string().trim().optional(),
  role: z.enum(ROLES).optional(),
  page: zPage
});

const searchQuery = z.object({
  q: z.string().default('')
});

export class EmployeeController {
  constructor(private readonly employeeService: EmployeeService) {}

  /**
   * GET /api/employees/me
   */
  public getOwnProfile = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const record = await this.employeeService.getOwnProfile(requirePrincipal(req));

      res.status(200).json({
        success: true,
        data: record
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * PUT /api/employees/me
   */
  public updateOwnProfile = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const record = await this.employeeService.updateOwnProfile(requirePrincipal(req), req.body);

      res.status(200).json({
        success: true,
        message: 'Profile updated successfully',
        data: record
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/employees
   */
  public directory = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { page, search, department, role } = validateRequest(req.query, directoryQuery);
      const result = await this.employeeService.directory(
        requirePrincipal(req),
        { search: search || undefined, department: department || undefined, role },
        page
      );

      res.status(200).json({
        success: true,
        data: result
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/employees/search?q=
   */
  public quickSearch = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { q } = validateRequest(req.query, searchQuery);
      const results = await this.employeeService.quickSearch(requirePrincipal(req), q);

      res.status(200).json({
        success: true,
        data: results
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/employees/:id
   */
  public getEmployee = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = validateRequest(req.params, z.object({ id: zUuid }));
      const detail = await this.employeeService.detail(requirePrincipal(req), id);

      res.status(200).json({
        success: true,
        data: detail
      });
    } catch (error) {
      next(error);
    }
  };
}
