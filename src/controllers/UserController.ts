import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { UserAdminService } from '../services/UserAdminService';
import { requirePrincipal } from '../middleware/auth';
import { ROLES } from '../models/User';
import { validateRequest, zUuid } from '../utils/validation';

const idParams = z.object({ id: zUuid });

const roleSchema = z.object({
  role: z.enum(ROLES),
  isSuperuser: z.boolean().default(false)
});

const managerSchema = z.object({
  managerId: zUuid.nullable()
});

export class UserController {
  constructor(private readonly userAdminService: UserAdminService) {}

  /**
   * POST /api/users
   */
  public createUser = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const created = await this.userAdminService.createUser(requirePrincipal(req), req.body);

      res.status(201).json({
        success: true,
        message: 'User created successfully',
        data: created
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * PUT /api/users/:id/role
   */
  public assignRole = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = validateRequest(req.params, idParams);
      const { role, isSuperuser } = validateRequest(req.body, roleSchema);
      const user = await this.userAdminService.assignRole(requirePrincipal(req), id, role, isSuperuser);

      res.status(200).json({
        success: true,
        message: 'Role updated successfully',
        data: user
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * PUT /api/users/:id/manager
   */
  public assignManager = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = validateRequest(req.params, idParams);
      const { managerId } = validateRequest(req.body, managerSchema);
      const profile = await this.userAdminService.assignManager(requirePrincipal(req), id, managerId);

      res.status(200).json({
        success: true,
        message: 'Manager updated successfully',
        data: profile
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * DELETE /api/users/:id
   */
  public deactivateUser = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = validateRequest(req.params, idParams);
      const user = await this.userAdminService.deactivate(requirePrincipal(req), id);

      res.status(200).json({
        success: true,
        message: 'User deactivated successfully',
        data: user
      });
    } catch (error) {
      next(error);
    }
  };
}
