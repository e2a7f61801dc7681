import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AuthService } from '../services/AuthService';
import { EmployeeService } from '../services/EmployeeService';
import { requirePrincipal } from '../middleware/auth';
import { validateRequest } from '../utils/validation';

const loginSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1)
});

export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly employeeService: EmployeeService
  ) {}

  /**
   * POST /api/auth/login
   */
  public login = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { username, password } = validateRequest(req.body, loginSchema);
      const result = await this.authService.login(username, password);

      res.status(200).json({
        success: true,
        message: 'Login successful',
        data: result
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/auth/me
   * The signed-in user with role flags, for the dashboard.
   */
  public me = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const principal = requirePrincipal(req);
      const { user } = await this.employeeService.getOwnProfile(principal);

      res.status(200).json({
        success: true,
        data: { user, managerId: principal.managerId }
      });
    } catch (error) {
      next(error);
    }
  };
}
