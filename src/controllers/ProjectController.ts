import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ProjectService } from '../services/ProjectService';
import { requirePrincipal } from '../middleware/auth';
import { PROJECT_STATUSES } from '../models/Project';
import { validateRequest, zCalendarDate, zUuid } from '../utils/validation';

const idParams = z.object({ id: zUuid });
const memberParams = z.object({ id: zUuid, employeeId: zUuid });

const updateSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  managerId: zUuid.nullable().optional(),
  startDate: zCalendarDate.optional(),
  endDate: zCalendarDate.nullable().optional(),
  status: z.enum(PROJECT_STATUSES).optional()
});

const memberSchema = z.object({
  employeeId: zUuid,
  role: z.string().trim().max(100).default('')
});

export class ProjectController {
  constructor(private readonly projectService: ProjectService) {}

  /**
   * GET /api/projects
   */
  public list = async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const projects = await this.projectService.list();

      res.status(200).json({
        success: true,
        data: projects
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/projects/:id
   */
  public get = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = validateRequest(req.params, idParams);
      const project = await this.projectService.get(id);

      res.status(200).json({
        success: true,
        data: project
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/projects
   */
  public create = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const project = await this.projectService.create(requirePrincipal(req), req.body);

      res.status(201).json({
        success: true,
        message: 'Project created successfully',
        data: project
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * PUT /api/projects/:id
   */
  public update = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = validateRequest(req.params, idParams);
      const fields = validateRequest(req.body, updateSchema);
      const project = await this.projectService.update(requirePrincipal(req), id, fields);

      res.status(200).json({
        success: true,
        message: 'Project updated successfully',
        data: project
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/projects/:id/members
   */
  public addMember = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = validateRequest(req.params, idParams);
      const { employeeId, role } = validateRequest(req.body, memberSchema);
      const member = await this.projectService.addMember(requirePrincipal(req), id, employeeId, role);

      res.status(201).json({
        success: true,
        message: 'Member added successfully',
        data: member
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * DELETE /api/projects/:id/members/:employeeId
   */
  public removeMember = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id, employeeId } = validateRequest(req.params, memberParams);
      await this.projectService.removeMember(requirePrincipal(req), id, employeeId);

      res.status(200).json({
        success: true,
        message: 'Member removed successfully'
      });
    } catch (error) {
      next(error);
    }
  };
}
