import { IProjectRepository } from '../database/repositories/project';
import { IUserRepository } from '../database/repositories/user';
import { Project, ProjectFields, ProjectMember, ProjectSummary, validateProject } from '../models/Project';
import { Principal } from '../models/User';
import { AccessGate, accessGate, Operation } from './AccessGate';
import { AuthorizationError, ConflictError, NotFoundError } from '../utils/errors';
import { Clock, systemClock, toCalendarDate } from '../utils/dates';
import { logger } from '../utils/logger';

export interface ProjectWithMembers extends Project {
  members: ProjectMember[];
}

export interface ProjectServiceDependencies {
  projects: IProjectRepository;
  users: IUserRepository;
  gate?: AccessGate;
  clock?: Clock;
}

export class ProjectService {
  private readonly projects: IProjectRepository;
  private readonly users: IUserRepository;
  private readonly gate: AccessGate;
  private readonly clock: Clock;

  constructor(deps: ProjectServiceDependencies) {
    this.projects = deps.projects;
    this.users = deps.users;
    this.gate = deps.gate ?? accessGate;
    this.clock = deps.clock ?? systemClock;
  }

  async list(): Promise<ProjectSummary[]> {
    return this.projects.findAll();
  }

  async get(projectId: string): Promise<ProjectWithMembers> {
    const project = await this.requireProject(projectId);
    const members = await this.projects.findMembers(projectId);
    return { ...project, members };
  }

  /**
   * A Manager always manages the projects they create; HR and Admin may
   * name any manager, or leave it to themselves.
   */
  async create(principal: Principal, input: unknown): Promise<Project> {
    this.gate.assert(principal, Operation.MANAGE_PROJECTS);
    const fields = validateProject(input);

    const managerId = this.gate.scopeOf(principal, Operation.MANAGE_PROJECTS) === 'any'
      ? fields.managerId ?? principal.id
      : principal.id;
    if (managerId !== principal.id) {
      await this.requireActiveUser(managerId, 'Manager');
    }

    const project = await this.projects.create({ ...fields, managerId });
    logger.info('Project created', { projectId: project.id, managerId, createdBy: principal.id });
    return project;
  }

  async update(principal: Principal, projectId: string, input: Partial<ProjectFields>): Promise<Project> {
    const current = await this.requireManagedProject(principal, projectId);
    const changes = Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));

    const fields = validateProject({
      name: current.name,
      description: current.description,
      managerId: current.managerId,
      startDate: current.startDate,
      endDate: current.endDate,
      status: current.status,
      ...changes
    });

    if (fields.managerId !== current.managerId) {
      // Handing a project over is an administrative act
      if (this.gate.scopeOf(principal, Operation.MANAGE_PROJECTS) !== 'any') {
        throw new AuthorizationError();
      }
      if (fields.managerId !== null) {
        await this.requireActiveUser(fields.managerId, 'Manager');
      }
    }

    const updated = await this.projects.update(projectId, fields);
    if (!updated) {
      throw new NotFoundError('Project');
    }

    logger.info('Project updated', { projectId, status: updated.status, updatedBy: principal.id });
    return updated;
  }

  async addMember(principal: Principal, projectId: string, employeeId: string, role: string): Promise<ProjectMember> {
    await this.requireManagedProject(principal, projectId);
    await this.requireActiveUser(employeeId, 'Employee');

    try {
      const member = await this.projects.addMember(projectId, employeeId, role, toCalendarDate(this.clock.now()));
      logger.info('Project member added', { projectId, employeeId, addedBy: principal.id });
      return member;
    } catch (error) {
      if (error instanceof ConflictError) {
        throw new ConflictError('Employee is already a member of this project', { projectId, employeeId });
      }
      throw error;
    }
  }

  async removeMember(principal: Principal, projectId: string, employeeId: string): Promise<void> {
    await this.requireManagedProject(principal, projectId);

    const removed = await this.projects.removeMember(projectId, employeeId);
    if (!removed) {
      throw new NotFoundError('Project member');
    }
    logger.info('Project member removed', { projectId, employeeId, removedBy: principal.id });
  }

  private async requireProject(projectId: string): Promise<Project> {
    const project = await this.projects.findById(projectId);
    if (!project) {
      throw new NotFoundError('Project');
    }
    return project;
  }

  // The project's manager is its owner for access purposes
  private async requireManagedProject(principal: Principal, projectId: string): Promise<Project> {
    this.gate.assert(principal, Operation.MANAGE_PROJECTS);
    const project = await this.requireProject(projectId);
    this.gate.assert(principal, Operation.MANAGE_PROJECTS, { ownerId: project.managerId ?? undefined });
    return project;
  }

  private async requireActiveUser(userId: string, label: string): Promise<void> {
    const user = await this.users.findById(userId);
    if (!user || !user.isActive) {
      throw new NotFoundError(label);
    }
  }
}
