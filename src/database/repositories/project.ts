import { v4 as uuidv4 } from 'uuid';
import { Queryable } from '../connection';
import {
  Project,
  ProjectFields,
  ProjectMember,
  ProjectSummary,
  PROJECT_STATUSES
} from '../../models/Project';
import { fullName } from '../../models/User';
import { CalendarDate } from '../../utils/dates';
import { BaseRepository, parseEnum } from './base';
import { ProjectMemberRow, ProjectRow, ProjectSummaryRow } from './types';

export interface IProjectRepository {
  findAll(): Promise<ProjectSummary[]>;
  findById(id: string, client?: Queryable): Promise<Project | null>;
  create(fields: ProjectFields, client?: Queryable): Promise<Project>;
  update(id: string, fields: Partial<ProjectFields>, client?: Queryable): Promise<Project | null>;
  findMembers(projectId: string): Promise<ProjectMember[]>;
  /** Fails with ConflictError when the employee is already a member. */
  addMember(projectId: string, employeeId: string, role: string, joinedOn: CalendarDate): Promise<ProjectMember>;
  removeMember(projectId: string, employeeId: string): Promise<boolean>;
}

const PROJECT_COLUMNS: ReadonlyArray<[keyof ProjectFields, string]> = [
  ['name', 'name'],
  ['description', 'description'],
  ['managerId', 'manager_id'],
  ['startDate', 'start_date'],
  ['endDate', 'end_date'],
  ['status', 'status']
];

const MEMBER_SELECT = `
  SELECT m.project_id, m.employee_id, m.role, m.joined_on, u.first_name, u.last_name, u.username
  FROM project_members m
  JOIN users u ON u.id = m.employee_id
`;

export class ProjectRepository extends BaseRepository implements IProjectRepository {
  constructor(db?: Queryable) {
    super(db);
  }

  async findAll(): Promise<ProjectSummary[]> {
    const result = await this.executeQuery<ProjectSummaryRow>(
      `SELECT p.*, COUNT(m.employee_id)::int AS member_count
       FROM projects p
       LEFT JOIN project_members m ON m.project_id = p.id
       GROUP BY p.id
       ORDER BY p.created_at DESC`
    );
    return result.rows.map(row => ({ ...this.mapRowToProject(row), memberCount: row.member_count }));
  }

  async findById(id: string, client?: Queryable): Promise<Project | null> {
    const result = await this.executeQuery<ProjectRow>('SELECT * FROM projects WHERE id = $1', [id], client);
    return result.rows.length > 0 ? this.mapRowToProject(result.rows[0]) : null;
  }

  async create(fields: ProjectFields, client?: Queryable): Promise<Project> {
    const result = await this.executeQuery<ProjectRow>(
      `INSERT INTO projects (id, name, description, manager_id, start_date, end_date, status)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING *`,
      [uuidv4(), fields.name, fields.description, fields.managerId, fields.startDate, fields.endDate, fields.status],
      client
    );
    return this.mapRowToProject(result.rows[0]);
  }

  async update(id: string, fields: Partial<ProjectFields>, client?: Queryable): Promise<Project | null> {
    const assignments: string[] = [];
    const params: unknown[] = [];
    for (const [key, column] of PROJECT_COLUMNS) {
      if (fields[key] !== undefined) {
        params.push(fields[key]);
        assignments.push(`${column} = $${params.length}`);
      }
    }

    if (assignments.length === 0) {
      return this.findById(id, client);
    }

    params.push(id);
    const result = await this.executeQuery<ProjectRow>(
      `UPDATE projects SET ${assignments.join(', ')}, updated_at = NOW()
       WHERE id = $${params.length}
       RETURNING *`,
      params,
      client
    );
    return result.rows.length > 0 ? this.mapRowToProject(result.rows[0]) : null;
  }

  async findMembers(projectId: string): Promise<ProjectMember[]> {
    const result = await this.executeQuery<ProjectMemberRow>(
      `${MEMBER_SELECT} WHERE m.project_id = $1 ORDER BY m.joined_on ASC, u.last_name ASC`,
      [projectId]
    );
    return result.rows.map(row => this.mapRowToMember(row));
  }

  async addMember(projectId: string, employeeId: string, role: string, joinedOn: CalendarDate): Promise<ProjectMember> {
    await this.executeQuery(
      `INSERT INTO project_members (project_id, employee_id, role, joined_on)
       VALUES ($1, $2, $3, $4)`,
      [projectId, employeeId, role, joinedOn]
    );
    const result = await this.executeQuery<ProjectMemberRow>(
      `${MEMBER_SELECT} WHERE m.project_id = $1 AND m.employee_id = $2`,
      [projectId, employeeId]
    );
    return this.mapRowToMember(result.rows[0]);
  }

  async removeMember(projectId: string, employeeId: string): Promise<boolean> {
    const result = await this.executeQuery(
      'DELETE FROM project_members WHERE project_id = $1 AND employee_id = $2',
      [projectId, employeeId]
    );
    return (result.rowCount ?? 0) > 0;
  }

  private mapRowToProject(row: ProjectRow): Project {
    return {
      id: row.id,
      name: row.name,
      description: row.description,
      managerId: row.manager_id,
      startDate: row.start_date,
      endDate: row.end_date,
      status: parseEnum(PROJECT_STATUSES, row.status, 'projects.status'),
      createdAt: row.created_at,
      updatedAt: row.updated_at
    };
  }

  private mapRowToMember(row: ProjectMemberRow): ProjectMember {
    return {
      projectId: row.project_id,
      employeeId: row.employee_id,
      employeeName: fullName({ firstName: row.first_name, lastName: row.last_name, username: row.username }),
      role: row.role,
      joinedOn: row.joined_on
    };
  }
}
