import { v4 as uuidv4 } from 'uuid';
import { Queryable } from '../connection';
import { Role, ROLES, User, UserWithCredentials, fullName, ROLE_LABELS } from '../../models/User';
import { CalendarDate } from '../../utils/dates';
import { BaseRepository, PaginatedResult, PaginationOptions, parseEnum } from './base';
import { CountRow, DirectoryRow, UserRow } from './types';

export interface CreateUserInput {
  username: string;
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  role: Role;
  isSuperuser: boolean;
  employeeCode: string | null;
  phoneNumber: string | null;
  department: string | null;
  hireDate: CalendarDate | null;
}

export interface UpdateAccountInput {
  firstName?: string;
  lastName?: string;
  email?: string;
  phoneNumber?: string | null;
}

export interface DirectoryFilters {
  search?: string;
  department?: string;
  role?: Role;
}

export interface DirectoryEntry {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  fullName: string;
  role: Role;
  roleLabel: string;
  employeeCode: string | null;
  department: string | null;
  designation: string | null;
  phoneNumber: string | null;
  managerId: string | null;
}

export interface IUserRepository {
  create(data: CreateUserInput, client?: Queryable): Promise<User>;
  findById(id: string, client?: Queryable): Promise<User | null>;
  findByUsername(username: string, client?: Queryable): Promise<UserWithCredentials | null>;
  updateAccount(id: string, data: UpdateAccountInput, client?: Queryable): Promise<User | null>;
  updateRole(id: string, role: Role, isSuperuser: boolean, client?: Queryable): Promise<User | null>;
  deactivate(id: string, client?: Queryable): Promise<User | null>;
  searchDirectory(filters: DirectoryFilters, pagination: PaginationOptions): Promise<PaginatedResult<DirectoryEntry>>;
  quickSearch(term: string, limit: number): Promise<DirectoryEntry[]>;
  listDepartments(): Promise<string[]>;
}

const USER_COLUMNS = `
  u.id, u.username, u.email, u.password_hash, u.first_name, u.last_name, u.role,
  u.is_superuser, u.employee_code, u.phone_number, u.department, u.hire_date,
  u.is_active, u.created_at, u.updated_at
`;

const DIRECTORY_FROM = `
  FROM users u
  LEFT JOIN employee_profiles p ON p.user_id = u.id
`;

const ACCOUNT_COLUMNS: ReadonlyArray<[keyof UpdateAccountInput, string]> = [
  ['firstName', 'first_name'],
  ['lastName', 'last_name'],
  ['email', 'email'],
  ['phoneNumber', 'phone_number']
];

const escapeLike = (term: string): string => term.replace(/[\\%_]/g, match => `\\${match}`);

export class UserRepository extends BaseRepository implements IUserRepository {
  constructor(db?: Queryable) {
    super(db);
  }

  async create(data: CreateUserInput, client?: Queryable): Promise<User> {
    const query = `
      INSERT INTO users (
        id, username, email, password_hash, first_name, last_name, role, is_superuser,
        employee_code, phone_number, department, hire_date
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
      RETURNING *
    `;

    const result = await this.executeQuery<UserRow>(query, [
      uuidv4(),
      data.username,
      data.email,
      data.passwordHash,
      data.firstName,
      data.lastName,
      data.role,
      data.isSuperuser,
      data.employeeCode,
      data.phoneNumber,
      data.department,
      data.hireDate
    ], client);

    return this.mapRowToUser(result.rows[0]);
  }

  async findById(id: string, client?: Queryable): Promise<User | null> {
    const result = await this.executeQuery<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users u WHERE u.id = $1`,
      [id],
      client
    );
    return result.rows.length > 0 ? this.mapRowToUser(result.rows[0]) : null;
  }

  async findByUsername(username: string, client?: Queryable): Promise<UserWithCredentials | null> {
    const result = await this.executeQuery<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users u WHERE lower(u.username) = lower($1)`,
      [username],
      client
    );
    if (result.rows.length === 0) {
      return null;
    }
    const row = result.rows[0];
    return { ...this.mapRowToUser(row), passwordHash: row.password_hash };
  }

  async updateAccount(id: string, data: UpdateAccountInput, client?: Queryable): Promise<User | null> {
    const assignments: string[] = [];
    const params: unknown[] = [];
    for (const [key, column] of ACCOUNT_COLUMNS) {
      if (data[key] !== undefined) {
        params.push(data[key]);
        assignments.push(`${column} = $${params.length}`);
      }
    }

    if (assignments.length === 0) {
      return this.findById(id, client);
    }

    params.push(id);
    const result = await this.executeQuery<UserRow>(
      `UPDATE users SET ${assignments.join(', ')}, updated_at = NOW()
       WHERE id = $${params.length}
       RETURNING *`,
      params,
      client
    );
    return result.rows.length > 0 ? this.mapRowToUser(result.rows[0]) : null;
  }

  async updateRole(id: string, role: Role, isSuperuser: boolean, client?: Queryable): Promise<User | null> {
    const result = await this.executeQuery<UserRow>(
      `UPDATE users SET role = $2, is_superuser = $3, updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [id, role, isSuperuser],
      client
    );
    return result.rows.length > 0 ? this.mapRowToUser(result.rows[0]) : null;
  }

  async deactivate(id: string, client?: Queryable): Promise<User | null> {
    const result = await this.executeQuery<UserRow>(
      `UPDATE users SET is_active = false, updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [id],
      client
    );
    return result.rows.length > 0 ? this.mapRowToUser(result.rows[0]) : null;
  }

  /**
   * Active users matching the directory filters, ordered by last then first name
   */
  async searchDirectory(
    filters: DirectoryFilters,
    pagination: PaginationOptions
  ): Promise<PaginatedResult<DirectoryEntry>> {
    const conditions = ['u.is_active = true'];
    const params: unknown[] = [];

    if (filters.search) {
      params.push(`%${escapeLike(filters.search)}%`);
      const p = `$${params.length}`;
      conditions.push(`(
        u.first_name ILIKE ${p} OR u.last_name ILIKE ${p} OR u.username ILIKE ${p}
        OR u.email ILIKE ${p} OR u.employee_code ILIKE ${p}
        OR u.department ILIKE ${p} OR p.designation ILIKE ${p}
      )`);
    }
    if (filters.department) {
      params.push(`%${escapeLike(filters.department)}%`);
      conditions.push(`u.department ILIKE $${params.length}`);
    }
    if (filters.role) {
      params.push(filters.role);
      conditions.push(`u.role = $${params.length}`);
    }

    const whereClause = `WHERE ${conditions.join(' AND ')}`;
    const { limitClause, limit, page } = this.buildPaginationClause(pagination);

    const [countResult, dataResult] = await Promise.all([
      this.executeQuery<CountRow>(`SELECT COUNT(*)::int AS total ${DIRECTORY_FROM} ${whereClause}`, params),
      this.executeQuery<DirectoryRow>(
        `SELECT ${USER_COLUMNS}, p.designation, p.manager_id
         ${DIRECTORY_FROM}
         ${whereClause}
         ORDER BY u.last_name ASC, u.first_name ASC
         ${limitClause}`,
        params
      )
    ]);

    const total = countResult.rows[0]?.total ?? 0;
    return {
      data: dataResult.rows.map(row => this.mapRowToDirectoryEntry(row)),
      pagination: this.calculatePaginationMeta<DirectoryEntry>(total, page, limit)
    };
  }

  async quickSearch(term: string, limit: number): Promise<DirectoryEntry[]> {
    const result = await this.executeQuery<DirectoryRow>(
      `SELECT ${USER_COLUMNS}, p.designation, p.manager_id
       ${DIRECTORY_FROM}
       WHERE u.is_active = true AND (
         u.first_name ILIKE $1 OR u.last_name ILIKE $1
         OR u.username ILIKE $1 OR u.employee_code ILIKE $1
       )
       ORDER BY u.last_name ASC, u.first_name ASC
       LIMIT $2`,
      [`%${escapeLike(term)}%`, limit]
    );
    return result.rows.map(row => this.mapRowToDirectoryEntry(row));
  }

  async listDepartments(): Promise<string[]> {
    const result = await this.executeQuery<{ department: string }>(
      `SELECT DISTINCT department FROM users
       WHERE is_active = true AND department IS NOT NULL AND department <> ''
       ORDER BY department`
    );
    return result.rows.map(row => row.department);
  }

  private mapRowToUser(row: UserRow): User {
    return {
      id: row.id,
      username: row.username,
      email: row.email,
      firstName: row.first_name,
      lastName: row.last_name,
      role: parseEnum(ROLES, row.role, 'users.role'),
      isSuperuser: row.is_superuser,
      employeeCode: row.employee_code,
      phoneNumber: row.phone_number,
      department: row.department,
      hireDate: row.hire_date,
      isActive: row.is_active,
      createdAt: row.created_at,
      updatedAt: row.updated_at
    };
  }

  private mapRowToDirectoryEntry(row: DirectoryRow): DirectoryEntry {
    const user = this.mapRowToUser(row);
    return {
      id: user.id,
      username: user.username,
      email: user.email,
      firstName: user.firstName,
      lastName: user.lastName,
      fullName: fullName(user),
      role: user.role,
      roleLabel: ROLE_LABELS[user.role],
      employeeCode: user.employeeCode,
      department: user.department,
      designation: row.designation,
      phoneNumber: user.phoneNumber,
      managerId: row.manager_id
    };
  }
}
