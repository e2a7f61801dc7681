import { Queryable } from '../connection';
import {
  EmployeeProfile,
  EMPLOYMENT_STATUSES,
  GENDERS,
  MARITAL_STATUSES,
  PersonalDetails
} from '../../models/EmployeeProfile';
import { BalanceTrackedLeaveType } from '../../models/leave/LeaveRequest';
import { CalendarDate } from '../../utils/dates';
import { NotFoundError } from '../../utils/errors';
import { BaseRepository, parseEnum } from './base';
import { EmployeeProfileRow } from './types';

export interface CreateProfileInput {
  managerId: string | null;
  department: string | null;
  designation: string | null;
  dateOfJoining: CalendarDate | null;
}

export interface IEmployeeProfileRepository {
  create(userId: string, data: CreateProfileInput, client?: Queryable): Promise<EmployeeProfile>;
  findByUserId(userId: string, client?: Queryable): Promise<EmployeeProfile | null>;
  /** Locks the profile row until the surrounding transaction ends. */
  lockForUpdate(userId: string, client: Queryable): Promise<EmployeeProfile | null>;
  /** Serialises manager reassignments until the surrounding transaction ends. */
  lockReportingLines(client: Queryable): Promise<void>;
  findManagerId(userId: string, client?: Queryable): Promise<string | null>;
  findDirectReportIds(managerId: string, client?: Queryable): Promise<string[]>;
  updatePersonalDetails(userId: string, details: Partial<PersonalDetails>, client?: Queryable): Promise<EmployeeProfile | null>;
  setManager(userId: string, managerId: string | null, client?: Queryable): Promise<EmployeeProfile | null>;
  /** Adds `delta` to the counter for the leave type and returns the new value. */
  adjustBalance(userId: string, leaveType: BalanceTrackedLeaveType, delta: number, client: Queryable): Promise<number>;
}

const PERSONAL_COLUMNS: ReadonlyArray<[keyof PersonalDetails, string]> = [
  ['dateOfBirth', 'date_of_birth'],
  ['gender', 'gender'],
  ['maritalStatus', 'marital_status'],
  ['nationality', 'nationality'],
  ['personalEmail', 'personal_email'],
  ['emergencyContactName', 'emergency_contact_name'],
  ['emergencyContactPhone', 'emergency_contact_phone'],
  ['emergencyContactRelation', 'emergency_contact_relation'],
  ['addressLine1', 'address_line1'],
  ['addressLine2', 'address_line2'],
  ['city', 'city'],
  ['state', 'state'],
  ['postalCode', 'postal_code'],
  ['country', 'country']
];

// Fixed map, never built from input
const BALANCE_COLUMNS: Record<BalanceTrackedLeaveType, string> = {
  ANNUAL: 'annual_leaves',
  SICK: 'sick_leaves',
  MATERNITY: 'maternity_leaves',
  PATERNITY: 'paternity_leaves',
  EMERGENCY: 'emergency_leaves',
  COMPENSATORY: 'compensatory_leaves'
};

// Advisory lock key held by every manager reassignment
export const REPORTING_LINES_LOCK_KEY = 48151623;

const nullableEnum = <T extends string>(allowed: readonly T[], value: string | null, column: string): T | null =>
  value === null ? null : parseEnum(allowed, value, column);

export class EmployeeProfileRepository extends BaseRepository implements IEmployeeProfileRepository {
  constructor(db?: Queryable) {
    super(db);
  }

  async create(userId: string, data: CreateProfileInput, client?: Queryable): Promise<EmployeeProfile> {
    const result = await this.executeQuery<EmployeeProfileRow>(
      `INSERT INTO employee_profiles (user_id, manager_id, department, designation, date_of_joining)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING *`,
      [userId, data.managerId, data.department, data.designation, data.dateOfJoining],
      client
    );
    return this.mapRowToProfile(result.rows[0]);
  }

  async findByUserId(userId: string, client?: Queryable): Promise<EmployeeProfile | null> {
    const result = await this.executeQuery<EmployeeProfileRow>(
      'SELECT * FROM employee_profiles WHERE user_id = $1',
      [userId],
      client
    );
    return result.rows.length > 0 ? this.mapRowToProfile(result.rows[0]) : null;
  }

  async lockForUpdate(userId: string, client: Queryable): Promise<EmployeeProfile | null> {
    const result = await this.executeQuery<EmployeeProfileRow>(
      'SELECT * FROM employee_profiles WHERE user_id = $1 FOR UPDATE',
      [userId],
      client
    );
    return result.rows.length > 0 ? this.mapRowToProfile(result.rows[0]) : null;
  }

  async lockReportingLines(client: Queryable): Promise<void> {
    await this.executeQuery('SELECT pg_advisory_xact_lock($1)', [REPORTING_LINES_LOCK_KEY], client);
  }

  async findManagerId(userId: string, client?: Queryable): Promise<string | null> {
    const result = await this.executeQuery<{ manager_id: string | null }>(
      'SELECT manager_id FROM employee_profiles WHERE user_id = $1',
      [userId],
      client
    );
    return result.rows[0]?.manager_id ?? null;
  }

  async findDirectReportIds(managerId: string, client?: Queryable): Promise<string[]> {
    const result = await this.executeQuery<{ user_id: string }>(
      `SELECT p.user_id FROM employee_profiles p
       JOIN users u ON u.id = p.user_id
       WHERE p.manager_id = $1 AND u.is_active = true`,
      [managerId],
      client
    );
    return result.rows.map(row => row.user_id);
  }

  async updatePersonalDetails(
    userId: string,
    details: Partial<PersonalDetails>,
    client?: Queryable
  ): Promise<EmployeeProfile | null> {
    const assignments: string[] = [];
    const params: unknown[] = [];
    for (const [field, column] of PERSONAL_COLUMNS) {
      if (details[field] !== undefined) {
        params.push(details[field]);
        assignments.push(`${column} = $${params.length}`);
      }
    }

    if (assignments.length === 0) {
      return this.findByUserId(userId, client);
    }

    params.push(userId);
    const result = await this.executeQuery<EmployeeProfileRow>(
      `UPDATE employee_profiles SET ${assignments.join(', ')}, updated_at = NOW()
       WHERE user_id = $${params.length}
       RETURNING *`,
      params,
      client
    );
    return result.rows.length > 0 ? this.mapRowToProfile(result.rows[0]) : null;
  }

  async setManager(userId: string, managerId: string | null, client?: Queryable): Promise<EmployeeProfile | null> {
    const result = await this.executeQuery<EmployeeProfileRow>(
      `UPDATE employee_profiles SET manager_id = $2, updated_at = NOW()
       WHERE user_id = $1
       RETURNING *`,
      [userId, managerId],
      client
    );
    return result.rows.length > 0 ? this.mapRowToProfile(result.rows[0]) : null;
  }

  async adjustBalance(
    userId: string,
    leaveType: BalanceTrackedLeaveType,
    delta: number,
    client: Queryable
  ): Promise<number> {
    const column = BALANCE_COLUMNS[leaveType];
    const result = await this.executeQuery<{ balance: number }>(
      `UPDATE employee_profiles SET ${column} = ${column} + $2, updated_at = NOW()
       WHERE user_id = $1
       RETURNING ${column} AS balance`,
      [userId, delta],
      client
    );
    if (result.rows.length === 0) {
      throw new NotFoundError('Employee profile');
    }
    return result.rows[0].balance;
  }

  private mapRowToProfile(row: EmployeeProfileRow): EmployeeProfile {
    return {
      userId: row.user_id,
      dateOfBirth: row.date_of_birth,
      gender: nullableEnum(GENDERS, row.gender, 'employee_profiles.gender'),
      maritalStatus: nullableEnum(MARITAL_STATUSES, row.marital_status, 'employee_profiles.marital_status'),
      nationality: row.nationality,
      personalEmail: row.personal_email,
      emergencyContactName: row.emergency_contact_name,
      emergencyContactPhone: row.emergency_contact_phone,
      emergencyContactRelation: row.emergency_contact_relation,
      addressLine1: row.address_line1,
      addressLine2: row.address_line2,
      city: row.city,
      state: row.state,
      postalCode: row.postal_code,
      country: row.country,
      designation: row.designation,
      department: row.department,
      dateOfJoining: row.date_of_joining,
      employmentStatus: parseEnum(EMPLOYMENT_STATUSES, row.employment_status, 'employee_profiles.employment_status'),
      managerId: row.manager_id,
      location: row.location,
      salary: row.salary === null ? null : Number(row.salary),
      salaryCurrency: row.salary_currency,
      annualLeaves: row.annual_leaves,
      sickLeaves: row.sick_leaves,
      maternityLeaves: row.maternity_leaves,
      paternityLeaves: row.paternity_leaves,
      emergencyLeaves: row.emergency_leaves,
      compensatoryLeaves: row.compensatory_leaves,
      createdAt: row.created_at,
      updatedAt: row.updated_at
    };
  }
}
