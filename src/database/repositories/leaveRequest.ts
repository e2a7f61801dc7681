import { Queryable } from '../connection';
import {
  LeaveRequest,
  LeaveStatus,
  LeaveType,
  LEAVE_STATUSES,
  LEAVE_TYPES
} from '../../models/leave/LeaveRequest';
import { CalendarDate } from '../../utils/dates';
import { BaseRepository, parseEnum } from './base';
import { LeaveRequestRow } from './types';

export interface LeaveRequestFilters {
  status?: LeaveStatus;
  year?: number;
}

export interface ILeaveRequestRepository {
  create(request: LeaveRequest, client?: Queryable): Promise<LeaveRequest>;
  findById(id: string, client?: Queryable): Promise<LeaveRequest | null>;
  /** Locks the request row until the surrounding transaction ends. */
  findByIdForUpdate(id: string, client: Queryable): Promise<LeaveRequest | null>;
  /** First request of the employee in one of `statuses` intersecting [from, to], both ends inclusive. */
  findFirstOverlapping(
    employeeId: string,
    fromDate: CalendarDate,
    toDate: CalendarDate,
    statuses: readonly LeaveStatus[],
    client?: Queryable
  ): Promise<LeaveRequest | null>;
  /** Days of Approved leave of the type whose start date falls in `year`. */
  sumApprovedDays(employeeId: string, leaveType: LeaveType, year: number, client?: Queryable): Promise<number>;
  findByEmployee(employeeId: string, filters?: LeaveRequestFilters): Promise<LeaveRequest[]>;
  /** Pending requests, restricted to the direct reports of `managerId` when one is given. */
  findPending(managerId?: string): Promise<LeaveRequest[]>;
  saveStatus(request: LeaveRequest, client?: Queryable): Promise<LeaveRequest>;
}

export class LeaveRequestRepository extends BaseRepository implements ILeaveRequestRepository {
  constructor(db?: Queryable) {
    super(db);
  }

  async create(request: LeaveRequest, client?: Queryable): Promise<LeaveRequest> {
    const result = await this.executeQuery<LeaveRequestRow>(
      `INSERT INTO leave_requests (
         id, employee_id, leave_type, from_date, to_date, reason, status, applied_on, updated_at
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $8)
       RETURNING *`,
      [
        request.id,
        request.employeeId,
        request.leaveType,
        request.fromDate,
        request.toDate,
        request.reason,
        request.status,
        request.appliedOn
      ],
      client
    );
    return this.mapRowToLeaveRequest(result.rows[0]);
  }

  async findById(id: string, client?: Queryable): Promise<LeaveRequest | null> {
    const result = await this.executeQuery<LeaveRequestRow>(
      'SELECT * FROM leave_requests WHERE id = $1',
      [id],
      client
    );
    return result.rows.length > 0 ? this.mapRowToLeaveRequest(result.rows[0]) : null;
  }

  async findByIdForUpdate(id: string, client: Queryable): Promise<LeaveRequest | null> {
    const result = await this.executeQuery<LeaveRequestRow>(
      'SELECT * FROM leave_requests WHERE id = $1 FOR UPDATE',
      [id],
      client
    );
    return result.rows.length > 0 ? this.mapRowToLeaveRequest(result.rows[0]) : null;
  }

  async findFirstOverlapping(
    employeeId: string,
    fromDate: CalendarDate,
    toDate: CalendarDate,
    statuses: readonly LeaveStatus[],
    client?: Queryable
  ): Promise<LeaveRequest | null> {
    const result = await this.executeQuery<LeaveRequestRow>(
      `SELECT * FROM leave_requests
       WHERE employee_id = $1
         AND status = ANY($2::text[])
         AND from_date <= $3
         AND to_date >= $4
       ORDER BY from_date ASC
       LIMIT 1`,
      [employeeId, [...statuses], toDate, fromDate],
      client
    );
    return result.rows.length > 0 ? this.mapRowToLeaveRequest(result.rows[0]) : null;
  }

  async sumApprovedDays(employeeId: string, leaveType: LeaveType, year: number, client?: Queryable): Promise<number> {
    const result = await this.executeQuery<{ used_days: number }>(
      `SELECT COALESCE(SUM(to_date - from_date + 1), 0)::int AS used_days
       FROM leave_requests
       WHERE employee_id = $1
         AND leave_type = $2
         AND status = 'APPROVED'
         AND EXTRACT(YEAR FROM from_date) = $3`,
      [employeeId, leaveType, year],
      client
    );
    return result.rows[0]?.used_days ?? 0;
  }

  async findByEmployee(employeeId: string, filters: LeaveRequestFilters = {}): Promise<LeaveRequest[]> {
    const conditions = ['employee_id = $1'];
    const params: unknown[] = [employeeId];

    if (filters.status) {
      params.push(filters.status);
      conditions.push(`status = $${params.length}`);
    }
    if (filters.year !== undefined) {
      params.push(filters.year);
      conditions.push(`EXTRACT(YEAR FROM from_date) = $${params.length}`);
    }

    const result = await this.executeQuery<LeaveRequestRow>(
      `SELECT * FROM leave_requests
       WHERE ${conditions.join(' AND ')}
       ORDER BY applied_on DESC`,
      params
    );
    return result.rows.map(row => this.mapRowToLeaveRequest(row));
  }

  async findPending(managerId?: string): Promise<LeaveRequest[]> {
    const result = managerId
      ? await this.executeQuery<LeaveRequestRow>(
          `SELECT lr.* FROM leave_requests lr
           JOIN employee_profiles p ON p.user_id = lr.employee_id
           WHERE lr.status = 'PENDING' AND p.manager_id = $1
           ORDER BY lr.applied_on ASC`,
          [managerId]
        )
      : await this.executeQuery<LeaveRequestRow>(
          `SELECT * FROM leave_requests
           WHERE status = 'PENDING'
           ORDER BY applied_on ASC`
        );
    return result.rows.map(row => this.mapRowToLeaveRequest(row));
  }

  async saveStatus(request: LeaveRequest, client?: Queryable): Promise<LeaveRequest> {
    const result = await this.executeQuery<LeaveRequestRow>(
      `UPDATE leave_requests
       SET status = $2, approver_id = $3, decided_on = $4, rejection_reason = $5, updated_at = $6
       WHERE id = $1
       RETURNING *`,
      [
        request.id,
        request.status,
        request.approverId,
        request.decidedOn,
        request.rejectionReason,
        request.updatedAt
      ],
      client
    );
    return this.mapRowToLeaveRequest(result.rows[0]);
  }

  private mapRowToLeaveRequest(row: LeaveRequestRow): LeaveRequest {
    return new LeaveRequest({
      id: row.id,
      employeeId: row.employee_id,
      leaveType: parseEnum(LEAVE_TYPES, row.leave_type, 'leave_requests.leave_type'),
      fromDate: row.from_date,
      toDate: row.to_date,
      reason: row.reason,
      status: parseEnum(LEAVE_STATUSES, row.status, 'leave_requests.status'),
      approverId: row.approver_id,
      appliedOn: row.applied_on,
      decidedOn: row.decided_on,
      rejectionReason: row.rejection_reason,
      updatedAt: row.updated_at
    });
  }
}
