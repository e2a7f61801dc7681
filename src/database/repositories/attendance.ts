import { Queryable } from '../connection';
import { Attendance } from '../../models/attendance/Attendance';
import { CalendarDate } from '../../utils/dates';
import { BaseRepository } from './base';
import { AttendanceRow } from './types';

export interface AttendanceRange {
  from?: CalendarDate;
  to?: CalendarDate;
}

export interface IAttendanceRepository {
  findByEmployeeAndDate(employeeId: string, date: CalendarDate, client?: Queryable): Promise<Attendance | null>;
  /** Fails with ConflictError when the employee already has a row for the date. */
  create(record: Attendance, client?: Queryable): Promise<Attendance>;
  saveLogout(record: Attendance, client?: Queryable): Promise<Attendance>;
  findByEmployee(employeeId: string, range?: AttendanceRange): Promise<Attendance[]>;
  /** Rows for the date, limited to `employeeIds` when given. */
  findByDate(date: CalendarDate, employeeIds?: readonly string[]): Promise<Attendance[]>;
}

export class AttendanceRepository extends BaseRepository implements IAttendanceRepository {
  constructor(db?: Queryable) {
    super(db);
  }

  async findByEmployeeAndDate(employeeId: string, date: CalendarDate, client?: Queryable): Promise<Attendance | null> {
    const result = await this.executeQuery<AttendanceRow>(
      'SELECT * FROM attendance WHERE employee_id = $1 AND date = $2',
      [employeeId, date],
      client
    );
    return result.rows.length > 0 ? this.mapRowToAttendance(result.rows[0]) : null;
  }

  async create(record: Attendance, client?: Queryable): Promise<Attendance> {
    const result = await this.executeQuery<AttendanceRow>(
      `INSERT INTO attendance (id, employee_id, date, login_time, ip, device_info, location, risk_score)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING *`,
      [
        record.id,
        record.employeeId,
        record.date,
        record.loginTime,
        record.ip,
        record.deviceInfo,
        record.location,
        record.riskScore
      ],
      client
    );
    return this.mapRowToAttendance(result.rows[0]);
  }

  async saveLogout(record: Attendance, client?: Queryable): Promise<Attendance> {
    const result = await this.executeQuery<AttendanceRow>(
      'UPDATE attendance SET logout_time = $2 WHERE id = $1 RETURNING *',
      [record.id, record.logoutTime],
      client
    );
    return this.mapRowToAttendance(result.rows[0]);
  }

  async findByEmployee(employeeId: string, range: AttendanceRange = {}): Promise<Attendance[]> {
    const conditions = ['employee_id = $1'];
    const params: unknown[] = [employeeId];
    if (range.from) {
      params.push(range.from);
      conditions.push(`date >= $${params.length}`);
    }
    if (range.to) {
      params.push(range.to);
      conditions.push(`date <= $${params.length}`);
    }

    const result = await this.executeQuery<AttendanceRow>(
      `SELECT * FROM attendance WHERE ${conditions.join(' AND ')} ORDER BY date DESC`,
      params
    );
    return result.rows.map(row => this.mapRowToAttendance(row));
  }

  async findByDate(date: CalendarDate, employeeIds?: readonly string[]): Promise<Attendance[]> {
    const result = employeeIds
      ? await this.executeQuery<AttendanceRow>(
          'SELECT * FROM attendance WHERE date = $1 AND employee_id = ANY($2::uuid[]) ORDER BY login_time ASC',
          [date, [...employeeIds]]
        )
      : await this.executeQuery<AttendanceRow>(
          'SELECT * FROM attendance WHERE date = $1 ORDER BY login_time ASC',
          [date]
        );
    return result.rows.map(row => this.mapRowToAttendance(row));
  }

  private mapRowToAttendance(row: AttendanceRow): Attendance {
    return new Attendance({
      id: row.id,
      employeeId: row.employee_id,
      date: row.date,
      loginTime: row.login_time,
      logoutTime: row.logout_time,
      ip: row.ip,
      deviceInfo: row.device_info,
      location: row.location,
      riskScore: row.risk_score
    });
  }
}
