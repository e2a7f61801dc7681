import { AttendanceRange, IAttendanceRepository } from '../database/repositories/attendance';
import { IEmployeeProfileRepository } from '../database/repositories/employeeProfile';
import { Attendance, AttendanceDay, describeAttendanceDay } from '../models/attendance/Attendance';
import { Principal } from '../models/User';
import { AccessGate, accessGate, Operation } from './AccessGate';
import { AuthorizationError, ConflictError, StateConflictError } from '../utils/errors';
import { CalendarDate, Clock, systemClock, toCalendarDate } from '../utils/dates';
import { logger } from '../utils/logger';

export interface ClockInContext {
  ip?: string | null;
  deviceInfo?: string | null;
  location?: string | null;
}

export interface AttendanceServiceDependencies {
  attendance: IAttendanceRepository;
  profiles: IEmployeeProfileRepository;
  gate?: AccessGate;
  clock?: Clock;
}

/**
 * Daily clock-in/clock-out. One row per employee per calendar date.
 */
export class AttendanceService {
  private readonly attendance: IAttendanceRepository;
  private readonly profiles: IEmployeeProfileRepository;
  private readonly gate: AccessGate;
  private readonly clock: Clock;

  constructor(deps: AttendanceServiceDependencies) {
    this.attendance = deps.attendance;
    this.profiles = deps.profiles;
    this.gate = deps.gate ?? accessGate;
    this.clock = deps.clock ?? systemClock;
  }

  async clockIn(principal: Principal, context: ClockInContext = {}): Promise<Attendance> {
    this.gate.assert(principal, Operation.CLOCK_ATTENDANCE, { ownerId: principal.id });

    const now = this.clock.now();
    const date = toCalendarDate(now);
    const existing = await this.attendance.findByEmployeeAndDate(principal.id, date);
    if (existing) {
      throw new StateConflictError('Already clocked in today', { attendance: existing.toJSON() });
    }

    let record: Attendance;
    try {
      record = await this.attendance.create(new Attendance({
        employeeId: principal.id,
        date,
        loginTime: now,
        ip: context.ip,
        deviceInfo: context.deviceInfo,
        location: context.location
      }));
    } catch (error) {
      // A concurrent clock-in won the unique (employee, date) slot
      if (error instanceof ConflictError) {
        throw new StateConflictError('Already clocked in today');
      }
      throw error;
    }

    logger.info('Clocked in', { employeeId: principal.id, date, attendanceId: record.id });
    return record;
  }

  async clockOut(principal: Principal): Promise<Attendance> {
    this.gate.assert(principal, Operation.CLOCK_ATTENDANCE, { ownerId: principal.id });

    const now = this.clock.now();
    const date = toCalendarDate(now);
    const existing = await this.attendance.findByEmployeeAndDate(principal.id, date);
    if (!existing) {
      throw new StateConflictError('Not clocked in today');
    }

    const record = await this.attendance.saveLogout(existing.clockOut(now));

    logger.info('Clocked out', { employeeId: principal.id, date, workingHours: record.workingHours });
    return record;
  }

  async status(principal: Principal): Promise<AttendanceDay> {
    this.gate.assert(principal, Operation.VIEW_OWN_ATTENDANCE, { ownerId: principal.id });

    const now = this.clock.now();
    const date = toCalendarDate(now);
    const record = await this.attendance.findByEmployeeAndDate(principal.id, date);
    return describeAttendanceDay(date, record, now);
  }

  async history(principal: Principal, range: AttendanceRange = {}): Promise<Attendance[]> {
    this.gate.assert(principal, Operation.VIEW_OWN_ATTENDANCE, { ownerId: principal.id });
    return this.attendance.findByEmployee(principal.id, range);
  }

  /**
   * Rows for one date: everyone's for HR and Admin, direct reports' for a Manager.
   */
  async team(principal: Principal, date?: CalendarDate): Promise<Attendance[]> {
    const day = date ?? toCalendarDate(this.clock.now());
    const scope = this.gate.scopeOf(principal, Operation.VIEW_TEAM_ATTENDANCE);

    if (scope === null) {
      throw new AuthorizationError();
    }
    if (scope === 'any') {
      return this.attendance.findByDate(day);
    }
    if (scope === 'direct-report') {
      const reports = await this.profiles.findDirectReportIds(principal.id);
      return reports.length > 0 ? this.attendance.findByDate(day, reports) : [];
    }
    return this.attendance.findByDate(day, [principal.id]);
  }
}
