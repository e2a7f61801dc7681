import { v4 as uuidv4 } from 'uuid';
import { StateConflictError } from '../../utils/errors';
import { CalendarDate, hoursBetween } from '../../utils/dates';

export type AttendanceStatus = 'Not clocked in' | 'Clocked in' | 'Completed';

export interface AttendanceData {
  id?: string;
  employeeId: string;
  date: CalendarDate;
  loginTime: Date;
  logoutTime?: Date | null;
  ip?: string | null;
  deviceInfo?: string | null;
  location?: string | null;
  riskScore?: number;
}

export class Attendance {
  public readonly id: string;
  public readonly employeeId: string;
  public readonly date: CalendarDate;
  public readonly loginTime: Date;
  public readonly logoutTime: Date | null;
  public readonly ip: string | null;
  public readonly deviceInfo: string | null;
  public readonly location: string | null;
  public readonly riskScore: number;

  constructor(data: AttendanceData) {
    this.id = data.id || uuidv4();
    this.employeeId = data.employeeId;
    this.date = data.date;
    this.loginTime = data.loginTime;
    this.logoutTime = data.logoutTime ?? null;
    this.ip = data.ip ?? null;
    this.deviceInfo = data.deviceInfo ?? null;
    this.location = data.location ?? null;
    this.riskScore = data.riskScore ?? 0;
  }

  public get isClockedIn(): boolean {
    return this.logoutTime === null;
  }

  public get status(): AttendanceStatus {
    return this.isClockedIn ? 'Clocked in' : 'Completed';
  }

  public get workingHours(): number | null {
    return this.logoutTime ? hoursBetween(this.loginTime, this.logoutTime) : null;
  }

  public currentWorkingHours(now: Date): number {
    return hoursBetween(this.loginTime, this.logoutTime ?? now);
  }

  public clockOut(at: Date): Attendance {
    if (!this.isClockedIn) {
      throw new StateConflictError('Already clocked out today');
    }
    return new Attendance({ ...this.toData(), logoutTime: at });
  }

  public toData(): AttendanceData {
    return {
      id: this.id,
      employeeId: this.employeeId,
      date: this.date,
      loginTime: this.loginTime,
      logoutTime: this.logoutTime,
      ip: this.ip,
      deviceInfo: this.deviceInfo,
      location: this.location,
      riskScore: this.riskScore
    };
  }

  public toJSON() {
    return {
      ...this.toData(),
      status: this.status,
      workingHours: this.workingHours
    };
  }
}

export interface AttendanceDay {
  date: CalendarDate;
  status: AttendanceStatus;
  loginTime: Date | null;
  logoutTime: Date | null;
  workingHours: number | null;
  currentWorkingHours: number | null;
}

export function describeAttendanceDay(date: CalendarDate, record: Attendance | null, now: Date): AttendanceDay {
  if (!record) {
    return {
      date,
      status: 'Not clocked in',
      loginTime: null,
      logoutTime: null,
      workingHours: null,
      currentWorkingHours: null
    };
  }
  return {
    date,
    status: record.status,
    loginTime: record.loginTime,
    logoutTime: record.logoutTime,
    workingHours: record.workingHours,
    currentWorkingHours: record.isClockedIn ? record.currentWorkingHours(now) : null
  };
}
