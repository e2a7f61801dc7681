import Joi from 'joi';
import { v4 as uuidv4 } from 'uuid';
import { StateConflictError, ValidationError } from '../../utils/errors';
import { CalendarDate, inclusiveDays, yearOf } from '../../utils/dates';
import { validateAndThrow, uuidSchema, calendarDateSchema } from '../../utils/validation';

export const LEAVE_TYPES = [
  'ANNUAL',
  'SICK',
  'MATERNITY',
  'PATERNITY',
  'EMERGENCY',
  'UNPAID',
  'COMPENSATORY',
  'OTHER'
] as const;
export type LeaveType = typeof LEAVE_TYPES[number];

export const LEAVE_TYPE_LABELS: Record<LeaveType, string> = {
  ANNUAL: 'Annual Leave',
  SICK: 'Sick Leave',
  MATERNITY: 'Maternity Leave',
  PATERNITY: 'Paternity Leave',
  EMERGENCY: 'Emergency Leave',
  UNPAID: 'Unpaid Leave',
  COMPENSATORY: 'Compensatory Leave',
  OTHER: 'Other'
};

// Unpaid and Other draw on no counter
export const BALANCE_TRACKED_LEAVE_TYPES = [
  'ANNUAL',
  'SICK',
  'MATERNITY',
  'PATERNITY',
  'EMERGENCY',
  'COMPENSATORY'
] as const;
export type BalanceTrackedLeaveType = typeof BALANCE_TRACKED_LEAVE_TYPES[number];

export function isBalanceTracked(leaveType: LeaveType): leaveType is BalanceTrackedLeaveType {
  return BALANCE_TRACKED_LEAVE_TYPES.some(tracked => tracked === leaveType);
}

export const LEAVE_STATUSES = ['PENDING', 'APPROVED', 'REJECTED', 'CANCELLED'] as const;
export type LeaveStatus = typeof LEAVE_STATUSES[number];

export interface LeaveRequestData {
  id?: string;
  employeeId: string;
  leaveType: LeaveType;
  fromDate: CalendarDate;
  toDate: CalendarDate;
  reason: string;
  status: LeaveStatus;
  approverId?: string | null;
  appliedOn?: Date;
  decidedOn?: Date | null;
  rejectionReason?: string | null;
  updatedAt?: Date;
}

const leaveRequestSchema = Joi.object<LeaveRequestData>({
  id: uuidSchema.optional(),
  employeeId: uuidSchema,
  leaveType: Joi.string().valid(...LEAVE_TYPES).required(),
  fromDate: calendarDateSchema.required(),
  toDate: calendarDateSchema.required(),
  reason: Joi.string().trim().allow('').max(2000).required(),
  status: Joi.string().valid(...LEAVE_STATUSES).required(),
  approverId: Joi.string().uuid().allow(null).optional(),
  appliedOn: Joi.date().optional(),
  decidedOn: Joi.date().allow(null).optional(),
  rejectionReason: Joi.string().allow('', null).max(2000).optional(),
  updatedAt: Joi.date().optional()
});

export class LeaveRequest {
  public readonly id: string;
  public readonly employeeId: string;
  public readonly leaveType: LeaveType;
  public readonly fromDate: CalendarDate;
  public readonly toDate: CalendarDate;
  public readonly reason: string;
  public readonly status: LeaveStatus;
  public readonly approverId: string | null;
  public readonly appliedOn: Date;
  public readonly decidedOn: Date | null;
  public readonly rejectionReason: string | null;
  public readonly updatedAt: Date;

  constructor(data: LeaveRequestData) {
    validateAndThrow<LeaveRequestData>(leaveRequestSchema, data);

    this.id = data.id || uuidv4();
    this.employeeId = data.employeeId;
    this.leaveType = data.leaveType;
    this.fromDate = data.fromDate;
    this.toDate = data.toDate;
    this.reason = data.reason.trim();
    this.status = data.status;
    this.approverId = data.approverId ?? null;
    this.appliedOn = data.appliedOn || new Date();
    this.decidedOn = data.decidedOn ?? null;
    this.rejectionReason = data.rejectionReason ?? null;
    this.updatedAt = data.updatedAt || this.appliedOn;

    this.validateBusinessRules();
  }

  private validateBusinessRules(): void {
    if (this.toDate < this.fromDate) {
      throw new ValidationError('End date cannot be before start date.');
    }
    if ((this.status === 'APPROVED' || this.status === 'REJECTED') && (!this.approverId || !this.decidedOn)) {
      throw new ValidationError('A decided leave request must record its approver and decision time');
    }
  }

  /** Inclusive of both ends. */
  public get durationDays(): number {
    return inclusiveDays(this.fromDate, this.toDate);
  }

  /** Balance year the request counts against: the year it starts in. */
  public get balanceYear(): number {
    return yearOf(this.fromDate);
  }

  public get leaveTypeLabel(): string {
    return LEAVE_TYPE_LABELS[this.leaveType];
  }

  public overlaps(fromDate: CalendarDate, toDate: CalendarDate): boolean {
    return this.fromDate <= toDate && this.toDate >= fromDate;
  }

  public isPending(): boolean {
    return this.status === 'PENDING';
  }

  public approve(approverId: string, decidedOn: Date): LeaveRequest {
    this.assertPending();
    return new LeaveRequest({
      ...this.toData(),
      status: 'APPROVED',
      approverId,
      decidedOn,
      updatedAt: decidedOn
    });
  }

  public reject(approverId: string, decidedOn: Date, rejectionReason?: string): LeaveRequest {
    this.assertPending();
    return new LeaveRequest({
      ...this.toData(),
      status: 'REJECTED',
      approverId,
      decidedOn,
      rejectionReason: rejectionReason?.trim() ?? '',
      updatedAt: decidedOn
    });
  }

  public cancel(at: Date): LeaveRequest {
    this.assertPending();
    return new LeaveRequest({
      ...this.toData(),
      status: 'CANCELLED',
      updatedAt: at
    });
  }

  private assertPending(): void {
    if (!this.isPending()) {
      throw new StateConflictError('Leave request already processed', { status: this.status });
    }
  }

  public toData(): LeaveRequestData {
    return {
      id: this.id,
      employeeId: this.employeeId,
      leaveType: this.leaveType,
      fromDate: this.fromDate,
      toDate: this.toDate,
      reason: this.reason,
      status: this.status,
      approverId: this.approverId,
      appliedOn: this.appliedOn,
      decidedOn: this.decidedOn,
      rejectionReason: this.rejectionReason,
      updatedAt: this.updatedAt
    };
  }

  public toJSON() {
    return {
      ...this.toData(),
      leaveTypeLabel: this.leaveTypeLabel,
      durationDays: this.durationDays
    };
  }

  public static createNew(
    employeeId: string,
    leaveType: LeaveType,
    fromDate: CalendarDate,
    toDate: CalendarDate,
    reason: string,
    appliedOn: Date
  ): LeaveRequest {
    return new LeaveRequest({
      employeeId,
      leaveType,
      fromDate,
      toDate,
      reason,
      status: 'PENDING',
      appliedOn
    });
  }
}
