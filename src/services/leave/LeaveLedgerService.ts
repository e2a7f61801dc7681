import { TransactionRunner } from '../../database/connection';
import { ILeaveRequestRepository, LeaveRequestFilters } from '../../database/repositories/leaveRequest';
import { IEmployeeProfileRepository } from '../../database/repositories/employeeProfile';
import {
  BALANCE_TRACKED_LEAVE_TYPES,
  isBalanceTracked,
  LeaveRequest,
  LeaveStatus,
  LeaveType
} from '../../models/leave/LeaveRequest';
import { BALANCE_FIELDS, BalanceLine, balanceLine } from '../../models/leave/LeaveBalance';
import { Principal } from '../../models/User';
import { AccessGate, accessGate, Operation } from '../AccessGate';
import {
  AppError,
  AuthorizationError,
  NotFoundError,
  StateConflictError,
  ValidationError
} from '../../utils/errors';
import { CalendarDate, Clock, inclusiveDays, systemClock, toCalendarDate, yearOf } from '../../utils/dates';
import { logger } from '../../utils/logger';

export interface LeaveApplication {
  leaveType: LeaveType;
  fromDate: CalendarDate;
  toDate: CalendarDate;
  reason: string;
}

export type LeaveDecision = 'APPROVE' | 'REJECT';

/**
 * Result of every ledger operation. Business rule failures come back as a
 * failed outcome; faults in the database or code still throw.
 */
export type LedgerOutcome<T> =
  | { success: true; data: T }
  | { success: false; error: AppError; violations: string[] };

export interface BalanceSummary {
  employeeId: string;
  year: number;
  balances: BalanceLine[];
}

export type SubmitRule = 'DATE_IN_PAST' | 'END_BEFORE_START' | 'OVERLAP' | 'INSUFFICIENT_BALANCE';

// Statuses that still hold the dates
const BLOCKING_STATUSES: readonly LeaveStatus[] = ['PENDING', 'APPROVED'];

export interface LeaveLedgerDependencies {
  leaveRequests: ILeaveRequestRepository;
  profiles: IEmployeeProfileRepository;
  transactions: TransactionRunner;
  gate?: AccessGate;
  clock?: Clock;
}

const violation = (message: string, rule: SubmitRule, details: Record<string, unknown> = {}) =>
  new ValidationError(message, { rule, ...details });

/**
 * Leave application and approval. Balances are only ever debited by an
 * approval, inside the transaction that flips the request to Approved.
 */
export class LeaveLedgerService {
  private readonly leaveRequests: ILeaveRequestRepository;
  private readonly profiles: IEmployeeProfileRepository;
  private readonly transactions: TransactionRunner;
  private readonly gate: AccessGate;
  private readonly clock: Clock;

  constructor(deps: LeaveLedgerDependencies) {
    this.leaveRequests = deps.leaveRequests;
    this.profiles = deps.profiles;
    this.transactions = deps.transactions;
    this.gate = deps.gate ?? accessGate;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Validate an application and record it as Pending. Checks run in a fixed
   * order and the first failure is reported: start in the past, end in the
   * past, end before start, overlap with a Pending/Approved request, then
   * balance for the types that draw on one.
   */
  async submit(principal: Principal, application: LeaveApplication): Promise<LedgerOutcome<LeaveRequest>> {
    return this.recover('submit', principal, async () => {
      this.gate.assert(principal, Operation.APPLY_LEAVE, { ownerId: principal.id });

      const { leaveType, fromDate, toDate, reason } = application;
      const today = toCalendarDate(this.clock.now());

      if (fromDate < today) {
        throw violation('Leave start date cannot be in the past.', 'DATE_IN_PAST');
      }
      if (toDate < today) {
        throw violation('Leave end date cannot be in the past.', 'DATE_IN_PAST');
      }
      if (toDate < fromDate) {
        throw violation('End date cannot be before start date.', 'END_BEFORE_START');
      }

      const created = await this.transactions.transaction(async (client) => {
        // Serialises submissions of the same employee
        const profile = await this.profiles.lockForUpdate(principal.id, client);

        const overlapping = await this.leaveRequests.findFirstOverlapping(
          principal.id,
          fromDate,
          toDate,
          BLOCKING_STATUSES,
          client
        );
        if (overlapping) {
          throw violation(
            `You already have a ${overlapping.leaveTypeLabel.toLowerCase()} from ${overlapping.fromDate} ` +
              `to ${overlapping.toDate} that overlaps with this request.`,
            'OVERLAP',
            { conflictingRequestId: overlapping.id }
          );
        }

        if (isBalanceTracked(leaveType)) {
          if (!profile) {
            throw new NotFoundError('Employee profile');
          }
          const configured = profile[BALANCE_FIELDS[leaveType]];
          const used = await this.leaveRequests.sumApprovedDays(principal.id, leaveType, yearOf(fromDate), client);
          const available = configured - used;
          const requested = inclusiveDays(fromDate, toDate);
          if (requested > available) {
            throw violation(
              `Insufficient ${leaveType.toLowerCase()} leave balance. ` +
                `Available ${available} days, requested ${requested} days.`,
              'INSUFFICIENT_BALANCE',
              { available, requested }
            );
          }
        }

        const request = LeaveRequest.createNew(principal.id, leaveType, fromDate, toDate, reason, this.clock.now());
        return this.leaveRequests.create(request, client);
      });

      logger.info('Leave request submitted', {
        requestId: created.id,
        employeeId: created.employeeId,
        leaveType: created.leaveType,
        days: created.durationDays
      });
      return created;
    });
  }

  /**
   * Approve or reject a Pending request. Approving a balance-tracked type
   * re-reads the owner's balance under a row lock, and the debit and the
   * status change commit together.
   */
  async decide(
    approver: Principal,
    requestId: string,
    decision: LeaveDecision,
    rejectionReason?: string
  ): Promise<LedgerOutcome<LeaveRequest>> {
    return this.recover('decide', approver, async () => {
      const decided = await this.transactions.transaction(async (client) => {
        const request = await this.leaveRequests.findByIdForUpdate(requestId, client);
        if (!request) {
          throw new NotFoundError('Leave request');
        }

        const ownerManagerId = await this.profiles.findManagerId(request.employeeId, client);
        this.gate.assert(approver, Operation.APPROVE_LEAVE, { ownerId: request.employeeId, ownerManagerId });

        if (!request.isPending()) {
          throw new StateConflictError('Leave request already processed', {
            status: request.status,
            leaveRequest: request.toJSON()
          });
        }

        const now = this.clock.now();
        if (decision === 'REJECT') {
          return this.leaveRequests.saveStatus(request.reject(approver.id, now, rejectionReason), client);
        }

        if (isBalanceTracked(request.leaveType)) {
          const profile = await this.profiles.lockForUpdate(request.employeeId, client);
          if (!profile) {
            throw new NotFoundError('Employee profile');
          }
          const balance = profile[BALANCE_FIELDS[request.leaveType]];
          if (balance < request.durationDays) {
            throw new StateConflictError(
              `Insufficient ${request.leaveType.toLowerCase()} leave balance to approve this request`,
              { available: balance, requested: request.durationDays }
            );
          }
          await this.profiles.adjustBalance(request.employeeId, request.leaveType, -request.durationDays, client);
        }

        return this.leaveRequests.saveStatus(request.approve(approver.id, now), client);
      });

      logger.info(`Leave request ${decided.status === 'APPROVED' ? 'approved' : 'rejected'}`, {
        requestId: decided.id,
        employeeId: decided.employeeId,
        approverId: approver.id,
        days: decided.durationDays
      });
      return decided;
    });
  }

  /**
   * Withdraw one's own Pending request. Nothing was debited, so nothing is refunded.
   */
  async cancel(principal: Principal, requestId: string): Promise<LedgerOutcome<LeaveRequest>> {
    return this.recover('cancel', principal, async () => {
      const cancelled = await this.transactions.transaction(async (client) => {
        const request = await this.leaveRequests.findByIdForUpdate(requestId, client);
        if (!request) {
          throw new NotFoundError('Leave request');
        }

        this.gate.assert(principal, Operation.CANCEL_OWN_LEAVE, { ownerId: request.employeeId });
        if (request.employeeId !== principal.id) {
          throw new AuthorizationError();
        }

        if (!request.isPending()) {
          throw new StateConflictError('Only pending leave requests can be cancelled', { status: request.status });
        }

        return this.leaveRequests.saveStatus(request.cancel(this.clock.now()), client);
      });

      logger.info('Leave request cancelled', { requestId: cancelled.id, employeeId: cancelled.employeeId });
      return cancelled;
    });
  }

  async listOwn(principal: Principal, filters: LeaveRequestFilters = {}): Promise<LedgerOutcome<LeaveRequest[]>> {
    return this.recover('list', principal, async () => {
      this.gate.assert(principal, Operation.VIEW_OWN_LEAVE, { ownerId: principal.id });
      return this.leaveRequests.findByEmployee(principal.id, filters);
    });
  }

  /**
   * Pending requests the principal may decide: every one for HR and Admin,
   * direct reports' for a Manager.
   */
  async listPendingForApprover(principal: Principal): Promise<LedgerOutcome<LeaveRequest[]>> {
    return this.recover('list-pending', principal, async () => {
      const scope = this.gate.scopeOf(principal, Operation.APPROVE_LEAVE);
      if (scope === null) {
        throw new AuthorizationError();
      }
      if (scope === 'any') {
        return this.leaveRequests.findPending();
      }
      if (scope === 'direct-report') {
        return this.leaveRequests.findPending(principal.id);
      }
      return this.leaveRequests.findByEmployee(principal.id, { status: 'PENDING' });
    });
  }

  /**
   * Configured, used and available days per balance-tracked type. `used`
   * counts Approved requests starting in `year`.
   */
  async balanceSummary(
    principal: Principal,
    employeeId: string,
    year: number = yearOf(toCalendarDate(this.clock.now()))
  ): Promise<LedgerOutcome<BalanceSummary>> {
    return this.recover('balance', principal, async () => {
      const ownerManagerId = await this.profiles.findManagerId(employeeId);
      const target = { ownerId: employeeId, ownerManagerId };
      if (
        !this.gate.permitted(principal, Operation.VIEW_OWN_LEAVE, target) &&
        !this.gate.permitted(principal, Operation.VIEW_TEAM_LEAVE, target)
      ) {
        throw new AuthorizationError();
      }

      const profile = await this.profiles.findByUserId(employeeId);
      if (!profile) {
        throw new NotFoundError('Employee profile');
      }

      const balances = await Promise.all(
        BALANCE_TRACKED_LEAVE_TYPES.map(async (leaveType) =>
          balanceLine(leaveType, profile, await this.leaveRequests.sumApprovedDays(employeeId, leaveType, year))
        )
      );
      return { employeeId, year, balances };
    });
  }

  private async recover<T>(
    operation: string,
    principal: Principal,
    work: () => Promise<T>
  ): Promise<LedgerOutcome<T>> {
    try {
      return { success: true, data: await work() };
    } catch (error) {
      if (error instanceof AppError && error.isOperational) {
        logger.warn(`Leave ${operation} rejected`, {
          principalId: principal.id,
          code: error.code,
          reason: error.message
        });
        return { success: false, error, violations: [error.message] };
      }
      throw error;
    }
  }
}
