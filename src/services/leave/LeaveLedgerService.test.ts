import { LeaveLedgerService, LedgerOutcome } from './LeaveLedgerService';
import { LeaveRequest, LeaveRequestData } from '../../models/leave/LeaveRequest';
import { AuthorizationError, NotFoundError, StateConflictError, ValidationError } from '../../utils/errors';
import { createInMemoryRepositories, InMemoryStore } from '../../__tests__/support/inMemoryRepositories';
import { SerialTransactionRunner } from '../../__tests__/support/SerialTransactionRunner';
import { FixedClock, IDS, makeUser, principal } from '../../__tests__/support/fixtures';

const DECIDED_AT = new Date('2025-01-15T10:00:00Z');

function seedRequest(store: InMemoryStore, data: Partial<LeaveRequestData> & Pick<LeaveRequestData, 'fromDate' | 'toDate'>): LeaveRequest {
  const decided = data.status === 'APPROVED' || data.status === 'REJECTED';
  const request = new LeaveRequest({
    employeeId: IDS.employee,
    leaveType: 'ANNUAL',
    reason: 'Family trip',
    status: 'PENDING',
    appliedOn: new Date('2025-01-01T08:00:00Z'),
    ...(decided ? { approverId: IDS.manager, decidedOn: DECIDED_AT } : {}),
    ...data
  });
  store.leaveRequests.set(request.id, request);
  return request;
}

function expectFailure<T>(outcome: LedgerOutcome<T>) {
  if (outcome.success) {
    throw new Error('Expected a failed outcome');
  }
  return outcome;
}

function expectSuccess<T>(outcome: LedgerOutcome<T>): T {
  if (!outcome.success) {
    throw new Error(`Expected success, got ${outcome.error.message}`);
  }
  return outcome.data;
}

describe('LeaveLedgerService', () => {
  let store: InMemoryStore;
  let clock: FixedClock;
  let service: LeaveLedgerService;

  const employee = principal(IDS.employee, 'EMPLOYEE', { managerId: IDS.manager });
  const colleague = principal(IDS.colleague, 'EMPLOYEE', { managerId: IDS.manager });
  const manager = principal(IDS.manager, 'MANAGER');
  const otherManager = principal(IDS.otherManager, 'MANAGER');
  const hr = principal(IDS.hr, 'HR');

  beforeEach(() => {
    store = new InMemoryStore();
    store.addUser(makeUser({ id: IDS.manager, role: 'MANAGER', lastName: 'Manager' }));
    store.addUser(makeUser({ id: IDS.otherManager, role: 'MANAGER', lastName: 'Other' }));
    store.addUser(makeUser({ id: IDS.hr, role: 'HR' }));
    store.addUser(makeUser({ id: IDS.employee }), { managerId: IDS.manager });
    store.addUser(makeUser({ id: IDS.colleague }), { managerId: IDS.manager });
    store.addUser(makeUser({ id: IDS.outsider }), { managerId: IDS.otherManager });

    const repositories = createInMemoryRepositories(store);
    clock = new FixedClock('2025-03-10T09:00:00');
    service = new LeaveLedgerService({
      leaveRequests: repositories.leaveRequests,
      profiles: repositories.profiles,
      transactions: new SerialTransactionRunner(),
      clock
    });
  });

  const annualBalance = (userId: string) => store.profiles.get(userId)?.annualLeaves;

  describe('submit', () => {
    it('should record a valid application as Pending without touching the balance', async () => {
      const request = expectSuccess(await service.submit(employee, {
        leaveType: 'ANNUAL',
        fromDate: '2025-03-12',
        toDate: '2025-03-14',
        reason: 'Family trip'
      }));

      expect(request.status).toBe('PENDING');
      expect(request.employeeId).toBe(IDS.employee);
      expect(request.durationDays).toBe(3);
      expect(store.leaveRequests.get(request.id)).toBe(request);
      expect(annualBalance(IDS.employee)).toBe(20);
    });

    it('should accept a request starting today', async () => {
      const outcome = await service.submit(employee, {
        leaveType: 'SICK',
        fromDate: '2025-03-10',
        toDate: '2025-03-10',
        reason: 'Flu'
      });

      expect(outcome.success).toBe(true);
    });

    it('should accept an application without a reason', async () => {
      const request = expectSuccess(await service.submit(employee, {
        leaveType: 'ANNUAL',
        fromDate: '2025-03-12',
        toDate: '2025-03-12',
        reason: ''
      }));

      expect(request.reason).toBe('');
      expect(request.status).toBe('PENDING');
    });

    it('should charge a leave spanning new year entirely to its start year', async () => {
      clock.set('2024-12-01T09:00:00');
      seedRequest(store, {
        leaveType: 'EMERGENCY',
        fromDate: '2024-12-30',
        toDate: '2025-01-02',
        status: 'APPROVED'
      });

      const january = await service.submit(employee, {
        leaveType: 'EMERGENCY',
        fromDate: '2025-01-06',
        toDate: '2025-01-10',
        reason: 'Family emergency'
      });
      expect(january.success).toBe(true);

      const failure = expectFailure(await service.submit(employee, {
        leaveType: 'EMERGENCY',
        fromDate: '2024-12-16',
        toDate: '2024-12-17',
        reason: 'Family emergency'
      }));
      expect(failure.violations).toEqual([
        'Insufficient emergency leave balance. Available 1 days, requested 2 days.'
      ]);
    });

    it('should reject a start date in the past', async () => {
      const failure = expectFailure(await service.submit(employee, {
        leaveType: 'ANNUAL',
        fromDate: '2025-03-09',
        toDate: '2025-03-12',
        reason: 'Late filing'
      }));

      expect(failure.error).toBeInstanceOf(ValidationError);
      expect(failure.violations).toEqual(['Leave start date cannot be in the past.']);
      expect(failure.error.details).toEqual({ rule: 'DATE_IN_PAST' });
      expect(store.leaveRequests.size).toBe(0);
    });

    it('should report the past end date before the reversed range', async () => {
      const failure = expectFailure(await service.submit(employee, {
        leaveType: 'ANNUAL',
        fromDate: '2025-03-10',
        toDate: '2025-03-09',
        reason: 'Typo'
      }));

      expect(failure.violations).toEqual(['Leave end date cannot be in the past.']);
    });

    it('should reject an end date before the start date', async () => {
      const failure = expectFailure(await service.submit(employee, {
        leaveType: 'ANNUAL',
        fromDate: '2025-03-20',
        toDate: '2025-03-15',
        reason: 'Typo'
      }));

      expect(failure.violations).toEqual(['End date cannot be before start date.']);
      expect(failure.error.details).toEqual({ rule: 'END_BEFORE_START' });
    });

    it('should reject a range overlapping a Pending request, naming it', async () => {
      const existing = seedRequest(store, { fromDate: '2025-03-12', toDate: '2025-03-14' });

      const failure = expectFailure(await service.submit(employee, {
        leaveType: 'SICK',
        fromDate: '2025-03-14',
        toDate: '2025-03-16',
        reason: 'Flu'
      }));

      expect(failure.violations).toEqual([
        'You already have a annual leave from 2025-03-12 to 2025-03-14 that overlaps with this request.'
      ]);
      expect(failure.error.details).toEqual({ rule: 'OVERLAP', conflictingRequestId: existing.id });
    });

    it('should reject a range overlapping an Approved request', async () => {
      seedRequest(store, { fromDate: '2025-03-20', toDate: '2025-03-21', status: 'APPROVED' });

      const outcome = await service.submit(employee, {
        leaveType: 'ANNUAL',
        fromDate: '2025-03-18',
        toDate: '2025-03-20',
        reason: 'Trip'
      });

      expect(outcome.success).toBe(false);
    });

    it('should ignore Rejected and Cancelled requests when checking overlap', async () => {
      seedRequest(store, { fromDate: '2025-03-12', toDate: '2025-03-14', status: 'REJECTED' });
      seedRequest(store, { fromDate: '2025-03-13', toDate: '2025-03-13', status: 'CANCELLED' });

      const outcome = await service.submit(employee, {
        leaveType: 'ANNUAL',
        fromDate: '2025-03-12',
        toDate: '2025-03-14',
        reason: 'Second try'
      });

      expect(outcome.success).toBe(true);
    });

    it('should not compare against other employees\' requests', async () => {
      seedRequest(store, { employeeId: IDS.colleague, fromDate: '2025-03-12', toDate: '2025-03-14' });

      const outcome = await service.submit(employee, {
        leaveType: 'ANNUAL',
        fromDate: '2025-03-12',
        toDate: '2025-03-14',
        reason: 'Trip'
      });

      expect(outcome.success).toBe(true);
    });

    it('should reject a request exceeding configured minus approved days', async () => {
      seedRequest(store, { leaveType: 'EMERGENCY', fromDate: '2025-02-03', toDate: '2025-02-05', status: 'APPROVED' });

      const failure = expectFailure(await service.submit(employee, {
        leaveType: 'EMERGENCY',
        fromDate: '2025-03-11',
        toDate: '2025-03-13',
        reason: 'Burst pipe'
      }));

      expect(failure.violations).toEqual([
        'Insufficient emergency leave balance. Available 2 days, requested 3 days.'
      ]);
      expect(failure.error.details).toEqual({ rule: 'INSUFFICIENT_BALANCE', available: 2, requested: 3 });
    });

    it('should count only approved days of the same year', async () => {
      seedRequest(store, { leaveType: 'EMERGENCY', fromDate: '2024-06-03', toDate: '2024-06-07', status: 'APPROVED' });

      const outcome = await service.submit(employee, {
        leaveType: 'EMERGENCY',
        fromDate: '2025-03-11',
        toDate: '2025-03-15',
        reason: 'Family matter'
      });

      expect(outcome.success).toBe(true);
    });

    it('should reject compensatory leave when none is configured', async () => {
      const failure = expectFailure(await service.submit(employee, {
        leaveType: 'COMPENSATORY',
        fromDate: '2025-03-11',
        toDate: '2025-03-11',
        reason: 'Weekend shift'
      }));

      expect(failure.violations).toEqual([
        'Insufficient compensatory leave balance. Available 0 days, requested 1 days.'
      ]);
    });

    it('should not check a balance for unpaid leave', async () => {
      const request = expectSuccess(await service.submit(employee, {
        leaveType: 'UNPAID',
        fromDate: '2025-04-01',
        toDate: '2025-05-30',
        reason: 'Sabbatical'
      }));

      expect(request.durationDays).toBe(60);
    });
  });

  describe('decide', () => {
    it('should approve a direct report\'s request and debit the balance once', async () => {
      const pending = seedRequest(store, { fromDate: '2025-03-12', toDate: '2025-03-14' });

      const approved = expectSuccess(await service.decide(manager, pending.id, 'APPROVE'));

      expect(approved.status).toBe('APPROVED');
      expect(approved.approverId).toBe(IDS.manager);
      expect(approved.decidedOn).toEqual(new Date('2025-03-10T09:00:00'));
      expect(annualBalance(IDS.employee)).toBe(17);
    });

    it('should reject with a reason and leave the balance alone', async () => {
      const pending = seedRequest(store, { fromDate: '2025-03-12', toDate: '2025-03-14' });

      const rejected = expectSuccess(await service.decide(manager, pending.id, 'REJECT', 'Release week'));

      expect(rejected.status).toBe('REJECTED');
      expect(rejected.rejectionReason).toBe('Release week');
      expect(annualBalance(IDS.employee)).toBe(20);
    });

    it('should refuse a manager who is not the owner\'s direct manager', async () => {
      const pending = seedRequest(store, { fromDate: '2025-03-12', toDate: '2025-03-14' });

      const failure = expectFailure(await service.decide(otherManager, pending.id, 'APPROVE'));

      expect(failure.error).toBeInstanceOf(AuthorizationError);
      expect(failure.error.message).toBe('Not permitted');
      expect(store.leaveRequests.get(pending.id)?.status).toBe('PENDING');
      expect(annualBalance(IDS.employee)).toBe(20);
    });

    it('should refuse an employee deciding their own request', async () => {
      const pending = seedRequest(store, { fromDate: '2025-03-12', toDate: '2025-03-14' });

      const failure = expectFailure(await service.decide(employee, pending.id, 'APPROVE'));

      expect(failure.error).toBeInstanceOf(AuthorizationError);
    });

    it('should let HR decide any employee\'s request', async () => {
      const pending = seedRequest(store, { employeeId: IDS.outsider, fromDate: '2025-03-12', toDate: '2025-03-12' });

      const approved = expectSuccess(await service.decide(hr, pending.id, 'APPROVE'));

      expect(approved.status).toBe('APPROVED');
      expect(annualBalance(IDS.outsider)).toBe(19);
    });

    it('should answer a second decision with a state conflict carrying the current request', async () => {
      const pending = seedRequest(store, { fromDate: '2025-03-12', toDate: '2025-03-14' });
      expectSuccess(await service.decide(manager, pending.id, 'APPROVE'));

      const failure = expectFailure(await service.decide(manager, pending.id, 'APPROVE'));

      expect(failure.error).toBeInstanceOf(StateConflictError);
      expect(failure.violations).toEqual(['Leave request already processed']);
      expect(failure.error.details).toMatchObject({ status: 'APPROVED', leaveRequest: { id: pending.id, status: 'APPROVED' } });
      expect(annualBalance(IDS.employee)).toBe(17);
    });

    it('should not reject a request that was already approved', async () => {
      const approved = seedRequest(store, { fromDate: '2025-03-12', toDate: '2025-03-14', status: 'APPROVED' });

      const failure = expectFailure(await service.decide(manager, approved.id, 'REJECT'));

      expect(failure.error).toBeInstanceOf(StateConflictError);
      expect(store.leaveRequests.get(approved.id)?.status).toBe('APPROVED');
    });

    it('should report a missing request', async () => {
      const failure = expectFailure(await service.decide(manager, IDS.missing, 'APPROVE'));

      expect(failure.error).toBeInstanceOf(NotFoundError);
      expect(failure.error.message).toBe('Leave request not found');
    });

    it('should refuse an approval the current balance cannot cover', async () => {
      const profile = store.profiles.get(IDS.employee);
      if (profile) store.profiles.set(IDS.employee, { ...profile, annualLeaves: 2 });
      const pending = seedRequest(store, { fromDate: '2025-03-12', toDate: '2025-03-14' });

      const failure = expectFailure(await service.decide(manager, pending.id, 'APPROVE'));

      expect(failure.error).toBeInstanceOf(StateConflictError);
      expect(failure.violations).toEqual(['Insufficient annual leave balance to approve this request']);
      expect(store.leaveRequests.get(pending.id)?.status).toBe('PENDING');
      expect(annualBalance(IDS.employee)).toBe(2);
    });

    it('should approve unpaid leave without touching any counter', async () => {
      const pending = seedRequest(store, { leaveType: 'UNPAID', fromDate: '2025-04-01', toDate: '2025-04-30' });
      const before = store.profiles.get(IDS.employee);

      expectSuccess(await service.decide(manager, pending.id, 'APPROVE'));

      expect(store.profiles.get(IDS.employee)).toEqual(before);
    });

    it('should never approve more days than the balance under concurrent approvals', async () => {
      const profile = store.profiles.get(IDS.employee);
      if (profile) store.profiles.set(IDS.employee, { ...profile, annualLeaves: 5 });
      const requests = [
        seedRequest(store, { fromDate: '2025-04-01', toDate: '2025-04-02' }),
        seedRequest(store, { fromDate: '2025-04-07', toDate: '2025-04-08' }),
        seedRequest(store, { fromDate: '2025-04-14', toDate: '2025-04-15' })
      ];

      const outcomes = await Promise.all(requests.map(request => service.decide(manager, request.id, 'APPROVE')));

      const approvedDays = [...store.leaveRequests.values()]
        .filter(request => request.status === 'APPROVED')
        .reduce((total, request) => total + request.durationDays, 0);
      expect(outcomes.filter(outcome => outcome.success)).toHaveLength(2);
      expect(approvedDays).toBe(4);
      expect(annualBalance(IDS.employee)).toBe(1);
    });

    it('should let exactly one of two concurrent approvals of the same request win', async () => {
      const pending = seedRequest(store, { fromDate: '2025-03-12', toDate: '2025-03-14' });

      const [first, second] = await Promise.all([
        service.decide(manager, pending.id, 'APPROVE'),
        service.decide(hr, pending.id, 'APPROVE')
      ]);

      expect(first.success).toBe(true);
      expect(expectFailure(second).error).toBeInstanceOf(StateConflictError);
      expect(annualBalance(IDS.employee)).toBe(17);
    });
  });

  describe('cancel', () => {
    it('should cancel the owner\'s Pending request without a refund', async () => {
      const pending = seedRequest(store, { fromDate: '2025-03-12', toDate: '2025-03-14' });

      const cancelled = expectSuccess(await service.cancel(employee, pending.id));

      expect(cancelled.status).toBe('CANCELLED');
      expect(annualBalance(IDS.employee)).toBe(20);
    });

    it('should free the dates for a new application', async () => {
      const pending = seedRequest(store, { fromDate: '2025-03-12', toDate: '2025-03-14' });
      expectSuccess(await service.cancel(employee, pending.id));

      const outcome = await service.submit(employee, {
        leaveType: 'ANNUAL',
        fromDate: '2025-03-12',
        toDate: '2025-03-14',
        reason: 'Rebooked'
      });

      expect(outcome.success).toBe(true);
    });

    it('should refuse anyone but the owner, HR included', async () => {
      const pending = seedRequest(store, { fromDate: '2025-03-12', toDate: '2025-03-14' });

      expect(expectFailure(await service.cancel(colleague, pending.id)).error).toBeInstanceOf(AuthorizationError);
      expect(expectFailure(await service.cancel(hr, pending.id)).error).toBeInstanceOf(AuthorizationError);
      expect(store.leaveRequests.get(pending.id)?.status).toBe('PENDING');
    });

    it('should refuse a request that is no longer Pending', async () => {
      const approved = seedRequest(store, { fromDate: '2025-03-12', toDate: '2025-03-14', status: 'APPROVED' });

      const failure = expectFailure(await service.cancel(employee, approved.id));

      expect(failure.error).toBeInstanceOf(StateConflictError);
      expect(failure.violations).toEqual(['Only pending leave requests can be cancelled']);
    });
  });

  describe('listOwn', () => {
    it('should return the principal\'s requests newest first', async () => {
      const first = expectSuccess(await service.submit(employee, {
        leaveType: 'ANNUAL', fromDate: '2025-03-12', toDate: '2025-03-12', reason: 'One'
      }));
      clock.set('2025-03-10T10:00:00');
      const second = expectSuccess(await service.submit(employee, {
        leaveType: 'ANNUAL', fromDate: '2025-03-20', toDate: '2025-03-20', reason: 'Two'
      }));
      seedRequest(store, { employeeId: IDS.colleague, fromDate: '2025-03-12', toDate: '2025-03-12' });

      const requests = expectSuccess(await service.listOwn(employee));

      expect(requests.map(request => request.id)).toEqual([second.id, first.id]);
    });

    it('should filter by status', async () => {
      seedRequest(store, { fromDate: '2025-03-12', toDate: '2025-03-12' });
      const approved = seedRequest(store, { fromDate: '2025-03-20', toDate: '2025-03-20', status: 'APPROVED' });

      const requests = expectSuccess(await service.listOwn(employee, { status: 'APPROVED' }));

      expect(requests.map(request => request.id)).toEqual([approved.id]);
    });
  });

  describe('listPendingForApprover', () => {
    it('should show a manager only their direct reports\' requests', async () => {
      const mine = seedRequest(store, { fromDate: '2025-03-12', toDate: '2025-03-12' });
      seedRequest(store, { employeeId: IDS.outsider, fromDate: '2025-03-12', toDate: '2025-03-12' });

      const pending = expectSuccess(await service.listPendingForApprover(manager));

      expect(pending.map(request => request.id)).toEqual([mine.id]);
    });

    it('should show HR every Pending request', async () => {
      seedRequest(store, { fromDate: '2025-03-12', toDate: '2025-03-12' });
      seedRequest(store, { employeeId: IDS.outsider, fromDate: '2025-03-12', toDate: '2025-03-12' });
      seedRequest(store, { employeeId: IDS.outsider, fromDate: '2025-03-20', toDate: '2025-03-20', status: 'APPROVED' });

      const pending = expectSuccess(await service.listPendingForApprover(hr));

      expect(pending).toHaveLength(2);
    });

    it('should refuse an employee', async () => {
      const failure = expectFailure(await service.listPendingForApprover(employee));

      expect(failure.error).toBeInstanceOf(AuthorizationError);
    });
  });

  describe('balanceSummary', () => {
    it('should report configured, used and available days per tracked type', async () => {
      seedRequest(store, { leaveType: 'SICK', fromDate: '2025-02-03', toDate: '2025-02-04', status: 'APPROVED' });
      seedRequest(store, { leaveType: 'SICK', fromDate: '2024-11-04', toDate: '2024-11-04', status: 'APPROVED' });

      const summary = expectSuccess(await service.balanceSummary(employee, IDS.employee, 2025));

      expect(summary.employeeId).toBe(IDS.employee);
      expect(summary.year).toBe(2025);
      expect(summary.balances.map(line => line.leaveType)).toEqual([
        'ANNUAL', 'SICK', 'MATERNITY', 'PATERNITY', 'EMERGENCY', 'COMPENSATORY'
      ]);
      expect(summary.balances[1]).toEqual({
        leaveType: 'SICK',
        label: 'Sick Leave',
        configured: 10,
        used: 2,
        available: 8
      });
    });

    it('should let the direct manager read it', async () => {
      const outcome = await service.balanceSummary(manager, IDS.employee, 2025);

      expect(outcome.success).toBe(true);
    });

    it('should refuse a colleague and an unrelated manager', async () => {
      expect(expectFailure(await service.balanceSummary(colleague, IDS.employee, 2025)).error)
        .toBeInstanceOf(AuthorizationError);
      expect(expectFailure(await service.balanceSummary(otherManager, IDS.employee, 2025)).error)
        .toBeInstanceOf(AuthorizationError);
    });
  });
});
