import { Principal, Role } from '../models/User';
import { AuthorizationError } from '../utils/errors';

/**
 * Everything an authenticated caller can ask to do.
 */
export enum Operation {
  VIEW_OWN_DASHBOARD = 'view-own-dashboard',
  VIEW_OWN_PROFILE = 'view-own-profile',
  EDIT_OWN_PROFILE = 'edit-own-profile',
  APPLY_LEAVE = 'apply-leave',
  VIEW_OWN_LEAVE = 'view-own-leave',
  CANCEL_OWN_LEAVE = 'cancel-own-leave',
  CLOCK_ATTENDANCE = 'clock-attendance',
  VIEW_OWN_ATTENDANCE = 'view-own-attendance',

  APPROVE_LEAVE = 'approve-leave',
  VIEW_TEAM_LEAVE = 'view-team-leave',
  VIEW_TEAM_ATTENDANCE = 'view-team-attendance',
  VIEW_TEAM_DIRECTORY = 'view-team-directory',

  MANAGE_PROJECTS = 'manage-projects',

  VIEW_EMPLOYEE_DETAIL = 'view-employee-detail',
  MANAGE_USERS = 'manage-users',
  ASSIGN_MANAGER = 'assign-manager',
  ASSIGN_ROLE = 'assign-role'
}

/**
 * The record an operation acts on. `ownerId` is whose record it is;
 * `ownerManagerId` is that owner's direct manager.
 */
export interface AccessTarget {
  ownerId?: string;
  ownerManagerId?: string | null;
}

export type AccessScope = 'any' | 'self' | 'direct-report';

interface AccessRule {
  roles: readonly Role[];
  operations: readonly Operation[];
  scope: AccessScope;
}

export const SELF_OPERATIONS: readonly Operation[] = [
  Operation.VIEW_OWN_DASHBOARD,
  Operation.VIEW_OWN_PROFILE,
  Operation.EDIT_OWN_PROFILE,
  Operation.APPLY_LEAVE,
  Operation.VIEW_OWN_LEAVE,
  Operation.CANCEL_OWN_LEAVE,
  Operation.CLOCK_ATTENDANCE,
  Operation.VIEW_OWN_ATTENDANCE
];

const TEAM_OPERATIONS: readonly Operation[] = [
  Operation.APPROVE_LEAVE,
  Operation.VIEW_TEAM_LEAVE,
  Operation.VIEW_TEAM_ATTENDANCE
];

const ADMIN_EXCLUSIVE: readonly Operation[] = [Operation.ASSIGN_ROLE];

const ALL_OPERATIONS: readonly Operation[] = Object.values(Operation);

// First rule matching (role, operation) decides; its scope is then checked
const ACCESS_RULES: readonly AccessRule[] = [
  { roles: ['ADMIN'], operations: ALL_OPERATIONS, scope: 'any' },
  {
    roles: ['HR'],
    operations: ALL_OPERATIONS.filter(op => !ADMIN_EXCLUSIVE.includes(op)),
    scope: 'any'
  },
  { roles: ['MANAGER'], operations: TEAM_OPERATIONS, scope: 'direct-report' },
  { roles: ['MANAGER'], operations: [Operation.VIEW_TEAM_DIRECTORY], scope: 'any' },
  { roles: ['MANAGER'], operations: [...SELF_OPERATIONS, Operation.MANAGE_PROJECTS], scope: 'self' },
  { roles: ['EMPLOYEE'], operations: SELF_OPERATIONS, scope: 'self' }
];

/**
 * Pure role/ownership predicate. Holds no state and never touches storage.
 *
 * Without a target, a scoped rule only answers whether the role may attempt
 * the operation at all; route guards use that form and the service repeats
 * the check once the record is loaded.
 */
export class AccessGate {
  constructor(private readonly rules: readonly AccessRule[] = ACCESS_RULES) {}

  permitted(principal: Principal, operation: Operation, target?: AccessTarget): boolean {
    if (principal.isSuperuser) {
      return true;
    }
    const scope = this.scopeOf(principal, operation);
    if (scope === null) {
      return false;
    }

    return this.inScope(scope, principal, target);
  }

  /**
   * How far the principal's grant for the operation reaches, or null when
   * there is none. Lets list endpoints pick the right query.
   */
  scopeOf(principal: Principal, operation: Operation): AccessScope | null {
    if (principal.isSuperuser) {
      return 'any';
    }
    const rule = this.rules.find(
      candidate => candidate.roles.includes(principal.role) && candidate.operations.includes(operation)
    );
    return rule ? rule.scope : null;
  }

  /**
   * Throws AuthorizationError when `permitted` is false.
   */
  assert(principal: Principal, operation: Operation, target?: AccessTarget): void {
    if (!this.permitted(principal, operation, target)) {
      throw new AuthorizationError();
    }
  }

  private inScope(scope: AccessScope, principal: Principal, target?: AccessTarget): boolean {
    if (!target || scope === 'any') {
      return true;
    }
    if (scope === 'self') {
      return target.ownerId === principal.id;
    }
    return target.ownerManagerId !== undefined
      && target.ownerManagerId !== null
      && target.ownerManagerId === principal.id;
  }
}

export const accessGate = new AccessGate();
