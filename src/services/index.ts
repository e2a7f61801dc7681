import { TransactionRunner } from '../database/connection';
import { Repositories } from '../database/repositories';
import { Clock, systemClock } from '../utils/dates';
import { AccessGate, accessGate } from './AccessGate';
import { AuthService } from './AuthService';
import { UserAdminService } from './UserAdminService';
import { EmployeeService } from './EmployeeService';
import { LeaveLedgerService } from './leave/LeaveLedgerService';
import { AttendanceService } from './AttendanceService';
import { ProjectService } from './ProjectService';

export { AccessGate, accessGate, Operation } from './AccessGate';
export { AuthService } from './AuthService';
export { UserAdminService } from './UserAdminService';
export { EmployeeService } from './EmployeeService';
export { LeaveLedgerService } from './leave/LeaveLedgerService';
export { AttendanceService } from './AttendanceService';
export { ProjectService } from './ProjectService';

export interface Services {
  auth: AuthService;
  users: UserAdminService;
  employees: EmployeeService;
  leave: LeaveLedgerService;
  attendance: AttendanceService;
  projects: ProjectService;
}

export interface ServiceOptions {
  gate?: AccessGate;
  clock?: Clock;
  jwtSecret?: string;
  saltRounds?: number;
}

/**
 * Wire every service onto one set of repositories and one transaction runner.
 */
export function createServices(
  repositories: Repositories,
  transactions: TransactionRunner,
  options: ServiceOptions = {}
): Services {
  const gate = options.gate ?? accessGate;
  const clock = options.clock ?? systemClock;
  const { users, profiles, leaveRequests, attendance, projects } = repositories;

  const auth = new AuthService({
    users,
    profiles,
    jwtSecret: options.jwtSecret,
    saltRounds: options.saltRounds
  });

  return {
    auth,
    users: new UserAdminService({ users, profiles, transactions, auth, gate }),
    employees: new EmployeeService({ users, profiles, transactions, gate }),
    leave: new LeaveLedgerService({ leaveRequests, profiles, transactions, gate, clock }),
    attendance: new AttendanceService({ attendance, profiles, gate, clock }),
    projects: new ProjectService({ projects, users, gate, clock })
  };
}
