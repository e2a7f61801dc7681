import { TransactionRunner } from '../database/connection';
import { DirectoryEntry, DirectoryFilters, IUserRepository } from '../database/repositories/user';
import { IEmployeeProfileRepository } from '../database/repositories/employeeProfile';
import { PaginatedResult } from '../database/repositories/base';
import { EmployeeProfile, parseSelfServiceUpdate } from '../models/EmployeeProfile';
import { Principal, PublicUser, Role, ROLE_LABELS, ROLES, toPublicUser } from '../models/User';
import { AccessGate, accessGate, Operation } from './AccessGate';
import { NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

export const DIRECTORY_PAGE_SIZE = 20;
export const QUICK_SEARCH_LIMIT = 10;
export const QUICK_SEARCH_MIN_LENGTH = 2;

export interface EmployeeRecord {
  user: PublicUser;
  profile: EmployeeProfile;
}

export interface EmployeeDetail extends EmployeeRecord {
  canManage: boolean;
}

export interface DirectoryPage extends PaginatedResult<DirectoryEntry> {
  departments: string[];
  roles: Array<{ value: Role; label: string }>;
  total: number;
}

export interface EmployeeServiceDependencies {
  users: IUserRepository;
  profiles: IEmployeeProfileRepository;
  transactions: TransactionRunner;
  gate?: AccessGate;
}

export class EmployeeService {
  private readonly users: IUserRepository;
  private readonly profiles: IEmployeeProfileRepository;
  private readonly transactions: TransactionRunner;
  private readonly gate: AccessGate;

  constructor(deps: EmployeeServiceDependencies) {
    this.users = deps.users;
    this.profiles = deps.profiles;
    this.transactions = deps.transactions;
    this.gate = deps.gate ?? accessGate;
  }

  async getOwnProfile(principal: Principal): Promise<EmployeeRecord> {
    this.gate.assert(principal, Operation.VIEW_OWN_PROFILE, { ownerId: principal.id });
    return this.loadRecord(principal.id);
  }

  /**
   * Self-service edit of account and personal fields. Both rows change in
   * one transaction.
   */
  async updateOwnProfile(principal: Principal, input: unknown): Promise<EmployeeRecord> {
    this.gate.assert(principal, Operation.EDIT_OWN_PROFILE, { ownerId: principal.id });
    const update = parseSelfServiceUpdate(input);

    const record = await this.transactions.transaction(async (client) => {
      const user = Object.keys(update.user).length > 0
        ? await this.users.updateAccount(principal.id, update.user, client)
        : await this.users.findById(principal.id, client);
      if (!user) {
        throw new NotFoundError('User');
      }

      const profile = Object.keys(update.profile).length > 0
        ? await this.profiles.updatePersonalDetails(principal.id, update.profile, client)
        : await this.profiles.findByUserId(principal.id, client);
      if (!profile) {
        throw new NotFoundError('Employee profile');
      }

      return { user: toPublicUser(user), profile };
    });

    logger.info('Profile updated', {
      userId: principal.id,
      fields: [...Object.keys(update.user), ...Object.keys(update.profile)]
    });
    return record;
  }

  async directory(principal: Principal, filters: DirectoryFilters, page = 1): Promise<DirectoryPage> {
    this.gate.assert(principal, Operation.VIEW_TEAM_DIRECTORY);

    const [result, departments] = await Promise.all([
      this.users.searchDirectory(filters, { page, limit: DIRECTORY_PAGE_SIZE }),
      this.users.listDepartments()
    ]);

    return {
      ...result,
      departments,
      roles: ROLES.map(value => ({ value, label: ROLE_LABELS[value] })),
      total: result.pagination.total
    };
  }

  async quickSearch(principal: Principal, term: string): Promise<DirectoryEntry[]> {
    this.gate.assert(principal, Operation.VIEW_TEAM_DIRECTORY);

    const trimmed = term.trim();
    if (trimmed.length < QUICK_SEARCH_MIN_LENGTH) {
      return [];
    }
    return this.users.quickSearch(trimmed, QUICK_SEARCH_LIMIT);
  }

  /**
   * Full record of an active employee. `canManage` tells whether the caller
   * administers this employee: HR, Admin and superusers always do, a Manager
   * only for a direct report.
   */
  async detail(principal: Principal, employeeId: string): Promise<EmployeeDetail> {
    this.gate.assert(principal, Operation.VIEW_EMPLOYEE_DETAIL);
    const record = await this.loadRecord(employeeId);
    if (!record.user.isActive) {
      throw new NotFoundError('Employee');
    }

    const target = { ownerId: employeeId, ownerManagerId: record.profile.managerId };

    const canManage = this.gate.permitted(principal, Operation.MANAGE_USERS, target)
      || this.gate.permitted(principal, Operation.APPROVE_LEAVE, target);

    return { ...record, canManage };
  }

  private async loadRecord(userId: string): Promise<EmployeeRecord> {
    const [user, profile] = await Promise.all([
      this.users.findById(userId),
      this.profiles.findByUserId(userId)
    ]);
    if (!user) {
      throw new NotFoundError('Employee');
    }
    if (!profile) {
      throw new NotFoundError('Employee profile');
    }
    return { user: toPublicUser(user), profile };
  }
}
