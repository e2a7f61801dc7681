import { Queryable, TransactionRunner } from '../database/connection';
import { IUserRepository } from '../database/repositories/user';
import { IEmployeeProfileRepository } from '../database/repositories/employeeProfile';
import { EmployeeProfile } from '../models/EmployeeProfile';
import { Principal, PublicUser, Role, toPublicUser, validateNewUser } from '../models/User';
import { AccessGate, accessGate, Operation } from './AccessGate';
import { AuthService } from './AuthService';
import { NotFoundError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface CreatedUser {
  user: PublicUser;
  profile: EmployeeProfile;
}

export interface UserAdminDependencies {
  users: IUserRepository;
  profiles: IEmployeeProfileRepository;
  transactions: TransactionRunner;
  auth: AuthService;
  gate?: AccessGate;
}

// Roles only an Admin may hand out
const PRIVILEGED_ROLES: readonly Role[] = ['HR', 'ADMIN'];

export class UserAdminService {
  private readonly users: IUserRepository;
  private readonly profiles: IEmployeeProfileRepository;
  private readonly transactions: TransactionRunner;
  private readonly auth: AuthService;
  private readonly gate: AccessGate;

  constructor(deps: UserAdminDependencies) {
    this.users = deps.users;
    this.profiles = deps.profiles;
    this.transactions = deps.transactions;
    this.auth = deps.auth;
    this.gate = deps.gate ?? accessGate;
  }

  /**
   * Create an account together with its employee profile
   */
  async createUser(principal: Principal, input: unknown): Promise<CreatedUser> {
    this.gate.assert(principal, Operation.MANAGE_USERS);
    const data = validateNewUser(input);

    if (PRIVILEGED_ROLES.includes(data.role) || data.isSuperuser) {
      this.gate.assert(principal, Operation.ASSIGN_ROLE);
    }
    if (data.managerId) {
      await this.requireActiveUser(data.managerId, 'Manager');
    }

    const passwordHash = await this.auth.hashPassword(data.password);

    const created = await this.transactions.transaction(async (client) => {
      const user = await this.users.create({
        username: data.username,
        email: data.email,
        passwordHash,
        firstName: data.firstName,
        lastName: data.lastName,
        role: data.role,
        isSuperuser: data.isSuperuser,
        employeeCode: data.employeeCode,
        phoneNumber: data.phoneNumber,
        department: data.department,
        hireDate: data.hireDate
      }, client);

      const profile = await this.profiles.create(user.id, {
        managerId: data.managerId,
        department: data.department,
        designation: null,
        dateOfJoining: data.hireDate
      }, client);

      return { user: toPublicUser(user), profile };
    });

    logger.info('User created', { userId: created.user.id, role: created.user.role, createdBy: principal.id });
    return created;
  }

  async assignRole(principal: Principal, userId: string, role: Role, isSuperuser: boolean): Promise<PublicUser> {
    this.gate.assert(principal, Operation.ASSIGN_ROLE, { ownerId: userId });

    const updated = await this.users.updateRole(userId, role, isSuperuser);
    if (!updated) {
      throw new NotFoundError('User');
    }

    logger.info('User role changed', { userId, role, isSuperuser, changedBy: principal.id });
    return toPublicUser(updated);
  }

  /**
   * Set or clear a user's direct manager. Rejects an assignment that would
   * make the user their own manager, directly or through the chain above.
   */
  async assignManager(principal: Principal, userId: string, managerId: string | null): Promise<EmployeeProfile> {
    await this.requireActiveUser(userId, 'User');
    const currentManagerId = await this.profiles.findManagerId(userId);
    this.gate.assert(principal, Operation.ASSIGN_MANAGER, { ownerId: userId, ownerManagerId: currentManagerId });

    if (managerId !== null) {
      await this.requireActiveUser(managerId, 'Manager');
    }

    const profile = await this.transactions.transaction(async (client) => {
      // Two crossing assignments could each pass the walk on their own
      await this.profiles.lockReportingLines(client);
      const locked = await this.profiles.lockForUpdate(userId, client);
      if (!locked) {
        throw new NotFoundError('Employee profile');
      }

      if (managerId !== null) {
        await this.assertNoCycle(userId, managerId, client);
      }

      const updated = await this.profiles.setManager(userId, managerId, client);
      if (!updated) {
        throw new NotFoundError('Employee profile');
      }
      return updated;
    });

    logger.info('Manager assigned', { userId, managerId, changedBy: principal.id });
    return profile;
  }

  async deactivate(principal: Principal, userId: string): Promise<PublicUser> {
    this.gate.assert(principal, Operation.MANAGE_USERS, { ownerId: userId });
    if (userId === principal.id) {
      throw new ValidationError('You cannot deactivate your own account');
    }

    const updated = await this.users.deactivate(userId);
    if (!updated) {
      throw new NotFoundError('User');
    }

    logger.info('User deactivated', { userId, deactivatedBy: principal.id });
    return toPublicUser(updated);
  }

  private async requireActiveUser(userId: string, label: string): Promise<void> {
    const user = await this.users.findById(userId);
    if (!user || !user.isActive) {
      throw new NotFoundError(label);
    }
  }

  // Walks upward from the proposed manager; reaching the user means a loop.
  private async assertNoCycle(userId: string, managerId: string, client: Queryable): Promise<void> {
    const visited = new Set<string>();
    let cursor: string | null = managerId;

    while (cursor !== null && !visited.has(cursor)) {
      if (cursor === userId) {
        throw new ValidationError('Assigning this manager would create a reporting cycle', {
          userId,
          managerId
        });
      }
      visited.add(cursor);
      cursor = await this.profiles.findManagerId(cursor, client);
    }
  }
}
