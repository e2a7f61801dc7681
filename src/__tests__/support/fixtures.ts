import { EmployeeProfile } from '../../models/EmployeeProfile';
import { DEFAULT_LEAVE_BALANCES } from '../../models/leave/LeaveBalance';
import { Principal, Role, UserWithCredentials } from '../../models/User';
import { Clock } from '../../utils/dates';

export const IDS = {
  admin: 'a0000000-0000-4000-8000-000000000001',
  hr: 'a0000000-0000-4000-8000-000000000002',
  manager: 'a0000000-0000-4000-8000-000000000003',
  otherManager: 'a0000000-0000-4000-8000-000000000004',
  employee: 'a0000000-0000-4000-8000-000000000005',
  colleague: 'a0000000-0000-4000-8000-000000000006',
  outsider: 'a0000000-0000-4000-8000-000000000007',
  missing: 'a0000000-0000-4000-8000-0000000000ff'
} as const;

const CREATED = new Date('2024-01-01T00:00:00Z');

export function makeUser(overrides: Partial<UserWithCredentials> & { id: string }): UserWithCredentials {
  return {
    username: `user-${overrides.id.slice(-2)}`,
    email: `user-${overrides.id.slice(-2)}@example.com`,
    passwordHash: 'not-a-real-hash',
    firstName: 'Test',
    lastName: 'User',
    role: 'EMPLOYEE',
    isSuperuser: false,
    employeeCode: null,
    phoneNumber: null,
    department: null,
    hireDate: null,
    isActive: true,
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides
  };
}

export function makeProfile(userId: string, overrides: Partial<EmployeeProfile> = {}): EmployeeProfile {
  return {
    userId,
    dateOfBirth: null,
    gender: null,
    maritalStatus: null,
    nationality: null,
    personalEmail: null,
    emergencyContactName: null,
    emergencyContactPhone: null,
    emergencyContactRelation: null,
    addressLine1: null,
    addressLine2: null,
    city: null,
    state: null,
    postalCode: null,
    country: null,
    designation: null,
    department: null,
    dateOfJoining: null,
    employmentStatus: 'ACTIVE',
    managerId: null,
    location: null,
    salary: null,
    salaryCurrency: 'USD',
    createdAt: CREATED,
    updatedAt: CREATED,
    ...DEFAULT_LEAVE_BALANCES,
    ...overrides
  };
}

export function principal(id: string, role: Role, overrides: Partial<Principal> = {}): Principal {
  return { id, role, isSuperuser: false, managerId: null, department: null, ...overrides };
}

/** A clock stuck at the given instant until moved. */
export class FixedClock implements Clock {
  private current: Date;

  constructor(iso: string) {
    this.current = new Date(iso);
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(iso: string): void {
    this.current = new Date(iso);
  }
}
