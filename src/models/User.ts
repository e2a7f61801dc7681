import Joi from 'joi';
import { CalendarDate } from '../utils/dates';
import {
  validateAndThrow,
  emailSchema,
  phoneSchema,
  requiredStringSchema,
  calendarDateSchema
} from '../utils/validation';

export const ROLES = ['EMPLOYEE', 'MANAGER', 'HR', 'ADMIN'] as const;
export type Role = typeof ROLES[number];

export const ROLE_LABELS: Record<Role, string> = {
  EMPLOYEE: 'Employee',
  MANAGER: 'Manager',
  HR: 'HR',
  ADMIN: 'Admin'
};

export interface User {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  role: Role;
  isSuperuser: boolean;
  employeeCode: string | null;
  phoneNumber: string | null;
  department: string | null;
  hireDate: CalendarDate | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface UserWithCredentials extends User {
  passwordHash: string;
}

/**
 * The acting identity every access decision is made for.
 */
export interface Principal {
  id: string;
  role: Role;
  isSuperuser: boolean;
  managerId: string | null;
  department: string | null;
}

export interface NewUserData {
  username: string;
  email: string;
  password: string;
  firstName: string;
  lastName: string;
  role: Role;
  isSuperuser: boolean;
  employeeCode: string | null;
  phoneNumber: string | null;
  department: string | null;
  hireDate: CalendarDate | null;
  managerId: string | null;
}

const newUserSchema = Joi.object<NewUserData>({
  username: Joi.string().trim().pattern(/^[\w.@+-]+$/).max(150).required(),
  email: emailSchema,
  password: Joi.string().min(8).max(128).required(),
  firstName: requiredStringSchema.max(150),
  lastName: requiredStringSchema.max(150),
  role: Joi.string().valid(...ROLES).default('EMPLOYEE'),
  isSuperuser: Joi.boolean().default(false),
  employeeCode: Joi.string().trim().max(20).allow(null).default(null),
  phoneNumber: phoneSchema.allow(null).default(null),
  department: Joi.string().trim().max(100).allow(null).default(null),
  hireDate: calendarDateSchema.allow(null).default(null),
  managerId: Joi.string().uuid().allow(null).default(null)
});

export function validateNewUser(data: unknown): NewUserData {
  return validateAndThrow<NewUserData>(newUserSchema, data);
}

export function fullName(user: Pick<User, 'firstName' | 'lastName' | 'username'>): string {
  return `${user.firstName} ${user.lastName}`.trim() || user.username;
}

export function toPrincipal(user: User, managerId: string | null): Principal {
  return {
    id: user.id,
    role: user.role,
    isSuperuser: user.isSuperuser,
    managerId,
    department: user.department
  };
}

/** Role flags the dashboard shows for the signed-in user. */
export function describeRole(user: Pick<User, 'role' | 'isSuperuser'>) {
  return {
    role: user.role,
    roleLabel: ROLE_LABELS[user.role],
    isSuperuser: user.isSuperuser,
    isHr: user.role === 'HR',
    isManager: user.role === 'MANAGER',
    isAdminRole: user.role === 'ADMIN'
  };
}

export function toPublicUser(user: User) {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    fullName: fullName(user),
    employeeCode: user.employeeCode,
    phoneNumber: user.phoneNumber,
    department: user.department,
    hireDate: user.hireDate,
    isActive: user.isActive,
    ...describeRole(user)
  };
}

export type PublicUser = ReturnType<typeof toPublicUser>;
