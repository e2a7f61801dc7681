import Joi from 'joi';
import { CalendarDate } from '../utils/dates';
import { LeaveBalances } from './leave/LeaveBalance';
import { validateAndThrow, calendarDateSchema, emailSchema, phoneSchema } from '../utils/validation';

export const GENDERS = ['M', 'F', 'O', 'P'] as const;
export const MARITAL_STATUSES = ['S', 'M', 'D', 'W', 'O'] as const;
export const EMPLOYMENT_STATUSES = ['ACTIVE', 'INACTIVE', 'TERMINATED', 'ON_LEAVE', 'PROBATION'] as const;

export type Gender = typeof GENDERS[number];
export type MaritalStatus = typeof MARITAL_STATUSES[number];
export type EmploymentStatus = typeof EMPLOYMENT_STATUSES[number];

export interface PersonalDetails {
  dateOfBirth: CalendarDate | null;
  gender: Gender | null;
  maritalStatus: MaritalStatus | null;
  nationality: string | null;
  personalEmail: string | null;
  emergencyContactName: string | null;
  emergencyContactPhone: string | null;
  emergencyContactRelation: string | null;
  addressLine1: string | null;
  addressLine2: string | null;
  city: string | null;
  state: string | null;
  postalCode: string | null;
  country: string | null;
}

export interface EmployeeProfile extends PersonalDetails, LeaveBalances {
  userId: string;
  designation: string | null;
  department: string | null;
  dateOfJoining: CalendarDate | null;
  employmentStatus: EmploymentStatus;
  managerId: string | null;
  location: string | null;
  salary: number | null;
  salaryCurrency: string;
  createdAt: Date;
  updatedAt: Date;
}

export const PERSONAL_DETAIL_FIELDS: ReadonlyArray<keyof PersonalDetails> = [
  'dateOfBirth',
  'gender',
  'maritalStatus',
  'nationality',
  'personalEmail',
  'emergencyContactName',
  'emergencyContactPhone',
  'emergencyContactRelation',
  'addressLine1',
  'addressLine2',
  'city',
  'state',
  'postalCode',
  'country'
];

export interface SelfServiceUpdate {
  user: {
    firstName?: string;
    lastName?: string;
    email?: string;
    phoneNumber?: string | null;
  };
  profile: Partial<PersonalDetails>;
}

// Blank strings clear a field
const text = (max: number) => Joi.string().trim().max(max).empty('').allow(null);

const selfServiceSchema = Joi.object({
  firstName: Joi.string().trim().min(1).max(150),
  lastName: Joi.string().trim().min(1).max(150),
  email: emailSchema.optional(),
  phoneNumber: phoneSchema.empty('').allow(null),
  dateOfBirth: calendarDateSchema.empty('').allow(null),
  gender: Joi.string().valid(...GENDERS).empty('').allow(null),
  maritalStatus: Joi.string().valid(...MARITAL_STATUSES).empty('').allow(null),
  nationality: text(100),
  personalEmail: Joi.string().trim().email().empty('').allow(null),
  emergencyContactName: text(200),
  emergencyContactPhone: phoneSchema.empty('').allow(null),
  emergencyContactRelation: text(100),
  addressLine1: text(255),
  addressLine2: text(255),
  city: text(100),
  state: text(100),
  postalCode: text(20),
  country: text(100)
}).required();

type SelfServiceInput = Partial<SelfServiceUpdate['user'] & PersonalDetails>;

/**
 * Validates a self-service edit and splits it into account fields and
 * profile fields. A field sent as an empty string is stored as null.
 */
export function parseSelfServiceUpdate(data: unknown): SelfServiceUpdate {
  const value = validateAndThrow<SelfServiceInput>(selfServiceSchema, data);
  const nullable = <K extends keyof SelfServiceInput>(key: K) =>
    Object.prototype.hasOwnProperty.call(data, key) ? value[key] ?? null : undefined;

  const profile: Partial<PersonalDetails> = {};
  for (const field of PERSONAL_DETAIL_FIELDS) {
    const fieldValue = nullable(field);
    if (fieldValue !== undefined) {
      Object.assign(profile, { [field]: fieldValue });
    }
  }

  const user: SelfServiceUpdate['user'] = {};
  if (value.firstName !== undefined) user.firstName = value.firstName;
  if (value.lastName !== undefined) user.lastName = value.lastName;
  if (value.email !== undefined) user.email = value.email;
  const phone = nullable('phoneNumber');
  if (phone !== undefined) user.phoneNumber = phone;

  return { user, profile };
}
