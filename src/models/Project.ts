import Joi from 'joi';
import { CalendarDate } from '../utils/dates';
import { ValidationError } from '../utils/errors';
import { validateAndThrow, calendarDateSchema } from '../utils/validation';

export const PROJECT_STATUSES = ['ACTIVE', 'COMPLETED', 'ON_HOLD', 'CANCELLED', 'PLANNING'] as const;
export type ProjectStatus = typeof PROJECT_STATUSES[number];

export interface Project {
  id: string;
  name: string;
  description: string;
  managerId: string | null;
  startDate: CalendarDate;
  endDate: CalendarDate | null;
  status: ProjectStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface ProjectSummary extends Project {
  memberCount: number;
}

export interface ProjectMember {
  projectId: string;
  employeeId: string;
  employeeName: string;
  role: string;
  joinedOn: CalendarDate;
}

export interface ProjectFields {
  name: string;
  description: string;
  managerId: string | null;
  startDate: CalendarDate;
  endDate: CalendarDate | null;
  status: ProjectStatus;
}

const projectSchema = Joi.object<ProjectFields>({
  name: Joi.string().trim().min(1).max(200).required(),
  description: Joi.string().allow('').max(5000).default(''),
  managerId: Joi.string().uuid().allow(null).default(null),
  startDate: calendarDateSchema.required(),
  endDate: calendarDateSchema.allow(null).default(null),
  status: Joi.string().valid(...PROJECT_STATUSES).default('ACTIVE')
});

export function validateProject(data: unknown): ProjectFields {
  const fields = validateAndThrow<ProjectFields>(projectSchema, data);
  if (fields.endDate !== null && fields.endDate < fields.startDate) {
    throw new ValidationError('Project end date cannot be before its start date', {
      startDate: fields.startDate,
      endDate: fields.endDate
    });
  }
  return fields;
}
