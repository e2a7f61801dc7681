import Joi from 'joi';
import { z } from 'zod';
import { ValidationError } from './errors';
import { isCalendarDate } from './dates';

export const emailSchema = Joi.string().email().required();
export const phoneSchema = Joi.string().pattern(/^\+?[\d\s\-()]+$/).min(7).max(20);
export const requiredStringSchema = Joi.string().required().trim().min(1);
export const uuidSchema = Joi.string().uuid().required();
export const calendarDateSchema = Joi.string()
  .pattern(/^\d{4}-\d{2}-\d{2}$/)
  .custom((value: string, helpers) => (isCalendarDate(value) ? value : helpers.error('any.invalid')));

/**
 * Validates a domain record against a Joi schema and returns the converted value.
 */
export function validateAndThrow<T>(schema: Joi.Schema<T>, data: unknown): T {
  const { error, value } = schema.validate(data, { abortEarly: false });
  if (error) {
    throw new ValidationError('Validation failed', error.details.map(detail => ({
      field: detail.path.join('.'),
      message: detail.message
    })));
  }
  return value;
}

// Request-level schemas shared by controllers
export const zCalendarDate = z
  .string()
  .refine(isCalendarDate, { message: 'Expected a date formatted YYYY-MM-DD' });
export const zUuid = z.string().uuid();
export const zPage = z.coerce.number().int().min(1).default(1);

/**
 * Parses request input with a zod schema.
 */
export function validateRequest<T extends z.ZodTypeAny>(data: unknown, schema: T): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError('Invalid request data', result.error.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message
    })));
  }
  return result.data;
}
