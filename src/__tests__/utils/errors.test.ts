import { Request } from 'express';
import {
  AppError,
  ValidationError,
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  StateConflictError,
  ConflictError,
  DatabaseError,
  generateCorrelationId,
  getCorrelationId,
  mapDatabaseError,
  mapJWTError
} from '../../utils/errors';

describe('Error Utilities', () => {
  describe('AppError', () => {
    it('should carry code, status and details', () => {
      const error = new AppError('Test message', 'TEST_CODE', 400, { field: 'test' });

      expect(error.message).toBe('Test message');
      expect(error.code).toBe('TEST_CODE');
      expect(error.statusCode).toBe(400);
      expect(error.details).toEqual({ field: 'test' });
      expect(error.isOperational).toBe(true);
      expect(error.name).toBe('AppError');
    });
  });

  describe('Specific Error Types', () => {
    it.each([
      [new ValidationError('Bad input'), 'VALIDATION_ERROR', 400],
      [new AuthenticationError(), 'AUTHENTICATION_ERROR', 401],
      [new AuthorizationError(), 'AUTHORIZATION_ERROR', 403],
      [new NotFoundError('Leave request'), 'NOT_FOUND', 404],
      [new StateConflictError('Leave request already processed'), 'STATE_CONFLICT', 409],
      [new ConflictError('Duplicate'), 'CONFLICT', 409],
      [new DatabaseError('Broken'), 'DATABASE_ERROR', 500]
    ])('%s maps to %s / %d', (error, code, status) => {
      expect(error).toBeInstanceOf(AppError);
      expect(error.code).toBe(code);
      expect(error.statusCode).toBe(status);
    });

    it('should never name the rule behind a refusal', () => {
      expect(new AuthorizationError().message).toBe('Not permitted');
    });

    it('should name the missing resource', () => {
      expect(new NotFoundError('Project').message).toBe('Project not found');
    });

    it('should flag database errors as non-operational', () => {
      expect(new DatabaseError('Broken').isOperational).toBe(false);
    });
  });

  describe('Correlation ID utilities', () => {
    it('should generate ids in the req_<time>_<random> shape', () => {
      expect(generateCorrelationId()).toMatch(/^req_\d+_[a-z0-9]+$/);
    });

    it('should read the first header value', () => {
      const req: Partial<Request> = { headers: { 'x-request-id': 'abc' } };
      expect(getCorrelationId(req as Request)).toBe('abc');
    });

    it('should generate one when no header is sent', () => {
      const req: Partial<Request> = { headers: {} };
      expect(getCorrelationId(req as Request)).toMatch(/^req_/);
    });
  });

  describe('mapDatabaseError', () => {
    it('should pass AppErrors through', () => {
      const original = new NotFoundError('User');
      expect(mapDatabaseError(original)).toBe(original);
    });

    it('should map unique violations to ConflictError', () => {
      const mapped = mapDatabaseError({ code: '23505', constraint: 'users_username_key', detail: 'Key exists' });

      expect(mapped).toBeInstanceOf(ConflictError);
      expect(mapped.details).toEqual({ constraint: 'users_username_key', detail: 'Key exists' });
    });

    it('should map foreign key violations to ValidationError', () => {
      const mapped = mapDatabaseError({ code: '23503', constraint: 'fk_manager' });

      expect(mapped).toBeInstanceOf(ValidationError);
      expect(mapped.message).toBe('Referenced record does not exist');
    });

    it('should map connection failures', () => {
      const mapped = mapDatabaseError({ code: 'ECONNREFUSED' });

      expect(mapped).toBeInstanceOf(DatabaseError);
      expect(mapped.message).toBe('Database connection failed');
    });

    it('should wrap anything else', () => {
      const mapped = mapDatabaseError(new Error('socket hang up'));

      expect(mapped).toBeInstanceOf(DatabaseError);
      expect(mapped.details).toEqual({ message: 'socket hang up' });
    });
  });

  describe('mapJWTError', () => {
    const named = (name: string) => Object.assign(new Error('jwt'), { name });

    it.each([
      ['JsonWebTokenError', 'Invalid authentication token'],
      ['TokenExpiredError', 'Authentication token has expired'],
      ['NotBeforeError', 'Token not active yet'],
      ['SomethingElse', 'Token validation failed']
    ])('%s becomes "%s"', (name, message) => {
      const mapped = mapJWTError(named(name));

      expect(mapped).toBeInstanceOf(AuthenticationError);
      expect(mapped.message).toBe(message);
    });
  });
});
