import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthService } from '../services/AuthService';
import { AccessGate, accessGate, Operation } from '../services/AccessGate';
import { Principal } from '../models/User';
import { AuthenticationError } from '../utils/errors';
import '../types/express';

/**
 * Resolve the bearer token to an active user and attach its Principal.
 */
export const createAuthenticate = (auth: AuthService): RequestHandler =>
  async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const token = auth.extractTokenFromHeader(req.headers.authorization);
      if (!token) {
        throw new AuthenticationError('Authentication token is required');
      }

      const { principal } = await auth.authenticate(token);
      req.principal = principal;
      next();
    } catch (error) {
      next(error);
    }
  };

/**
 * Route guard: may the caller's role attempt the operation at all? The
 * service repeats the check once it knows the record.
 */
export const requireOperation = (operation: Operation, gate: AccessGate = accessGate): RequestHandler =>
  (req: Request, _res: Response, next: NextFunction): void => {
    try {
      gate.assert(requirePrincipal(req), operation);
      next();
    } catch (error) {
      next(error);
    }
  };

export function requirePrincipal(req: Request): Principal {
  if (!req.principal) {
    throw new AuthenticationError('Authentication required');
  }
  return req.principal;
}
