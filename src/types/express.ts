import type { Principal } from '../models/User';

declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
      principal?: Principal;
    }
  }
}

export {};
