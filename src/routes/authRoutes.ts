import { RequestHandler, Router } from 'express';
import { AuthController } from '../controllers/AuthController';

export const createAuthRoutes = (controller: AuthController, authenticate: RequestHandler): Router => {
  const router = Router();

  /**
   * POST /api/auth/login
   * Public: exchanges credentials for a bearer token
   */
  router.post('/login', controller.login);

  /**
   * GET /api/auth/me
   * Requires: any authenticated user
   */
  router.get('/me', authenticate, controller.me);

  return router;
};
