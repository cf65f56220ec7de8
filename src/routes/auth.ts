/**
 * Authentication Routes
 * First-account setup, login (bearer tokens), password change
 */

import { Router, RequestHandler, Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../middleware/asyncHandler';
import { AuthenticatedRequest, requireUsername } from '../middleware/auth';
import { sendSuccess } from '../middleware/responseHelper';
import { AuthService } from '../services/authService';

const credentialsSchema = z.object({
  username: z.string().trim().min(1, 'Username is required').max(64),
  password: z.string().min(1, 'Password is required').max(256),
});

const loginSchema = credentialsSchema.extend({
  rememberMe: z.boolean().default(false),
});

const changePasswordSchema = z.object({
  currentPassword: z.string().min(1),
  newPassword: z.string().min(1).max(256),
});

export interface AuthRouterOptions {
  requireAuth: RequestHandler;
  loginLimiter: RequestHandler;
}

export function createAuthRouter(auth: AuthService, options: AuthRouterOptions): Router {
  const router = Router();

  /**
   * GET /api/v1/auth/setup
   * Tells the login screen whether to offer the create-first-account form.
   */
  router.get('/setup', asyncHandler(async (_req, res) => {
    sendSuccess(res, { needsSetup: await auth.needsSetup() });
  }));

  /**
   * POST /api/v1/auth/setup
   * Body: { username, password }. Rejected with 409 once any account exists.
   */
  router.post('/setup', options.loginLimiter, asyncHandler(async (req, res) => {
    const { username, password } = credentialsSchema.parse(req.body);
    const created = await auth.createFirstUser(username, password);
    sendSuccess(res, { username: created, message: 'Account created! Please log in.' }, 201);
  }));

  /**
   * POST /api/v1/auth/login
   * Body: { username, password, rememberMe? }
   * Returns: { token, tokenType, expiresIn, username }
   *
   * rememberMe selects the long-lived token expiry.
   */
  router.post('/login', options.loginLimiter, asyncHandler(async (req, res) => {
    const { username, password, rememberMe } = loginSchema.parse(req.body);
    sendSuccess(res, await auth.login(username, password, rememberMe));
  }));

  router.get('/me', options.requireAuth, (req: AuthenticatedRequest, res: Response) => {
    sendSuccess(res, { username: requireUsername(req) });
  });

  router.post('/password', options.requireAuth, asyncHandler(async (req: AuthenticatedRequest, res) => {
    const { currentPassword, newPassword } = changePasswordSchema.parse(req.body);
    await auth.changePassword(requireUsername(req), currentPassword, newPassword);
    sendSuccess(res, { message: 'Password updated' });
  }));

  return router;
}
