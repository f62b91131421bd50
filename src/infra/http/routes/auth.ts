import { Router } from 'express';
import { z } from 'zod';
import { AuthService } from '../../../application/auth/authService.js';
import { ConfirmEmailUseCase } from '../../../application/auth/confirmEmail.js';
import { PasswordRecoveryUseCase } from '../../../application/auth/passwordRecovery.js';
import { RegisterUseCase } from '../../../application/auth/register.js';
import { RequestEmailConfirmationUseCase } from '../../../application/auth/requestEmailConfirmation.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { AuthRequest, authMiddleware, extractBearerToken, requirePrincipal } from '../middleware/auth.js';

/**
 * @openapi
 * /api/auth/signup:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user and send a verification email
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, email, password]
 *             properties:
 *               username: { type: string, minLength: 3, maxLength: 50 }
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 8 }
 *     responses:
 *       201:
 *         description: User created
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Account already exists
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Exchange credentials for an access/refresh token pair
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/TokenPair' }
 *       401:
 *         description: Invalid email or password
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/auth/refresh_token:
 *   get:
 *     tags: [Auth]
 *     summary: Rotate the refresh token (send it as the Bearer token)
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: New token pair; the presented refresh token is spent
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/TokenPair' }
 *       401:
 *         description: Invalid, expired or already used refresh token
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/auth/logout:
 *   post:
 *     tags: [Auth]
 *     summary: Revoke the current refresh token
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       204: { description: Logged out }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/auth/confirmed_email/{token}:
 *   get:
 *     tags: [Email]
 *     summary: Confirm an email address
 *     parameters:
 *       - in: path
 *         name: token
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200: { description: Email confirmed or already confirmed }
 *       422:
 *         description: Invalid verification token
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/auth/request_email:
 *   post:
 *     tags: [Email]
 *     summary: Resend the verification email
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email]
 *             properties:
 *               email: { type: string, format: email }
 *     responses:
 *       200: { description: Message describing the outcome }
 *
 * /api/auth/password-recovery:
 *   post:
 *     tags: [Email]
 *     summary: Send a password reset link
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email]
 *             properties:
 *               email: { type: string, format: email }
 *     responses:
 *       202: { description: Accepted; same answer for unknown emails }
 *
 * /api/auth/reset-password:
 *   post:
 *     tags: [Email]
 *     summary: Set a new password with a reset token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [token, password]
 *             properties:
 *               token: { type: string }
 *               password: { type: string, minLength: 8 }
 *     responses:
 *       200: { description: Password changed; all sessions revoked }
 *       422:
 *         description: Invalid reset token
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const signupBodySchema = z.object({
  username: z.string().min(3).max(50),
  email: z.string().email(),
  password: z.string().min(8).max(128),
});

const loginBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

const emailBodySchema = z.object({
  email: z.string().email(),
});

const resetPasswordBodySchema = z.object({
  token: z.string().min(1),
  password: z.string().min(8).max(128),
});

const tokenParamsSchema = z.object({
  token: z.string().min(1),
});

export interface AuthRouteDeps {
  authService: AuthService;
  register: RegisterUseCase;
  confirmEmail: ConfirmEmailUseCase;
  requestEmailConfirmation: RequestEmailConfirmationUseCase;
  passwordRecovery: PasswordRecoveryUseCase;
}

export function createAuthRoutes(deps: AuthRouteDeps) {
  const router = Router();
  const { authService } = deps;

  router.post(
    '/signup',
    asyncHandler(async (req, res) => {
      const body = signupBodySchema.parse(req.body);
      const result = await deps.register.execute(body);
      res.status(201).json(result);
    })
  );

  router.post(
    '/login',
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const pair = await authService.login(body.email, body.password);
      res.status(200).json(pair);
    })
  );

  router.get(
    '/refresh_token',
    asyncHandler(async (req, res) => {
      const token = extractBearerToken(req.headers.authorization);
      const pair = await authService.refresh(token);
      res.status(200).json(pair);
    })
  );

  router.post(
    '/logout',
    authMiddleware(authService),
    asyncHandler(async (req: AuthRequest, res) => {
      await authService.logout(requirePrincipal(req).email);
      res.status(204).end();
    })
  );

  router.get(
    '/confirmed_email/:token',
    asyncHandler(async (req, res) => {
      const { token } = tokenParamsSchema.parse(req.params);
      const result = await deps.confirmEmail.execute(token);
      res.status(200).json({
        message: result.alreadyConfirmed ? 'Your email is already confirmed' : 'Email confirmed',
      });
    })
  );

  router.post(
    '/request_email',
    asyncHandler(async (req, res) => {
      const { email } = emailBodySchema.parse(req.body);
      const outcome = await deps.requestEmailConfirmation.execute(email);
      res.status(200).json({
        message:
          outcome === 'already_confirmed'
            ? 'Your email is already confirmed'
            : 'Check your email for confirmation.',
      });
    })
  );

  router.post(
    '/password-recovery',
    asyncHandler(async (req, res) => {
      const { email } = emailBodySchema.parse(req.body);
      await deps.passwordRecovery.request(email);
      res.status(202).json({ message: 'If the account exists, a reset link has been sent.' });
    })
  );

  router.post(
    '/reset-password',
    asyncHandler(async (req, res) => {
      const body = resetPasswordBodySchema.parse(req.body);
      await deps.passwordRecovery.reset(body);
      res.status(200).json({ message: 'Password has been reset' });
    })
  );

  return router;
}
