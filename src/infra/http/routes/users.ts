import { Router } from 'express';
import { AuthService } from '../../../application/auth/authService.js';
import { Principal } from '../../../domain/auth/principal.js';
import { AuthRequest, authMiddleware, requirePrincipal } from '../middleware/auth.js';

/**
 * @openapi
 * /api/users/me:
 *   get:
 *     tags: [Users]
 *     summary: Current user
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: The principal behind the access token
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserResponse' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

export interface UserResponse {
  id: string;
  username: string;
  email: string;
  confirmed: boolean;
}

export function toUserResponse(principal: Principal): UserResponse {
  return {
    id: principal.id,
    username: principal.username,
    email: principal.email,
    confirmed: principal.confirmed,
  };
}

export function createUserRoutes(authService: AuthService) {
  const router = Router();

  router.get(
    '/me',
    authMiddleware(authService),
    (req: AuthRequest, res) => {
      res.status(200).json(toUserResponse(requirePrincipal(req)));
    }
  );

  return router;
}
