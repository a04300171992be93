import { Router } from 'express';
import { z } from 'zod';
import type { AuthService } from '../../../application/auth/authService.js';
import type { Profile } from '../../../domain/auth/user.js';
import { authMiddleware, type AuthRequest } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { validate } from '../middleware/validate.js';

/**
 * @openapi
 * /me:
 *   post:
 *     tags: [Profile]
 *     summary: Resolve a token passed in the body to the player's profile
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [token]
 *             properties:
 *               token: { type: string }
 *     responses:
 *       200:
 *         description: Profile
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ProfileResponse'
 *       401:
 *         description: Invalid token
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       404:
 *         description: Player no longer exists
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *   get:
 *     tags: [Profile]
 *     summary: Resolve the bearer token in the Authorization header to the player's profile
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Profile
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ProfileResponse'
 *       401:
 *         description: Missing or invalid token
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       404:
 *         description: Player no longer exists
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

// An empty token is an invalid token (401), not a malformed request
const meBodySchema = z.object({
  token: z.string(),
});

export interface ProfileResponse {
  id: string;
  email: string;
  nickname: string;
  avatar_url?: string;
  roles: string[];
}

export function toProfileResponse(profile: Profile): ProfileResponse {
  const response: ProfileResponse = {
    id: profile.id,
    email: profile.email,
    nickname: profile.nickname,
    roles: [...profile.roles],
  };
  if (profile.avatarUrl !== null) {
    response.avatar_url = profile.avatarUrl;
  }
  return response;
}

export function createProfileRoutes(authService: AuthService) {
  const router = Router();

  router.post(
    '/',
    validate({ body: meBodySchema }),
    asyncHandler(async (req, res) => {
      const { token } = meBodySchema.parse(req.body);
      const profile = await authService.resolveProfile(token);
      res.status(200).json(toProfileResponse(profile));
    })
  );

  router.get('/', authMiddleware(authService), (req: AuthRequest, res, next) => {
    if (!req.profile) {
      next(new Error('authMiddleware did not attach a profile'));
      return;
    }
    res.status(200).json(toProfileResponse(req.profile));
  });

  return router;
}
