import { Router } from 'express';
import { z } from 'zod';
import type { AccessToken, AuthService } from '../../../application/auth/authService.js';
import {
  NICKNAME_MAX_LENGTH,
  NICKNAME_MIN_LENGTH,
  nicknameLength,
  normalizeEmail,
} from '../../../domain/auth/user.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new player and receive a bearer token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password, nickname]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 1 }
 *               nickname: { type: string, minLength: 3, maxLength: 32 }
 *               avatar_url: { type: string, format: uri, nullable: true }
 *     responses:
 *       200:
 *         description: Player registered
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/TokenResponse'
 *       400:
 *         description: Validation error, or email already registered (DUPLICATE_EMAIL)
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       503:
 *         description: User store unavailable, retry later
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Exchange email and password for a bearer token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string, maxLength: 256 }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/TokenResponse'
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

const emailSchema = z.string().email().transform(normalizeEmail);

const nicknameSchema = z.string().refine(
  (nickname) => {
    const length = nicknameLength(nickname);
    return length >= NICKNAME_MIN_LENGTH && length <= NICKNAME_MAX_LENGTH;
  },
  { message: `Nickname must be ${NICKNAME_MIN_LENGTH} to ${NICKNAME_MAX_LENGTH} characters` }
);

export const registerBodySchema = z.object({
  email: emailSchema,
  password: z.string().min(1).max(256),
  nickname: nicknameSchema,
  avatar_url: z.string().url().nullish(),
});

// No minimum on the password: an empty one is just wrong credentials
export const loginBodySchema = z.object({
  email: emailSchema,
  password: z.string().max(256),
});

export interface TokenResponse {
  access_token: string;
  token_type: 'bearer';
}

export function toTokenResponse(token: AccessToken): TokenResponse {
  return {
    access_token: token.accessToken,
    token_type: token.tokenType,
  };
}

export function createAuthRoutes(authService: AuthService) {
  const router = Router();

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const token = await authService.register({
        email: body.email,
        password: body.password,
        nickname: body.nickname,
        avatarUrl: body.avatar_url,
      });
      res.status(200).json(toTokenResponse(token));
    })
  );

  router.post(
    '/login',
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const token = await authService.login(body);
      res.status(200).json(toTokenResponse(token));
    })
  );

  return router;
}
