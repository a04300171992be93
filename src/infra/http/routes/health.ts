import { Router } from 'express';

export const SERVICE_BANNER = 'Player auth API ready';

/**
 * @openapi
 * /:
 *   get:
 *     tags: [Health]
 *     summary: Service banner
 *     responses:
 *       200:
 *         description: Service is up
 *
 * /healthz:
 *   get:
 *     tags: [Health]
 *     summary: Liveness including a user store round trip
 *     responses:
 *       200:
 *         description: Store reachable
 *       500:
 *         description: Store unreachable
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */
export function createHealthRoutes(checkStore: () => Promise<void>) {
  const router = Router();

  router.get('/', (_req, res) => {
    res.status(200).json({ message: SERVICE_BANNER });
  });

  router.get('/healthz', (_req, res, next) => {
    checkStore()
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  return router;
}
