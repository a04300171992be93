import express from 'express';
import cors from 'cors';
import type { AuthService } from '../../application/auth/authService.js';
import { createAuthRoutes } from './routes/auth.js';
import { createProfileRoutes } from './routes/profile.js';
import { createHealthRoutes } from './routes/health.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler } from './middleware/errorHandler.js';

export interface AppDependencies {
  authService: AuthService;
  /** Resolves when the user store answers; backs GET /healthz. */
  checkStore: () => Promise<void>;
  /** Serve Swagger UI at /docs. */
  docs?: boolean;
}

export function createApp({ authService, checkStore, docs = true }: AppDependencies) {
  const app = express();

  app.disable('x-powered-by');
  app.use(cors());
  app.use(express.json());

  app.use(createHealthRoutes(checkStore));
  if (docs) {
    app.use(createSwaggerRoutes());
  }
  app.use('/auth', createAuthRoutes(authService));
  app.use('/me', createProfileRoutes(authService));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
