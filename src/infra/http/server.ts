import 'dotenv/config';
import type { Server } from 'http';
import { AuthService } from '../../application/auth/authService.js';
import { PasswordHasher } from '../../domain/auth/password.js';
import { TokenCodec } from '../../domain/auth/token.js';
import { loadConfig } from '../config.js';
import { createPool } from '../db/pool.js';
import { UserRepo } from '../db/userRepo.js';
import { logger } from '../logger.js';
import { createApp } from './app.js';

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

async function main(): Promise<void> {
  const config = loadConfig();

  const pool = createPool(config);
  const userRepo = new UserRepo(pool, config.store.timeoutMs);
  const authService = new AuthService(
    userRepo,
    new PasswordHasher(config.hashing),
    new TokenCodec(config.token)
  );

  const app = createApp({
    authService,
    checkStore: () => userRepo.ping(),
  });

  const server = app.listen(config.port, () => {
    logger.info(
      { port: config.port, env: config.nodeEnv, tokenTtlSeconds: config.token.ttlSeconds },
      `Server running on http://localhost:${config.port}`
    );
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    close(server)
      .then(() => pool.end())
      .then(() => {
        logger.info('Shutdown complete');
      })
      .catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exitCode = 1;
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
