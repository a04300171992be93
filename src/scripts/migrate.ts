import 'dotenv/config';
import { loadConfig } from '../infra/config.js';
import { createPool } from '../infra/db/pool.js';
import { migrate } from '../infra/db/migrate.js';
import { logger } from '../infra/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config);

  try {
    await migrate(pool);
    logger.info('All migrations applied');
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Migration failed');
  process.exitCode = 1;
});
