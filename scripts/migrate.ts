import { sql } from '../src/db/pool.js';
import { logger } from '../src/utils/logger.js';
import { runMigrations } from '../migrations/runner.js';

const applied = await runMigrations(sql);
logger.info({ applied }, 'Migrate finished');
await sql.end();
