/**
 * Storage layer entry point
 */

export * from './types.js';
export * from './PostgresChatStore.js';
export * from './InMemoryChatStore.js';

import type { DatabaseSettings } from '../../infra/config/config.js';
import { migrate } from '../../infra/db/migrate.js';
import { createPostgresPool } from '../../infra/db/postgres.js';
import type { Logger } from '../../infra/logger/logger.js';
import { InMemoryChatStore } from './InMemoryChatStore.js';
import { PostgresChatStore } from './PostgresChatStore.js';
import type { ChatStore } from './types.js';

/**
 * Open the configured store. Postgres gets its schema applied first.
 */
export async function openChatStore(settings: DatabaseSettings, logger: Logger): Promise<ChatStore> {
  if (settings.driver === 'memory') {
    logger.warn('storage', 'Using in-memory store - data is lost on restart');
    return new InMemoryChatStore({ timezone: settings.timezone });
  }
  const pool = createPostgresPool(settings, logger);
  try {
    await migrate(pool, logger);
  } catch (err) {
    await pool.end();
    throw err;
  }
  return new PostgresChatStore(pool, logger, { timezone: settings.timezone });
}
