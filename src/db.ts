// Backing store bootstrap (in-memory seed or PostgreSQL pool)
import { env } from './env.js';
import { logger } from './logger.js';
import {
  DEFAULT_SEED_FILE,
  MemorySupportStore,
  PostgresSupportStore,
  loadSeedFile,
  type SupportStore,
} from './services/store/index.js';

export async function createStore(): Promise<SupportStore> {
  if (env.STORE_DRIVER === 'postgres') {
    logger.info({ driver: 'postgres' }, 'Connecting support store');
    return new PostgresSupportStore({
      connectionString: env.DATABASE_URL,
      max: env.DATABASE_POOL_MAX,
    });
  }

  const seedFile = env.SEED_FILE || DEFAULT_SEED_FILE;
  const seed = await loadSeedFile(seedFile);
  logger.info(
    { driver: 'memory', seedFile, customers: seed.customers.length, tickets: seed.tickets.length },
    'Loaded in-memory support store'
  );
  return new MemorySupportStore(seed);
}
