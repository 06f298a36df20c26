// Environment configuration for the support orchestration API
// Load server, store and orchestration settings from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

export type StoreDriver = 'memory' | 'postgres';

function parseStoreDriver(value: string | undefined): StoreDriver {
  const driver = strEnv(value, 'memory').toLowerCase();
  if (driver === 'memory' || driver === 'postgres') return driver;
  console.error(`Invalid STORE_DRIVER "${value}", using default memory`);
  return 'memory';
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 3838),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: (process.env.CORS_ORIGINS || 'http://localhost:3000,http://127.0.0.1:3000')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean),

  // Backing store
  STORE_DRIVER: parseStoreDriver(process.env.STORE_DRIVER),
  DATABASE_URL: strEnv(process.env.DATABASE_URL, 'postgres://localhost:5432/support'),
  DATABASE_POOL_MAX: parsePositiveInt(process.env.DATABASE_POOL_MAX, 5, 'DATABASE_POOL_MAX'),
  SEED_FILE: strEnv(process.env.SEED_FILE),

  // Orchestration
  TASK_TIMEOUT_MS: parsePositiveInt(process.env.TASK_TIMEOUT_MS, 5000, 'TASK_TIMEOUT_MS'),
  RUN_HISTORY_TTL_MS: parsePositiveInt(process.env.RUN_HISTORY_TTL_MS, 15 * 60 * 1000, 'RUN_HISTORY_TTL_MS'),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  console.log('Support orchestration API configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  Store driver: ${env.STORE_DRIVER}`);
  if (env.STORE_DRIVER === 'postgres') {
    console.log(`  Database: ${redactUrl(env.DATABASE_URL)} (pool max ${env.DATABASE_POOL_MAX})`);
  } else {
    console.log(`  Seed file: ${env.SEED_FILE || 'bundled data/seed.json'}`);
  }
  console.log(`  Task timeout ms: ${env.TASK_TIMEOUT_MS || 'none'}`);
  console.log(`  Run history TTL ms: ${env.RUN_HISTORY_TTL_MS}`);
  console.log(`  Log level: ${env.LOG_LEVEL}`);
}

export function redactUrl(raw: string): string {
  try {
    const url = new URL(raw);
    if (url.password) url.password = '***';
    return url.toString();
  } catch {
    return '<invalid url>';
  }
}
