import { Pool } from 'pg';
import { ConfigError } from '../errors';
import { logger } from '../utils/logger';

let pool: Pool | null = null;

const SSL_PARAMS = ['sslmode', 'ssl', 'sslcert', 'sslkey', 'sslrootcert', 'sslcrl'];

type Env = Record<string, string | undefined>;

export function isProductionEnv(env: Env = process.env): boolean {
  return (
    env.NODE_ENV === 'production' ||
    env.VERCEL === '1' ||
    env.VERCEL_ENV === 'production' ||
    !!env.VERCEL_URL ||
    !!env.AWS_LAMBDA_FUNCTION_NAME
  );
}

/**
 * Production always uses SSL; elsewhere DATABASE_SSL=false turns it off.
 * rejectUnauthorized is off for managed databases with self-signed certs.
 */
export function resolveSslConfig(env: Env = process.env): false | { rejectUnauthorized: boolean } {
  if (isProductionEnv(env)) {
    return { rejectUnauthorized: false };
  }
  return env.DATABASE_SSL === 'false' ? false : { rejectUnauthorized: false };
}

/**
 * Removes SSL query params so the explicit ssl option takes precedence
 */
export function stripSslParams(databaseUrl: string): string {
  let url: URL;
  try {
    url = new URL(databaseUrl);
  } catch {
    // Non-URL connection strings are passed through; the ssl option still applies
    return databaseUrl;
  }
  SSL_PARAMS.forEach(param => url.searchParams.delete(param));
  return url.toString();
}

export function getPool(env: Env = process.env): Pool {
  if (!pool) {
    const databaseUrl = env.DATABASE_URL;
    if (!databaseUrl) {
      throw new ConfigError('DATABASE_URL environment variable is not set');
    }

    pool = new Pool({
      connectionString: stripSslParams(databaseUrl),
      ssl: resolveSslConfig(env),
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    pool.on('error', (err) => {
      logger.error('Unexpected error on idle database client', err);
    });
  }

  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
