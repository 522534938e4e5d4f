import { promises } from 'fs';
import { Pool } from 'pg';
import logger from './logger';

export interface PoolSettings {
  connectionString: string;
  sslMode?: string;
  sslRootCert?: string;
}

type SslSetting = false | { rejectUnauthorized?: boolean; ca?: string };

async function resolveSsl(sslMode?: string, rootCertPath?: string): Promise<SslSetting> {
  let ssl: SslSetting = false;

  if (sslMode === 'require') {
    ssl = { rejectUnauthorized: true };
  }

  if (rootCertPath) {
    try {
      const ca = await promises.readFile(rootCertPath, 'utf8');
      ssl = { ca, rejectUnauthorized: true };
    } catch (e) {
      logger.warn('Failed to read CA certificate: unable to access the specified path.', e);
    }
  }

  return ssl;
}

export async function createPool(settings: PoolSettings): Promise<Pool> {
  const pool = new Pool({
    connectionString: settings.connectionString,
    ssl: await resolveSsl(settings.sslMode, settings.sslRootCert),
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
    maxUses: 7500,
  });

  pool.on('error', (err) => {
    logger.error('Postgres Pool Error:', err);
  });

  pool.on('connect', () => {
    logger.debug('New database connection established');
  });

  pool.on('remove', () => {
    logger.debug('Database connection removed from pool');
  });

  return pool;
}
