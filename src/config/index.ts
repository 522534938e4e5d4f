import { config } from 'dotenv';

config();

function readInt(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export const PORT = readInt('PORT', 2020);
export const NODE_ENV = process.env.NODE_ENV ?? 'dev';
export const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

export const TOKEN = process.env.TOKEN ?? '';
export const SCRAPER_API_KEY = process.env.SCRAPER_API_KEY ?? '';
export const DATABASE_URL = process.env.DATABASE_URL;
export const PGSSLMODE = (process.env.PGSSLMODE || process.env.DATABASE_SSL || '').toLowerCase();
export const PGSSLROOTCERT = process.env.PGSSLROOTCERT || process.env.DATABASE_SSL_CA;

export const WEBHOOK_DOMAIN = process.env.WEBHOOK_DOMAIN;
export const WEBHOOK_PATH = process.env.WEBHOOK_PATH || '/telegram';

export const FRESHNESS_WINDOW_MS = readInt('FRESHNESS_WINDOW_MS', 30 * 60 * 1000);
export const PAGE_SIZE = Math.max(1, readInt('PAGE_SIZE', 5));
export const CLEANUP_DELAY_MS = readInt('CLEANUP_DELAY_MS', 24 * 60 * 60 * 1000);
export const SEND_PACING_MS = readInt('SEND_PACING_MS', 1000);
export const PROMPT_TIMEOUT_MS = readInt('PROMPT_TIMEOUT_MS', 5 * 60 * 1000);
export const LATEST_COOLDOWN_MS = readInt('LATEST_COOLDOWN_MS', 10 * 1000);
export const TELEGRAM_MAX_PER_SECOND = Math.max(1, readInt('TELEGRAM_MAX_PER_SECOND', 25));

export const PROVIDER_POST_LIMIT = Math.max(1, readInt('PROVIDER_POST_LIMIT', 20));
export const PROVIDER_TIMEOUT_MS = readInt('PROVIDER_TIMEOUT_MS', 15 * 1000);
export const PROVIDER_MAX_RETRIES = readInt('PROVIDER_MAX_RETRIES', 2);
export const X_API_HOST = process.env.X_API_HOST || 'twitter-x-api.p.rapidapi.com';
export const X_API_PATH = process.env.X_API_PATH || '/api/user/tweets';
export const IG_API_HOST = process.env.IG_API_HOST || 'instagram-scraper-api2.p.rapidapi.com';
export const IG_API_PATH = process.env.IG_API_PATH || '/v1/web_profile_info';

export function validateConfig(): void {
  const requiredEnvVars = {
    TOKEN,
    SCRAPER_API_KEY,
  };

  for (const [key, value] of Object.entries(requiredEnvVars)) {
    if (!value) {
      throw new Error(`${key} environment variable is required`);
    }
  }

  if (SCRAPER_API_KEY.length < 10) {
    console.warn('SCRAPER_API_KEY appears to be invalid (too short)');
  }
}
