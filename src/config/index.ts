import dotenv from 'dotenv';
import logger from '../utils/logger';
import { FailMode } from '../services/scraper/utils/FailPolicy';

// Load environment variables always
const result = dotenv.config();
if (result.error) {
  logger.debug(`No .env file loaded: ${result.error.message}`);
} else {
  logger.debug('Environment variables loaded from .env file');
}

// Sent on every outbound request, robots.txt rules are matched against it too
const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36';

const parseFailMode = (value: string | undefined): FailMode =>
  value === 'closed' ? 'closed' : 'open';

const config = {
  server: {
    port: Number(process.env.PORT) || 5000,
    nodeEnv: process.env.NODE_ENV || 'development',
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    // Comma-separated scraper components to silence, e.g. "robots,permission"
    disabledTags: (process.env.LOG_DISABLED_TAGS || '')
      .split(',')
      .map(tag => tag.trim())
      .filter(Boolean),
  },
  security: {
    corsOrigin: process.env.CORS_ORIGIN || '*',
  },
  scraper: {
    userAgent: process.env.SCRAPER_USER_AGENT || DEFAULT_USER_AGENT,
    robotsFailMode: parseFailMode(process.env.ROBOTS_FAIL_MODE),
    probeTimeoutMs: Number(process.env.PROBE_TIMEOUT_MS) || 5000, // robots.txt and HEAD probes
    fetchTimeoutMs: Number(process.env.FETCH_TIMEOUT_MS) || 15000,
    maxTextLength: Number(process.env.MAX_TEXT_LENGTH) || 12000, // Characters
    minTextLength: 100, // Characters
  },
  rateLimit: {
    maxRequests: Number(process.env.RATE_LIMIT_MAX_REQUESTS) || 60,
    windowMs: Number(process.env.RATE_LIMIT_WINDOW_MS) || 60000, // 1 minute
  },
  bedrock: {
    region: process.env.AWS_REGION || 'us-east-1',
    modelId: process.env.BEDROCK_MODEL_ID || 'anthropic.claude-3-haiku-20240307-v1:0',
    maxTokens: Number(process.env.BEDROCK_MAX_TOKENS) || 2048,
    requestTimeoutMs: Number(process.env.BEDROCK_TIMEOUT_MS) || 60000,
  },
  database: {
    url: process.env.DATABASE_URL || '',
    table: 'entities',
  },
};

export type AppConfig = typeof config;

/**
 * Fail fast when the server is started without the settings it cannot run without.
 * Only the server bootstrap calls this; the CLI and tests never touch the store.
 */
export function assertRequiredEnv(): void {
  const requiredEnvVars = ['DATABASE_URL'];
  const missingEnvVars = requiredEnvVars.filter((envVar) => !process.env[envVar]);
  if (missingEnvVars.length > 0) {
    logger.error(`Missing required environment variables: ${missingEnvVars.join(', ')}`);
    process.exit(1);
  }
}

export default config;
