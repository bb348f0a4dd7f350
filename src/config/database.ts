import { Pool, PoolConfig } from 'pg';
import config from './index';
import logger from '../utils/logger';

const getPoolOptions = (): PoolConfig => ({
  connectionString: config.database.url,
  max: Number(process.env.DATABASE_POOL_MAX) || 10,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 10000,
});

let pool: Pool | null = null;

// Create a singleton connection pool
export function getPool(): Pool {
  if (!pool) {
    pool = new Pool(getPoolOptions());

    pool.on('error', (error) => {
      logger.error('Unexpected error on idle PostgreSQL client:', error);
    });
  }
  return pool;
}

const MAX_RETRIES = 5;
const RETRY_DELAY = 5000; // 5 seconds

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Verify the database is reachable before the server starts taking requests
 */
export const initializeDatabase = async (retryCount = 0): Promise<Pool> => {
  try {
    const activePool = getPool();
    await activePool.query('SELECT 1');
    logger.info('Database connection initialized');
    return activePool;
  } catch (error) {
    logger.error(`Error initializing database connection (attempt ${retryCount + 1}/${MAX_RETRIES}):`, error);

    if (retryCount < MAX_RETRIES - 1) {
      logger.info(`Retrying in ${RETRY_DELAY / 1000} seconds...`);
      await sleep(RETRY_DELAY);
      return initializeDatabase(retryCount + 1);
    }

    logger.error('Max retries reached. Failed to initialize database connection.');
    throw error;
  }
};

export const closePool = async (): Promise<void> => {
  if (pool) {
    const closing = pool;
    pool = null;
    await closing.end();
  }
};
