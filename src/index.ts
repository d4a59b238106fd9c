/**
 * Service Entry Point
 */

import { Server } from 'http';
import { config } from './config';
import { logger } from './utils/logger';
import { createApp } from './app';
import { createPool, closePool, Pool } from './db';
import { PostgresAnswersDao, PostgresQuestionsDao } from './db/repositories';

let pool: Pool | null = null;
let server: Server | null = null;

// Startup
async function start(): Promise<void> {
  try {
    pool = createPool();

    // Test database connection
    await pool.query('SELECT NOW()');
    logger.info('Database connection verified');

    const app = createApp({
      questionsDao: new PostgresQuestionsDao(pool),
      answersDao: new PostgresAnswersDao(pool),
    });

    server = app.listen(config.port, config.host, () => {
      logger.info('Server started', {
        host: config.host,
        port: config.port,
        nodeEnv: config.nodeEnv,
      });
    });
  } catch (error) {
    logger.error('Failed to start server', error);
    process.exit(1);
  }
}

function closeServer(): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server) {
      resolve();
      return;
    }
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

// Graceful shutdown
async function shutdown(signal: NodeJS.Signals): Promise<void> {
  logger.info(`${signal} received, closing gracefully`);
  try {
    await closeServer();
    if (pool) {
      await closePool(pool);
    }
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', error);
    process.exit(1);
  }
}

process.on('SIGTERM', (signal) => {
  void shutdown(signal);
});

process.on('SIGINT', (signal) => {
  void shutdown(signal);
});

void start();
