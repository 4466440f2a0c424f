import dotenv from 'dotenv';
dotenv.config();

import app from './app';
import { initializeDatabase } from './config/database';
import logger from './config/logger';
import { resultCache } from './services/resultCache';
import { APP_VERSION } from './version';
import { rssSyncWorker } from './workers';

const PORT = process.env.PORT || 5055;

// Initialize database
try {
  initializeDatabase();
  logger.info('Database initialized successfully');
} catch (error) {
  logger.error('Failed to initialize database:', error);
  process.exit(1);
}

rssSyncWorker.start();

const server = app.listen(PORT, () => {
  logger.info(`Ringside API v${APP_VERSION} listening on port ${PORT}`);
  logger.info(`Environment: ${process.env.NODE_ENV || 'development'}`);
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} signal received: closing HTTP server`);

  try {
    await rssSyncWorker.stop();
  } catch (error) {
    logger.error('Error stopping RSS sync worker:', error);
  }
  resultCache.close();

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch(error => logger.error('Shutdown failed:', error));
});

process.on('SIGINT', () => {
  shutdown('SIGINT').catch(error => logger.error('Shutdown failed:', error));
});
