import { createServer } from 'http';
import { getConfig } from './config';
import pool from './config/database';
import { connectRedis } from './config/redis';
import {
  closeQueues,
  messageRetryQueue,
  registerMessageRetryProcessor,
  scheduleHealthChecks,
  scheduleMailboxPolling,
} from './config/queues';
import { runMigrations } from './db';
import { createContainer } from './container';
import { createApp } from './app';

// Initialize connections and start server
const startServer = async (): Promise<void> => {
  const config = getConfig();

  const redis = await connectRedis();
  console.log('[startup] Redis connected');

  await pool.query('SELECT NOW()');
  console.log('[startup] Database connected');

  await runMigrations(pool);

  const container = createContainer(config, { pool, redis, retryQueue: messageRetryQueue });
  const app = createApp(container);
  const httpServer = createServer(app);

  container.websocket.initialize(httpServer);
  registerMessageRetryProcessor(container.retryService);
  await scheduleHealthChecks(container.accountService, config.healthCheckIntervalMinutes);
  await scheduleMailboxPolling(container.pollingService, config.mailboxPolling.intervalSeconds);

  httpServer.listen(config.port, () => {
    console.log(`[startup] Server is running on port ${config.port}`);
    console.log(`[startup] Environment: ${config.nodeEnv}`);
  });

  // Graceful shutdown
  process.once('SIGTERM', () => {
    console.log('[shutdown] SIGTERM received, closing...');
    httpServer.close();
    container.websocket
      .shutdown()
      .then(() => closeQueues())
      .then(() => redis.quit())
      .then(() => pool.end())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('[shutdown] Shutdown failed:', error);
        process.exit(1);
      });
  });
};

startServer().catch((error: unknown) => {
  console.error('[startup] Failed to start server:', error);
  process.exit(1);
});
