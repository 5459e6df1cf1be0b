import express, { Application } from 'express';
import cors from 'cors';
import { Container } from './container';
import { errorHandler } from './middleware/errorHandler';
import { getHelmetConfig } from './middleware/security';
import { authenticateToken } from './middleware/auth';
import { WebhookController } from './controllers/webhookController';
import { MessageController } from './controllers/messageController';
import { AccountController } from './controllers/accountController';
import { createWebhookRoutes } from './routes/webhookRoutes';
import { createMessageRoutes } from './routes/messageRoutes';
import { createAccountRoutes } from './routes/accountRoutes';

export const createApp = (container: Container): Application => {
  const { config, infra, websocket } = container;
  const app = express();

  // Security middleware (must be first)
  app.use(getHelmetConfig(config.nodeEnv === 'production'));

  app.use(
    cors({
      origin: config.frontendUrl,
      credentials: true,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );

  // Webhooks parse their own raw body, so they are mounted before the JSON parser
  app.use('/api/webhooks', createWebhookRoutes(new WebhookController(container.ingress)));

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', async (_req, res) => {
    const timestamp = new Date().toISOString();
    try {
      await infra.pool.query('SELECT 1');
      const redisStatus = infra.redis.isReady ? 'connected' : 'disconnected';

      res.status(redisStatus === 'connected' ? 200 : 503).json({
        status: redisStatus === 'connected' ? 'ok' : 'degraded',
        timestamp,
        services: {
          database: 'connected',
          redis: redisStatus,
          websocket: {
            status: websocket.isInitialized() ? 'active' : 'inactive',
            connections: websocket.getTotalConnections(),
          },
        },
      });
    } catch (error) {
      console.error('[health] Database check failed:', error);
      res.status(503).json({
        status: 'error',
        timestamp,
        error: 'Service unavailable',
      });
    }
  });

  const authenticate = authenticateToken(container.authService);
  app.use(
    '/api/messages',
    createMessageRoutes(new MessageController(container.messageService, container.retryService), authenticate)
  );
  app.use(
    '/api/accounts',
    createAccountRoutes(
      new AccountController(
        container.accountService,
        container.pollingService,
        container.rateLimiter,
        config.webhookBaseUrl
      ),
      authenticate
    )
  );

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
};
