import express, { Router } from 'express';
import { WebhookController } from '../controllers/webhookController';
import { validate, webhookSchemas } from '../middleware/validation';

/**
 * Webhook routes for all channels
 * Deliveries are read as raw bytes: the signature covers the exact body.
 */
export const createWebhookRoutes = (controller: WebhookController): Router => {
  const router = Router();

  /**
   * @route   GET /api/webhooks/:channel
   * @desc    Subscription verification handshake
   * @access  Public (verify token)
   */
  router.get('/:channel', validate(webhookSchemas.channel, 'params'), (req, res, next) =>
    controller.verify(req, res, next)
  );

  /**
   * @route   POST /api/webhooks/:channel
   * @desc    Event delivery
   * @access  Public (X-Hub-Signature-256)
   */
  router.post(
    '/:channel',
    express.raw({ type: '*/*', limit: '5mb' }),
    validate(webhookSchemas.channel, 'params'),
    (req, res, next) => controller.receive(req, res, next)
  );

  return router;
};
