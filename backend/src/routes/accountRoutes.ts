import { RequestHandler, Router } from 'express';
import { AccountController } from '../controllers/accountController';
import { validate, accountSchemas } from '../middleware/validation';

export const createAccountRoutes = (controller: AccountController, authenticate: RequestHandler): Router => {
  const router = Router();

  router.use(authenticate);

  /**
   * @route   POST /api/accounts/:accountId/health-check
   * @access  Protected
   */
  router.post('/:accountId/health-check', validate(accountSchemas.accountId, 'params'), (req, res, next) =>
    controller.healthCheck(req, res, next)
  );

  /**
   * @route   POST /api/accounts/:accountId/subscribe-webhook
   * @access  Protected
   */
  router.post(
    '/:accountId/subscribe-webhook',
    validate(accountSchemas.accountId, 'params'),
    validate(accountSchemas.subscribeWebhook),
    (req, res, next) => controller.subscribeWebhook(req, res, next)
  );

  /**
   * @route   POST /api/accounts/:accountId/poll
   * @access  Protected
   */
  router.post('/:accountId/poll', validate(accountSchemas.accountId, 'params'), (req, res, next) =>
    controller.poll(req, res, next)
  );

  /**
   * @route   GET /api/accounts/:accountId/conversations
   * @access  Protected
   */
  router.get(
    '/:accountId/conversations',
    validate(accountSchemas.accountId, 'params'),
    validate(accountSchemas.listQuery, 'query'),
    (req, res, next) => controller.getConversations(req, res, next)
  );

  /**
   * @route   GET /api/accounts/:accountId/conversations/:conversationId/messages
   * @access  Protected
   */
  router.get(
    '/:accountId/conversations/:conversationId/messages',
    validate(accountSchemas.conversationParams, 'params'),
    validate(accountSchemas.listQuery, 'query'),
    (req, res, next) => controller.getConversationMessages(req, res, next)
  );

  /**
   * @route   GET /api/accounts/:accountId/rate-limits
   * @access  Protected
   */
  router.get('/:accountId/rate-limits', validate(accountSchemas.accountId, 'params'), (req, res, next) =>
    controller.getRateLimits(req, res, next)
  );

  return router;
};
