import { RequestHandler, Router } from 'express';
import { MessageController } from '../controllers/messageController';
import { validate, messageSchemas } from '../middleware/validation';

export const createMessageRoutes = (controller: MessageController, authenticate: RequestHandler): Router => {
  const router = Router();

  // All message routes require authentication
  router.use(authenticate);

  /**
   * @route   POST /api/messages/send
   * @desc    Send a message to a channel user
   * @access  Protected
   */
  router.post('/send', validate(messageSchemas.sendMessage), (req, res, next) =>
    controller.sendMessage(req, res, next)
  );

  /**
   * @route   POST /api/messages/:messageId/retry
   * @desc    Schedule a resend of a failed message
   * @access  Protected
   */
  router.post('/:messageId/retry', validate(messageSchemas.messageId, 'params'), (req, res, next) =>
    controller.retryMessage(req, res, next)
  );

  return router;
};
