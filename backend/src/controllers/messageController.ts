import { Request, Response, NextFunction } from 'express';
import { OutboundContent } from '../types';
import { ValidationError } from '../middleware/errorHandler';
import { ChannelMessageService } from '../services/channelMessageService';
import { MessageRetryService } from '../services/messageRetryService';
import { getObject, getString, toJsonValue } from '../utils/payload';

/**
 * Read the outbound content out of a validated send request
 */
export const outboundContentFrom = (body: unknown): OutboundContent => {
  const data = getObject(toJsonValue(body));
  const text = getString(data?.text);
  if (text) {
    return { kind: 'text', text };
  }

  const media = getObject(data?.media);
  const type = getString(media?.type);
  const url = getString(media?.url);
  if (url && (type === 'image' || type === 'video' || type === 'audio')) {
    return { kind: type, url };
  }

  throw new ValidationError('Either text or media is required');
};

/**
 * Controller for outbound message operations
 */
export class MessageController {
  constructor(
    private readonly messageService: ChannelMessageService,
    private readonly retryService: MessageRetryService
  ) {}

  /**
   * Send a message to a channel user
   * @route POST /api/messages/send
   */
  async sendMessage(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const body = getObject(toJsonValue(req.body));
      const accountId = getString(body?.accountId);
      const recipientId = getString(body?.recipientId);
      const content = outboundContentFrom(body);

      const { message, conversationId } = await this.messageService.sendToRecipient(accountId, recipientId, content);

      res.status(201).json({
        id: message.id,
        message_id: message.messageId,
        platform_message_id: message.platformMessageId,
        status: message.status,
        conversation_id: conversationId,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Schedule a resend of a failed message
   * @route POST /api/messages/:messageId/retry
   */
  async retryMessage(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { jobId } = await this.retryService.scheduleRetry(req.params.messageId);
      res.status(202).json({ status: 'scheduled', job_id: jobId });
    } catch (error) {
      next(error);
    }
  }
}
