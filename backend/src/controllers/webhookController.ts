import { Request, NextFunction } from 'express';
import { Channel, isChannel } from '../types';
import { MalformedPayloadError, ValidationError } from '../middleware/errorHandler';
import { WebhookIngressService } from '../services/webhookIngressService';

const queryString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

const headerString = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

/** The parts of an Express request the webhook handlers read */
export type WebhookRequest = Pick<Request, 'params' | 'query' | 'body' | 'headers'>;

/** What the handlers write to; an Express Response satisfies it */
export interface ReplyWriter {
  status(code: number): ReplyWriter;
  type(contentType: string): ReplyWriter;
  send(body: string): ReplyWriter;
  json(body: unknown): ReplyWriter;
}

export const channelParam = (req: Pick<Request, 'params'>): Channel => {
  const { channel } = req.params;
  if (!isChannel(channel)) {
    throw new ValidationError(`Unsupported channel: ${channel}`);
  }
  return channel;
};

/**
 * Controller for platform webhook endpoints
 */
export class WebhookController {
  constructor(private readonly ingress: WebhookIngressService) {}

  /**
   * Subscription handshake; the challenge is echoed back as plain text
   * @route GET /api/webhooks/:channel
   */
  async verify(req: WebhookRequest, res: ReplyWriter, next: NextFunction): Promise<void> {
    try {
      const challenge = await this.ingress.verify(channelParam(req), {
        mode: queryString(req.query['hub.mode']),
        verifyToken: queryString(req.query['hub.verify_token']),
        challenge: queryString(req.query['hub.challenge']),
      });
      res.status(200).type('text/plain').send(challenge);
    } catch (error) {
      next(error);
    }
  }

  /**
   * Signed event delivery. Once the events are recorded the platform gets a 200,
   * whatever happened while processing them.
   * @route POST /api/webhooks/:channel
   */
  async receive(req: WebhookRequest, res: ReplyWriter, next: NextFunction): Promise<void> {
    try {
      const channel = channelParam(req);
      const rawBody: unknown = req.body;
      if (!Buffer.isBuffer(rawBody) || rawBody.length === 0) {
        throw new MalformedPayloadError('Webhook body is empty');
      }

      const result = await this.ingress.receive(channel, rawBody, headerString(req.headers['x-hub-signature-256']));
      res.status(200).json({
        status: 'ok',
        events: result.events,
        results: result.results,
      });
    } catch (error) {
      next(error);
    }
  }
}
