import { Request, Response, NextFunction } from 'express';
import { API_OPERATIONS } from '../adapters/ChannelAdapter';
import { ChannelAccountService } from '../services/channelAccountService';
import { MailboxPollingService } from '../services/mailboxPollingService';
import { PlatformRateLimitService } from '../services/platformRateLimitService';
import { getArray, getNumber, getObject, getString, toJsonValue } from '../utils/payload';

/**
 * Controller for channel account operations
 */
export class AccountController {
  constructor(
    private readonly accountService: ChannelAccountService,
    private readonly pollingService: MailboxPollingService,
    private readonly rateLimiter: PlatformRateLimitService,
    private readonly webhookBaseUrl: string
  ) {}

  /**
   * Run a health check now
   * @route POST /api/accounts/:accountId/health-check
   */
  async healthCheck(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const account = await this.accountService.getAccount(req.params.accountId);
      const result = await this.accountService.healthCheck(account);
      res.json(result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * Subscribe the app to the account's webhook fields
   * @route POST /api/accounts/:accountId/subscribe-webhook
   */
  async subscribeWebhook(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const account = await this.accountService.getAccount(req.params.accountId);
      const body = getObject(toJsonValue(req.body));
      const webhookUrl = getString(body?.webhookUrl) || `${this.webhookBaseUrl}/api/webhooks/${account.channel}`;
      const fields = getArray(body?.fields)
        .map((field) => getString(field))
        .filter((field) => field !== '');

      const response = await this.accountService.subscribeWebhook(
        account,
        webhookUrl,
        fields.length > 0 ? fields : undefined
      );
      res.json({ webhook_url: webhookUrl, response });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Pull pending mail now instead of waiting for the next sweep
   * @route POST /api/accounts/:accountId/poll
   */
  async poll(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const account = await this.accountService.getAccount(req.params.accountId);
      res.json(await this.pollingService.pollAccount(account));
    } catch (error) {
      next(error);
    }
  }

  /**
   * Conversations as listed by the platform
   * @route GET /api/accounts/:accountId/conversations
   */
  async getConversations(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const account = await this.accountService.getAccount(req.params.accountId);
      const limit = getNumber(toJsonValue(req.query.limit));
      res.json(await this.accountService.getConversations(account, limit));
    } catch (error) {
      next(error);
    }
  }

  /**
   * @route GET /api/accounts/:accountId/conversations/:conversationId/messages
   */
  async getConversationMessages(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const account = await this.accountService.getAccount(req.params.accountId);
      const limit = getNumber(toJsonValue(req.query.limit));
      res.json(await this.accountService.getConversationMessages(account, req.params.conversationId, limit));
    } catch (error) {
      next(error);
    }
  }

  /**
   * Remaining call budget per remote operation
   * @route GET /api/accounts/:accountId/rate-limits
   */
  async getRateLimits(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const account = await this.accountService.getAccount(req.params.accountId);
      const statuses = await Promise.all(
        API_OPERATIONS.map(async (operation) => ({
          operation,
          ...(await this.rateLimiter.getStatus(account.id, operation)),
        }))
      );
      res.json({ accountId: account.id, rateLimits: statuses });
    } catch (error) {
      next(error);
    }
  }
}
