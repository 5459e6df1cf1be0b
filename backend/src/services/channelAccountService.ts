import { ChannelAccount, JsonObject } from '../types';
import { AccountProfileUpdate, AccountRepository } from '../db/repositories';
import { AdapterProvider } from '../adapters/AdapterFactory';
import { AccountInfo, RateLimitError } from '../adapters/ChannelAdapter';
import { AccountNotFoundError } from '../middleware/errorHandler';

export interface HealthCheckResult {
  healthy: boolean;
  message: string;
}

export interface HealthSweepSummary {
  checked: number;
  healthy: number;
  unhealthy: number;
}

const profileUpdateFrom = (info: AccountInfo): AccountProfileUpdate => {
  const update: AccountProfileUpdate = {};
  if (info.username !== undefined) update.username = info.username;
  if (info.name !== undefined) update.name = info.name;
  if (info.biography !== undefined) update.biography = info.biography;
  if (info.website !== undefined) update.website = info.website;
  if (info.followersCount !== undefined) update.followersCount = info.followersCount;
  if (info.profilePictureUrl !== undefined) update.profilePictureUrl = info.profilePictureUrl;
  return update;
};

/**
 * Account-level platform operations: health checks, webhook subscription and
 * remote conversation listings
 */
export class ChannelAccountService {
  constructor(
    private readonly accounts: AccountRepository,
    private readonly adapters: AdapterProvider,
    private readonly now: () => Date = () => new Date()
  ) {}

  async getAccount(accountId: string): Promise<ChannelAccount> {
    const account = await this.accounts.findById(accountId);
    if (!account) {
      throw new AccountNotFoundError(accountId);
    }
    return account;
  }

  /**
   * Read-only account fetch. Success refreshes the cached profile and is the only
   * way an account becomes healthy again; a spent rate limit leaves health untouched.
   */
  async healthCheck(account: ChannelAccount): Promise<HealthCheckResult> {
    try {
      const info = await this.adapters.getAdapter(account.channel).getAccountInfo(account);
      await this.accounts.updateProfile(account.id, profileUpdateFrom(info));
      await this.accounts.updateHealth(account.id, {
        status: 'active',
        isHealthy: true,
        lastErrorMessage: '',
        lastHealthCheck: this.now(),
      });
      return { healthy: true, message: 'Account is healthy' };
    } catch (error) {
      if (error instanceof RateLimitError) {
        console.warn(`[health] Check for account ${account.id} deferred: ${error.message}`);
        return { healthy: account.isHealthy, message: `Health check deferred: ${error.message}` };
      }

      const message = error instanceof Error ? error.message : String(error);
      await this.accounts.updateHealth(account.id, {
        status: 'error',
        isHealthy: false,
        lastErrorMessage: message,
        lastHealthCheck: this.now(),
      });
      console.error(`[health] Account ${account.id} (${account.channel}) unhealthy: ${message}`);
      return { healthy: false, message };
    }
  }

  /** Sequential sweep over every monitored account */
  async checkAll(): Promise<HealthSweepSummary> {
    const accounts = await this.accounts.listMonitored();
    const summary: HealthSweepSummary = { checked: 0, healthy: 0, unhealthy: 0 };

    for (const account of accounts) {
      const result = await this.healthCheck(account);
      summary.checked++;
      if (result.healthy) {
        summary.healthy++;
      } else {
        summary.unhealthy++;
      }
    }

    console.log(`[health] Checked ${summary.checked} account(s): ${summary.healthy} healthy, ${summary.unhealthy} unhealthy`);
    return summary;
  }

  async subscribeWebhook(account: ChannelAccount, webhookUrl: string, fields?: string[]): Promise<JsonObject> {
    const response = await this.adapters.getAdapter(account.channel).subscribeWebhook(account, webhookUrl, fields);
    await this.accounts.markWebhookSubscribed(account.id, webhookUrl);
    console.log(`[accounts] Subscribed ${account.channel} account ${account.id} to ${webhookUrl}`);
    return response;
  }

  getConversations(account: ChannelAccount, limit?: number): Promise<JsonObject> {
    return this.adapters.getAdapter(account.channel).getConversations(account, limit);
  }

  getConversationMessages(account: ChannelAccount, conversationId: string, limit?: number): Promise<JsonObject> {
    return this.adapters.getAdapter(account.channel).getConversationMessages(account, conversationId, limit);
  }
}
