import { ChannelAccount } from '../types';
import { AccountRepository } from '../db/repositories';
import { AdapterProvider } from '../adapters/AdapterFactory';
import { RateLimitError, UnsupportedOperationError } from '../adapters/ChannelAdapter';
import { ProcessResult, WebhookEventProcessor } from './webhookEventProcessor';

export interface PollResult {
  accountId: string;
  events: number;
  results: ProcessResult[];
}

export interface PollSweepSummary {
  polled: number;
  failed: number;
  events: number;
}

/**
 * Pulls inbound mail for polling channels and runs it through the webhook event
 * processor, so the Message-ID keyed event row deduplicates a mail fetched twice.
 */
export class MailboxPollingService {
  constructor(
    private readonly accounts: AccountRepository,
    private readonly adapters: AdapterProvider,
    private readonly processor: WebhookEventProcessor,
    private readonly batchSize: number,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * One fetch of up to `batchSize` unseen mails. They are acknowledged only after
   * every event has been recorded; a poll that stops early leaves them unseen.
   */
  async pollAccount(account: ChannelAccount): Promise<PollResult> {
    const adapter = this.adapters.getAdapter(account.channel);
    if (adapter.ingress !== 'polling') {
      throw new UnsupportedOperationError(account.channel, 'Inbox polling');
    }

    const receivedAt = this.now();
    const batch = await adapter.fetchInbox(account, this.batchSize);
    const events = adapter.parseDelivery(batch.envelope, receivedAt);

    const results: ProcessResult[] = [];
    for (const event of events) {
      results.push(await this.processor.process(account, event));
    }
    await adapter.acknowledgeInbox(account, batch.uids);

    if (events.length > 0) {
      console.log(`[mailbox] ${account.channel} account ${account.id}: ${events.length} mail(s) polled`);
    }
    return { accountId: account.id, events: events.length, results };
  }

  /** Sequential sweep over every monitored account on a polling channel */
  async pollAll(): Promise<PollSweepSummary> {
    const accounts = await this.accounts.listMonitored();
    const summary: PollSweepSummary = { polled: 0, failed: 0, events: 0 };

    for (const account of accounts) {
      if (this.adapters.getAdapter(account.channel).ingress !== 'polling') {
        continue;
      }

      try {
        const result = await this.pollAccount(account);
        summary.polled++;
        summary.events += result.events;
      } catch (error) {
        summary.failed++;
        if (error instanceof RateLimitError) {
          console.warn(`[mailbox] Poll for account ${account.id} deferred: ${error.message}`);
        } else {
          const message = error instanceof Error ? error.message : String(error);
          console.error(`[mailbox] Poll for account ${account.id} failed: ${message}`);
        }
      }
    }

    return summary;
  }
}
