import type { JobId, JobOptions } from 'bull';
import { ChannelMessage, OutboundContent } from '../types';
import { AccountRepository, ChannelUserRepository, MessageRepository } from '../db/repositories';
import { AppError } from '../middleware/errorHandler';
import { wasSent } from '../utils/messageStatus';
import { ChannelMessageService, SendOutcome, contentOf } from './channelMessageService';

export interface MessageRetryJobData {
  /** Local id of the failed message */
  messageId: string;
}

/** The part of a Bull queue the scheduler uses */
export interface RetryQueue {
  add(data: MessageRetryJobData, options: JobOptions): Promise<{ id: JobId }>;
}

export interface RetrySettings {
  delayMs: number;
  maxRetries: number;
}

export class MessageNotRetryableError extends AppError {
  constructor(messageId: string, reason: string) {
    super(`Message ${messageId} cannot be retried: ${reason}`, 409, 'NOT_RETRYABLE', false, { messageId, reason });
    this.name = 'MessageNotRetryableError';
  }
}

interface RetryChain {
  /** The message whose retry was requested */
  message: ChannelMessage;
  /** The original send; its retry count is the budget of the whole chain */
  root: ChannelMessage;
  content: OutboundContent;
}

/**
 * Scheduler for resending failed outbound messages. A retry never revives the
 * failed row: it sends the same content as a new message linked to the root of
 * the chain. The chain is done once any of its messages reached the recipient.
 */
export class MessageRetryService {
  constructor(
    private readonly queue: RetryQueue,
    private readonly messages: MessageRepository,
    private readonly accounts: AccountRepository,
    private readonly users: ChannelUserRepository,
    private readonly sender: ChannelMessageService,
    private readonly settings: RetrySettings
  ) {}

  async scheduleRetry(messageId: string): Promise<{ jobId: string }> {
    const { message, root } = await this.loadRetryable(messageId);
    const attempt = root.retryCount + 1;

    const options: JobOptions = {
      delay: this.settings.delayMs,
      jobId: `retry:${root.id}:${attempt}`,
    };
    const job = await this.queue.add({ messageId: message.id }, options);

    console.log(`[retry] Scheduled retry ${attempt}/${this.settings.maxRetries} for ${root.messageId}`);
    return { jobId: String(job.id) };
  }

  async processRetry(data: MessageRetryJobData): Promise<SendOutcome> {
    const { message, root, content } = await this.loadRetryable(data.messageId);
    const retryCount = await this.messages.incrementRetryCount(root.id);
    if (retryCount > this.settings.maxRetries) {
      throw new MessageNotRetryableError(message.id, 'retry limit reached');
    }

    const account = await this.accounts.findById(message.accountId);
    const user = await this.users.findById(message.channelUserId);
    if (!account || !user) {
      throw new MessageNotRetryableError(message.id, 'account or recipient no longer exists');
    }

    console.log(`[retry] Resending ${root.messageId} (attempt ${retryCount})`);
    return this.sender.sendMessage(account, user, content, { retryOf: root.id });
  }

  private async loadRetryable(messageId: string): Promise<RetryChain> {
    const message = await this.messages.findById(messageId);
    if (!message) {
      throw new AppError(`Message ${messageId} not found`, 404, 'MESSAGE_NOT_FOUND');
    }
    if (message.direction !== 'outbound' || message.status !== 'failed') {
      throw new MessageNotRetryableError(message.id, `status is ${message.status}`);
    }

    const root = (message.retryOf ? await this.messages.findById(message.retryOf) : null) ?? message;
    const chain = [root, ...(await this.messages.findRetriesOf(root.id))];
    const delivered = chain.find((attempt) => wasSent(attempt.status));
    if (delivered) {
      throw new MessageNotRetryableError(message.id, `already sent as ${delivered.messageId}`);
    }
    if (root.retryCount >= this.settings.maxRetries) {
      throw new MessageNotRetryableError(message.id, 'retry limit reached');
    }

    const content = contentOf(message);
    if (!content) {
      throw new MessageNotRetryableError(message.id, `no resendable ${message.messageType} content`);
    }
    return { message, root, content };
  }
}
