import crypto from 'crypto';
import {
  ChannelAccount,
  ChannelMessage,
  ChannelUser,
  JsonObject,
  MessageType,
  OutboundContent,
} from '../types';
import { AccountRepository, ChannelUserRepository, MessageRepository } from '../db/repositories';
import { AdapterProvider } from '../adapters/AdapterFactory';
import { ChannelAPIError, RateLimitError } from '../adapters/ChannelAdapter';
import { AccountNotFoundError, AppError } from '../middleware/errorHandler';
import { ChannelUserService } from './channelUserService';
import { ConversationSyncService } from './conversationSyncService';
import { Notifier, WebSocketEvent, accountGroup } from './websocketService';

export interface SendOptions {
  /** Root message of the retry chain when this send is a retry */
  retryOf?: string;
}

export interface SendOutcome {
  message: ChannelMessage;
  conversationId: string | null;
}

export const outboundMessageType = (content: OutboundContent): MessageType => content.kind;

export const describeContent = (content: OutboundContent): JsonObject =>
  content.kind === 'text' ? { kind: content.kind, text: content.text } : { kind: content.kind, url: content.url };

/** Outbound content equivalent to a stored message, for resending it */
export const contentOf = (message: ChannelMessage): OutboundContent | null => {
  switch (message.messageType) {
    case 'text':
      return message.text ? { kind: 'text', text: message.text } : null;
    case 'image':
    case 'video':
    case 'audio':
      return message.mediaUrl ? { kind: message.messageType, url: message.mediaUrl } : null;
    default:
      return null;
  }
};

const failureCode = (error: unknown): string => {
  if (error instanceof ChannelAPIError) {
    return error.platformCode || (error.upstreamStatus ? String(error.upstreamStatus) : error.code);
  }
  if (error instanceof AppError) {
    return error.code;
  }
  return 'SEND_FAILED';
};

/**
 * Outbound sends. The pending row is written before the network call, so every
 * attempt is on record whatever the outcome.
 */
export class ChannelMessageService {
  constructor(
    private readonly accounts: AccountRepository,
    private readonly users: ChannelUserRepository,
    private readonly messages: MessageRepository,
    private readonly adapters: AdapterProvider,
    private readonly userService: ChannelUserService,
    private readonly conversationSync: ConversationSyncService,
    private readonly notifier: Notifier,
    private readonly now: () => Date = () => new Date()
  ) {}

  async sendToRecipient(accountId: string, recipientId: string, content: OutboundContent): Promise<SendOutcome> {
    const account = await this.accounts.findById(accountId);
    if (!account) {
      throw new AccountNotFoundError(accountId);
    }

    const user = await this.userService.getOrCreateUser(account, recipientId);
    return this.sendMessage(account, user, content);
  }

  /**
   * pending → sent on success. Any failure other than a spent rate limit moves the
   * message to failed; the error is rethrown in both cases.
   */
  async sendMessage(
    account: ChannelAccount,
    user: ChannelUser,
    content: OutboundContent,
    options: SendOptions = {}
  ): Promise<SendOutcome> {
    const createdAt = this.now();
    const { message: pending } = await this.messages.create({
      messageId: `out_${crypto.randomUUID()}`,
      platformMessageId: '',
      accountId: account.id,
      channelUserId: user.id,
      messageType: outboundMessageType(content),
      direction: 'outbound',
      status: 'pending',
      text: content.kind === 'text' ? content.text : '',
      mediaUrl: content.kind === 'text' ? '' : content.url,
      mediaType: content.kind === 'text' ? '' : content.kind,
      storyId: '',
      payload: describeContent(content),
      timestamp: createdAt,
      retryOf: options.retryOf ?? null,
    });

    let platformMessageId: string;
    try {
      const result = await this.adapters.getAdapter(account.channel).sendMessage(account, user.platformUserId, content);
      platformMessageId = result.platformMessageId;
    } catch (error) {
      if (error instanceof RateLimitError) {
        console.warn(`[messages] Send of ${pending.messageId} deferred: ${error.message}`);
        throw error;
      }

      const errorMessage = error instanceof Error ? error.message : String(error);
      await this.messages.markFailed(pending.id, failureCode(error), errorMessage);
      console.error(`[messages] Send of ${pending.messageId} to ${user.platformUserId} failed: ${errorMessage}`);
      throw error;
    }

    const sentAt = this.now();
    const sent = (await this.messages.markSent(pending.id, platformMessageId, sentAt)) ?? pending;
    await this.accounts.incrementCounters(account.id, { sent: 1 });
    await this.users.recordInteraction(user.id, { sent: 1 }, sentAt);
    console.log(`[messages] Sent ${sent.messageId} on ${account.channel} as ${platformMessageId}`);

    const conversationId = await this.syncConversation(account, user, sent);

    this.notifier.publish(accountGroup(account.id), {
      type: WebSocketEvent.MESSAGE_STATUS_UPDATE,
      payload: {
        messageId: sent.id,
        conversationId,
        status: sent.status,
        timestamp: sentAt.toISOString(),
      },
    });

    return { message: { ...sent, conversationId }, conversationId };
  }

  private async syncConversation(
    account: ChannelAccount,
    user: ChannelUser,
    message: ChannelMessage
  ): Promise<string | null> {
    try {
      const { conversation } = await this.conversationSync.syncToConversation(account, user, message);
      return conversation.id;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.error(`[messages] Conversation sync failed for ${message.messageId}: ${errorMessage}`);
      return message.conversationId;
    }
  }
}
