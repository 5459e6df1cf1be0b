import {
  Channel,
  ChannelAccount,
  ChannelMessage,
  ChannelUser,
  Conversation,
  JsonObject,
  WebhookEvent,
  WebhookEventType,
} from '../types';
import {
  ChannelEvent,
  MessageReceivedEvent,
  MessageStatusEvent,
  MessagesDeliveredEvent,
  MessagesReadEvent,
  StoryInsightEvent,
} from '../adapters/ChannelAdapter';
import { CounterDelta, Repositories } from '../db/repositories';
import { MalformedPayloadError } from '../middleware/errorHandler';
import { contentHash, truncate } from '../utils/payload';
import { ChannelUserService } from './channelUserService';
import { ConversationSyncService } from './conversationSyncService';
import { Notifier, WebSocketEvent, accountGroup } from './websocketService';

export type ProcessOutcome = 'processed' | 'duplicate' | 'ignored' | 'failed';

export interface ProcessResult {
  eventId: string;
  outcome: ProcessOutcome;
}

interface HandlerResult {
  processedData: JsonObject;
  links?: { channelUserId?: string; channelMessageId?: string };
}

export const classifyEvent = (event: ChannelEvent): WebhookEventType => {
  switch (event.kind) {
    case 'message':
      return 'messages';
    case 'read':
      return 'messaging_seen';
    case 'delivery':
    case 'status':
      return 'message_status';
    case 'story_insight':
      return 'story_insights';
    case 'unknown':
      return 'unknown';
  }
};

/**
 * Idempotency key for one event. Platform ids are used wherever the event carries
 * them; anything else falls back to a hash of the event item.
 */
export const eventIdFor = (channel: Channel, event: ChannelEvent): string => {
  const prefix = `${channel}:${event.entryId}`;
  const hashed = `${prefix}:hash:${contentHash(event.raw)}`;

  switch (event.kind) {
    case 'message':
      return event.messageId ? `${prefix}:msg:${event.messageId}` : hashed;
    case 'read':
      return `${prefix}:read:${event.senderId}:${event.watermark.getTime()}`;
    case 'delivery':
      return event.watermark && event.senderId
        ? `${prefix}:delivery:${event.senderId}:${event.watermark.getTime()}`
        : hashed;
    case 'status':
      return event.messageId ? `${prefix}:status:${event.messageId}:${event.status}` : hashed;
    case 'story_insight':
      return `${prefix}:story:${event.storyId}`;
    case 'unknown':
      return hashed;
  }
};

/** Events that are our own sends reflected back by the platform */
export const isEcho = (account: ChannelAccount, event: ChannelEvent): boolean =>
  event.kind === 'message' &&
  (event.isEcho ||
    event.senderId === account.platformAccountId ||
    (account.pageId !== '' && event.senderId === account.pageId));

/**
 * Turns parsed channel events into durable state. The WebhookEvent insert is the
 * idempotency boundary; failures after it are recorded on the row and never thrown.
 */
export class WebhookEventProcessor {
  constructor(
    private readonly repos: Repositories,
    private readonly userService: ChannelUserService,
    private readonly conversationSync: ConversationSyncService,
    private readonly notifier: Notifier,
    private readonly now: () => Date = () => new Date()
  ) {}

  async process(account: ChannelAccount, event: ChannelEvent): Promise<ProcessResult> {
    const eventId = eventIdFor(account.channel, event);
    const record = await this.repos.webhookEvents.insertIfAbsent({
      eventId,
      eventType: classifyEvent(event),
      accountId: account.id,
      rawData: event.raw,
    });

    if (!record) {
      console.log(`[webhook] Duplicate event ${eventId}, skipping`);
      return { eventId, outcome: 'duplicate' };
    }

    try {
      if (event.kind === 'unknown') {
        console.warn(`[webhook] Ignoring event ${eventId}: ${event.reason} ${truncate(JSON.stringify(event.raw))}`);
        await this.repos.webhookEvents.markIgnored(record.id, { reason: event.reason });
        return { eventId, outcome: 'ignored' };
      }

      if (isEcho(account, event)) {
        await this.repos.webhookEvents.markIgnored(record.id, { reason: 'echo' });
        return { eventId, outcome: 'ignored' };
      }

      await this.repos.webhookEvents.markProcessing(record.id);
      const result = await this.handle(account, event);
      await this.repos.webhookEvents.markProcessed(record.id, result.processedData, result.links);
      return { eventId, outcome: 'processed' };
    } catch (error) {
      await this.recordFailure(record, error);
      return { eventId, outcome: 'failed' };
    }
  }

  private async recordFailure(record: WebhookEvent, error: unknown): Promise<void> {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[webhook] Processing ${record.eventId} failed: ${message}`);
    try {
      await this.repos.webhookEvents.markFailed(record.id, message);
    } catch (markError) {
      console.error(`[webhook] Could not record failure of ${record.eventId}:`, markError);
    }
  }

  private handle(account: ChannelAccount, event: Exclude<ChannelEvent, { kind: 'unknown' }>): Promise<HandlerResult> {
    switch (event.kind) {
      case 'message':
        return this.handleMessage(account, event);
      case 'read':
        return this.handleRead(account, event);
      case 'delivery':
        return this.handleDelivery(account, event);
      case 'status':
        return this.handleStatus(account, event);
      case 'story_insight':
        return this.handleStoryInsight(account, event);
    }
  }

  private async handleMessage(account: ChannelAccount, event: MessageReceivedEvent): Promise<HandlerResult> {
    if (!event.senderId) {
      throw new MalformedPayloadError('Message event without sender id');
    }

    const user = await this.userService.getOrCreateUser(account, event.senderId, {
      profileName: event.profileName,
    });

    const { content } = event;
    const { message, created } = await this.repos.messages.create({
      messageId: eventIdFor(account.channel, event),
      platformMessageId: event.messageId,
      accountId: account.id,
      channelUserId: user.id,
      messageType: content.messageType,
      direction: 'inbound',
      status: 'delivered',
      text: content.text,
      mediaUrl: content.mediaUrl,
      mediaType: content.mediaType,
      storyId: content.storyId,
      payload: event.raw,
      timestamp: event.timestamp,
      deliveredAt: event.timestamp,
    });

    if (created) {
      const isStoryReply = content.messageType === 'story_reply';
      const delta: CounterDelta = { received: 1, storyReplies: isStoryReply ? 1 : 0 };
      await this.repos.accounts.incrementCounters(account.id, delta);
      await this.repos.users.recordInteraction(user.id, delta, event.timestamp);

      if (isStoryReply && content.storyId) {
        const story = await this.repos.stories.findByStoryId(account.id, content.storyId);
        if (story) {
          await this.repos.stories.incrementReplyCount(story.id);
        }
      }

      const conversation = await this.syncConversation(account, user, message);
      this.notifier.publish(accountGroup(account.id), {
        type: WebSocketEvent.NEW_MESSAGE,
        payload: {
          message: conversation ? { ...message, conversationId: conversation.id } : message,
          conversation: conversation ?? undefined,
          timestamp: this.now().toISOString(),
        },
      });
    }

    return {
      processedData: {
        messageId: message.messageId,
        messageType: message.messageType,
        channelUserId: user.id,
        created,
      },
      links: { channelUserId: user.id, channelMessageId: message.id },
    };
  }

  private async syncConversation(
    account: ChannelAccount,
    user: ChannelUser,
    message: ChannelMessage
  ): Promise<Conversation | null> {
    try {
      const { conversation } = await this.conversationSync.syncToConversation(account, user, message);
      return conversation;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.error(`[webhook] Conversation sync failed for ${message.messageId}: ${errorMessage}`);
      return null;
    }
  }

  private async handleRead(account: ChannelAccount, event: MessagesReadEvent): Promise<HandlerResult> {
    const watermark = event.watermark.toISOString();
    const user = await this.repos.users.findByPlatformUserId(account.id, event.senderId);
    if (!user) {
      return { processedData: { watermark, updated: 0 } };
    }

    const at = this.now();
    const updated = await this.repos.messages.markReadUpTo(account.id, user.id, event.watermark, at);
    for (const message of updated) {
      this.publishStatus(account, message, at);
    }

    return {
      processedData: { watermark, updated: updated.length },
      links: { channelUserId: user.id },
    };
  }

  private async handleDelivery(account: ChannelAccount, event: MessagesDeliveredEvent): Promise<HandlerResult> {
    const at = event.watermark ?? this.now();
    let updated = 0;

    for (const platformMessageId of event.messageIds) {
      const message = await this.repos.messages.findByPlatformMessageId(account.id, platformMessageId);
      const advanced = message ? await this.repos.messages.advanceStatus(message.id, 'delivered', at) : null;
      if (advanced) {
        updated++;
        this.publishStatus(account, advanced, at);
      }
    }

    return {
      processedData: {
        watermark: event.watermark ? event.watermark.toISOString() : null,
        messageIds: event.messageIds,
        updated,
      },
    };
  }

  private async handleStatus(account: ChannelAccount, event: MessageStatusEvent): Promise<HandlerResult> {
    const processedData: JsonObject = { messageId: event.messageId, status: event.status };
    const message = await this.repos.messages.findByPlatformMessageId(account.id, event.messageId);
    if (!message) {
      return { processedData: { ...processedData, matched: false } };
    }

    if (event.status === 'failed') {
      // A message the platform accepted cannot fall back to failed; keep the report
      console.warn(
        `[webhook] Platform reported failure for ${message.messageId}: ${event.errorCode} ${event.errorMessage}`
      );
      return {
        processedData: { ...processedData, matched: true, errorCode: event.errorCode, errorMessage: event.errorMessage },
        links: { channelMessageId: message.id },
      };
    }

    const advanced =
      event.status === 'sent' ? null : await this.repos.messages.advanceStatus(message.id, event.status, event.timestamp);
    if (advanced) {
      this.publishStatus(account, advanced, event.timestamp);
    }

    return {
      processedData: { ...processedData, matched: true, applied: advanced !== null },
      links: { channelMessageId: message.id },
    };
  }

  private async handleStoryInsight(account: ChannelAccount, event: StoryInsightEvent): Promise<HandlerResult> {
    const { story, created } = await this.repos.stories.insertIfAbsent({
      storyId: event.storyId,
      accountId: account.id,
      storyUrl: event.mediaUrl,
      mediaType: event.mediaType,
      caption: event.caption,
      storyTimestamp: event.timestamp,
      expiresAt: event.expiresAt,
    });

    return { processedData: { storyId: story.storyId, created } };
  }

  private publishStatus(account: ChannelAccount, message: ChannelMessage, at: Date): void {
    this.notifier.publish(accountGroup(account.id), {
      type: WebSocketEvent.MESSAGE_STATUS_UPDATE,
      payload: {
        messageId: message.id,
        conversationId: message.conversationId,
        status: message.status,
        timestamp: at.toISOString(),
      },
    });
  }
}
