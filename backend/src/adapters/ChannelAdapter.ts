import {
  Channel,
  ChannelAccount,
  JsonObject,
  MessageType,
  OutboundContent,
} from '../types';
import { AppError } from '../middleware/errorHandler';

/** Remote operations, each with its own rate-limit window per account */
export const API_OPERATIONS = [
  'account_info',
  'user_profile',
  'send_message',
  'conversations',
  'conversation_messages',
  'subscribe_webhook',
  'inbox_poll',
] as const;

export type ApiOperation = (typeof API_OPERATIONS)[number];

/**
 * Normalised content of one inbound message
 */
export interface InboundContent {
  messageType: MessageType;
  text: string;
  mediaUrl: string;
  mediaType: string;
  storyId: string;
}

interface EventBase {
  /** `entry[].id` the event was delivered under: the platform account id */
  entryId: string;
  /** The event item exactly as delivered */
  raw: JsonObject;
}

export interface MessageReceivedEvent extends EventBase {
  kind: 'message';
  senderId: string;
  recipientId: string;
  messageId: string;
  timestamp: Date;
  isEcho: boolean;
  content: InboundContent;
  /** Display name supplied alongside the message, when the channel sends one */
  profileName?: string;
}

export interface MessagesReadEvent extends EventBase {
  kind: 'read';
  senderId: string;
  watermark: Date;
}

export interface MessagesDeliveredEvent extends EventBase {
  kind: 'delivery';
  senderId: string;
  messageIds: string[];
  watermark: Date | null;
}

export interface MessageStatusEvent extends EventBase {
  kind: 'status';
  messageId: string;
  recipientId: string;
  status: 'sent' | 'delivered' | 'read' | 'failed';
  timestamp: Date;
  errorCode: string;
  errorMessage: string;
}

export interface StoryInsightEvent extends EventBase {
  kind: 'story_insight';
  storyId: string;
  mediaUrl: string;
  mediaType: string;
  caption: string;
  timestamp: Date;
  expiresAt: Date;
}

export interface UnknownEvent extends EventBase {
  kind: 'unknown';
  reason: string;
}

/** Every inbound event a channel can produce, parsed at the webhook boundary */
export type ChannelEvent =
  | MessageReceivedEvent
  | MessagesReadEvent
  | MessagesDeliveredEvent
  | MessageStatusEvent
  | StoryInsightEvent
  | UnknownEvent;

export interface WebhookEnvelope {
  object: string;
  entry: JsonObject[];
}

/** How a channel's inbound events reach us */
export type IngressMode = 'webhook' | 'polling';

/** One pull from a polling channel's inbox */
export interface InboxBatch {
  /** Fetched items shaped like a delivery, one entry per account */
  envelope: WebhookEnvelope;
  /** Mailbox uids to acknowledge once every event is recorded */
  uids: number[];
}

export interface AccountInfo {
  id: string;
  username?: string;
  name?: string;
  biography?: string;
  website?: string;
  followersCount?: number;
  profilePictureUrl?: string;
}

export interface ChannelUserProfile {
  username: string;
  name: string;
  profilePictureUrl: string;
}

export interface SendResult {
  platformMessageId: string;
  raw: JsonObject;
}

/**
 * Capabilities every channel provides. The webhook-facing half is pure;
 * the API half goes through the rate limiter and throws ChannelAPIError.
 */
export interface ChannelAdapter {
  readonly channel: Channel;
  readonly ingress: IngressMode;

  verifySignature(rawBody: Buffer, signatureHeader: string | undefined, appSecret: string): boolean;
  verifyWebhook(verifyToken: string, challenge: string, hubVerifyToken: string): string | null;
  /** `receivedAt` stands in for timestamps the payload omits */
  parseDelivery(envelope: WebhookEnvelope, receivedAt: Date): ChannelEvent[];

  getAccountInfo(account: ChannelAccount): Promise<AccountInfo>;
  /** null when the channel has no profile lookup */
  getUserProfile(account: ChannelAccount, platformUserId: string): Promise<ChannelUserProfile | null>;
  sendMessage(account: ChannelAccount, recipientId: string, content: OutboundContent): Promise<SendResult>;
  getConversations(account: ChannelAccount, limit?: number): Promise<JsonObject>;
  getConversationMessages(account: ChannelAccount, conversationId: string, limit?: number): Promise<JsonObject>;
  subscribeWebhook(account: ChannelAccount, webhookUrl: string, fields?: string[]): Promise<JsonObject>;

  /** Polling channels only: pending inbound items, left unacknowledged */
  fetchInbox(account: ChannelAccount, limit: number): Promise<InboxBatch>;
  acknowledgeInbox(account: ChannelAccount, uids: number[]): Promise<void>;
}

/**
 * A remote platform call failed: network error, timeout, non-2xx or unusable response
 */
export class ChannelAPIError extends AppError {
  constructor(
    message: string,
    public channel: Channel,
    public upstreamStatus?: number,
    public platformCode?: string
  ) {
    super(message, 502, 'CHANNEL_API_ERROR', true, {
      channel,
      upstreamStatus,
      platformCode,
    });
    this.name = 'ChannelAPIError';
  }
}

/**
 * The call budget for an (account, endpoint) window is spent
 */
export class RateLimitError extends AppError {
  constructor(
    public endpoint: string,
    public retryAfter: number, // seconds until the window resets
    limit: number
  ) {
    super(`Rate limit exceeded for ${endpoint}. Wait ${retryAfter} seconds.`, 429, 'RATE_LIMITED', true, {
      endpoint,
      limit,
      retryAfter,
    });
    this.name = 'RateLimitError';
  }
}

export class UnsupportedOperationError extends AppError {
  constructor(channel: Channel, operation: string) {
    super(`${operation} is not supported for ${channel}`, 501, 'NOT_SUPPORTED');
    this.name = 'UnsupportedOperationError';
  }
}
