export type Channel = 'instagram' | 'facebook' | 'whatsapp' | 'email';

export const CHANNELS: readonly Channel[] = ['instagram', 'facebook', 'whatsapp', 'email'];

export const isChannel = (value: string): value is Channel => CHANNELS.some((channel) => channel === value);

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type AccountStatus = 'active' | 'inactive' | 'error' | 'pending';

export interface ChannelAccount {
  id: string;
  channel: Channel;
  platformAccountId: string;
  /** Page (Instagram/Messenger) or phone number id (WhatsApp) used for subscriptions and sends */
  pageId: string;
  username: string;
  name: string;
  profilePictureUrl: string;
  biography: string;
  website: string;
  followersCount: number;
  /** Encrypted. Graph access token, or the IMAP password of an email account */
  accessToken: string;
  /** Encrypted. Webhook signing secret, or the SMTP password of an email account */
  appSecret: string;
  verifyToken: string;
  /** Channel-specific connection settings, such as mail server hosts */
  settings: JsonObject;
  webhookUrl: string;
  webhookSubscribed: boolean;
  status: AccountStatus;
  isHealthy: boolean;
  lastHealthCheck: Date | null;
  lastErrorMessage: string;
  autoReplyEnabled: boolean;
  storyRepliesEnabled: boolean;
  totalMessagesSent: number;
  totalMessagesReceived: number;
  totalStoryReplies: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface ChannelUser {
  id: string;
  accountId: string;
  platformUserId: string;
  username: string;
  name: string;
  profilePictureUrl: string;
  customerId: string | null;
  lastInteractionAt: Date | null;
  totalMessagesSent: number;
  totalMessagesReceived: number;
  totalStoryReplies: number;
  createdAt: Date;
  updatedAt: Date;
}

export type MessageType =
  | 'text'
  | 'image'
  | 'video'
  | 'audio'
  | 'story_reply'
  | 'story_mention'
  | 'media_share'
  | 'like'
  | 'unsupported';

export type MessageDirection = 'inbound' | 'outbound';

export type MessageStatus = 'pending' | 'sent' | 'delivered' | 'read' | 'failed';

export interface ChannelMessage {
  id: string;
  messageId: string;
  platformMessageId: string;
  accountId: string;
  channelUserId: string;
  conversationId: string | null;
  messageType: MessageType;
  direction: MessageDirection;
  status: MessageStatus;
  text: string;
  mediaUrl: string;
  mediaType: string;
  storyId: string;
  payload: JsonValue;
  errorCode: string;
  errorMessage: string;
  retryCount: number;
  /** Root of the retry chain this message resends, null for an original send */
  retryOf: string | null;
  timestamp: Date;
  sentAt: Date | null;
  deliveredAt: Date | null;
  readAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type WebhookEventType =
  | 'messages'
  | 'messaging_seen'
  | 'message_status'
  | 'story_insights'
  | 'unknown';

export type WebhookEventStatus = 'pending' | 'processing' | 'processed' | 'failed' | 'ignored';

export interface WebhookEvent {
  id: string;
  eventId: string;
  eventType: WebhookEventType;
  accountId: string;
  rawData: JsonValue;
  processedData: JsonObject;
  status: WebhookEventStatus;
  processedAt: Date | null;
  errorMessage: string;
  channelUserId: string | null;
  channelMessageId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Story {
  id: string;
  storyId: string;
  accountId: string;
  storyUrl: string;
  mediaType: string;
  caption: string;
  replyCount: number;
  storyTimestamp: Date;
  expiresAt: Date;
  createdAt: Date;
}

export interface Customer {
  id: string;
  firstName: string;
  lastName: string;
  source: string;
  createdAt: Date;
}

export type ConversationStatus = 'new' | 'open' | 'pending' | 'closed';

export interface Conversation {
  id: string;
  channel: Channel;
  customerId: string;
  assignedAgentId: string | null;
  status: ConversationStatus;
  lastMessageAt: Date;
  unreadCount: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface ConversationMessage {
  id: string;
  conversationId: string;
  channelMessageId: string;
  externalMessageId: string;
  senderType: 'customer' | 'agent';
  senderName: string;
  messageType: MessageType;
  content: string;
  sentAt: Date;
  createdAt: Date;
}

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    retryable: boolean;
  };
}

export interface JWTPayload {
  userId: string;
  email: string;
}

// Outbound content an agent can send
export type OutboundContent =
  | { kind: 'text'; text: string }
  | { kind: 'image' | 'video' | 'audio'; url: string };

// WebSocket event payloads
export interface NewMessageEvent {
  message: ChannelMessage;
  conversation?: Conversation;
  timestamp: string;
}

export interface MessageStatusUpdateEvent {
  messageId: string;
  conversationId: string | null;
  status: MessageStatus;
  timestamp: string;
}
