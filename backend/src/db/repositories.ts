import {
  AccountStatus,
  Channel,
  ChannelAccount,
  ChannelMessage,
  ChannelUser,
  Conversation,
  ConversationMessage,
  ConversationStatus,
  Customer,
  JsonObject,
  JsonValue,
  MessageDirection,
  MessageStatus,
  MessageType,
  Story,
  WebhookEvent,
  WebhookEventType,
} from '../types';

/**
 * Persistence contracts for the ingestion pipeline.
 * Counters are always incremented in the store, never written back from a snapshot,
 * and status changes are conditional on the current status.
 */

export interface CounterDelta {
  sent?: number;
  received?: number;
  storyReplies?: number;
}

export type AccountProfileUpdate = Partial<
  Pick<
    ChannelAccount,
    'username' | 'name' | 'biography' | 'website' | 'followersCount' | 'profilePictureUrl'
  >
>;

export interface AccountHealthUpdate {
  status: AccountStatus;
  isHealthy: boolean;
  lastErrorMessage: string;
  lastHealthCheck: Date;
}

export interface AccountRepository {
  findById(id: string): Promise<ChannelAccount | null>;
  findByPlatformAccountId(channel: Channel, platformAccountId: string): Promise<ChannelAccount | null>;
  findByVerifyToken(channel: Channel, verifyToken: string): Promise<ChannelAccount | null>;
  listMonitored(): Promise<ChannelAccount[]>;
  listAll(): Promise<ChannelAccount[]>;
  updateProfile(id: string, profile: AccountProfileUpdate): Promise<void>;
  updateHealth(id: string, health: AccountHealthUpdate): Promise<void>;
  incrementCounters(id: string, delta: CounterDelta): Promise<void>;
  markWebhookSubscribed(id: string, webhookUrl: string): Promise<void>;
  updateCredentials(id: string, credentials: { accessToken: string; appSecret: string }): Promise<void>;
}

export interface ChannelUserRepository {
  findById(id: string): Promise<ChannelUser | null>;
  findByPlatformUserId(accountId: string, platformUserId: string): Promise<ChannelUser | null>;
  findOrCreate(accountId: string, platformUserId: string): Promise<{ user: ChannelUser; created: boolean }>;
  updateProfile(
    id: string,
    profile: Pick<ChannelUser, 'username' | 'name' | 'profilePictureUrl'>
  ): Promise<ChannelUser | null>;
  linkCustomer(id: string, customerId: string | null): Promise<void>;
  recordInteraction(id: string, delta: CounterDelta, at: Date): Promise<void>;
}

export interface NewChannelMessage {
  messageId: string;
  platformMessageId: string;
  accountId: string;
  channelUserId: string;
  messageType: MessageType;
  direction: MessageDirection;
  status: MessageStatus;
  text: string;
  mediaUrl: string;
  mediaType: string;
  storyId: string;
  payload: JsonValue;
  timestamp: Date;
  deliveredAt?: Date | null;
  retryOf?: string | null;
}

export interface MessageRepository {
  /** Insert keyed by messageId; returns the existing row with created=false on conflict */
  create(input: NewChannelMessage): Promise<{ message: ChannelMessage; created: boolean }>;
  findById(id: string): Promise<ChannelMessage | null>;
  findByMessageId(messageId: string): Promise<ChannelMessage | null>;
  findByPlatformMessageId(accountId: string, platformMessageId: string): Promise<ChannelMessage | null>;
  /** pending → sent; the platform id is only written while still empty */
  markSent(id: string, platformMessageId: string, sentAt: Date): Promise<ChannelMessage | null>;
  /** pending → failed */
  markFailed(id: string, errorCode: string, errorMessage: string): Promise<ChannelMessage | null>;
  /** Forward-only move to delivered or read; null when the current status forbids it */
  advanceStatus(id: string, to: 'delivered' | 'read', at: Date): Promise<ChannelMessage | null>;
  /** Outbound sent/delivered messages to the user with timestamp <= watermark become read */
  markReadUpTo(accountId: string, channelUserId: string, watermark: Date, at: Date): Promise<ChannelMessage[]>;
  incrementRetryCount(id: string): Promise<number>;
  /** Messages created as retries of the given root message */
  findRetriesOf(rootId: string): Promise<ChannelMessage[]>;
  linkConversation(id: string, conversationId: string): Promise<void>;
}

export interface NewWebhookEvent {
  eventId: string;
  eventType: WebhookEventType;
  accountId: string;
  rawData: JsonValue;
}

export interface WebhookEventRepository {
  /** null when eventId already exists */
  insertIfAbsent(input: NewWebhookEvent): Promise<WebhookEvent | null>;
  findByEventId(eventId: string): Promise<WebhookEvent | null>;
  markProcessing(id: string): Promise<void>;
  markProcessed(
    id: string,
    processedData: JsonObject,
    links?: { channelUserId?: string; channelMessageId?: string }
  ): Promise<void>;
  markFailed(id: string, errorMessage: string): Promise<void>;
  markIgnored(id: string, processedData: JsonObject): Promise<void>;
}

export type NewStory = Omit<Story, 'id' | 'replyCount' | 'createdAt'>;

export interface StoryRepository {
  insertIfAbsent(input: NewStory): Promise<{ story: Story; created: boolean }>;
  findByStoryId(accountId: string, storyId: string): Promise<Story | null>;
  incrementReplyCount(id: string): Promise<void>;
}

export interface CustomerRepository {
  findById(id: string): Promise<Customer | null>;
  /** Customers whose first or last name contains any of the tokens (case-insensitive) */
  searchByNameTokens(tokens: string[], limit: number): Promise<Customer[]>;
  create(input: Pick<Customer, 'firstName' | 'lastName' | 'source'>): Promise<Customer>;
}

export interface ConversationRepository {
  findById(id: string): Promise<Conversation | null>;
  /** The customer's non-closed conversation on the channel, created when missing */
  findOrCreateActive(
    customerId: string,
    channel: Channel,
    initialStatus: ConversationStatus,
    at: Date
  ): Promise<{ conversation: Conversation; created: boolean }>;
  /** last_message_at only moves forward; inbound messages bump unread_count */
  recordMessage(conversationId: string, sentAt: Date, inbound: boolean): Promise<Conversation | null>;
  insertMessageIfAbsent(
    input: Omit<ConversationMessage, 'id' | 'createdAt'>
  ): Promise<{ message: ConversationMessage; created: boolean }>;
}

export interface Repositories {
  accounts: AccountRepository;
  users: ChannelUserRepository;
  messages: MessageRepository;
  webhookEvents: WebhookEventRepository;
  stories: StoryRepository;
  customers: CustomerRepository;
  conversations: ConversationRepository;
}
