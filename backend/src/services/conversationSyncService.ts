import {
  ChannelAccount,
  ChannelMessage,
  ChannelUser,
  Conversation,
  ConversationMessage,
} from '../types';
import { ConversationRepository, MessageRepository } from '../db/repositories';
import { CustomerMatcher } from './customerMatcher';

export interface SyncResult {
  conversation: Conversation;
  /** null when the message was already mirrored */
  conversationMessage: ConversationMessage | null;
}

/** Text shown in the unified inbox for a channel message */
export const conversationContent = (message: ChannelMessage): string => {
  const parts: string[] = [];
  if (message.text) parts.push(message.text);
  if (message.mediaUrl) parts.push(`[Media: ${message.mediaUrl}]`);
  return parts.join('\n');
};

/**
 * Mirrors channel messages into the cross-channel conversation aggregate
 */
export class ConversationSyncService {
  constructor(
    private readonly matcher: CustomerMatcher,
    private readonly conversations: ConversationRepository,
    private readonly messages: MessageRepository
  ) {}

  async syncToConversation(account: ChannelAccount, user: ChannelUser, message: ChannelMessage): Promise<SyncResult> {
    const customer = await this.matcher.matchOrLink(user, account.channel);
    const inbound = message.direction === 'inbound';
    const sentAt = message.sentAt ?? message.timestamp;

    const { conversation } = await this.conversations.findOrCreateActive(customer.id, account.channel, 'new', sentAt);

    const { message: conversationMessage, created } = await this.conversations.insertMessageIfAbsent({
      conversationId: conversation.id,
      channelMessageId: message.id,
      externalMessageId: message.platformMessageId,
      senderType: inbound ? 'customer' : 'agent',
      senderName: inbound
        ? user.name || user.username || user.platformUserId
        : account.name || account.username,
      messageType: message.messageType,
      content: conversationContent(message),
      sentAt,
    });

    if (!created) {
      return { conversation, conversationMessage: null };
    }

    const updated = await this.conversations.recordMessage(conversation.id, sentAt, inbound);
    if (message.conversationId !== conversation.id) {
      await this.messages.linkConversation(message.id, conversation.id);
    }

    return { conversation: updated ?? conversation, conversationMessage };
  }
}
