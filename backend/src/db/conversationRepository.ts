import { Pool } from 'pg';
import {
  Channel,
  Conversation,
  ConversationMessage,
  ConversationStatus,
  MessageType,
} from '../types';
import { ConversationRepository } from './repositories';
import { queryOne } from './queryHelpers';

type ConversationRow = {
  id: string;
  channel: Channel;
  customer_id: string;
  assigned_agent_id: string | null;
  status: ConversationStatus;
  last_message_at: Date;
  unread_count: number;
  created_at: Date;
  updated_at: Date;
};

type ConversationMessageRow = {
  id: string;
  conversation_id: string;
  channel_message_id: string;
  external_message_id: string;
  sender_type: 'customer' | 'agent';
  sender_name: string;
  message_type: MessageType;
  content: string;
  sent_at: Date;
  created_at: Date;
};

const toConversation = (row: ConversationRow): Conversation => ({
  id: row.id,
  channel: row.channel,
  customerId: row.customer_id,
  assignedAgentId: row.assigned_agent_id,
  status: row.status,
  lastMessageAt: row.last_message_at,
  unreadCount: row.unread_count,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

const toConversationMessage = (row: ConversationMessageRow): ConversationMessage => ({
  id: row.id,
  conversationId: row.conversation_id,
  channelMessageId: row.channel_message_id,
  externalMessageId: row.external_message_id,
  senderType: row.sender_type,
  senderName: row.sender_name,
  messageType: row.message_type,
  content: row.content,
  sentAt: row.sent_at,
  createdAt: row.created_at,
});

export class PgConversationRepository implements ConversationRepository {
  constructor(private readonly db: Pool) {}

  async findById(id: string): Promise<Conversation | null> {
    const row = await queryOne<ConversationRow>(this.db, 'SELECT * FROM conversations WHERE id = $1', [id]);
    return row ? toConversation(row) : null;
  }

  async findOrCreateActive(
    customerId: string,
    channel: Channel,
    initialStatus: ConversationStatus,
    at: Date
  ): Promise<{ conversation: Conversation; created: boolean }> {
    const inserted = await queryOne<ConversationRow>(
      this.db,
      `INSERT INTO conversations (customer_id, channel, status, last_message_at)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (customer_id, channel) WHERE status <> 'closed' DO NOTHING
       RETURNING *`,
      [customerId, channel, initialStatus, at]
    );
    if (inserted) {
      return { conversation: toConversation(inserted), created: true };
    }

    const existing = await queryOne<ConversationRow>(
      this.db,
      `SELECT * FROM conversations
       WHERE customer_id = $1 AND channel = $2 AND status <> 'closed'`,
      [customerId, channel]
    );
    if (!existing) {
      throw new Error(`Active conversation for customer ${customerId} vanished after conflicting insert`);
    }
    return { conversation: toConversation(existing), created: false };
  }

  async recordMessage(conversationId: string, sentAt: Date, inbound: boolean): Promise<Conversation | null> {
    const row = await queryOne<ConversationRow>(
      this.db,
      `UPDATE conversations
       SET last_message_at = GREATEST(last_message_at, $2),
           unread_count = unread_count + $3,
           updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [conversationId, sentAt, inbound ? 1 : 0]
    );
    return row ? toConversation(row) : null;
  }

  async insertMessageIfAbsent(
    input: Omit<ConversationMessage, 'id' | 'createdAt'>
  ): Promise<{ message: ConversationMessage; created: boolean }> {
    const inserted = await queryOne<ConversationMessageRow>(
      this.db,
      `INSERT INTO conversation_messages
         (conversation_id, channel_message_id, external_message_id, sender_type,
          sender_name, message_type, content, sent_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (channel_message_id) DO NOTHING
       RETURNING *`,
      [
        input.conversationId,
        input.channelMessageId,
        input.externalMessageId,
        input.senderType,
        input.senderName,
        input.messageType,
        input.content,
        input.sentAt,
      ]
    );
    if (inserted) {
      return { message: toConversationMessage(inserted), created: true };
    }

    const existing = await queryOne<ConversationMessageRow>(
      this.db,
      'SELECT * FROM conversation_messages WHERE channel_message_id = $1',
      [input.channelMessageId]
    );
    if (!existing) {
      throw new Error(`Conversation message for ${input.channelMessageId} vanished after conflicting insert`);
    }
    return { message: toConversationMessage(existing), created: false };
  }
}
