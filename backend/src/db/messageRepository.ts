import { Pool } from 'pg';
import {
  ChannelMessage,
  JsonValue,
  MessageDirection,
  MessageStatus,
  MessageType,
} from '../types';
import { predecessorsOf } from '../utils/messageStatus';
import { MessageRepository, NewChannelMessage } from './repositories';
import { insertIfAbsent, queryMany, queryOne } from './queryHelpers';

type MessageRow = {
  id: string;
  message_id: string;
  platform_message_id: string;
  account_id: string;
  channel_user_id: string;
  conversation_id: string | null;
  message_type: MessageType;
  direction: MessageDirection;
  status: MessageStatus;
  text: string;
  media_url: string;
  media_type: string;
  story_id: string;
  payload: JsonValue;
  error_code: string;
  error_message: string;
  retry_count: number;
  retry_of: string | null;
  timestamp: Date;
  sent_at: Date | null;
  delivered_at: Date | null;
  read_at: Date | null;
  created_at: Date;
  updated_at: Date;
};

const toMessage = (row: MessageRow): ChannelMessage => ({
  id: row.id,
  messageId: row.message_id,
  platformMessageId: row.platform_message_id,
  accountId: row.account_id,
  channelUserId: row.channel_user_id,
  conversationId: row.conversation_id,
  messageType: row.message_type,
  direction: row.direction,
  status: row.status,
  text: row.text,
  mediaUrl: row.media_url,
  mediaType: row.media_type,
  storyId: row.story_id,
  payload: row.payload,
  errorCode: row.error_code,
  errorMessage: row.error_message,
  retryCount: row.retry_count,
  retryOf: row.retry_of,
  timestamp: row.timestamp,
  sentAt: row.sent_at,
  deliveredAt: row.delivered_at,
  readAt: row.read_at,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

export class PgMessageRepository implements MessageRepository {
  constructor(private readonly db: Pool) {}

  async create(input: NewChannelMessage): Promise<{ message: ChannelMessage; created: boolean }> {
    const inserted = await insertIfAbsent<MessageRow>(
      this.db,
      'channel_messages',
      {
        message_id: input.messageId,
        platform_message_id: input.platformMessageId,
        account_id: input.accountId,
        channel_user_id: input.channelUserId,
        message_type: input.messageType,
        direction: input.direction,
        status: input.status,
        text: input.text,
        media_url: input.mediaUrl,
        media_type: input.mediaType,
        story_id: input.storyId,
        payload: JSON.stringify(input.payload),
        timestamp: input.timestamp,
        delivered_at: input.deliveredAt ?? null,
        retry_of: input.retryOf ?? null,
      },
      '(message_id)'
    );
    if (inserted) {
      return { message: toMessage(inserted), created: true };
    }

    const existing = await this.findByMessageId(input.messageId);
    if (!existing) {
      throw new Error(`Message ${input.messageId} vanished after conflicting insert`);
    }
    return { message: existing, created: false };
  }

  async findById(id: string): Promise<ChannelMessage | null> {
    const row = await queryOne<MessageRow>(this.db, 'SELECT * FROM channel_messages WHERE id = $1', [id]);
    return row ? toMessage(row) : null;
  }

  async findByMessageId(messageId: string): Promise<ChannelMessage | null> {
    const row = await queryOne<MessageRow>(
      this.db,
      'SELECT * FROM channel_messages WHERE message_id = $1',
      [messageId]
    );
    return row ? toMessage(row) : null;
  }

  async findByPlatformMessageId(accountId: string, platformMessageId: string): Promise<ChannelMessage | null> {
    const row = await queryOne<MessageRow>(
      this.db,
      'SELECT * FROM channel_messages WHERE account_id = $1 AND platform_message_id = $2 LIMIT 1',
      [accountId, platformMessageId]
    );
    return row ? toMessage(row) : null;
  }

  async markSent(id: string, platformMessageId: string, sentAt: Date): Promise<ChannelMessage | null> {
    const row = await queryOne<MessageRow>(
      this.db,
      `UPDATE channel_messages
       SET status = 'sent',
           sent_at = $3,
           platform_message_id = CASE WHEN platform_message_id = '' THEN $2 ELSE platform_message_id END,
           updated_at = NOW()
       WHERE id = $1 AND status = 'pending'
       RETURNING *`,
      [id, platformMessageId, sentAt]
    );
    return row ? toMessage(row) : null;
  }

  async markFailed(id: string, errorCode: string, errorMessage: string): Promise<ChannelMessage | null> {
    const row = await queryOne<MessageRow>(
      this.db,
      `UPDATE channel_messages
       SET status = 'failed', error_code = $2, error_message = $3, updated_at = NOW()
       WHERE id = $1 AND status = 'pending'
       RETURNING *`,
      [id, errorCode, errorMessage]
    );
    return row ? toMessage(row) : null;
  }

  async advanceStatus(id: string, to: 'delivered' | 'read', at: Date): Promise<ChannelMessage | null> {
    const timestampColumn = to === 'delivered' ? 'delivered_at' : 'read_at';
    const row = await queryOne<MessageRow>(
      this.db,
      `UPDATE channel_messages
       SET status = $2, ${timestampColumn} = $3, updated_at = NOW()
       WHERE id = $1 AND status = ANY($4::text[])
       RETURNING *`,
      [id, to, at, predecessorsOf(to)]
    );
    return row ? toMessage(row) : null;
  }

  async markReadUpTo(
    accountId: string,
    channelUserId: string,
    watermark: Date,
    at: Date
  ): Promise<ChannelMessage[]> {
    const rows = await queryMany<MessageRow>(
      this.db,
      `UPDATE channel_messages
       SET status = 'read', read_at = $4, updated_at = NOW()
       WHERE account_id = $1
         AND channel_user_id = $2
         AND direction = 'outbound'
         AND status IN ('sent', 'delivered')
         AND timestamp <= $3
       RETURNING *`,
      [accountId, channelUserId, watermark, at]
    );
    return rows.map(toMessage);
  }

  async incrementRetryCount(id: string): Promise<number> {
    const row = await queryOne<{ retry_count: number }>(
      this.db,
      `UPDATE channel_messages SET retry_count = retry_count + 1, updated_at = NOW()
       WHERE id = $1 RETURNING retry_count`,
      [id]
    );
    if (!row) {
      throw new Error(`Message ${id} not found`);
    }
    return row.retry_count;
  }

  async findRetriesOf(rootId: string): Promise<ChannelMessage[]> {
    const rows = await queryMany<MessageRow>(
      this.db,
      'SELECT * FROM channel_messages WHERE retry_of = $1 ORDER BY created_at',
      [rootId]
    );
    return rows.map(toMessage);
  }

  async linkConversation(id: string, conversationId: string): Promise<void> {
    await queryOne(
      this.db,
      'UPDATE channel_messages SET conversation_id = $2, updated_at = NOW() WHERE id = $1',
      [id, conversationId]
    );
  }
}
