import { Pool } from 'pg';
import {
  JsonObject,
  JsonValue,
  WebhookEvent,
  WebhookEventStatus,
  WebhookEventType,
} from '../types';
import { NewWebhookEvent, WebhookEventRepository } from './repositories';
import { insertIfAbsent, query, queryOne } from './queryHelpers';

type WebhookEventRow = {
  id: string;
  event_id: string;
  event_type: WebhookEventType;
  account_id: string;
  raw_data: JsonValue;
  processed_data: JsonObject;
  status: WebhookEventStatus;
  processed_at: Date | null;
  error_message: string;
  channel_user_id: string | null;
  channel_message_id: string | null;
  created_at: Date;
  updated_at: Date;
};

const toWebhookEvent = (row: WebhookEventRow): WebhookEvent => ({
  id: row.id,
  eventId: row.event_id,
  eventType: row.event_type,
  accountId: row.account_id,
  rawData: row.raw_data,
  processedData: row.processed_data,
  status: row.status,
  processedAt: row.processed_at,
  errorMessage: row.error_message,
  channelUserId: row.channel_user_id,
  channelMessageId: row.channel_message_id,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

export class PgWebhookEventRepository implements WebhookEventRepository {
  constructor(private readonly db: Pool) {}

  async insertIfAbsent(input: NewWebhookEvent): Promise<WebhookEvent | null> {
    const row = await insertIfAbsent<WebhookEventRow>(
      this.db,
      'webhook_events',
      {
        event_id: input.eventId,
        event_type: input.eventType,
        account_id: input.accountId,
        raw_data: JSON.stringify(input.rawData),
      },
      '(event_id)'
    );
    return row ? toWebhookEvent(row) : null;
  }

  async findByEventId(eventId: string): Promise<WebhookEvent | null> {
    const row = await queryOne<WebhookEventRow>(
      this.db,
      'SELECT * FROM webhook_events WHERE event_id = $1',
      [eventId]
    );
    return row ? toWebhookEvent(row) : null;
  }

  async markProcessing(id: string): Promise<void> {
    await query(
      this.db,
      `UPDATE webhook_events SET status = 'processing', updated_at = NOW()
       WHERE id = $1 AND status = 'pending'`,
      [id]
    );
  }

  async markProcessed(
    id: string,
    processedData: JsonObject,
    links: { channelUserId?: string; channelMessageId?: string } = {}
  ): Promise<void> {
    await query(
      this.db,
      `UPDATE webhook_events
       SET status = 'processed',
           processed_data = $2,
           processed_at = NOW(),
           channel_user_id = COALESCE($3, channel_user_id),
           channel_message_id = COALESCE($4, channel_message_id),
           updated_at = NOW()
       WHERE id = $1`,
      [id, JSON.stringify(processedData), links.channelUserId ?? null, links.channelMessageId ?? null]
    );
  }

  async markFailed(id: string, errorMessage: string): Promise<void> {
    await query(
      this.db,
      `UPDATE webhook_events SET status = 'failed', error_message = $2, updated_at = NOW()
       WHERE id = $1`,
      [id, errorMessage]
    );
  }

  async markIgnored(id: string, processedData: JsonObject): Promise<void> {
    await query(
      this.db,
      `UPDATE webhook_events
       SET status = 'ignored', processed_data = $2, processed_at = NOW(), updated_at = NOW()
       WHERE id = $1`,
      [id, JSON.stringify(processedData)]
    );
  }
}
