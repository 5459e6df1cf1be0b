import { Pool } from 'pg';
import { AccountStatus, Channel, ChannelAccount, JsonValue } from '../types';
import {
  AccountHealthUpdate,
  AccountProfileUpdate,
  AccountRepository,
  CounterDelta,
} from './repositories';
import { query, queryMany, queryOne, updateById } from './queryHelpers';
import { getObject } from '../utils/payload';

type AccountRow = {
  id: string;
  channel: Channel;
  platform_account_id: string;
  page_id: string;
  username: string;
  name: string;
  profile_picture_url: string;
  biography: string;
  website: string;
  followers_count: number;
  access_token: string;
  app_secret: string;
  verify_token: string;
  settings: JsonValue;
  webhook_url: string;
  webhook_subscribed: boolean;
  status: AccountStatus;
  is_healthy: boolean;
  last_health_check: Date | null;
  last_error_message: string;
  auto_reply_enabled: boolean;
  story_replies_enabled: boolean;
  total_messages_sent: number;
  total_messages_received: number;
  total_story_replies: number;
  created_at: Date;
  updated_at: Date;
};

const toAccount = (row: AccountRow): ChannelAccount => ({
  id: row.id,
  channel: row.channel,
  platformAccountId: row.platform_account_id,
  pageId: row.page_id,
  username: row.username,
  name: row.name,
  profilePictureUrl: row.profile_picture_url,
  biography: row.biography,
  website: row.website,
  followersCount: row.followers_count,
  accessToken: row.access_token,
  appSecret: row.app_secret,
  verifyToken: row.verify_token,
  settings: getObject(row.settings) ?? {},
  webhookUrl: row.webhook_url,
  webhookSubscribed: row.webhook_subscribed,
  status: row.status,
  isHealthy: row.is_healthy,
  lastHealthCheck: row.last_health_check,
  lastErrorMessage: row.last_error_message,
  autoReplyEnabled: row.auto_reply_enabled,
  storyRepliesEnabled: row.story_replies_enabled,
  totalMessagesSent: row.total_messages_sent,
  totalMessagesReceived: row.total_messages_received,
  totalStoryReplies: row.total_story_replies,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

export class PgAccountRepository implements AccountRepository {
  constructor(private readonly db: Pool) {}

  async findById(id: string): Promise<ChannelAccount | null> {
    const row = await queryOne<AccountRow>(this.db, 'SELECT * FROM channel_accounts WHERE id = $1', [id]);
    return row ? toAccount(row) : null;
  }

  async findByPlatformAccountId(channel: Channel, platformAccountId: string): Promise<ChannelAccount | null> {
    const row = await queryOne<AccountRow>(
      this.db,
      'SELECT * FROM channel_accounts WHERE channel = $1 AND platform_account_id = $2',
      [channel, platformAccountId]
    );
    return row ? toAccount(row) : null;
  }

  async findByVerifyToken(channel: Channel, verifyToken: string): Promise<ChannelAccount | null> {
    const row = await queryOne<AccountRow>(
      this.db,
      'SELECT * FROM channel_accounts WHERE channel = $1 AND verify_token = $2 LIMIT 1',
      [channel, verifyToken]
    );
    return row ? toAccount(row) : null;
  }

  async listMonitored(): Promise<ChannelAccount[]> {
    const rows = await queryMany<AccountRow>(
      this.db,
      `SELECT * FROM channel_accounts WHERE status <> 'inactive' ORDER BY created_at`
    );
    return rows.map(toAccount);
  }

  async listAll(): Promise<ChannelAccount[]> {
    const rows = await queryMany<AccountRow>(this.db, 'SELECT * FROM channel_accounts ORDER BY created_at');
    return rows.map(toAccount);
  }

  async updateProfile(id: string, profile: AccountProfileUpdate): Promise<void> {
    const columns: Record<string, unknown> = {
      username: profile.username,
      name: profile.name,
      biography: profile.biography,
      website: profile.website,
      followers_count: profile.followersCount,
      profile_picture_url: profile.profilePictureUrl,
    };
    const data = Object.fromEntries(
      Object.entries(columns).filter(([, value]) => value !== undefined)
    );
    if (Object.keys(data).length > 0) {
      await updateById(this.db, 'channel_accounts', id, data);
    }
  }

  async updateHealth(id: string, health: AccountHealthUpdate): Promise<void> {
    await updateById(this.db, 'channel_accounts', id, {
      status: health.status,
      is_healthy: health.isHealthy,
      last_error_message: health.lastErrorMessage,
      last_health_check: health.lastHealthCheck,
    });
  }

  async incrementCounters(id: string, delta: CounterDelta): Promise<void> {
    await query(
      this.db,
      `UPDATE channel_accounts
       SET total_messages_sent = total_messages_sent + $2,
           total_messages_received = total_messages_received + $3,
           total_story_replies = total_story_replies + $4,
           updated_at = NOW()
       WHERE id = $1`,
      [id, delta.sent ?? 0, delta.received ?? 0, delta.storyReplies ?? 0]
    );
  }

  async markWebhookSubscribed(id: string, webhookUrl: string): Promise<void> {
    await updateById(this.db, 'channel_accounts', id, {
      webhook_subscribed: true,
      webhook_url: webhookUrl,
    });
  }

  async updateCredentials(id: string, credentials: { accessToken: string; appSecret: string }): Promise<void> {
    await updateById(this.db, 'channel_accounts', id, {
      access_token: credentials.accessToken,
      app_secret: credentials.appSecret,
    });
  }
}
