import { Pool } from 'pg';
import { ChannelUser } from '../types';
import { ChannelUserRepository, CounterDelta } from './repositories';
import { insertIfAbsent, query, queryOne, updateById } from './queryHelpers';

type ChannelUserRow = {
  id: string;
  account_id: string;
  platform_user_id: string;
  username: string;
  name: string;
  profile_picture_url: string;
  customer_id: string | null;
  last_interaction_at: Date | null;
  total_messages_sent: number;
  total_messages_received: number;
  total_story_replies: number;
  created_at: Date;
  updated_at: Date;
};

const toChannelUser = (row: ChannelUserRow): ChannelUser => ({
  id: row.id,
  accountId: row.account_id,
  platformUserId: row.platform_user_id,
  username: row.username,
  name: row.name,
  profilePictureUrl: row.profile_picture_url,
  customerId: row.customer_id,
  lastInteractionAt: row.last_interaction_at,
  totalMessagesSent: row.total_messages_sent,
  totalMessagesReceived: row.total_messages_received,
  totalStoryReplies: row.total_story_replies,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

export class PgChannelUserRepository implements ChannelUserRepository {
  constructor(private readonly db: Pool) {}

  async findById(id: string): Promise<ChannelUser | null> {
    const row = await queryOne<ChannelUserRow>(this.db, 'SELECT * FROM channel_users WHERE id = $1', [id]);
    return row ? toChannelUser(row) : null;
  }

  async findByPlatformUserId(accountId: string, platformUserId: string): Promise<ChannelUser | null> {
    const row = await queryOne<ChannelUserRow>(
      this.db,
      'SELECT * FROM channel_users WHERE account_id = $1 AND platform_user_id = $2',
      [accountId, platformUserId]
    );
    return row ? toChannelUser(row) : null;
  }

  async findOrCreate(
    accountId: string,
    platformUserId: string
  ): Promise<{ user: ChannelUser; created: boolean }> {
    const inserted = await insertIfAbsent<ChannelUserRow>(
      this.db,
      'channel_users',
      { account_id: accountId, platform_user_id: platformUserId },
      '(account_id, platform_user_id)'
    );
    if (inserted) {
      return { user: toChannelUser(inserted), created: true };
    }

    const existing = await this.findByPlatformUserId(accountId, platformUserId);
    if (!existing) {
      throw new Error(`Channel user ${platformUserId} vanished after conflicting insert`);
    }
    return { user: existing, created: false };
  }

  async updateProfile(
    id: string,
    profile: Pick<ChannelUser, 'username' | 'name' | 'profilePictureUrl'>
  ): Promise<ChannelUser | null> {
    const row = await updateById<ChannelUserRow>(this.db, 'channel_users', id, {
      username: profile.username,
      name: profile.name,
      profile_picture_url: profile.profilePictureUrl,
    });
    return row ? toChannelUser(row) : null;
  }

  async linkCustomer(id: string, customerId: string | null): Promise<void> {
    await updateById(this.db, 'channel_users', id, { customer_id: customerId });
  }

  async recordInteraction(id: string, delta: CounterDelta, at: Date): Promise<void> {
    await query(
      this.db,
      `UPDATE channel_users
       SET total_messages_sent = total_messages_sent + $2,
           total_messages_received = total_messages_received + $3,
           total_story_replies = total_story_replies + $4,
           last_interaction_at = GREATEST(COALESCE(last_interaction_at, $5), $5),
           updated_at = NOW()
       WHERE id = $1`,
      [id, delta.sent ?? 0, delta.received ?? 0, delta.storyReplies ?? 0, at]
    );
  }
}
