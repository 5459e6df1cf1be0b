import { Pool } from 'pg';
import { Story } from '../types';
import { NewStory, StoryRepository } from './repositories';
import { insertIfAbsent, query, queryOne } from './queryHelpers';

type StoryRow = {
  id: string;
  story_id: string;
  account_id: string;
  story_url: string;
  media_type: string;
  caption: string;
  reply_count: number;
  story_timestamp: Date;
  expires_at: Date;
  created_at: Date;
};

const toStory = (row: StoryRow): Story => ({
  id: row.id,
  storyId: row.story_id,
  accountId: row.account_id,
  storyUrl: row.story_url,
  mediaType: row.media_type,
  caption: row.caption,
  replyCount: row.reply_count,
  storyTimestamp: row.story_timestamp,
  expiresAt: row.expires_at,
  createdAt: row.created_at,
});

export class PgStoryRepository implements StoryRepository {
  constructor(private readonly db: Pool) {}

  async insertIfAbsent(input: NewStory): Promise<{ story: Story; created: boolean }> {
    const inserted = await insertIfAbsent<StoryRow>(
      this.db,
      'stories',
      {
        story_id: input.storyId,
        account_id: input.accountId,
        story_url: input.storyUrl,
        media_type: input.mediaType,
        caption: input.caption,
        story_timestamp: input.storyTimestamp,
        expires_at: input.expiresAt,
      },
      '(account_id, story_id)'
    );
    if (inserted) {
      return { story: toStory(inserted), created: true };
    }

    const existing = await this.findByStoryId(input.accountId, input.storyId);
    if (!existing) {
      throw new Error(`Story ${input.storyId} vanished after conflicting insert`);
    }
    return { story: existing, created: false };
  }

  async findByStoryId(accountId: string, storyId: string): Promise<Story | null> {
    const row = await queryOne<StoryRow>(
      this.db,
      'SELECT * FROM stories WHERE account_id = $1 AND story_id = $2',
      [accountId, storyId]
    );
    return row ? toStory(row) : null;
  }

  async incrementReplyCount(id: string): Promise<void> {
    await query(
      this.db,
      'UPDATE stories SET reply_count = reply_count + 1, updated_at = NOW() WHERE id = $1',
      [id]
    );
  }
}
