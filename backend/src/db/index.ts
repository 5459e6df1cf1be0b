/**
 * Database module exports
 * Provides migrations and the Postgres-backed repositories
 */
import { Pool } from 'pg';
import { PgAccountRepository } from './accountRepository';
import { PgChannelUserRepository } from './channelUserRepository';
import { PgConversationRepository } from './conversationRepository';
import { PgCustomerRepository } from './customerRepository';
import { PgMessageRepository } from './messageRepository';
import { Repositories } from './repositories';
import { PgStoryRepository } from './storyRepository';
import { PgWebhookEventRepository } from './webhookEventRepository';

export * from './repositories';
export { runMigrations } from './migrate';

export const createPgRepositories = (pool: Pool): Repositories => ({
  accounts: new PgAccountRepository(pool),
  users: new PgChannelUserRepository(pool),
  messages: new PgMessageRepository(pool),
  webhookEvents: new PgWebhookEventRepository(pool),
  stories: new PgStoryRepository(pool),
  customers: new PgCustomerRepository(pool),
  conversations: new PgConversationRepository(pool),
});
