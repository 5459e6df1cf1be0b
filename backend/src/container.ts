import axios from 'axios';
import { Pool } from 'pg';
import type { RedisClient } from './config/redis';
import { AppConfig } from './config';
import { createPgRepositories, Repositories } from './db';
import { AdapterFactory } from './adapters/AdapterFactory';
import { CredentialVault } from './utils/encryption';
import { PlatformRateLimitService, RedisRateLimitStore } from './services/platformRateLimitService';
import { AuthService } from './services/authService';
import { WebSocketService } from './services/websocketService';
import { ChannelUserService } from './services/channelUserService';
import { CustomerMatcher } from './services/customerMatcher';
import { ConversationSyncService } from './services/conversationSyncService';
import { ChannelMessageService } from './services/channelMessageService';
import { WebhookEventProcessor } from './services/webhookEventProcessor';
import { WebhookIngressService } from './services/webhookIngressService';
import { ChannelAccountService } from './services/channelAccountService';
import { MessageRetryService, RetryQueue } from './services/messageRetryService';
import { MailboxPollingService } from './services/mailboxPollingService';

export interface Infrastructure {
  pool: Pool;
  redis: RedisClient;
  retryQueue: RetryQueue;
}

export interface Container {
  config: AppConfig;
  infra: Infrastructure;
  repos: Repositories;
  vault: CredentialVault;
  rateLimiter: PlatformRateLimitService;
  adapters: AdapterFactory;
  authService: AuthService;
  websocket: WebSocketService;
  messageService: ChannelMessageService;
  ingress: WebhookIngressService;
  accountService: ChannelAccountService;
  retryService: MessageRetryService;
  pollingService: MailboxPollingService;
}

/**
 * Wires the process-wide singletons. Throws ConfigurationError when the vault
 * cannot be keyed.
 */
export const createContainer = (config: AppConfig, infra: Infrastructure): Container => {
  const repos = createPgRepositories(infra.pool);
  const vault = new CredentialVault(config.encryption);
  const rateLimiter = new PlatformRateLimitService(new RedisRateLimitStore(infra.redis), config.rateLimit);

  const adapters = new AdapterFactory({
    http: axios.create({ timeout: config.graphApi.timeoutMs }),
    rateLimiter,
    vault,
    graphApi: { baseUrl: config.graphApi.baseUrl, version: config.graphApi.version },
  });

  const authService = new AuthService(config.jwtSecret);
  const websocket = new WebSocketService(authService, config.frontendUrl);

  const userService = new ChannelUserService(repos.users, adapters);
  const matcher = new CustomerMatcher(repos.customers, repos.users);
  const conversationSync = new ConversationSyncService(matcher, repos.conversations, repos.messages);

  const messageService = new ChannelMessageService(
    repos.accounts,
    repos.users,
    repos.messages,
    adapters,
    userService,
    conversationSync,
    websocket
  );
  const processor = new WebhookEventProcessor(repos, userService, conversationSync, websocket);
  const ingress = new WebhookIngressService(repos.accounts, adapters, vault, processor);
  const accountService = new ChannelAccountService(repos.accounts, adapters);
  const retryService = new MessageRetryService(
    infra.retryQueue,
    repos.messages,
    repos.accounts,
    repos.users,
    messageService,
    config.messageRetry
  );
  const pollingService = new MailboxPollingService(
    repos.accounts,
    adapters,
    processor,
    config.mailboxPolling.batchSize
  );

  return {
    config,
    infra,
    repos,
    vault,
    rateLimiter,
    adapters,
    authService,
    websocket,
    messageService,
    ingress,
    accountService,
    retryService,
    pollingService,
  };
};
