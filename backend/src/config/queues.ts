import Bull, { Job, QueueOptions } from 'bull';
import { getConfig } from './index';
import { ChannelAccountService, HealthSweepSummary } from '../services/channelAccountService';
import { MessageRetryJobData, MessageRetryService } from '../services/messageRetryService';
import { SendOutcome } from '../services/channelMessageService';
import { MailboxPollingService, PollSweepSummary } from '../services/mailboxPollingService';

/**
 * Bull queue configuration for background jobs
 */

const config = getConfig();
const redisUrl = new URL(config.redisUrl);

const redisOptions: QueueOptions['redis'] = {
  host: redisUrl.hostname,
  port: parseInt(redisUrl.port || '6379', 10),
  username: redisUrl.username ? decodeURIComponent(redisUrl.username) : undefined,
  password: redisUrl.password ? decodeURIComponent(redisUrl.password) : undefined,
  tls: config.redisTls || redisUrl.protocol === 'rediss:' ? {} : undefined,
  connectTimeout: 10000,
  keepAlive: 30000,
  retryStrategy: (times: number) => {
    if (times > 3) {
      console.error('[queues] Redis max retries reached for Bull queue');
      return null;
    }
    const delay = Math.min(times * 1000, 3000);
    console.log(`[queues] Redis retry attempt ${times}, waiting ${delay}ms`);
    return delay;
  },
};

export type HealthCheckJobData = Record<string, never>;
export type MailboxPollJobData = Record<string, never>;

/**
 * Queue for resending failed outbound messages
 */
export const messageRetryQueue = new Bull<MessageRetryJobData>('message-retry', {
  redis: redisOptions,
  defaultJobOptions: {
    attempts: 1,
    removeOnComplete: true,
    removeOnFail: false, // Keep failed jobs for monitoring
  },
});

/**
 * Queue for the periodic account health sweep
 */
export const healthCheckQueue = new Bull<HealthCheckJobData>('account-health-check', {
  redis: redisOptions,
  defaultJobOptions: {
    attempts: 1,
    removeOnComplete: true,
    removeOnFail: 50,
  },
});

/**
 * Queue for pulling mail from accounts on polling channels
 */
export const mailboxPollQueue = new Bull<MailboxPollJobData>('mailbox-poll', {
  redis: redisOptions,
  defaultJobOptions: {
    attempts: 1,
    removeOnComplete: true,
    removeOnFail: 50,
  },
});

messageRetryQueue.on('completed', (job: Job<MessageRetryJobData>) => {
  console.log(`[queues] Message retry job ${job.id} completed`);
});

messageRetryQueue.on('failed', (job: Job<MessageRetryJobData>, err: Error) => {
  console.error(`[queues] Message retry job ${job.id} failed: ${err.message}`);
});

healthCheckQueue.on('failed', (job: Job<HealthCheckJobData>, err: Error) => {
  console.error(`[queues] Health check job ${job.id} failed: ${err.message}`);
});

mailboxPollQueue.on('failed', (job: Job<MailboxPollJobData>, err: Error) => {
  console.error(`[queues] Mailbox poll job ${job.id} failed: ${err.message}`);
});

export const registerMessageRetryProcessor = (retryService: MessageRetryService): void => {
  messageRetryQueue
    .process(async (job: Job<MessageRetryJobData>): Promise<SendOutcome> => retryService.processRetry(job.data))
    .catch((error: unknown) => {
      console.error('[queues] Message retry processor stopped:', error);
    });
};

/**
 * Run the health sweep every `intervalMinutes`. The fixed job id keeps a single
 * repeatable schedule across restarts.
 */
export const scheduleHealthChecks = async (
  accountService: ChannelAccountService,
  intervalMinutes: number
): Promise<void> => {
  healthCheckQueue
    .process(async (): Promise<HealthSweepSummary> => accountService.checkAll())
    .catch((error: unknown) => {
      console.error('[queues] Health check processor stopped:', error);
    });

  await healthCheckQueue.add(
    {},
    {
      jobId: 'account-health-sweep',
      repeat: { every: intervalMinutes * 60 * 1000 },
    }
  );
  console.log(`[queues] Account health checks every ${intervalMinutes} minute(s)`);
};

/** Poll every email mailbox each `intervalSeconds`, under one repeatable job */
export const scheduleMailboxPolling = async (
  pollingService: MailboxPollingService,
  intervalSeconds: number
): Promise<void> => {
  mailboxPollQueue
    .process(async (): Promise<PollSweepSummary> => pollingService.pollAll())
    .catch((error: unknown) => {
      console.error('[queues] Mailbox poll processor stopped:', error);
    });

  await mailboxPollQueue.add(
    {},
    {
      jobId: 'mailbox-poll-sweep',
      repeat: { every: intervalSeconds * 1000 },
    }
  );
  console.log(`[queues] Mailbox polling every ${intervalSeconds} second(s)`);
};

export const closeQueues = async (): Promise<void> => {
  console.log('[queues] Closing Bull queues...');
  await Promise.all([messageRetryQueue.close(), healthCheckQueue.close(), mailboxPollQueue.close()]);
};
