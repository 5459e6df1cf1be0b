import { AdapterFactory } from '../../adapters/AdapterFactory';
import { ChannelUserService } from '../../services/channelUserService';
import { ConversationSyncService } from '../../services/conversationSyncService';
import { CustomerMatcher } from '../../services/customerMatcher';
import { PlatformRateLimitService } from '../../services/platformRateLimitService';
import { CredentialVault } from '../../utils/encryption';
import { FakeMailbox, HttpStub, InMemoryRateLimitStore, RecordingNotifier, RecordingTransport } from './fakes';
import { InMemoryRepositories, createInMemoryRepositories } from './inMemoryRepositories';

export interface Pipeline {
  repos: InMemoryRepositories;
  http: HttpStub;
  mailbox: FakeMailbox;
  smtp: RecordingTransport;
  notifier: RecordingNotifier;
  vault: CredentialVault;
  rateLimiter: PlatformRateLimitService;
  adapters: AdapterFactory;
  userService: ChannelUserService;
  conversationSync: ConversationSyncService;
  clock: () => Date;
}

/** The collaborators every service test needs, wired over in-process fakes */
export const createPipeline = (now: Date, callLimit = 100): Pipeline => {
  const repos = createInMemoryRepositories();
  const http = new HttpStub();
  const mailbox = new FakeMailbox();
  const smtp = new RecordingTransport();
  const clock = (): Date => now;
  const vault = new CredentialVault({ mode: 'strict', secret: 'test-secret', salt: 'dGVzdC1zYWx0' });
  const rateLimiter = new PlatformRateLimitService(new InMemoryRateLimitStore(), { callLimit, windowMinutes: 60 }, clock);
  const adapters = new AdapterFactory(
    {
      http: http.instance,
      rateLimiter,
      vault,
      graphApi: { baseUrl: 'https://graph.facebook.com', version: 'v21.0' },
    },
    { mailbox, transports: smtp.factory }
  );
  const userService = new ChannelUserService(repos.users, adapters);
  const conversationSync = new ConversationSyncService(
    new CustomerMatcher(repos.customers, repos.users),
    repos.conversations,
    repos.messages
  );

  return {
    repos,
    http,
    mailbox,
    smtp,
    notifier: new RecordingNotifier(),
    vault,
    rateLimiter,
    adapters,
    userService,
    conversationSync,
    clock,
  };
};
