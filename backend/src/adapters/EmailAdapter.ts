import crypto from 'crypto';
import { simpleParser } from 'mailparser';
import { ChannelAccount, JsonObject, OutboundContent } from '../types';
import { CredentialVault } from '../utils/encryption';
import { PlatformRateLimitService } from '../services/platformRateLimitService';
import { getObjects, getString } from '../utils/payload';
import {
  AccountInfo,
  ApiOperation,
  ChannelAdapter,
  ChannelAPIError,
  ChannelEvent,
  ChannelUserProfile,
  InboxBatch,
  SendResult,
  UnsupportedOperationError,
  WebhookEnvelope,
} from './ChannelAdapter';
import { parseMailItem, toMailItem } from './mailEvents';
import {
  MailboxClient,
  MailboxLogin,
  MailboxSettings,
  MailTransport,
  MailTransportFactory,
  mailboxSettingsOf,
} from './mailbox';

export interface EmailAdapterDeps {
  rateLimiter: PlatformRateLimitService;
  vault: CredentialVault;
  mailbox: MailboxClient;
  transports: MailTransportFactory;
}

const domainOf = (address: string): string => address.split('@')[1] || 'localhost';

/**
 * Email over IMAP and SMTP. Inbound mail is pulled from the sync folder rather
 * than pushed, so the webhook half of the adapter refuses everything.
 */
export class EmailAdapter implements ChannelAdapter {
  readonly channel = 'email';
  readonly ingress = 'polling';

  constructor(private readonly deps: EmailAdapterDeps) {}

  verifySignature(): boolean {
    return false;
  }

  verifyWebhook(): string | null {
    return null;
  }

  parseDelivery(envelope: WebhookEnvelope, receivedAt: Date): ChannelEvent[] {
    return envelope.entry.flatMap((entry) => {
      const entryId = getString(entry.id);
      return getObjects(entry.messages).map((item) => parseMailItem(entryId, item, receivedAt));
    });
  }

  /** Logs in to both servers; the mailbox has no profile beyond its address */
  async getAccountInfo(account: ChannelAccount): Promise<AccountInfo> {
    const settings = mailboxSettingsOf(account);
    await this.deps.rateLimiter.acquire(account.id, 'account_info');

    await this.call('account_info', async () => {
      await this.deps.mailbox.verify(this.imapLogin(account, settings));
      await this.transport(account, settings).verify();
    });
    return { id: settings.address, username: settings.address };
  }

  async getUserProfile(): Promise<ChannelUserProfile | null> {
    return null;
  }

  async sendMessage(account: ChannelAccount, recipientId: string, content: OutboundContent): Promise<SendResult> {
    const settings = mailboxSettingsOf(account);
    await this.deps.rateLimiter.acquire(account.id, 'send_message');

    const messageId = `<${crypto.randomUUID()}@${domainOf(settings.address)}>`;
    const body = content.kind === 'text' ? content.text : content.url;
    const text = settings.signature ? `${body}\n\n-- \n${settings.signature}` : body;

    const sent = await this.call('send_message', () =>
      this.transport(account, settings).sendMail({
        from: { name: settings.displayName, address: settings.address },
        to: recipientId,
        subject: `Message from ${settings.displayName}`,
        text,
        messageId,
        attachments: content.kind === 'text' ? undefined : [{ path: content.url }],
      })
    );

    const platformMessageId = sent.messageId || messageId;
    return { platformMessageId, raw: { messageId: platformMessageId, response: sent.response ?? '' } };
  }

  async getConversations(): Promise<JsonObject> {
    throw new UnsupportedOperationError(this.channel, 'Conversation listing');
  }

  async getConversationMessages(): Promise<JsonObject> {
    throw new UnsupportedOperationError(this.channel, 'Conversation listing');
  }

  async subscribeWebhook(): Promise<JsonObject> {
    throw new UnsupportedOperationError(this.channel, 'Webhook subscription');
  }

  /** Unseen mail from the sync folder, parsed into one entry under the mailbox address */
  async fetchInbox(account: ChannelAccount, limit: number): Promise<InboxBatch> {
    const settings = mailboxSettingsOf(account);
    await this.deps.rateLimiter.acquire(account.id, 'inbox_poll');

    return this.call('inbox_poll', async () => {
      const fetched = await this.deps.mailbox.fetchUnseen(this.imapLogin(account, settings), limit);
      const items = await Promise.all(
        fetched.map(async (mail) => toMailItem(mail.uid, await simpleParser(mail.source)))
      );
      return {
        envelope: { object: 'email', entry: [{ id: account.platformAccountId, messages: items }] },
        uids: fetched.map((mail) => mail.uid),
      };
    });
  }

  async acknowledgeInbox(account: ChannelAccount, uids: number[]): Promise<void> {
    if (uids.length === 0) {
      return;
    }
    const settings = mailboxSettingsOf(account);
    await this.call('inbox_poll', () => this.deps.mailbox.markSeen(this.imapLogin(account, settings), uids));
  }

  private imapLogin(account: ChannelAccount, settings: MailboxSettings): MailboxLogin {
    return {
      server: settings.imap,
      password: this.deps.vault.decrypt(account.accessToken),
      folder: settings.syncFolder,
    };
  }

  private transport(account: ChannelAccount, settings: MailboxSettings): MailTransport {
    return this.deps.transports(settings.smtp, this.deps.vault.decrypt(account.appSecret));
  }

  /** Mail server failures surface as ChannelAPIError, like Graph failures do */
  private async call<T>(operation: ApiOperation, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (error instanceof ChannelAPIError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[email] ${operation} failed: ${message}`);
      throw new ChannelAPIError(`Mail server error: ${message}`, this.channel);
    }
  }
}
