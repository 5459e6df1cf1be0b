import Joi from 'joi';
import { ImapFlow } from 'imapflow';
import * as nodemailer from 'nodemailer';
import { ChannelAccount } from '../types';
import { ChannelAPIError } from './ChannelAdapter';

export interface MailServer {
  host: string;
  port: number;
  secure: boolean;
  username: string;
}

export interface MailboxSettings {
  address: string;
  displayName: string;
  signature: string;
  syncFolder: string;
  imap: MailServer;
  smtp: MailServer;
}

interface RawMailboxSettings {
  displayName?: string;
  signature?: string;
  syncFolder: string;
  imapHost: string;
  imapPort: number;
  imapSecure: boolean;
  imapUsername?: string;
  smtpHost: string;
  smtpPort: number;
  smtpSecure: boolean;
  smtpUsername?: string;
}

const settingsSchema = Joi.object<RawMailboxSettings>({
  displayName: Joi.string().allow(''),
  signature: Joi.string().allow(''),
  syncFolder: Joi.string().default('INBOX'),
  imapHost: Joi.string().hostname().required(),
  imapPort: Joi.number().port().default(993),
  imapSecure: Joi.boolean().default(true),
  imapUsername: Joi.string().empty(''),
  smtpHost: Joi.string().hostname().required(),
  smtpPort: Joi.number().port().default(465),
  smtpSecure: Joi.boolean().default(true),
  smtpUsername: Joi.string().empty(''),
}).unknown(true);

/**
 * Server settings of an email account. Usernames default to the mailbox address,
 * which is the account's platform id.
 */
export const mailboxSettingsOf = (account: ChannelAccount): MailboxSettings => {
  const { error, value } = settingsSchema.validate(account.settings, { convert: true });
  if (error) {
    throw new ChannelAPIError(`email account settings are invalid: ${error.message}`, 'email');
  }

  const address = account.platformAccountId;
  return {
    address,
    displayName: value.displayName || account.name || address,
    signature: value.signature ?? '',
    syncFolder: value.syncFolder,
    imap: {
      host: value.imapHost,
      port: value.imapPort,
      secure: value.imapSecure,
      username: value.imapUsername ?? address,
    },
    smtp: {
      host: value.smtpHost,
      port: value.smtpPort,
      secure: value.smtpSecure,
      username: value.smtpUsername ?? address,
    },
  };
};

export interface MailboxLogin {
  server: MailServer;
  password: string;
  folder: string;
}

export interface FetchedMail {
  uid: number;
  source: Buffer;
}

/** IMAP access an email adapter needs */
export interface MailboxClient {
  verify(login: MailboxLogin): Promise<void>;
  /** Oldest unseen messages first, without setting \Seen */
  fetchUnseen(login: MailboxLogin, limit: number): Promise<FetchedMail[]>;
  markSeen(login: MailboxLogin, uids: number[]): Promise<void>;
}

/**
 * MailboxClient over imapflow. Each call opens its own connection and holds the
 * folder lock for its duration.
 */
export class ImapFlowMailbox implements MailboxClient {
  async verify(login: MailboxLogin): Promise<void> {
    await this.session(login, async () => undefined);
  }

  async fetchUnseen(login: MailboxLogin, limit: number): Promise<FetchedMail[]> {
    return this.session(login, async (client) => {
      const found = await client.search({ seen: false }, { uid: true });
      const uids = (Array.isArray(found) ? found : []).sort((a, b) => a - b).slice(0, limit);
      if (uids.length === 0) {
        return [];
      }

      const fetched: FetchedMail[] = [];
      for await (const message of client.fetch(uids, { uid: true, source: true }, { uid: true })) {
        if (message.source) {
          fetched.push({ uid: message.uid, source: message.source });
        }
      }
      return fetched;
    });
  }

  async markSeen(login: MailboxLogin, uids: number[]): Promise<void> {
    if (uids.length === 0) {
      return;
    }
    await this.session(login, async (client) => {
      await client.messageFlagsAdd(uids, ['\\Seen'], { uid: true });
    });
  }

  private async session<T>(login: MailboxLogin, work: (client: ImapFlow) => Promise<T>): Promise<T> {
    const client = new ImapFlow({
      host: login.server.host,
      port: login.server.port,
      secure: login.server.secure,
      auth: { user: login.server.username, pass: login.password },
      logger: false,
    });

    await client.connect();
    try {
      const lock = await client.getMailboxLock(login.folder);
      try {
        return await work(client);
      } finally {
        lock.release();
      }
    } finally {
      await client.logout();
    }
  }
}

export interface SentMail {
  messageId: string;
  response?: string;
}

/** The part of a nodemailer transporter the adapter uses */
export interface MailTransport {
  sendMail(mail: nodemailer.SendMailOptions): Promise<SentMail>;
  verify(): Promise<true>;
}

export type MailTransportFactory = (server: MailServer, password: string) => MailTransport;

/** SMTP transporter; nodemailer connects lazily on the first send or verify */
export const createSmtpTransport: MailTransportFactory = (server, password) =>
  nodemailer.createTransport({
    host: server.host,
    port: server.port,
    secure: server.secure,
    auth: { user: server.username, pass: password },
  });
