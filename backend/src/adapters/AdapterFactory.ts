import { Channel } from '../types';
import { ChannelAdapter } from './ChannelAdapter';
import { ChannelAdapterDeps } from './BaseChannelAdapter';
import { InstagramAdapter } from './InstagramAdapter';
import { WhatsAppAdapter } from './WhatsAppAdapter';
import { FacebookAdapter } from './FacebookAdapter';
import { EmailAdapter } from './EmailAdapter';
import { ImapFlowMailbox, MailboxClient, MailTransportFactory, createSmtpTransport } from './mailbox';

/** Mail server access for the email channel */
export interface MailDeps {
  mailbox: MailboxClient;
  transports: MailTransportFactory;
}

/**
 * Builds and caches one adapter per channel over shared dependencies
 */
export class AdapterFactory {
  private readonly adapters = new Map<Channel, ChannelAdapter>();

  constructor(
    private readonly deps: ChannelAdapterDeps,
    private readonly mail: MailDeps = { mailbox: new ImapFlowMailbox(), transports: createSmtpTransport }
  ) {}

  getAdapter(channel: Channel): ChannelAdapter {
    const cached = this.adapters.get(channel);
    if (cached) {
      return cached;
    }

    const adapter = this.createAdapter(channel);
    this.adapters.set(channel, adapter);
    return adapter;
  }

  private createAdapter(channel: Channel): ChannelAdapter {
    switch (channel) {
      case 'instagram':
        return new InstagramAdapter(this.deps);
      case 'whatsapp':
        return new WhatsAppAdapter(this.deps);
      case 'facebook':
        return new FacebookAdapter(this.deps);
      case 'email':
        return new EmailAdapter({ rateLimiter: this.deps.rateLimiter, vault: this.deps.vault, ...this.mail });
      default: {
        const unsupported: never = channel;
        throw new Error(`Unsupported channel: ${String(unsupported)}`);
      }
    }
  }
}

/** The slice of the factory services depend on */
export type AdapterProvider = Pick<AdapterFactory, 'getAdapter'>;
