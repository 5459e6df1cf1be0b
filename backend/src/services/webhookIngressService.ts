import { Channel, ChannelAccount } from '../types';
import { AccountRepository } from '../db/repositories';
import { AdapterProvider } from '../adapters/AdapterFactory';
import { UnsupportedOperationError, WebhookEnvelope } from '../adapters/ChannelAdapter';
import {
  AccountNotFoundError,
  MalformedPayloadError,
  SignatureInvalidError,
} from '../middleware/errorHandler';
import { CredentialVault } from '../utils/encryption';
import { getObjects, getString, isJsonObject, toJsonValue } from '../utils/payload';
import { ProcessResult, WebhookEventProcessor } from './webhookEventProcessor';

export interface VerificationQuery {
  mode?: string;
  verifyToken?: string;
  challenge?: string;
}

export interface DeliveryResult {
  events: number;
  results: ProcessResult[];
}

export const parseEnvelope = (rawBody: Buffer): WebhookEnvelope => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody.toString('utf8'));
  } catch {
    throw new MalformedPayloadError('Webhook body is not valid JSON');
  }

  const body = toJsonValue(parsed);
  if (!isJsonObject(body) || !Array.isArray(body.entry)) {
    throw new MalformedPayloadError('Webhook body has no entry array');
  }

  return { object: getString(body.object), entry: getObjects(body.entry) };
};

/**
 * Webhook boundary: subscription handshake and signed event deliveries.
 * Everything before the processor runs is rejected with an HTTP error and leaves no trace.
 */
export class WebhookIngressService {
  constructor(
    private readonly accounts: AccountRepository,
    private readonly adapters: AdapterProvider,
    private readonly vault: CredentialVault,
    private readonly processor: WebhookEventProcessor,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Returns the challenge to echo; throws SignatureInvalidError (403) otherwise */
  async verify(channel: Channel, query: VerificationQuery): Promise<string> {
    this.requireWebhookIngress(channel);
    const { mode, verifyToken, challenge } = query;
    if (mode !== 'subscribe' || !verifyToken || challenge === undefined) {
      throw new SignatureInvalidError('Webhook verification failed');
    }

    const account = await this.accounts.findByVerifyToken(channel, verifyToken);
    const echoed = account
      ? this.adapters.getAdapter(channel).verifyWebhook(account.verifyToken, challenge, verifyToken)
      : null;

    if (echoed === null) {
      console.warn(`[webhook] ${channel} verification rejected`);
      throw new SignatureInvalidError('Webhook verification failed');
    }

    console.log(`[webhook] ${channel} webhook verified for account ${account?.id}`);
    return echoed;
  }

  async receive(channel: Channel, rawBody: Buffer, signatureHeader: string | undefined): Promise<DeliveryResult> {
    this.requireWebhookIngress(channel);
    const receivedAt = this.now();
    const envelope = parseEnvelope(rawBody);
    const accounts = await this.resolveAccounts(channel, envelope);
    const adapter = this.adapters.getAdapter(channel);

    for (const account of accounts.values()) {
      const appSecret = this.vault.decrypt(account.appSecret);
      if (!adapter.verifySignature(rawBody, signatureHeader, appSecret)) {
        console.warn(`[webhook] Invalid ${channel} signature for account ${account.id}`);
        throw new SignatureInvalidError();
      }
    }

    const events = adapter.parseDelivery(envelope, receivedAt);
    const results: ProcessResult[] = [];
    for (const event of events) {
      const account = accounts.get(event.entryId);
      if (!account) {
        console.warn(`[webhook] Event for unresolved entry ${event.entryId}, skipping`);
        continue;
      }
      results.push(await this.processor.process(account, event));
    }

    console.log(`[webhook] ${channel} delivery: ${events.length} event(s), ${results.length} recorded or skipped`);
    return { events: events.length, results };
  }

  /** Polling channels have no webhook; their mail arrives through the mailbox poller */
  private requireWebhookIngress(channel: Channel): void {
    if (this.adapters.getAdapter(channel).ingress !== 'webhook') {
      throw new UnsupportedOperationError(channel, 'Webhook delivery');
    }
  }

  /** Every entry must belong to a known account before anything is verified or stored */
  private async resolveAccounts(channel: Channel, envelope: WebhookEnvelope): Promise<Map<string, ChannelAccount>> {
    const entryIds = [...new Set(envelope.entry.map((entry) => getString(entry.id)))];
    if (entryIds.length === 0) {
      throw new MalformedPayloadError('Webhook body has no entries');
    }

    const accounts = new Map<string, ChannelAccount>();
    for (const entryId of entryIds) {
      const account = entryId ? await this.accounts.findByPlatformAccountId(channel, entryId) : null;
      if (!account) {
        throw new AccountNotFoundError(entryId ? `${channel}:${entryId}` : `${channel}:<missing id>`);
      }
      accounts.set(entryId, account);
    }
    return accounts;
  }
}
