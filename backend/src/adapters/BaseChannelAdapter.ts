import crypto from 'crypto';
import { AxiosInstance, Method, isAxiosError } from 'axios';
import {
  AccountInfo,
  ApiOperation,
  ChannelAdapter,
  ChannelAPIError,
  ChannelEvent,
  ChannelUserProfile,
  InboxBatch,
  IngressMode,
  SendResult,
  UnsupportedOperationError,
  WebhookEnvelope,
} from './ChannelAdapter';
import { Channel, ChannelAccount, JsonObject, JsonValue, OutboundContent } from '../types';
import { CredentialVault } from '../utils/encryption';
import { PlatformRateLimitService } from '../services/platformRateLimitService';
import { getObject, getString, isJsonObject, toJsonValue } from '../utils/payload';

export interface GraphApiSettings {
  baseUrl: string;
  version: string;
}

export interface ChannelAdapterDeps {
  http: AxiosInstance;
  rateLimiter: PlatformRateLimitService;
  vault: CredentialVault;
  graphApi: GraphApiSettings;
}

interface RequestOptions {
  params?: Record<string, string | number>;
  data?: JsonObject;
}

const SIGNATURE_PREFIX = 'sha256=';

/**
 * Shared Graph API plumbing for channel adapters: rate limiting, token
 * decryption, error translation and signature checks.
 */
export abstract class BaseChannelAdapter implements ChannelAdapter {
  readonly ingress: IngressMode = 'webhook';

  constructor(
    public readonly channel: Channel,
    protected readonly deps: ChannelAdapterDeps
  ) {}

  abstract parseDelivery(envelope: WebhookEnvelope, receivedAt: Date): ChannelEvent[];
  abstract getAccountInfo(account: ChannelAccount): Promise<AccountInfo>;
  abstract getUserProfile(account: ChannelAccount, platformUserId: string): Promise<ChannelUserProfile | null>;
  abstract getConversations(account: ChannelAccount, limit?: number): Promise<JsonObject>;
  abstract getConversationMessages(
    account: ChannelAccount,
    conversationId: string,
    limit?: number
  ): Promise<JsonObject>;
  abstract subscribeWebhook(account: ChannelAccount, webhookUrl: string, fields?: string[]): Promise<JsonObject>;

  /** Request body for the channel's send endpoint */
  protected abstract buildSendPayload(recipientId: string, content: OutboundContent): JsonObject;

  /** Node that owns the messages edge (page, IG account or phone number) */
  protected abstract sendNode(account: ChannelAccount): string;

  async sendMessage(account: ChannelAccount, recipientId: string, content: OutboundContent): Promise<SendResult> {
    const response = await this.request(account, 'POST', `${this.sendNode(account)}/messages`, 'send_message', {
      data: this.buildSendPayload(recipientId, content),
    });

    const platformMessageId = this.extractMessageId(response);
    if (!platformMessageId) {
      throw new ChannelAPIError(`${this.channel} send response carried no message id`, this.channel);
    }
    return { platformMessageId, raw: response };
  }

  async fetchInbox(): Promise<InboxBatch> {
    throw new UnsupportedOperationError(this.channel, 'Inbox polling');
  }

  async acknowledgeInbox(): Promise<void> {
    throw new UnsupportedOperationError(this.channel, 'Inbox polling');
  }

  protected extractMessageId(response: JsonObject): string {
    return getString(response.message_id) || getString(response.id);
  }

  verifyWebhook(verifyToken: string, challenge: string, hubVerifyToken: string): string | null {
    return verifyToken !== '' && this.safeEqual(verifyToken, hubVerifyToken) ? challenge : null;
  }

  /**
   * HMAC-SHA256 of the exact request bytes keyed by the app secret, compared
   * in constant time against the header with its algorithm prefix removed.
   */
  verifySignature(rawBody: Buffer, signatureHeader: string | undefined, appSecret: string): boolean {
    if (!signatureHeader || !appSecret) {
      return false;
    }

    const provided = signatureHeader.startsWith(SIGNATURE_PREFIX)
      ? signatureHeader.slice(SIGNATURE_PREFIX.length)
      : signatureHeader;
    const expected = crypto.createHmac('sha256', appSecret).update(rawBody).digest('hex');

    return this.safeEqual(expected, provided.toLowerCase());
  }

  protected safeEqual(a: string, b: string): boolean {
    const left = Buffer.from(a, 'utf8');
    const right = Buffer.from(b, 'utf8');
    if (left.length !== right.length) {
      return false;
    }
    return crypto.timingSafeEqual(left, right);
  }

  /** Graph node id for a request path; an empty id would address the wrong node */
  protected node(id: string, label: string): string {
    if (!id) {
      throw new ChannelAPIError(`${this.channel} account has no ${label}`, this.channel);
    }
    return id;
  }

  protected accessToken(account: ChannelAccount): string {
    return this.deps.vault.decrypt(account.accessToken);
  }

  /**
   * One Graph API call. The rate limiter is consulted (and charged) before any
   * network traffic; failures surface as ChannelAPIError and are never retried here.
   */
  protected async request(
    account: ChannelAccount,
    method: Method,
    path: string,
    endpoint: ApiOperation,
    options: RequestOptions = {}
  ): Promise<JsonObject> {
    await this.deps.rateLimiter.acquire(account.id, endpoint);

    const { baseUrl, version } = this.deps.graphApi;
    try {
      const response = await this.deps.http.request<unknown>({
        method,
        url: `${baseUrl}/${version}/${path}`,
        params: { ...options.params, access_token: this.accessToken(account) },
        data: options.data,
      });

      const body = toJsonValue(response.data);
      if (!isJsonObject(body)) {
        throw new ChannelAPIError(`${this.channel} API returned a non-object response`, this.channel, response.status);
      }
      return body;
    } catch (error) {
      throw this.wrapError(error, endpoint);
    }
  }

  protected wrapError(error: unknown, endpoint: string): ChannelAPIError {
    if (error instanceof ChannelAPIError) {
      return error;
    }

    if (isAxiosError(error)) {
      const status = error.response?.status;
      const graphError = getObject(getObject(toJsonValue(error.response?.data))?.error);
      const platformMessage = getString(graphError?.message);
      const platformCode = getString(graphError?.code);

      let message: string;
      if (platformMessage) {
        message = platformMessage;
      } else if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        message = 'Request timed out';
      } else {
        message = error.message || 'Unknown error';
      }

      console.error(`[${this.channel}] ${endpoint} failed${status ? ` (${status})` : ''}: ${message}`);
      return new ChannelAPIError(`API error: ${message}`, this.channel, status, platformCode || undefined);
    }

    const message = error instanceof Error ? error.message : String(error);
    console.error(`[${this.channel}] ${endpoint} failed: ${message}`);
    return new ChannelAPIError(`Request failed: ${message}`, this.channel);
  }

  protected fieldOrUndefined(data: JsonObject, key: string): string | undefined {
    const value: JsonValue | undefined = data[key];
    return typeof value === 'string' ? value : undefined;
  }
}
