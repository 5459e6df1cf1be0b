import { BaseChannelAdapter, ChannelAdapterDeps } from './BaseChannelAdapter';
import {
  AccountInfo,
  ChannelEvent,
  InboundContent,
  MessageStatusEvent,
  UnsupportedOperationError,
  WebhookEnvelope,
} from './ChannelAdapter';
import { ChannelAccount, JsonObject, MessageType, OutboundContent } from '../types';
import { getObject, getObjects, getString, parseTimestamp } from '../utils/payload';

const MEDIA_TYPES: Record<string, MessageType> = {
  image: 'image',
  sticker: 'image',
  video: 'video',
  audio: 'audio',
  voice: 'audio',
};

const STATUSES: readonly MessageStatusEvent['status'][] = ['sent', 'delivered', 'read', 'failed'];

const isStatus = (value: string): value is MessageStatusEvent['status'] =>
  STATUSES.some((status) => status === value);

/**
 * WhatsApp Business Cloud API. Accounts are keyed by the WhatsApp business
 * account id; `pageId` holds the phone number id that sends.
 */
export class WhatsAppAdapter extends BaseChannelAdapter {
  constructor(deps: ChannelAdapterDeps) {
    super('whatsapp', deps);
  }

  parseDelivery(envelope: WebhookEnvelope, receivedAt: Date): ChannelEvent[] {
    const events: ChannelEvent[] = [];

    for (const entry of envelope.entry) {
      const entryId = getString(entry.id);
      const changes = getObjects(entry.changes);

      if (changes.length === 0) {
        events.push({ kind: 'unknown', entryId, raw: entry, reason: 'entry without changes' });
      }

      for (const change of changes) {
        const value = getObject(change.value);
        if (getString(change.field) !== 'messages' || !value) {
          events.push({ kind: 'unknown', entryId, raw: change, reason: `unhandled change field ${getString(change.field)}` });
          continue;
        }

        const phoneNumberId = getString(getObject(value.metadata)?.phone_number_id);
        const contacts = getObjects(value.contacts);
        const messages = getObjects(value.messages);
        const statuses = getObjects(value.statuses);

        for (const message of messages) {
          const from = getString(message.from);
          const contact = contacts.find((candidate) => getString(candidate.wa_id) === from);
          const profileName = getString(getObject(contact?.profile)?.name);

          events.push({
            kind: 'message',
            entryId,
            raw: message,
            senderId: from,
            recipientId: phoneNumberId,
            messageId: getString(message.id),
            timestamp: parseTimestamp(message.timestamp) ?? receivedAt,
            isEcho: false,
            content: this.parseContent(message),
            profileName: profileName || undefined,
          });
        }

        for (const status of statuses) {
          events.push(this.parseStatus(entryId, status, receivedAt));
        }

        if (messages.length === 0 && statuses.length === 0) {
          events.push({ kind: 'unknown', entryId, raw: change, reason: 'messages change without messages or statuses' });
        }
      }
    }

    return events;
  }

  private parseStatus(entryId: string, status: JsonObject, receivedAt: Date): ChannelEvent {
    const value = getString(status.status);
    if (!isStatus(value)) {
      return { kind: 'unknown', entryId, raw: status, reason: `unhandled status ${value}` };
    }

    const [firstError] = getObjects(status.errors);
    return {
      kind: 'status',
      entryId,
      raw: status,
      messageId: getString(status.id),
      recipientId: getString(status.recipient_id),
      status: value,
      timestamp: parseTimestamp(status.timestamp) ?? receivedAt,
      errorCode: getString(firstError?.code),
      errorMessage: getString(firstError?.title),
    };
  }

  private parseContent(message: JsonObject): InboundContent {
    const type = getString(message.type);
    const empty: InboundContent = { messageType: 'text', text: '', mediaUrl: '', mediaType: '', storyId: '' };

    if (type === 'text') {
      return { ...empty, text: getString(getObject(message.text)?.body) };
    }

    const mediaType = MEDIA_TYPES[type];
    if (mediaType) {
      const media = getObject(message[type]);
      return {
        ...empty,
        messageType: mediaType,
        text: getString(media?.caption),
        mediaUrl: getString(media?.link),
        mediaType: getString(media?.mime_type) || type,
      };
    }

    switch (type) {
      case 'reaction':
        return { ...empty, messageType: 'like', text: getString(getObject(message.reaction)?.emoji) };
      case 'location': {
        const location = getObject(message.location);
        return { ...empty, text: `Location: ${getString(location?.latitude)}, ${getString(location?.longitude)}` };
      }
      case 'contacts': {
        const [contact] = getObjects(message.contacts);
        const name = getString(getObject(contact?.name)?.formatted_name) || 'Unknown';
        return { ...empty, text: `Contact: ${name}` };
      }
      case 'button':
        return { ...empty, text: getString(getObject(message.button)?.text) };
      default: {
        const document = getObject(message.document);
        return {
          ...empty,
          messageType: 'unsupported',
          text: getString(document?.caption),
          mediaType: document ? getString(document.mime_type) : type,
        };
      }
    }
  }

  async getAccountInfo(account: ChannelAccount): Promise<AccountInfo> {
    const data = await this.request(account, 'GET', this.sendNode(account), 'account_info', {
      params: { fields: 'id,verified_name,display_phone_number,quality_rating' },
    });

    return {
      id: getString(data.id),
      username: this.fieldOrUndefined(data, 'display_phone_number'),
      name: this.fieldOrUndefined(data, 'verified_name'),
    };
  }

  /** The Cloud API has no profile lookup; names arrive with each message */
  async getUserProfile(): Promise<null> {
    return null;
  }

  async getConversations(): Promise<JsonObject> {
    throw new UnsupportedOperationError('whatsapp', 'getConversations');
  }

  async getConversationMessages(): Promise<JsonObject> {
    throw new UnsupportedOperationError('whatsapp', 'getConversationMessages');
  }

  async subscribeWebhook(account: ChannelAccount, webhookUrl: string): Promise<JsonObject> {
    return this.request(account, 'POST', `${this.node(account.platformAccountId, 'business account id')}/subscribed_apps`, 'subscribe_webhook', {
      data: {
        override_callback_uri: webhookUrl,
        verify_token: account.verifyToken,
      },
    });
  }

  protected sendNode(account: ChannelAccount): string {
    return this.node(account.pageId, 'phone number id');
  }

  protected buildSendPayload(recipientId: string, content: OutboundContent): JsonObject {
    const base: JsonObject = {
      messaging_product: 'whatsapp',
      recipient_type: 'individual',
      to: recipientId,
    };

    if (content.kind === 'text') {
      return { ...base, type: 'text', text: { body: content.text, preview_url: false } };
    }
    return { ...base, type: content.kind, [content.kind]: { link: content.url } };
  }

  protected extractMessageId(response: JsonObject): string {
    const [message] = getObjects(response.messages);
    return getString(message?.id);
  }
}
