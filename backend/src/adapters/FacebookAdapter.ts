import { BaseChannelAdapter, ChannelAdapterDeps } from './BaseChannelAdapter';
import {
  AccountInfo,
  ChannelEvent,
  ChannelUserProfile,
  WebhookEnvelope,
} from './ChannelAdapter';
import { parseMessagingItem } from './messengerEvents';
import { ChannelAccount, JsonObject, OutboundContent } from '../types';
import { getNumber, getObject, getObjects, getString } from '../utils/payload';

const DEFAULT_WEBHOOK_FIELDS = ['messages', 'messaging_postbacks', 'message_deliveries', 'message_reads'];

/**
 * Facebook Messenger via a Page's Graph API node
 */
export class FacebookAdapter extends BaseChannelAdapter {
  constructor(deps: ChannelAdapterDeps) {
    super('facebook', deps);
  }

  parseDelivery(envelope: WebhookEnvelope, receivedAt: Date): ChannelEvent[] {
    const events: ChannelEvent[] = [];

    for (const entry of envelope.entry) {
      const entryId = getString(entry.id);
      const messaging = getObjects(entry.messaging);

      if (messaging.length === 0) {
        events.push({ kind: 'unknown', entryId, raw: entry, reason: 'entry without messaging' });
        continue;
      }

      for (const item of messaging) {
        events.push(parseMessagingItem(entryId, item, receivedAt));
      }
    }

    return events;
  }

  private pageNode(account: ChannelAccount): string {
    return this.node(account.pageId || account.platformAccountId, 'page id');
  }

  async getAccountInfo(account: ChannelAccount): Promise<AccountInfo> {
    const data = await this.request(account, 'GET', this.pageNode(account), 'account_info', {
      params: { fields: 'id,name,username,about,website,fan_count,picture' },
    });

    return {
      id: getString(data.id),
      username: this.fieldOrUndefined(data, 'username'),
      name: this.fieldOrUndefined(data, 'name'),
      biography: this.fieldOrUndefined(data, 'about'),
      website: this.fieldOrUndefined(data, 'website'),
      followersCount: getNumber(data.fan_count),
      profilePictureUrl: getString(getObject(getObject(data.picture)?.data)?.url) || undefined,
    };
  }

  async getUserProfile(account: ChannelAccount, platformUserId: string): Promise<ChannelUserProfile> {
    const data = await this.request(account, 'GET', platformUserId, 'user_profile', {
      params: { fields: 'first_name,last_name,profile_pic' },
    });

    const name = [getString(data.first_name), getString(data.last_name)].filter(Boolean).join(' ');
    return {
      username: '',
      name,
      profilePictureUrl: getString(data.profile_pic),
    };
  }

  async getConversations(account: ChannelAccount, limit = 50): Promise<JsonObject> {
    return this.request(account, 'GET', `${this.pageNode(account)}/conversations`, 'conversations', {
      params: { fields: 'id,participants,updated_time,message_count', limit },
    });
  }

  async getConversationMessages(account: ChannelAccount, conversationId: string, limit = 50): Promise<JsonObject> {
    return this.request(account, 'GET', `${conversationId}/messages`, 'conversation_messages', {
      params: { fields: 'id,from,to,created_time,message,attachments', limit },
    });
  }

  async subscribeWebhook(
    account: ChannelAccount,
    webhookUrl: string,
    fields: string[] = DEFAULT_WEBHOOK_FIELDS
  ): Promise<JsonObject> {
    return this.request(account, 'POST', `${this.pageNode(account)}/subscribed_apps`, 'subscribe_webhook', {
      data: {
        subscribed_fields: fields.join(','),
        callback_url: webhookUrl,
        verify_token: account.verifyToken,
      },
    });
  }

  protected sendNode(account: ChannelAccount): string {
    return this.pageNode(account);
  }

  protected buildSendPayload(recipientId: string, content: OutboundContent): JsonObject {
    const message: JsonObject =
      content.kind === 'text'
        ? { text: content.text }
        : { attachment: { type: content.kind, payload: { url: content.url, is_reusable: true } } };

    return { recipient: { id: recipientId }, messaging_type: 'RESPONSE', message };
  }
}
