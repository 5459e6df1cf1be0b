import { BaseChannelAdapter, ChannelAdapterDeps } from './BaseChannelAdapter';
import {
  AccountInfo,
  ChannelEvent,
  ChannelUserProfile,
  WebhookEnvelope,
} from './ChannelAdapter';
import { parseMessagingItem } from './messengerEvents';
import { ChannelAccount, JsonObject, OutboundContent } from '../types';
import { getNumber, getObject, getObjects, getString, parseTimestamp } from '../utils/payload';

const DEFAULT_WEBHOOK_FIELDS = ['messages', 'messaging_seen', 'story_insights'];
const STORY_LIFETIME_MS = 24 * 60 * 60 * 1000;

/**
 * Instagram Messaging via the Graph API (Instagram business accounts linked to a Page)
 */
export class InstagramAdapter extends BaseChannelAdapter {
  constructor(deps: ChannelAdapterDeps) {
    super('instagram', deps);
  }

  parseDelivery(envelope: WebhookEnvelope, receivedAt: Date): ChannelEvent[] {
    const events: ChannelEvent[] = [];

    for (const entry of envelope.entry) {
      const entryId = getString(entry.id);
      const messaging = getObjects(entry.messaging);
      const changes = getObjects(entry.changes);

      for (const item of messaging) {
        events.push(parseMessagingItem(entryId, item, receivedAt));
      }

      for (const change of changes) {
        events.push(this.parseChange(entryId, change, receivedAt));
      }

      if (messaging.length === 0 && changes.length === 0) {
        events.push({ kind: 'unknown', entryId, raw: entry, reason: 'entry without messaging or changes' });
      }
    }

    return events;
  }

  private parseChange(entryId: string, change: JsonObject, receivedAt: Date): ChannelEvent {
    const value = getObject(change.value);
    if (getString(change.field) !== 'story_insights' || !value) {
      return { kind: 'unknown', entryId, raw: change, reason: `unhandled change field ${getString(change.field)}` };
    }

    const storyId = getString(value.story_id) || getString(value.media_id);
    if (!storyId) {
      return { kind: 'unknown', entryId, raw: change, reason: 'story insight without story id' };
    }

    const timestamp = parseTimestamp(value.timestamp) ?? receivedAt;
    return {
      kind: 'story_insight',
      entryId,
      raw: change,
      storyId,
      mediaUrl: getString(value.media_url),
      mediaType: getString(value.media_type),
      caption: getString(value.caption),
      timestamp,
      expiresAt: parseTimestamp(value.expires_at) ?? new Date(timestamp.getTime() + STORY_LIFETIME_MS),
    };
  }

  async getAccountInfo(account: ChannelAccount): Promise<AccountInfo> {
    const data = await this.request(account, 'GET', this.accountNode(account), 'account_info', {
      params: { fields: 'id,username,name,biography,website,followers_count,profile_picture_url' },
    });

    return {
      id: getString(data.id),
      username: this.fieldOrUndefined(data, 'username'),
      name: this.fieldOrUndefined(data, 'name'),
      biography: this.fieldOrUndefined(data, 'biography'),
      website: this.fieldOrUndefined(data, 'website'),
      followersCount: getNumber(data.followers_count),
      profilePictureUrl: this.fieldOrUndefined(data, 'profile_picture_url'),
    };
  }

  async getUserProfile(account: ChannelAccount, platformUserId: string): Promise<ChannelUserProfile> {
    const data = await this.request(account, 'GET', platformUserId, 'user_profile', {
      params: { fields: 'id,username,name,profile_picture_url' },
    });

    return {
      username: getString(data.username),
      name: getString(data.name),
      profilePictureUrl: getString(data.profile_picture_url),
    };
  }

  async getConversations(account: ChannelAccount, limit = 50): Promise<JsonObject> {
    return this.request(account, 'GET', `${this.accountNode(account)}/conversations`, 'conversations', {
      params: { platform: 'instagram', fields: 'id,participants,updated_time,message_count', limit },
    });
  }

  async getConversationMessages(account: ChannelAccount, conversationId: string, limit = 50): Promise<JsonObject> {
    return this.request(account, 'GET', `${conversationId}/messages`, 'conversation_messages', {
      params: { fields: 'id,from,to,created_time,message,attachments,story', limit },
    });
  }

  async subscribeWebhook(
    account: ChannelAccount,
    webhookUrl: string,
    fields: string[] = DEFAULT_WEBHOOK_FIELDS
  ): Promise<JsonObject> {
    return this.request(account, 'POST', `${this.node(account.pageId, 'page id')}/subscribed_apps`, 'subscribe_webhook', {
      data: {
        subscribed_fields: fields.join(','),
        callback_url: webhookUrl,
        verify_token: account.verifyToken,
      },
    });
  }

  protected sendNode(account: ChannelAccount): string {
    return this.accountNode(account);
  }

  private accountNode(account: ChannelAccount): string {
    return this.node(account.platformAccountId, 'Instagram account id');
  }

  protected buildSendPayload(recipientId: string, content: OutboundContent): JsonObject {
    const message: JsonObject =
      content.kind === 'text'
        ? { text: content.text }
        : { attachment: { type: content.kind, payload: { url: content.url } } };

    return { recipient: { id: recipientId }, message };
  }
}
