import { InboundContent, ChannelEvent } from './ChannelAdapter';
import { JsonObject, MessageType } from '../types';
import { getArray, getObject, getObjects, getString, parseTimestamp } from '../utils/payload';

/**
 * Parsing of `entry[].messaging[]` items, the Messenger Platform shape shared by
 * Instagram and Facebook Page webhooks.
 */

const ATTACHMENT_TYPES: Record<string, MessageType> = {
  image: 'image',
  video: 'video',
  audio: 'audio',
  share: 'media_share',
  ig_reel: 'media_share',
  reel: 'media_share',
  story_mention: 'story_mention',
  like_heart: 'like',
};

/** Explicit text wins, then the first attachment, then a story reply marker. */
export const parseMessengerContent = (message: JsonObject): InboundContent => {
  const text = getString(message.text);
  if (text) {
    return { messageType: 'text', text, mediaUrl: '', mediaType: '', storyId: '' };
  }

  const [attachment] = getObjects(message.attachments);
  if (attachment) {
    const attachmentType = getString(attachment.type);
    return {
      messageType: ATTACHMENT_TYPES[attachmentType] ?? 'unsupported',
      text: '',
      mediaUrl: getString(getObject(attachment.payload)?.url),
      mediaType: attachmentType,
      storyId: '',
    };
  }

  const story = getObject(getObject(message.reply_to)?.story);
  if (story) {
    return {
      messageType: 'story_reply',
      text: '',
      mediaUrl: getString(story.url),
      mediaType: '',
      storyId: getString(story.id),
    };
  }

  return { messageType: 'unsupported', text: '', mediaUrl: '', mediaType: '', storyId: '' };
};

export const parseMessagingItem = (entryId: string, item: JsonObject, receivedAt: Date): ChannelEvent => {
  const senderId = getString(getObject(item.sender)?.id);
  const recipientId = getString(getObject(item.recipient)?.id);
  const timestamp = parseTimestamp(item.timestamp) ?? receivedAt;

  const message = getObject(item.message);
  if (message) {
    return {
      kind: 'message',
      entryId,
      raw: item,
      senderId,
      recipientId,
      messageId: getString(message.mid),
      timestamp,
      isEcho: message.is_echo === true,
      content: parseMessengerContent(message),
    };
  }

  const read = getObject(item.read);
  if (read) {
    const watermark = parseTimestamp(read.watermark);
    if (watermark && senderId) {
      return { kind: 'read', entryId, raw: item, senderId, watermark };
    }
    return { kind: 'unknown', entryId, raw: item, reason: 'read receipt without sender or watermark' };
  }

  const delivery = getObject(item.delivery);
  if (delivery) {
    const messageIds = getArray(delivery.mids)
      .map((mid) => getString(mid))
      .filter((mid) => mid !== '');
    return {
      kind: 'delivery',
      entryId,
      raw: item,
      senderId,
      messageIds,
      watermark: parseTimestamp(delivery.watermark) ?? null,
    };
  }

  return { kind: 'unknown', entryId, raw: item, reason: 'unrecognised messaging item' };
};
