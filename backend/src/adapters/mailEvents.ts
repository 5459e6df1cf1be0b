import { AddressObject, EmailAddress, ParsedMail } from 'mailparser';
import { JsonObject, MessageType } from '../types';
import { getArray, getObject, getObjects, getString, parseTimestamp } from '../utils/payload';
import { InboundContent, MessageReceivedEvent } from './ChannelAdapter';

const addresses = (field: AddressObject | AddressObject[] | undefined): EmailAddress[] => {
  if (!field) {
    return [];
  }
  return (Array.isArray(field) ? field : [field]).flatMap((group) => group.value);
};

/** Parsed mail reduced to the JSON item stored as the event's raw data */
export const toMailItem = (uid: number, mail: ParsedMail): JsonObject => {
  const sender = addresses(mail.from)[0];
  return {
    uid,
    message_id: mail.messageId ?? '',
    in_reply_to: mail.inReplyTo ?? '',
    subject: mail.subject ?? '',
    from: {
      address: (sender?.address ?? '').toLowerCase(),
      name: sender?.name ?? '',
    },
    to: addresses(mail.to).map((recipient) => (recipient.address ?? '').toLowerCase()),
    date: mail.date ? mail.date.toISOString() : null,
    text: (mail.text ?? '').trim(),
    attachments: mail.attachments.map((attachment) => ({
      filename: attachment.filename ?? '',
      content_type: attachment.contentType,
      size: attachment.size,
    })),
  };
};

const attachmentType = (contentType: string): MessageType => {
  const family = contentType.split('/')[0];
  if (family === 'image' || family === 'video' || family === 'audio') {
    return family;
  }
  return 'unsupported';
};

/** Body text wins, then the subject, then the first attachment */
export const parseMailContent = (item: JsonObject): InboundContent => {
  const text = getString(item.text) || getString(item.subject);
  if (text) {
    return { messageType: 'text', text, mediaUrl: '', mediaType: '', storyId: '' };
  }

  const attachment = getObjects(item.attachments)[0];
  if (attachment) {
    const contentType = getString(attachment.content_type);
    return {
      messageType: attachmentType(contentType),
      text: getString(attachment.filename),
      mediaUrl: '',
      mediaType: contentType,
      storyId: '',
    };
  }

  return { messageType: 'unsupported', text: '', mediaUrl: '', mediaType: '', storyId: '' };
};

/**
 * One fetched mail as a message event. The Message-ID header is the platform
 * message id; mail sent from the mailbox itself is an echo.
 */
export const parseMailItem = (entryId: string, item: JsonObject, receivedAt: Date): MessageReceivedEvent => {
  const sender = getObject(item.from);
  const senderId = getString(sender?.address).toLowerCase();
  const recipientId = getString(getArray(item.to)[0]) || entryId;

  return {
    kind: 'message',
    entryId,
    raw: item,
    senderId,
    recipientId,
    messageId: getString(item.message_id),
    timestamp: parseTimestamp(item.date) ?? receivedAt,
    isEcho: senderId !== '' && senderId === entryId.toLowerCase(),
    content: parseMailContent(item),
    profileName: getString(sender?.name) || undefined,
  };
};
