import {
  MessageReceivedEvent,
  MessageStatusEvent,
  StoryInsightEvent,
} from '../adapters/ChannelAdapter';
import { ChannelAccount, ChannelMessage, MessageStatus } from '../types';
import { WebhookEventProcessor, classifyEvent, eventIdFor, isEcho } from '../services/webhookEventProcessor';
import { WebSocketEvent } from '../services/websocketService';
import { buildAccount } from './helpers/inMemoryRepositories';
import { Pipeline, createPipeline } from './helpers/pipeline';

const NOW = new Date('2024-05-01T12:00:00.000Z');
const ENTRY_ID = '17841400000000001';

const messageEvent = (overrides: Partial<MessageReceivedEvent> = {}): MessageReceivedEvent => ({
  kind: 'message',
  entryId: ENTRY_ID,
  raw: { sender: { id: 'igsid-1' }, message: { mid: 'mid.1', text: 'hello' } },
  senderId: 'igsid-1',
  recipientId: ENTRY_ID,
  messageId: 'mid.1',
  timestamp: new Date('2024-05-01T11:59:00.000Z'),
  isEcho: false,
  content: { messageType: 'text', text: 'hello', mediaUrl: '', mediaType: '', storyId: '' },
  ...overrides,
});

const storyInsight = (storyId: string): StoryInsightEvent => ({
  kind: 'story_insight',
  entryId: ENTRY_ID,
  raw: { field: 'story_insights', value: { story_id: storyId } },
  storyId,
  mediaUrl: `https://cdn.example.com/${storyId}.jpg`,
  mediaType: 'IMAGE',
  caption: 'Launch day',
  timestamp: new Date('2024-05-01T08:00:00.000Z'),
  expiresAt: new Date('2024-05-02T08:00:00.000Z'),
});

describe('WebhookEventProcessor', () => {
  let pipeline: Pipeline;
  let account: ChannelAccount;
  let processor: WebhookEventProcessor;

  const seedOutbound = async (
    platformMessageId: string,
    status: MessageStatus,
    timestamp: Date
  ): Promise<ChannelMessage> => {
    const { user } = await pipeline.repos.users.findOrCreate(account.id, 'igsid-1');
    const { message } = await pipeline.repos.messages.create({
      messageId: `out_${platformMessageId}`,
      platformMessageId,
      accountId: account.id,
      channelUserId: user.id,
      messageType: 'text',
      direction: 'outbound',
      status,
      text: 'Thanks for reaching out',
      mediaUrl: '',
      mediaType: '',
      storyId: '',
      payload: {},
      timestamp,
    });
    return message;
  };

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    pipeline = createPipeline(NOW);
    account = pipeline.repos.accounts.add(buildAccount());
    processor = new WebhookEventProcessor(
      pipeline.repos,
      pipeline.userService,
      pipeline.conversationSync,
      pipeline.notifier,
      pipeline.clock
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('eventIdFor', () => {
    it('should key messages by their platform id', () => {
      expect(eventIdFor('instagram', messageEvent())).toBe('instagram:17841400000000001:msg:mid.1');
    });

    it('should key read receipts by sender and watermark', () => {
      const id = eventIdFor('facebook', {
        kind: 'read',
        entryId: '100000000000001',
        raw: {},
        senderId: 'psid-1',
        watermark: new Date(1714564800000),
      });

      expect(id).toBe('facebook:100000000000001:read:psid-1:1714564800000');
    });

    it('should key statuses by message and status', () => {
      const status: MessageStatusEvent = {
        kind: 'status',
        entryId: 'waba-1',
        raw: {},
        messageId: 'wamid.out.1',
        recipientId: '15550001111',
        status: 'delivered',
        timestamp: NOW,
        errorCode: '',
        errorMessage: '',
      };

      expect(eventIdFor('whatsapp', status)).toBe('whatsapp:waba-1:status:wamid.out.1:delivered');
    });

    it('should hash events without a platform id, ignoring key order', () => {
      const first = eventIdFor('instagram', messageEvent({ messageId: '', raw: { a: 1, b: { c: 2, d: 3 } } }));
      const second = eventIdFor('instagram', messageEvent({ messageId: '', raw: { b: { d: 3, c: 2 }, a: 1 } }));

      expect(first).toMatch(/^instagram:17841400000000001:hash:[0-9a-f]{64}$/);
      expect(second).toBe(first);
    });
  });

  it('should classify events by kind', () => {
    expect(classifyEvent(messageEvent())).toBe('messages');
    expect(classifyEvent(storyInsight('story-1'))).toBe('story_insights');
    expect(classifyEvent({ kind: 'unknown', entryId: ENTRY_ID, raw: {}, reason: 'x' })).toBe('unknown');
  });

  it('should treat the account own sends as echoes', () => {
    expect(isEcho(account, messageEvent({ isEcho: true }))).toBe(true);
    expect(isEcho(account, messageEvent({ senderId: '17841400000000001' }))).toBe(true);
    expect(isEcho(account, messageEvent({ senderId: '100000000000001' }))).toBe(true);
    expect(isEcho(account, messageEvent())).toBe(false);
  });

  describe('inbound messages', () => {
    beforeEach(() => {
      pipeline.http.reply(200, {
        id: 'igsid-1',
        username: 'ana.lima',
        name: 'Ana Lima',
        profile_picture_url: 'https://cdn.example.com/ana.jpg',
      });
    });

    it('should store the message, its user, counters and conversation', async () => {
      const result = await processor.process(account, messageEvent());

      expect(result).toEqual({ eventId: 'instagram:17841400000000001:msg:mid.1', outcome: 'processed' });

      const [message] = pipeline.repos.messages.all();
      expect(message).toMatchObject({
        messageId: 'instagram:17841400000000001:msg:mid.1',
        platformMessageId: 'mid.1',
        accountId: account.id,
        direction: 'inbound',
        status: 'delivered',
        messageType: 'text',
        text: 'hello',
        deliveredAt: new Date('2024-05-01T11:59:00.000Z'),
      });

      const user = await pipeline.repos.users.findByPlatformUserId(account.id, 'igsid-1');
      expect(user).toMatchObject({
        username: 'ana.lima',
        name: 'Ana Lima',
        profilePictureUrl: 'https://cdn.example.com/ana.jpg',
        totalMessagesReceived: 1,
        lastInteractionAt: new Date('2024-05-01T11:59:00.000Z'),
      });
      expect(pipeline.repos.accounts.get(account.id).totalMessagesReceived).toBe(1);

      const [customer] = [...pipeline.repos.customers.rows.values()];
      expect(customer).toMatchObject({ firstName: 'Ana', lastName: 'Lima', source: 'instagram' });
      expect(user?.customerId).toBe(customer.id);

      const [conversation] = [...pipeline.repos.conversations.rows.values()];
      expect(conversation).toMatchObject({ customerId: customer.id, channel: 'instagram', status: 'new', unreadCount: 1 });
      expect(message.conversationId).toBe(conversation.id);
      expect([...pipeline.repos.conversations.messages.values()]).toEqual([
        expect.objectContaining({
          channelMessageId: message.id,
          externalMessageId: 'mid.1',
          senderType: 'customer',
          senderName: 'Ana Lima',
          content: 'hello',
        }),
      ]);

      expect(pipeline.notifier.published).toEqual([
        {
          group: `account:${account.id}`,
          event: expect.objectContaining({
            type: WebSocketEvent.NEW_MESSAGE,
            payload: expect.objectContaining({
              message: expect.objectContaining({ id: message.id, conversationId: conversation.id }),
              timestamp: NOW.toISOString(),
            }),
          }),
        },
      ]);

      const [record] = pipeline.repos.webhookEvents.all();
      expect(record).toMatchObject({
        eventType: 'messages',
        status: 'processed',
        processedData: {
          messageId: 'instagram:17841400000000001:msg:mid.1',
          messageType: 'text',
          channelUserId: user?.id,
          created: true,
        },
        channelUserId: user?.id,
        channelMessageId: message.id,
      });
    });

    it('should apply a redelivered event only once', async () => {
      await processor.process(account, messageEvent());
      const second = await processor.process(account, messageEvent());

      expect(second.outcome).toBe('duplicate');
      expect(pipeline.repos.messages.all()).toHaveLength(1);
      expect(pipeline.repos.webhookEvents.all()).toHaveLength(1);
      expect(pipeline.repos.accounts.get(account.id).totalMessagesReceived).toBe(1);
      expect(pipeline.notifier.published).toHaveLength(1);
      expect(pipeline.http.requests).toHaveLength(1);
    });

    it('should keep the message when conversation sync fails', async () => {
      jest.spyOn(pipeline.conversationSync, 'syncToConversation').mockRejectedValueOnce(new Error('inbox unavailable'));

      const result = await processor.process(account, messageEvent());

      expect(result.outcome).toBe('processed');
      const [message] = pipeline.repos.messages.all();
      expect(message.conversationId).toBeNull();
      expect(pipeline.notifier.published).toEqual([
        {
          group: `account:${account.id}`,
          event: expect.objectContaining({
            payload: expect.objectContaining({ message: expect.objectContaining({ conversationId: null }) }),
          }),
        },
      ]);
    });
  });

  it('should use the name sent with the message instead of a profile lookup', async () => {
    const whatsapp = pipeline.repos.accounts.add(
      buildAccount({ channel: 'whatsapp', platformAccountId: 'waba-1', pageId: '100000000000001' })
    );

    await processor.process(
      whatsapp,
      messageEvent({ entryId: 'waba-1', senderId: '15550001111', messageId: 'wamid.in.1', profileName: 'Bruno Costa' })
    );

    const user = await pipeline.repos.users.findByPlatformUserId(whatsapp.id, '15550001111');
    expect(user?.name).toBe('Bruno Costa');
    expect(pipeline.http.requests).toHaveLength(0);
  });

  it('should ignore echoes without storing a message', async () => {
    const result = await processor.process(account, messageEvent({ isEcho: true }));

    expect(result.outcome).toBe('ignored');
    expect(pipeline.repos.messages.all()).toHaveLength(0);
    expect(pipeline.repos.webhookEvents.all()[0]).toMatchObject({ status: 'ignored', processedData: { reason: 'echo' } });
  });

  it('should record unknown events as ignored', async () => {
    const result = await processor.process(account, {
      kind: 'unknown',
      entryId: ENTRY_ID,
      raw: { field: 'comments' },
      reason: 'unhandled change field comments',
    });

    expect(result.outcome).toBe('ignored');
    expect(pipeline.repos.webhookEvents.all()[0]).toMatchObject({
      eventType: 'unknown',
      status: 'ignored',
      processedData: { reason: 'unhandled change field comments' },
    });
  });

  it('should record a failure when marking an event ignored fails', async () => {
    jest.spyOn(pipeline.repos.webhookEvents, 'markIgnored').mockRejectedValueOnce(new Error('connection reset'));

    const result = await processor.process(account, messageEvent({ isEcho: true }));

    expect(result).toEqual({ eventId: 'instagram:17841400000000001:msg:mid.1', outcome: 'failed' });
    expect(pipeline.repos.webhookEvents.all()[0]).toMatchObject({ status: 'failed', errorMessage: 'connection reset' });
  });

  it('should record a failing event and keep processing the next one', async () => {
    jest.spyOn(pipeline.repos.messages, 'create').mockRejectedValueOnce(new Error('connection reset'));

    const failed = await processor.process(account, messageEvent());
    const next = await processor.process(account, messageEvent({ messageId: 'mid.2' }));

    expect(failed.outcome).toBe('failed');
    expect(next.outcome).toBe('processed');
    const [first, second] = pipeline.repos.webhookEvents.all();
    expect(first).toMatchObject({ status: 'failed', errorMessage: 'connection reset' });
    expect(second).toMatchObject({ status: 'processed' });
  });

  it('should fail message events that carry no sender', async () => {
    const result = await processor.process(account, messageEvent({ senderId: '' }));

    expect(result.outcome).toBe('failed');
    expect(pipeline.repos.webhookEvents.all()[0].errorMessage).toBe('Message event without sender id');
  });

  describe('read receipts', () => {
    it('should mark outbound messages up to the watermark as read', async () => {
      const early = await seedOutbound('mid.out.1', 'sent', new Date('2024-05-01T11:00:00.000Z'));
      const late = await seedOutbound('mid.out.2', 'delivered', new Date('2024-05-01T11:30:00.000Z'));

      const result = await processor.process(account, {
        kind: 'read',
        entryId: ENTRY_ID,
        raw: {},
        senderId: 'igsid-1',
        watermark: new Date('2024-05-01T11:15:00.000Z'),
      });

      expect(result.outcome).toBe('processed');
      expect(pipeline.repos.messages.get(early.id)).toMatchObject({ status: 'read', readAt: NOW });
      expect(pipeline.repos.messages.get(late.id).status).toBe('delivered');
      expect(pipeline.notifier.published).toEqual([
        {
          group: `account:${account.id}`,
          event: {
            type: WebSocketEvent.MESSAGE_STATUS_UPDATE,
            payload: { messageId: early.id, conversationId: null, status: 'read', timestamp: NOW.toISOString() },
          },
        },
      ]);
      expect(pipeline.repos.webhookEvents.all()[0].processedData).toEqual({
        watermark: '2024-05-01T11:15:00.000Z',
        updated: 1,
      });
    });

    it('should accept a read receipt from an unknown user', async () => {
      await processor.process(account, {
        kind: 'read',
        entryId: ENTRY_ID,
        raw: {},
        senderId: 'igsid-unknown',
        watermark: new Date('2024-05-01T11:15:00.000Z'),
      });

      expect(pipeline.repos.webhookEvents.all()[0]).toMatchObject({
        status: 'processed',
        processedData: { watermark: '2024-05-01T11:15:00.000Z', updated: 0 },
      });
    });
  });

  describe('delivery and status reports', () => {
    it('should move sent messages to delivered and never regress', async () => {
      const sent = await seedOutbound('mid.out.1', 'sent', new Date('2024-05-01T11:00:00.000Z'));
      const read = await seedOutbound('mid.out.2', 'read', new Date('2024-05-01T11:00:00.000Z'));
      const watermark = new Date('2024-05-01T11:10:00.000Z');

      await processor.process(account, {
        kind: 'delivery',
        entryId: ENTRY_ID,
        raw: {},
        senderId: 'igsid-1',
        messageIds: ['mid.out.1', 'mid.out.2', 'mid.unknown'],
        watermark,
      });

      expect(pipeline.repos.messages.get(sent.id)).toMatchObject({ status: 'delivered', deliveredAt: watermark });
      expect(pipeline.repos.messages.get(read.id).status).toBe('read');
      expect(pipeline.repos.webhookEvents.all()[0].processedData).toEqual({
        watermark: '2024-05-01T11:10:00.000Z',
        messageIds: ['mid.out.1', 'mid.out.2', 'mid.unknown'],
        updated: 1,
      });
    });

    it('should apply read statuses and keep platform failures as a report', async () => {
      const read = await seedOutbound('wamid.out.1', 'sent', new Date('2024-05-01T11:00:00.000Z'));
      const failed = await seedOutbound('wamid.out.2', 'sent', new Date('2024-05-01T11:00:00.000Z'));
      const statusEvent = (messageId: string, status: MessageStatusEvent['status']): MessageStatusEvent => ({
        kind: 'status',
        entryId: ENTRY_ID,
        raw: { id: messageId, status },
        messageId,
        recipientId: 'igsid-1',
        status,
        timestamp: new Date('2024-05-01T11:20:00.000Z'),
        errorCode: status === 'failed' ? '131047' : '',
        errorMessage: status === 'failed' ? 'Re-engagement message' : '',
      });

      await processor.process(account, statusEvent('wamid.out.1', 'read'));
      await processor.process(account, statusEvent('wamid.out.2', 'failed'));
      await processor.process(account, statusEvent('wamid.missing', 'delivered'));

      expect(pipeline.repos.messages.get(read.id)).toMatchObject({
        status: 'read',
        readAt: new Date('2024-05-01T11:20:00.000Z'),
      });
      expect(pipeline.repos.messages.get(failed.id).status).toBe('sent');

      const [readRecord, failedRecord, missingRecord] = pipeline.repos.webhookEvents.all();
      expect(readRecord.processedData).toEqual({
        messageId: 'wamid.out.1',
        status: 'read',
        matched: true,
        applied: true,
      });
      expect(failedRecord.processedData).toEqual({
        messageId: 'wamid.out.2',
        status: 'failed',
        matched: true,
        errorCode: '131047',
        errorMessage: 'Re-engagement message',
      });
      expect(missingRecord.processedData).toEqual({
        messageId: 'wamid.missing',
        status: 'delivered',
        matched: false,
      });
    });
  });

  describe('stories', () => {
    it('should record a story once', async () => {
      const first = await processor.process(account, storyInsight('story-1'));
      const second = await processor.process(account, storyInsight('story-1'));

      expect(first).toEqual({ eventId: 'instagram:17841400000000001:story:story-1', outcome: 'processed' });
      expect(second.outcome).toBe('duplicate');
      expect([...pipeline.repos.stories.rows.values()]).toEqual([
        expect.objectContaining({
          storyId: 'story-1',
          accountId: account.id,
          storyUrl: 'https://cdn.example.com/story-1.jpg',
          caption: 'Launch day',
          replyCount: 0,
        }),
      ]);
    });

    it('should count story replies on the story, the user and the account', async () => {
      await processor.process(account, storyInsight('story-1'));

      await processor.process(
        account,
        messageEvent({
          messageId: 'mid.reply.1',
          content: {
            messageType: 'story_reply',
            text: 'love this',
            mediaUrl: 'https://cdn.example.com/story-1.jpg',
            mediaType: '',
            storyId: 'story-1',
          },
        })
      );

      const story = await pipeline.repos.stories.findByStoryId(account.id, 'story-1');
      const user = await pipeline.repos.users.findByPlatformUserId(account.id, 'igsid-1');
      const stored = pipeline.repos.accounts.get(account.id);
      expect(story?.replyCount).toBe(1);
      expect(user).toMatchObject({ totalMessagesReceived: 1, totalStoryReplies: 1 });
      expect(stored.totalMessagesReceived).toBe(1);
      expect(stored.totalStoryReplies).toBe(1);
    });
  });
});
