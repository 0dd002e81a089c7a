import { describe, it, expect } from 'vitest';
import { normalizeEvent } from '../../../../src/core/messaging/normalizeEvent.js';
import { InboundEventKind } from '../../../../src/core/model/Event.js';

const base = { senderId: 'user-1', senderName: 'carol', channelId: 'chan-1', timestamp: 1700000000000 };

describe('normalizeEvent', () => {
  it('converts a posted message and keeps the thread root', () => {
    const event = normalizeEvent(
      {
        ...base,
        kind: InboundEventKind.MessagePosted,
        postId: 'post-1',
        text: 'hello **world**',
        rootId: 'root-1',
        fileIds: ['file-1'],
      },
      5000,
    );

    expect(event).toEqual({
      ...base,
      kind: InboundEventKind.MessagePosted,
      messageId: 'post-1',
      fileIds: ['file-1'],
      attachments: [],
      content: {
        plainBody: 'hello **world**',
        richBody: 'hello <strong>world</strong>',
        hasRichFormat: true,
        replyTo: { rootId: 'root-1' },
      },
    });
  });

  it('leaves plain edits without a reply reference', () => {
    const event = normalizeEvent(
      { ...base, kind: InboundEventKind.MessageEdited, postId: 'post-1', text: 'fixed typo', fileIds: [] },
      5000,
    );

    expect(event).toEqual({
      ...base,
      kind: InboundEventKind.MessageEdited,
      messageId: 'post-1',
      content: { plainBody: 'fixed typo', hasRichFormat: false },
    });
  });

  it('maps a reaction name to its emoji', () => {
    const event = normalizeEvent(
      { ...base, kind: InboundEventKind.ReactionAdded, postId: 'post-1', emojiName: 'thumbsup' },
      5000,
    );
    expect(event).toMatchObject({ messageId: 'post-1', emojiId: 'thumbsup', emoji: '\u{1F44D}' });
  });

  it('gives typing events the configured timeout', () => {
    const event = normalizeEvent({ ...base, kind: InboundEventKind.Typing, parentId: 'root-1' }, 5000);
    expect(event).toEqual({ ...base, kind: InboundEventKind.Typing, timeoutMs: 5000 });
  });
});
