import { InboundEventKind, type DecodedEvent, type NormalizedEvent } from '../model/Event.js';
import type { ParsedMessage } from '../model/Message.js';
import { reactionToEmoji } from '../format/emoji.js';
import { mattermostToMatrix } from '../format/mattermostToMatrix.js';

function convertText(text: string, rootId: string | undefined): ParsedMessage {
  const content = mattermostToMatrix(text);
  return rootId ? { ...content, replyTo: { rootId } } : content;
}

/**
 * Turn a decoded event that passed the echo filter into what dispatch sees.
 * Only message bodies are converted; everything else is copied across.
 */
export function normalizeEvent(event: DecodedEvent, typingTimeoutMs: number): NormalizedEvent {
  const base = {
    senderId: event.senderId,
    senderName: event.senderName,
    channelId: event.channelId,
    timestamp: event.timestamp,
  };

  switch (event.kind) {
    case InboundEventKind.MessagePosted:
      return {
        ...base,
        kind: InboundEventKind.MessagePosted,
        messageId: event.postId,
        content: convertText(event.text, event.rootId),
        fileIds: event.fileIds,
        attachments: [],
      };
    case InboundEventKind.MessageEdited:
      return {
        ...base,
        kind: InboundEventKind.MessageEdited,
        messageId: event.postId,
        content: convertText(event.text, event.rootId),
      };
    case InboundEventKind.MessageDeleted:
      return { ...base, kind: event.kind, messageId: event.postId };
    case InboundEventKind.ReactionAdded:
    case InboundEventKind.ReactionRemoved:
      return {
        ...base,
        kind: event.kind,
        messageId: event.postId,
        emojiId: event.emojiName,
        emoji: reactionToEmoji(event.emojiName),
      };
    case InboundEventKind.Typing:
      return { ...base, kind: event.kind, timeoutMs: typingTimeoutMs };
    case InboundEventKind.ReadMarker:
      return { ...base, kind: event.kind };
    case InboundEventKind.ProfileUpdated:
      return {
        ...base,
        kind: event.kind,
        username: event.username,
        displayName: event.displayName,
      };
    case InboundEventKind.SystemNotice:
      return { ...base, kind: event.kind, noticeType: event.noticeType, text: event.text };
  }
}
