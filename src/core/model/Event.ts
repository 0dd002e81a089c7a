import type { Attachment, ParsedMessage } from './Message.js';

export enum InboundEventKind {
  MessagePosted = 'message-posted',
  MessageEdited = 'message-edited',
  MessageDeleted = 'message-deleted',
  ReactionAdded = 'reaction-added',
  ReactionRemoved = 'reaction-removed',
  Typing = 'typing',
  ReadMarker = 'read-marker',
  ProfileUpdated = 'profile-updated',
  SystemNotice = 'system-notice',
}

/** Fields every decoded event carries; EchoFilter only looks at these. */
export interface EventOrigin {
  kind: InboundEventKind;
  /** Mattermost user ID of the sender. */
  senderId: string;
  /** Mattermost username of the sender, without a leading `@`. */
  senderName?: string;
}

interface DecodedBase extends EventOrigin {
  channelId: string;
  timestamp: number;
}

export interface DecodedPostEvent extends DecodedBase {
  kind: InboundEventKind.MessagePosted | InboundEventKind.MessageEdited;
  postId: string;
  text: string;
  rootId?: string;
  fileIds: string[];
}

export interface DecodedPostDeletedEvent extends DecodedBase {
  kind: InboundEventKind.MessageDeleted;
  postId: string;
}

export interface DecodedReactionEvent extends DecodedBase {
  kind: InboundEventKind.ReactionAdded | InboundEventKind.ReactionRemoved;
  postId: string;
  emojiName: string;
}

export interface DecodedTypingEvent extends DecodedBase {
  kind: InboundEventKind.Typing;
  parentId?: string;
}

export interface DecodedReadMarkerEvent extends DecodedBase {
  kind: InboundEventKind.ReadMarker;
}

export interface DecodedProfileEvent extends DecodedBase {
  kind: InboundEventKind.ProfileUpdated;
  username: string;
  displayName: string;
}

export interface DecodedSystemNoticeEvent extends DecodedBase {
  kind: InboundEventKind.SystemNotice;
  /** Mattermost post type (e.g. `system_join_channel`) or websocket event name. */
  noticeType: string;
  text: string;
}

export type DecodedEvent =
  | DecodedPostEvent
  | DecodedPostDeletedEvent
  | DecodedReactionEvent
  | DecodedTypingEvent
  | DecodedReadMarkerEvent
  | DecodedProfileEvent
  | DecodedSystemNoticeEvent;

interface NormalizedBase {
  senderId: string;
  senderName?: string;
  channelId: string;
  timestamp: number;
}

export interface NormalizedMessageEvent extends NormalizedBase {
  kind: InboundEventKind.MessagePosted;
  messageId: string;
  content: ParsedMessage;
  fileIds: string[];
  /** Filled from `fileIds` before dispatch; a file whose info cannot be read is left out. */
  attachments: Attachment[];
}

export interface NormalizedEditEvent extends NormalizedBase {
  kind: InboundEventKind.MessageEdited;
  messageId: string;
  content: ParsedMessage;
}

export interface NormalizedDeleteEvent extends NormalizedBase {
  kind: InboundEventKind.MessageDeleted;
  messageId: string;
}

export interface NormalizedReactionEvent extends NormalizedBase {
  kind: InboundEventKind.ReactionAdded | InboundEventKind.ReactionRemoved;
  messageId: string;
  emojiId: string;
  emoji: string;
}

export interface NormalizedTypingEvent extends NormalizedBase {
  kind: InboundEventKind.Typing;
  timeoutMs: number;
}

export interface NormalizedReadMarkerEvent extends NormalizedBase {
  kind: InboundEventKind.ReadMarker;
}

export interface NormalizedProfileEvent extends NormalizedBase {
  kind: InboundEventKind.ProfileUpdated;
  username: string;
  displayName: string;
}

export interface NormalizedSystemNoticeEvent extends NormalizedBase {
  kind: InboundEventKind.SystemNotice;
  noticeType: string;
  text: string;
}

export type NormalizedEvent =
  | NormalizedMessageEvent
  | NormalizedEditEvent
  | NormalizedDeleteEvent
  | NormalizedReactionEvent
  | NormalizedTypingEvent
  | NormalizedReadMarkerEvent
  | NormalizedProfileEvent
  | NormalizedSystemNoticeEvent;

