/** Thread/reply reference carried alongside converted content. */
export interface ReplyMeta {
  /** Mattermost root post ID of the thread the message belongs to. */
  rootId: string;
}

interface ParsedMessageBase {
  /** Original text, always kept so clients without HTML support still render it. */
  plainBody: string;
  replyTo?: ReplyMeta;
}

export interface PlainParsedMessage extends ParsedMessageBase {
  hasRichFormat: false;
  richBody?: undefined;
}

export interface RichParsedMessage extends ParsedMessageBase {
  hasRichFormat: true;
  richBody: string;
}

export type ParsedMessage = PlainParsedMessage | RichParsedMessage;

export const MATRIX_HTML_FORMAT = 'org.matrix.custom.html';

export type MatrixMsgType =
  | 'm.text'
  | 'm.notice'
  | 'm.emote'
  | 'm.image'
  | 'm.video'
  | 'm.audio'
  | 'm.file';

/** Subset of a Matrix `m.room.message` content the converters read. */
export interface MatrixMessageContent {
  msgtype: MatrixMsgType;
  body: string;
  format?: string;
  formatted_body?: string;
  filename?: string;
  info?: {
    mimetype?: string;
    size?: number;
  };
}

/** A Mattermost file carried on an inbound post, described as Matrix media. */
export interface Attachment {
  fileId: string;
  msgtype: MatrixMsgType;
  /** File name; Matrix clients show it as the media body. */
  body: string;
  info: {
    mimetype: string;
    size: number;
  };
}

export function msgTypeForMime(mimeType: string): MatrixMsgType {
  if (mimeType.startsWith('image/')) return 'm.image';
  if (mimeType.startsWith('video/')) return 'm.video';
  if (mimeType.startsWith('audio/')) return 'm.audio';
  return 'm.file';
}

export function isMediaMsgType(msgtype: MatrixMsgType): boolean {
  return msgtype === 'm.image' || msgtype === 'm.video' || msgtype === 'm.audio' || msgtype === 'm.file';
}
