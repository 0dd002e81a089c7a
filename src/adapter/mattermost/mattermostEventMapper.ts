import { z } from 'zod';
import { DecodeError } from '../../core/errors.js';
import { InboundEventKind, type DecodedEvent } from '../../core/model/Event.js';

/**
 * Mattermost WebSocket event frame:
 * https://api.mattermost.com/#tag/WebSocket
 * `data.post` and `data.reaction` arrive as JSON strings, not objects.
 */
const FrameSchema = z.object({
  event: z.string().optional(),
  data: z.record(z.unknown()).default({}),
  broadcast: z
    .object({
      channel_id: z.string().optional(),
      user_id: z.string().optional(),
    })
    .passthrough()
    .default({}),
  seq: z.number().optional(),
});

type Frame = z.infer<typeof FrameSchema>;

const PostSchema = z.object({
  id: z.string().min(1),
  user_id: z.string(),
  channel_id: z.string(),
  message: z.string().default(''),
  root_id: z.string().default(''),
  type: z.string().default(''),
  create_at: z.number().default(0),
  edit_at: z.number().default(0),
  delete_at: z.number().default(0),
  file_ids: z.array(z.string()).nullish(),
});

const ReactionSchema = z.object({
  user_id: z.string(),
  post_id: z.string().min(1),
  emoji_name: z.string().min(1),
  create_at: z.number().default(0),
});

const UserSchema = z.object({
  id: z.string().min(1),
  username: z.string(),
  nickname: z.string().optional(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
});

const TypingSchema = z.object({
  user_id: z.string().min(1),
  parent_id: z.string().optional(),
});

const ChannelViewedSchema = z.object({
  channel_id: z.string().min(1),
});

/** Event names handled by the bridge; anything else is ignored without error. */
export const MATTERMOST_EVENTS = {
  posted: 'posted',
  postEdited: 'post_edited',
  postDeleted: 'post_deleted',
  reactionAdded: 'reaction_added',
  reactionRemoved: 'reaction_removed',
  typing: 'typing',
  channelViewed: 'channel_viewed',
  userUpdated: 'user_updated',
  userAdded: 'user_added',
  userRemoved: 'user_removed',
  channelUpdated: 'channel_updated',
} as const;

const NOTICE_EVENTS: ReadonlySet<string> = new Set([
  MATTERMOST_EVENTS.userAdded,
  MATTERMOST_EVENTS.userRemoved,
  MATTERMOST_EVENTS.channelUpdated,
]);

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function parseEmbedded<T extends z.ZodTypeAny>(
  frame: Frame,
  key: string,
  schema: T,
): z.infer<T> {
  const raw = frame.data[key];
  let value: unknown = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch (err) {
      throw new DecodeError(`${frame.event} event has unparseable ${key} payload`, { cause: err });
    }
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new DecodeError(`${frame.event} event has invalid ${key}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

function senderName(frame: Frame): string | undefined {
  const name = frame.data.sender_name;
  if (typeof name !== 'string') return undefined;
  const trimmed = name.startsWith('@') ? name.slice(1) : name;
  return trimmed === '' ? undefined : trimmed;
}

function stringField(frame: Frame, key: string): string | undefined {
  const value = frame.data[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function displayNameOf(user: z.infer<typeof UserSchema>): string {
  if (user.nickname) return user.nickname;
  const full = [user.first_name, user.last_name].filter(Boolean).join(' ');
  return full || user.username;
}

function mapPost(frame: Frame, event: string, now: number): DecodedEvent {
  const post = parseEmbedded(frame, 'post', PostSchema);
  const base = {
    senderId: post.user_id,
    senderName: senderName(frame),
    channelId: post.channel_id || frame.broadcast.channel_id || '',
  };

  if (event === MATTERMOST_EVENTS.postDeleted) {
    return {
      ...base,
      kind: InboundEventKind.MessageDeleted,
      postId: post.id,
      timestamp: post.delete_at || now,
    };
  }

  // join/leave/header-change posts carry a non-empty type
  if (post.type !== '') {
    return {
      ...base,
      kind: InboundEventKind.SystemNotice,
      noticeType: post.type,
      text: post.message,
      timestamp: post.create_at || now,
    };
  }

  const edited = event === MATTERMOST_EVENTS.postEdited;
  return {
    ...base,
    kind: edited ? InboundEventKind.MessageEdited : InboundEventKind.MessagePosted,
    postId: post.id,
    text: post.message,
    rootId: post.root_id || undefined,
    fileIds: post.file_ids ?? [],
    timestamp: (edited ? post.edit_at : post.create_at) || now,
  };
}

function mapReaction(frame: Frame, event: string, now: number): DecodedEvent {
  const reaction = parseEmbedded(frame, 'reaction', ReactionSchema);
  return {
    kind:
      event === MATTERMOST_EVENTS.reactionAdded
        ? InboundEventKind.ReactionAdded
        : InboundEventKind.ReactionRemoved,
    senderId: reaction.user_id,
    senderName: senderName(frame),
    channelId: frame.broadcast.channel_id ?? '',
    postId: reaction.post_id,
    emojiName: reaction.emoji_name,
    timestamp: reaction.create_at || now,
  };
}

/**
 * Decode one raw WebSocket frame.
 *
 * Returns null for frames the bridge does not consume (hello, status replies,
 * unhandled event names). Throws DecodeError when a consumed event is malformed.
 */
export function decodeFrame(raw: string, now: number = Date.now()): DecodedEvent | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new DecodeError('Frame is not valid JSON', { cause: err });
  }

  const parsed = FrameSchema.safeParse(json);
  if (!parsed.success) {
    throw new DecodeError(`Malformed frame: ${describeIssues(parsed.error)}`);
  }

  const frame = parsed.data;
  const event = frame.event;
  if (!event) return null;

  switch (event) {
    case MATTERMOST_EVENTS.posted:
    case MATTERMOST_EVENTS.postEdited:
    case MATTERMOST_EVENTS.postDeleted:
      return mapPost(frame, event, now);

    case MATTERMOST_EVENTS.reactionAdded:
    case MATTERMOST_EVENTS.reactionRemoved:
      return mapReaction(frame, event, now);

    case MATTERMOST_EVENTS.typing: {
      const typing = TypingSchema.safeParse(frame.data);
      if (!typing.success) {
        throw new DecodeError(`typing event: ${describeIssues(typing.error)}`);
      }
      return {
        kind: InboundEventKind.Typing,
        senderId: typing.data.user_id,
        channelId: frame.broadcast.channel_id ?? '',
        parentId: typing.data.parent_id || undefined,
        timestamp: now,
      };
    }

    case MATTERMOST_EVENTS.channelViewed: {
      const viewed = ChannelViewedSchema.safeParse(frame.data);
      if (!viewed.success) {
        throw new DecodeError(`channel_viewed event: ${describeIssues(viewed.error)}`);
      }
      // the broadcast targets the user whose view it was
      return {
        kind: InboundEventKind.ReadMarker,
        senderId: frame.broadcast.user_id ?? '',
        channelId: viewed.data.channel_id,
        timestamp: now,
      };
    }

    case MATTERMOST_EVENTS.userUpdated: {
      const user = parseEmbedded(frame, 'user', UserSchema);
      return {
        kind: InboundEventKind.ProfileUpdated,
        senderId: user.id,
        senderName: user.username || undefined,
        channelId: '',
        username: user.username,
        displayName: displayNameOf(user),
        timestamp: now,
      };
    }

    default:
      if (NOTICE_EVENTS.has(event)) {
        return {
          kind: InboundEventKind.SystemNotice,
          senderId: stringField(frame, 'user_id') ?? frame.broadcast.user_id ?? '',
          channelId: stringField(frame, 'channel_id') ?? frame.broadcast.channel_id ?? '',
          noticeType: event,
          text: '',
          timestamp: now,
        };
      }
      return null;
  }
}
