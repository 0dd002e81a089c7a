import { describe, it, expect } from 'vitest';
import { decodeFrame } from '../../../../src/adapter/mattermost/mattermostEventMapper.js';
import { InboundEventKind } from '../../../../src/core/model/Event.js';
import { DecodeError } from '../../../../src/core/errors.js';

const NOW = 1700000009999;

function frame(event: string, data: Record<string, unknown>, broadcast: Record<string, unknown> = {}): string {
  return JSON.stringify({ event, data, broadcast, seq: 7 });
}

function post(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    id: 'post-1',
    user_id: 'user-1',
    channel_id: 'chan-1',
    message: 'hello',
    root_id: '',
    type: '',
    create_at: 1700000000000,
    edit_at: 0,
    delete_at: 0,
    ...overrides,
  });
}

describe('decodeFrame', () => {
  it('decodes a posted event whose post is a JSON string', () => {
    const event = decodeFrame(
      frame('posted', { post: post({ root_id: 'root-1', file_ids: ['file-1'] }), sender_name: '@carol' }),
      NOW,
    );

    expect(event).toEqual({
      kind: InboundEventKind.MessagePosted,
      senderId: 'user-1',
      senderName: 'carol',
      channelId: 'chan-1',
      postId: 'post-1',
      text: 'hello',
      rootId: 'root-1',
      fileIds: ['file-1'],
      timestamp: 1700000000000,
    });
  });

  it('accepts the post as an object and a null file list', () => {
    const event = decodeFrame(
      frame('posted', { post: { id: 'post-2', user_id: 'u', channel_id: 'c', message: 'x', file_ids: null } }),
      NOW,
    );
    expect(event).toMatchObject({ postId: 'post-2', fileIds: [], timestamp: NOW });
  });

  it('uses the edit time for edits', () => {
    const event = decodeFrame(frame('post_edited', { post: post({ edit_at: 1700000005000 }) }), NOW);
    expect(event).toMatchObject({ kind: InboundEventKind.MessageEdited, timestamp: 1700000005000 });
  });

  it('decodes deletions', () => {
    const event = decodeFrame(frame('post_deleted', { post: post({ delete_at: 1700000006000 }) }), NOW);
    expect(event).toEqual({
      kind: InboundEventKind.MessageDeleted,
      senderId: 'user-1',
      senderName: undefined,
      channelId: 'chan-1',
      postId: 'post-1',
      timestamp: 1700000006000,
    });
  });

  it('turns typed posts into system notices', () => {
    const event = decodeFrame(
      frame('posted', { post: post({ type: 'system_join_channel', message: 'carol joined' }) }),
      NOW,
    );
    expect(event).toMatchObject({
      kind: InboundEventKind.SystemNotice,
      noticeType: 'system_join_channel',
      text: 'carol joined',
    });
  });

  it('decodes reactions with the broadcast channel', () => {
    const reaction = JSON.stringify({ user_id: 'user-2', post_id: 'post-1', emoji_name: '+1', create_at: 5 });
    expect(decodeFrame(frame('reaction_removed', { reaction }, { channel_id: 'chan-9' }), NOW)).toEqual({
      kind: InboundEventKind.ReactionRemoved,
      senderId: 'user-2',
      senderName: undefined,
      channelId: 'chan-9',
      postId: 'post-1',
      emojiName: '+1',
      timestamp: 5,
    });
  });

  it('decodes typing and read markers', () => {
    expect(
      decodeFrame(frame('typing', { user_id: 'user-3', parent_id: '' }, { channel_id: 'chan-1' }), NOW),
    ).toEqual({
      kind: InboundEventKind.Typing,
      senderId: 'user-3',
      channelId: 'chan-1',
      parentId: undefined,
      timestamp: NOW,
    });
    expect(decodeFrame(frame('channel_viewed', { channel_id: 'chan-4' }, { user_id: 'bridge-id' }), NOW)).toEqual({
      kind: InboundEventKind.ReadMarker,
      senderId: 'bridge-id',
      channelId: 'chan-4',
      timestamp: NOW,
    });
  });

  it('picks the best display name for profile updates', () => {
    const user = (fields: Record<string, string>) =>
      decodeFrame(frame('user_updated', { user: { id: 'user-5', username: 'dave', ...fields } }), NOW);

    expect(user({ nickname: 'Dee' })).toMatchObject({ displayName: 'Dee', username: 'dave', senderName: 'dave' });
    expect(user({ first_name: 'Dave', last_name: 'Jones' })).toMatchObject({ displayName: 'Dave Jones' });
    expect(user({})).toMatchObject({ displayName: 'dave' });
  });

  it('treats membership changes as system notices', () => {
    expect(decodeFrame(frame('user_added', { user_id: 'user-6' }, { channel_id: 'chan-1' }), NOW)).toEqual({
      kind: InboundEventKind.SystemNotice,
      senderId: 'user-6',
      channelId: 'chan-1',
      noticeType: 'user_added',
      text: '',
      timestamp: NOW,
    });
  });

  it('returns null for frames it does not consume', () => {
    expect(decodeFrame(JSON.stringify({ status: 'OK', seq_reply: 1 }), NOW)).toBeNull();
    expect(decodeFrame(frame('hello', { server_version: '9.0' }), NOW)).toBeNull();
    expect(decodeFrame(frame('status_change', { status: 'online' }), NOW)).toBeNull();
  });

  it('throws DecodeError for malformed input', () => {
    expect(() => decodeFrame('{not json', NOW)).toThrow(new DecodeError('Frame is not valid JSON'));
    expect(() => decodeFrame(frame('posted', { post: '{"id":' }), NOW)).toThrow(
      'posted event has unparseable post payload',
    );
    expect(() => decodeFrame(frame('posted', { post: JSON.stringify({ id: '' }) }), NOW)).toThrow(
      DecodeError,
    );
    expect(() => decodeFrame(frame('typing', {}), NOW)).toThrow(DecodeError);
  });
});
