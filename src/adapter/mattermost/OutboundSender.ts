import type { Logger } from '../../infra/logger/logger.js';
import type { OutboundPuppetRouter, RouteDecision, RouteSource } from '../../core/puppet/OutboundPuppetRouter.js';
import { isMediaMsgType, type MatrixMessageContent } from '../../core/model/Message.js';
import { matrixToMattermost } from '../../core/format/matrixToMattermost.js';
import { emojiToReaction } from '../../core/format/emoji.js';
import { NoRouteError, errorMessage } from '../../core/errors.js';
import type { FileUpload, MattermostApi } from './MattermostApi.js';

/** Who an outbound action is attributed to. */
export interface OutboundTarget {
  channelId: string;
  /** Matrix user ID on the live event. */
  senderId?: string;
  /** Recorded author of the message being edited, replied to or reacted on. */
  originalSenderId?: string;
}

export interface OutboundMessage extends OutboundTarget {
  content: MatrixMessageContent;
  /** Thread root post ID when the message is a reply. */
  rootId?: string;
  /** Media bytes; required for image/video/audio/file messages. */
  media?: Omit<FileUpload, 'name'> & { name?: string };
}

export type SendResult =
  | { status: 'sent'; via: RouteSource; postId?: string }
  | { status: 'dropped'; reason: string };

type Routed = { ok: true; route: RouteDecision } | { ok: false; result: SendResult };

/**
 * Matrix-side actions onto Mattermost. Each action resolves its credential
 * through the router, so it posts as the sender's puppet or the relay.
 */
export class OutboundSender {
  constructor(
    private readonly router: OutboundPuppetRouter,
    private readonly api: MattermostApi,
    private readonly logger: Logger,
    private readonly relayCredential?: string,
  ) {}

  async sendMessage(message: OutboundMessage): Promise<SendResult> {
    const routed = this.route(message, 'send message');
    if (!routed.ok) return routed.result;
    const { route } = routed;
    const { content } = message;

    if (isMediaMsgType(content.msgtype)) {
      if (!message.media) {
        return this.drop(`No media bytes for ${content.msgtype} message`);
      }
      const name = message.media.name || content.filename || 'upload';
      const uploaded = await this.api.uploadFile(route.credential, message.channelId, {
        ...message.media,
        name,
      });
      // a body equal to the file name is Matrix's default caption, not a real one
      const caption = content.body !== '' && content.body !== name ? content.body : '';
      const post = await this.api.createPost(route.credential, {
        channelId: message.channelId,
        message: caption,
        rootId: message.rootId,
        fileIds: [uploaded.id],
      });
      return { status: 'sent', via: route.via, postId: post.id };
    }

    let text = matrixToMattermost(content);
    if (content.msgtype === 'm.emote') {
      text = `/me ${text}`;
    }
    const post = await this.api.createPost(route.credential, {
      channelId: message.channelId,
      message: text,
      rootId: message.rootId,
    });
    this.logger.debug('outbound', `Posted ${post.id} to ${message.channelId} via ${route.via}`);
    return { status: 'sent', via: route.via, postId: post.id };
  }

  async editMessage(
    target: OutboundTarget & { postId: string; content: MatrixMessageContent },
  ): Promise<SendResult> {
    const routed = this.route(target, 'edit message');
    if (!routed.ok) return routed.result;
    const post = await this.api.patchPost(routed.route.credential, target.postId, matrixToMattermost(target.content));
    return { status: 'sent', via: routed.route.via, postId: post.id };
  }

  async deleteMessage(target: OutboundTarget & { postId: string }): Promise<SendResult> {
    const routed = this.route(target, 'delete message');
    if (!routed.ok) return routed.result;
    await this.api.deletePost(routed.route.credential, target.postId);
    return { status: 'sent', via: routed.route.via, postId: target.postId };
  }

  async addReaction(target: OutboundTarget & { postId: string; emoji: string }): Promise<SendResult> {
    const routed = this.route(target, 'add reaction');
    if (!routed.ok) return routed.result;
    await this.api.saveReaction(routed.route.credential, target.postId, emojiToReaction(target.emoji));
    return { status: 'sent', via: routed.route.via, postId: target.postId };
  }

  async removeReaction(target: OutboundTarget & { postId: string; emoji: string }): Promise<SendResult> {
    const routed = this.route(target, 'remove reaction');
    if (!routed.ok) return routed.result;
    await this.api.deleteReaction(routed.route.credential, target.postId, emojiToReaction(target.emoji));
    return { status: 'sent', via: routed.route.via, postId: target.postId };
  }

  /** Typing is best effort: a failed call is logged and reported as dropped. */
  async sendTyping(target: OutboundTarget & { parentId?: string }): Promise<SendResult> {
    const routed = this.route(target, 'send typing');
    if (!routed.ok) return routed.result;
    try {
      await this.api.publishTyping(routed.route.credential, target.channelId, target.parentId);
    } catch (err) {
      this.logger.debug('outbound', `Typing indicator failed: ${errorMessage(err)}`);
      return { status: 'dropped', reason: errorMessage(err) };
    }
    return { status: 'sent', via: routed.route.via };
  }

  async markRead(target: OutboundTarget): Promise<SendResult> {
    const routed = this.route(target, 'mark read');
    if (!routed.ok) return routed.result;
    await this.api.viewChannel(routed.route.credential, target.channelId);
    return { status: 'sent', via: routed.route.via };
  }

  private route(target: OutboundTarget, action: string): Routed {
    try {
      const route = this.router.resolve(target.originalSenderId, target.senderId, this.relayCredential);
      return { ok: true, route };
    } catch (err) {
      if (err instanceof NoRouteError) {
        return { ok: false, result: this.drop(`Cannot ${action} in ${target.channelId}: ${err.message}`) };
      }
      throw err;
    }
  }

  private drop(reason: string): SendResult {
    this.logger.warn('outbound', `Dropped: ${reason}`);
    return { status: 'dropped', reason };
  }
}
