import { InboundEventKind, type NormalizedEvent } from '../../model/Event.js';
import type { Logger } from '../../../infra/logger/logger.js';
import type { MiddlewareFunc } from '../dispatcher.js';

/**
 * Truncate text to max length, show truncation indicator
 */
export function truncateText(text: string, maxLen: number = 20): string {
  if (text.length <= maxLen) return text;
  return text.substring(0, maxLen) + '…(' + (text.length - maxLen) + ' more)';
}

/**
 * One line per inbound event.
 * Format: [IN] [MATTERMOST] kind=... from="..." channel=xxx [text="..."]
 */
export function formatIncomingLog(event: NormalizedEvent): string {
  const fields = [
    '[IN]',
    '[MATTERMOST]',
    `kind=${event.kind}`,
    `from="${event.senderName ?? event.senderId}"`,
  ];
  if (event.channelId) fields.push(`channel=${event.channelId}`);

  switch (event.kind) {
    case InboundEventKind.MessagePosted:
    case InboundEventKind.MessageEdited:
      fields.push(`text="${truncateText(event.content.plainBody)}"`);
      if (event.content.hasRichFormat) fields.push('rich=yes');
      break;
    case InboundEventKind.ReactionAdded:
    case InboundEventKind.ReactionRemoved:
      fields.push(`post=${event.messageId}`, `emoji=${event.emojiId}`);
      break;
    case InboundEventKind.MessageDeleted:
      fields.push(`post=${event.messageId}`);
      break;
    default:
      break;
  }
  return fields.join(' ');
}

export function createLoggingMiddleware(logger: Logger): MiddlewareFunc {
  return async (event, next) => {
    const start = Date.now();
    logger.info('dispatcher', formatIncomingLog(event));
    await next();
    logger.debug('dispatcher', `Handled ${event.kind} in ${Date.now() - start}ms`);
  };
}
