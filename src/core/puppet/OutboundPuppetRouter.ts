import type { PuppetEntry } from '../model/Puppet.js';
import type { Logger } from '../../infra/logger/logger.js';
import type { PuppetRegistry } from './PuppetRegistry.js';
import { NoRouteError } from '../errors.js';

export type RouteSource = 'original-sender' | 'event-sender' | 'relay';

export interface RouteDecision {
  credential: string;
  via: RouteSource;
  /** The puppet that matched; absent when falling back to the relay. */
  entry?: PuppetEntry;
}

/**
 * Picks the Mattermost credential for an outbound send.
 *
 * Order is original sender, then the live event sender, then the relay. Edits
 * and replies carry the recorded author as `originalSender` so corrections keep
 * posting as the puppet that wrote the message.
 */
export class OutboundPuppetRouter {
  constructor(
    private readonly registry: PuppetRegistry,
    private readonly logger?: Logger,
  ) {}

  resolve(
    originalSender: string | undefined,
    currentEventSender: string | undefined,
    relayCredential: string | undefined,
  ): RouteDecision {
    // one snapshot for the whole decision so a concurrent reload can't split it
    const snapshot = this.registry.current();

    if (originalSender) {
      const entry = snapshot.byIdentityKey(originalSender);
      if (entry) {
        this.logger?.debug('router', `Using puppet ${entry.slug} for original sender ${originalSender}`);
        return { credential: entry.credential, via: 'original-sender', entry };
      }
    }

    if (currentEventSender) {
      const entry = snapshot.byIdentityKey(currentEventSender);
      if (entry) {
        this.logger?.debug('router', `Using puppet ${entry.slug} for event sender ${currentEventSender}`);
        return { credential: entry.credential, via: 'event-sender', entry };
      }
    }

    if (relayCredential) {
      return { credential: relayCredential, via: 'relay' };
    }

    throw new NoRouteError(
      `No puppet for ${originalSender ?? currentEventSender ?? 'unknown sender'} and no relay configured`,
    );
  }
}
