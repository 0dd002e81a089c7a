import type { EventOrigin } from '../model/Event.js';
import { InboundEventKind } from '../model/Event.js';
import type { PuppetRegistry } from '../puppet/PuppetRegistry.js';

/**
 * Bot accounts the bridge itself posts as. Built once at startup, frozen.
 */
export interface WellKnownIdentities {
  /** Mattermost user ID of the account this session is logged in as. */
  readonly bridgeBotId: string;
  /** Mattermost user ID of the shared relay account, when it differs. */
  readonly relayBotId?: string;
  /** Configured username prefix; any username starting with it is bridge-owned. */
  readonly botPrefix?: string;
  readonly reservedUsernames: readonly string[];
  readonly reservedPrefixes: readonly string[];
}

/** Historical bridge account names that must never be relayed back. */
export const RESERVED_BRIDGE_USERNAMES: readonly string[] = ['mattermost-bridge'];
/** Ghost users created by the bridge are named `mattermost_<localpart>`. */
export const RESERVED_BRIDGE_PREFIXES: readonly string[] = ['mattermost_'];

export function createWellKnownIdentities(options: {
  bridgeBotId: string;
  relayBotId?: string;
  botPrefix?: string;
}): WellKnownIdentities {
  return Object.freeze({
    bridgeBotId: options.bridgeBotId,
    relayBotId: options.relayBotId || undefined,
    botPrefix: options.botPrefix || undefined,
    reservedUsernames: Object.freeze([...RESERVED_BRIDGE_USERNAMES]),
    reservedPrefixes: Object.freeze([...RESERVED_BRIDGE_PREFIXES]),
  });
}

export type EchoReason =
  | 'bridge-bot'
  | 'relay-bot'
  | 'puppet-bot'
  | 'username-prefix'
  | 'system-message';

export type EchoVerdict = { kind: 'genuine' } | { kind: 'own-echo'; reason: EchoReason };

const GENUINE: EchoVerdict = Object.freeze({ kind: 'genuine' });

function ownEcho(reason: EchoReason): EchoVerdict {
  return { kind: 'own-echo', reason };
}

export function isBridgeUsername(username: string, identities: WellKnownIdentities): boolean {
  const name = username.startsWith('@') ? username.slice(1) : username;
  if (name === '') return false;
  if (identities.reservedUsernames.includes(name)) return true;
  if (identities.reservedPrefixes.some((prefix) => name.startsWith(prefix))) return true;
  return identities.botPrefix !== undefined && name.startsWith(identities.botPrefix);
}

interface EchoRule {
  reason: EchoReason;
  matches(event: EventOrigin): boolean;
}

/**
 * Classifies an inbound event as the bridge's own echo or a genuine event.
 * Rules run in order; the first match wins. Pure, no I/O.
 */
export class EchoFilter {
  private readonly rules: readonly EchoRule[];

  constructor(
    private readonly identities: WellKnownIdentities,
    private readonly registry: PuppetRegistry,
  ) {
    this.rules = [
      {
        reason: 'bridge-bot',
        matches: (event) =>
          this.identities.bridgeBotId !== '' && event.senderId === this.identities.bridgeBotId,
      },
      {
        reason: 'relay-bot',
        matches: (event) =>
          this.identities.relayBotId !== undefined && event.senderId === this.identities.relayBotId,
      },
      {
        reason: 'puppet-bot',
        matches: (event) => event.senderId !== '' && this.registry.isPuppetAccount(event.senderId),
      },
      {
        reason: 'username-prefix',
        matches: (event) =>
          event.senderName !== undefined && isBridgeUsername(event.senderName, this.identities),
      },
      {
        reason: 'system-message',
        matches: (event) => event.kind === InboundEventKind.SystemNotice,
      },
    ];
  }

  classify(event: EventOrigin): EchoVerdict {
    for (const rule of this.rules) {
      if (rule.matches(event)) return ownEcho(rule.reason);
    }
    return GENUINE;
  }
}
