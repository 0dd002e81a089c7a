/**
 * One configured puppet: a Matrix user (`identity`) mapped to the Mattermost
 * credential its messages are posted with.
 */
export interface PuppetEntry {
  /** Unique within a snapshot; uppercased, separators normalized to `_`. */
  readonly slug: string;
  /** Matrix user ID, e.g. `@agent:example.com`. */
  readonly identity: string;
  /** Mattermost access token used to post as this puppet. */
  readonly credential: string;
  /** Mattermost user ID of the puppet account, once its credential has been verified. */
  readonly remoteUserId?: string;
  readonly remoteUsername?: string;
}

/** Untrusted shape accepted from the env scan or the reload body. */
export interface PuppetEntryInput {
  slug: string;
  identity: string;
  credential: string;
  remoteUserId?: string;
  remoteUsername?: string;
}

export interface ReconcileResult {
  added: string[];
  removed: string[];
  unchanged: string[];
  /** Slugs present before and after whose identity or credential changed. */
  updated: string[];
  total: number;
}
