import type { PuppetEntry, PuppetEntryInput, ReconcileResult } from '../model/Puppet.js';
import { ValidationError } from '../errors.js';

/**
 * Uppercase a slug and fold `-`, `.` and whitespace runs into `_`.
 * `code-reviewer` and `Code Reviewer` both become `CODE_REVIEWER`.
 */
export function normalizeSlug(slug: string): string {
  return slug
    .trim()
    .toUpperCase()
    .replace(/[\s.\-]+/g, '_');
}

/**
 * Immutable view of the puppet set. Built once, never mutated; a reload
 * builds a new snapshot and swaps it in.
 */
export class PuppetSnapshot {
  readonly entries: readonly PuppetEntry[];
  private readonly bySlug: ReadonlyMap<string, PuppetEntry>;
  private readonly byIdentity: ReadonlyMap<string, PuppetEntry>;
  private readonly byRemoteUserId: ReadonlyMap<string, PuppetEntry>;

  private constructor(entries: PuppetEntry[]) {
    const bySlug = new Map<string, PuppetEntry>();
    const byIdentity = new Map<string, PuppetEntry>();
    const byRemoteUserId = new Map<string, PuppetEntry>();
    for (const entry of entries) {
      bySlug.set(entry.slug, entry);
      // duplicate identities: the later entry wins, input order decides
      byIdentity.set(entry.identity, entry);
      if (entry.remoteUserId) byRemoteUserId.set(entry.remoteUserId, entry);
    }
    this.entries = Object.freeze(entries);
    this.bySlug = bySlug;
    this.byIdentity = byIdentity;
    this.byRemoteUserId = byRemoteUserId;
    Object.freeze(this);
  }

  static readonly EMPTY = new PuppetSnapshot([]);

  /**
   * Validate and freeze a list of entries into a snapshot.
   * Throws ValidationError on a duplicate slug or an empty field.
   */
  static build(inputs: readonly PuppetEntryInput[]): PuppetSnapshot {
    const issues: string[] = [];
    const seen = new Set<string>();
    const entries: PuppetEntry[] = [];

    inputs.forEach((input, index) => {
      const slug = normalizeSlug(input.slug);
      if (slug === '') issues.push(`puppets[${index}]: slug is empty`);
      if (input.identity.trim() === '') issues.push(`puppets[${index}]: identity is empty`);
      if (input.credential.trim() === '') issues.push(`puppets[${index}]: credential is empty`);
      if (slug !== '' && seen.has(slug)) issues.push(`puppets[${index}]: duplicate slug ${slug}`);
      seen.add(slug);

      const entry: PuppetEntry = {
        slug,
        identity: input.identity.trim(),
        credential: input.credential,
        ...(input.remoteUserId ? { remoteUserId: input.remoteUserId } : {}),
        ...(input.remoteUsername ? { remoteUsername: input.remoteUsername } : {}),
      };
      entries.push(Object.freeze(entry));
    });

    if (issues.length > 0) {
      throw new ValidationError(`Invalid puppet entries: ${issues.join('; ')}`, issues);
    }
    return new PuppetSnapshot(entries);
  }

  get size(): number {
    return this.entries.length;
  }

  bySlugKey(slug: string): PuppetEntry | undefined {
    return this.bySlug.get(normalizeSlug(slug));
  }

  byIdentityKey(identity: string): PuppetEntry | undefined {
    return this.byIdentity.get(identity);
  }

  byRemoteUser(remoteUserId: string): PuppetEntry | undefined {
    return this.byRemoteUserId.get(remoteUserId);
  }

  slugs(): Set<string> {
    return new Set(this.bySlug.keys());
  }
}

function sameEntry(a: PuppetEntry, b: PuppetEntry): boolean {
  return a.identity === b.identity && a.credential === b.credential;
}

/**
 * Holds the active puppet snapshot behind a single reference.
 *
 * Readers that need several consistent lookups should grab `current()` once
 * and query the snapshot; single lookups can go through the registry directly.
 */
export class PuppetRegistry {
  private active: PuppetSnapshot;

  constructor(initial: PuppetSnapshot = PuppetSnapshot.EMPTY) {
    this.active = initial;
  }

  /** Build a snapshot without installing it. */
  load(entries: readonly PuppetEntryInput[]): PuppetSnapshot {
    return PuppetSnapshot.build(entries);
  }

  current(): PuppetSnapshot {
    return this.active;
  }

  get size(): number {
    return this.active.size;
  }

  /**
   * Replace the whole puppet set with `newEntries`. Any slug missing from the
   * list is removed. On ValidationError nothing is swapped.
   */
  reconcile(newEntries: readonly PuppetEntryInput[]): ReconcileResult {
    const next = PuppetSnapshot.build(newEntries);
    return this.install(next);
  }

  /** Swap in an already-built snapshot and report the diff against the previous one. */
  install(next: PuppetSnapshot): ReconcileResult {
    const previous = this.active;
    const result = diffSnapshots(previous, next);
    this.active = next;
    return result;
  }

  resolveByIdentity(identity: string): string | undefined {
    return this.active.byIdentityKey(identity)?.credential;
  }

  resolveBySlug(slug: string): PuppetEntry | undefined {
    return this.active.bySlugKey(slug);
  }

  resolveByRemoteUserId(remoteUserId: string): PuppetEntry | undefined {
    return this.active.byRemoteUser(remoteUserId);
  }

  /**
   * True when `id` is either a puppet's Matrix identity or the Mattermost
   * account a puppet posts as.
   */
  isPuppetAccount(id: string): boolean {
    const snapshot = this.active;
    return snapshot.byIdentityKey(id) !== undefined || snapshot.byRemoteUser(id) !== undefined;
  }
}

export function diffSnapshots(previous: PuppetSnapshot, next: PuppetSnapshot): ReconcileResult {
  const added: string[] = [];
  const removed: string[] = [];
  const unchanged: string[] = [];
  const updated: string[] = [];

  for (const entry of next.entries) {
    const old = previous.bySlugKey(entry.slug);
    if (!old) {
      added.push(entry.slug);
    } else if (sameEntry(old, entry)) {
      unchanged.push(entry.slug);
    } else {
      updated.push(entry.slug);
    }
  }
  const nextSlugs = next.slugs();
  for (const entry of previous.entries) {
    if (!nextSlugs.has(entry.slug)) removed.push(entry.slug);
  }

  return { added, removed, unchanged, updated, total: next.size };
}
