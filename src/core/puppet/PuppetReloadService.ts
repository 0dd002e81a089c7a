import type { PuppetEntryInput, ReconcileResult } from '../model/Puppet.js';
import type { Logger } from '../../infra/logger/logger.js';
import type { PuppetSource } from './envPuppetSource.js';
import { PuppetSnapshot, type PuppetRegistry } from './PuppetRegistry.js';
import { errorMessage } from '../errors.js';

export interface VerifiedAccount {
  userId: string;
  username: string;
}

/** Confirms a credential works and reports whose account it is. */
export interface CredentialVerifier {
  verify(credential: string): Promise<VerifiedAccount>;
}

export interface ReloadOutcome extends ReconcileResult {
  source: string;
  /** Slugs dropped because their credential failed verification. */
  skipped: string[];
}

/**
 * Serializes reloads against each other: verify, build the snapshot, swap.
 * Lookups never wait on this; they keep reading whichever snapshot is active.
 */
export class PuppetReloadService {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly registry: PuppetRegistry,
    private readonly source: PuppetSource,
    private readonly logger: Logger,
    private readonly verifier?: CredentialVerifier,
  ) {}

  reloadFromSource(): Promise<ReloadOutcome> {
    return this.serialize(() => this.apply(this.source.load(), this.source.name));
  }

  reloadFromEntries(entries: PuppetEntryInput[]): Promise<ReloadOutcome> {
    return this.serialize(() => this.apply(entries, 'body'));
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task, task);
    // keep the chain alive whether or not this reload fails
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async apply(inputs: PuppetEntryInput[], source: string): Promise<ReloadOutcome> {
    // validate the raw list first so a bad body never reaches the verifier
    const candidate = PuppetSnapshot.build(inputs);
    const { entries: verified, skipped } = await this.verifyEntries(candidate);
    const next = PuppetSnapshot.build(verified);
    const result = this.registry.install(next);

    for (const slug of result.added) this.logger.info('puppets', `Loaded puppet ${slug}`);
    for (const slug of result.updated) this.logger.info('puppets', `Updated puppet ${slug}`);
    for (const slug of result.removed) this.logger.info('puppets', `Removed puppet ${slug}`);
    this.logger.info(
      'puppets',
      `Puppet reload complete (source=${source} added=${result.added.length} removed=${result.removed.length} total=${result.total})`,
    );

    return { ...result, source, skipped };
  }

  private async verifyEntries(
    candidate: PuppetSnapshot,
  ): Promise<{ entries: PuppetEntryInput[]; skipped: string[] }> {
    if (!this.verifier) {
      return { entries: [...candidate.entries], skipped: [] };
    }

    const current = this.registry.current();
    const entries: PuppetEntryInput[] = [];
    const skipped: string[] = [];

    for (const entry of candidate.entries) {
      const existing = current.bySlugKey(entry.slug);
      if (
        existing?.remoteUserId &&
        existing.identity === entry.identity &&
        existing.credential === entry.credential
      ) {
        entries.push(existing);
        continue;
      }

      try {
        const account = await this.verifier.verify(entry.credential);
        entries.push({ ...entry, remoteUserId: account.userId, remoteUsername: account.username });
      } catch (err) {
        this.logger.error(
          'puppets',
          `Failed to verify puppet ${entry.slug} (${entry.identity}), skipping: ${errorMessage(err)}`,
        );
        skipped.push(entry.slug);
      }
    }
    return { entries, skipped };
  }
}
