import { describe, it, expect, vi } from 'vitest';
import { PuppetRegistry } from '../../../../src/core/puppet/PuppetRegistry.js';
import {
  PuppetReloadService,
  type CredentialVerifier,
} from '../../../../src/core/puppet/PuppetReloadService.js';
import type { PuppetSource } from '../../../../src/core/puppet/envPuppetSource.js';
import type { PuppetEntryInput } from '../../../../src/core/model/Puppet.js';
import { ValidationError } from '../../../../src/core/errors.js';
import { createRecordingLogger, mockLogger } from '../../../helpers.js';

const alice = { slug: 'alice', identity: '@alice:example.org', credential: 'token-a' };
const bob = { slug: 'bob', identity: '@bob:example.org', credential: 'token-b' };

function staticSource(entries: PuppetEntryInput[]): PuppetSource {
  return { name: 'env', load: () => entries };
}

function verifierFor(accounts: Record<string, string>): CredentialVerifier {
  return {
    verify: vi.fn(async (credential: string) => {
      const username = accounts[credential];
      if (!username) throw new Error('401 Unauthorized');
      return { userId: `id-${username}`, username };
    }),
  };
}

describe('PuppetReloadService', () => {
  it('loads from the source and reports the diff', async () => {
    const registry = new PuppetRegistry();
    const logger = createRecordingLogger();
    const service = new PuppetReloadService(registry, staticSource([alice, bob]), logger);

    const outcome = await service.reloadFromSource();

    expect(outcome.source).toBe('env');
    expect(outcome.added).toEqual(['ALICE', 'BOB']);
    expect(outcome.total).toBe(2);
    expect(outcome.skipped).toEqual([]);
    expect(logger.lines.map((l) => l.message)).toEqual([
      'Loaded puppet ALICE',
      'Loaded puppet BOB',
      'Puppet reload complete (source=env added=2 removed=0 total=2)',
    ]);
  });

  it('records the verified Mattermost account on each entry', async () => {
    const registry = new PuppetRegistry();
    const verifier = verifierFor({ 'token-a': 'alice-mm' });
    const service = new PuppetReloadService(registry, staticSource([]), mockLogger, verifier);

    await service.reloadFromEntries([alice]);

    const entry = registry.resolveBySlug('alice');
    expect(entry?.remoteUserId).toBe('id-alice-mm');
    expect(entry?.remoteUsername).toBe('alice-mm');
    expect(registry.isPuppetAccount('id-alice-mm')).toBe(true);
  });

  it('skips entries whose credential fails verification', async () => {
    const registry = new PuppetRegistry();
    const logger = createRecordingLogger();
    const verifier = verifierFor({ 'token-a': 'alice-mm' });
    const service = new PuppetReloadService(registry, staticSource([]), logger, verifier);

    const outcome = await service.reloadFromEntries([alice, bob]);

    expect(outcome.skipped).toEqual(['BOB']);
    expect(outcome.added).toEqual(['ALICE']);
    expect(registry.resolveBySlug('bob')).toBeUndefined();
    expect(logger.lines.filter((l) => l.level === 'error').map((l) => l.message)).toEqual([
      'Failed to verify puppet BOB (@bob:example.org), skipping: 401 Unauthorized',
    ]);
  });

  it('does not re-verify an unchanged entry', async () => {
    const registry = new PuppetRegistry();
    const verifier = verifierFor({ 'token-a': 'alice-mm', 'token-b': 'bob-mm' });
    const service = new PuppetReloadService(registry, staticSource([]), mockLogger, verifier);

    await service.reloadFromEntries([alice]);
    await service.reloadFromEntries([alice, bob]);

    expect(verifier.verify).toHaveBeenCalledTimes(2);
    expect(verifier.verify).toHaveBeenNthCalledWith(1, 'token-a');
    expect(verifier.verify).toHaveBeenNthCalledWith(2, 'token-b');
  });

  it('verifies again when the credential changes', async () => {
    const registry = new PuppetRegistry();
    const verifier = verifierFor({ 'token-a': 'alice-mm', 'token-a2': 'alice-mm' });
    const service = new PuppetReloadService(registry, staticSource([]), mockLogger, verifier);

    await service.reloadFromEntries([alice]);
    const outcome = await service.reloadFromEntries([{ ...alice, credential: 'token-a2' }]);

    expect(verifier.verify).toHaveBeenCalledTimes(2);
    expect(outcome.updated).toEqual(['ALICE']);
    expect(registry.resolveByIdentity('@alice:example.org')).toBe('token-a2');
  });

  it('rejects an invalid list before calling the verifier', async () => {
    const registry = new PuppetRegistry();
    const verifier = verifierFor({ 'token-a': 'alice-mm' });
    const service = new PuppetReloadService(registry, staticSource([]), mockLogger, verifier);

    await expect(service.reloadFromEntries([alice, { ...alice }])).rejects.toBeInstanceOf(
      ValidationError,
    );
    expect(verifier.verify).not.toHaveBeenCalled();
    expect(registry.size).toBe(0);
  });

  it('runs overlapping reloads one after another', async () => {
    const registry = new PuppetRegistry();
    const order: string[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const verifier: CredentialVerifier = {
      verify: async (credential) => {
        order.push(`start ${credential}`);
        if (credential === 'token-a') await gate;
        order.push(`end ${credential}`);
        return { userId: `id-${credential}`, username: credential };
      },
    };
    const service = new PuppetReloadService(registry, staticSource([]), mockLogger, verifier);

    const first = service.reloadFromEntries([alice]);
    const second = service.reloadFromEntries([bob]);
    await Promise.resolve();
    release();
    await Promise.all([first, second]);

    expect(order).toEqual(['start token-a', 'end token-a', 'start token-b', 'end token-b']);
    expect(registry.resolveBySlug('alice')).toBeUndefined();
    expect(registry.resolveBySlug('bob')?.remoteUserId).toBe('id-token-b');
  });

  it('keeps serving reloads after one fails', async () => {
    const registry = new PuppetRegistry();
    const service = new PuppetReloadService(registry, staticSource([]), mockLogger);

    await expect(service.reloadFromEntries([{ ...alice, credential: '' }])).rejects.toThrow(
      ValidationError,
    );
    const outcome = await service.reloadFromEntries([bob]);
    expect(outcome.total).toBe(1);
  });
});
