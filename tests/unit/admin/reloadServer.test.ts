import { afterEach, describe, it, expect } from 'vitest';
import type { Server } from 'node:http';
import {
  RELOAD_PATH,
  closeServer,
  createReloadApp,
  listen,
  parseReloadBody,
} from '../../../src/admin/reloadServer.js';
import { PuppetRegistry } from '../../../src/core/puppet/PuppetRegistry.js';
import { PuppetReloadService } from '../../../src/core/puppet/PuppetReloadService.js';
import type { PuppetEntryInput } from '../../../src/core/model/Puppet.js';
import { ValidationError } from '../../../src/core/errors.js';
import { mockLogger } from '../../helpers.js';

const puppetA = { slug: 'a', identity: '@a:example.org', credential: 'token-a' };
const puppetB = { slug: 'b', identity: '@b:example.org', credential: 'token-b' };

let server: Server | undefined;

afterEach(async () => {
  if (server) await closeServer(server);
  server = undefined;
});

async function startServer(envEntries: PuppetEntryInput[] = []) {
  const registry = new PuppetRegistry();
  registry.reconcile([puppetB]);
  const service = new PuppetReloadService(registry, { name: 'env', load: () => envEntries }, mockLogger);
  const app = createReloadApp(service, mockLogger, { maxBodyBytes: 256 });
  server = await listen(app, '127.0.0.1', 0);
  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : 0;
  return { registry, url: `http://127.0.0.1:${port}${RELOAD_PATH}` };
}

describe('reload endpoint', () => {
  it('replaces the puppet set from the request body', async () => {
    const { registry, url } = await startServer();

    const res = await fetch(url, { method: 'POST', body: JSON.stringify({ puppets: [puppetA] }) });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ added: 1, removed: 1, total: 1 });
    expect(registry.resolveByIdentity('@a:example.org')).toBe('token-a');
    expect(registry.resolveByIdentity('@b:example.org')).toBeUndefined();
  });

  it('reloads from the environment when the body is empty', async () => {
    const { registry, url } = await startServer([puppetA, puppetB]);

    const res = await fetch(url, { method: 'POST' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ added: 1, removed: 0, total: 2 });
    expect(registry.size).toBe(2);
  });

  it('rejects invalid JSON and leaves the registry alone', async () => {
    const { registry, url } = await startServer();
    const before = registry.current();

    const res = await fetch(url, { method: 'POST', body: '{"puppets": [' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Request body is not valid JSON', issues: [] });
    expect(registry.current()).toBe(before);
  });

  it('rejects duplicate slugs with the offending entry', async () => {
    const { registry, url } = await startServer();

    const res = await fetch(url, { method: 'POST', body: JSON.stringify([puppetA, { ...puppetA }]) });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid puppet entries: puppets[1]: duplicate slug A',
      issues: ['puppets[1]: duplicate slug A'],
    });
    expect(registry.resolveByIdentity('@b:example.org')).toBe('token-b');
  });

  it('only accepts POST', async () => {
    const { url } = await startServer();

    const res = await fetch(url);

    expect(res.status).toBe(405);
    expect(res.headers.get('allow')).toBe('POST');
  });

  it('refuses an oversized body', async () => {
    const { registry, url } = await startServer();

    const res = await fetch(url, { method: 'POST', body: 'x'.repeat(1024) });

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: 'Request body too large' });
    expect(registry.size).toBe(1);
  });
});

describe('parseReloadBody', () => {
  it('accepts a wrapped list or a bare array', () => {
    expect(parseReloadBody(JSON.stringify({ puppets: [puppetA] }))).toEqual([puppetA]);
    expect(parseReloadBody(JSON.stringify([puppetB]))).toEqual([puppetB]);
    expect(parseReloadBody('{"puppets": []}')).toEqual([]);
  });

  it('lists missing fields', () => {
    try {
      parseReloadBody(JSON.stringify({ puppets: [{ slug: 'a', identity: '@a:example.org' }] }));
      expect.unreachable('parseReloadBody should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.issues).toEqual(['puppets.0.credential: Required']);
      }
    }
  });
});
