import type { PuppetEntryInput } from '../model/Puppet.js';
import type { EnvRecord } from '../../infra/config/config.js';
import { normalizeSlug } from './PuppetRegistry.js';

const IDENTITY_SUFFIX = '_IDENTITY';
const CREDENTIAL_SUFFIX = '_CREDENTIAL';

/**
 * Scan an environment record for puppet pairs:
 *
 *   <PREFIX>_<SLUG>_IDENTITY   = @agent:example.com
 *   <PREFIX>_<SLUG>_CREDENTIAL = <mattermost access token>
 *
 * Pairs with either half missing or blank are skipped. Output is sorted by slug.
 */
export function parsePuppetEnv(env: EnvRecord, prefix: string): PuppetEntryInput[] {
  const keyPrefix = prefix.endsWith('_') ? prefix : `${prefix}_`;
  const slugs = new Set<string>();

  for (const key of Object.keys(env)) {
    if (!key.startsWith(keyPrefix) || !key.endsWith(IDENTITY_SUFFIX)) continue;
    const rawSlug = key.slice(keyPrefix.length, key.length - IDENTITY_SUFFIX.length);
    if (rawSlug !== '') slugs.add(rawSlug);
  }

  const entries: PuppetEntryInput[] = [];
  for (const rawSlug of slugs) {
    const identity = env[`${keyPrefix}${rawSlug}${IDENTITY_SUFFIX}`]?.trim();
    const credential = env[`${keyPrefix}${rawSlug}${CREDENTIAL_SUFFIX}`]?.trim();
    if (!identity || !credential) continue;
    entries.push({ slug: normalizeSlug(rawSlug), identity, credential });
  }

  return entries.sort((a, b) => (a.slug < b.slug ? -1 : a.slug > b.slug ? 1 : 0));
}

/** Where an empty-body reload gets its entries from. */
export interface PuppetSource {
  readonly name: string;
  load(): PuppetEntryInput[];
}

export function createEnvPuppetSource(
  prefix: string,
  readEnv: () => EnvRecord = () => process.env,
): PuppetSource {
  return {
    name: 'env',
    load: () => parsePuppetEnv(readEnv(), prefix),
  };
}
