import { describe, it, expect } from 'vitest';
import { createEnvPuppetSource, parsePuppetEnv } from '../../../../src/core/puppet/envPuppetSource.js';

describe('parsePuppetEnv', () => {
  it('collects complete identity and credential pairs, sorted by slug', () => {
    const env = {
      MATRIX_PUPPET_ZED_IDENTITY: '@zed:example.org',
      MATRIX_PUPPET_ZED_CREDENTIAL: 'token-z',
      MATRIX_PUPPET_code_reviewer_IDENTITY: ' @reviewer:example.org ',
      MATRIX_PUPPET_code_reviewer_CREDENTIAL: 'token-r',
      UNRELATED: 'x',
    };

    expect(parsePuppetEnv(env, 'MATRIX_PUPPET')).toEqual([
      { slug: 'CODE_REVIEWER', identity: '@reviewer:example.org', credential: 'token-r' },
      { slug: 'ZED', identity: '@zed:example.org', credential: 'token-z' },
    ]);
  });

  it('skips pairs with a missing or blank half', () => {
    const env = {
      MATRIX_PUPPET_A_IDENTITY: '@a:example.org',
      MATRIX_PUPPET_B_IDENTITY: '@b:example.org',
      MATRIX_PUPPET_B_CREDENTIAL: '   ',
      MATRIX_PUPPET_C_CREDENTIAL: 'token-c',
    };

    expect(parsePuppetEnv(env, 'MATRIX_PUPPET')).toEqual([]);
  });

  it('accepts a prefix that already ends in an underscore', () => {
    const env = {
      BOT_X_IDENTITY: '@x:example.org',
      BOT_X_CREDENTIAL: 'token-x',
    };
    expect(parsePuppetEnv(env, 'BOT_')).toEqual([
      { slug: 'X', identity: '@x:example.org', credential: 'token-x' },
    ]);
  });
});

describe('createEnvPuppetSource', () => {
  it('reads the environment on every load', () => {
    let env: Record<string, string | undefined> = {};
    const source = createEnvPuppetSource('P', () => env);

    expect(source.name).toBe('env');
    expect(source.load()).toEqual([]);

    env = { P_ONE_IDENTITY: '@one:example.org', P_ONE_CREDENTIAL: 'token-1' };
    expect(source.load()).toEqual([
      { slug: 'ONE', identity: '@one:example.org', credential: 'token-1' },
    ]);
  });
});
