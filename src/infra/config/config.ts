import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';
import { ValidationError } from '../../core/errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type AppEnv = 'dev' | 'prod' | 'test';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/** Shape of config/default.yaml. Every key is optional; buildConfig fills defaults. */
const AppConfigSchema = z
  .object({
    app: z.object({ name: z.string(), env: z.enum(['dev', 'prod', 'test']) }).partial(),
    logger: z.object({ level: LogLevelSchema, transport: z.literal('console') }).partial(),
    logging: z.object({ color: z.boolean(), level: LogLevelSchema }).partial(),
    mattermost: z
      .object({
        serverUrl: z.string(),
        token: z.string(),
        botPrefix: z.string(),
        typingTimeoutSeconds: z.number().positive(),
      })
      .partial(),
    bridge: z.object({ bridgeBotUserId: z.string(), relayBotUserId: z.string() }).partial(),
    puppets: z.object({ envPrefix: z.string() }).partial(),
    admin: z
      .object({
        enabled: z.boolean(),
        host: z.string(),
        port: z.number().int().min(0).max(65535),
        maxBodyBytes: z.number().int().positive(),
      })
      .partial(),
    ingest: z
      .object({
        reconnectBaseDelayMs: z.number().int().positive(),
        reconnectMaxDelayMs: z.number().int().positive(),
        maxReconnectAttempts: z.number().int().positive(),
      })
      .partial(),
  })
  .partial();

export type AppConfig = z.infer<typeof AppConfigSchema>;

export type AppConfigRequired = {
  app: {
    name: string;
    env: AppEnv;
  };
  logger: {
    level: LogLevel;
    transport: 'console';
  };
  logging: {
    color: boolean;
    level: LogLevel;
  };
  mattermost: {
    serverUrl: string;
    token?: string;
    botPrefix?: string;
    typingTimeoutSeconds: number;
  };
  bridge: {
    bridgeBotUserId?: string;
    relayBotUserId?: string;
  };
  puppets: {
    envPrefix: string;
  };
  admin: {
    enabled: boolean;
    host: string;
    port: number;
    maxBodyBytes: number;
  };
  ingest: {
    reconnectBaseDelayMs: number;
    reconnectMaxDelayMs: number;
    maxReconnectAttempts: number;
  };
};

export type EnvRecord = Record<string, string | undefined>;

const DEFAULT_ADMIN_PORT = 29320;

function isAppEnv(value: string | undefined): value is AppEnv {
  return value === 'dev' || value === 'prod' || value === 'test';
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Parse `host:port` or `:port` (the BRIDGE_API_ADDR form) into its parts.
 * Returns undefined when the port is not a number.
 */
export function parseListenAddr(addr: string): { host?: string; port: number } | undefined {
  const idx = addr.lastIndexOf(':');
  const hostPart = idx >= 0 ? addr.slice(0, idx) : '';
  const portPart = idx >= 0 ? addr.slice(idx + 1) : addr;
  const port = Number.parseInt(portPart, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) return undefined;
  return { host: hostPart === '' ? undefined : hostPart, port };
}

/**
 * Convert the raw YAML document plus the process environment into the
 * fully-defaulted config. This is the only place env overrides are read.
 */
export function buildConfig(cfg: AppConfig, env: EnvRecord): AppConfigRequired {
  const appEnv: AppEnv = isAppEnv(env.NODE_ENV) ? env.NODE_ENV : (cfg.app?.env ?? 'prod');
  const loggerLevel = cfg.logger?.level ?? 'info';

  const apiAddr = nonEmpty(env.BRIDGE_API_ADDR);
  const parsedAddr = apiAddr ? parseListenAddr(apiAddr) : undefined;

  return {
    app: {
      name: cfg.app?.name ?? 'mm-matrix-bridge',
      env: appEnv,
    },
    logger: {
      level: loggerLevel,
      transport: 'console',
    },
    logging: {
      color: cfg.logging?.color ?? true,
      level: cfg.logging?.level ?? loggerLevel,
    },
    mattermost: {
      serverUrl:
        nonEmpty(env.MATTERMOST_SERVER_URL) ?? cfg.mattermost?.serverUrl ?? 'http://localhost:8065',
      token: nonEmpty(cfg.mattermost?.token) ?? nonEmpty(env.MATTERMOST_RELAY_TOKEN),
      botPrefix: nonEmpty(env.BRIDGE_BOT_PREFIX) ?? nonEmpty(cfg.mattermost?.botPrefix),
      typingTimeoutSeconds: cfg.mattermost?.typingTimeoutSeconds ?? 5,
    },
    bridge: {
      bridgeBotUserId: nonEmpty(cfg.bridge?.bridgeBotUserId),
      relayBotUserId: nonEmpty(cfg.bridge?.relayBotUserId),
    },
    puppets: {
      envPrefix: nonEmpty(cfg.puppets?.envPrefix) ?? 'MATTERMOST_PUPPET',
    },
    admin: {
      enabled: cfg.admin?.enabled ?? true,
      host: parsedAddr?.host ?? cfg.admin?.host ?? '0.0.0.0',
      port: parsedAddr?.port ?? cfg.admin?.port ?? DEFAULT_ADMIN_PORT,
      maxBodyBytes: cfg.admin?.maxBodyBytes ?? 1 << 20,
    },
    ingest: {
      reconnectBaseDelayMs: cfg.ingest?.reconnectBaseDelayMs ?? 1000,
      reconnectMaxDelayMs: cfg.ingest?.reconnectMaxDelayMs ?? 60_000,
      maxReconnectAttempts: cfg.ingest?.maxReconnectAttempts ?? 20,
    },
  };
}

/** Validate a parsed YAML document. An empty file yields an empty config. */
export function parseConfigDocument(doc: unknown): AppConfig {
  if (doc === null || doc === undefined) return {};
  const parsed = AppConfigSchema.safeParse(doc);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ValidationError(`Invalid config: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export function loadConfig(
  filePath: string = resolve(process.cwd(), 'config', 'default.yaml'),
  env: EnvRecord = process.env,
): AppConfigRequired {
  const raw = readFileSync(filePath, 'utf-8');
  const built = buildConfig(parseConfigDocument(parse(raw)), env);

  // No relay token in prod means every unmapped sender is dropped; say so up front.
  if (built.app.env === 'prod' && !built.mattermost.token) {
    console.warn(
      '[CONFIG] No relay token configured. Messages from senders without a puppet will be dropped. Set mattermost.token or MATTERMOST_RELAY_TOKEN.',
    );
  }
  return built;
}
