import type { Server } from 'node:http';
import { loadConfig, type EnvRecord } from '../infra/config/config.js';
import { createLogger, type Logger } from '../infra/logger/logger.js';
import { PuppetRegistry } from '../core/puppet/PuppetRegistry.js';
import { createEnvPuppetSource } from '../core/puppet/envPuppetSource.js';
import { PuppetReloadService } from '../core/puppet/PuppetReloadService.js';
import { OutboundPuppetRouter } from '../core/puppet/OutboundPuppetRouter.js';
import { EchoFilter, createWellKnownIdentities } from '../core/echo/EchoFilter.js';
import { BridgeDispatcher } from '../core/dispatcher/dispatcher.js';
import { createLoggingMiddleware } from '../core/dispatcher/middleware/loggingMiddleware.js';
import { ConnectionError, errorMessage } from '../core/errors.js';
import { MattermostRestClient } from '../adapter/mattermost/MattermostRestClient.js';
import { OutboundSender } from '../adapter/mattermost/OutboundSender.js';
import { AttachmentResolver } from '../adapter/mattermost/AttachmentResolver.js';
import { MattermostEventIngestor } from '../adapter/mattermost/MattermostEventIngestor.js';
import { WebSocketConnector } from '../adapter/mattermost/webSocketConnector.js';
import { closeServer, createReloadApp, listen } from '../admin/reloadServer.js';

export interface StartOptions {
  configPath?: string;
  env?: EnvRecord;
  onSessionDead?: (err: ConnectionError) => void;
}

export interface BridgeRuntime {
  logger: Logger;
  registry: PuppetRegistry;
  reloadService: PuppetReloadService;
  dispatcher: BridgeDispatcher;
  outbound: OutboundSender;
  stop(): Promise<void>;
}

async function resolveBridgeBotId(
  configured: string | undefined,
  token: string | undefined,
  rest: MattermostRestClient,
  logger: Logger,
): Promise<string> {
  if (configured) return configured;
  if (!token) return '';
  try {
    const me = await rest.getMe(token);
    logger.info('bootstrap', `Relay session is @${me.username} (${me.id})`);
    return me.id;
  } catch (err) {
    logger.error('bootstrap', `Could not identify relay account: ${errorMessage(err)}`);
    return '';
  }
}

export async function start(options: StartOptions = {}): Promise<BridgeRuntime> {
  const env = options.env ?? process.env;
  const cfg = loadConfig(options.configPath, env);
  const logger = createLogger(cfg);
  logger.info('bootstrap', `Starting ${cfg.app.name} in ${cfg.app.env} against ${cfg.mattermost.serverUrl}`);

  const rest = new MattermostRestClient(cfg.mattermost.serverUrl, logger);
  const relayToken = cfg.mattermost.token;

  // Puppets
  const registry = new PuppetRegistry();
  const source = createEnvPuppetSource(cfg.puppets.envPrefix, () => env);
  const reloadService = new PuppetReloadService(registry, source, logger, rest);
  await reloadService.reloadFromSource();

  // Inbound
  const bridgeBotId = await resolveBridgeBotId(cfg.bridge.bridgeBotUserId, relayToken, rest, logger);
  const identities = createWellKnownIdentities({
    bridgeBotId,
    relayBotId: cfg.bridge.relayBotUserId,
    botPrefix: cfg.mattermost.botPrefix,
  });
  const echoFilter = new EchoFilter(identities, registry);

  const dispatcher = new BridgeDispatcher(logger);
  dispatcher.useBefore(createLoggingMiddleware(logger));

  // Outbound
  const router = new OutboundPuppetRouter(registry, logger);
  const outbound = new OutboundSender(router, rest, logger, relayToken);

  const controller = new AbortController();
  let ingestDone: Promise<void> = Promise.resolve();
  if (relayToken) {
    const ingestor = new MattermostEventIngestor(
      new WebSocketConnector(cfg.mattermost.serverUrl, relayToken, logger),
      echoFilter,
      dispatcher,
      logger,
      {
        reconnectBaseDelayMs: cfg.ingest.reconnectBaseDelayMs,
        reconnectMaxDelayMs: cfg.ingest.reconnectMaxDelayMs,
        maxReconnectAttempts: cfg.ingest.maxReconnectAttempts,
        typingTimeoutMs: cfg.mattermost.typingTimeoutSeconds * 1000,
        attachments: new AttachmentResolver(rest, relayToken, logger),
        onSessionDead: options.onSessionDead,
      },
    );
    ingestDone = ingestor.run(controller.signal).catch((err: unknown) => {
      logger.error('bootstrap', `Relay session ended: ${errorMessage(err)}`);
    });
  } else {
    logger.warn('bootstrap', 'No relay token configured, inbound event stream not started');
  }

  // Admin
  let server: Server | undefined;
  if (cfg.admin.enabled) {
    const app = createReloadApp(reloadService, logger, { maxBodyBytes: cfg.admin.maxBodyBytes });
    server = await listen(app, cfg.admin.host, cfg.admin.port);
    logger.info('bootstrap', `Admin API listening on ${cfg.admin.host}:${cfg.admin.port}`);
  }

  let stopping: Promise<void> | undefined;
  const stop = (): Promise<void> => {
    stopping ??= (async () => {
      logger.info('bootstrap', 'Shutting down');
      controller.abort();
      await ingestDone;
      if (server) await closeServer(server);
      logger.info('bootstrap', 'Stopped');
    })();
    return stopping;
  };

  return { logger, registry, reloadService, dispatcher, outbound, stop };
}
