import { start, type BridgeRuntime } from './bootstrap/main.js';
import { errorMessage } from './core/errors.js';

let runtime: BridgeRuntime | undefined;

function shutdown(reason: string): void {
  if (!runtime) return;
  runtime.logger.info('bootstrap', reason);
  runtime.stop().catch((err: unknown) => {
    console.error(`[bootstrap] Shutdown failed: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
}

runtime = await start({
  onSessionDead: () => {
    process.exitCode = 1;
    shutdown('Relay session is dead, shutting down');
  },
}).catch((err: unknown) => {
  console.error(`[bootstrap] Failed to start: ${errorMessage(err)}`);
  process.exit(1);
});

process.once('SIGINT', () => shutdown('Received SIGINT'));
process.once('SIGTERM', () => shutdown('Received SIGTERM'));
