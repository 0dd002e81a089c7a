import { WebSocket, type RawData } from 'ws';
import type { Logger } from '../../infra/logger/logger.js';
import { FrameQueue } from './FrameQueue.js';

/** A live event stream. Iteration ends when the connection closes. */
export interface FrameStream extends AsyncIterable<string> {
  close(): void;
}

export interface StreamConnector {
  /** Resolves once the stream is open; rejects if it never opens. */
  connect(signal: AbortSignal): Promise<FrameStream>;
}

const DEFAULT_HIGH_WATER_MARK = 1000;

export function toWebSocketUrl(serverUrl: string): string {
  const base = serverUrl.replace(/\/+$/, '').replace(/^http/i, 'ws');
  return `${base}/api/v4/websocket`;
}

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * Mattermost WebSocket client. Authenticates with the session token in the
 * upgrade request, so no separate authentication_challenge is sent.
 */
export class WebSocketConnector implements StreamConnector {
  private readonly url: string;

  constructor(
    serverUrl: string,
    private readonly token: string,
    private readonly logger: Logger,
    private readonly highWaterMark: number = DEFAULT_HIGH_WATER_MARK,
  ) {
    this.url = toWebSocketUrl(serverUrl);
  }

  connect(signal: AbortSignal): Promise<FrameStream> {
    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(new Error('Connect aborted'));
        return;
      }

      const ws = new WebSocket(this.url, {
        headers: { Authorization: `Bearer ${this.token}` },
      });
      // stop reading from the socket while the ingestor is behind
      const queue = new FrameQueue({
        highWaterMark: this.highWaterMark,
        onHigh: () => {
          this.logger.debug('mm-ws', `Pausing socket at ${this.highWaterMark} buffered frames`);
          ws.pause();
        },
        onLow: () => ws.resume(),
      });
      let opened = false;

      const onAbort = () => ws.terminate();
      signal.addEventListener('abort', onAbort, { once: true });

      ws.on('open', () => {
        opened = true;
        this.logger.debug('mm-ws', `Connected to ${this.url}`);
        resolve({
          [Symbol.asyncIterator]: () => queue[Symbol.asyncIterator](),
          close: () => {
            signal.removeEventListener('abort', onAbort);
            if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
              ws.close(1000);
            }
          },
        });
      });

      ws.on('message', (data: RawData, isBinary: boolean) => {
        if (isBinary) return;
        queue.push(rawToString(data));
      });

      ws.on('error', (err: Error) => {
        if (!opened) {
          reject(err);
          return;
        }
        this.logger.warn('mm-ws', `WebSocket error: ${err.message}`);
        queue.fail(err);
      });

      ws.on('close', (code: number) => {
        signal.removeEventListener('abort', onAbort);
        if (!opened) {
          reject(new Error(`Connection closed before open (code ${code})`));
        }
        queue.end();
      });
    });
  }
}
