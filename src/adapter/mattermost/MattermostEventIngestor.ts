import type { Logger } from '../../infra/logger/logger.js';
import type { EchoFilter } from '../../core/echo/EchoFilter.js';
import { InboundEventKind, type DecodedEvent, type NormalizedEvent } from '../../core/model/Event.js';
import type { Attachment } from '../../core/model/Message.js';
import { normalizeEvent } from '../../core/messaging/normalizeEvent.js';
import { ConnectionError, DecodeError, errorMessage } from '../../core/errors.js';
import { decodeFrame } from './mattermostEventMapper.js';
import type { FrameStream, StreamConnector } from './webSocketConnector.js';

/** Receives every event that survives decoding and echo filtering. */
export interface EventSink {
  dispatch(event: NormalizedEvent): Promise<void>;
}

/** Turns the file IDs on a post into attachment descriptions. */
export interface AttachmentSource {
  resolve(fileIds: readonly string[]): Promise<Attachment[]>;
}

export type IngestorState = 'IDLE' | 'CONNECTING' | 'STREAMING' | 'BACKOFF' | 'STOPPED' | 'DEAD';

export interface IngestorOptions {
  reconnectBaseDelayMs: number;
  reconnectMaxDelayMs: number;
  /** Consecutive connection failures tolerated before the session is declared dead. */
  maxReconnectAttempts: number;
  typingTimeoutMs: number;
  /** Resolves attachments on posted messages; without it `attachments` stays empty. */
  attachments?: AttachmentSource;
  /** Called once when reconnects are exhausted. */
  onSessionDead?: (err: ConnectionError) => void;
  random?: () => number;
}

export interface IngestorStats {
  framesReceived: number;
  decodeErrors: number;
  echoesDropped: number;
  dispatched: number;
}

/**
 * Exponential backoff with 0.85-1.15 jitter, capped at `maxMs`.
 * `attempt` is 1-based.
 */
export function backoffDelay(
  attempt: number,
  baseMs: number,
  maxMs: number,
  random: () => number = Math.random,
): number {
  const jitter = random() * 0.3 + 0.85;
  const raw = baseMs * 2 ** Math.max(0, attempt - 1);
  return Math.min(raw * jitter, maxMs);
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

/** Yields from `source` until it ends or `signal` fires, whichever is first. */
async function* untilAborted<T>(source: AsyncIterable<T>, signal: AbortSignal): AsyncGenerator<T> {
  if (signal.aborted) return;
  const iterator = source[Symbol.asyncIterator]();
  let onAbort: () => void = () => undefined;
  const aborted = new Promise<IteratorResult<T>>((resolve) => {
    onAbort = () => resolve({ value: undefined, done: true });
    signal.addEventListener('abort', onAbort, { once: true });
  });
  try {
    // an already-buffered frame settles first in the race, so check the flag each pass
    while (!signal.aborted) {
      const result = await Promise.race([iterator.next(), aborted]);
      if (result.done || signal.aborted) return;
      yield result.value;
    }
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

/**
 * One read loop per Mattermost session: decode, echo-filter, normalize,
 * dispatch. Frames are handled one at a time in arrival order.
 */
export class MattermostEventIngestor {
  private _state: IngestorState = 'IDLE';
  private readonly _stats: IngestorStats = {
    framesReceived: 0,
    decodeErrors: 0,
    echoesDropped: 0,
    dispatched: 0,
  };

  constructor(
    private readonly connector: StreamConnector,
    private readonly echoFilter: EchoFilter,
    private readonly sink: EventSink,
    private readonly logger: Logger,
    private readonly options: IngestorOptions,
  ) {}

  get state(): IngestorState {
    return this._state;
  }

  get stats(): Readonly<IngestorStats> {
    return { ...this._stats };
  }

  /**
   * Runs until `signal` aborts (resolves) or reconnects are exhausted
   * (rejects with ConnectionError).
   */
  async run(signal: AbortSignal): Promise<void> {
    let failures = 0;

    while (!signal.aborted) {
      this.setState('CONNECTING');
      let stream: FrameStream;
      try {
        stream = await this.connector.connect(signal);
      } catch (err) {
        if (signal.aborted) break;
        failures++;
        this.logger.warn('ingestor', `Connect failed (attempt ${failures}): ${errorMessage(err)}`);
        await this.backoff(failures, err, signal);
        continue;
      }

      failures = 0;
      this.setState('STREAMING');
      this.logger.info('ingestor', 'Event stream connected');

      let cause: unknown;
      try {
        for await (const raw of untilAborted(stream, signal)) {
          await this.handleFrame(raw);
          if (signal.aborted) break;
        }
      } catch (err) {
        cause = err;
      } finally {
        stream.close();
      }
      if (signal.aborted) break;

      failures++;
      this.logger.warn(
        'ingestor',
        cause === undefined
          ? 'Event stream closed by server'
          : `Event stream failed: ${errorMessage(cause)}`,
      );
      await this.backoff(failures, cause, signal);
    }

    this.setState('STOPPED');
    this.logger.info('ingestor', 'Ingestor stopped');
  }

  /** Decode, filter and dispatch a single raw frame. Bad frames and sink failures are logged, not thrown. */
  async handleFrame(raw: string): Promise<void> {
    this._stats.framesReceived++;

    let decoded: DecodedEvent | null;
    try {
      decoded = decodeFrame(raw);
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      this._stats.decodeErrors++;
      this.logger.warn('ingestor', `Skipping undecodable frame: ${err.message}`);
      return;
    }
    if (!decoded) return;

    const verdict = this.echoFilter.classify(decoded);
    if (verdict.kind === 'own-echo') {
      this._stats.echoesDropped++;
      this.logger.debug(
        'ingestor',
        `Dropped ${decoded.kind} from ${decoded.senderName ?? decoded.senderId} (${verdict.reason})`,
      );
      return;
    }

    let event = normalizeEvent(decoded, this.options.typingTimeoutMs);
    try {
      if (event.kind === InboundEventKind.MessagePosted && event.fileIds.length > 0 && this.options.attachments) {
        event = { ...event, attachments: await this.options.attachments.resolve(event.fileIds) };
      }
      await this.sink.dispatch(event);
      this._stats.dispatched++;
    } catch (err) {
      this.logger.error('ingestor', `Dispatch of ${event.kind} failed: ${errorMessage(err)}`);
    }
  }

  private async backoff(failures: number, cause: unknown, signal: AbortSignal): Promise<void> {
    if (failures >= this.options.maxReconnectAttempts) {
      const err = new ConnectionError(
        `Giving up after ${failures} consecutive connection failures`,
        failures,
        { cause },
      );
      this.setState('DEAD');
      this.logger.error('ingestor', err.message);
      this.options.onSessionDead?.(err);
      throw err;
    }

    const delay = backoffDelay(
      failures,
      this.options.reconnectBaseDelayMs,
      this.options.reconnectMaxDelayMs,
      this.options.random,
    );
    this.setState('BACKOFF');
    this.logger.info('ingestor', `Reconnecting in ${Math.round(delay)}ms (attempt ${failures + 1})`);
    await sleep(delay, signal);
  }

  private setState(state: IngestorState): void {
    if (this._state === state) return;
    this.logger.debug('ingestor', `State ${this._state} -> ${state}`);
    this._state = state;
  }
}
