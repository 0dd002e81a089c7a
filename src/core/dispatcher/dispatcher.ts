import type { InboundEventKind, NormalizedEvent } from '../model/Event.js';
import type { Logger } from '../../infra/logger/logger.js';
import { errorMessage } from '../errors.js';
import { HandlerRegistry } from './handlerRegistry.js';

export type EventOfKind<K extends InboundEventKind> = NormalizedEvent & { kind: K };

export type EventHandler<K extends InboundEventKind> = (event: EventOfKind<K>) => Promise<void>;

export type MiddlewareFunc = (event: NormalizedEvent, next: () => Promise<void>) => Promise<void>;

function isKind<K extends InboundEventKind>(event: NormalizedEvent, kind: K): event is EventOfKind<K> {
  return event.kind === kind;
}

/**
 * Sink for normalized inbound events. One handler per event kind, with a
 * before-middleware chain around it. A failing handler is logged and never
 * propagates back into the ingest loop.
 */
export class BridgeDispatcher {
  private registry = new HandlerRegistry();
  private beforeMiddleware: MiddlewareFunc[] = [];

  constructor(private readonly logger: Logger) {}

  public on<K extends InboundEventKind>(kind: K, handler: EventHandler<K>): void {
    const replaced = this.registry.register(kind, (event) =>
      isKind(event, kind) ? handler(event) : Promise.resolve(),
    );
    if (replaced) {
      this.logger.warn('dispatcher', `Handler for ${kind} already registered, overwriting`);
    }
  }

  public off(kind: InboundEventKind): boolean {
    return this.registry.deregister(kind);
  }

  public useBefore(middleware: MiddlewareFunc): void {
    this.beforeMiddleware.push(middleware);
  }

  public async dispatch(event: NormalizedEvent): Promise<void> {
    try {
      await this.runMiddlewareChain(event, () => this.executeHandler(event));
    } catch (err) {
      this.logger.error('dispatcher', `Dispatch of ${event.kind} failed: ${errorMessage(err)}`);
    }
  }

  private async executeHandler(event: NormalizedEvent): Promise<void> {
    const handler = this.registry.get(event.kind);
    if (!handler) {
      this.logger.debug('dispatcher', `No handler for ${event.kind}, ignoring`);
      return;
    }
    await handler(event);
  }

  private async runMiddlewareChain(event: NormalizedEvent, final: () => Promise<void>): Promise<void> {
    const middleware = this.beforeMiddleware;
    if (middleware.length === 0) return final();

    let index = -1;
    const step = async (i: number): Promise<void> => {
      if (i <= index) {
        throw new Error('next() called multiple times');
      }
      index = i;
      if (i === middleware.length) {
        return final();
      }
      return middleware[i](event, () => step(i + 1));
    };

    return step(0);
  }
}
