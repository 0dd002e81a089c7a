import type { InboundEventKind, NormalizedEvent } from '../model/Event.js';

export type Handler = (event: NormalizedEvent) => Promise<void>;

export class HandlerRegistry {
  private handlers: Map<InboundEventKind, Handler> = new Map();

  /** Returns true when an earlier handler for the same kind was replaced. */
  public register(kind: InboundEventKind, handler: Handler): boolean {
    const replaced = this.handlers.has(kind);
    this.handlers.set(kind, handler);
    return replaced;
  }

  public get(kind: InboundEventKind): Handler | undefined {
    return this.handlers.get(kind);
  }

  public deregister(kind: InboundEventKind): boolean {
    return this.handlers.delete(kind);
  }
}
