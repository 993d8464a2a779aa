type DiagnosticHandler<TEvent> = (event: TEvent) => void;

export interface DiagnosticChannelOptions {
  /**
   * Receives whatever a handler throws. Handler failures never reach the
   * emitter or the other handlers.
   */
  onError: (err: unknown) => void;
}

/**
 * Side channel for non-fatal notices raised next to a successful result.
 *
 * Delivery is synchronous and in subscription order, so a subscriber sees the
 * notice before the operation that raised it returns.
 */
export class DiagnosticChannel<TEvent> {
  private handlers: DiagnosticHandler<TEvent>[] = [];
  private readonly onError: (err: unknown) => void;

  constructor(options: DiagnosticChannelOptions) {
    this.onError = options.onError;
  }

  get subscriberCount(): number {
    return this.handlers.length;
  }

  subscribe(handler: DiagnosticHandler<TEvent>): () => void {
    this.handlers.push(handler);
    return () => {
      const index = this.handlers.indexOf(handler);
      if (index >= 0) {
        this.handlers.splice(index, 1);
      }
    };
  }

  emit(event: TEvent): void {
    // Snapshot so handlers may unsubscribe while being called
    for (const handler of [...this.handlers]) {
      try {
        handler(event);
      } catch (error) {
        this.onError(error);
      }
    }
  }
}
