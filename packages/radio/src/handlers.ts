/** A set of listeners with unsubscribe-by-return, as the link contract wants. */
export class HandlerSet<T> {
  private readonly handlers = new Set<(value: T) => void>();

  add(handler: (value: T) => void): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  emit(value: T): void {
    for (const handler of [...this.handlers]) {
      handler(value);
    }
  }

  clear(): void {
    this.handlers.clear();
  }
}
