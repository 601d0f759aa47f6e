type Listener<T> = (value: T) => void;

/**
 * Minimal synchronous pub/sub. A throwing subscriber never stops the others.
 */
export class SessionEvents<T> {
  private readonly subs = new Set<Listener<T>>();

  constructor(private readonly onListenerError: (err: unknown) => void = () => undefined) {}

  subscribe(cb: Listener<T>): () => void {
    this.subs.add(cb);
    return () => {
      this.subs.delete(cb);
    };
  }

  emit(value: T) {
    this.subs.forEach((cb) => {
      try {
        cb(value);
      } catch (err) {
        this.onListenerError(err);
      }
    });
  }

  clear() {
    this.subs.clear();
  }

  get size() {
    return this.subs.size;
  }
}
