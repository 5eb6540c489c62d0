import type { SimSignal, SimSignalType, SignalOf } from '@hustle/shared';

type Listener<T extends SimSignalType> = (signal: SignalOf<T>) => void;
type AnyListener = (signal: SimSignal) => void;

function isSignal<T extends SimSignalType>(signal: SimSignal, type: T): signal is SignalOf<T> {
  return signal.type === type;
}

// A listener that keeps emitting in response to its own signals would spin forever
const MAX_SIGNALS_PER_FLUSH = 10_000;

/**
 * Typed notification queue shared by the engines.
 *
 * Engines `emit` while they mutate; nothing is delivered until the owner of
 * the step calls `flush()`. Listeners therefore never observe half-applied state.
 */
export class SignalBus {
  private queue: SimSignal[] = [];
  private listeners = new Map<SimSignalType, Set<AnyListener>>();
  private anyListeners = new Set<AnyListener>();
  private flushing = false;

  on<T extends SimSignalType>(type: T, listener: Listener<T>): () => void {
    const wrapped: AnyListener = (signal) => {
      if (isSignal(signal, type)) listener(signal);
    };
    let set = this.listeners.get(type);
    if (!set) {
      set = new Set();
      this.listeners.set(type, set);
    }
    set.add(wrapped);
    return () => {
      set?.delete(wrapped);
    };
  }

  onAny(listener: AnyListener): () => void {
    this.anyListeners.add(listener);
    return () => {
      this.anyListeners.delete(listener);
    };
  }

  emit(signal: SimSignal): void {
    this.queue.push(signal);
  }

  pending(): readonly SimSignal[] {
    return this.queue;
  }

  /** Deliver queued signals in order, including ones emitted by listeners during this flush. */
  flush(): number {
    if (this.flushing) return 0;
    this.flushing = true;
    let delivered = 0;
    try {
      while (this.queue.length > 0) {
        if (delivered >= MAX_SIGNALS_PER_FLUSH) {
          console.warn(`[Signals] Flush cap hit; dropping ${this.queue.length} queued signal(s)`);
          this.queue = [];
          break;
        }
        const signal = this.queue.shift();
        if (!signal) break;
        delivered++;
        const typed = this.listeners.get(signal.type);
        if (typed) {
          for (const listener of [...typed]) listener(signal);
        }
        for (const listener of [...this.anyListeners]) listener(signal);
      }
    } finally {
      this.flushing = false;
    }
    return delivered;
  }

  clear(): void {
    this.queue = [];
  }
}
