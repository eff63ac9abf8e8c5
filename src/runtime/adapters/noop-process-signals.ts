import type { ProcessSignals, ShutdownSignal, Unsubscribe } from '../ports/process-signals.js';

/**
 * Records subscriptions without touching `process`. Tests can fire a signal
 * through {@link NoopProcessSignals.raise}.
 */
export class NoopProcessSignals implements ProcessSignals {
  private readonly handlers = new Map<ShutdownSignal, Set<() => void>>();

  once(signal: ShutdownSignal, handler: () => void): Unsubscribe {
    const set = this.handlers.get(signal) ?? new Set<() => void>();
    set.add(handler);
    this.handlers.set(signal, set);
    return () => {
      set.delete(handler);
    };
  }

  raise(signal: ShutdownSignal): void {
    const set = this.handlers.get(signal);
    if (!set) return;
    const pending = [...set];
    set.clear();
    for (const handler of pending) handler();
  }
}
