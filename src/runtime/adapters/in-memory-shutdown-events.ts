import type { Unsubscribe } from '../ports/process-signals.js';
import type { ShutdownEvent, ShutdownEvents } from '../ports/shutdown-events.js';

export class InMemoryShutdownEvents implements ShutdownEvents {
  private readonly listeners = new Set<(event: ShutdownEvent) => void>();

  onShutdown(listener: (event: ShutdownEvent) => void): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: ShutdownEvent): void {
    // Copy first: a listener may unsubscribe while we iterate.
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }
}
