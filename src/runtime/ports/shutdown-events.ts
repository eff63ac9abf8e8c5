import type { ShutdownSignal, Unsubscribe } from './process-signals.js';

export type ShutdownEvent =
  | { kind: 'shutdown_requested'; signal: ShutdownSignal };

/**
 * Decouples "a shutdown was requested" from how the server reacts to it.
 */
export interface ShutdownEvents {
  onShutdown(listener: (event: ShutdownEvent) => void): Unsubscribe;
  emit(event: ShutdownEvent): void;
}
