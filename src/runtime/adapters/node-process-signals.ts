import type { ProcessSignals, ShutdownSignal, Unsubscribe } from '../ports/process-signals.js';

export class NodeProcessSignals implements ProcessSignals {
  once(signal: ShutdownSignal, handler: () => void): Unsubscribe {
    const listener = (): void => handler();
    process.once(signal, listener);
    return () => {
      process.off(signal, listener);
    };
  }
}
