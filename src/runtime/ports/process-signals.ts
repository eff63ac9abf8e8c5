export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export type Unsubscribe = () => void;

/**
 * Port over `process.once(signal)`, so the serve command can be exercised
 * without touching the real process.
 */
export interface ProcessSignals {
  once(signal: ShutdownSignal, handler: () => void): Unsubscribe;
}
