import type { RuntimeMode } from './runtime-mode.js';

/**
 * Whether the composition root may hook process signals.
 * Tests run inside vitest's process and must never install handlers.
 */
export type ProcessLifecyclePolicy =
  | { kind: 'install_signal_handlers' }
  | { kind: 'no_signal_handlers' };

export function lifecyclePolicyFor(mode: RuntimeMode): ProcessLifecyclePolicy {
  return mode.kind === 'test'
    ? { kind: 'no_signal_handlers' }
    : { kind: 'install_signal_handlers' };
}
