import { describe, it, expect } from 'vitest';
import { NoopProcessSignals } from '../../../src/runtime/adapters/noop-process-signals.js';
import { InMemoryShutdownEvents } from '../../../src/runtime/adapters/in-memory-shutdown-events.js';
import type { ShutdownEvent } from '../../../src/runtime/ports/shutdown-events.js';
import { lifecyclePolicyFor } from '../../../src/runtime/process-lifecycle-policy.js';

describe('NoopProcessSignals', () => {
  it('fires each handler once', () => {
    const signals = new NoopProcessSignals();
    let calls = 0;
    signals.once('SIGTERM', () => calls++);

    signals.raise('SIGTERM');
    signals.raise('SIGTERM');

    expect(calls).toBe(1);
  });

  it('honors unsubscribe', () => {
    const signals = new NoopProcessSignals();
    let calls = 0;
    const unsubscribe = signals.once('SIGINT', () => calls++);

    unsubscribe();
    signals.raise('SIGINT');

    expect(calls).toBe(0);
  });
});

describe('InMemoryShutdownEvents', () => {
  it('delivers to every listener until unsubscribed', () => {
    const events = new InMemoryShutdownEvents();
    const seen: ShutdownEvent[] = [];
    const unsubscribe = events.onShutdown((e) => seen.push(e));

    events.emit({ kind: 'shutdown_requested', signal: 'SIGINT' });
    unsubscribe();
    events.emit({ kind: 'shutdown_requested', signal: 'SIGTERM' });

    expect(seen).toEqual([{ kind: 'shutdown_requested', signal: 'SIGINT' }]);
  });

  it('lets a listener unsubscribe itself while being notified', () => {
    const events = new InMemoryShutdownEvents();
    let calls = 0;
    const unsubscribe = events.onShutdown(() => {
      calls++;
      unsubscribe();
    });

    events.emit({ kind: 'shutdown_requested', signal: 'SIGINT' });
    events.emit({ kind: 'shutdown_requested', signal: 'SIGINT' });

    expect(calls).toBe(1);
  });
});

describe('lifecyclePolicyFor', () => {
  it('never installs signal handlers under test', () => {
    expect(lifecyclePolicyFor({ kind: 'test' })).toEqual({ kind: 'no_signal_handlers' });
    expect(lifecyclePolicyFor({ kind: 'server' })).toEqual({ kind: 'install_signal_handlers' });
  });
});
