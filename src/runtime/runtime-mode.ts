/**
 * How the current process was started. Injected through DI so components never
 * sniff `NODE_ENV` or `VITEST` themselves.
 */
export type RuntimeMode =
  | { kind: 'server' }
  | { kind: 'test' };
