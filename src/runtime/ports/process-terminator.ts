/**
 * Exit codes the CLI can terminate with: 0 success, 1 failure, 2 misuse.
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'failure' }
  | { kind: 'misuse' };

/** Only entrypoints terminate the process. */
export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
