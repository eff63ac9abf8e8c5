import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Fails loudly instead of exiting, so a test that reaches termination
 * surfaces as a thrown error.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    throw new Error(`process terminated with ${code.kind}`);
  }
}
