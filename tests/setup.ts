/**
 * Vitest setup file. Runs before every test file.
 */

// Required for tsyringe DI decorators
import 'reflect-metadata';

// NOTE: Do not register process-level signal handlers in tests.
// Vitest owns the process lifecycle; cleanup happens in test hooks.
