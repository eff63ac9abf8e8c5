/**
 * CLI Commands - Public API
 */

export {
  executeServeCommand,
  type ServeArguments,
  type ServeOptions,
  type ServeCommandDeps,
} from './serve.js';
