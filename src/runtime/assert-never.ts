/**
 * Compile-time exhaustiveness check for `_tag` / `kind` switches.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(x)}`);
}
