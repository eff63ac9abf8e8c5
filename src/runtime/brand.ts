/**
 * Nominal typing for values that have crossed a validation boundary
 * (an absolute jail path, a sanitized filename, a parsed config).
 *
 * The marker is string-keyed so zod transforms producing branded values can be
 * exported without TS4023. Erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
