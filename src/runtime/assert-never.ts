/**
 * Compile-time exhaustiveness check for `switch` over a discriminated union.
 * Reaching this at runtime means a value escaped the type system.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
