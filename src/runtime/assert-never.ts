/**
 * Exhaustiveness guard for `kind`-discriminated unions.
 * Adding a member to a union makes every unguarded `switch` fail to compile.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(x)}`);
}
