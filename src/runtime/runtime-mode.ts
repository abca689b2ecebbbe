/**
 * Runtime mode of the current process. Injected, not inferred ad hoc from env vars.
 */
export type RuntimeMode = { kind: 'cli' } | { kind: 'test' };
