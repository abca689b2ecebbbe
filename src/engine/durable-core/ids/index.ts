import type { Brand } from '../../../runtime/brand.js';

/** `sha256:<64 lowercase hex>` */
export type Sha256Digest = Brand<string, 'Sha256Digest'>;

/**
 * Opaque session key. Either handed over by the hosting environment or the
 * derived `local-<hex>` namespace used when the environment provides none.
 */
export type SessionId = Brand<string, 'SessionId'>;

/** Kebab-case split name without its index prefix (`auth-system`). */
export type SplitName = Brand<string, 'SplitName'>;

/** Two-digit, zero-padded split index (`01`..`99`). */
export type SplitIndex = Brand<string, 'SplitIndex'>;

/** Directory name of a materialized split (`01-auth-system`, `01-auth-system-2`). */
export type SplitDirName = Brand<string, 'SplitDirName'>;

export function asSha256Digest(value: string): Sha256Digest {
  return value as Sha256Digest;
}

export function asSessionId(value: string): SessionId {
  return value as SessionId;
}

export function asSplitName(value: string): SplitName {
  return value as SplitName;
}

export function asSplitIndex(value: string): SplitIndex {
  return value as SplitIndex;
}

export function asSplitDirName(value: string): SplitDirName {
  return value as SplitDirName;
}
