import type { Sha256Digest } from '../durable-core/ids/index.js';

/**
 * Port: SHA-256 over raw bytes.
 *
 * Used for input fingerprints (drift detection) and for deriving stable keys
 * from paths. Equality comparison only, never security.
 *
 * Guarantees:
 * - Deterministic: same bytes, same digest
 * - Pure (no side effects)
 */
export interface Sha256Port {
  sha256(bytes: Uint8Array): Sha256Digest;
}
