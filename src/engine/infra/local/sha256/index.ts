import { createHash } from 'crypto';
import type { Sha256Port } from '../../../ports/sha256.port.js';
import { asSha256Digest, type Sha256Digest } from '../../../durable-core/ids/index.js';

export class NodeSha256 implements Sha256Port {
  sha256(bytes: Uint8Array): Sha256Digest {
    const hex = createHash('sha256').update(bytes).digest('hex');
    return asSha256Digest(`sha256:${hex}`);
  }
}
