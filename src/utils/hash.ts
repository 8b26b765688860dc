//SHA-256 content hashes, formatted as 'sha256:' + 64 lowercase hex chars
import crypto from 'crypto';

const HASH_PREFIX = 'sha256:';

export function computeHash(content: string): string {
  return HASH_PREFIX + crypto.createHash('sha256').update(content).digest('hex');
}
