import { createHash } from 'crypto';

export function sha256Hex(content: Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

// Two-character fan-out keeps any one directory or listing prefix small.
export function contentKey(prefix: string, sha256: string): string {
  return `${prefix}${sha256.slice(0, 2)}/${sha256}`;
}
