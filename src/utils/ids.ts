import * as crypto from 'crypto';

/**
 * Generate a UUID v4 string
 *
 * Works with Jest without ESM issues.
 */
export function generateUUID(): string {
  return 'xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx'.replace(/[xy]/g, (c) => {
    const r = Math.random() * 16 | 0;
    const v = c === 'x' ? r : (r & 0x3 | 0x8);
    return v.toString(16);
  });
}

/**
 * SHA-256 hex digest of the given parts joined with '|'
 */
export function contentHash(...parts: string[]): string {
  return crypto.createHash('sha256').update(parts.join('|')).digest('hex');
}
