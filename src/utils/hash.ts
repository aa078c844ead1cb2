import { createHash, randomUUID } from 'node:crypto';

export function generateId(): string {
  return randomUUID();
}

/**
 * Hex SHA-256 of the given text, optionally truncated to `length` characters.
 */
export function hashContent(text: string, length?: number): string {
  const digest = createHash('sha256').update(text, 'utf8').digest('hex');
  return length === undefined ? digest : digest.slice(0, length);
}
