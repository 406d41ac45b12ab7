import { createHash } from 'crypto';

/**
 * Generate a SHA-256 hash of a string
 */
export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

/**
 * Generate a short hash (8 characters) for deduplication
 */
export function shortHash(input: string): string {
  return sha256(input).substring(0, 8);
}

/**
 * Stable bucket in [0, modulo) derived from the text's SHA-256
 */
export function hashBucket(input: string, modulo: number = 10000): number {
  return parseInt(shortHash(input), 16) % modulo;
}
