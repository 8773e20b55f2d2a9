import { randomBytes } from 'node:crypto';

const MAX_PREFIX_LENGTH = 50;

/**
 * Only alphanumerics and hyphens, so ids are safe in resource URIs.
 */
const SAFE_PREFIX_PATTERN = /^[a-z0-9-]+$/i;

/**
 * Generate a unique ID with a prefix.
 *
 * Format: `{prefix}-{timestamp}-{random}` where timestamp is base36
 * milliseconds since epoch and random is 12 base64url characters.
 *
 * @example
 * generateId('analysis') // => 'analysis-m5x8z7k-A3bC9dE2fG1h'
 */
export function generateId(prefix: string): string {
  if (!prefix) {
    throw new Error('Prefix must be a non-empty string');
  }

  if (prefix.length > MAX_PREFIX_LENGTH) {
    throw new Error(`Prefix must be ${MAX_PREFIX_LENGTH} characters or less`);
  }

  if (!SAFE_PREFIX_PATTERN.test(prefix)) {
    throw new Error('Prefix must contain only alphanumeric characters and hyphens');
  }

  const timestamp = Date.now().toString(36);
  const random = randomBytes(9).toString('base64url').slice(0, 12);

  return `${prefix}-${timestamp}-${random}`;
}

/**
 * Check that a string looks like an ID from {@link generateId}, optionally
 * with the given prefix. Used before storage lookups of resource URIs.
 */
export function isValidId(id: string, expectedPrefix?: string): boolean {
  // The random part is base64url and may itself contain hyphens
  const match = /^([a-z0-9-]+)-([a-z0-9]+)-([A-Za-z0-9_-]{12})$/i.exec(id);
  if (!match) {
    return false;
  }

  return expectedPrefix === undefined || match[1] === expectedPrefix;
}
