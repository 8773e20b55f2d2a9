import type { Resource, TextResourceContents } from '@modelcontextprotocol/sdk/types.js';
import type { Storage } from '../storage/index.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { isValidId } from '../utils/id.js';
import { STATUS_LABELS } from '../engines/explainability.js';
import { logger } from '../utils/logger.js';

const PROTOCOL = 'reqclarity:';
const URI_FORMAT = 'reqclarity://analyses/{id}';

/** Resources listed at most; older analyses stay readable by URI */
export const MAX_LISTED_RESOURCES = 100;

export function analysisUri(id: string): string {
  return `reqclarity://analyses/${id}`;
}

/**
 * Register the recorded analyses as MCP resources, newest first.
 *
 * A storage failure yields an empty list rather than failing the listing.
 *
 * @example
 * ```typescript
 * const storage = new Storage(':memory:');
 * const resources = registerResources(storage);
 * // Returns: [
 * //   { uri: 'reqclarity://analyses/analysis-m5x8z7k-A3bC9dE2fG1h', name: 'The UI should be user-friendly.', ... }
 * // ]
 * ```
 */
export function registerResources(storage: Storage): Resource[] {
  try {
    return storage.listRecent(MAX_LISTED_RESOURCES).map((record) => ({
      uri: analysisUri(record.id),
      name: record.text.length > 60 ? `${record.text.slice(0, 57)}...` : record.text || '(empty requirement)',
      description: `Clarity analysis: ${STATUS_LABELS[record.status]}, severity ${record.severity}`,
      mimeType: 'application/json',
    }));
  } catch (error) {
    logger.error('Failed to list analyses', error);
    return [];
  }
}

/**
 * Read a resource by URI and return its contents.
 *
 * URI parsing is strict:
 * - Protocol must be exactly "reqclarity:"
 * - Path must contain exactly 2 segments, "analyses" and the id
 * - Trailing slashes are normalized
 *
 * @throws {ValidationError} If the URI is malformed
 * @throws {NotFoundError} If no analysis has that id
 */
export function handleResourceRead(uri: string, storage: Storage): { contents: TextResourceContents[] } {
  let url: URL;
  try {
    url = new URL(uri);
  } catch {
    throw new ValidationError(`Invalid URI format: ${uri}. Expected format: ${URI_FORMAT}`);
  }

  if (url.protocol !== PROTOCOL) {
    throw new ValidationError(`Invalid protocol: ${url.protocol}. Expected "${PROTOCOL}". URI: ${uri}`);
  }

  // "reqclarity://analyses/x" puts "analyses" in the host and "/x" in the path
  const segments = [url.host, ...url.pathname.split('/')].filter((segment) => segment.length > 0);
  const [type, id, ...rest] = segments;

  if (type !== 'analyses') {
    throw new ValidationError(`Unknown resource type: ${type ?? '(none)'}. Expected format: ${URI_FORMAT}`);
  }
  if (id === undefined) {
    throw new ValidationError(`Invalid URI: missing analysis ID. Expected format: ${URI_FORMAT}. URI: ${uri}`);
  }
  if (rest.length > 0) {
    throw new ValidationError(`Invalid URI: too many path segments. Expected format: ${URI_FORMAT}. URI: ${uri}`);
  }
  if (!isValidId(id, 'analysis')) {
    throw new ValidationError(`Invalid analysis ID: ${id}`);
  }

  const record = storage.getAnalysis(id);
  if (!record) {
    throw new NotFoundError('Analysis', id, { uri });
  }

  return {
    contents: [
      {
        uri,
        mimeType: 'application/json',
        text: JSON.stringify(record, null, 2),
      },
    ],
  };
}
