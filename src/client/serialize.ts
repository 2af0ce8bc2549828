/**
 * Verbatim Sync - Record Batch Builder
 *
 * Turns comments into the exact request the analytics API expects.
 * Nothing here performs I/O.
 *
 * @version 1.0.0
 */

import type {
  Comment,
  RecentRequestBody,
  SyncRequestBody,
  UserProperties,
  UserProperty,
} from '../types/comment';
import { RESERVED_PROPERTY_NAMES } from '../types/comment';
import { ValidationError } from '../utils/errors';
import { CommentSchema, TIMESTAMP_PATTERN, validate } from '../utils/validation';

// =============================================================================
// CONSTANTS
// =============================================================================

export const DEFAULT_BASE_URL = 'https://reinfer.io';

export const SOURCE_PROPERTY_KEY = 'string:Source';

// =============================================================================
// TYPES
// =============================================================================

export interface PreparedRequest {
  url: string;
  method: 'POST';
  headers: Record<string, string>;
  body: string;
}

// =============================================================================
// TIMESTAMPS
// =============================================================================

/**
 * Format a date as `YYYY-MM-DDTHH:MM:SS.ffffff+00:00`.
 * Dates only carry milliseconds, so the last three digits are always zero.
 */
export function formatTimestamp(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError('Cannot format an invalid date', { field: 'timestamp' });
  }
  // toISOString always yields UTC with millisecond precision
  const iso = date.toISOString();
  return `${iso.slice(0, 19)}.${iso.slice(20, 23)}000+00:00`;
}

/**
 * Parse an ISO-8601 timestamp with any number of fractional digits.
 * Precision beyond milliseconds is dropped.
 */
export function parseTimestamp(text: string): Date {
  const match = TIMESTAMP_PATTERN.exec(text);
  if (!match) {
    throw new ValidationError(`Invalid timestamp \`${text}\``, { field: 'timestamp' });
  }

  const [, year, month, day, hour, minute, second, fraction = '', offset] = match;
  const millis = fraction.padEnd(3, '0').slice(0, 3);
  const date = new Date(`${year}-${month}-${day}T${hour}:${minute}:${second}.${millis}${offset}`);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`Invalid timestamp \`${text}\``, { field: 'timestamp' });
  }
  return date;
}

// =============================================================================
// USER PROPERTIES
// =============================================================================

export function stringProperty(name: string, value: string): UserProperty {
  return { kind: 'string', name, value };
}

export function numberProperty(name: string, value: number): UserProperty {
  return { kind: 'number', name, value };
}

/**
 * Convert typed properties into the namespaced wire mapping.
 *
 * @throws ValidationError for reserved names or non-finite numbers
 */
export function userProperties(properties: UserProperty[]): UserProperties {
  const result: UserProperties = {};

  for (const property of properties) {
    if (RESERVED_PROPERTY_NAMES.includes(property.name)) {
      throw new ValidationError(`Reserved user property name ${property.name}`, {
        field: property.name,
      });
    }

    if (property.kind === 'string') {
      result[`string:${property.name}`] = property.value;
    } else {
      if (!Number.isFinite(property.value)) {
        throw new ValidationError(`Invalid user property ${property.name}`, {
          field: property.name,
        });
      }
      result[`number:${property.name}`] = property.value;
    }
  }

  return result;
}

// =============================================================================
// COMMENTS
// =============================================================================

/**
 * Lay out a comment in wire order, dropping an absent `user_properties`.
 */
export function commentToJson(comment: Comment, source?: string): Comment {
  const json: Comment = {
    original_text: comment.original_text,
    timestamp: comment.timestamp,
    id: comment.id,
  };

  if (source !== undefined) {
    json.user_properties = { ...comment.user_properties, [SOURCE_PROPERTY_KEY]: source };
  } else if (comment.user_properties !== undefined) {
    json.user_properties = { ...comment.user_properties };
  }

  return json;
}

/**
 * Validate a batch before it is sent. Empty batches are rejected.
 */
export function validateComments(comments: readonly Comment[]): void {
  if (comments.length === 0) {
    throw new ValidationError('Cannot sync an empty batch of comments', { field: 'comments' });
  }
  comments.forEach((comment, index) => {
    validate(CommentSchema, comment, `comments.${index}`);
  });
}

// =============================================================================
// REQUESTS
// =============================================================================

export function datasetUrl(
  baseUrl: string,
  owner: string,
  dataset: string,
  action: 'sync' | 'recent'
): string {
  const root = baseUrl.replace(/\/$/, '');
  return `${root}/api/voc/datasets/${encodeURIComponent(owner)}/${encodeURIComponent(dataset)}/${action}`;
}

export function authHeaders(token: string): Record<string, string> {
  return {
    'X-Auth-Token': token,
    'Content-Type': 'application/json',
  };
}

/**
 * Build the sync request for a batch.
 *
 * @example
 * ```typescript
 * const request = buildSyncRequest('acme', 'support', token, comments);
 * // request.url === 'https://reinfer.io/api/voc/datasets/acme/support/sync'
 * ```
 */
export function buildSyncRequest(
  owner: string,
  dataset: string,
  token: string,
  comments: readonly Comment[],
  options: { baseUrl?: string; source?: string } = {}
): PreparedRequest {
  validateComments(comments);

  const body: SyncRequestBody = {
    comments: comments.map((comment) => commentToJson(comment, options.source)),
  };

  return {
    url: datasetUrl(options.baseUrl ?? DEFAULT_BASE_URL, owner, dataset, 'sync'),
    method: 'POST',
    headers: authHeaders(token),
    body: JSON.stringify(body),
  };
}

/**
 * Build the request asking for the newest comment of a source.
 */
export function buildRecentRequest(
  owner: string,
  dataset: string,
  token: string,
  source: string,
  options: { baseUrl?: string } = {}
): PreparedRequest {
  const body: RecentRequestBody = {
    limit: 1,
    filter: {
      user_properties: {
        [SOURCE_PROPERTY_KEY]: { one_of: [source] },
      },
    },
  };

  return {
    url: datasetUrl(options.baseUrl ?? DEFAULT_BASE_URL, owner, dataset, 'recent'),
    method: 'POST',
    headers: authHeaders(token),
    body: JSON.stringify(body),
  };
}

/**
 * Split `owner/name` into its parts.
 */
export function parseDatasetName(fullName: string): { owner: string; dataset: string } {
  const parts = fullName.split('/');
  const [owner, dataset] = parts;
  if (parts.length !== 2 || !owner || !dataset) {
    throw new ValidationError(`Dataset name must look like \`owner/name\`, got \`${fullName}\``, {
      field: 'dataset',
    });
  }
  return { owner, dataset };
}
