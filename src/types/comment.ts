/**
 * Verbatim Sync - Comment Types
 *
 * Wire shapes for verbatims sent to the analytics API, plus the typed
 * user property helpers used to build them.
 *
 * @version 1.0.0
 */

// =============================================================================
// USER PROPERTIES
// =============================================================================

/**
 * Namespaced user property key, e.g. `string:Username` or `number:NPS`.
 */
export type UserPropertyKey = `string:${string}` | `number:${string}`;

/**
 * User properties as sent on the wire.
 * String keys carry string values, number keys carry finite numbers.
 */
export type UserProperties = Record<UserPropertyKey, string | number>;

export interface StringProperty {
  kind: 'string';
  name: string;
  value: string;
}

export interface NumberProperty {
  kind: 'number';
  name: string;
  value: number;
}

export type UserProperty = StringProperty | NumberProperty;

/**
 * Property names the platform reserves for itself.
 */
export const RESERVED_PROPERTY_NAMES: readonly string[] = ['conversation', 'title', 'Source'];

// =============================================================================
// COMMENT
// =============================================================================

/**
 * A single verbatim.
 *
 * `id` is chosen by the caller and should map to an identifier in the data
 * source, so re-uploading the same comment overwrites it. `timestamp` is
 * ISO-8601 with microseconds and a UTC offset
 * (`2011-12-11T01:02:03.000000+00:00`).
 */
export interface Comment {
  original_text: string;
  timestamp: string;
  id: string;
  user_properties?: UserProperties;
}

/**
 * Body of `POST /api/voc/datasets/{owner}/{dataset}/sync`.
 */
export interface SyncRequestBody {
  comments: Comment[];
}

/**
 * Body of `POST /api/voc/datasets/{owner}/{dataset}/recent`.
 */
export interface RecentRequestBody {
  limit: number;
  filter: {
    user_properties: Record<UserPropertyKey, { one_of: string[] }>;
  };
}

/**
 * Newest comment of a source, by timestamp rather than upload time.
 */
export interface MostRecentComment {
  id: string;
  timestamp: Date;
}
