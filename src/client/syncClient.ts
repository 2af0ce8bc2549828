/**
 * Verbatim Sync - API Client
 *
 * Sends batches of comments to the analytics API. Every call performs
 * exactly one request: there is no retry, no timeout and no local queue.
 *
 * Features:
 * - `sync` posts a batch to `/api/voc/datasets/{owner}/{dataset}/sync`
 * - `mostRecent` looks up the newest comment of a source
 * - Non-2xx answers and broken transports become typed `RequestFailedError`s
 *
 * @version 1.0.0
 */

import type { Comment, MostRecentComment } from '../types/comment';
import {
  BackendError,
  ConnectionError,
  EmptyDatasetError,
  InvalidBatchError,
  NoSuchDatasetError,
  RateLimitedError,
  RequestFailedError,
  errorMessage,
} from '../utils/errors';
import { logger as rootLogger, type LoggerLike } from '../utils/logger';
import {
  ErrorBodySchema,
  RecentResponseSchema,
  tryParseJson,
} from '../utils/validation';
import {
  DEFAULT_BASE_URL,
  buildRecentRequest,
  buildSyncRequest,
  parseTimestamp,
  type PreparedRequest,
} from './serialize';

// =============================================================================
// TYPES
// =============================================================================

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface SyncClientConfig {
  /** Sent as `X-Auth-Token` on every request */
  authToken: string;

  /** Defaults to https://reinfer.io */
  baseUrl?: string;

  /** Defaults to the global fetch */
  fetch?: FetchFn;

  logger?: LoggerLike;
}

export interface SyncOptions {
  /** Tags every comment with `string:Source` */
  source?: string;
}

export interface SyncResult {
  status: number;
  body: unknown;
}

/**
 * Operations the polling integration needs from a client.
 */
export interface SyncApi {
  sync(owner: string, dataset: string, comments: readonly Comment[], options?: SyncOptions): Promise<SyncResult>;
  mostRecent(owner: string, dataset: string, source: string): Promise<MostRecentComment>;
}

const NO_DESCRIPTION = '(no description available)';

// =============================================================================
// CLIENT
// =============================================================================

export class VerbatimSyncClient implements SyncApi {
  private readonly authToken: string;
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly logger: LoggerLike;

  constructor(config: SyncClientConfig) {
    this.authToken = config.authToken;
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, '');
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
    this.logger = (config.logger ?? rootLogger).child({ component: 'sync-client' });
  }

  /**
   * Synchronise a batch of comments into `owner/dataset`.
   *
   * The operation is idempotent on the remote side: comments whose id was
   * used before are overwritten.
   *
   * @throws ValidationError if the batch is empty or malformed (no request is sent)
   * @throws RequestFailedError (or a subclass) for transport failures and non-2xx answers
   */
  async sync(
    owner: string,
    dataset: string,
    comments: readonly Comment[],
    options: SyncOptions = {}
  ): Promise<SyncResult> {
    const request = buildSyncRequest(owner, dataset, this.authToken, comments, {
      baseUrl: this.baseUrl,
      source: options.source,
    });

    this.logger.debug('Syncing comments', { owner, dataset, count: comments.length });
    const result = await this.execute(request);
    this.logger.debug('Synced comments', { owner, dataset, status: result.status });
    return result;
  }

  /**
   * Id and timestamp of the comment with the highest timestamp in a source.
   *
   * @throws EmptyDatasetError if the source holds no comments
   */
  async mostRecent(owner: string, dataset: string, source: string): Promise<MostRecentComment> {
    const request = buildRecentRequest(owner, dataset, this.authToken, source, {
      baseUrl: this.baseUrl,
    });
    const { status, body } = await this.execute(request);

    const parsed = RecentResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new BackendError('Malformed response from /recent', status, JSON.stringify(body));
    }

    const [newest] = parsed.data.comments;
    if (!newest) {
      throw new EmptyDatasetError(`${owner}/${dataset}`);
    }

    return { id: newest.id, timestamp: parseTimestamp(newest.timestamp) };
  }

  // ===========================================================================
  // TRANSPORT
  // ===========================================================================

  private async execute(request: PreparedRequest): Promise<SyncResult> {
    let response: Response;
    try {
      response = await this.fetchFn(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
      });
    } catch (error) {
      throw new ConnectionError(
        `Request to ${request.url} failed: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new ConnectionError(
        `Reading the response from ${request.url} failed: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined,
        response.status
      );
    }

    if (response.ok) {
      if (text.trim() === '') {
        return { status: response.status, body: {} };
      }
      // Non-JSON 2xx bodies are handed back as text.
      const body = tryParseJson(text);
      return { status: response.status, body: body === undefined ? text : body };
    }

    throw toRequestFailed(response.status, text);
  }
}

// =============================================================================
// ERROR MAPPING
// =============================================================================

/**
 * Map a non-2xx answer to the matching error type.
 */
export function toRequestFailed(status: number, body: string): RequestFailedError {
  const parsed = ErrorBodySchema.safeParse(tryParseJson(body));
  const message = parsed.success && parsed.data.message ? parsed.data.message : NO_DESCRIPTION;

  switch (status) {
    case 400:
      return new InvalidBatchError(message, body);
    case 404:
      return new NoSuchDatasetError(message, body);
    case 429:
      return new RateLimitedError(message, body);
    case 401:
    case 403:
      return new RequestFailedError(message, status, body);
    default:
      return new BackendError(message, status, body);
  }
}

// =============================================================================
// FUNCTIONAL FORM
// =============================================================================

/**
 * One-shot sync with an explicit token.
 *
 * @example
 * ```typescript
 * await sync('acme', 'support', process.env.VERBATIM_AUTH_TOKEN ?? '', [comment]);
 * ```
 */
export function sync(
  owner: string,
  dataset: string,
  token: string,
  comments: readonly Comment[],
  config: Omit<SyncClientConfig, 'authToken'> = {}
): Promise<SyncResult> {
  return new VerbatimSyncClient({ ...config, authToken: token }).sync(owner, dataset, comments);
}
