/**
 * Verbatim Sync - Online Integration
 *
 * A sample polling integration: each poll reads the next page of new
 * verbatims from a data source and syncs it.
 *
 * Cursor rules:
 * - The starting point is the newest comment already stored for the source
 *   (or the Unix epoch when the source is empty)
 * - Reads never start later than `now - settleDelayMs`, since comments close
 *   to the present may still arrive out of order
 * - When a page ends on the current cursor timestamp the next poll reads the
 *   following page, otherwise the cursor moves and paging restarts
 *
 * @version 1.0.0
 */

import { v4 as uuidv4 } from 'uuid';
import type { SyncApi } from '../client/syncClient';
import { formatTimestamp, numberProperty, parseDatasetName, stringProperty, userProperties } from '../client/serialize';
import type { Comment } from '../types/comment';
import { EmptyDatasetError } from '../utils/errors';
import { logger as rootLogger, type LoggerLike } from '../utils/logger';
import { DEFAULT_PAGE_SIZE, type DataSource, type RawVerbatim } from './fakeSource';

// =============================================================================
// TYPES
// =============================================================================

export interface OnlineIntegrationOptions {
  dataSource: DataSource;
  client: SyncApi;

  /** `owner/name` */
  datasetName: string;

  /** Stored on every comment as `string:Source`, e.g. `Zendesk` */
  sourceName: string;

  pageSize?: number;
  settleDelayMs?: number;
  now?: () => Date;
  logger?: LoggerLike;
}

export const DEFAULT_SETTLE_DELAY_MS = 10_000;

const EPOCH = new Date(0);

// =============================================================================
// CONVERSION
// =============================================================================

/**
 * Convert a source record to a comment. The raw id is hex-encoded so any
 * source identifier becomes a valid comment id.
 */
export function rawToComment(raw: RawVerbatim): Comment {
  return {
    original_text: raw.text,
    timestamp: formatTimestamp(raw.timestamp),
    id: Buffer.from(raw.rawId, 'utf8').toString('hex'),
    user_properties: userProperties([
      numberProperty('NPS', raw.nps),
      stringProperty('Username', raw.username),
    ]),
  };
}

// =============================================================================
// INTEGRATION
// =============================================================================

export class OnlineIntegration {
  private readonly owner: string;
  private readonly dataset: string;
  private readonly pageSize: number;
  private readonly settleDelayMs: number;
  private readonly now: () => Date;
  private readonly logger: LoggerLike;

  private mostRecentTimestamp: Date | null = null;
  private pageIndex = 0;

  constructor(private readonly options: OnlineIntegrationOptions) {
    const { owner, dataset } = parseDatasetName(options.datasetName);
    this.owner = owner;
    this.dataset = dataset;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.settleDelayMs = options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;
    this.now = options.now ?? (() => new Date());
    this.logger = (options.logger ?? rootLogger).child({
      component: 'online-integration',
      integrationId: uuidv4(),
      dataset: options.datasetName,
      source: options.sourceName,
    });
  }

  /**
   * Perform one poll. Resolves with the number of comments synced.
   */
  async poll(): Promise<number> {
    const mostRecent = await this.resolveMostRecent();
    const limit = this.timestampLimit(mostRecent);

    this.logger.info('Syncing comments', {
      newerThan: formatTimestamp(limit),
      page: this.pageIndex,
    });

    const raws = this.options.dataSource.newerThan(limit, this.pageSize, this.pageIndex);
    const last = raws[raws.length - 1];
    if (!last) {
      this.logger.info('No comments left to sync');
      return 0;
    }

    const comments = raws.map(rawToComment);
    await this.options.client.sync(this.owner, this.dataset, comments, {
      source: this.options.sourceName,
    });

    if (mostRecent.getTime() !== last.timestamp.getTime()) {
      this.mostRecentTimestamp = last.timestamp;
      this.pageIndex = 0;
    } else {
      this.pageIndex++;
    }

    this.logger.info('Synced comments', {
      count: comments.length,
      mostRecent: formatTimestamp(last.timestamp),
    });
    return comments.length;
  }

  getCursor(): { mostRecent: Date | null; pageIndex: number } {
    return { mostRecent: this.mostRecentTimestamp, pageIndex: this.pageIndex };
  }

  private async resolveMostRecent(): Promise<Date> {
    if (this.mostRecentTimestamp) {
      return this.mostRecentTimestamp;
    }

    try {
      const { timestamp } = await this.options.client.mostRecent(
        this.owner,
        this.dataset,
        this.options.sourceName
      );
      this.mostRecentTimestamp = timestamp;
    } catch (error) {
      if (!(error instanceof EmptyDatasetError)) {
        throw error;
      }
      this.logger.debug('Source is empty, starting from the epoch');
      this.mostRecentTimestamp = EPOCH;
    }

    return this.mostRecentTimestamp;
  }

  private timestampLimit(mostRecent: Date): Date {
    const settled = this.now().getTime() - this.settleDelayMs;
    return mostRecent.getTime() <= settled ? mostRecent : new Date(settled);
  }
}
