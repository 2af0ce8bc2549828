/**
 * Fake data source for the sample integration.
 *
 * Simulates a source with its own record type (`RawVerbatim`) and a
 * paginated "newer than" query, the way a helpdesk or survey API would.
 */

// =============================================================================
// TYPES
// =============================================================================

export interface RawVerbatim {
  rawId: string;
  text: string;
  nps: number;
  timestamp: Date;
  username: string;
}

/**
 * What the integration needs from a data source.
 */
export interface DataSource {
  newerThan(timestamp: Date, pageSize?: number, pageIndex?: number): RawVerbatim[];
}

export const DEFAULT_PAGE_SIZE = 40;

const RECORDS_PER_SENTIMENT = 100;

// =============================================================================
// FAKE SOURCE
// =============================================================================

export class FakeDataSource implements DataSource {
  private readonly raw: RawVerbatim[];

  constructor(now: Date = new Date()) {
    const positive = Array.from({ length: RECORDS_PER_SENTIMENT }, (_, i) =>
      makeRaw(i, `Yay, I love this company ${i}!`, now)
    );
    const negative = Array.from({ length: RECORDS_PER_SENTIMENT }, (_, i) =>
      makeRaw(i, `Boo, I hate this company ${i}!`, now)
    );
    this.raw = [...positive, ...negative];
  }

  get size(): number {
    return this.raw.length;
  }

  /**
   * Paginate, in stored order, through verbatims stamped at or after `timestamp`.
   */
  newerThan(timestamp: Date, pageSize: number = DEFAULT_PAGE_SIZE, pageIndex: number = 0): RawVerbatim[] {
    let skip = pageIndex * pageSize;
    const page: RawVerbatim[] = [];

    for (const raw of this.raw) {
      if (raw.timestamp.getTime() < timestamp.getTime()) continue;
      if (skip > 0) {
        skip--;
        continue;
      }
      page.push(raw);
      if (page.length === pageSize) break;
    }

    return page;
  }
}

function makeRaw(index: number, text: string, timestamp: Date): RawVerbatim {
  return {
    rawId: `this is an id ${index}`,
    text,
    nps: index % 11,
    timestamp,
    username: `user${index}`,
  };
}
