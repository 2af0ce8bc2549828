/**
 * Verbatim Sync - Poller
 *
 * Runs an integration's `poll()` on a fixed interval.
 *
 * Features:
 * - Configurable poll interval
 * - Failed polls are logged and counted; the loop gives up after
 *   `maxConsecutiveFailures` failures in a row
 * - `stop()` ends the loop after the current cycle
 * - An aborted poller can be started again
 *
 * @version 1.0.0
 */

import { PollerAbortedError } from '../utils/errors';
import { logger as rootLogger, type LoggerLike } from '../utils/logger';
import type { WorkerConfig } from './config';

// =============================================================================
// TYPES
// =============================================================================

export type PollerState = 'stopped' | 'running' | 'stopping' | 'error';

export interface PollerStatus {
  state: PollerState;
  startedAt: number | null;
  lastPollAt: number | null;
  pollCount: number;
  commentsSynced: number;
  consecutiveFailures: number;
}

/**
 * Anything with a `poll()` that resolves with the number of records synced.
 */
export interface Pollable {
  poll(): Promise<number>;
}

export interface PollerOptions {
  sleep?: (ms: number) => Promise<void>;
  logger?: LoggerLike;
}

// =============================================================================
// POLLER CLASS
// =============================================================================

export class SyncPoller {
  private state: PollerState = 'stopped';
  private startedAt: number | null = null;
  private lastPollAt: number | null = null;
  private pollCount = 0;
  private commentsSynced = 0;
  private consecutiveFailures = 0;

  private pollTimer: NodeJS.Timeout | null = null;
  private wakeUp: (() => void) | null = null;

  private readonly logger: LoggerLike;
  private readonly sleepFn: (ms: number) => Promise<void>;

  constructor(
    private readonly integration: Pollable,
    private readonly config: Pick<WorkerConfig, 'pollIntervalMs' | 'maxConsecutiveFailures'>,
    options: PollerOptions = {},
  ) {
    this.logger = (options.logger ?? rootLogger).child({ component: 'poller' });
    this.sleepFn = options.sleep ?? ((ms) => this.sleep(ms));
  }

  // ===========================================================================
  // LIFECYCLE METHODS
  // ===========================================================================

  /**
   * Run the poll loop until `stop()` is called. A poller that aborted can
   * be started again; its failure count starts over.
   *
   * @throws PollerAbortedError after too many consecutive failures
   */
  async start(): Promise<void> {
    if (this.state === 'running' || this.state === 'stopping') {
      this.logger.warn('Poller already running', { state: this.state });
      return;
    }

    if (this.state === 'error') {
      this.logger.info('Restarting poller after abort', {
        consecutiveFailures: this.consecutiveFailures,
      });
      this.consecutiveFailures = 0;
    }

    this.state = 'running';
    this.startedAt = Date.now();
    this.logger.info('Starting poller', { pollIntervalMs: this.config.pollIntervalMs });

    try {
      await this.pollLoop();
    } finally {
      if (this.currentState() !== 'error') {
        this.state = 'stopped';
      }
      this.logger.info('Poller stopped', { pollCount: this.pollCount });
    }
  }

  /**
   * Ask the loop to finish after the current cycle.
   */
  stop(): void {
    if (this.state !== 'running') {
      return;
    }

    this.logger.info('Stopping poller');
    this.state = 'stopping';

    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }
    this.wakeUp?.();
  }

  // ===========================================================================
  // POLLING LOOP
  // ===========================================================================

  private async pollLoop(): Promise<void> {
    while (this.state === 'running') {
      try {
        const synced = await this.integration.poll();
        this.commentsSynced += synced;
        this.consecutiveFailures = 0;
      } catch (error) {
        this.consecutiveFailures++;
        this.logger.error('Exception in poll loop', {
          error,
          consecutiveFailures: this.consecutiveFailures,
        });

        if (this.consecutiveFailures >= this.config.maxConsecutiveFailures) {
          this.state = 'error';
          this.logger.error('Too many consecutive failures, quitting', {
            consecutiveFailures: this.consecutiveFailures,
          });
          throw new PollerAbortedError(this.consecutiveFailures, error);
        }
      }

      this.lastPollAt = Date.now();
      this.pollCount++;

      if (this.currentState() === 'running') {
        await this.sleepFn(this.config.pollIntervalMs);
      }
    }
  }

  // ===========================================================================
  // STATUS
  // ===========================================================================

  getStatus(): PollerStatus {
    return {
      state: this.state,
      startedAt: this.startedAt,
      lastPollAt: this.lastPollAt,
      pollCount: this.pollCount,
      commentsSynced: this.commentsSynced,
      consecutiveFailures: this.consecutiveFailures,
    };
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  // Read through a method: `stop()` may change the state while a poll is awaited
  private currentState(): PollerState {
    return this.state;
  }

  /**
   * Sleep for a given duration, cut short by `stop()`.
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wakeUp = () => {
        this.wakeUp = null;
        resolve();
      };
      this.pollTimer = setTimeout(() => {
        this.pollTimer = null;
        this.wakeUp?.();
      }, ms);
    });
  }
}
