/**
 * Verbatim Sync - Poller Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { SyncPoller, type Pollable } from '../poller';
import { ConnectionError, PollerAbortedError } from '../../utils/errors';
import { Logger, type LogLevel } from '../../utils/logger';

const silentLogger = new Logger({ service: 'test', sink: () => {} });
const config = { pollIntervalMs: 1000, maxConsecutiveFailures: 3 };

function createSleep() {
  return vi.fn(async (_ms: number) => {});
}

describe('SyncPoller', () => {
  it('should poll until stopped, sleeping between polls', async () => {
    const sleep = createSleep();
    let calls = 0;
    let poller: SyncPoller | undefined;
    const integration: Pollable = {
      poll: vi.fn(async () => {
        calls++;
        if (calls === 3) poller?.stop();
        return 40;
      }),
    };
    poller = new SyncPoller(integration, config, { sleep, logger: silentLogger });

    await poller.start();

    expect(integration.poll).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000);
    expect(poller.getStatus()).toMatchObject({
      state: 'stopped',
      pollCount: 3,
      commentsSynced: 120,
      consecutiveFailures: 0,
    });
  });

  it('should give up after too many consecutive failures', async () => {
    const sleep = createSleep();
    const integration: Pollable = {
      poll: vi.fn(async () => {
        throw new Error('boom');
      }),
    };
    const poller = new SyncPoller(integration, config, { sleep, logger: silentLogger });

    const error = await poller.start().then(
      () => undefined,
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(PollerAbortedError);
    expect(error).toMatchObject({ consecutiveFailures: 3 });
    expect(integration.poll).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(poller.getStatus().state).toBe('error');
  });

  it('should reset the failure count after a successful poll', async () => {
    const sleep = createSleep();
    let poller: SyncPoller | undefined;
    const poll = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new Error('boom'))
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValueOnce(5)
      .mockRejectedValueOnce(new Error('boom'))
      .mockRejectedValueOnce(new Error('boom'))
      .mockImplementationOnce(async () => {
        poller?.stop();
        return 0;
      });
    poller = new SyncPoller({ poll }, config, { sleep, logger: silentLogger });

    await poller.start();

    expect(poll).toHaveBeenCalledTimes(6);
    expect(poller.getStatus()).toMatchObject({
      state: 'stopped',
      pollCount: 6,
      commentsSynced: 5,
      consecutiveFailures: 0,
    });
  });

  it('should wake up from the default sleep when stopped', async () => {
    const poll = vi.fn(async () => 1);
    const poller = new SyncPoller({ poll }, { pollIntervalMs: 60_000, maxConsecutiveFailures: 3 }, {
      logger: silentLogger,
    });

    const running = poller.start();
    setTimeout(() => poller.stop(), 10);
    await running;

    expect(poll).toHaveBeenCalledTimes(1);
    expect(poller.getStatus().state).toBe('stopped');
  });

  it('should ignore a second start while running', async () => {
    const sleep = createSleep();
    let poller: SyncPoller | undefined;
    const poll = vi.fn(async () => {
      poller?.stop();
      return 0;
    });
    poller = new SyncPoller({ poll }, config, { sleep, logger: silentLogger });

    const first = poller.start();
    await poller.start();
    await first;

    expect(poll).toHaveBeenCalledTimes(1);
  });

  it('should run again after an abort, with the failure count reset', async () => {
    const sleep = createSleep();
    let poller: SyncPoller | undefined;
    const poll = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new Error('boom'))
      .mockRejectedValueOnce(new Error('boom'))
      .mockRejectedValueOnce(new Error('boom'))
      .mockImplementationOnce(async () => {
        poller?.stop();
        return 7;
      });
    poller = new SyncPoller({ poll }, config, { sleep, logger: silentLogger });

    await expect(poller.start()).rejects.toBeInstanceOf(PollerAbortedError);
    expect(poller.getStatus()).toMatchObject({ state: 'error', consecutiveFailures: 3 });

    await poller.start();

    expect(poll).toHaveBeenCalledTimes(4);
    expect(poller.getStatus()).toMatchObject({
      state: 'stopped',
      pollCount: 3,
      commentsSynced: 7,
      consecutiveFailures: 0,
    });
  });

  it('should log the failed poll with the error serialised', async () => {
    const lines: Array<{ level: LogLevel; line: string }> = [];
    const logger = new Logger({ service: 'test', sink: (level, line) => lines.push({ level, line }) });
    let poller: SyncPoller | undefined;
    const poll = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new ConnectionError('Request failed: fetch failed'))
      .mockImplementationOnce(async () => {
        poller?.stop();
        return 0;
      });
    poller = new SyncPoller({ poll }, config, { sleep: createSleep(), logger });

    await poller.start();

    const failures = lines
      .filter((entry) => entry.level === 'error')
      .map((entry) => JSON.parse(entry.line));
    expect(failures).toHaveLength(1);
    expect(failures[0]).toMatchObject({
      message: 'Exception in poll loop',
      service: 'test',
      context: {
        component: 'poller',
        consecutiveFailures: 1,
        error: {
          name: 'ConnectionError',
          message: 'Request failed: fetch failed',
          code: 'CONNECTION_ERROR',
        },
      },
    });
    expect(failures[0].context.error).not.toHaveProperty('status');
  });
});
