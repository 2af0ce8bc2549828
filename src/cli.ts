/**
 * Verbatim Sync - Command Line
 *
 * Runs the sample online integration against the fake data source.
 *
 * Usage:
 *   tsx src/main.ts --auth-token TOKEN --source-name NAME --dataset-name OWNER/NAME
 *
 * Every flag falls back to an environment variable (see `loadWorkerConfig`);
 * a `.env` file in the working directory is loaded first.
 */

import { config as loadDotenv } from 'dotenv';
import { VerbatimSyncClient } from './client/syncClient';
import { FakeDataSource } from './integration/fakeSource';
import { OnlineIntegration } from './integration/online';
import { ValidationError, errorMessage } from './utils/errors';
import { logger } from './utils/logger';
import { getLoggableConfig, loadWorkerConfig, type WorkerConfig } from './worker/config';
import { SyncPoller } from './worker/poller';

// =============================================================================
// TYPES
// =============================================================================

export interface CommandLineArgs {
  help: boolean;
  overrides: Partial<WorkerConfig>;
}

// =============================================================================
// ARGUMENT PARSING
// =============================================================================

/**
 * Parses command line arguments.
 *
 * @throws ValidationError on unknown flags or missing values
 */
export function parseArgs(args: string[]): CommandLineArgs {
  const result: CommandLineArgs = { help: false, overrides: {} };

  const valueOf = (index: number, flag: string): string => {
    const value = args[index];
    if (value === undefined || value.startsWith('--')) {
      throw new ValidationError(`${flag} requires a value`, { field: flag });
    }
    return value;
  };

  const intValueOf = (index: number, flag: string): number => {
    const value = Number(valueOf(index, flag));
    if (!Number.isInteger(value) || value < 0) {
      throw new ValidationError(`${flag} must be a non-negative integer`, { field: flag });
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--auth-token':
        result.overrides.authToken = valueOf(++i, arg);
        break;

      case '--source-name':
        result.overrides.sourceName = valueOf(++i, arg);
        break;

      case '--dataset-name':
        result.overrides.datasetName = valueOf(++i, arg);
        break;

      case '--base-url':
        result.overrides.baseUrl = valueOf(++i, arg);
        break;

      case '--poll-interval':
        result.overrides.pollIntervalMs = intValueOf(++i, arg);
        break;

      case '--max-failures':
        result.overrides.maxConsecutiveFailures = intValueOf(++i, arg);
        break;

      case '--help':
      case '-h':
        result.help = true;
        break;

      default:
        throw new ValidationError(`Unknown argument: ${arg}`, { field: String(arg) });
    }
  }

  return result;
}

export const HELP_TEXT = `
Sample on-line integration for the verbatim sync API.

Usage:
  tsx src/main.ts [options]

Options:
  --auth-token <token>        Token used to upload the comments (VERBATIM_AUTH_TOKEN)
  --source-name <name>        Source to store the comments under, e.g. Zendesk (VERBATIM_SOURCE_NAME)
  --dataset-name <owner/name> Dataset to store the comments in, e.g. company/chats (VERBATIM_DATASET)
  --base-url <url>            API root (VERBATIM_BASE_URL, default https://reinfer.io)
  --poll-interval <ms>        Delay between polls (VERBATIM_POLL_INTERVAL, default 1000)
  --max-failures <n>          Failed polls in a row before giving up (VERBATIM_MAX_FAILURES, default 5)
  --help, -h                  Show this help message

Environment:
  LOG_LEVEL                   debug, info, warn or error (default info)
  SERVICE_NAME                Service name written on every log line (default verbatim-sync)
`;

// =============================================================================
// MAIN
// =============================================================================

/**
 * Run the CLI. Resolves with the process exit code.
 */
export async function runCli(args: string[]): Promise<number> {
  loadDotenv();

  let config: WorkerConfig;
  try {
    const parsed = parseArgs(args);
    if (parsed.help) {
      console.log(HELP_TEXT);
      return 0;
    }
    config = loadWorkerConfig(parsed.overrides);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    console.log(HELP_TEXT);
    return 1;
  }

  // .env is only loaded now, after the logger was created
  logger.configure({ service: config.serviceName, level: config.logLevel });
  logger.info('Starting online integration', getLoggableConfig(config));

  const client = new VerbatimSyncClient({ authToken: config.authToken, baseUrl: config.baseUrl });
  const integration = new OnlineIntegration({
    dataSource: new FakeDataSource(),
    client,
    datasetName: config.datasetName,
    sourceName: config.sourceName,
  });
  const poller = new SyncPoller(integration, config);

  const handleSignal = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, done.`);
    poller.stop();
  };
  process.once('SIGINT', handleSignal);
  process.once('SIGTERM', handleSignal);

  try {
    await poller.start();
    return 0;
  } catch (error) {
    logger.error('Integration aborted', { error });
    return 1;
  } finally {
    process.off('SIGINT', handleSignal);
    process.off('SIGTERM', handleSignal);
  }
}
