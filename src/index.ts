/**
 * Verbatim Sync
 *
 * Client for the verbatim sync API plus a sample polling integration.
 */

export type {
  Comment,
  MostRecentComment,
  NumberProperty,
  StringProperty,
  UserProperties,
  UserProperty,
  UserPropertyKey,
} from './types/comment';

export {
  DEFAULT_BASE_URL,
  buildRecentRequest,
  buildSyncRequest,
  commentToJson,
  formatTimestamp,
  numberProperty,
  parseDatasetName,
  parseTimestamp,
  stringProperty,
  userProperties,
  validateComments,
} from './client/serialize';
export type { PreparedRequest } from './client/serialize';

export { VerbatimSyncClient, sync, toRequestFailed } from './client/syncClient';
export type { FetchFn, SyncApi, SyncClientConfig, SyncOptions, SyncResult } from './client/syncClient';

export { FakeDataSource } from './integration/fakeSource';
export type { DataSource, RawVerbatim } from './integration/fakeSource';
export { OnlineIntegration, rawToComment } from './integration/online';
export type { OnlineIntegrationOptions } from './integration/online';

export { SyncPoller } from './worker/poller';
export type { PollerStatus, Pollable } from './worker/poller';
export { loadWorkerConfig, getLoggableConfig } from './worker/config';
export type { WorkerConfig } from './worker/config';

export {
  BackendError,
  ConnectionError,
  EmptyDatasetError,
  InvalidBatchError,
  NoSuchDatasetError,
  PollerAbortedError,
  RateLimitedError,
  RequestFailedError,
  SyncError,
  ValidationError,
} from './utils/errors';
export { Logger, logger, consoleSink, serializeError } from './utils/logger';
export type { LogContext, LogLevel, LoggerLike, LoggerOptions, LogSink } from './utils/logger';
