export type {
  DatasetOutcome,
  Notice,
  SessionEvent,
  SessionListener,
  SessionOptions,
  Snapshot,
} from './controller.js';
export { createSession, DEFAULT_SESSION_CONFIG, RocSession } from './controller.js';
export type { DatasetFetcher, FetchLike } from './fetcher.js';
export { HttpDatasetFetcher } from './fetcher.js';
export type { ParameterName, SessionParameters } from './parameters.js';
export {
  isParameterName,
  MAX_SAMPLE_SIZE,
  MIN_SAMPLE_SIZE,
  parameterSchemas,
  SAMPLE_PARAMETERS,
} from './parameters.js';
