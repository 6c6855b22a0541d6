/**
 * roc-explorer: the reactive core of an interactive ROC curve explorer.
 *
 * @example
 * ```ts
 * import { attachConsoleRenderer, createSession, HttpDatasetFetcher } from 'roc-explorer';
 *
 * const session = await createSession({ seed: 7, fetcher: new HttpDatasetFetcher() });
 * attachConsoleRenderer(session);
 *
 * session.setParameter('thresholdFraction', 0.25);
 * session.setParameter('aucTarget', 0.85);
 * ```
 */

// Errors
export {
  FetchFailedError,
  InsufficientDataError,
  InvalidParameterError,
  RocExplorerError,
} from './errors.js';
// Reporting
export type { RendererOptions } from './reporting/index.js';
export {
  attachConsoleRenderer,
  renderConfusionTable,
  renderCount,
  renderNumber,
  renderRate,
  renderSnapshot,
} from './reporting/index.js';
// ROC engine
export {
  areaUnderCurve,
  buildCurve,
  classificationMetrics,
  confusionMatrix,
  confusionMatrixFromCounts,
  operatingPoint,
} from './roc/index.js';
// Sampling
export type { RandomSource, ScoreSamplerOptions } from './sampling/index.js';
export {
  createSeededRandom,
  DEFAULT_CACHE_SIZE,
  sampleNormal,
  ScoreSampler,
} from './sampling/index.js';
// Serialization
export type {
  ExternalCurveRaw,
  LoadOptions,
  SessionConfig,
  SessionConfigRaw,
} from './serialization/index.js';
export {
  externalCurveSchema,
  loadConfigFromFile,
  loadConfigFromObject,
  loadConfigFromText,
  parseExternalCurve,
  saveConfigToFile,
  sessionConfigSchema,
} from './serialization/index.js';
// Session
export type {
  DatasetFetcher,
  DatasetOutcome,
  FetchLike,
  Notice,
  ParameterName,
  SessionEvent,
  SessionListener,
  SessionOptions,
  SessionParameters,
  Snapshot,
} from './session/index.js';
export {
  createSession,
  DEFAULT_SESSION_CONFIG,
  HttpDatasetFetcher,
  isParameterName,
  MAX_SAMPLE_SIZE,
  MIN_SAMPLE_SIZE,
  parameterSchemas,
  RocSession,
  SAMPLE_PARAMETERS,
} from './session/index.js';
// Core types
export type {
  ClassCounts,
  ClassificationMetrics,
  ConfusionMatrix,
  ExternalCurve,
  Label,
  LabeledScore,
  RocPoint,
  ScoreSample,
} from './types.js';
export { countClasses } from './types.js';
