/**
 * RocSession: the reactive controller behind one explorer view.
 *
 * Every accepted input runs the whole pipeline (sample, curve, operating point,
 * confusion matrix) to completion before anything is published, so listeners
 * only ever see a snapshot whose parts come from the same run. External curves
 * are fetched asynchronously; the latest request wins and anything it
 * supersedes is aborted and discarded.
 */

import { FetchFailedError, InsufficientDataError, InvalidParameterError } from '../errors.js';
import { areaUnderCurve, buildCurve, operatingPoint } from '../roc/curve.js';
import {
  classificationMetrics,
  confusionMatrix,
  confusionMatrixFromCounts,
} from '../roc/confusion.js';
import { createSeededRandom, type RandomSource } from '../sampling/random.js';
import { ScoreSampler } from '../sampling/sampler.js';
import { loadConfigFromObject, parseExternalCurve, type SessionConfig } from '../serialization/loader.js';
import type {
  ClassificationMetrics,
  ConfusionMatrix,
  ExternalCurve,
  RocPoint,
  ScoreSample,
} from '../types.js';
import type { DatasetFetcher } from './fetcher.js';
import {
  isParameterName,
  type ParameterName,
  SAMPLE_PARAMETERS,
  type SessionParameters,
  validateParameters,
  withParameter,
} from './parameters.js';

/** Defaults every session starts from unless overridden. */
export const DEFAULT_SESSION_CONFIG: SessionConfig = loadConfigFromObject({});

/**
 * Read-only view of a session after a pipeline run.
 */
export interface Snapshot {
  readonly title: string;
  readonly curveX: readonly number[];
  readonly curveY: readonly number[];
  readonly operatingX: number;
  readonly operatingY: number;
  readonly confusion: ConfusionMatrix;
  readonly metrics: ClassificationMetrics;
  /** Area under the displayed curve. */
  readonly auc: number;
  readonly mode: 'generated' | 'external';
  /** Parameters that currently have no effect on the curve. */
  readonly frozen: readonly ParameterName[];
  /** Whether the session can load external curves at all. */
  readonly externalDatasetEnabled: boolean;
  readonly dataUrl: string | null;
}

/**
 * A failure shown to the user while the session keeps its last good snapshot.
 */
export interface Notice {
  kind: 'InsufficientData' | 'FetchFailed';
  message: string;
}

export type SessionEvent =
  | { type: 'snapshot'; snapshot: Snapshot }
  | { type: 'notice'; notice: Notice };

export type SessionListener = (event: SessionEvent) => void;

export type DatasetOutcome = 'applied' | 'superseded';

export interface SessionOptions extends Partial<SessionConfig> {
  /** Loader for external curves. Omit to disable the feature. */
  fetcher?: DatasetFetcher | null;
  /** Uniform source for sampling. Takes precedence over `seed`. */
  random?: RandomSource;
}

type Source =
  | { kind: 'generated'; sample: ScoreSample }
  | { kind: 'external'; url: string; external: ExternalCurve };

const NO_FROZEN: readonly ParameterName[] = [];
const FROZEN_WHILE_EXTERNAL: readonly ParameterName[] = [...SAMPLE_PARAMETERS];

export class RocSession {
  readonly fetchTimeoutMs: number;
  private readonly sampler: ScoreSampler;
  private readonly fetcher: DatasetFetcher | null;
  private readonly listeners = new Set<SessionListener>();

  private params: SessionParameters;
  private source: Source;
  private current: Snapshot;

  // Bumped by every accepted input; a fetch only applies if it still holds the latest value.
  private generation = 0;
  private pending: AbortController | null = null;

  constructor(opts?: SessionOptions) {
    const config = { ...DEFAULT_SESSION_CONFIG, ...definedConfig(opts) };
    if (!Number.isInteger(config.fetchTimeoutMs) || config.fetchTimeoutMs <= 0) {
      throw new InvalidParameterError(
        'fetchTimeoutMs',
        config.fetchTimeoutMs,
        'must be a positive integer',
      );
    }

    this.params = validateParameters({
      title: config.title,
      aucTarget: config.aucTarget,
      spread: config.spread,
      sampleSize: config.sampleSize,
      thresholdFraction: config.thresholdFraction,
    });
    this.fetchTimeoutMs = config.fetchTimeoutMs;
    this.fetcher = opts?.fetcher ?? null;
    this.sampler = new ScoreSampler({
      cacheSize: config.cacheSize,
      random: opts?.random ?? (config.seed !== null ? createSeededRandom(config.seed) : undefined),
    });

    this.source = this.generatedSource(this.params);
    this.current = this.compute(this.params, this.source);
  }

  /** The last successfully published snapshot. */
  get snapshot(): Snapshot {
    return this.current;
  }

  get parameters(): Readonly<SessionParameters> {
    return { ...this.params };
  }

  /**
   * Register a listener. It receives the current snapshot immediately, then
   * every later snapshot and notice. Returns a function that unsubscribes it.
   */
  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    this.deliver(listener, { type: 'snapshot', snapshot: this.current });
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Set one parameter and re-run the pipeline.
   *
   * @throws InvalidParameterError when the value is outside the parameter's domain.
   * @throws InsufficientDataError when the resulting data has only one class.
   */
  setParameter<K extends ParameterName>(name: K, value: SessionParameters[K]): Snapshot {
    return this.applyParameter(name, value);
  }

  /**
   * Route an untyped input-change event, such as a widget callback, to
   * {@link setParameter}.
   */
  handleInput(name: string, value: unknown): Snapshot {
    if (!isParameterName(name)) {
      throw new InvalidParameterError(name, value, 'unknown parameter');
    }
    return this.applyParameter(name, value);
  }

  /**
   * Replace the generated sample with a curve fetched from `url`.
   *
   * Resolves `'superseded'` when a later input arrived before the fetch finished.
   *
   * @throws InvalidParameterError when the session has no fetcher.
   * @throws FetchFailedError when the curve cannot be fetched or parsed.
   */
  async setExternalDataset(url: string): Promise<DatasetOutcome> {
    const fetcher = this.fetcher;
    if (!fetcher) {
      throw new InvalidParameterError(
        'dataUrl',
        url,
        'external datasets are disabled for this session',
      );
    }

    const generation = this.supersede();
    const controller = new AbortController();
    this.pending = controller;
    const timer = setTimeout(() => {
      controller.abort(new Error(`timed out after ${this.fetchTimeoutMs}ms`));
    }, this.fetchTimeoutMs);

    // Settles on abort even when the fetcher ignores the signal
    let rejectOnAbort: () => void = () => {};
    const aborted = new Promise<never>((_resolve, reject) => {
      rejectOnAbort = () => reject(controller.signal.reason);
    });
    controller.signal.addEventListener('abort', rejectOnAbort, { once: true });

    let external: ExternalCurve;
    try {
      const body = await Promise.race([
        fetcher.fetchCurve(url, { signal: controller.signal }),
        aborted,
      ]);
      external = parseExternalCurve(body);
    } catch (e) {
      if (generation !== this.generation) return 'superseded';
      this.pending = null;
      const error = new FetchFailedError(url, e);
      this.notify({ kind: 'FetchFailed', message: error.message });
      throw error;
    } finally {
      clearTimeout(timer);
      controller.signal.removeEventListener('abort', rejectOnAbort);
    }

    if (generation !== this.generation) return 'superseded';
    this.pending = null;
    this.commit(this.params, { kind: 'external', url, external });
    return 'applied';
  }

  /**
   * Drop the external curve, if any, and return to generated samples.
   */
  clearExternalDataset(): Snapshot {
    this.supersede();
    return this.commit(this.params, this.generatedSource(this.params));
  }

  private applyParameter(name: ParameterName, value: unknown): Snapshot {
    const next = withParameter(this.params, name, value);
    this.supersede();

    let source = this.source;
    if (source.kind === 'generated' && SAMPLE_PARAMETERS.has(name)) {
      source = this.generatedSource(next);
    }
    return this.commit(next, source);
  }

  private generatedSource(params: SessionParameters): Source {
    return {
      kind: 'generated',
      sample: this.sampler.forAuc(params.aucTarget, params.spread, params.sampleSize),
    };
  }

  private compute(params: SessionParameters, source: Source): Snapshot {
    let curve: readonly RocPoint[];
    let point: RocPoint;
    let confusion: ConfusionMatrix;
    if (source.kind === 'generated') {
      curve = buildCurve(source.sample);
      point = operatingPoint(curve, params.thresholdFraction);
      confusion = confusionMatrix(source.sample, point);
    } else {
      curve = source.external.curve;
      point = operatingPoint(curve, params.thresholdFraction);
      confusion = confusionMatrixFromCounts(source.external.counts, point);
    }

    return {
      title: params.title,
      curveX: curve.map((p) => p.falsePositiveRate),
      curveY: curve.map((p) => p.truePositiveRate),
      operatingX: point.falsePositiveRate,
      operatingY: point.truePositiveRate,
      confusion,
      metrics: classificationMetrics(confusion),
      auc: areaUnderCurve(curve),
      mode: source.kind,
      frozen: source.kind === 'external' ? FROZEN_WHILE_EXTERNAL : NO_FROZEN,
      externalDatasetEnabled: this.fetcher !== null,
      dataUrl: source.kind === 'external' ? source.url : null,
    };
  }

  private commit(params: SessionParameters, source: Source): Snapshot {
    let snapshot: Snapshot;
    try {
      snapshot = this.compute(params, source);
    } catch (e) {
      if (e instanceof InsufficientDataError) {
        this.notify({ kind: 'InsufficientData', message: e.message });
      }
      throw e;
    }

    this.params = params;
    this.source = source;
    this.current = snapshot;
    this.emit({ type: 'snapshot', snapshot });
    return snapshot;
  }

  private supersede(): number {
    this.pending?.abort(new Error('superseded by a newer input'));
    this.pending = null;
    this.generation += 1;
    return this.generation;
  }

  private notify(notice: Notice): void {
    this.emit({ type: 'notice', notice });
  }

  private emit(event: SessionEvent): void {
    for (const listener of [...this.listeners]) {
      this.deliver(listener, event);
    }
  }

  private deliver(listener: SessionListener, event: SessionEvent): void {
    try {
      listener(event);
    } catch (e) {
      // eslint-disable-next-line no-console
      console.error('RocSession listener failed:', e);
    }
  }
}

/**
 * Create a session, loading `dataUrl` first when one is configured.
 *
 * A failed initial load leaves the session on generated samples; the failure
 * reaches `listener` as a notice, or the console when there is no listener.
 */
export async function createSession(
  opts?: SessionOptions & { listener?: SessionListener },
): Promise<RocSession> {
  const session = new RocSession(opts);
  if (opts?.listener) {
    session.subscribe(opts.listener);
  }

  const dataUrl = opts?.dataUrl ?? null;
  if (dataUrl !== null && session.snapshot.externalDatasetEnabled) {
    try {
      await session.setExternalDataset(dataUrl);
    } catch (e) {
      // Both have already been published as notices
      if (!(e instanceof FetchFailedError || e instanceof InsufficientDataError)) throw e;
      if (!opts?.listener) {
        // eslint-disable-next-line no-console
        console.warn(e.message);
      }
    }
  }
  return session;
}

function definedConfig(opts?: SessionOptions): Partial<SessionConfig> {
  const config: Partial<SessionConfig> = {};
  if (!opts) return config;
  if (opts.title !== undefined) config.title = opts.title;
  if (opts.aucTarget !== undefined) config.aucTarget = opts.aucTarget;
  if (opts.spread !== undefined) config.spread = opts.spread;
  if (opts.sampleSize !== undefined) config.sampleSize = opts.sampleSize;
  if (opts.thresholdFraction !== undefined) config.thresholdFraction = opts.thresholdFraction;
  if (opts.cacheSize !== undefined) config.cacheSize = opts.cacheSize;
  if (opts.fetchTimeoutMs !== undefined) config.fetchTimeoutMs = opts.fetchTimeoutMs;
  if (opts.seed !== undefined) config.seed = opts.seed;
  if (opts.dataUrl !== undefined) config.dataUrl = opts.dataUrl;
  return config;
}
