/**
 * YAML/JSON loading and saving for session configs, and parsing of external curves.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { basename, extname } from 'node:path';
import YAML from 'yaml';
import type { ExternalCurve } from '../types.js';
import { externalCurveSchema, sessionConfigSchema } from './schema.js';

/**
 * Settings a session starts from.
 */
export interface SessionConfig {
  title: string;
  aucTarget: number;
  spread: number;
  sampleSize: number;
  thresholdFraction: number;
  /** Maximum number of memoized samples. */
  cacheSize: number;
  fetchTimeoutMs: number;
  /** Seed for reproducible sampling. `null` draws from `Math.random`. */
  seed: number | null;
  /** External curve to load once the session starts. */
  dataUrl: string | null;
}

export interface LoadOptions {
  /** File format. If not specified, inferred from file extension. */
  fmt?: 'yaml' | 'json';
}

/**
 * Load a session config from a file.
 */
export function loadConfigFromFile(path: string, opts?: LoadOptions): SessionConfig {
  const fmt = opts?.fmt ?? inferFormat(path);
  const content = readFileSync(path, 'utf-8');
  return loadConfigFromText(content, { fmt });
}

/**
 * Load a session config from a string.
 */
export function loadConfigFromText(content: string, opts?: LoadOptions): SessionConfig {
  const fmt = opts?.fmt ?? 'yaml';
  const raw: unknown = fmt === 'yaml' ? YAML.parse(content) : JSON.parse(content);
  // An empty YAML document parses to null
  return loadConfigFromObject(raw ?? {});
}

/**
 * Load a session config from a plain object (after parsing YAML/JSON).
 */
export function loadConfigFromObject(data: unknown): SessionConfig {
  const parsed = sessionConfigSchema.parse(data);
  return {
    title: parsed.title,
    aucTarget: parsed.auc_target,
    spread: parsed.spread,
    sampleSize: parsed.sample_size,
    thresholdFraction: parsed.threshold_fraction,
    cacheSize: parsed.cache_size,
    fetchTimeoutMs: parsed.fetch_timeout_ms,
    seed: parsed.seed ?? null,
    dataUrl: parsed.data_url ?? null,
  };
}

/**
 * Save a session config to a file, omitting unset optional keys.
 */
export function saveConfigToFile(config: SessionConfig, path: string, opts?: LoadOptions): void {
  const fmt = opts?.fmt ?? inferFormat(path);
  const data: Record<string, unknown> = {
    title: config.title,
    auc_target: config.aucTarget,
    spread: config.spread,
    sample_size: config.sampleSize,
    threshold_fraction: config.thresholdFraction,
    cache_size: config.cacheSize,
    fetch_timeout_ms: config.fetchTimeoutMs,
  };
  if (config.seed !== null) data.seed = config.seed;
  if (config.dataUrl !== null) data.data_url = config.dataUrl;

  if (fmt === 'yaml') {
    writeFileSync(path, YAML.stringify(data, { sortMapEntries: false }), 'utf-8');
  } else {
    writeFileSync(path, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  }
}

/**
 * Validate a fetched document and turn it into a curve.
 *
 * Points keep the order of the document. When the class sizes are missing,
 * each is taken as half the number of points, rounded down.
 */
export function parseExternalCurve(data: unknown): ExternalCurve {
  const parsed = externalCurveSchema.parse(data);
  const half = Math.floor(parsed.x.length / 2);
  return {
    curve: parsed.x.map((x, i) => ({
      falsePositiveRate: x,
      truePositiveRate: parsed.y[i]!,
      threshold: null,
    })),
    counts: {
      positives: parsed.positives ?? half,
      negatives: parsed.negatives ?? half,
    },
  };
}

// -- Utilities --

function inferFormat(path: string): 'yaml' | 'json' {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') return 'yaml';
  if (ext === '.json') return 'json';
  throw new Error(
    `Could not infer format for filename '${basename(path)}'. Use the fmt option to specify the format.`,
  );
}
