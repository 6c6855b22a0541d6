/**
 * Session parameters and their domains.
 */

import { z } from 'zod';
import { InvalidParameterError } from '../errors.js';

export const MIN_SAMPLE_SIZE = 50;
export const MAX_SAMPLE_SIZE = 800;

export interface SessionParameters {
  title: string;
  /** Target area under the curve, in [0, 1]. */
  aucTarget: number;
  /** Standard deviation of both score distributions. */
  spread: number;
  /** Total number of scores, split evenly between the classes. */
  sampleSize: number;
  /** Slider position along the false positive rate axis, in [0, 1]. */
  thresholdFraction: number;
}

export type ParameterName = keyof SessionParameters;

/** Parameters that shape the generated sample; inert while an external curve is active. */
export const SAMPLE_PARAMETERS: ReadonlySet<ParameterName> = new Set<ParameterName>([
  'aucTarget',
  'spread',
  'sampleSize',
]);

export const parameterSchemas = {
  title: z.string(),
  aucTarget: z.number().min(0).max(1),
  spread: z.number().positive().finite(),
  sampleSize: z
    .number()
    .int()
    .min(MIN_SAMPLE_SIZE)
    .max(MAX_SAMPLE_SIZE)
    .refine((n) => n % 2 === 0, { message: 'Number must be even' }),
  thresholdFraction: z.number().min(0).max(1),
} as const;

export function isParameterName(name: string): name is ParameterName {
  return Object.hasOwn(parameterSchemas, name);
}

/**
 * Return a copy of `params` with `name` set to `value`, or throw
 * InvalidParameterError if the value is outside the parameter's domain.
 */
export function withParameter(
  params: SessionParameters,
  name: ParameterName,
  value: unknown,
): SessionParameters {
  switch (name) {
    case 'title':
      return { ...params, title: check(name, parameterSchemas.title, value) };
    case 'aucTarget':
      return { ...params, aucTarget: check(name, parameterSchemas.aucTarget, value) };
    case 'spread':
      return { ...params, spread: check(name, parameterSchemas.spread, value) };
    case 'sampleSize':
      return { ...params, sampleSize: check(name, parameterSchemas.sampleSize, value) };
    case 'thresholdFraction':
      return {
        ...params,
        thresholdFraction: check(name, parameterSchemas.thresholdFraction, value),
      };
  }
}

/**
 * Validate a complete parameter set.
 */
export function validateParameters(params: SessionParameters): SessionParameters {
  let result = params;
  for (const name of Object.keys(parameterSchemas)) {
    if (isParameterName(name)) {
      result = withParameter(result, name, params[name]);
    }
  }
  return result;
}

function check<T>(name: ParameterName, schema: z.ZodType<T>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const message = result.error.issues[0]?.message ?? 'invalid value';
    throw new InvalidParameterError(name, value, message);
  }
  return result.data;
}
