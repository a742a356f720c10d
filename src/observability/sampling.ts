/**
 * Trace Sampling
 *
 * sampleRatio is the fraction of traces kept. At 1.0 (default) every trace
 * is exported; at 0.0 none are. The decision is made once per trace from
 * the trace id, and child spans follow their parent's decision so a trace
 * is never exported partially.
 */

import {
  AlwaysOffSampler,
  AlwaysOnSampler,
  ParentBasedSampler,
  TraceIdRatioBasedSampler,
  type Sampler,
} from '@opentelemetry/sdk-trace-base';

/**
 * Build the root sampler for a ratio, wrapped so children follow parents.
 */
export function createSampler(sampleRatio: number): Sampler {
  let root: Sampler;
  if (sampleRatio >= 1.0) {
    root = new AlwaysOnSampler();
  } else if (sampleRatio <= 0.0) {
    root = new AlwaysOffSampler();
  } else {
    root = new TraceIdRatioBasedSampler(sampleRatio);
  }
  return new ParentBasedSampler({ root });
}

/**
 * Integer "1 in N" sample rate reported as the SampleRate resource
 * attribute so the backend can re-weight counts. Undefined when every trace
 * is kept or none are.
 */
export function sampleRateFor(sampleRatio: number): number | undefined {
  if (sampleRatio >= 1.0 || sampleRatio <= 0.0) return undefined;
  return Math.round(1 / sampleRatio);
}
