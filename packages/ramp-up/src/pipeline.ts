/**
 * Timed resolve + score pipeline.
 *
 * One monotonic measurement wraps the whole sequence, network included.
 * Descriptors and candidates are processed one at a time.
 */

import { describeResource } from "./descriptor.js";
import { resolveReadme } from "./resolver.js";
import { scoreBreakdown } from "./scorer.js";
import type { RampUpEvaluation, RampUpOptions, ResourceDescriptor, ScoreResult } from "./types.js";

/**
 * Resolve and score one descriptor, keeping the breakdown and attempt trail.
 */
export async function evaluateRampUp(
  descriptor: ResourceDescriptor,
  options: RampUpOptions = {},
): Promise<RampUpEvaluation> {
  const start = performance.now();

  const { readme, attempts } = await resolveReadme(descriptor, options);
  const breakdown = readme === null ? null : scoreBreakdown(readme.text);

  const latencyMs = Math.max(0, Math.round(performance.now() - start));
  const name = describeResource(descriptor);
  options.logger?.info(`${name}: ramp-up ${breakdown?.total ?? 0} (${latencyMs}ms)`);

  return {
    name,
    score: breakdown?.total ?? 0,
    latencyMs,
    readme: readme === null ? null : { source: readme.source, location: readme.location },
    breakdown,
    attempts,
  };
}

/**
 * The ramp-up metric: `{ score, latencyMs }` for one descriptor.
 */
export async function rampUpTime(
  descriptor: ResourceDescriptor,
  options: RampUpOptions = {},
): Promise<ScoreResult> {
  const { score, latencyMs } = await evaluateRampUp(descriptor, options);
  return { score, latencyMs };
}

/**
 * Evaluate several descriptors sequentially, in input order.
 */
export async function evaluateAll(
  descriptors: readonly ResourceDescriptor[],
  options: RampUpOptions = {},
): Promise<RampUpEvaluation[]> {
  const evaluations: RampUpEvaluation[] = [];
  for (const descriptor of descriptors) {
    evaluations.push(await evaluateRampUp(descriptor, options));
  }
  return evaluations;
}
