import type { RampUpReport } from "../types.js";
import type { RampUpReporter } from "./types.js";

/**
 * One JSON object per line with the metric and its latency, the shape
 * metric aggregators consume.
 */
export class NdjsonReporter implements RampUpReporter {
  readonly name = "ndjson";

  report(result: RampUpReport): string {
    return result.evaluations
      .map((evaluation) =>
        JSON.stringify({
          name: evaluation.name,
          ramp_up_time: evaluation.score,
          ramp_up_time_latency: evaluation.latencyMs,
        }),
      )
      .join("\n");
  }
}
