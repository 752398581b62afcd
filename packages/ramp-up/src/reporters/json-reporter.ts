import type { RampUpReport } from "../types.js";
import type { RampUpReporter } from "./types.js";

// ---------------------------------------------------------------------------
// JSON reporter
// ---------------------------------------------------------------------------

/**
 * Renders the full report as formatted JSON.
 */
export class JsonReporter implements RampUpReporter {
  readonly name = "json";

  report(result: RampUpReport): string {
    // Attempt errors become their catalog JSON, without stack traces
    const serializable = {
      ...result,
      evaluations: result.evaluations.map((evaluation) => ({
        ...evaluation,
        attempts: evaluation.attempts.map(({ error, ...attempt }) => ({
          ...attempt,
          ...(error ? { error: { code: error.code, message: error.message } } : {}),
        })),
      })),
    };
    return JSON.stringify(serializable, null, 2);
  }
}
