import type { RampUpReport } from "../types.js";

/**
 * Reporter interface for formatting ramp-up reports.
 */
export interface RampUpReporter {
  readonly name: string;
  report(result: RampUpReport): string;
}
