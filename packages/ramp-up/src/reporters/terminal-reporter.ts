import type { RampUpEvaluation, RampUpReport, ResolutionAttempt } from "../types.js";
import type { RampUpReporter } from "./types.js";

// ---------------------------------------------------------------------------
// ANSI helpers (no chalk dependency)
// ---------------------------------------------------------------------------

const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const GREEN = "\x1b[32m";

const OUTCOME_ICONS: Record<ResolutionAttempt["outcome"], string> = {
  found: `${GREEN}✓${RESET}`,
  missing: `${DIM}·${RESET}`,
  failed: `${RED}✗${RESET}`,
  skipped: `${DIM}⊘${RESET}`,
};

function scoreColor(score: number): string {
  if (score >= 0.7) return GREEN;
  if (score >= 0.35) return YELLOW;
  return RED;
}

export interface TerminalReporterOptions {
  /** List every file and URL the resolver tried */
  readonly verbose?: boolean;
}

// ---------------------------------------------------------------------------
// Terminal reporter
// ---------------------------------------------------------------------------

/**
 * Renders a human-readable ANSI-colored terminal report.
 */
export class TerminalReporter implements RampUpReporter {
  readonly name = "terminal";
  private readonly verbose: boolean;

  constructor(options: TerminalReporterOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  report(result: RampUpReport): string {
    const lines: string[] = [];

    lines.push("");
    lines.push(`${BOLD}Ramp-up Time${RESET}`);
    lines.push(`${"─".repeat(50)}`);
    lines.push("");

    for (const evaluation of result.evaluations) {
      lines.push(...this.renderEvaluation(evaluation));
    }

    lines.push("");
    lines.push(`${"─".repeat(50)}`);
    lines.push(
      `  ${DIM}Resources: ${result.evaluations.length}, duration: ${result.durationMs}ms${RESET}`,
    );
    lines.push("");

    return lines.join("\n");
  }

  private renderEvaluation(evaluation: RampUpEvaluation): string[] {
    const color = scoreColor(evaluation.score);
    const lines = [
      `  ${color}${evaluation.score.toFixed(4)}${RESET} ${evaluation.name} ${DIM}(${evaluation.latencyMs}ms)${RESET}`,
    ];

    if (evaluation.readme && evaluation.breakdown) {
      const b = evaluation.breakdown;
      lines.push(`    ${DIM}README: ${evaluation.readme.location}${RESET}`);
      lines.push(
        `    ${DIM}words ${b.wordCount} → length ${b.length}, install ${b.installation}, code ${b.code}${RESET}`,
      );
    } else {
      lines.push(`    ${YELLOW}No README found${RESET}`);
    }

    if (this.verbose) {
      for (const attempt of evaluation.attempts) {
        const reason = attempt.error ? ` ${DIM}${attempt.error.message}${RESET}` : "";
        lines.push(`    ${OUTCOME_ICONS[attempt.outcome]} ${attempt.location}${reason}`);
      }
    }

    return lines;
  }
}
