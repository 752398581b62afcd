/**
 * README scorer. Three independent additive heuristics, clamped to 1.0.
 */

import {
  CODE_FENCE,
  CODE_SNIPPET_SCORE,
  INDENTED_CODE_PATTERN,
  INSTALL_HEADING_PATTERNS,
  INSTALL_PHRASES,
  INSTALLATION_SCORE,
  LENGTH_BANDS,
  LONG_TEXT_SCORE,
} from "./constants.js";
import type { ScoreBreakdown } from "./types.js";

export function countWords(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}

export function lengthScore(wordCount: number): number {
  for (const band of LENGTH_BANDS) {
    if (wordCount < band.below) return band.score;
  }
  return LONG_TEXT_SCORE;
}

export function hasInstallationGuide(text: string): boolean {
  if (INSTALL_HEADING_PATTERNS.some((pattern) => pattern.test(text))) return true;
  const lower = text.toLowerCase();
  return INSTALL_PHRASES.some((phrase) => lower.includes(phrase));
}

export function hasCodeSnippet(text: string): boolean {
  return text.includes(CODE_FENCE) || INDENTED_CODE_PATTERN.test(text);
}

export function roundScore(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/**
 * Score each heuristic separately. `total` is the clamped, rounded sum.
 */
export function scoreBreakdown(text: string): ScoreBreakdown {
  const wordCount = countWords(text);
  const length = lengthScore(wordCount);
  const installation = hasInstallationGuide(text) ? INSTALLATION_SCORE : 0;
  const code = hasCodeSnippet(text) ? CODE_SNIPPET_SCORE : 0;

  return {
    wordCount,
    length,
    installation,
    code,
    total: Math.max(0, Math.min(1, roundScore(length + installation + code))),
  };
}

/**
 * Ramp-up score for README text; absent text scores 0 without evaluating anything.
 */
export function scoreReadme(text: string | null): number {
  if (text === null) return 0;
  return scoreBreakdown(text).total;
}
