/**
 * Core types for README resolution and ramp-up scoring.
 */

import type { OnrampError } from "@onramp/errors";

// ---------------------------------------------------------------------------
// Resource descriptor
// ---------------------------------------------------------------------------

export type HostKind = "github" | "huggingface" | "generic" | "none";

/**
 * Identifies one artifact to evaluate. Frozen once constructed;
 * build it with `createResourceDescriptor` or `parseResourceUrl`.
 */
export interface ResourceDescriptor {
  readonly name?: string;
  readonly localDir?: string;
  readonly hostKind: HostKind;
  /** Hostname for `generic` descriptors, e.g. "gitlab.com" */
  readonly host?: string;
  readonly owner?: string;
  readonly repo?: string;
  /** Branches tried in order for every remote URL template */
  readonly branchCandidates: readonly string[];
}

// ---------------------------------------------------------------------------
// README content + resolution trail
// ---------------------------------------------------------------------------

export type ReadmeSource = "local" | "remote";

export interface ReadmeContent {
  readonly text: string;
  readonly source: ReadmeSource;
  /** File path or URL the text came from */
  readonly location: string;
}

export interface ResolutionAttempt {
  readonly source: ReadmeSource;
  readonly location: string;
  readonly outcome: "found" | "missing" | "failed" | "skipped";
  readonly error?: OnrampError;
}

export interface ResolveOutcome {
  readonly readme: ReadmeContent | null;
  readonly attempts: readonly ResolutionAttempt[];
}

// ---------------------------------------------------------------------------
// HTTP capability
// ---------------------------------------------------------------------------

export interface HttpResponse {
  readonly status: number;
  readonly body: string;
}

/**
 * Minimal GET capability the resolver needs. Implementations may reject;
 * the resolver treats a rejection as "not found" for that URL.
 */
export interface HttpClient {
  get(url: string, signal?: AbortSignal): Promise<HttpResponse>;
}

// ---------------------------------------------------------------------------
// Scoring
// ---------------------------------------------------------------------------

export interface ScoreBreakdown {
  readonly wordCount: number;
  readonly length: number;
  readonly installation: number;
  readonly code: number;
  readonly total: number;
}

export interface ScoreResult {
  /** In [0, 1], rounded to 4 decimals */
  readonly score: number;
  /** Wall-clock milliseconds for resolve + score, network included */
  readonly latencyMs: number;
}

export interface RampUpEvaluation extends ScoreResult {
  readonly name: string;
  readonly readme: Omit<ReadmeContent, "text"> | null;
  readonly breakdown: ScoreBreakdown | null;
  readonly attempts: readonly ResolutionAttempt[];
}

/**
 * Output of one CLI run, handed to a reporter.
 */
export interface RampUpReport {
  readonly startedAt: string;
  readonly completedAt: string;
  readonly durationMs: number;
  readonly evaluations: readonly RampUpEvaluation[];
}

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface RampUpConfig {
  /** Per-request timeout for the default fetch client */
  readonly timeoutMs?: number;
  /** Skip remote lookup entirely */
  readonly offline?: boolean;
  /** Default branch candidates for descriptors built from URLs */
  readonly branches?: readonly string[];
  readonly logLevel?: LogLevel;
}

export interface RampUpOptions {
  /**
   * HTTP capability. `undefined` auto-detects global fetch;
   * `null` disables remote lookup.
   */
  readonly httpClient?: HttpClient | null;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
}

/** Default per-request timeout in milliseconds */
export const DEFAULT_TIMEOUT_MS = 10_000;

/** Branches tried when a descriptor names none */
export const DEFAULT_BRANCHES: readonly string[] = ["main", "master"];

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";
