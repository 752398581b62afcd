/**
 * @onramp/ramp-up: README ramp-up time metric
 *
 * Public API surface.
 */

// Pipeline
export { evaluateAll, evaluateRampUp, rampUpTime } from "./pipeline.js";
// Descriptors
export {
  createResourceDescriptor,
  describeResource,
  type ParseResourceUrlOptions,
  parseResourceUrl,
} from "./descriptor.js";
// Resolver
export { readReadme, remoteCandidates, resolveReadme } from "./resolver.js";
// Scorer
export {
  countWords,
  hasCodeSnippet,
  hasInstallationGuide,
  lengthScore,
  roundScore,
  scoreBreakdown,
  scoreReadme,
} from "./scorer.js";
// HTTP capability
export { createFetchHttpClient, detectHttpClient, type FetchHttpClientConfig } from "./http.js";
// Configuration + logging
export {
  createRampUpOptions,
  loadConfigFromEnv,
  type ResolvedRampUpConfig,
  resolveConfig,
  validateConfig,
} from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
// Reporters
export { JsonReporter } from "./reporters/json-reporter.js";
export { NdjsonReporter } from "./reporters/ndjson-reporter.js";
export { TerminalReporter, type TerminalReporterOptions } from "./reporters/terminal-reporter.js";
export type { RampUpReporter } from "./reporters/types.js";
// CLI
export { type CliArgs, type OutputFormat, parseArgs, parseUrlList } from "./args.js";
export { type CliIo, runCli } from "./run.js";
// Types
export type {
  HostKind,
  HttpClient,
  HttpResponse,
  Logger,
  LogLevel,
  RampUpConfig,
  RampUpEvaluation,
  RampUpOptions,
  RampUpReport,
  ReadmeContent,
  ReadmeSource,
  ResolutionAttempt,
  ResolveOutcome,
  ResourceDescriptor,
  ScoreBreakdown,
  ScoreResult,
} from "./types.js";
export { DEFAULT_BRANCHES, DEFAULT_LOG_LEVEL, DEFAULT_TIMEOUT_MS } from "./types.js";
// Heuristic constants
export {
  CODE_SNIPPET_SCORE,
  INSTALL_PHRASES,
  INSTALLATION_SCORE,
  LENGTH_BANDS,
  LONG_TEXT_SCORE,
  README_FILENAMES,
} from "./constants.js";
// Validation schemas
export {
  HostKindSchema,
  LogLevelSchema,
  RampUpConfigSchema,
  type ResourceDescriptorInput,
  ResourceDescriptorInputSchema,
} from "./validation.js";

// Package metadata
export const PACKAGE_NAME = "@onramp/ramp-up";
export const PACKAGE_VERSION = "0.1.0";
