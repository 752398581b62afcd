/**
 * Configuration: explicit values over `ONRAMP_*` environment variables over defaults.
 */

import { RampUpConfigurationError } from "@onramp/errors";
import { detectHttpClient } from "./http.js";
import { createLogger } from "./logger.js";
import {
  DEFAULT_BRANCHES,
  DEFAULT_LOG_LEVEL,
  DEFAULT_TIMEOUT_MS,
  type RampUpConfig,
  type RampUpOptions,
} from "./types.js";
import { RampUpConfigSchema, summarizeIssues, toValidationIssues } from "./validation.js";

type Env = Readonly<Record<string, string | undefined>>;

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0" || normalized === "") return false;
  throw new RampUpConfigurationError(`${name} must be true, false, 1 or 0 (got "${value}")`);
}

function parseInteger(name: string, value: string): number {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed)) {
    throw new RampUpConfigurationError(`${name} must be an integer (got "${value}")`);
  }
  return parsed;
}

/**
 * Read `ONRAMP_HTTP_TIMEOUT_MS`, `ONRAMP_OFFLINE`, `ONRAMP_BRANCHES` and
 * `ONRAMP_LOG_LEVEL`. Unset variables are left out of the result.
 */
export function loadConfigFromEnv(env: Env = process.env): RampUpConfig {
  const raw: Record<string, unknown> = {};

  if (env.ONRAMP_HTTP_TIMEOUT_MS !== undefined) {
    raw.timeoutMs = parseInteger("ONRAMP_HTTP_TIMEOUT_MS", env.ONRAMP_HTTP_TIMEOUT_MS);
  }
  if (env.ONRAMP_OFFLINE !== undefined) {
    raw.offline = parseBoolean("ONRAMP_OFFLINE", env.ONRAMP_OFFLINE);
  }
  if (env.ONRAMP_BRANCHES !== undefined) {
    const branches = env.ONRAMP_BRANCHES.split(",")
      .map((branch) => branch.trim())
      .filter((branch) => branch.length > 0);
    if (branches.length > 0) raw.branches = branches;
  }
  if (env.ONRAMP_LOG_LEVEL !== undefined) {
    raw.logLevel = env.ONRAMP_LOG_LEVEL.trim().toLowerCase();
  }

  return validateConfig(raw);
}

/**
 * Validate a config object against RampUpConfigSchema.
 *
 * @throws RampUpConfigurationError listing every invalid field
 */
export function validateConfig(raw: unknown): RampUpConfig {
  const parsed = RampUpConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = toValidationIssues(parsed.error);
    throw new RampUpConfigurationError(summarizeIssues(issues), issues);
  }

  const data = parsed.data;
  return {
    ...(data.timeoutMs !== undefined ? { timeoutMs: data.timeoutMs } : {}),
    ...(data.offline !== undefined ? { offline: data.offline } : {}),
    ...(data.branches !== undefined ? { branches: data.branches } : {}),
    ...(data.logLevel !== undefined ? { logLevel: data.logLevel } : {}),
  };
}

export interface ResolvedRampUpConfig {
  readonly timeoutMs: number;
  readonly offline: boolean;
  readonly branches: readonly string[];
  readonly logLevel: NonNullable<RampUpConfig["logLevel"]>;
}

/**
 * Merge explicit overrides onto the environment and fill defaults.
 */
export function resolveConfig(overrides: RampUpConfig = {}, env: Env = process.env): ResolvedRampUpConfig {
  const merged = { ...loadConfigFromEnv(env), ...validateConfig(overrides) };
  return {
    timeoutMs: merged.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    offline: merged.offline ?? false,
    branches: merged.branches ?? DEFAULT_BRANCHES,
    logLevel: merged.logLevel ?? DEFAULT_LOG_LEVEL,
  };
}

/**
 * Turn resolved configuration into pipeline options: an HTTP client with the
 * configured timeout (or none when offline) and a level-filtered logger.
 */
export function createRampUpOptions(config: ResolvedRampUpConfig, tag = "onramp"): RampUpOptions {
  return {
    httpClient: config.offline ? null : (detectHttpClient({ timeoutMs: config.timeoutMs }) ?? null),
    logger: createLogger(tag, config.logLevel),
  };
}
