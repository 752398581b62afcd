/**
 * README acquisition errors.
 *
 * Concrete:
 *   - ResourceDescriptorInvalidError (DESCRIPTOR_INVALID)
 *   - ReadmeLocalReadError           (README_LOCAL_READ_FAILED)
 *   - ReadmeRemoteUnavailableError   (README_REMOTE_UNAVAILABLE)
 *   - ReadmeFetchError               (README_FETCH_FAILED)
 *   - RampUpConfigurationError       (CONFIG_INVALID)
 *
 * Only the two validation errors are ever thrown to callers. The resolver
 * records the external ones on its attempt trail instead of throwing them.
 */

import { ExternalError } from "./bases/external-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ValidationIssue } from "./types.js";

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Thrown when a resource descriptor cannot name any README source.
 */
export class ResourceDescriptorInvalidError extends ValidationError<"DESCRIPTOR_INVALID"> {
  constructor(reason: string, issues: readonly ValidationIssue[] = []) {
    super({
      code: "DESCRIPTOR_INVALID",
      message: `Invalid resource descriptor: ${reason}`,
      issues,
    });
  }
}

/**
 * Thrown when ramp-up configuration (options or environment) is invalid.
 */
export class RampUpConfigurationError extends ValidationError<"CONFIG_INVALID"> {
  constructor(reason: string, issues: readonly ValidationIssue[] = []) {
    super({
      code: "CONFIG_INVALID",
      message: `Invalid ramp-up configuration: ${reason}`,
      issues,
    });
  }
}

// ---------------------------------------------------------------------------
// External
// ---------------------------------------------------------------------------

export class ReadmeLocalReadError extends ExternalError<"README_LOCAL_READ_FAILED"> {
  readonly path: string;

  constructor(path: string, cause?: Error) {
    super({
      code: "README_LOCAL_READ_FAILED",
      message: `Could not read local README "${path}"${cause ? `: ${cause.message}` : ""}`,
      metadata: { path },
      cause,
    });
    this.path = path;
  }
}

export class ReadmeRemoteUnavailableError extends ExternalError<"README_REMOTE_UNAVAILABLE"> {
  constructor() {
    super({
      code: "README_REMOTE_UNAVAILABLE",
      message: "No HTTP client available, remote README lookup skipped",
    });
  }
}

/**
 * One remote candidate URL did not yield a README.
 * `status` is set when the server answered; absent for network failures and timeouts.
 */
export class ReadmeFetchError extends ExternalError<"README_FETCH_FAILED"> {
  readonly url: string;
  readonly status: number | undefined;

  constructor(url: string, reason: string, status?: number, cause?: Error) {
    super({
      code: "README_FETCH_FAILED",
      message: `README fetch from ${url} failed: ${reason}`,
      metadata: status === undefined ? { url } : { url, status: String(status) },
      cause,
    });
    this.url = url;
    this.status = status;
  }
}
