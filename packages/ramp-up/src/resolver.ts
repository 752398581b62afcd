/**
 * README resolver: local files first, then remote candidates in a fixed
 * order, short-circuiting on the first hit. Never throws.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  getErrorMessage,
  ReadmeFetchError,
  ReadmeLocalReadError,
  ReadmeRemoteUnavailableError,
} from "@onramp/errors";
import {
  DEFAULT_HOSTS,
  GENERIC_FALLBACK_REF,
  GITHUB_RAW_BASE_URL,
  HUGGINGFACE_BASE_URL,
  README_FILENAMES,
} from "./constants.js";
import { detectHttpClient } from "./http.js";
import { silentLogger } from "./logger.js";
import type {
  HostKind,
  HttpClient,
  Logger,
  RampUpOptions,
  ReadmeContent,
  ResolutionAttempt,
  ResolveOutcome,
  ResourceDescriptor,
} from "./types.js";

// ---------------------------------------------------------------------------
// Candidate URLs
// ---------------------------------------------------------------------------

function branchUrl(
  hostKind: Exclude<HostKind, "none">,
  host: string | undefined,
  owner: string,
  repo: string,
  branch: string,
): string | undefined {
  switch (hostKind) {
    case "github":
      return `${GITHUB_RAW_BASE_URL}/${owner}/${repo}/${branch}/README.md`;
    case "huggingface":
      return `${HUGGINGFACE_BASE_URL}/${owner}/${repo}/raw/${branch}/README.md`;
    case "generic":
      return host ? `https://${host}/${owner}/${repo}/raw/${branch}/README.md` : undefined;
  }
}

/**
 * Ordered, de-duplicated remote README URLs for a descriptor: one per branch
 * candidate for its host kind, then a generic `raw/HEAD` guess.
 */
export function remoteCandidates(descriptor: ResourceDescriptor): string[] {
  const { hostKind, owner, repo } = descriptor;
  if (hostKind === "none" || !owner || !repo) return [];

  const host = descriptor.host ?? (hostKind === "generic" ? undefined : DEFAULT_HOSTS[hostKind]);
  const urls: string[] = [];

  for (const branch of descriptor.branchCandidates) {
    const url = branchUrl(hostKind, host, owner, repo, branch);
    if (url) urls.push(url);
  }
  if (host) {
    urls.push(`https://${host}/${owner}/${repo}/raw/${GENERIC_FALLBACK_REF}/README.md`);
  }

  return [...new Set(urls)];
}

// ---------------------------------------------------------------------------
// Local lookup
// ---------------------------------------------------------------------------

async function resolveLocal(
  dir: string,
  attempts: ResolutionAttempt[],
  logger: Logger,
): Promise<ReadmeContent | null> {
  const dirStat = await fs.stat(dir).catch(() => undefined);
  if (!dirStat?.isDirectory()) {
    logger.debug(`${dir} is not a directory, skipping local lookup`);
    attempts.push({ source: "local", location: dir, outcome: "skipped" });
    return null;
  }

  for (const filename of README_FILENAMES) {
    const filePath = path.join(dir, filename);
    const fileStat = await fs.stat(filePath).catch(() => undefined);
    if (!fileStat?.isFile()) {
      attempts.push({ source: "local", location: filePath, outcome: "missing" });
      continue;
    }

    try {
      // Buffer#toString substitutes U+FFFD for malformed UTF-8
      const text = (await fs.readFile(filePath)).toString("utf8");
      attempts.push({ source: "local", location: filePath, outcome: "found" });
      logger.debug(`using local README ${filePath}`);
      return { text, source: "local", location: filePath };
    } catch (err) {
      const error = new ReadmeLocalReadError(filePath, err instanceof Error ? err : undefined);
      logger.debug(error.message);
      attempts.push({ source: "local", location: filePath, outcome: "failed", error });
    }
  }

  return null;
}

// ---------------------------------------------------------------------------
// Remote lookup
// ---------------------------------------------------------------------------

async function fetchCandidate(
  client: HttpClient,
  url: string,
  signal: AbortSignal | undefined,
): Promise<{ readonly text: string } | { readonly error: ReadmeFetchError }> {
  try {
    const response = await client.get(url, signal);
    if (response.status === 200) {
      return { text: response.body };
    }
    return { error: new ReadmeFetchError(url, `HTTP ${response.status}`, response.status) };
  } catch (err) {
    if (err instanceof ReadmeFetchError) {
      return { error: err };
    }
    return {
      error: new ReadmeFetchError(
        url,
        getErrorMessage(err),
        undefined,
        err instanceof Error ? err : undefined,
      ),
    };
  }
}

async function resolveRemote(
  descriptor: ResourceDescriptor,
  client: HttpClient | undefined,
  attempts: ResolutionAttempt[],
  logger: Logger,
  signal: AbortSignal | undefined,
): Promise<ReadmeContent | null> {
  const candidates = remoteCandidates(descriptor);
  if (candidates.length === 0) return null;

  if (!client) {
    const error = new ReadmeRemoteUnavailableError();
    logger.debug(error.message);
    for (const url of candidates) {
      attempts.push({ source: "remote", location: url, outcome: "skipped", error });
    }
    return null;
  }

  for (const url of candidates) {
    if (signal?.aborted) {
      attempts.push({ source: "remote", location: url, outcome: "skipped" });
      continue;
    }

    const result = await fetchCandidate(client, url, signal);
    if ("text" in result) {
      attempts.push({ source: "remote", location: url, outcome: "found" });
      logger.debug(`using remote README ${url}`);
      return { text: result.text, source: "remote", location: url };
    }

    logger.debug(result.error.message);
    attempts.push({ source: "remote", location: url, outcome: "failed", error: result.error });
  }

  return null;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Find README text for a descriptor and report every file and URL tried.
 *
 * `options.httpClient`: `undefined` auto-detects global fetch, `null`
 * restricts resolution to the local directory.
 */
export async function resolveReadme(
  descriptor: ResourceDescriptor,
  options: RampUpOptions = {},
): Promise<ResolveOutcome> {
  const logger = options.logger ?? silentLogger;
  const attempts: ResolutionAttempt[] = [];

  if (descriptor.localDir !== undefined) {
    const local = await resolveLocal(descriptor.localDir, attempts, logger);
    if (local) return { readme: local, attempts };
  }

  const client = options.httpClient === undefined ? detectHttpClient() : (options.httpClient ?? undefined);
  const remote = await resolveRemote(descriptor, client, attempts, logger, options.signal);

  return { readme: remote, attempts };
}

/**
 * README content for a descriptor, or `null` when every source came up empty.
 */
export async function readReadme(
  descriptor: ResourceDescriptor,
  options: RampUpOptions = {},
): Promise<ReadmeContent | null> {
  return (await resolveReadme(descriptor, options)).readme;
}
