/**
 * Resource descriptor construction. Validated up front; resolution
 * never has to reject a malformed descriptor.
 */

import { ResourceDescriptorInvalidError } from "@onramp/errors";
import { DEFAULT_BRANCHES, type ResourceDescriptor } from "./types.js";
import {
  type ResourceDescriptorInput,
  ResourceDescriptorInputSchema,
  summarizeIssues,
  toValidationIssues,
} from "./validation.js";

/**
 * Validate input and return a frozen descriptor.
 *
 * @throws ResourceDescriptorInvalidError when the input names no usable source
 */
export function createResourceDescriptor(input: ResourceDescriptorInput): ResourceDescriptor {
  const parsed = ResourceDescriptorInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = toValidationIssues(parsed.error);
    throw new ResourceDescriptorInvalidError(summarizeIssues(issues), issues);
  }

  const data = parsed.data;
  const branches =
    data.branchCandidates && data.branchCandidates.length > 0
      ? dedupe(data.branchCandidates)
      : DEFAULT_BRANCHES;

  return Object.freeze({
    hostKind: data.hostKind,
    branchCandidates: Object.freeze([...branches]),
    ...(data.name !== undefined ? { name: data.name } : {}),
    ...(data.localDir !== undefined ? { localDir: data.localDir } : {}),
    ...(data.host !== undefined ? { host: data.host.toLowerCase() } : {}),
    ...(data.owner !== undefined ? { owner: data.owner } : {}),
    ...(data.repo !== undefined ? { repo: data.repo } : {}),
  });
}

// ---------------------------------------------------------------------------
// URL parsing
// ---------------------------------------------------------------------------

export interface ParseResourceUrlOptions {
  readonly name?: string;
  readonly localDir?: string;
  /** Branches tried after any branch named in the URL itself */
  readonly branches?: readonly string[];
}

const GITHUB_HOSTS = new Set(["github.com", "www.github.com"]);
const HUGGINGFACE_HOSTS = new Set(["huggingface.co", "www.huggingface.co"]);
const UNSUPPORTED_HUGGINGFACE_PREFIXES = new Set(["datasets", "spaces"]);
const BARE_ID_PATTERN = /^[\w.-]+\/[\w.-]+$/;

/**
 * Build a descriptor from a repository URL or a bare `owner/repo` id.
 *
 * - `https://github.com/{owner}/{repo}[.git][/tree/{branch}]` → github
 * - `https://huggingface.co/{owner}/{repo}[/tree/{branch}]` → huggingface
 * - `{owner}/{repo}` → huggingface
 * - any other `https://{host}/{owner}/{repo}` → generic
 *
 * Only the segment right after `/tree/` is taken as the branch: a URL cannot
 * tell `feature/foo` apart from branch `feature` plus path `foo`.
 *
 * @throws ResourceDescriptorInvalidError for anything else
 */
export function parseResourceUrl(
  input: string,
  options: ParseResourceUrlOptions = {},
): ResourceDescriptor {
  const trimmed = input.trim();
  const defaults = options.branches ?? DEFAULT_BRANCHES;

  if (!/^https?:\/\//i.test(trimmed)) {
    const id = trimmed.split("/tree/")[0] ?? "";
    if (!BARE_ID_PATTERN.test(id)) {
      throw new ResourceDescriptorInvalidError(`unrecognized resource "${input}"`);
    }
    const [owner = "", repo = ""] = id.split("/");
    return buildDescriptor("huggingface", undefined, owner, repo, undefined, defaults, options);
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new ResourceDescriptorInvalidError(`malformed URL "${input}"`);
  }

  const hostname = url.hostname.toLowerCase();
  const parts = url.pathname.split("/").filter((part) => part.length > 0);

  if (HUGGINGFACE_HOSTS.has(hostname) && UNSUPPORTED_HUGGINGFACE_PREFIXES.has(parts[0] ?? "")) {
    throw new ResourceDescriptorInvalidError(`Hugging Face ${parts[0]} are not supported: ${input}`);
  }

  const [owner, rawRepo, marker, branch] = parts;
  if (owner === undefined || rawRepo === undefined) {
    throw new ResourceDescriptorInvalidError(`URL "${input}" does not name an owner and repository`);
  }
  const repo = rawRepo.replace(/\.git$/, "");
  const urlBranch = marker === "tree" ? branch : undefined;

  if (GITHUB_HOSTS.has(hostname)) {
    return buildDescriptor("github", undefined, owner, repo, urlBranch, defaults, options);
  }
  if (HUGGINGFACE_HOSTS.has(hostname)) {
    return buildDescriptor("huggingface", undefined, owner, repo, urlBranch, defaults, options);
  }
  return buildDescriptor("generic", url.host, owner, repo, urlBranch, defaults, options);
}

function buildDescriptor(
  hostKind: "github" | "huggingface" | "generic",
  host: string | undefined,
  owner: string,
  repo: string,
  urlBranch: string | undefined,
  defaults: readonly string[],
  options: ParseResourceUrlOptions,
): ResourceDescriptor {
  return createResourceDescriptor({
    name: options.name ?? `${owner}/${repo}`,
    hostKind,
    owner,
    repo,
    branchCandidates: urlBranch ? [urlBranch, ...defaults] : [...defaults],
    ...(host !== undefined ? { host } : {}),
    ...(options.localDir !== undefined ? { localDir: options.localDir } : {}),
  });
}

/**
 * Display name: explicit name, then `owner/repo`, then the local directory.
 */
export function describeResource(descriptor: ResourceDescriptor): string {
  if (descriptor.name) return descriptor.name;
  if (descriptor.owner && descriptor.repo) return `${descriptor.owner}/${descriptor.repo}`;
  return descriptor.localDir ?? "(unnamed)";
}

function dedupe(values: readonly string[]): string[] {
  return [...new Set(values)];
}
