import * as fs from "node:fs/promises";
import { ValidationError } from "@onramp/errors";

// ---------------------------------------------------------------------------
// Argument parsing (minimal, no external CLI lib)
// ---------------------------------------------------------------------------

export type OutputFormat = "terminal" | "json" | "ndjson";

export interface CliArgs {
  readonly urls: readonly string[];
  readonly file?: string;
  readonly localDir?: string;
  readonly branches?: readonly string[];
  readonly format: OutputFormat;
  readonly offline: boolean;
  readonly timeoutMs?: number;
  readonly verbose: boolean;
  readonly help: boolean;
}

export function invalidArgument(message: string): ValidationError<"VALIDATION_FAILED"> {
  return new ValidationError({ code: "VALIDATION_FAILED", message });
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("--")) {
    throw invalidArgument(`${flag} requires a value`);
  }
  return value;
}

/**
 * Parse `process.argv`-shaped input (the first two entries are skipped).
 *
 * @throws ValidationError (VALIDATION_FAILED) for unknown flags or missing values
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const urls: string[] = [];
  let file: string | undefined;
  let localDir: string | undefined;
  let branches: string[] | undefined;
  let format: OutputFormat = "terminal";
  let offline = false;
  let timeoutMs: number | undefined;
  let verbose = false;
  let help = false;

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === undefined) continue;

    switch (arg) {
      case "--file":
        file = requireValue(arg, next);
        i++;
        break;
      case "--local-dir":
        localDir = requireValue(arg, next);
        i++;
        break;
      case "--branch":
        branches = [
          ...(branches ?? []),
          ...requireValue(arg, next)
            .split(",")
            .map((branch) => branch.trim())
            .filter((branch) => branch.length > 0),
        ];
        i++;
        break;
      case "--format": {
        const value = requireValue(arg, next);
        if (value !== "terminal" && value !== "json" && value !== "ndjson") {
          throw invalidArgument(`--format must be terminal, json or ndjson (got "${value}")`);
        }
        format = value;
        i++;
        break;
      }
      case "--timeout": {
        const raw = requireValue(arg, next);
        const value = Number(raw);
        if (!Number.isInteger(value) || value <= 0) {
          throw invalidArgument(`--timeout must be a positive integer (got "${raw}")`);
        }
        timeoutMs = value;
        i++;
        break;
      }
      case "--offline":
        offline = true;
        break;
      case "--verbose":
        verbose = true;
        break;
      case "--help":
      case "-h":
        help = true;
        break;
      default:
        if (arg.startsWith("-")) {
          throw invalidArgument(`Unknown option: ${arg}`);
        }
        urls.push(arg);
    }
  }

  return {
    urls,
    format,
    offline,
    verbose,
    help,
    ...(file !== undefined ? { file } : {}),
    ...(localDir !== undefined ? { localDir } : {}),
    ...(branches !== undefined && branches.length > 0 ? { branches } : {}),
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
  };
}

/**
 * Read resource entries from a file: one per line, blank lines and `#`
 * comments skipped, comma-separated fields each taken as an entry.
 */
export async function readUrlFile(filePath: string): Promise<string[]> {
  const content = await fs.readFile(filePath, "utf8");
  return parseUrlList(content);
}

export function parseUrlList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"))
    .flatMap((line) => line.split(","))
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export const HELP_TEXT = `
onramp: README ramp-up time for packages, models and repositories

Usage: onramp [options] [url...]

Arguments:
  url                      GitHub or Hugging Face URL, owner/repo id, or any
                           https://{host}/{owner}/{repo} URL

Options:
  --file <path>            Read resources from a file (one per line; unsupported
                           entries are reported and skipped)
  --local-dir <dir>        Local checkout to read the README from first
  --branch <a,b>           Branch candidates for remote lookup (default: main,master)
  --format terminal|json|ndjson  Output format (default: terminal)
  --offline                Never fetch remote READMEs
  --timeout <ms>           Per-request HTTP timeout (default: 10000)
  --verbose                Show every file and URL tried
  --help                   Show this help message

Environment:
  ONRAMP_HTTP_TIMEOUT_MS, ONRAMP_OFFLINE, ONRAMP_BRANCHES, ONRAMP_LOG_LEVEL
`;
