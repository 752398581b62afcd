import { isValidationError, ResourceDescriptorInvalidError, wrapError } from "@onramp/errors";
import { type CliArgs, HELP_TEXT, invalidArgument, parseArgs, readUrlFile } from "./args.js";
import { createRampUpOptions, resolveConfig } from "./config.js";
import { createResourceDescriptor, parseResourceUrl } from "./descriptor.js";
import { evaluateAll } from "./pipeline.js";
import { JsonReporter } from "./reporters/json-reporter.js";
import { NdjsonReporter } from "./reporters/ndjson-reporter.js";
import { TerminalReporter } from "./reporters/terminal-reporter.js";
import type { RampUpReporter } from "./reporters/types.js";
import type { HttpClient, RampUpConfig, RampUpReport, ResourceDescriptor } from "./types.js";

export interface CliIo {
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly stdout?: (text: string) => void;
  readonly stderr?: (text: string) => void;
  /** Replaces the configured HTTP client unless offline; `null` forces local-only lookup */
  readonly httpClient?: HttpClient | null;
}

function createReporter(args: CliArgs): RampUpReporter {
  switch (args.format) {
    case "json":
      return new JsonReporter();
    case "ndjson":
      return new NdjsonReporter();
    case "terminal":
      return new TerminalReporter({ verbose: args.verbose });
  }
}

function configFromArgs(args: CliArgs): RampUpConfig {
  return {
    ...(args.timeoutMs !== undefined ? { timeoutMs: args.timeoutMs } : {}),
    ...(args.offline ? { offline: true } : {}),
    ...(args.branches !== undefined ? { branches: args.branches } : {}),
    ...(args.verbose ? { logLevel: "debug" as const } : {}),
  };
}

function toDescriptor(entry: string, args: CliArgs, branches: readonly string[]): ResourceDescriptor {
  return parseResourceUrl(entry, {
    branches,
    ...(args.localDir !== undefined ? { localDir: args.localDir } : {}),
  });
}

/**
 * Positional URLs must all parse. Entries read from `--file` are taken one at
 * a time: an entry that names no supported resource (a dataset link in a
 * `code,dataset,model` line, say) is reported on stderr and skipped.
 */
async function buildDescriptors(
  args: CliArgs,
  branches: readonly string[],
  stderr: (text: string) => void,
): Promise<ResourceDescriptor[]> {
  const fileEntries = args.file !== undefined ? await readUrlFile(args.file) : [];
  const entryCount = args.urls.length + fileEntries.length;

  if (entryCount === 0) {
    if (args.localDir === undefined) {
      throw invalidArgument("No resources given (pass a URL, --file or --local-dir)");
    }
    return [createResourceDescriptor({ name: args.localDir, localDir: args.localDir })];
  }

  if (args.localDir !== undefined && entryCount > 1) {
    throw invalidArgument("--local-dir can only be combined with a single resource");
  }

  const descriptors = args.urls.map((entry) => toDescriptor(entry, args, branches));

  for (const entry of fileEntries) {
    try {
      descriptors.push(toDescriptor(entry, args, branches));
    } catch (err) {
      if (!(err instanceof ResourceDescriptorInvalidError)) throw err;
      stderr(`Skipping "${entry}": ${err.message}`);
    }
  }

  return descriptors;
}

/**
 * Run the CLI against `process.argv`-shaped input.
 *
 * @returns exit code: 0 on success, 1 for invalid input or an unexpected fault
 */
export async function runCli(argv: readonly string[], io: CliIo = {}): Promise<number> {
  const stdout = io.stdout ?? ((text: string) => console.log(text));
  const stderr = io.stderr ?? ((text: string) => console.error(text));

  try {
    const args = parseArgs(argv);
    if (args.help) {
      stdout(HELP_TEXT);
      return 0;
    }

    const config = resolveConfig(configFromArgs(args), io.env ?? process.env);
    const configured = createRampUpOptions(config);
    const options =
      io.httpClient === undefined || config.offline
        ? configured
        : { ...configured, httpClient: io.httpClient };

    const descriptors = await buildDescriptors(args, config.branches, stderr);

    const startedAt = new Date().toISOString();
    const startTime = performance.now();
    const evaluations = await evaluateAll(descriptors, options);
    const report: RampUpReport = {
      startedAt,
      completedAt: new Date().toISOString(),
      durationMs: Math.round(performance.now() - startTime),
      evaluations,
    };

    stdout(createReporter(args).report(report));
    return 0;
  } catch (err) {
    if (isValidationError(err)) {
      stderr(`Error: ${err.message}`);
      return 1;
    }
    const error = wrapError(err);
    stderr(`Fatal: ${error.message}`);
    return 1;
  }
}
