import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { ValidationError } from "@onramp/errors";
import { describe, expect, it } from "vitest";
import { parseArgs, parseUrlList, readUrlFile } from "../../args.js";

const argv = (...args: string[]) => ["node", "onramp", ...args];

describe("parseArgs", () => {
  it("returns defaults with no arguments", () => {
    expect(parseArgs(argv())).toEqual({
      urls: [],
      format: "terminal",
      offline: false,
      verbose: false,
      help: false,
    });
  });

  it("collects positionals as URLs", () => {
    expect(parseArgs(argv("https://github.com/acme/widgets", "acme/tiny-model")).urls).toEqual([
      "https://github.com/acme/widgets",
      "acme/tiny-model",
    ]);
  });

  it("parses every option", () => {
    expect(
      parseArgs(
        argv(
          "--file",
          "urls.txt",
          "--local-dir",
          "./pkg",
          "--branch",
          "dev,main",
          "--branch",
          "trunk",
          "--format",
          "ndjson",
          "--timeout",
          "2500",
          "--offline",
          "--verbose",
        ),
      ),
    ).toEqual({
      urls: [],
      file: "urls.txt",
      localDir: "./pkg",
      branches: ["dev", "main", "trunk"],
      format: "ndjson",
      timeoutMs: 2500,
      offline: true,
      verbose: true,
      help: false,
    });
  });

  it("recognizes -h and --help", () => {
    expect(parseArgs(argv("-h")).help).toBe(true);
    expect(parseArgs(argv("--help")).help).toBe(true);
  });

  it("rejects unknown flags", () => {
    expect(() => parseArgs(argv("--color"))).toThrow("Unknown option: --color");
  });

  it("rejects a flag followed by another flag", () => {
    expect(() => parseArgs(argv("--file", "--offline"))).toThrow("--file requires a value");
  });

  it("rejects an unknown format", () => {
    expect(() => parseArgs(argv("--format", "xml"))).toThrow(
      '--format must be terminal, json or ndjson (got "xml")',
    );
  });

  it.each(["0", "-5", "1.5", "soon"])("rejects --timeout %s", (value) => {
    expect(() => parseArgs(argv("--timeout", value))).toThrow(ValidationError);
  });

  it("quotes the rejected --timeout value", () => {
    expect(() => parseArgs(argv("--timeout", "soon"))).toThrow(
      '--timeout must be a positive integer (got "soon")',
    );
  });
});

describe("parseUrlList", () => {
  it("skips blank lines and comments and splits commas", () => {
    const content = [
      "# models",
      "https://huggingface.co/acme/tiny-model",
      "",
      "  https://github.com/acme/widgets , acme/other  ",
      ",,",
    ].join("\n");

    expect(parseUrlList(content)).toEqual([
      "https://huggingface.co/acme/tiny-model",
      "https://github.com/acme/widgets",
      "acme/other",
    ]);
  });

  it("handles CRLF line endings", () => {
    expect(parseUrlList("a/b\r\nc/d\r\n")).toEqual(["a/b", "c/d"]);
  });
});

describe("readUrlFile", () => {
  it("reads and parses a file", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "onramp-args-"));
    try {
      const file = path.join(dir, "urls.txt");
      await fs.writeFile(file, "# list\nacme/widgets\n");

      expect(await readUrlFile(file)).toEqual(["acme/widgets"]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
