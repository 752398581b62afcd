import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { ReadmeFetchError, ReadmeRemoteUnavailableError } from "@onramp/errors";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createResourceDescriptor } from "../../descriptor.js";
import { readReadme, remoteCandidates, resolveReadme } from "../../resolver.js";
import type { HttpClient } from "../../types.js";
import { createFakeHttpClient } from "../fixtures/readme-fixtures.js";

const GITHUB_MAIN = "https://raw.githubusercontent.com/acme/widgets/main/README.md";
const GITHUB_MASTER = "https://raw.githubusercontent.com/acme/widgets/master/README.md";
const GITHUB_HEAD = "https://github.com/acme/widgets/raw/HEAD/README.md";

const githubWidgets = () =>
  createResourceDescriptor({ hostKind: "github", owner: "acme", repo: "widgets" });

describe("remoteCandidates", () => {
  it("lists GitHub raw URLs per branch, then the HEAD guess", () => {
    expect(remoteCandidates(githubWidgets())).toEqual([GITHUB_MAIN, GITHUB_MASTER, GITHUB_HEAD]);
  });

  it("lists Hugging Face raw URLs per branch", () => {
    const descriptor = createResourceDescriptor({
      hostKind: "huggingface",
      owner: "acme",
      repo: "tiny-model",
    });
    expect(remoteCandidates(descriptor)).toEqual([
      "https://huggingface.co/acme/tiny-model/raw/main/README.md",
      "https://huggingface.co/acme/tiny-model/raw/master/README.md",
      "https://huggingface.co/acme/tiny-model/raw/HEAD/README.md",
    ]);
  });

  it("uses the descriptor host for generic kinds", () => {
    const descriptor = createResourceDescriptor({
      hostKind: "generic",
      host: "git.example.test",
      owner: "acme",
      repo: "widgets",
      branchCandidates: ["trunk"],
    });
    expect(remoteCandidates(descriptor)).toEqual([
      "https://git.example.test/acme/widgets/raw/trunk/README.md",
      "https://git.example.test/acme/widgets/raw/HEAD/README.md",
    ]);
  });

  it("drops a HEAD branch that duplicates the final guess", () => {
    const descriptor = createResourceDescriptor({
      hostKind: "generic",
      host: "git.example.test",
      owner: "acme",
      repo: "widgets",
      branchCandidates: ["HEAD"],
    });
    expect(remoteCandidates(descriptor)).toEqual([
      "https://git.example.test/acme/widgets/raw/HEAD/README.md",
    ]);
  });

  it("returns nothing for local-only descriptors", () => {
    expect(remoteCandidates(createResourceDescriptor({ localDir: "/tmp" }))).toEqual([]);
  });
});

describe("resolveReadme: local", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "onramp-resolver-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("prefers README.md over the other filenames", async () => {
    await fs.writeFile(path.join(tmpDir, "README.md"), "markdown");
    await fs.writeFile(path.join(tmpDir, "README.rst"), "restructured");

    const { readme, attempts } = await resolveReadme(createResourceDescriptor({ localDir: tmpDir }), {
      httpClient: null,
    });

    expect(readme).toEqual({
      text: "markdown",
      source: "local",
      location: path.join(tmpDir, "README.md"),
    });
    expect(attempts).toEqual([
      { source: "local", location: path.join(tmpDir, "README.md"), outcome: "found" },
    ]);
  });

  it("falls through README.rst and README.txt to a bare README", async () => {
    await fs.writeFile(path.join(tmpDir, "README"), "plain");

    const { readme, attempts } = await resolveReadme(createResourceDescriptor({ localDir: tmpDir }), {
      httpClient: null,
    });

    expect(readme?.location).toBe(path.join(tmpDir, "README"));
    expect(attempts.map((attempt) => attempt.outcome)).toEqual([
      "missing",
      "missing",
      "missing",
      "found",
    ]);
  });

  it("ignores a directory named like a README", async () => {
    await fs.mkdir(path.join(tmpDir, "README.md"));
    await fs.writeFile(path.join(tmpDir, "README.txt"), "text");

    const readme = await readReadme(createResourceDescriptor({ localDir: tmpDir }), { httpClient: null });

    expect(readme?.text).toBe("text");
  });

  it("replaces invalid UTF-8 bytes with U+FFFD", async () => {
    await fs.writeFile(path.join(tmpDir, "README.md"), Buffer.from([0x48, 0x69, 0xff, 0x21]));

    const readme = await readReadme(createResourceDescriptor({ localDir: tmpDir }), { httpClient: null });

    expect(readme?.text).toBe("Hi\uFFFD!");
  });

  it("returns null for a directory without a README", async () => {
    const { readme, attempts } = await resolveReadme(createResourceDescriptor({ localDir: tmpDir }), {
      httpClient: null,
    });

    expect(readme).toBeNull();
    expect(attempts).toHaveLength(4);
  });

  it("skips a local path that is not a directory", async () => {
    const missing = path.join(tmpDir, "does-not-exist");

    const { readme, attempts } = await resolveReadme(createResourceDescriptor({ localDir: missing }), {
      httpClient: null,
    });

    expect(readme).toBeNull();
    expect(attempts).toEqual([{ source: "local", location: missing, outcome: "skipped" }]);
  });

  it("never calls the HTTP client when a local README exists", async () => {
    await fs.writeFile(path.join(tmpDir, "README.md"), "local wins");
    const { client, get } = createFakeHttpClient({
      [GITHUB_MAIN]: { status: 200, body: "remote" },
    });

    const readme = await readReadme(
      createResourceDescriptor({ hostKind: "github", owner: "acme", repo: "widgets", localDir: tmpDir }),
      { httpClient: client },
    );

    expect(readme?.text).toBe("local wins");
    expect(get).not.toHaveBeenCalled();
  });
});

describe("resolveReadme: remote", () => {
  it("tries branches in order and stops at the first 200", async () => {
    const { client, requested } = createFakeHttpClient({
      [GITHUB_MASTER]: { status: 200, body: "# Widgets" },
    });

    const { readme, attempts } = await resolveReadme(githubWidgets(), { httpClient: client });

    expect(readme).toEqual({ text: "# Widgets", source: "remote", location: GITHUB_MASTER });
    expect(requested).toEqual([GITHUB_MAIN, GITHUB_MASTER]);
    expect(attempts.map((attempt) => attempt.outcome)).toEqual(["failed", "found"]);

    const failure = attempts[0]?.error;
    expect(failure).toBeInstanceOf(ReadmeFetchError);
    if (failure instanceof ReadmeFetchError) {
      expect(failure.status).toBe(404);
      expect(failure.message).toBe(`README fetch from ${GITHUB_MAIN} failed: HTTP 404`);
    }
  });

  it("treats non-200 success codes as not found", async () => {
    const { client, requested } = createFakeHttpClient({
      [GITHUB_MAIN]: { status: 204, body: "" },
      [GITHUB_MASTER]: { status: 301, body: "" },
    });

    const readme = await readReadme(githubWidgets(), { httpClient: client });

    expect(readme).toBeNull();
    expect(requested).toEqual([GITHUB_MAIN, GITHUB_MASTER, GITHUB_HEAD]);
  });

  it("moves past a client that rejects", async () => {
    const client: HttpClient = {
      async get(url) {
        if (url === GITHUB_MAIN) throw new Error("ECONNRESET");
        if (url === GITHUB_MASTER) throw new ReadmeFetchError(url, "request timed out after 10ms");
        return { status: 200, body: "head readme" };
      },
    };

    const { readme, attempts } = await resolveReadme(githubWidgets(), { httpClient: client });

    expect(readme?.location).toBe(GITHUB_HEAD);
    expect(attempts.map((attempt) => attempt.error?.message)).toEqual([
      `README fetch from ${GITHUB_MAIN} failed: ECONNRESET`,
      `README fetch from ${GITHUB_MASTER} failed: request timed out after 10ms`,
      undefined,
    ]);
  });

  it("skips every candidate when no client is available", async () => {
    const { readme, attempts } = await resolveReadme(githubWidgets(), { httpClient: null });

    expect(readme).toBeNull();
    expect(attempts.map((attempt) => attempt.outcome)).toEqual(["skipped", "skipped", "skipped"]);
    expect(attempts[0]?.error).toBeInstanceOf(ReadmeRemoteUnavailableError);
  });

  it("issues no requests once the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const { client, get } = createFakeHttpClient();

    const { readme, attempts } = await resolveReadme(githubWidgets(), {
      httpClient: client,
      signal: controller.signal,
    });

    expect(readme).toBeNull();
    expect(get).not.toHaveBeenCalled();
    expect(attempts).toHaveLength(3);
  });

  it("passes the signal through to the client", async () => {
    const controller = new AbortController();
    const { client, get } = createFakeHttpClient({ [GITHUB_MAIN]: { status: 200, body: "ok" } });

    await readReadme(githubWidgets(), { httpClient: client, signal: controller.signal });

    expect(get).toHaveBeenCalledWith(GITHUB_MAIN, controller.signal);
  });
});
