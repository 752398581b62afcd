import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createResourceDescriptor } from "../../descriptor.js";
import { evaluateAll, evaluateRampUp, rampUpTime } from "../../pipeline.js";
import type { HttpClient } from "../../types.js";
import { createFakeHttpClient, prose, PIP_QUICKSTART_README } from "../fixtures/readme-fixtures.js";

const GITHUB_MAIN = "https://raw.githubusercontent.com/acme/widgets/main/README.md";
const GITHUB_MASTER = "https://raw.githubusercontent.com/acme/widgets/master/README.md";

const githubWidgets = () =>
  createResourceDescriptor({ hostKind: "github", owner: "acme", repo: "widgets" });

describe("rampUpTime", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "onramp-pipeline-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("scores a local README with an install command and a fence at 0.7", async () => {
    await fs.writeFile(path.join(tmpDir, "README.md"), PIP_QUICKSTART_README);

    const result = await rampUpTime(createResourceDescriptor({ localDir: tmpDir }), { httpClient: null });

    expect(result.score).toBe(0.7);
    expect(Number.isInteger(result.latencyMs)).toBe(true);
    expect(result.latencyMs).toBeGreaterThanOrEqual(0);
  });

  it("returns only score and latency", async () => {
    const result = await rampUpTime(createResourceDescriptor({ localDir: tmpDir }), { httpClient: null });

    expect(Object.keys(result).sort()).toEqual(["latencyMs", "score"]);
  });

  it("scores 0 when no README exists anywhere", async () => {
    const { client, requested } = createFakeHttpClient();

    const result = await rampUpTime(
      createResourceDescriptor({ hostKind: "github", owner: "acme", repo: "widgets", localDir: tmpDir }),
      { httpClient: client },
    );

    expect(result.score).toBe(0);
    expect(requested).toHaveLength(3);
  });

  it("scores 0 for a local-only descriptor without README or HTTP", async () => {
    const result = await rampUpTime(createResourceDescriptor({ localDir: tmpDir }), { httpClient: null });

    expect(result.score).toBe(0);
    expect(result.latencyMs).toBeGreaterThanOrEqual(0);
  });

  it("scores long prose fetched from the second branch at 0.4", async () => {
    const { client, requested } = createFakeHttpClient({
      [GITHUB_MASTER]: { status: 200, body: prose(500) },
    });

    const result = await rampUpTime(githubWidgets(), { httpClient: client });

    expect(result.score).toBe(0.4);
    expect(requested).toEqual([GITHUB_MAIN, GITHUB_MASTER]);
  });

  it("is idempotent for unchanged local content", async () => {
    await fs.writeFile(path.join(tmpDir, "README.rst"), `Installation\n============\n\n${prose(120)}`);
    const descriptor = createResourceDescriptor({ localDir: tmpDir });

    const first = await rampUpTime(descriptor, { httpClient: null });
    const second = await rampUpTime(descriptor, { httpClient: null });

    expect(first.score).toBe(0.6);
    expect(second.score).toBe(first.score);
  });

  it("includes network time in the latency", async () => {
    const slowClient: HttpClient = {
      async get() {
        await new Promise((resolve) => setTimeout(resolve, 30));
        return { status: 200, body: PIP_QUICKSTART_README };
      },
    };

    const result = await rampUpTime(githubWidgets(), { httpClient: slowClient });

    expect(result.score).toBe(0.7);
    expect(result.latencyMs).toBeGreaterThanOrEqual(25);
  });

  it("never rejects when the client throws", async () => {
    const brokenClient: HttpClient = {
      async get() {
        throw new Error("offline");
      },
    };

    await expect(rampUpTime(githubWidgets(), { httpClient: brokenClient })).resolves.toMatchObject({
      score: 0,
    });
  });
});

describe("evaluateRampUp", () => {
  it("keeps the breakdown, README location and attempt trail", async () => {
    const { client } = createFakeHttpClient({ [GITHUB_MAIN]: { status: 200, body: PIP_QUICKSTART_README } });

    const evaluation = await evaluateRampUp(githubWidgets(), { httpClient: client });

    expect(evaluation).toMatchObject({
      name: "acme/widgets",
      score: 0.7,
      readme: { source: "remote", location: GITHUB_MAIN },
      breakdown: { wordCount: 9, length: 0.1, installation: 0.35, code: 0.25, total: 0.7 },
      attempts: [{ source: "remote", location: GITHUB_MAIN, outcome: "found" }],
    });
  });

  it("reports null readme and breakdown when nothing is found", async () => {
    const evaluation = await evaluateRampUp(githubWidgets(), { httpClient: null });

    expect(evaluation.readme).toBeNull();
    expect(evaluation.breakdown).toBeNull();
    expect(evaluation.score).toBe(0);
  });
});

describe("evaluateAll", () => {
  it("evaluates descriptors one after another in input order", async () => {
    const { client, requested } = createFakeHttpClient({
      "https://huggingface.co/acme/tiny-model/raw/main/README.md": { status: 200, body: "tiny" },
      [GITHUB_MAIN]: { status: 200, body: PIP_QUICKSTART_README },
    });
    const descriptors = [
      createResourceDescriptor({ hostKind: "huggingface", owner: "acme", repo: "tiny-model" }),
      githubWidgets(),
    ];

    const evaluations = await evaluateAll(descriptors, { httpClient: client });

    expect(evaluations.map((evaluation) => [evaluation.name, evaluation.score])).toEqual([
      ["acme/tiny-model", 0],
      ["acme/widgets", 0.7],
    ]);
    expect(requested).toEqual([
      "https://huggingface.co/acme/tiny-model/raw/main/README.md",
      GITHUB_MAIN,
    ]);
  });
});
