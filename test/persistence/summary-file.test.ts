import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { configure, resetConfig } from "../../src/config.js";
import { ConfigurationError } from "../../src/errors.js";
import { readSummary, summaryPath, writeSummary } from "../../src/persistence/summary-file.js";
import { setLogLevel } from "../../src/utils/logger.js";
import { sessionSummary } from "../fixtures.js";

describe("summary file", () => {
  let dir: string;

  beforeAll(() => setLogLevel("silent"));

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "summary-"));
  });

  afterEach(async () => {
    resetConfig();
    await rm(dir, { recursive: true, force: true });
  });

  it("defaults to the configured output directory and file name", () => {
    expect(summaryPath()).toBe(join("results", "session-summary.json"));
    configure({ output: { dir: "out", summaryFile: "latest.json" } });
    expect(summaryPath()).toBe(join("out", "latest.json"));
    expect(summaryPath("elsewhere")).toBe(join("elsewhere", "latest.json"));
  });

  it("writes pretty JSON and leaves no temp file behind", async () => {
    const path = join(dir, "nested", "session-summary.json");
    const written = await writeSummary(sessionSummary(), path);

    expect(written).toBe(path);
    expect(await readdir(join(dir, "nested"))).toEqual(["session-summary.json"]);
    const raw = await readFile(path, "utf-8");
    expect(raw.endsWith("}\n")).toBe(true);
    expect(JSON.parse(raw)).toEqual(sessionSummary());
  });

  it("reads back what it wrote", async () => {
    const path = join(dir, "session-summary.json");
    await writeSummary(sessionSummary(), path);

    expect(await readSummary(path)).toEqual(sessionSummary());
  });

  it("rejects a file that is not a session summary", async () => {
    const path = join(dir, "bogus.json");
    await writeFile(path, JSON.stringify({ sessionId: 7 }), "utf-8");

    await expect(readSummary(path)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
