import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { configure, resetConfig } from "../src/config.js";
import { ConfigurationError, CycleDetectedError } from "../src/errors.js";
import { SessionStore } from "../src/persistence/store.js";
import { readSummary } from "../src/persistence/summary-file.js";
import type { Reporter } from "../src/reporters/reporter.js";
import { VerificationRunner } from "../src/runner.js";
import type { SessionSummary } from "../src/session/aggregator.js";
import { setLogLevel } from "../src/utils/logger.js";
import { FunctionVerifier } from "../src/verifiers/function-verifier.js";

const chain = [
  { id: "Types", kind: "proof-check" as const, dependsOn: [] },
  { id: "Utils", kind: "proof-check" as const, dependsOn: ["Types"] },
  { id: "Safety", kind: "proof-check" as const, dependsOn: ["Utils"] },
  { id: "Liveness", kind: "proof-check" as const, dependsOn: ["Safety"] },
  { id: "Small", kind: "model-check" as const, target: "models/Small.cfg", dependsOn: [] },
];

/** Verifier whose exit code per task comes from a table; "hang" waits for an abort. */
function scripted(exitCodes: Record<string, number | "hang"> = {}, calls: string[] = []): FunctionVerifier {
  return new FunctionVerifier({
    name: "scripted",
    fn: async (taskId) => {
      calls.push(taskId);
      const code = exitCodes[taskId] ?? 0;
      if (code === "hang") return new Promise<never>(() => {});
      return code;
    },
  });
}

describe("VerificationRunner", () => {
  let dir: string;

  beforeAll(() => setLogLevel("silent"));

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "runner-"));
    configure({ timeouts: { graceMs: 20 } });
  });

  afterEach(async () => {
    resetConfig();
    await rm(dir, { recursive: true, force: true });
  });

  it("rejects a cyclic declaration set on construction", () => {
    expect(
      () =>
        new VerificationRunner([
          { id: "a", dependsOn: ["b"] },
          { id: "b", dependsOn: ["a"] },
        ]),
    ).toThrow(CycleDetectedError);
  });

  it("plans a target without running anything", () => {
    const calls: string[] = [];
    const runner = new VerificationRunner(chain);
    runner.addVerifier(scripted({}, calls));

    const plan = runner.plan("Safety");

    expect(plan.target).toEqual(["Safety"]);
    expect(plan.order).toEqual(["Types", "Utils", "Safety"]);
    expect(plan.levels).toEqual([["Types"], ["Utils"], ["Safety"]]);
    expect(plan.tasks[2]).toEqual({
      id: "Safety",
      kind: "proof-check",
      target: "Safety",
      dependsOn: ["Utils"],
      timeoutSeconds: undefined,
    });
    expect(calls).toEqual([]);
  });

  it("plans every task for the default target", () => {
    const plan = new VerificationRunner(chain).plan();

    expect(plan.order).toEqual(["Types", "Utils", "Safety", "Liveness", "Small"]);
    expect(plan.levels).toEqual([["Types", "Small"], ["Utils"], ["Safety"], ["Liveness"]]);
  });

  it("runs a target, writes the summary and exits 0", async () => {
    const calls: string[] = [];
    const runner = new VerificationRunner(chain);
    runner.addVerifier(scripted({}, calls));

    const result = await runner.run("Safety", { concurrency: 2, timeoutSeconds: 10, outputDir: dir });

    expect(calls).toEqual(["Types", "Utils", "Safety"]);
    expect(result.exitCode).toBe(0);
    expect(result.summary.overallStatus).toBe("success");
    expect(result.summaryPath).toBe(join(dir, "session-summary.json"));
    expect(await readSummary(join(dir, "session-summary.json"))).toEqual(result.summary);
  });

  it("exits 1 when a task fails", async () => {
    const runner = new VerificationRunner(chain);
    runner.addVerifier(scripted({ Utils: 3 }));

    const result = await runner.run("Liveness", { concurrency: 1, timeoutSeconds: 10, writeSummary: false });

    expect(result.exitCode).toBe(1);
    expect(result.summaryPath).toBeUndefined();
    expect(result.summary.counts).toMatchObject({ succeeded: 1, failed: 3, propagated: 2 });
  });

  it("exits 2 when the only problem is a timeout", async () => {
    const runner = new VerificationRunner(chain);
    runner.addVerifier(scripted({ Small: "hang" }));

    const result = await runner.run(["Small", "Types"], {
      concurrency: 2,
      timeoutSeconds: 0.05,
      writeSummary: false,
    });

    expect(result.exitCode).toBe(2);
    expect(result.summary.overallStatus).toBe("timeout");
    expect(result.summary.tasks.find((t) => t.id === "Small")?.status).toBe("timed_out");
  });

  it("exits 1 when a timeout cascades into a failed dependent", async () => {
    const runner = new VerificationRunner(chain);
    runner.addVerifier(scripted({ Types: "hang" }));

    const result = await runner.run("Utils", { concurrency: 1, timeoutSeconds: 0.05, writeSummary: false });

    expect(result.exitCode).toBe(1);
    expect(result.summary.overallStatus).toBe("failure");
    expect(result.summary.tasks.map((t) => t.status)).toEqual(["timed_out", "failed"]);
  });

  it("exits 4 when interrupted", async () => {
    const calls: string[] = [];
    const runner = new VerificationRunner(chain);
    runner.addVerifier(scripted({}, calls));
    const controller = new AbortController();
    controller.abort();

    const result = await runner.run("Safety", {
      concurrency: 1,
      timeoutSeconds: 10,
      writeSummary: false,
      abortSignal: controller.signal,
    });

    expect(calls).toEqual([]);
    expect(result.exitCode).toBe(4);
    expect(result.summary.interrupted).toBe(true);
    expect(result.summary.counts.cancelled).toBe(3);
  });

  it("rejects an unknown task before running anything", async () => {
    const calls: string[] = [];
    const runner = new VerificationRunner(chain);
    runner.addVerifier(scripted({}, calls));

    await expect(runner.run("Nope", { writeSummary: false })).rejects.toBeInstanceOf(ConfigurationError);
    expect(calls).toEqual([]);
  });

  it("rejects an invalid concurrency before running anything", async () => {
    const runner = new VerificationRunner(chain);
    runner.addVerifier(scripted());

    await expect(runner.run("Safety", { concurrency: 0, writeSummary: false })).rejects.toThrow(
      "concurrency must be at least 1",
    );
  });

  it("records the session and hands it to every reporter", async () => {
    const store = new SessionStore(":memory:");
    const reported: SessionSummary[] = [];
    const reporter: Reporter = { name: "memory", report: (summary) => void reported.push(summary) };
    const runner = new VerificationRunner(chain, { store, reporters: [reporter] });
    runner.addVerifier(scripted());

    const result = await runner.run("Small", { concurrency: 1, timeoutSeconds: 10, writeSummary: false });

    expect(reported).toEqual([result.summary]);
    expect(store.get(result.summary.sessionId)).toEqual(result.summary);
    runner.shutdown();
  });

  it("passes retries through to the executor", async () => {
    let attempts = 0;
    configure({ timeouts: { graceMs: 20 }, retry: { baseDelayMs: 1, maxDelayMs: 1 } });
    const runner = new VerificationRunner([{ id: "flaky", dependsOn: [] }]);
    runner.addVerifier(
      new FunctionVerifier({
        name: "flaky",
        fn: async () => {
          attempts++;
          if (attempts === 1) throw new Error("spawn EAGAIN");
          return 0;
        },
      }),
    );

    const result = await runner.run("flaky", { retries: 1, timeoutSeconds: 10, writeSummary: false });

    expect(attempts).toBe(2);
    expect(result.exitCode).toBe(0);
  });
});
