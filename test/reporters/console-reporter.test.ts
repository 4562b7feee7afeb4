import { describe, expect, it } from "vitest";
import { ConsoleReporter, formatTaskLine, JsonReporter } from "../../src/reporters/console-reporter.js";
import { sessionSummary, taskSummary } from "../fixtures.js";

describe("formatTaskLine", () => {
  it("prints a passing task without detail", () => {
    expect(formatTaskLine(taskSummary("Types", { durationSeconds: 3.14159 }))).toBe("[PASS] Types 3.1s");
  });

  it("appends the reason for failures and timeouts", () => {
    expect(
      formatTaskLine(taskSummary("Safety", { status: "failed", durationSeconds: 0, reason: 'dependency "Utils" failed' })),
    ).toBe('[FAIL] Safety 0.0s (dependency "Utils" failed)');
    expect(
      formatTaskLine(taskSummary("Medium", { status: "timed_out", durationSeconds: 1800, reason: "Timed out after 1800s" })),
    ).toBe("[TIME] Medium 1800.0s (Timed out after 1800s)");
  });

  it("omits the parentheses when there is no reason", () => {
    expect(formatTaskLine(taskSummary("x", { status: "failed", durationSeconds: 2 }))).toBe("[FAIL] x 2.0s");
  });
});

describe("ConsoleReporter", () => {
  it("writes one line per task then the totals", () => {
    const lines: string[] = [];
    new ConsoleReporter((line) => lines.push(line)).report(sessionSummary());

    expect(lines).toEqual([
      "[PASS] Types 1.2s",
      "[FAIL] Safety 1.2s (Verifier exited with code 1)",
      "\nFAILURE: 1 succeeded, 1 failed, 0 timed out of 2 in 2.5s",
    ]);
  });
});

describe("JsonReporter", () => {
  it("writes the summary record as JSON", () => {
    const lines: string[] = [];
    new JsonReporter((line) => lines.push(line)).report(sessionSummary());

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toEqual(sessionSummary());
  });
});
