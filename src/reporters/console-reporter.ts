import type { SessionSummary, TaskSummary } from "../session/aggregator.js";
import { stdoutWriter, type Reporter, type Writer } from "./reporter.js";

const STATUS_LABEL: Record<TaskSummary["status"], string> = {
  succeeded: "PASS",
  failed: "FAIL",
  timed_out: "TIME",
};

export function formatTaskLine(task: TaskSummary): string {
  const duration = `${task.durationSeconds.toFixed(1)}s`;
  const detail = task.status === "succeeded" ? "" : task.reason ? ` (${task.reason})` : "";
  return `[${STATUS_LABEL[task.status]}] ${task.id} ${duration}${detail}`;
}

/** Plain text: one line per task, then totals. */
export class ConsoleReporter implements Reporter {
  readonly name = "console";
  private write: Writer;

  constructor(write: Writer = stdoutWriter) {
    this.write = write;
  }

  report(summary: SessionSummary): void {
    for (const task of summary.tasks) this.write(formatTaskLine(task));
    const { counts } = summary;
    this.write(
      `\n${summary.overallStatus.toUpperCase()}: ${counts.succeeded} succeeded, ${counts.failed} failed, ` +
        `${counts.timedOut} timed out of ${counts.total} in ${summary.durationSeconds.toFixed(1)}s`,
    );
  }
}

/** The summary record itself, as pretty-printed JSON. */
export class JsonReporter implements Reporter {
  readonly name = "json";
  private write: Writer;

  constructor(write: Writer = stdoutWriter) {
    this.write = write;
  }

  report(summary: SessionSummary): void {
    this.write(JSON.stringify(summary, null, 2));
  }
}
