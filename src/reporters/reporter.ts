import type { SessionSummary } from "../session/aggregator.js";

/** Renders a session summary somewhere. Formatting lives entirely here. */
export interface Reporter {
  name: string;
  report(summary: SessionSummary): void | Promise<void>;
}

export type Writer = (line: string) => void;

export const stdoutWriter: Writer = (line) => {
  process.stdout.write(line + "\n");
};
