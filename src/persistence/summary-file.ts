import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { getConfig } from "../config.js";
import { parseOrThrow, SessionSummarySchema } from "../schemas.js";
import type { SessionSummary } from "../session/aggregator.js";
import { log } from "../utils/logger.js";

/** Where the summary lands: `<output.dir>/<output.summaryFile>` unless overridden. */
export function summaryPath(outputDir?: string): string {
  const { output } = getConfig();
  return join(outputDir ?? output.dir, output.summaryFile);
}

/** Write the summary as JSON to a temp file, then rename it into place. */
export async function writeSummary(summary: SessionSummary, path: string = summaryPath()): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.${process.pid}.tmp`;
  await writeFile(tmp, JSON.stringify(summary, null, 2) + "\n", "utf-8");
  await rename(tmp, path);
  log.info(`Session summary written to ${path}`);
  return path;
}

export async function readSummary(path: string = summaryPath()): Promise<SessionSummary> {
  const raw = await readFile(path, "utf-8");
  return parseOrThrow(SessionSummarySchema, JSON.parse(raw), `session summary ${path}`, "INVALID_FILE");
}
