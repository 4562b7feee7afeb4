import { readFile } from "node:fs/promises";
import { configure } from "./config.js";
import { ConfigurationError } from "./errors.js";
import type { TaskDeclarations } from "./graph/types.js";
import { ConfigFileSchema, parseOrThrow, TaskListFileSchema, TaskMapFileSchema } from "./schemas.js";

async function readJson(path: string, what: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError("INVALID_FILE", `Cannot read ${what} ${path}`, { cause: err });
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError("INVALID_FILE", `${what} ${path} is not valid JSON: ${detail}`, { cause: err });
  }
}

/**
 * Read and validate a task declaration file. Declaration order is file order;
 * prefer the list form when task names look like integers, since JSON object
 * keys of that shape do not keep their order.
 */
export async function loadTaskFile(path: string): Promise<TaskDeclarations> {
  const data = await readJson(path, "task file");
  const what = `task file ${path}`;
  if (typeof data === "object" && data !== null && "tasks" in data && Array.isArray(data.tasks)) {
    return parseOrThrow(TaskListFileSchema, data, what, "INVALID_FILE").tasks;
  }
  return parseOrThrow(TaskMapFileSchema, data, what, "INVALID_FILE");
}

/** Read a configuration override file and merge it over the defaults. */
export async function loadConfigFile(path: string): Promise<void> {
  const overrides = parseOrThrow(ConfigFileSchema, await readJson(path, "config file"), `config file ${path}`, "INVALID_FILE");
  configure(overrides);
}
