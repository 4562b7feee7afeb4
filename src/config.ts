import { availableParallelism } from "node:os";
import type { TaskKind } from "./graph/types.js";

/** How a verification engine is started for one task of a given kind. */
export type VerifierInvocation = {
  command: string;
  /** `{task}` and `{target}` are substituted per task. */
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
};

export type RunnerConfig = {
  timeouts: {
    /** Per-task timeout in seconds; 0 disables it. */
    taskDefaultSeconds: number;
    /** How long a timed-out or cancelled verifier may take to wind down. */
    graceMs: number;
    /** Delay between SIGTERM and SIGKILL for spawned engines. */
    killGraceMs: number;
  };
  retry: {
    baseDelayMs: number;
    maxDelayMs: number;
  };
  limits: {
    maxConcurrency: number;
    /** Extra attempts when a verifier cannot be started at all. */
    retries: number;
  };
  output: {
    dir: string;
    summaryFile: string;
    logsDir: string;
  };
  history: {
    dbPath: string;
  };
  verifiers: Record<TaskKind, VerifierInvocation>;
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends readonly unknown[]
    ? T[P]
    : T[P] extends object
      ? DeepPartial<T[P]>
      : T[P];
};

const DEFAULTS: RunnerConfig = {
  timeouts: {
    taskDefaultSeconds: 1_800,
    graceMs: 2_000,
    killGraceMs: 1_000,
  },
  retry: {
    baseDelayMs: 500,
    maxDelayMs: 10_000,
  },
  limits: {
    maxConcurrency: Math.max(1, availableParallelism()),
    retries: 0,
  },
  output: {
    dir: "results",
    summaryFile: "session-summary.json",
    logsDir: "logs",
  },
  history: {
    dbPath: "results/history.db",
  },
  verifiers: {
    "model-check": {
      command: "java",
      args: ["-cp", "tla2tools.jar", "tlc2.TLC", "-workers", "auto", "-config", "{target}"],
    },
    "proof-check": {
      command: "tlapm",
      args: ["--toolbox", "0", "0", "{target}"],
    },
    "test-harness": {
      command: "cargo",
      args: ["test", "--release", "--test", "{target}"],
    },
  },
};

let current: RunnerConfig = structuredClone(DEFAULTS);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const result = structuredClone(base);
  for (const [key, val] of Object.entries(overrides)) {
    if (val === undefined) continue;
    const existing = result[key];
    result[key] = isPlainObject(val) && isPlainObject(existing) ? deepMerge(existing, val) : structuredClone(val);
  }
  return result;
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<RunnerConfig>): void {
  current = deepMerge(DEFAULTS, overrides) as RunnerConfig;
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<RunnerConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<RunnerConfig> = Object.freeze(structuredClone(DEFAULTS));
