import { spawn } from "node:child_process";
import { once } from "node:events";
import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import { constants } from "node:os";
import { join } from "node:path";
import { getConfig, type VerifierInvocation } from "../config.js";
import type { TaskKind } from "../graph/types.js";
import { log } from "../utils/logger.js";
import type { Verifier, VerifierContext, VerifierResult } from "./verifier.js";

export type ProcessVerifierOptions = {
  name?: string;
  /** Per-kind overrides of the configured invocation table. */
  invocations?: Partial<Record<TaskKind, VerifierInvocation>>;
  /** Directory for per-task logs (default: `<output.dir>/<output.logsDir>`). */
  logDir?: string;
  killGraceMs?: number;
};

export type ExpandedInvocation = {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
};

/** Substitute `{task}` and `{target}` in an invocation's arguments. */
export function expandInvocation(
  invocation: VerifierInvocation,
  vars: { task: string; target: string },
): ExpandedInvocation {
  return {
    command: invocation.command,
    args: invocation.args.map((arg) => arg.replaceAll("{task}", vars.task).replaceAll("{target}", vars.target)),
    cwd: invocation.cwd,
    env: invocation.env,
  };
}

/** Log file name for a task id; path separators and the like become `_`. */
export function logFileName(taskId: string): string {
  return `${taskId.replace(/[^A-Za-z0-9._-]/g, "_")}.log`;
}

/** Shell convention for a child killed by a signal: 128 + signal number. */
function signalExitCode(signal: NodeJS.Signals | null): number {
  const signo = Object.entries(constants.signals).find(([name]) => name === signal)?.[1];
  return signo === undefined ? 1 : 128 + signo;
}

/**
 * Spawns the engine configured for a task's kind and writes its combined
 * output to a log file. On abort the child gets SIGTERM, then SIGKILL.
 */
export class ProcessVerifier implements Verifier {
  readonly name: string;
  readonly type = "process" as const;

  private invocations: Partial<Record<TaskKind, VerifierInvocation>>;
  private logDir?: string;
  private killGraceMs?: number;

  constructor(opts: ProcessVerifierOptions = {}) {
    this.name = opts.name ?? "process";
    this.invocations = opts.invocations ?? {};
    this.logDir = opts.logDir;
    this.killGraceMs = opts.killGraceMs;
  }

  invocationFor(kind: TaskKind, vars: { task: string; target: string }): ExpandedInvocation {
    const invocation = this.invocations[kind] ?? getConfig().verifiers[kind];
    return expandInvocation(invocation, vars);
  }

  async execute(taskId: string, timeoutSeconds: number, context: VerifierContext): Promise<VerifierResult> {
    const config = getConfig();
    const logDir = this.logDir ?? join(config.output.dir, config.output.logsDir);
    const killGraceMs = this.killGraceMs ?? config.timeouts.killGraceMs;
    const { command, args, cwd, env } = this.invocationFor(context.kind, { task: taskId, target: context.target });

    await mkdir(logDir, { recursive: true });
    const logPath = join(logDir, logFileName(taskId));
    const out = createWriteStream(logPath);
    // Rejects with the open error (EISDIR, EACCES) before anything is spawned.
    await once(out, "open");

    log.info(`[${this.name}] Starting "${taskId}"`, { command, args, timeoutSeconds });
    const start = Date.now();

    return new Promise<VerifierResult>((resolve, reject) => {
      const child = spawn(command, args, {
        cwd,
        env: { ...process.env, ...env },
        stdio: ["ignore", "pipe", "pipe"],
      });
      child.stdout.pipe(out, { end: false });
      child.stderr.pipe(out, { end: false });

      let settled = false;
      let killTimer: ReturnType<typeof setTimeout> | null = null;

      const onAbort = (): void => {
        log.debug(`[${this.name}] Terminating "${taskId}"`, { pid: child.pid });
        child.kill("SIGTERM");
        killTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) child.kill("SIGKILL");
        }, killGraceMs);
      };

      const finish = (): void => {
        settled = true;
        context.signal.removeEventListener("abort", onAbort);
        if (killTimer !== null) clearTimeout(killTimer);
        out.end();
      };

      child.once("error", (err) => {
        if (settled) return;
        finish();
        reject(err);
      });

      out.on("error", (err) => {
        if (settled) return;
        log.error(`[${this.name}] Log for "${taskId}" failed`, { logPath, error: err.message });
        finish();
        child.kill("SIGKILL");
        reject(err);
      });

      child.once("close", (code, signal) => {
        if (settled) return;
        finish();
        resolve({
          exitCode: code ?? signalExitCode(signal),
          durationSeconds: (Date.now() - start) / 1000,
          logPath,
        });
      });

      if (context.signal.aborted) onAbort();
      else context.signal.addEventListener("abort", onAbort, { once: true });
    });
  }
}
