import type { TaskKind } from "../graph/types.js";
import { log } from "../utils/logger.js";
import type { Verifier, VerifierContext, VerifierResult } from "./verifier.js";

/** Returns an exit code, or an exit code with the location of its log. */
export type VerifierFunction = (
  taskId: string,
  context: VerifierContext & { timeoutSeconds: number },
) => Promise<number | { exitCode: number; logPath?: string }>;

export type FunctionVerifierOptions = {
  name: string;
  fn: VerifierFunction;
  kinds?: TaskKind[];
};

export class VerifierAbortedError extends Error {
  constructor(taskId: string) {
    super(`Verification of "${taskId}" was aborted`);
    this.name = "VerifierAbortedError";
  }
}

/** Runs a task through an in-process async function. */
export class FunctionVerifier implements Verifier {
  readonly name: string;
  readonly type = "function" as const;
  readonly kinds?: TaskKind[];

  private fn: VerifierFunction;

  constructor(opts: FunctionVerifierOptions) {
    this.name = opts.name;
    this.fn = opts.fn;
    this.kinds = opts.kinds;
  }

  async execute(taskId: string, timeoutSeconds: number, context: VerifierContext): Promise<VerifierResult> {
    const start = Date.now();
    log.debug(`[${this.name}] Running function for task "${taskId}"`);

    const { signal } = context;
    if (signal.aborted) throw new VerifierAbortedError(taskId);

    let rejectAborted: (err: Error) => void = () => {};
    const aborted = new Promise<never>((_, reject) => {
      rejectAborted = reject;
    });
    const onAbort = (): void => rejectAborted(new VerifierAbortedError(taskId));
    signal.addEventListener("abort", onAbort, { once: true });

    try {
      const result = await Promise.race([this.fn(taskId, { ...context, timeoutSeconds }), aborted]);
      const { exitCode, logPath } = typeof result === "number" ? { exitCode: result, logPath: undefined } : result;
      return { exitCode, logPath, durationSeconds: (Date.now() - start) / 1000 };
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  }
}
