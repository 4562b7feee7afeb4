import { z } from "zod";
import { ConfigurationError, type ErrorCode } from "./errors.js";
import { TASK_KINDS } from "./graph/types.js";

export const TaskKindSchema = z.enum(TASK_KINDS);

const TaskIdSchema = z.string().trim().min(1, "task id must not be empty");

export const TaskDeclarationSchema = z.object({
  id: TaskIdSchema,
  dependsOn: z.array(TaskIdSchema).default([]),
  kind: TaskKindSchema.optional(),
  target: z.string().min(1).optional(),
  timeoutSeconds: z.number().nonnegative().optional(),
});

/** Declaration file in list form: `{ "tasks": [...] }`, order preserved. */
export const TaskListFileSchema = z.object({ tasks: z.array(TaskDeclarationSchema) });

/** Declaration file in map form: `{ "<task>": ["<dependency>", ...] }`. */
export const TaskMapFileSchema = z.record(TaskIdSchema, z.array(TaskIdSchema));

export const SessionOptionsSchema = z.object({
  concurrency: z.number().int("concurrency must be an integer").positive("concurrency must be at least 1"),
  timeoutSeconds: z.number().finite().nonnegative("timeout must not be negative"),
  failFast: z.boolean().default(false),
});

const countOption = (what: string) => z.coerce.number({ invalid_type_error: `${what} must be a number` });

/** `run` command flags as commander hands them over: numbers still strings. */
export const RunCommandOptionsSchema = z.object({
  concurrency: countOption("concurrency").int("concurrency must be an integer").positive("concurrency must be at least 1").optional(),
  timeout: countOption("timeout").finite().nonnegative("timeout must not be negative").optional(),
  retries: countOption("retries").int("retries must be an integer").nonnegative("retries must not be negative").optional(),
  failFast: z.boolean().default(false),
  tasks: z.string().min(1).optional(),
  config: z.string().min(1).optional(),
  output: z.string().min(1).optional(),
  dryRun: z.boolean().default(false),
  history: z.boolean().default(false),
  json: z.boolean().default(false),
});

const VerifierInvocationSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()),
  cwd: z.string().optional(),
  env: z.record(z.string()).optional(),
});

/** Overrides accepted from a `--config` file; every field is optional. */
export const ConfigFileSchema = z
  .object({
    timeouts: z
      .object({
        taskDefaultSeconds: z.number().nonnegative(),
        graceMs: z.number().int().nonnegative(),
        killGraceMs: z.number().int().nonnegative(),
      })
      .partial(),
    retry: z
      .object({
        baseDelayMs: z.number().int().nonnegative(),
        maxDelayMs: z.number().int().nonnegative(),
      })
      .partial(),
    limits: z
      .object({
        maxConcurrency: z.number().int().positive(),
        retries: z.number().int().nonnegative(),
      })
      .partial(),
    output: z
      .object({
        dir: z.string().min(1),
        summaryFile: z.string().min(1),
        logsDir: z.string().min(1),
      })
      .partial(),
    history: z.object({ dbPath: z.string().min(1) }).partial(),
    verifiers: z
      .object({
        "model-check": VerifierInvocationSchema,
        "proof-check": VerifierInvocationSchema,
        "test-harness": VerifierInvocationSchema,
      })
      .partial(),
  })
  .partial()
  .strict();

const TerminalStatusSchema = z.enum(["succeeded", "failed", "timed_out"]);

export const TaskSummarySchema = z.object({
  id: z.string(),
  kind: TaskKindSchema,
  status: TerminalStatusSchema,
  requested: z.boolean(),
  dependencies: z.array(z.string()),
  durationSeconds: z.number(),
  exitCode: z.number().optional(),
  logPath: z.string().optional(),
  reason: z.string().optional(),
  propagated: z.boolean(),
  cancelled: z.boolean(),
});

export const SessionSummarySchema = z.object({
  sessionId: z.string(),
  target: z.array(z.string()),
  overallStatus: z.enum(["success", "failure", "timeout"]),
  interrupted: z.boolean(),
  startedAt: z.string(),
  finishedAt: z.string(),
  durationSeconds: z.number(),
  concurrency: z.number(),
  peakConcurrency: z.number(),
  timeoutSeconds: z.number(),
  failFast: z.boolean(),
  counts: z.object({
    total: z.number(),
    succeeded: z.number(),
    failed: z.number(),
    timedOut: z.number(),
    propagated: z.number(),
    cancelled: z.number(),
  }),
  tasks: z.array(TaskSummarySchema),
});

/** Parse with a schema, turning a validation failure into a ConfigurationError. */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  what: string,
  code: ErrorCode = "INVALID_OPTION",
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ConfigurationError(code, `Invalid ${what}: ${detail}`);
  }
  return result.data;
}
