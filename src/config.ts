import os from "node:os";
import path from "node:path";
import { z } from "zod";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LlmTuiConfig = {
  command: string;
  remoteEnabled: boolean;
  remoteHost: string;
  remotePort: number;
  batchSize: number;
  pollIntervalMs: number;
  feedbackTtlMs: number;
  replyTimeoutMs: number;
  defaultModel: string | null;
  debugLogPath: string | null;
  logLevel: LogLevel;
  dataDir: string;
};

const LOOPBACK_HOSTS = new Set(["127.0.0.1", "::1", "localhost"]);

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : null));

const toggle = z
  .string()
  .trim()
  .toLowerCase()
  .optional()
  .transform((value, ctx) => {
    if (!value) {
      return true;
    }
    if (["1", "true", "on", "yes"].includes(value)) {
      return true;
    }
    if (["0", "false", "off", "no"].includes(value)) {
      return false;
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected on/off, got "${value}"` });
    return z.NEVER;
  });

function integer(fallback: number, min: number, max: number) {
  return z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? Number(value) : fallback))
    .pipe(z.number().int().min(min).max(max));
}

const EnvSchema = z.object({
  LLM_TUI_COMMAND: z.string().trim().min(1, "command must not be empty").optional().default("llm"),
  LLM_TUI_REMOTE: toggle,
  LLM_TUI_REMOTE_HOST: z
    .string()
    .trim()
    .optional()
    .default("127.0.0.1")
    .refine((host) => LOOPBACK_HOSTS.has(host), "remote control only binds a loopback address"),
  LLM_TUI_REMOTE_PORT: integer(8080, 0, 65_535),
  LLM_TUI_BATCH_SIZE: integer(64, 1, 10_000),
  LLM_TUI_POLL_MS: integer(100, 10, 60_000),
  LLM_TUI_FEEDBACK_MS: integer(5_000, 0, 600_000),
  LLM_TUI_REPLY_TIMEOUT_MS: integer(0, 0, 24 * 60 * 60 * 1_000),
  LLM_TUI_DEFAULT_MODEL: optionalText,
  LLM_TUI_DEBUG_LOG: optionalText,
  LLM_TUI_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional().default("warn"),
  LLM_TUI_HOME: optionalText,
});

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LlmTuiConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  return {
    command: values.LLM_TUI_COMMAND,
    remoteEnabled: values.LLM_TUI_REMOTE,
    remoteHost: values.LLM_TUI_REMOTE_HOST,
    remotePort: values.LLM_TUI_REMOTE_PORT,
    batchSize: values.LLM_TUI_BATCH_SIZE,
    pollIntervalMs: values.LLM_TUI_POLL_MS,
    feedbackTtlMs: values.LLM_TUI_FEEDBACK_MS,
    replyTimeoutMs: values.LLM_TUI_REPLY_TIMEOUT_MS,
    defaultModel: values.LLM_TUI_DEFAULT_MODEL,
    debugLogPath: values.LLM_TUI_DEBUG_LOG,
    logLevel: values.LLM_TUI_LOG_LEVEL,
    dataDir: values.LLM_TUI_HOME ?? path.join(os.homedir(), ".llm-tui"),
  };
}
