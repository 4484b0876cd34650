import { z } from "zod";

export const FAILPOINTS = ["after_claim_once"] as const;

export type Failpoint = (typeof FAILPOINTS)[number];

export type AppConfig = {
  brokerUrl: string;
  resultBackendUrl: string;
  poolMax: number;
  http: {
    port: number;
  };
  worker: {
    pollIntervalMs: number;
    delay: { minMs: number; maxMs: number };
    failpoint: Failpoint | null;
  };
};

const envSchema = z
  .object({
    BROKER_URL: z.string().trim().min(1, "BROKER_URL is required"),
    RESULT_BACKEND_URL: z
      .string()
      .trim()
      .min(1, "RESULT_BACKEND_URL is required"),
    PORT: z.coerce.number().int().min(1).max(65535).default(5000),
    DB_POOL_MAX: z.coerce.number().int().positive().default(5),
    TASK_DELAY_MIN_MS: z.coerce.number().int().min(0).default(5000),
    TASK_DELAY_MAX_MS: z.coerce.number().int().min(0).default(10000),
    WORKER_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(750),
    WORKER_FAILPOINT: z.enum(FAILPOINTS).optional(),
  })
  .refine((env) => env.TASK_DELAY_MIN_MS <= env.TASK_DELAY_MAX_MS, {
    message: "TASK_DELAY_MIN_MS must not exceed TASK_DELAY_MAX_MS",
    path: ["TASK_DELAY_MIN_MS"],
  });

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Builds the configuration struct handed to the api and worker modules.
 * Empty strings count as unset so that `FOO=` in a compose file falls back to
 * the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") {
      cleaned[key] = value;
    }
  }

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || issue.code}: ${issue.message}`,
      ),
    );
  }

  const parsed = result.data;
  return {
    brokerUrl: parsed.BROKER_URL,
    resultBackendUrl: parsed.RESULT_BACKEND_URL,
    poolMax: parsed.DB_POOL_MAX,
    http: { port: parsed.PORT },
    worker: {
      pollIntervalMs: parsed.WORKER_POLL_INTERVAL_MS,
      delay: {
        minMs: parsed.TASK_DELAY_MIN_MS,
        maxMs: parsed.TASK_DELAY_MAX_MS,
      },
      failpoint: parsed.WORKER_FAILPOINT ?? null,
    },
  };
}
