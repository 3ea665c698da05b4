import { z } from "zod";

import { ConfigurationError } from "../engine/errors.js";

export const DEFAULT_USER_AGENT = "FilingScenarioModel/0.1 (contact@example.com)";

const RuntimeConfigSchema = z.object({
  userAgent: z.string().min(6, "user agent should include contact info"),
  baseDelayMs: z.coerce.number().int().min(0).default(400), // ~2.5 req/s, under the SEC cap
  maxRetries: z.coerce.number().int().min(0).max(10).default(3),
  inputDir: z.string().min(1).default("./input"),
  outputDir: z.string().min(1).default("./output"),
  debug: z.boolean().default(false),
});

export type RuntimeConfig = z.output<typeof RuntimeConfigSchema>;

const nonEmpty = (value: string | undefined): string | undefined => (value && value.trim() ? value.trim() : undefined);

const isTruthyFlag = (value: string | undefined): boolean => ["1", "true", "yes"].includes((value ?? "").trim().toLowerCase());

/**
 * Reads the retrieval and file-location settings from the environment. Only
 * the scripts call this; library code takes its configuration as arguments.
 */
export const loadRuntimeConfig = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const parsed = RuntimeConfigSchema.safeParse({
    userAgent:
      nonEmpty(env.EDGAR_USER_AGENT) ??
      nonEmpty(env.DATA_USER_AGENT) ??
      nonEmpty(env.SEC_EDGAR_TOOLKIT_USER_AGENT) ??
      DEFAULT_USER_AGENT,
    baseDelayMs: nonEmpty(env.EDGAR_BASE_DELAY_MS),
    maxRetries: nonEmpty(env.EDGAR_MAX_RETRIES),
    inputDir: nonEmpty(env.MODEL_INPUT_DIR),
    outputDir: nonEmpty(env.MODEL_OUTPUT_DIR),
    debug: isTruthyFlag(env.MODEL_DEBUG),
  });

  if (!parsed.success) {
    throw new ConfigurationError({
      code: "INVALID_PARAMS",
      message: "Invalid runtime configuration",
      details: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return parsed.data;
};
