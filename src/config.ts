import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import type { AppConfig } from "./types.ts";

/**
 * Runtime configuration.
 *
 * Settings come from the environment, optionally seeded from a `.env` file. Every field has a default, so
 * running with no configuration at all writes to `./output` with images disabled. Malformed values fall back
 * to their defaults rather than aborting a generation run.
 */
const envSchema = z.object({
  CTE_OUTPUT_DIR: z.string().trim().min(1).catch("output"),
  CTE_COURSE_TITLE: z.string().trim().min(1).catch("Media Foundations"),
  CTE_DEFAULT_DURATION: z.string().trim().regex(/^\d+$/).catch("90"),
  PEXELS_API_KEY: z.string().trim().min(1).optional().catch(undefined),
  MEDIA_TIMEOUT_MS: z.coerce.number().int().positive().catch(10_000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).catch("info"),
});

function isNotFound(error: Error): boolean {
  return "code" in error && error.code === "ENOENT";
}

/**
 * Copy `.env` entries into `process.env` (existing variables win). A missing file is not an error.
 */
export function loadEnvFile(path = ".env"): void {
  const result = loadDotenv({ path });
  if (result.error && !isNotFound(result.error)) {
    throw result.error;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    outputDir: parsed.CTE_OUTPUT_DIR,
    courseTitle: parsed.CTE_COURSE_TITLE,
    defaultDuration: parsed.CTE_DEFAULT_DURATION,
    pexelsApiKey: parsed.PEXELS_API_KEY,
    mediaTimeoutMs: parsed.MEDIA_TIMEOUT_MS,
    logLevel: parsed.LOG_LEVEL,
  };
}
