/**
 * Process-level settings read from the environment (`.env` via dotenv).
 *
 * Invariants:
 * - Paths are resolved against the working directory.
 */
import path from "node:path";
import { z } from "zod";
import { ErrResult, OkResult, type Result } from "@/utils/result";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const RuntimeEnvSchema = z.object({
  GEARWORKS_DATA_DIR: z.string().min(1).default("data"),
  GEARWORKS_CONTENT_DIR: z.string().min(1).default(path.join("content", "packs")),
  GEARWORKS_SAVE_ON_START: booleanFlag.default("true"),
});

export interface RuntimeSettings {
  dataDir: string;
  contentDir: string;
  /** Write defaults back to disk after the first reload. */
  saveOnStart: boolean;
}

export function readRuntimeSettings(
  env: NodeJS.ProcessEnv = process.env,
): Result<RuntimeSettings, Error> {
  const parsed = RuntimeEnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return ErrResult(new Error(`Invalid environment: ${details}`));
  }

  return OkResult({
    dataDir: path.resolve(process.cwd(), parsed.data.GEARWORKS_DATA_DIR),
    contentDir: path.resolve(process.cwd(), parsed.data.GEARWORKS_CONTENT_DIR),
    saveOnStart: parsed.data.GEARWORKS_SAVE_ON_START,
  });
}
