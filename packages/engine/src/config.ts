/**
 * Engine Settings
 *
 * Read from environment. Each value is validated on its own; a bad value is
 * reported and replaced by its default.
 */

import { availableParallelism } from "os";
import { z } from "zod";
import { DEFAULT_LOOKBACK_LINES } from "./context/context-window";

export interface EngineConfig {
  /** Files analyzed in parallel. */
  concurrency: number;
  /** Source lines scanned above a finding for an existing check. */
  lookbackLines: number;
  /** Seconds a caller's timeout must exceed its callee's by. */
  timeoutOverheadSeconds: number;
  /** Files larger than this are skipped with an io_error note. */
  maxFileBytes: number;
  /** Project rule file overlaid on the bundled defaults. */
  patternsPath?: string;
  /** Explicit location of tree-sitter-python.wasm. */
  pythonWasmPath?: string;
  /** Suppress console logging. */
  quiet: boolean;
}

export const DEFAULT_MAX_FILE_BYTES = 500_000;

type Env = Record<string, string | undefined>;

const PositiveInt = z.coerce.number().int().positive();
const NonNegative = z.coerce.number().nonnegative();
const Flag = z.enum(["1", "0", "true", "false"]).transform((v) => v === "1" || v === "true");

function envValue<T>(env: Env, key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T, problems: string[]): T {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const parsed = schema.safeParse(raw);
  if (parsed.success) return parsed.data;
  problems.push(`${key}=${raw}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  return fallback;
}

export function loadEngineConfig(env: Env = process.env): { config: EngineConfig; problems: string[] } {
  const problems: string[] = [];
  const config: EngineConfig = {
    concurrency: envValue(env, "CODEWARD_CONCURRENCY", PositiveInt, availableParallelism(), problems),
    lookbackLines: envValue(env, "CODEWARD_LOOKBACK_LINES", PositiveInt, DEFAULT_LOOKBACK_LINES, problems),
    timeoutOverheadSeconds: envValue(env, "CODEWARD_TIMEOUT_OVERHEAD", NonNegative, 5, problems),
    maxFileBytes: envValue(env, "CODEWARD_MAX_FILE_BYTES", PositiveInt, DEFAULT_MAX_FILE_BYTES, problems),
    patternsPath: env.CODEWARD_PATTERNS || undefined,
    pythonWasmPath: env.CODEWARD_PYTHON_WASM || undefined,
    quiet: envValue(env, "CODEWARD_QUIET", Flag, false, problems),
  };
  return { config, problems };
}
