import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const EngineConfigSchema = z.object({
  /** Number of distinct formula texts whose parsed trees are kept. */
  cacheCapacity: z.coerce.number().int().positive().default(1024),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  /**
   * `isolate` turns a failing formula/row into a `null` cell plus a recorded
   * failure; `throw` aborts the batch on the first failure.
   */
  rowErrorPolicy: z.enum(["isolate", "throw"]).default("isolate"),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export type RowErrorPolicy = EngineConfig["rowErrorPolicy"];

function envValue(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Read `FORMULA_CACHE_CAPACITY`, `FORMULA_LOG_LEVEL` and
 * `FORMULA_ROW_ERROR_POLICY`; explicit overrides win over the environment.
 */
export function loadEngineConfig(
  overrides: Partial<EngineConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): EngineConfig {
  return EngineConfigSchema.parse({
    cacheCapacity: envValue(env.FORMULA_CACHE_CAPACITY),
    logLevel: envValue(env.FORMULA_LOG_LEVEL),
    rowErrorPolicy: envValue(env.FORMULA_ROW_ERROR_POLICY),
    ...overrides,
  });
}
