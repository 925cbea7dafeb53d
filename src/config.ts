import { fileURLToPath } from "node:url";
import { z } from "zod";
import { LogLevels, type LogLevel } from "./logger.js";

/** The dataset shipped with the package, resolved beside `src/` or `dist/` */
export const BUNDLED_DATA_PATH = fileURLToPath(new URL("../data/feasts.json", import.meta.url));

export interface FeastConfig {
  /** Path of the JSON dataset */
  dataPath: string;
  logLevel: LogLevel;
}

const EnvSchema = z.object({
  FEASTS_DATA_PATH: z.string().min(1).optional(),
  FEASTS_LOG_LEVEL: z.enum(LogLevels).default("warn"),
});

/**
 * Resolve configuration from environment variables.
 *
 * - `FEASTS_DATA_PATH`: dataset path (default: the bundled dataset)
 * - `FEASTS_LOG_LEVEL`: `debug | info | warn | error | silent` (default `warn`)
 *
 * @throws {Error} when a variable holds an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): FeastConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Invalid feast configuration:\n${z.prettifyError(result.error)}`);
  }
  return {
    dataPath: result.data.FEASTS_DATA_PATH ?? BUNDLED_DATA_PATH,
    logLevel: result.data.FEASTS_LOG_LEVEL,
  };
}
