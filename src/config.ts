import { z } from "zod";
import { LogLevel, parseLogLevel } from "./utils/logger";

/**
 * Default configuration values for the acquisition pipeline
 */

/** Timeout for the request and response-header phase of a fetch */
export const DEFAULT_TIMEOUT_MS = 30_000;

/** Redirects the HTTP transport follows on its own */
export const MAX_REDIRECTS = 5;

/** Transfer encoding advertised on every request and decoded on responses */
export const GZIP_ENCODING = "gzip";

/** Token the content-type header has to contain for a page to be extracted */
export const HTML_CONTENT_TYPE = "text/html";

const envSchema = z.object({
  READABLE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  READABLE_LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).optional(),
});

export interface RuntimeConfig {
  timeoutMs: number;
  logLevel: LogLevel;
}

/**
 * Reads runtime settings from environment variables, falling back to the
 * defaults above. Only the CLI calls this; the library reads no environment.
 * @throws {Error} If a variable is set to an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const result = envSchema.safeParse({
    READABLE_TIMEOUT_MS: env.READABLE_TIMEOUT_MS || undefined,
    READABLE_LOG_LEVEL: env.READABLE_LOG_LEVEL?.toLowerCase() || undefined,
  });
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const { READABLE_TIMEOUT_MS, READABLE_LOG_LEVEL } = result.data;
  return {
    timeoutMs: READABLE_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
    logLevel:
      (READABLE_LOG_LEVEL ? parseLogLevel(READABLE_LOG_LEVEL) : undefined) ?? LogLevel.INFO,
  };
}
