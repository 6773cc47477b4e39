/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * SPAN Panel Link configuration covering:
 * - Server settings
 * - Entry storage
 * - Panel HTTP transport
 * - Coordinator polling
 */
import "dotenv/config";
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().int().positive().default(8084).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("SpanPanelLink").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Entry Storage
  // ==========================================================================
  DATA_DIR: z
    .string()
    .min(1)
    .default("./data")
    .describe("Directory holding entries.json"),

  // ==========================================================================
  // Panel Transport
  // ==========================================================================
  PANEL_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(5000)
    .describe("HTTP timeout for panel requests (ms)"),
  CLIENT_NAME: z
    .string()
    .min(1)
    .default("span-panel-link")
    .describe("Client name prefix sent when registering for an access token"),

  // ==========================================================================
  // Feature Flags
  // ==========================================================================
  ENABLE_COORDINATOR_POLLING: envBoolean(true).describe(
    "Poll configured panels on their scan interval",
  ),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Panel transport configuration for the client factory.
 */
export function getPanelClientConfig(): Readonly<{
  timeoutMs: number;
  clientName: string;
}> {
  return {
    timeoutMs: config.PANEL_REQUEST_TIMEOUT_MS,
    clientName: config.CLIENT_NAME,
  };
}
