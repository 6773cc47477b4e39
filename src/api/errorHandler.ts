/**
 * Global error boundary - catches all unhandled errors.
 * Flow contract violations land here too: they are caller bugs, not user input.
 */
import type { ErrorHandler } from "hono";
import { config } from "../config.js";
import { createLogger } from "../logger.js";
import { isFlowContractViolation } from "../provisioning/index.js";

const log = createLogger("api");

export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId") ?? "unknown";
  const rule = isFlowContractViolation(err) ? err.rule : undefined;

  log.error(
    {
      operation: "unhandledError",
      requestId,
      error: err.message,
      rule,
      stack: err.stack,
      path: c.req.path,
      method: c.req.method,
    },
    rule ? "❌ Flow contract violation" : "❌ Unhandled error",
  );

  // Don't expose internal errors in production
  const message =
    config.NODE_ENV === "production" ? "Internal server error" : err.message;

  return c.json({ error: message, requestId }, 500);
};
