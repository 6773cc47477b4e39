/**
 * Panel Module - Error Types
 *
 * Typed error unions for panel REST operations.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while talking to a panel.
 */
export type PanelError =
  | {
      readonly type: "NETWORK_ERROR";
      readonly host: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "TIMEOUT";
      readonly host: string;
      readonly timeoutMs: number;
    }
  | {
      readonly type: "UNAUTHORIZED";
      readonly host: string;
      readonly status: number;
    }
  | {
      readonly type: "HTTP_ERROR";
      readonly host: string;
      readonly status: number;
      readonly message: string;
    }
  | {
      readonly type: "INVALID_RESPONSE";
      readonly host: string;
      readonly message: string;
      readonly responseData?: unknown;
    };

/**
 * Create a NETWORK_ERROR.
 */
export function networkError(
  host: string,
  message: string,
  cause?: Error,
): PanelError {
  if (cause) {
    return { type: "NETWORK_ERROR", host, message, cause };
  }
  return { type: "NETWORK_ERROR", host, message };
}

/**
 * Create a TIMEOUT error.
 */
export function timeout(host: string, timeoutMs: number): PanelError {
  return { type: "TIMEOUT", host, timeoutMs };
}

/**
 * Create an UNAUTHORIZED error (401/403 from the panel).
 */
export function unauthorized(host: string, status: number): PanelError {
  return { type: "UNAUTHORIZED", host, status };
}

/**
 * Create an HTTP_ERROR.
 */
export function httpError(
  host: string,
  status: number,
  message: string,
): PanelError {
  return { type: "HTTP_ERROR", host, status, message };
}

/**
 * Create an INVALID_RESPONSE error.
 */
export function invalidResponse(
  host: string,
  message: string,
  responseData?: unknown,
): PanelError {
  return { type: "INVALID_RESPONSE", host, message, responseData };
}

/**
 * Format a PanelError for logging.
 */
export function formatPanelError(error: PanelError): string {
  switch (error.type) {
    case "NETWORK_ERROR":
      return `Network error (${error.host}): ${error.message}`;
    case "TIMEOUT":
      return `Timeout after ${error.timeoutMs}ms (${error.host})`;
    case "UNAUTHORIZED":
      return `Unauthorized (${error.host}): HTTP ${error.status}`;
    case "HTTP_ERROR":
      return `HTTP ${error.status} (${error.host}): ${error.message}`;
    case "INVALID_RESPONSE":
      return `Invalid response (${error.host}): ${error.message}`;
  }
}
