/**
 * Panel Module - Service Layer
 *
 * Side effects happen here: HTTP calls to the panel's local REST API.
 * Uses Result types for explicit error handling.
 */
import { randomUUID } from "node:crypto";
import { type Result, err, ok } from "neverthrow";
import type { z } from "zod";

import { createLogger } from "../logger.js";
import {
  type PanelError,
  formatPanelError,
  httpError,
  invalidResponse,
  networkError,
  timeout,
  unauthorized,
} from "./errors.js";
import {
  type Circuit,
  CircuitsResponseSchema,
  type PanelClient,
  type PanelClientFactory,
  type PanelClientOptions,
  type PanelStatus,
  RegisterResponseSchema,
  StatusResponseSchema,
} from "./schema.js";
import {
  CIRCUITS_PATH,
  REGISTER_PATH,
  STATUS_PATH,
  buildCircuitPath,
  buildHeaders,
  buildPanelUrl,
  buildPingPath,
  buildRegisterRequest,
  buildRelayPayload,
  isAuthFailureStatus,
  toCircuits,
  toPanelStatus,
} from "./transform.js";

const log = createLogger("panel");

type HttpMethod = "GET" | "POST";

// =============================================================================
// Transport
// =============================================================================

/**
 * Issue one request and map transport failures to PanelError values.
 */
async function send(
  options: PanelClientOptions,
  method: HttpMethod,
  path: string,
  body?: unknown,
): Promise<Result<Response, PanelError>> {
  const { host, accessToken, timeoutMs } = options;
  const hasBody = body !== undefined;

  try {
    const response = await fetch(buildPanelUrl(host, path), {
      method,
      headers: buildHeaders(accessToken, hasBody),
      body: hasBody ? JSON.stringify(body) : undefined,
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (isAuthFailureStatus(response.status)) {
      return err(unauthorized(host, response.status));
    }

    if (!response.ok) {
      return err(httpError(host, response.status, response.statusText));
    }

    return ok(response);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));

    if (cause.name === "TimeoutError" || cause.name === "AbortError") {
      return err(timeout(host, timeoutMs));
    }

    return err(networkError(host, `${method} ${path} failed`, cause));
  }
}

/**
 * Issue a request and validate the JSON body against a schema.
 */
async function requestJson<T>(
  options: PanelClientOptions,
  method: HttpMethod,
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body?: unknown,
): Promise<Result<T, PanelError>> {
  const sent = await send(options, method, path, body);
  if (sent.isErr()) {
    return err(sent.error);
  }

  let data: unknown;
  try {
    data = await sent.value.json();
  } catch {
    return err(invalidResponse(options.host, `${path} did not return JSON`));
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    return err(
      invalidResponse(options.host, `Unexpected ${path} response format`, data),
    );
  }

  return ok(parsed.data);
}

// =============================================================================
// Client
// =============================================================================

/**
 * Create a client bound to one panel host (and optionally one access token).
 */
export function createPanelClient(options: PanelClientOptions): PanelClient {
  const { host } = options;
  const authenticated = options.accessToken !== undefined;

  return {
    host,

    async ping(): Promise<boolean> {
      const path = buildPingPath(options.accessToken);
      const result = await send(options, "GET", path);

      if (result.isErr()) {
        log.debug(
          { host, authenticated, error: formatPanelError(result.error) },
          "Ping failed",
        );
        return false;
      }

      log.debug({ host, authenticated }, "Ping succeeded");
      return true;
    },

    async getStatusData(): Promise<Result<PanelStatus, PanelError>> {
      log.debug({ host }, "Fetching panel status...");

      const result = await requestJson(
        options,
        "GET",
        STATUS_PATH,
        StatusResponseSchema,
      );

      return result.map(toPanelStatus);
    },

    async getAccessToken(): Promise<Result<string, PanelError>> {
      log.info({ host }, "Registering for an access token...");

      const request = buildRegisterRequest(options.clientName, randomUUID());
      const result = await requestJson(
        options,
        "POST",
        REGISTER_PATH,
        RegisterResponseSchema,
        request,
      );

      if (result.isErr()) {
        log.warn(
          { host, error: formatPanelError(result.error) },
          "Access token registration failed",
        );
        return err(result.error);
      }

      log.info({ host, clientName: request.name }, "Access token obtained");
      return ok(result.value.accessToken);
    },

    async getCircuits(): Promise<
      Result<Readonly<Record<string, Circuit>>, PanelError>
    > {
      const result = await requestJson(
        options,
        "GET",
        CIRCUITS_PATH,
        CircuitsResponseSchema,
      );

      return result.map(toCircuits);
    },

    async setRelay(
      circuit: Circuit,
      state: "OPEN" | "CLOSED",
    ): Promise<Result<true, PanelError>> {
      log.info(
        { host, circuitId: circuit.id, circuit: circuit.name, state },
        "Setting circuit relay...",
      );

      const result = await send(
        options,
        "POST",
        buildCircuitPath(circuit.id),
        buildRelayPayload(state),
      );

      if (result.isErr()) {
        log.error(
          { host, circuitId: circuit.id, error: formatPanelError(result.error) },
          "Failed to set circuit relay",
        );
        return err(result.error);
      }

      return ok(true);
    },
  };
}

/**
 * Factory closing over transport settings, handed to flows and the runtime.
 */
export function createPanelClientFactory(
  settings: Readonly<{ timeoutMs: number; clientName: string }>,
): PanelClientFactory {
  return (host, accessToken) =>
    createPanelClient(
      accessToken === undefined
        ? { host, ...settings }
        : { host, accessToken, ...settings },
    );
}
