/**
 * Panel Module - Schemas and Types
 *
 * Defines the data shapes of the panel's local REST API.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import type { Result } from "neverthrow";
import { z } from "zod";
import type { PanelError } from "./errors.js";

// =============================================================================
// Relay State
// =============================================================================

/**
 * Relay state of a circuit breaker.
 * CLOSED means current flows (switch on).
 */
export const RelayStateSchema = z.enum(["OPEN", "CLOSED", "UNKNOWN"]);

export type RelayState = z.infer<typeof RelayStateSchema>;

// =============================================================================
// Status Endpoint (/api/v1/status)
// =============================================================================

/**
 * Raw status response. Firmware older than r202342 reports
 * remainingAuthUnlockButtonPresses instead of proximityProven.
 */
export const StatusResponseSchema = z.object({
  software: z
    .object({
      firmwareVersion: z.string().optional(),
    })
    .passthrough()
    .optional(),
  system: z
    .object({
      serial: z.string().min(1),
      manufacturer: z.string().optional(),
      model: z.string().optional(),
      doorState: z.string().optional(),
      proximityProven: z.boolean().optional(),
      remainingAuthUnlockButtonPresses: z.number().int().optional(),
    })
    .passthrough(),
});

export type StatusResponse = z.infer<typeof StatusResponseSchema>;

/**
 * Normalized status snapshot.
 * Exactly one of proximityProven / remainingAuthUnlockButtonPresses is meaningful.
 */
export type PanelStatus = Readonly<{
  serialNumber: string;
  firmwareVersion: string | null;
  proximityProven: boolean | null;
  remainingAuthUnlockButtonPresses: number | null;
}>;

// =============================================================================
// Register Endpoint (/api/v1/auth/register)
// =============================================================================

export const RegisterResponseSchema = z.object({
  accessToken: z.string().min(1),
});

export type RegisterResponse = z.infer<typeof RegisterResponseSchema>;

export type RegisterRequest = Readonly<{
  name: string;
  description: string;
}>;

// =============================================================================
// Circuits Endpoint (/api/v1/circuits)
// =============================================================================

export const CircuitResponseSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    relayState: RelayStateSchema.catch("UNKNOWN"),
    instantPowerW: z.number().default(0),
    isUserControllable: z.boolean().default(false),
    tabs: z.array(z.number().int()).default([]),
  })
  .passthrough();

export const CircuitsResponseSchema = z.object({
  circuits: z.record(CircuitResponseSchema),
});

export type CircuitsResponse = z.infer<typeof CircuitsResponseSchema>;

/**
 * A single breaker circuit as the rest of the service sees it.
 */
export type Circuit = Readonly<{
  id: string;
  name: string;
  relayState: RelayState;
  instantPowerW: number;
  isUserControllable: boolean;
  tabs: ReadonlyArray<number>;
}>;

export type RelayPayload = Readonly<{
  relayStateIn: Readonly<{ relayState: "OPEN" | "CLOSED" }>;
}>;

// =============================================================================
// Client Contract
// =============================================================================

/**
 * Async HTTP interface to one panel, optionally bound to an access token.
 */
export interface PanelClient {
  readonly host: string;
  /** Reachability probe; authenticated when the client holds a token. */
  ping(): Promise<boolean>;
  getStatusData(): Promise<Result<PanelStatus, PanelError>>;
  /** Only succeeds once proximity has been proven. */
  getAccessToken(): Promise<Result<string, PanelError>>;
  getCircuits(): Promise<Result<Readonly<Record<string, Circuit>>, PanelError>>;
  setRelay(
    circuit: Circuit,
    state: "OPEN" | "CLOSED",
  ): Promise<Result<true, PanelError>>;
}

/**
 * Builds a client for a host, authenticated when a token is given.
 */
export type PanelClientFactory = (
  host: string,
  accessToken?: string,
) => PanelClient;

export type PanelClientOptions = Readonly<{
  host: string;
  accessToken?: string;
  timeoutMs: number;
  clientName: string;
}>;
