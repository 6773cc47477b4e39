/**
 * Panel Module - Pure Transformations
 *
 * URL building, header building and response normalization.
 * No side effects, no I/O - just data in, data out.
 */
import type {
  Circuit,
  CircuitsResponse,
  PanelStatus,
  RegisterRequest,
  RelayPayload,
  StatusResponse,
} from "./schema.js";

// =============================================================================
// Endpoints
// =============================================================================

export const STATUS_PATH = "/status";
export const PANEL_PATH = "/panel";
export const REGISTER_PATH = "/auth/register";
export const CIRCUITS_PATH = "/circuits";

/**
 * Build a full panel API URL.
 *
 * @example buildPanelUrl("10.0.0.5", "/status") // "http://10.0.0.5/api/v1/status"
 */
export function buildPanelUrl(host: string, path: string): string {
  return `http://${host}/api/v1${path}`;
}

/**
 * Path for a single circuit.
 */
export function buildCircuitPath(circuitId: string): string {
  return `${CIRCUITS_PATH}/${encodeURIComponent(circuitId)}`;
}

/**
 * Path used by ping: the authenticated panel endpoint when a token is held,
 * so that an invalid token fails the probe.
 */
export function buildPingPath(accessToken: string | undefined): string {
  return accessToken ? PANEL_PATH : STATUS_PATH;
}

// =============================================================================
// Headers & Payloads
// =============================================================================

export function buildHeaders(
  accessToken: string | undefined,
  hasBody: boolean,
): Record<string, string> {
  const headers: Record<string, string> = { Accept: "application/json" };

  if (accessToken) {
    headers.Authorization = `Bearer ${accessToken}`;
  }

  if (hasBody) {
    headers["Content-Type"] = "application/json";
  }

  return headers;
}

/**
 * Registration body. The suffix keeps each registration distinct on the panel.
 */
export function buildRegisterRequest(
  clientName: string,
  suffix: string,
): RegisterRequest {
  return {
    name: `${clientName}-${suffix}`,
    description: "SPAN Panel Link local integration",
  };
}

export function buildRelayPayload(state: "OPEN" | "CLOSED"): RelayPayload {
  return { relayStateIn: { relayState: state } };
}

// =============================================================================
// Response Normalization
// =============================================================================

/**
 * Normalize a status response.
 * proximityProven wins whenever the firmware reports it.
 */
export function toPanelStatus(response: StatusResponse): PanelStatus {
  const { system } = response;
  const proximityProven = system.proximityProven ?? null;

  return {
    serialNumber: system.serial,
    firmwareVersion: response.software?.firmwareVersion ?? null,
    proximityProven,
    remainingAuthUnlockButtonPresses:
      proximityProven === null
        ? (system.remainingAuthUnlockButtonPresses ?? null)
        : null,
  };
}

export function toCircuits(
  response: CircuitsResponse,
): Readonly<Record<string, Circuit>> {
  const circuits: Record<string, Circuit> = {};

  for (const [key, raw] of Object.entries(response.circuits)) {
    circuits[key] = {
      id: raw.id,
      name: raw.name,
      relayState: raw.relayState,
      instantPowerW: raw.instantPowerW,
      isUserControllable: raw.isUserControllable,
      tabs: raw.tabs,
    };
  }

  return circuits;
}

/**
 * 401 and 403 both mean the token was rejected.
 */
export function isAuthFailureStatus(status: number): boolean {
  return status === 401 || status === 403;
}
