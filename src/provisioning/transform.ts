/**
 * Provisioning Module - Pure Transformations
 *
 * Address checks, firmware-dependent proximity evaluation,
 * entry data building and result constructors.
 */
import { isIPv4 } from "node:net";
import type { EntryData } from "../entries/index.js";
import type { PanelStatus } from "../panel/index.js";
import {
  type AbortReason,
  type AbortResult,
  AuthTokenInputSchema,
  type FormField,
  type FormResult,
  type MenuResult,
  UserStepInputSchema,
} from "./schema.js";

// =============================================================================
// Forms & Menus
// =============================================================================

export const USER_FORM_FIELDS: ReadonlyArray<FormField> = [
  { name: "host", type: "string", required: true },
];

export const AUTH_TOKEN_FORM_FIELDS: ReadonlyArray<FormField> = [
  { name: "access_token", type: "string", required: false },
];

export const AUTH_MENU_OPTIONS: Readonly<Record<string, string>> = {
  auth_proximity: "Proof of Proximity (recommended)",
  auth_token: "Existing Auth Token",
};

export function showForm(
  stepId: string,
  extras: Partial<Omit<FormResult, "type" | "stepId">> = {},
): FormResult {
  return {
    type: "form",
    stepId,
    fields: extras.fields ?? [],
    errors: extras.errors ?? {},
    placeholders: extras.placeholders ?? {},
    confirmOnly: extras.confirmOnly ?? false,
  };
}

export function showMenu(
  stepId: string,
  options: Readonly<Record<string, string>>,
): MenuResult {
  return { type: "menu", stepId, options };
}

export function abort(reason: AbortReason): AbortResult {
  return { type: "abort", reason };
}

// =============================================================================
// Input Parsing
// =============================================================================

export function isIpv4Address(host: string): boolean {
  return isIPv4(host);
}

/**
 * Host from the user form, or null when missing or blank.
 */
export function parseHostInput(data: Readonly<Record<string, unknown>>): string | null {
  const parsed = UserStepInputSchema.safeParse(data);
  return parsed.success ? parsed.data.host : null;
}

/**
 * Token from the token form, or null when absent or empty.
 */
export function parseTokenInput(data: Readonly<Record<string, unknown>>): string | null {
  const parsed = AuthTokenInputSchema.safeParse(data);
  if (!parsed.success || !parsed.data.access_token) {
    return null;
  }
  return parsed.data.access_token;
}

// =============================================================================
// Proximity
// =============================================================================

export type ProximityState =
  | Readonly<{ ready: true }>
  | Readonly<{ ready: false; firmware: "proximity_proven" }>
  | Readonly<{
      ready: false;
      firmware: "unlock_button_presses";
      remainingPresses: number | null;
    }>;

/**
 * Decide whether proximity has been proven.
 * Newer firmware reports proximityProven; older firmware counts the
 * door button presses still needed.
 */
export function evaluateProximity(status: PanelStatus): ProximityState {
  if (status.proximityProven !== null) {
    return status.proximityProven
      ? { ready: true }
      : { ready: false, firmware: "proximity_proven" };
  }

  const remaining = status.remainingAuthUnlockButtonPresses;
  if (remaining === 0) {
    return { ready: true };
  }

  return {
    ready: false,
    firmware: "unlock_button_presses",
    remainingPresses: remaining,
  };
}

// =============================================================================
// Entry Data
// =============================================================================

export function buildEntryData(host: string, accessToken: string): EntryData {
  return { host, access_token: accessToken };
}

/**
 * Overlay host and token on stored data, keeping every other key.
 */
export function mergeEntryData(
  existing: EntryData,
  host: string,
  accessToken: string,
): EntryData {
  return { ...existing, host, access_token: accessToken };
}
