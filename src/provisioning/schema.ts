/**
 * Provisioning Module - Schemas and Types
 *
 * The vocabulary shared by every flow: step input, step results,
 * form descriptors and abort reasons.
 */
import { z } from "zod";
import type { EntryRepository } from "../entries/index.js";
import type { PanelClientFactory } from "../panel/index.js";

// =============================================================================
// Step Input
// =============================================================================

/**
 * What the caller hands a step.
 * - open: render the step
 * - submit: the operator submitted the step's form or menu
 * - back: the operator (or the menu host) backed out of the step
 */
export type StepInput =
  | Readonly<{ kind: "open" }>
  | Readonly<{ kind: "submit"; data: Readonly<Record<string, unknown>> }>
  | Readonly<{ kind: "back" }>;

export const OPEN: StepInput = { kind: "open" };
export const BACK: StepInput = { kind: "back" };

export function submit(data: Readonly<Record<string, unknown>> = {}): StepInput {
  return { kind: "submit", data };
}

// =============================================================================
// Step Results
// =============================================================================

export const ABORT_REASONS = [
  "not_ipv4_address",
  "not_span_panel",
  "cannot_connect",
  "host_not_set",
  "invalid_access_token",
  "reauth_successful",
  "already_configured",
  "already_in_progress",
] as const;

export type AbortReason = (typeof ABORT_REASONS)[number];

/**
 * Describes one form field for whatever renders the form.
 */
export type FormField = Readonly<{
  name: string;
  type: "string" | "integer" | "boolean";
  required: boolean;
  default?: string | number | boolean;
  min?: number;
}>;

export type FormResult = Readonly<{
  type: "form";
  stepId: string;
  fields: ReadonlyArray<FormField>;
  errors: Readonly<Record<string, string>>;
  placeholders: Readonly<Record<string, string>>;
  confirmOnly: boolean;
}>;

export type MenuResult = Readonly<{
  type: "menu";
  stepId: string;
  options: Readonly<Record<string, string>>;
}>;

export type CreateEntryResult = Readonly<{
  type: "create_entry";
  title: string;
  data: Readonly<Record<string, unknown>>;
  /** Entry the result refers to */
  entryId: string;
}>;

export type AbortResult = Readonly<{
  type: "abort";
  reason: AbortReason;
}>;

export type FlowResult = FormResult | MenuResult | CreateEntryResult | AbortResult;

/**
 * Anything the flow manager can drive.
 */
export interface FlowHandler {
  readonly flowId: string;
  readonly handler: "config" | "options";
  /** Set once the flow knows which panel it is about */
  readonly uniqueId: string | null;
  /** Shown in the flow's title, e.g. { host } */
  readonly titlePlaceholders: Readonly<Record<string, string>>;
  hasStep(stepId: string): boolean;
  handleStep(stepId: string, input: StepInput): Promise<FlowResult>;
}

// =============================================================================
// Provisioning Flow
// =============================================================================

export const CONFIG_STEP_IDS = [
  "user",
  "confirm_discovery",
  "choose_auth_type",
  "auth_proximity",
  "auth_token",
] as const;

export type ConfigStepId = (typeof CONFIG_STEP_IDS)[number];

/**
 * What the flow ends in. UPDATE_ENTRY carries the re-auth context.
 */
export type FlowTrigger =
  | Readonly<{ type: "CREATE_ENTRY" }>
  | Readonly<{ type: "UPDATE_ENTRY"; entryId: string }>;

export type DiscoveryInfo = Readonly<{
  host: string;
}>;

export type ProvisioningDependencies = Readonly<{
  createClient: PanelClientFactory;
  entries: EntryRepository;
  /** True when another flow in progress already claims the unique id */
  isUniqueIdInProgress: (uniqueId: string, flowId: string) => boolean;
}>;

// =============================================================================
// Form Input
// =============================================================================

export const UserStepInputSchema = z.object({
  host: z.string().trim().min(1),
});

export const AuthTokenInputSchema = z.object({
  access_token: z.string().trim().optional(),
});
