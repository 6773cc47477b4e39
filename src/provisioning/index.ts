/**
 * Provisioning Module
 *
 * Authentication state machine that adds a panel or renews its token.
 */

// Types
export type {
  AbortReason,
  AbortResult,
  ConfigStepId,
  CreateEntryResult,
  DiscoveryInfo,
  FlowHandler,
  FlowResult,
  FlowTrigger,
  FormField,
  FormResult,
  MenuResult,
  ProvisioningDependencies,
  StepInput,
} from "./schema.js";

// Constants & helpers
export { ABORT_REASONS, BACK, CONFIG_STEP_IDS, OPEN, submit } from "./schema.js";
export { showForm, abort, evaluateProximity } from "./transform.js";

// Errors
export type { ContractRule } from "./errors.js";
export { FlowContractViolation, isFlowContractViolation } from "./errors.js";

// State machine
export { ProvisioningFlow } from "./flow.js";
