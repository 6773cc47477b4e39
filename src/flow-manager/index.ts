/**
 * Flow Manager - Public API
 */

// Types
export type {
  FlowManager,
  FlowManagerDependencies,
  FlowOutcome,
  FlowSource,
  FlowView,
} from "./schema.js";
export type { FlowManagerError } from "./errors.js";

// Error utilities
export { formatFlowManagerError } from "./errors.js";

// Service
export { createFlowManager } from "./service.js";
