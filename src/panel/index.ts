/**
 * Panel Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type {
  Circuit,
  PanelClient,
  PanelClientFactory,
  PanelClientOptions,
  PanelStatus,
  RelayState,
} from "./schema.js";
export type { PanelError } from "./errors.js";

// Error utilities
export { formatPanelError } from "./errors.js";

// Service functions (side effects)
export { createPanelClient, createPanelClientFactory } from "./service.js";

// Pure transformations (for testing)
export {
  buildPanelUrl,
  buildRelayPayload,
  toCircuits,
  toPanelStatus,
} from "./transform.js";
