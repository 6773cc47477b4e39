/**
 * Coordinator Module - Public API
 */
export type { CoordinatorOptions, PanelCoordinator, PanelSnapshot } from "./schema.js";
export { createPanelCoordinator } from "./service.js";
