/**
 * Runtime Module - Public API
 */
export type { PanelRuntime, RuntimeDependencies, SetupSummary } from "./service.js";
export type { RuntimeError } from "./errors.js";
export { formatRuntimeError } from "./errors.js";
export { createPanelRuntime } from "./service.js";
