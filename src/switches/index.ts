/**
 * Switches Module - Public API
 */
export type { SwitchView } from "./service.js";
export {
  CircuitSwitch,
  SWITCH_ICON,
  buildCircuitSwitches,
  buildSwitchUniqueId,
} from "./service.js";
