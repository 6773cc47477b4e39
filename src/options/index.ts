/**
 * Options Module - Public API
 */

// Types
export type { EntryOptions, OptionKey, StoredOptions } from "./schema.js";

// Constants
export {
  DEFAULT_OPTIONS,
  DEFAULT_SCAN_INTERVAL_SECONDS,
  MIN_SCAN_INTERVAL_SECONDS,
  OPTION_KEYS,
} from "./schema.js";

// Pure transformations
export { buildOptionsFields, parseOptionsInput, resolveOptions } from "./transform.js";

// Flow
export { OPTIONS_STEP_ID, OptionsFlow } from "./service.js";
