/**
 * Entries Module - Public API
 */

// Types
export type {
  Entry,
  EntryData,
  EntryRepository,
  EntryStore,
  NewEntry,
  ReloadHandler,
} from "./schema.js";
export { EntryDataSchema } from "./schema.js";
export type { EntryError } from "./errors.js";

// Error utilities
export { formatEntryError } from "./errors.js";

// Service functions
export {
  createEntryRepository,
  createFileEntryStore,
  loadEntryRepository,
  redactEntry,
  scheduleReload,
} from "./service.js";
