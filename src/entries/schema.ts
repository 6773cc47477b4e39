/**
 * Entries Module - Schemas and Types
 *
 * Persisted configuration entries, one per panel.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import type { Result } from "neverthrow";
import { z } from "zod";
import { StoredOptionsSchema } from "../options/schema.js";
import type { EntryError } from "./errors.js";

// =============================================================================
// Entry
// =============================================================================

/**
 * Connection data of an entry. Unrelated keys are kept as-is.
 */
export const EntryDataSchema = z
  .object({
    host: z.string().min(1),
    access_token: z.string().min(1),
  })
  .passthrough();

export type EntryData = z.infer<typeof EntryDataSchema>;

export const EntrySchema = z.object({
  entryId: z.string().min(1),
  /** Panel serial number */
  uniqueId: z.string().min(1),
  title: z.string(),
  data: EntryDataSchema,
  options: StoredOptionsSchema.default({}),
  createdAt: z.string().datetime(),
});

export type Entry = z.infer<typeof EntrySchema>;

export type NewEntry = Readonly<{
  uniqueId: string;
  title: string;
  data: EntryData;
}>;

// =============================================================================
// Storage File
// =============================================================================

export const ENTRIES_FILE_VERSION = 1;

export const EntriesFileSchema = z.object({
  version: z.literal(ENTRIES_FILE_VERSION),
  entries: z.array(EntrySchema),
});

export type EntriesFile = z.infer<typeof EntriesFileSchema>;

/**
 * Persistence backend behind the repository.
 */
export interface EntryStore {
  load(): Promise<Result<ReadonlyArray<Entry>, EntryError>>;
  save(entries: ReadonlyArray<Entry>): Promise<Result<true, EntryError>>;
}

// =============================================================================
// Repository Contract
// =============================================================================

export type ReloadHandler = (entryId: string) => Promise<void>;

export interface EntryRepository {
  list(): ReadonlyArray<Entry>;
  get(entryId: string): Entry | undefined;
  findByUniqueId(uniqueId: string): Entry | undefined;
  findByHost(host: string): Entry | undefined;
  create(input: NewEntry): Promise<Result<Entry, EntryError>>;
  /** Replaces stored data wholesale. */
  update(entry: Entry, data: EntryData): Promise<Result<Entry, EntryError>>;
  /** Replaces stored options wholesale. */
  updateOptions(
    entry: Entry,
    options: Entry["options"],
  ): Promise<Result<Entry, EntryError>>;
  remove(entryId: string): Promise<Result<Entry, EntryError>>;
  /** Runs the registered reload handler; callers need not await it. */
  reload(entryId: string): Promise<void>;
  onReload(handler: ReloadHandler): void;
}
