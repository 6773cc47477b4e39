/**
 * Entries Module - Service Layer
 *
 * JSON file persistence and the in-memory repository built on top of it.
 * Mutations run one at a time and are written through before they resolve.
 */
import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import {
  type EntryError,
  duplicateUniqueId,
  formatEntryError,
  notFound,
  storageCorrupt,
  storageFailed,
} from "./errors.js";
import {
  ENTRIES_FILE_VERSION,
  EntriesFileSchema,
  type Entry,
  type EntryData,
  type EntryRepository,
  type EntryStore,
  type NewEntry,
  type ReloadHandler,
} from "./schema.js";

const log = createLogger("entries");

const ENTRIES_FILE = "entries.json";

// =============================================================================
// File Store
// =============================================================================

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Store entries in <dataDir>/entries.json.
 */
export function createFileEntryStore(dataDir: string): EntryStore {
  const filePath = path.join(dataDir, ENTRIES_FILE);

  return {
    async load(): Promise<Result<ReadonlyArray<Entry>, EntryError>> {
      let raw: string;
      try {
        raw = await fs.readFile(filePath, "utf-8");
      } catch (error) {
        if (isMissingFile(error)) {
          log.info({ filePath }, "No entries file yet, starting empty");
          return ok([]);
        }
        return err(storageFailed(`Cannot read ${filePath}`, toError(error)));
      }

      let json: unknown;
      try {
        json = JSON.parse(raw);
      } catch {
        return err(storageCorrupt(filePath, "not valid JSON"));
      }

      const parsed = EntriesFileSchema.safeParse(json);
      if (!parsed.success) {
        return err(storageCorrupt(filePath, parsed.error.issues[0]?.message ?? "invalid shape"));
      }

      return ok(parsed.data.entries);
    },

    async save(
      entries: ReadonlyArray<Entry>,
    ): Promise<Result<true, EntryError>> {
      try {
        await fs.mkdir(dataDir, { recursive: true });
        const tmpPath = `${filePath}.tmp`;
        await fs.writeFile(
          tmpPath,
          JSON.stringify({ version: ENTRIES_FILE_VERSION, entries }, null, 2),
        );
        await fs.rename(tmpPath, filePath);
        return ok(true);
      } catch (error) {
        return err(storageFailed(`Cannot write ${filePath}`, toError(error)));
      }
    },
  };
}

// =============================================================================
// Repository
// =============================================================================

/**
 * Load all entries from the store and serve them from memory.
 */
export async function loadEntryRepository(
  store: EntryStore,
): Promise<Result<EntryRepository, EntryError>> {
  const loaded = await store.load();
  if (loaded.isErr()) {
    log.error({ error: formatEntryError(loaded.error) }, "Failed to load entries");
    return err(loaded.error);
  }

  log.info({ count: loaded.value.length }, "Entries loaded");
  return ok(createEntryRepository(store, loaded.value));
}

export function createEntryRepository(
  store: EntryStore,
  initial: ReadonlyArray<Entry> = [],
): EntryRepository {
  let entries: ReadonlyArray<Entry> = initial;
  let reloadHandler: ReloadHandler | null = null;
  let queue: Promise<void> = Promise.resolve();

  /**
   * Run a mutation behind every earlier one. Mutations read `entries`
   * only inside the task.
   */
  function enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = queue.then(task);
    queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /**
   * Persist the next state, and only adopt it once written.
   */
  async function commit(
    next: ReadonlyArray<Entry>,
  ): Promise<Result<true, EntryError>> {
    const saved = await store.save(next);
    if (saved.isOk()) {
      entries = next;
    } else {
      log.error({ error: formatEntryError(saved.error) }, "Failed to save entries");
    }
    return saved;
  }

  function replace(
    entryId: string,
    change: (entry: Entry) => Entry,
  ): Promise<Result<Entry, EntryError>> {
    return enqueue(async (): Promise<Result<Entry, EntryError>> => {
      const current = entries.find((e) => e.entryId === entryId);
      if (!current) {
        return err(notFound(entryId));
      }

      const updated = change(current);
      const saved = await commit(
        entries.map((e) => (e.entryId === entryId ? updated : e)),
      );
      return saved.map(() => updated);
    });
  }

  return {
    list: () => entries,

    get: (entryId) => entries.find((e) => e.entryId === entryId),

    findByUniqueId: (uniqueId) => entries.find((e) => e.uniqueId === uniqueId),

    findByHost: (host) => entries.find((e) => e.data.host === host),

    create(input: NewEntry): Promise<Result<Entry, EntryError>> {
      return enqueue(async (): Promise<Result<Entry, EntryError>> => {
        if (entries.some((e) => e.uniqueId === input.uniqueId)) {
          return err(duplicateUniqueId(input.uniqueId));
        }

        const entry: Entry = {
          entryId: randomUUID(),
          uniqueId: input.uniqueId,
          title: input.title,
          data: { ...input.data },
          options: {},
          createdAt: new Date().toISOString(),
        };

        const saved = await commit([...entries, entry]);
        if (saved.isErr()) {
          return err(saved.error);
        }

        log.info(
          { entryId: entry.entryId, uniqueId: entry.uniqueId, host: entry.data.host },
          "Entry created",
        );
        return ok(entry);
      });
    },

    async update(
      entry: Entry,
      data: EntryData,
    ): Promise<Result<Entry, EntryError>> {
      const result = await replace(entry.entryId, (current) => ({
        ...current,
        data: { ...data },
      }));

      if (result.isOk()) {
        log.info({ entryId: entry.entryId, host: data.host }, "Entry data updated");
      }
      return result;
    },

    async updateOptions(
      entry: Entry,
      options: Entry["options"],
    ): Promise<Result<Entry, EntryError>> {
      const result = await replace(entry.entryId, (current) => ({
        ...current,
        options: { ...options },
      }));

      if (result.isOk()) {
        log.info({ entryId: entry.entryId, options }, "Entry options updated");
      }
      return result;
    },

    remove(entryId: string): Promise<Result<Entry, EntryError>> {
      return enqueue(async (): Promise<Result<Entry, EntryError>> => {
        const current = entries.find((e) => e.entryId === entryId);
        if (!current) {
          return err(notFound(entryId));
        }

        const saved = await commit(entries.filter((e) => e.entryId !== entryId));
        if (saved.isErr()) {
          return err(saved.error);
        }

        log.info({ entryId }, "Entry removed");
        return ok(current);
      });
    },

    async reload(entryId: string): Promise<void> {
      if (!reloadHandler) {
        log.debug({ entryId }, "No reload handler registered");
        return;
      }
      log.info({ entryId }, "Reloading entry");
      await reloadHandler(entryId);
    },

    onReload(handler: ReloadHandler): void {
      reloadHandler = handler;
    },
  };
}

/**
 * Schedule a reload without awaiting it. Failures are logged only.
 */
export function scheduleReload(
  repository: EntryRepository,
  entryId: string,
): void {
  repository.reload(entryId).catch((error: unknown) => {
    log.warn(
      { entryId, error: error instanceof Error ? error.message : String(error) },
      "Background entry reload failed",
    );
  });
}

/**
 * Entry as exposed over the API: the access token never leaves the service.
 */
export function redactEntry(entry: Entry): Entry {
  return {
    ...entry,
    data: { ...entry.data, access_token: "***redacted***" },
  };
}
