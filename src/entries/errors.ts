/**
 * Entries Module - Error Types
 */

export type EntryError =
  | {
      readonly type: "NOT_FOUND";
      readonly entryId: string;
    }
  | {
      readonly type: "DUPLICATE_UNIQUE_ID";
      readonly uniqueId: string;
    }
  | {
      readonly type: "STORAGE_FAILED";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "STORAGE_CORRUPT";
      readonly path: string;
      readonly message: string;
    };

export function notFound(entryId: string): EntryError {
  return { type: "NOT_FOUND", entryId };
}

export function duplicateUniqueId(uniqueId: string): EntryError {
  return { type: "DUPLICATE_UNIQUE_ID", uniqueId };
}

export function storageFailed(message: string, cause?: Error): EntryError {
  if (cause) {
    return { type: "STORAGE_FAILED", message, cause };
  }
  return { type: "STORAGE_FAILED", message };
}

export function storageCorrupt(path: string, message: string): EntryError {
  return { type: "STORAGE_CORRUPT", path, message };
}

export function formatEntryError(error: EntryError): string {
  switch (error.type) {
    case "NOT_FOUND":
      return `Entry ${error.entryId} not found`;
    case "DUPLICATE_UNIQUE_ID":
      return `An entry for ${error.uniqueId} already exists`;
    case "STORAGE_FAILED":
      return `Storage failed: ${error.message}`;
    case "STORAGE_CORRUPT":
      return `Corrupt entries file ${error.path}: ${error.message}`;
  }
}
