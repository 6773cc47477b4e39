/**
 * Runtime Module - Error Types
 */
import { type PanelError, formatPanelError } from "../panel/index.js";

export type RuntimeError =
  | { readonly type: "ENTRY_NOT_FOUND"; readonly entryId: string }
  | { readonly type: "NOT_LOADED"; readonly entryId: string }
  | { readonly type: "AUTH_FAILED"; readonly entryId: string }
  | {
      readonly type: "NOT_READY";
      readonly entryId: string;
      readonly cause: PanelError;
    }
  | {
      readonly type: "SWITCH_NOT_FOUND";
      readonly entryId: string;
      readonly circuitId: string;
    }
  | {
      readonly type: "RELAY_FAILED";
      readonly entryId: string;
      readonly circuitId: string;
      readonly cause: PanelError;
    };

export const entryNotFound = (entryId: string): RuntimeError => ({
  type: "ENTRY_NOT_FOUND",
  entryId,
});

export const notLoaded = (entryId: string): RuntimeError => ({
  type: "NOT_LOADED",
  entryId,
});

export const authFailed = (entryId: string): RuntimeError => ({
  type: "AUTH_FAILED",
  entryId,
});

export const notReady = (entryId: string, cause: PanelError): RuntimeError => ({
  type: "NOT_READY",
  entryId,
  cause,
});

export const switchNotFound = (entryId: string, circuitId: string): RuntimeError => ({
  type: "SWITCH_NOT_FOUND",
  entryId,
  circuitId,
});

export const relayFailed = (
  entryId: string,
  circuitId: string,
  cause: PanelError,
): RuntimeError => ({
  type: "RELAY_FAILED",
  entryId,
  circuitId,
  cause,
});

export const formatRuntimeError = (error: RuntimeError): string => {
  switch (error.type) {
    case "ENTRY_NOT_FOUND":
      return `Entry ${error.entryId} not found`;
    case "NOT_LOADED":
      return `Entry ${error.entryId} is not loaded`;
    case "AUTH_FAILED":
      return `Panel of entry ${error.entryId} rejected its access token`;
    case "NOT_READY":
      return `Panel of entry ${error.entryId} not ready: ${formatPanelError(error.cause)}`;
    case "SWITCH_NOT_FOUND":
      return `Entry ${error.entryId} has no switch for circuit ${error.circuitId}`;
    case "RELAY_FAILED":
      return `Relay of circuit ${error.circuitId} failed: ${formatPanelError(error.cause)}`;
  }
};
