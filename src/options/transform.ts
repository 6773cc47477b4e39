/**
 * Options transformations - pure functions with no side effects.
 */
import { type Result, err, ok } from "neverthrow";
import type { ZodIssue } from "zod";
import type { FormField } from "../provisioning/index.js";
import {
  DEFAULT_OPTIONS,
  type EntryOptions,
  EntryOptionsSchema,
  MIN_SCAN_INTERVAL_SECONDS,
  OPTION_KEYS,
  type StoredOptions,
} from "./schema.js";

/**
 * Stored options with defaults applied to the absent keys only.
 */
export const resolveOptions = (stored: StoredOptions): EntryOptions => ({
  scan_interval: stored.scan_interval ?? DEFAULT_OPTIONS.scan_interval,
  enable_battery_percentage:
    stored.enable_battery_percentage ?? DEFAULT_OPTIONS.enable_battery_percentage,
  enable_solar_circuit:
    stored.enable_solar_circuit ?? DEFAULT_OPTIONS.enable_solar_circuit,
  inverter_leg1: stored.inverter_leg1 ?? DEFAULT_OPTIONS.inverter_leg1,
  inverter_leg2: stored.inverter_leg2 ?? DEFAULT_OPTIONS.inverter_leg2,
});

/**
 * Form fields of the options step, prefilled with the current values.
 */
export const buildOptionsFields = (
  current: EntryOptions,
): ReadonlyArray<FormField> => [
  {
    name: "scan_interval",
    type: "integer",
    required: false,
    default: current.scan_interval,
    min: MIN_SCAN_INTERVAL_SECONDS,
  },
  {
    name: "enable_battery_percentage",
    type: "boolean",
    required: false,
    default: current.enable_battery_percentage,
  },
  {
    name: "enable_solar_circuit",
    type: "boolean",
    required: false,
    default: current.enable_solar_circuit,
  },
  {
    name: "inverter_leg1",
    type: "integer",
    required: false,
    default: current.inverter_leg1,
    min: 0,
  },
  {
    name: "inverter_leg2",
    type: "integer",
    required: false,
    default: current.inverter_leg2,
    min: 0,
  },
];

/**
 * One error code per field; the first issue wins.
 */
export const issuesToErrors = (
  issues: ReadonlyArray<ZodIssue>,
): Record<string, string> => {
  const errors: Record<string, string> = {};
  for (const issue of issues) {
    const field = issue.path.length > 0 ? String(issue.path[0]) : "base";
    if (!(field in errors)) {
      errors[field] = issue.code;
    }
  }
  return errors;
};

/**
 * Validate a submission. Fields left out keep their current value;
 * keys that are not options are ignored.
 */
export const parseOptionsInput = (
  data: Readonly<Record<string, unknown>>,
  current: EntryOptions,
): Result<EntryOptions, Record<string, string>> => {
  const merged: Record<string, unknown> = { ...current };
  for (const key of OPTION_KEYS) {
    const value = data[key];
    if (value !== undefined && value !== null && value !== "") {
      merged[key] = value;
    }
  }

  const parsed = EntryOptionsSchema.safeParse(merged);
  if (!parsed.success) {
    return err(issuesToErrors(parsed.error.issues));
  }
  return ok(parsed.data);
};
