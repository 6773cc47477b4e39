/**
 * Options Module - Schemas and Types
 *
 * Post-setup options of a configured panel entry.
 */
import { z } from "zod";

/**
 * Poll interval used when no scan_interval has been stored.
 */
export const DEFAULT_SCAN_INTERVAL_SECONDS = 15;

export const MIN_SCAN_INTERVAL_SECONDS = 5;

export const OPTION_KEYS = [
  "scan_interval",
  "enable_battery_percentage",
  "enable_solar_circuit",
  "inverter_leg1",
  "inverter_leg2",
] as const;

export type OptionKey = (typeof OPTION_KEYS)[number];

/**
 * Fully resolved options.
 */
export const EntryOptionsSchema = z.object({
  scan_interval: z.coerce.number().int().min(MIN_SCAN_INTERVAL_SECONDS),
  enable_battery_percentage: z.boolean(),
  enable_solar_circuit: z.boolean(),
  inverter_leg1: z.coerce.number().int().min(0),
  inverter_leg2: z.coerce.number().int().min(0),
});

export type EntryOptions = z.infer<typeof EntryOptionsSchema>;

/**
 * Options as persisted: any subset, absent keys fall back to defaults.
 */
export const StoredOptionsSchema = EntryOptionsSchema.partial();

export type StoredOptions = z.infer<typeof StoredOptionsSchema>;

export const DEFAULT_OPTIONS: EntryOptions = {
  scan_interval: DEFAULT_SCAN_INTERVAL_SECONDS,
  enable_battery_percentage: false,
  enable_solar_circuit: false,
  inverter_leg1: 0,
  inverter_leg2: 0,
};
