/**
 * Request bodies accepted by the HTTP API.
 */
import { z } from "zod";

export const StepActionSchema = z.object({
  action: z.enum(["open", "submit", "back"]),
  data: z.record(z.unknown()).default({}),
});

export type StepAction = z.infer<typeof StepActionSchema>;

export const DiscoveryRequestSchema = z.object({
  host: z.string().trim().min(1),
});

export const SwitchCommandSchema = z.object({
  on: z.boolean(),
});
