/**
 * Options Module - Service Layer
 *
 * Single-step flow that edits the options of a configured entry.
 */
import { type EntryRepository, formatEntryError, scheduleReload } from "../entries/index.js";
import { createLogger } from "../logger.js";
import {
  type FlowHandler,
  type FlowResult,
  FlowContractViolation,
  type StepInput,
  showForm,
} from "../provisioning/index.js";
import {
  buildOptionsFields,
  parseOptionsInput,
  resolveOptions,
} from "./transform.js";

const log = createLogger("options");

export const OPTIONS_STEP_ID = "init";

export class OptionsFlow implements FlowHandler {
  readonly handler = "options";
  readonly uniqueId = null;
  readonly titlePlaceholders: Readonly<Record<string, string>> = {};
  readonly flowId: string;
  readonly entryId: string;

  private readonly entries: EntryRepository;

  constructor(flowId: string, entryId: string, entries: EntryRepository) {
    this.flowId = flowId;
    this.entryId = entryId;
    this.entries = entries;
  }

  hasStep(stepId: string): boolean {
    return stepId === OPTIONS_STEP_ID;
  }

  async handleStep(stepId: string, input: StepInput): Promise<FlowResult> {
    if (!this.hasStep(stepId)) {
      throw new FlowContractViolation("UNKNOWN_STEP", `Unknown step ${stepId}`);
    }
    return this.stepInit(input);
  }

  async stepInit(input: StepInput): Promise<FlowResult> {
    const entry = this.entries.get(this.entryId);
    if (!entry) {
      throw new FlowContractViolation(
        "ENTRY_MISSING",
        `Cannot edit options of unknown entry ${this.entryId}`,
      );
    }

    const current = resolveOptions(entry.options);

    if (input.kind !== "submit") {
      return showForm(OPTIONS_STEP_ID, { fields: buildOptionsFields(current) });
    }

    const parsed = parseOptionsInput(input.data, current);
    if (parsed.isErr()) {
      log.debug({ entryId: entry.entryId, errors: parsed.error }, "Invalid options submitted");
      return showForm(OPTIONS_STEP_ID, {
        fields: buildOptionsFields(current),
        errors: parsed.error,
      });
    }

    const updated = await this.entries.updateOptions(entry, parsed.value);
    if (updated.isErr()) {
      throw new Error(formatEntryError(updated.error));
    }

    scheduleReload(this.entries, entry.entryId);

    log.info({ entryId: entry.entryId, options: parsed.value }, "✓ Options saved");
    return { type: "create_entry", title: "", data: parsed.value, entryId: entry.entryId };
  }
}
