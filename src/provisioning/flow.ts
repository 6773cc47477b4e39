/**
 * Provisioning Module - Authentication State Machine
 *
 * Three entry points (user, discovery, reauth) share setup, the duplicate
 * check, the auth-type choice and the two auth methods, and resolve to
 * creating a new entry or updating the one being re-authenticated.
 *
 * Panel failures become forms with errors or aborts. Caller misuse
 * (steps before setup, setup twice, resolving without the needed fields)
 * throws FlowContractViolation and is never caught here.
 */
import { formatEntryError, scheduleReload } from "../entries/index.js";
import { createLogger } from "../logger.js";
import { formatPanelError } from "../panel/index.js";
import { ProvisioningContext } from "./context.js";
import { FlowContractViolation } from "./errors.js";
import {
  type AbortResult,
  CONFIG_STEP_IDS,
  type ConfigStepId,
  type DiscoveryInfo,
  type FlowHandler,
  type FlowResult,
  type FlowTrigger,
  OPEN,
  type ProvisioningDependencies,
  type StepInput,
  submit,
} from "./schema.js";
import {
  AUTH_MENU_OPTIONS,
  AUTH_TOKEN_FORM_FIELDS,
  type ProximityState,
  USER_FORM_FIELDS,
  abort,
  buildEntryData,
  evaluateProximity,
  isIpv4Address,
  mergeEntryData,
  parseHostInput,
  parseTokenInput,
  showForm,
  showMenu,
} from "./transform.js";

const log = createLogger("flow");

function isConfigStepId(stepId: string): stepId is ConfigStepId {
  return CONFIG_STEP_IDS.some((id) => id === stepId);
}

export class ProvisioningFlow implements FlowHandler {
  readonly handler = "config";
  readonly flowId: string;

  private readonly deps: ProvisioningDependencies;
  private readonly context = new ProvisioningContext();

  constructor(flowId: string, deps: ProvisioningDependencies) {
    this.flowId = flowId;
    this.deps = deps;
  }

  /**
   * Serial number of the panel being added, once known.
   */
  get uniqueId(): string | null {
    if (!this.context.isSetUp || this.context.trigger.type !== "CREATE_ENTRY") {
      return null;
    }
    return this.context.serialNumber;
  }

  get titlePlaceholders(): Readonly<Record<string, string>> {
    return this.context.placeholders;
  }

  get isSetUp(): boolean {
    return this.context.isSetUp;
  }

  hasStep(stepId: string): boolean {
    return isConfigStepId(stepId);
  }

  async handleStep(stepId: string, input: StepInput): Promise<FlowResult> {
    if (!isConfigStepId(stepId)) {
      throw new FlowContractViolation("UNKNOWN_STEP", `Unknown step ${stepId}`);
    }

    switch (stepId) {
      case "user":
        return this.stepUser(input);
      case "confirm_discovery":
        return this.stepConfirmDiscovery(input);
      case "choose_auth_type":
        return this.stepChooseAuthType(input);
      case "auth_proximity":
        return this.stepAuthProximity(input);
      case "auth_token":
        return this.stepAuthToken(input);
    }
  }

  // ===========================================================================
  // Entry Points
  // ===========================================================================

  /**
   * Operator typed in a host.
   */
  async stepUser(input: StepInput): Promise<FlowResult> {
    if (input.kind !== "submit") {
      return showForm("user", { fields: USER_FORM_FIELDS });
    }

    const host = parseHostInput(input.data);
    if (host === null) {
      return showForm("user", {
        fields: USER_FORM_FIELDS,
        errors: { host: "required" },
      });
    }

    if (!(await this.validateHost(host))) {
      log.warn({ flowId: this.flowId, host }, "  ↳ Host is not a reachable panel");
      return showForm("user", {
        fields: USER_FORM_FIELDS,
        errors: { base: "cannot_connect" },
      });
    }

    if (!(await this.setUp({ type: "CREATE_ENTRY" }, host))) {
      return showForm("user", {
        fields: USER_FORM_FIELDS,
        errors: { base: "cannot_connect" },
      });
    }

    const duplicate = await this.ensureNotAlreadyConfigured();
    if (duplicate) {
      return duplicate;
    }

    return this.stepConfirmDiscovery(OPEN);
  }

  /**
   * Network discovery found a host.
   */
  async stepDiscovery(info: DiscoveryInfo): Promise<FlowResult> {
    const { host } = info;
    log.info({ flowId: this.flowId, host }, "→ Discovery flow started");

    // Do not probe hosts that are already configured
    if (this.deps.entries.findByHost(host)) {
      return abort("already_configured");
    }

    if (!isIpv4Address(host)) {
      return abort("not_ipv4_address");
    }

    if (!(await this.validateHost(host))) {
      return abort("not_span_panel");
    }

    if (!(await this.setUp({ type: "CREATE_ENTRY" }, host))) {
      return abort("cannot_connect");
    }

    const duplicate = await this.ensureNotAlreadyConfigured();
    if (duplicate) {
      return duplicate;
    }

    return this.stepConfirmDiscovery(OPEN);
  }

  /**
   * The stored token of an entry stopped working.
   */
  async stepReauth(entryId: string): Promise<FlowResult> {
    const entry = this.deps.entries.get(entryId);
    if (!entry) {
      throw new FlowContractViolation(
        "ENTRY_MISSING",
        `Cannot re-authenticate unknown entry ${entryId}`,
      );
    }

    log.info(
      { flowId: this.flowId, entryId, host: entry.data.host },
      "→ Re-auth flow started",
    );

    if (!(await this.setUp({ type: "UPDATE_ENTRY", entryId }, entry.data.host))) {
      return abort("cannot_connect");
    }

    return this.stepAuthProximity(OPEN);
  }

  // ===========================================================================
  // Shared Steps
  // ===========================================================================

  /**
   * Prompt the operator to confirm the panel.
   */
  async stepConfirmDiscovery(input: StepInput): Promise<FlowResult> {
    this.context.ensureSetUp();

    if (input.kind === "submit") {
      return this.stepChooseAuthType(input);
    }

    return showForm("confirm_discovery", {
      placeholders: { host: this.context.host },
      confirmOnly: true,
    });
  }

  /**
   * Offer the two auth methods. Anything but a submission is the menu
   * host backing out, which returns to the confirmation.
   */
  async stepChooseAuthType(input: StepInput): Promise<FlowResult> {
    this.context.ensureSetUp();

    if (input.kind !== "submit") {
      return this.stepConfirmDiscovery(OPEN);
    }

    return showMenu("choose_auth_type", AUTH_MENU_OPTIONS);
  }

  /**
   * Wait for proof of proximity, then register for a token.
   * Re-shows the waiting form until the panel reports proximity; the
   * caller decides how often to come back.
   */
  async stepAuthProximity(input: StepInput): Promise<FlowResult> {
    this.context.ensureSetUp();

    if (input.kind === "back") {
      return this.stepChooseAuthType(submit());
    }

    const host = this.context.host;
    const client = this.deps.createClient(host);

    const status = await client.getStatusData();
    if (status.isErr()) {
      log.warn(
        { flowId: this.flowId, host, error: formatPanelError(status.error) },
        "  ↳ Panel status unavailable while waiting for proximity",
      );
      return showForm("auth_proximity", { errors: { base: "cannot_connect" } });
    }

    const proximity = evaluateProximity(status.value);
    if (!proximity.ready) {
      log.debug({ flowId: this.flowId, proximity }, "  ↳ Proximity not proven yet");
      return this.proximityWaitingForm(proximity);
    }

    if (!host) {
      return abort("host_not_set");
    }

    const token = await client.getAccessToken();
    if (token.isErr()) {
      return showForm("auth_proximity", { errors: { base: "cannot_connect" } });
    }

    if (!(await this.validateHost(host, token.value))) {
      return abort("invalid_access_token");
    }

    this.context.recordAccessToken(token.value);

    log.info({ flowId: this.flowId, host }, "  ↳ Proximity authentication succeeded");
    return this.resolveEntry();
  }

  /**
   * Operator pastes an existing token. An empty submission goes back
   * to the method menu.
   */
  async stepAuthToken(input: StepInput): Promise<FlowResult> {
    this.context.ensureSetUp();

    if (input.kind === "open") {
      return showForm("auth_token", { fields: AUTH_TOKEN_FORM_FIELDS });
    }

    if (input.kind === "back") {
      return this.stepChooseAuthType(submit());
    }

    const accessToken = parseTokenInput(input.data);
    if (accessToken === null) {
      return this.stepChooseAuthType(input);
    }

    const host = this.context.host;
    if (!host) {
      return abort("host_not_set");
    }

    if (!(await this.validateHost(host, accessToken))) {
      return abort("invalid_access_token");
    }

    this.context.recordAccessToken(accessToken);

    log.info({ flowId: this.flowId, host }, "  ↳ Token authentication succeeded");
    return this.resolveEntry();
  }

  /**
   * Create or update the entry, depending on what triggered the flow.
   */
  async resolveEntry(): Promise<FlowResult> {
    const trigger = this.context.trigger;

    switch (trigger.type) {
      case "CREATE_ENTRY":
        return this.createNewEntry();
      case "UPDATE_ENTRY":
        return this.updateExistingEntry(trigger.entryId);
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async validateHost(host: string, accessToken?: string): Promise<boolean> {
    return this.deps.createClient(host, accessToken).ping();
  }

  /**
   * Fetch the panel status and record host, serial and trigger.
   * Returns false when the panel cannot be read; setup stays pending then.
   */
  private async setUp(trigger: FlowTrigger, host: string): Promise<boolean> {
    if (this.context.isSetUp) {
      throw new FlowContractViolation("SETUP_TWICE", "Flow is already set up");
    }

    const status = await this.deps.createClient(host).getStatusData();
    if (status.isErr()) {
      log.warn(
        { flowId: this.flowId, host, error: formatPanelError(status.error) },
        "  ↳ Setup could not read panel status",
      );
      return false;
    }

    this.context.setUp({
      trigger,
      host,
      serialNumber: status.value.serialNumber,
    });

    log.info(
      {
        flowId: this.flowId,
        host,
        serialNumber: status.value.serialNumber,
        trigger: trigger.type,
      },
      "  ↳ Flow set up",
    );
    return true;
  }

  /**
   * Abort when the panel already has an entry (refreshing its stored host
   * first) or another flow is already adding it.
   */
  private async ensureNotAlreadyConfigured(): Promise<AbortResult | null> {
    const { host, serialNumber } = this.context.ensureSetUp();
    const { entries } = this.deps;

    if (this.deps.isUniqueIdInProgress(serialNumber, this.flowId)) {
      return abort("already_in_progress");
    }

    const existing = entries.findByUniqueId(serialNumber);
    if (!existing) {
      return null;
    }

    if (existing.data.host !== host) {
      const updated = await entries.update(existing, { ...existing.data, host });
      if (updated.isOk()) {
        scheduleReload(entries, existing.entryId);
      } else {
        log.warn(
          { flowId: this.flowId, error: formatEntryError(updated.error) },
          "  ↳ Could not refresh host of configured panel",
        );
      }
    }

    log.info(
      { flowId: this.flowId, serialNumber, entryId: existing.entryId },
      "  ↳ Panel already configured",
    );
    return abort("already_configured");
  }

  private proximityWaitingForm(
    proximity: Exclude<ProximityState, { ready: true }>,
  ): FlowResult {
    if (
      proximity.firmware === "unlock_button_presses" &&
      proximity.remainingPresses !== null
    ) {
      return showForm("auth_proximity", {
        placeholders: { remaining_presses: String(proximity.remainingPresses) },
      });
    }
    return showForm("auth_proximity");
  }

  private async createNewEntry(): Promise<FlowResult> {
    const { host, serialNumber } = this.context.ensureSetUp();
    const accessToken = this.context.accessToken;

    if (!host) {
      throw new FlowContractViolation(
        "MISSING_FIELD",
        "Host cannot be absent when creating a new entry",
      );
    }
    if (!serialNumber) {
      throw new FlowContractViolation(
        "MISSING_FIELD",
        "Serial number cannot be absent when creating a new entry",
      );
    }
    if (accessToken === undefined) {
      throw new FlowContractViolation(
        "MISSING_FIELD",
        "Access token cannot be absent when creating a new entry",
      );
    }

    const data = buildEntryData(host, accessToken);
    const created = await this.deps.entries.create({
      uniqueId: serialNumber,
      title: serialNumber,
      data,
    });

    if (created.isErr()) {
      if (created.error.type === "DUPLICATE_UNIQUE_ID") {
        return abort("already_configured");
      }
      throw new Error(formatEntryError(created.error));
    }

    log.info(
      { flowId: this.flowId, entryId: created.value.entryId, serialNumber },
      "✓ Entry created",
    );
    return {
      type: "create_entry",
      title: serialNumber,
      data,
      entryId: created.value.entryId,
    };
  }

  private async updateExistingEntry(entryId: string): Promise<FlowResult> {
    const { host } = this.context.ensureSetUp();
    const accessToken = this.context.accessToken;

    if (!host) {
      throw new FlowContractViolation(
        "MISSING_FIELD",
        "Host cannot be absent when updating an entry",
      );
    }
    if (accessToken === undefined) {
      throw new FlowContractViolation(
        "MISSING_FIELD",
        "Access token cannot be absent when updating an entry",
      );
    }

    const entry = this.deps.entries.get(entryId);
    if (!entry) {
      throw new FlowContractViolation("ENTRY_MISSING", "Entry does not exist");
    }

    const updated = await this.deps.entries.update(
      entry,
      mergeEntryData(entry.data, host, accessToken),
    );
    if (updated.isErr()) {
      throw new Error(formatEntryError(updated.error));
    }

    scheduleReload(this.deps.entries, entryId);

    log.info({ flowId: this.flowId, entryId }, "✓ Entry re-authenticated");
    return abort("reauth_successful");
  }
}
