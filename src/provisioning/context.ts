/**
 * Provisioning Module - Flow Context
 *
 * State carried across the steps of one flow instance.
 * Fields go from absent to set and are never reset.
 */
import { FlowContractViolation } from "./errors.js";
import type { FlowTrigger } from "./schema.js";

type SetUpState = Readonly<{
  trigger: FlowTrigger;
  host: string;
  serialNumber: string;
}>;

export class ProvisioningContext {
  private state: SetUpState | null = null;
  private token: string | null = null;

  get isSetUp(): boolean {
    return this.state !== null;
  }

  /**
   * Record what setup learned. Runs at most once per flow.
   */
  setUp(init: SetUpState): void {
    if (this.state !== null) {
      throw new FlowContractViolation("SETUP_TWICE", "Flow is already set up");
    }
    this.state = { ...init };
  }

  ensureSetUp(): SetUpState {
    if (this.state === null) {
      throw new FlowContractViolation("NOT_SET_UP", "Flow is not set up");
    }
    return this.state;
  }

  get trigger(): FlowTrigger {
    return this.ensureSetUp().trigger;
  }

  get host(): string {
    return this.ensureSetUp().host;
  }

  get serialNumber(): string {
    return this.ensureSetUp().serialNumber;
  }

  get accessToken(): string | undefined {
    return this.token ?? undefined;
  }

  recordAccessToken(accessToken: string): void {
    this.ensureSetUp();
    if (this.token !== null) {
      throw new FlowContractViolation(
        "FIELD_ALREADY_SET",
        "Access token is already recorded for this flow",
      );
    }
    this.token = accessToken;
  }

  /**
   * Title placeholders of the flow (empty until setup).
   */
  get placeholders(): Readonly<Record<string, string>> {
    return this.state ? { host: this.state.host } : {};
  }
}
