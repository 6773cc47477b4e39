/**
 * Switches Module
 *
 * One breaker switch per user-controllable circuit. State comes from the
 * coordinator's snapshot; commands go straight to the panel and are
 * followed by a refresh.
 */
import type { Result } from "neverthrow";

import type { PanelCoordinator } from "../coordinator/index.js";
import { createLogger } from "../logger.js";
import { type Circuit, type PanelError, formatPanelError } from "../panel/index.js";

const log = createLogger("switches");

export const SWITCH_ICON = "mdi:toggle-switch";

export type SwitchView = Readonly<{
  uniqueId: string;
  circuitId: string;
  name: string;
  icon: string;
  isOn: boolean;
}>;

export const buildSwitchUniqueId = (serialNumber: string, circuitId: string): string =>
  `span_${serialNumber}_relay_${circuitId}`;

export class CircuitSwitch {
  readonly uniqueId: string;
  readonly circuitId: string;
  readonly name: string;
  readonly icon = SWITCH_ICON;

  private readonly coordinator: PanelCoordinator;
  private readonly initial: Circuit;

  constructor(coordinator: PanelCoordinator, circuit: Circuit, serialNumber: string) {
    this.coordinator = coordinator;
    this.initial = circuit;
    this.circuitId = circuit.id;
    this.uniqueId = buildSwitchUniqueId(serialNumber, circuit.id);
    this.name = `${circuit.name} Breaker`;
  }

  /**
   * Circuit as of the latest snapshot.
   */
  get circuit(): Circuit {
    return this.coordinator.snapshot()?.circuits[this.circuitId] ?? this.initial;
  }

  get isOn(): boolean {
    return this.circuit.relayState === "CLOSED";
  }

  turnOn(): Promise<Result<true, PanelError>> {
    return this.setRelay("CLOSED");
  }

  turnOff(): Promise<Result<true, PanelError>> {
    return this.setRelay("OPEN");
  }

  toView(): SwitchView {
    return {
      uniqueId: this.uniqueId,
      circuitId: this.circuitId,
      name: this.name,
      icon: this.icon,
      isOn: this.isOn,
    };
  }

  private async setRelay(state: "OPEN" | "CLOSED"): Promise<Result<true, PanelError>> {
    log.info({ uniqueId: this.uniqueId, state }, "Setting relay");

    const result = await this.coordinator.client.setRelay(this.circuit, state);
    if (result.isErr()) {
      log.warn(
        { uniqueId: this.uniqueId, error: formatPanelError(result.error) },
        "Relay command failed",
      );
      return result;
    }

    await this.coordinator.requestRefresh();
    return result;
  }
}

/**
 * Switches for every user-controllable circuit in the current snapshot.
 */
export function buildCircuitSwitches(
  coordinator: PanelCoordinator,
): ReadonlyArray<CircuitSwitch> {
  const snapshot = coordinator.snapshot();
  if (!snapshot) {
    return [];
  }

  return Object.values(snapshot.circuits)
    .filter((circuit) => circuit.isUserControllable)
    .map(
      (circuit) =>
        new CircuitSwitch(coordinator, circuit, snapshot.status.serialNumber),
    );
}
