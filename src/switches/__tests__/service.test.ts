/**
 * Circuit Switch Tests
 */
import { err, ok } from "neverthrow";
import { beforeEach, describe, expect, test, vi } from "vitest";

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

// Import after mocks
import { createFakePanel, makeCircuit } from "../../__tests__/fakes.js";
import { createPanelCoordinator } from "../../coordinator/index.js";
import { networkError } from "../../panel/errors.js";
import { buildCircuitSwitches } from "../service.js";

async function createHarness() {
  const panel = createFakePanel({
    circuits: ok({
      c1: makeCircuit({ id: "c1", name: "Kitchen", relayState: "CLOSED" }),
      c2: makeCircuit({ id: "c2", name: "Garage", relayState: "OPEN" }),
      c3: makeCircuit({ id: "c3", name: "Main Feed", isUserControllable: false }),
    }),
  });
  const coordinator = createPanelCoordinator({
    entryId: "abc",
    client: panel.factory("10.0.0.5", "test-token"),
    scanIntervalSeconds: 15,
    onAuthFailed: vi.fn(),
  });
  await coordinator.refresh();
  panel.calls.length = 0;
  return { panel, coordinator };
}

describe("Circuit Switches", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  test("exist only for user-controllable circuits", async () => {
    const h = await createHarness();

    const switches = buildCircuitSwitches(h.coordinator);

    expect(switches.map((s) => s.toView())).toEqual([
      {
        uniqueId: "span_sp3-0001_relay_c1",
        circuitId: "c1",
        name: "Kitchen Breaker",
        icon: "mdi:toggle-switch",
        isOn: true,
      },
      {
        uniqueId: "span_sp3-0001_relay_c2",
        circuitId: "c2",
        name: "Garage Breaker",
        icon: "mdi:toggle-switch",
        isOn: false,
      },
    ]);
  });

  test("none exist before the first snapshot", () => {
    const panel = createFakePanel();
    const coordinator = createPanelCoordinator({
      entryId: "abc",
      client: panel.factory("10.0.0.5", "test-token"),
      scanIntervalSeconds: 15,
      onAuthFailed: vi.fn(),
    });

    expect(buildCircuitSwitches(coordinator)).toEqual([]);
  });

  test("turnOff opens the relay and then refreshes", async () => {
    const h = await createHarness();
    const [kitchen] = buildCircuitSwitches(h.coordinator);

    const result = await kitchen?.turnOff();

    expect(result?.isOk()).toBe(true);
    expect(h.panel.calls).toEqual([
      "relay c1 OPEN",
      "status 10.0.0.5",
      "circuits 10.0.0.5",
    ]);
  });

  test("turnOn closes the relay", async () => {
    const h = await createHarness();
    const garage = buildCircuitSwitches(h.coordinator)[1];

    await garage?.turnOn();

    expect(h.panel.calls[0]).toBe("relay c2 CLOSED");
  });

  test("isOn follows the latest snapshot", async () => {
    const h = await createHarness();
    const [kitchen] = buildCircuitSwitches(h.coordinator);
    h.panel.state.circuits = ok({ c1: makeCircuit({ relayState: "OPEN" }) });

    await h.coordinator.refresh();

    expect(kitchen?.isOn).toBe(false);
  });

  test("a failed command does not refresh", async () => {
    const h = await createHarness();
    const [kitchen] = buildCircuitSwitches(h.coordinator);
    h.panel.state.relay = err(networkError("10.0.0.5", "down"));

    const result = await kitchen?.turnOff();

    expect(result?._unsafeUnwrapErr().type).toBe("NETWORK_ERROR");
    expect(h.panel.calls).toEqual(["relay c1 OPEN"]);
  });
});
