/**
 * Options Flow Tests
 */
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
import { createMemoryEntryStore, flushPromises, makeEntry } from "../../__tests__/fakes.js";
import { createEntryRepository } from "../../entries/index.js";
import { OPEN, submit } from "../../provisioning/index.js";
import { OptionsFlow } from "../service.js";

function createHarness(options: Parameters<typeof makeEntry>[0] = {}) {
  const store = createMemoryEntryStore([makeEntry(options)]);
  const entries = createEntryRepository(store, store.saved);
  const reloads: string[] = [];
  entries.onReload(async (entryId) => {
    reloads.push(entryId);
  });
  const flow = new OptionsFlow("flow-2", "abc", entries);
  return { store, entries, reloads, flow };
}

describe("OptionsFlow", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  test("shows the form with defaults for absent keys", async () => {
    const h = createHarness({ options: { enable_battery_percentage: true } });

    const result = await h.flow.handleStep("init", OPEN);

    expect(result.type).toBe("form");
    if (result.type !== "form") return;
    expect(Object.fromEntries(result.fields.map((f) => [f.name, f.default]))).toEqual({
      scan_interval: 15,
      enable_battery_percentage: true,
      enable_solar_circuit: false,
      inverter_leg1: 0,
      inverter_leg2: 0,
    });
  });

  test("stores valid options, reloads the entry and finishes", async () => {
    // Arrange
    const h = createHarness();

    // Act
    const result = await h.flow.handleStep("init", submit({ scan_interval: 30 }));
    await flushPromises();

    // Assert
    const expected = {
      scan_interval: 30,
      enable_battery_percentage: false,
      enable_solar_circuit: false,
      inverter_leg1: 0,
      inverter_leg2: 0,
    };
    expect(result).toEqual({ type: "create_entry", title: "", data: expected, entryId: "abc" });
    expect(h.entries.get("abc")?.options).toEqual(expected);
    expect(h.reloads).toEqual(["abc"]);
  });

  test("a stored value is shown on the next open", async () => {
    const h = createHarness();
    await h.flow.handleStep("init", submit({ scan_interval: 30 }));

    const next = new OptionsFlow("flow-3", "abc", h.entries);
    const result = await next.handleStep("init", OPEN);

    expect(result.type === "form" && result.fields[0]?.default).toBe(30);
  });

  test("re-shows the form with errors for invalid input", async () => {
    const h = createHarness();

    const result = await h.flow.handleStep("init", submit({ scan_interval: 2 }));

    expect(result).toMatchObject({
      type: "form",
      stepId: "init",
      errors: { scan_interval: "too_small" },
    });
    expect(h.entries.get("abc")?.options).toEqual({});
  });

  test("an unknown entry is a contract violation", async () => {
    const h = createHarness();
    const orphan = new OptionsFlow("flow-4", "missing", h.entries);

    await expect(orphan.handleStep("init", OPEN)).rejects.toMatchObject({
      rule: "ENTRY_MISSING",
    });
  });

  test("has a single init step", () => {
    const h = createHarness();

    expect(h.flow.hasStep("init")).toBe(true);
    expect(h.flow.hasStep("user")).toBe(false);
    expect(h.flow.uniqueId).toBeNull();
  });
});
