/**
 * In-process stand-ins for the panel and the entry store, shared by tests.
 */
import { type Result, err, ok } from "neverthrow";
import type { Entry, EntryStore } from "../entries/index.js";
import { type EntryError, storageFailed } from "../entries/errors.js";
import type {
  Circuit,
  PanelClient,
  PanelClientFactory,
  PanelError,
  PanelStatus,
} from "../panel/index.js";

// =============================================================================
// Panel
// =============================================================================

export type FakePanelState = {
  /** Unauthenticated ping result */
  reachable: boolean;
  /** Tokens the authenticated ping accepts */
  validTokens: Set<string>;
  status: Result<PanelStatus, PanelError>;
  token: Result<string, PanelError>;
  circuits: Result<Record<string, Circuit>, PanelError>;
  relay: Result<true, PanelError>;
};

export type FakePanel = {
  state: FakePanelState;
  /** One line per call, e.g. "status 10.0.0.5" */
  calls: string[];
  factory: PanelClientFactory;
};

export const makeStatus = (overrides: Partial<PanelStatus> = {}): PanelStatus => ({
  serialNumber: "sp3-0001",
  firmwareVersion: "spanos2/r202342/04",
  proximityProven: true,
  remainingAuthUnlockButtonPresses: null,
  ...overrides,
});

export const makeCircuit = (overrides: Partial<Circuit> = {}): Circuit => ({
  id: "c1",
  name: "Kitchen",
  relayState: "CLOSED",
  instantPowerW: 120,
  isUserControllable: true,
  tabs: [1],
  ...overrides,
});

export function createFakePanel(overrides: Partial<FakePanelState> = {}): FakePanel {
  const state: FakePanelState = {
    reachable: true,
    validTokens: new Set(["test-token"]),
    status: ok(makeStatus()),
    token: ok("test-token"),
    circuits: ok({ c1: makeCircuit() }),
    relay: ok(true),
    ...overrides,
  };
  const calls: string[] = [];

  const factory: PanelClientFactory = (host, accessToken) => {
    const client: PanelClient = {
      host,
      async ping() {
        calls.push(accessToken === undefined ? `ping ${host}` : `ping ${host} ${accessToken}`);
        return accessToken === undefined
          ? state.reachable
          : state.validTokens.has(accessToken);
      },
      async getStatusData() {
        calls.push(`status ${host}`);
        return state.status;
      },
      async getAccessToken() {
        calls.push(`register ${host}`);
        return state.token;
      },
      async getCircuits() {
        calls.push(`circuits ${host}`);
        return state.circuits;
      },
      async setRelay(circuit, relayState) {
        calls.push(`relay ${circuit.id} ${relayState}`);
        return state.relay;
      },
    };
    return client;
  };

  return { state, calls, factory };
}

// =============================================================================
// Entry Store
// =============================================================================

export type MemoryEntryStore = EntryStore & {
  saved: ReadonlyArray<Entry>;
  failSaves: boolean;
};

export function createMemoryEntryStore(
  initial: ReadonlyArray<Entry> = [],
): MemoryEntryStore {
  const store: MemoryEntryStore = {
    saved: initial,
    failSaves: false,
    async load(): Promise<Result<ReadonlyArray<Entry>, EntryError>> {
      return ok(store.saved);
    },
    async save(entries: ReadonlyArray<Entry>): Promise<Result<true, EntryError>> {
      if (store.failSaves) {
        return err(storageFailed("disk full"));
      }
      store.saved = entries;
      return ok(true);
    },
  };
  return store;
}

export const makeEntry = (overrides: Partial<Entry> = {}): Entry => ({
  entryId: "abc",
  uniqueId: "sp3-0001",
  title: "sp3-0001",
  data: { host: "10.0.0.5", access_token: "old-token" },
  options: {},
  createdAt: "2026-01-01T00:00:00.000Z",
  ...overrides,
});

/**
 * Let queued microtasks and un-awaited work settle.
 */
export const flushPromises = (): Promise<void> =>
  new Promise((resolve) => setImmediate(resolve));
