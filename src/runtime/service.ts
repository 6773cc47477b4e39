/**
 * Runtime Module - Service Layer
 *
 * Loads configured entries: an authenticated client and a coordinator per
 * entry, plus the switches built from its first snapshot.
 */
import { type Result, err, ok } from "neverthrow";

import { type PanelCoordinator, createPanelCoordinator } from "../coordinator/index.js";
import type { EntryRepository } from "../entries/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import { resolveOptions } from "../options/index.js";
import type { PanelClientFactory } from "../panel/index.js";
import {
  type CircuitSwitch,
  type SwitchView,
  buildCircuitSwitches,
} from "../switches/index.js";
import {
  type RuntimeError,
  authFailed,
  entryNotFound,
  formatRuntimeError,
  notLoaded,
  notReady,
  relayFailed,
  switchNotFound,
} from "./errors.js";

const log = createLogger("runtime");

export type RuntimeDependencies = Readonly<{
  entries: EntryRepository;
  createClient: PanelClientFactory;
  /** Called when a loaded panel rejects its token */
  onAuthFailed: (entryId: string) => void;
  pollingEnabled: boolean;
}>;

export type SetupSummary = Readonly<{ loaded: number; failed: number }>;

export interface PanelRuntime {
  setupEntry(entryId: string): Promise<Result<PanelCoordinator, RuntimeError>>;
  unloadEntry(entryId: string): boolean;
  reloadEntry(entryId: string): Promise<Result<PanelCoordinator, RuntimeError>>;
  isLoaded(entryId: string): boolean;
  getCoordinator(entryId: string): PanelCoordinator | undefined;
  getSwitches(entryId: string): Result<ReadonlyArray<SwitchView>, RuntimeError>;
  setSwitch(
    entryId: string,
    circuitId: string,
    on: boolean,
  ): Promise<Result<SwitchView, RuntimeError>>;
  setupAll(): Promise<SetupSummary>;
  shutdown(): void;
}

export function createPanelRuntime(deps: RuntimeDependencies): PanelRuntime {
  const coordinators = new Map<string, PanelCoordinator>();
  const setups = new Map<string, Promise<void>>();

  /**
   * Queue a setup behind earlier setups of the same entry.
   */
  function enqueueSetup<T>(entryId: string, task: () => Promise<T>): Promise<T> {
    const run = (setups.get(entryId) ?? Promise.resolve()).then(task);
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    setups.set(entryId, settled);
    return run;
  }

  function unloadEntry(entryId: string): boolean {
    const coordinator = coordinators.get(entryId);
    if (!coordinator) {
      return false;
    }
    coordinator.stop();
    coordinators.delete(entryId);
    log.info({ entryId }, "Entry unloaded");
    return true;
  }

  async function runSetup(
    entryId: string,
  ): Promise<Result<PanelCoordinator, RuntimeError>> {
    const entry = deps.entries.get(entryId);
    if (!entry) {
      return err(entryNotFound(entryId));
    }

    unloadEntry(entryId);

    const startTime = Date.now();
    logOperationStart(log, "setupEntry", { entryId, host: entry.data.host });

    const coordinator = createPanelCoordinator({
      entryId,
      client: deps.createClient(entry.data.host, entry.data.access_token),
      scanIntervalSeconds: resolveOptions(entry.options).scan_interval,
      onAuthFailed: deps.onAuthFailed,
    });
    coordinators.set(entryId, coordinator);

    const first = await coordinator.refresh();
    if (coordinators.get(entryId) !== coordinator) {
      coordinator.stop();
      const error = notLoaded(entryId);
      logOperationFailed(log, "setupEntry", "Unloaded during setup", { entryId });
      return err(error);
    }

    if (first.isErr() && first.error.type === "UNAUTHORIZED") {
      coordinators.delete(entryId);
      const error = authFailed(entryId);
      logOperationFailed(log, "setupEntry", formatRuntimeError(error), { entryId });
      return err(error);
    }

    if (deps.pollingEnabled) {
      coordinator.start();
    }

    if (first.isErr()) {
      const error = notReady(entryId, first.error);
      logOperationFailed(log, "setupEntry", formatRuntimeError(error), { entryId });
      return err(error);
    }

    logOperationComplete(log, "setupEntry", startTime, { entryId });
    return ok(coordinator);
  }

  function setupEntry(
    entryId: string,
  ): Promise<Result<PanelCoordinator, RuntimeError>> {
    return enqueueSetup(entryId, () => runSetup(entryId));
  }

  function reloadEntry(
    entryId: string,
  ): Promise<Result<PanelCoordinator, RuntimeError>> {
    return enqueueSetup(entryId, () => {
      unloadEntry(entryId);
      return runSetup(entryId);
    });
  }

  function getSwitchesOf(
    entryId: string,
  ): Result<ReadonlyArray<CircuitSwitch>, RuntimeError> {
    const coordinator = coordinators.get(entryId);
    if (!coordinator) {
      return err(notLoaded(entryId));
    }
    return ok(buildCircuitSwitches(coordinator));
  }

  deps.entries.onReload(async (entryId) => {
    const result = await reloadEntry(entryId);
    if (result.isErr()) {
      log.warn({ entryId, error: formatRuntimeError(result.error) }, "Entry reload incomplete");
    }
  });

  return {
    setupEntry,
    unloadEntry,
    reloadEntry,

    isLoaded: (entryId) => coordinators.has(entryId),

    getCoordinator: (entryId) => coordinators.get(entryId),

    getSwitches(entryId: string): Result<ReadonlyArray<SwitchView>, RuntimeError> {
      return getSwitchesOf(entryId).map((switches) => switches.map((s) => s.toView()));
    },

    async setSwitch(
      entryId: string,
      circuitId: string,
      on: boolean,
    ): Promise<Result<SwitchView, RuntimeError>> {
      const switches = getSwitchesOf(entryId);
      if (switches.isErr()) {
        return err(switches.error);
      }

      const target = switches.value.find((s) => s.circuitId === circuitId);
      if (!target) {
        return err(switchNotFound(entryId, circuitId));
      }

      const result = on ? await target.turnOn() : await target.turnOff();
      if (result.isErr()) {
        return err(relayFailed(entryId, circuitId, result.error));
      }
      return ok(target.toView());
    },

    async setupAll(): Promise<SetupSummary> {
      let loaded = 0;
      let failed = 0;
      for (const entry of deps.entries.list()) {
        const result = await setupEntry(entry.entryId);
        if (result.isOk()) {
          loaded++;
        } else {
          failed++;
        }
      }
      log.info({ loaded, failed }, "Configured entries set up");
      return { loaded, failed };
    },

    shutdown(): void {
      for (const entryId of [...coordinators.keys()]) {
        unloadEntry(entryId);
      }
    },
  };
}
