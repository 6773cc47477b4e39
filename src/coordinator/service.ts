/**
 * Coordinator Module - Service Layer
 *
 * Polls one panel on its entry's scan interval and keeps the last snapshot.
 * A rejected token stops polling and asks for re-authentication once.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import { type PanelError, formatPanelError } from "../panel/index.js";
import type { CoordinatorOptions, PanelCoordinator, PanelSnapshot } from "./schema.js";

const log = createLogger("coordinator");

export function createPanelCoordinator(options: CoordinatorOptions): PanelCoordinator {
  const { entryId, client, scanIntervalSeconds, onAuthFailed } = options;

  let snapshot: PanelSnapshot | null = null;
  let pollTimer: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<Result<PanelSnapshot, PanelError>> | null = null;
  let authFailureRaised = false;

  function stop(): void {
    if (pollTimer) {
      clearInterval(pollTimer);
      pollTimer = null;
      log.debug({ entryId }, "Polling stopped");
    }
  }

  function handleFailure(error: PanelError): void {
    if (error.type !== "UNAUTHORIZED") {
      log.warn({ entryId, error: formatPanelError(error) }, "Panel refresh failed");
      return;
    }

    stop();
    if (authFailureRaised) {
      return;
    }
    authFailureRaised = true;
    log.warn({ entryId, host: client.host }, "Panel rejected token, requesting re-auth");
    onAuthFailed(entryId);
  }

  async function read(): Promise<Result<PanelSnapshot, PanelError>> {
    const status = await client.getStatusData();
    if (status.isErr()) {
      handleFailure(status.error);
      return err(status.error);
    }

    const circuits = await client.getCircuits();
    if (circuits.isErr()) {
      handleFailure(circuits.error);
      return err(circuits.error);
    }

    snapshot = {
      status: status.value,
      circuits: circuits.value,
      updatedAt: new Date().toISOString(),
    };
    log.debug(
      { entryId, circuits: Object.keys(circuits.value).length },
      "Panel snapshot updated",
    );
    return ok(snapshot);
  }

  function refresh(): Promise<Result<PanelSnapshot, PanelError>> {
    if (!inFlight) {
      inFlight = read().finally(() => {
        inFlight = null;
      });
    }
    return inFlight;
  }

  async function requestRefresh(): Promise<void> {
    try {
      await refresh();
    } catch (error) {
      log.error(
        { entryId, error: error instanceof Error ? error.message : String(error) },
        "Unexpected refresh failure",
      );
    }
  }

  return {
    entryId,
    client,
    scanIntervalSeconds,
    snapshot: () => snapshot,
    refresh,
    requestRefresh,

    start(): void {
      stop();
      const intervalMs = scanIntervalSeconds * 1000;
      log.debug({ entryId, intervalMs }, "Starting panel polling");
      pollTimer = setInterval(async () => {
        await requestRefresh();
      }, intervalMs);
    },

    stop,

    isPolling: () => pollTimer !== null,
  };
}
