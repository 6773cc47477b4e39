/**
 * Coordinator Module - Types
 */
import type { Result } from "neverthrow";
import type { Circuit, PanelClient, PanelError, PanelStatus } from "../panel/index.js";

/**
 * Last successful read of a panel.
 */
export type PanelSnapshot = Readonly<{
  status: PanelStatus;
  circuits: Readonly<Record<string, Circuit>>;
  updatedAt: string;
}>;

export type CoordinatorOptions = Readonly<{
  entryId: string;
  client: PanelClient;
  scanIntervalSeconds: number;
  /** Raised at most once, on the first rejected token */
  onAuthFailed: (entryId: string) => void;
}>;

export interface PanelCoordinator {
  readonly entryId: string;
  readonly client: PanelClient;
  readonly scanIntervalSeconds: number;
  snapshot(): PanelSnapshot | null;
  /** Status then circuits; concurrent callers share one read */
  refresh(): Promise<Result<PanelSnapshot, PanelError>>;
  /** Refresh and only log a failure */
  requestRefresh(): Promise<void>;
  start(): void;
  stop(): void;
  isPolling(): boolean;
}
