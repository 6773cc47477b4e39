/**
 * Flow Manager - Types
 *
 * In-progress flows as seen from outside: which handler runs them,
 * what started them and the last result they produced.
 */
import type { Result } from "neverthrow";
import type { EntryRepository } from "../entries/index.js";
import type { PanelClientFactory } from "../panel/index.js";
import type {
  DiscoveryInfo,
  FlowHandler,
  FlowResult,
  StepInput,
} from "../provisioning/index.js";
import type { FlowManagerError } from "./errors.js";

export type FlowSource = "user" | "discovery" | "reauth" | "options";

/**
 * Snapshot of one flow. `result` is null while its first step runs.
 */
export type FlowView = Readonly<{
  flowId: string;
  handler: FlowHandler["handler"];
  source: FlowSource;
  entryId: string | null;
  titlePlaceholders: Readonly<Record<string, string>>;
  result: FlowResult | null;
}>;

export type FlowManagerDependencies = Readonly<{
  createClient: PanelClientFactory;
  entries: EntryRepository;
  /** Called once a config flow has created an entry */
  onEntryCreated?: (entryId: string) => Promise<void>;
}>;

export type FlowOutcome = Result<FlowView, FlowManagerError>;

export interface FlowManager {
  startUserFlow(): Promise<FlowOutcome>;
  startDiscoveryFlow(info: DiscoveryInfo): Promise<FlowOutcome>;
  /** Returns the in-progress re-auth flow of the entry when there is one */
  startReauthFlow(entryId: string): Promise<FlowOutcome>;
  startOptionsFlow(entryId: string): Promise<FlowOutcome>;
  configure(flowId: string, input: StepInput): Promise<FlowOutcome>;
  getFlow(flowId: string): FlowView | undefined;
  listFlows(): ReadonlyArray<FlowView>;
  abortFlow(flowId: string): Result<FlowView, FlowManagerError>;
}
