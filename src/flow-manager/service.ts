/**
 * Flow Manager - Service Layer
 *
 * Creates flows, routes step input to them and removes them once they end.
 * Steps of one flow run strictly one after another; separate flows do not
 * wait for each other.
 */
import { randomUUID } from "node:crypto";
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import { OPTIONS_STEP_ID, OptionsFlow } from "../options/index.js";
import {
  type AbortResult,
  type CreateEntryResult,
  type DiscoveryInfo,
  type FlowHandler,
  type FlowResult,
  OPEN,
  ProvisioningFlow,
  type StepInput,
} from "../provisioning/index.js";
import {
  type FlowManagerError,
  entryNotFound,
  flowNotFound,
  invalidMenuOption,
  unknownStep,
} from "./errors.js";
import type {
  FlowManager,
  FlowManagerDependencies,
  FlowOutcome,
  FlowSource,
  FlowView,
} from "./schema.js";

const log = createLogger("flows");

type ActiveFlow = {
  readonly handler: FlowHandler;
  readonly source: FlowSource;
  readonly entryId: string | null;
  result: FlowResult | null;
  /** Tail of the step chain; never rejects */
  queue: Promise<void>;
};

type StepTarget = Readonly<{ stepId: string; input: StepInput }>;

const toView = (active: ActiveFlow): FlowView => ({
  flowId: active.handler.flowId,
  handler: active.handler.handler,
  source: active.source,
  entryId: active.entryId,
  titlePlaceholders: active.handler.titlePlaceholders,
  result: active.result,
});

const isTerminal = (result: FlowResult): result is CreateEntryResult | AbortResult =>
  result.type === "create_entry" || result.type === "abort";

/**
 * Pick the step an input goes to. A submission on a menu names the next
 * step in `next_step_id`, which must be one of the offered options.
 */
const resolveTarget = (
  active: ActiveFlow,
  input: StepInput,
): Result<StepTarget, FlowManagerError> => {
  const { flowId } = active.handler;
  const last = active.result;

  if (last === null || last.type === "create_entry" || last.type === "abort") {
    return err(flowNotFound(flowId));
  }

  if (last.type === "menu" && input.kind === "submit") {
    const allowed = Object.keys(last.options);
    const option = input.data.next_step_id;
    if (typeof option !== "string" || !allowed.includes(option)) {
      return err(invalidMenuOption(flowId, String(option), allowed));
    }
    if (!active.handler.hasStep(option)) {
      return err(unknownStep(flowId, option));
    }
    return ok({ stepId: option, input: OPEN });
  }

  if (!active.handler.hasStep(last.stepId)) {
    return err(unknownStep(flowId, last.stepId));
  }
  return ok({ stepId: last.stepId, input });
};

export function createFlowManager(deps: FlowManagerDependencies): FlowManager {
  const flows = new Map<string, ActiveFlow>();

  function isUniqueIdInProgress(uniqueId: string, flowId: string): boolean {
    for (const [id, active] of flows) {
      if (id !== flowId && active.handler.uniqueId === uniqueId) {
        return true;
      }
    }
    return false;
  }

  function newProvisioningFlow(): ProvisioningFlow {
    return new ProvisioningFlow(randomUUID(), {
      createClient: deps.createClient,
      entries: deps.entries,
      isUniqueIdInProgress,
    });
  }

  function register(
    handler: FlowHandler,
    source: FlowSource,
    entryId: string | null,
  ): ActiveFlow {
    const active: ActiveFlow = {
      handler,
      source,
      entryId,
      result: null,
      queue: Promise.resolve(),
    };
    flows.set(handler.flowId, active);
    log.info({ flowId: handler.flowId, source, entryId }, "→ Flow started");
    return active;
  }

  /**
   * Queue a step behind the flow's earlier steps.
   */
  function enqueue<T>(active: ActiveFlow, task: () => Promise<T>): Promise<T> {
    const run = active.queue.then(task);
    active.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  async function handleCreatedEntry(active: ActiveFlow, entryId: string): Promise<void> {
    if (active.handler.handler !== "config" || !deps.onEntryCreated) {
      return;
    }
    try {
      await deps.onEntryCreated(entryId);
    } catch (error) {
      log.error(
        { entryId, error: error instanceof Error ? error.message : String(error) },
        "Setting up created entry failed",
      );
    }
  }

  /**
   * Run one step and record its result. A throwing step ends the flow.
   */
  async function runStep(
    active: ActiveFlow,
    invoke: () => Promise<FlowResult>,
  ): Promise<FlowOutcome> {
    const { flowId } = active.handler;

    let result: FlowResult;
    try {
      result = await invoke();
    } catch (error) {
      flows.delete(flowId);
      log.error(
        { flowId, error: error instanceof Error ? error.message : String(error) },
        "✗ Flow step threw, flow removed",
      );
      throw error;
    }

    active.result = result;

    if (isTerminal(result)) {
      flows.delete(flowId);
      log.info({ flowId, result: result.type }, "✓ Flow finished");
      if (result.type === "create_entry") {
        await handleCreatedEntry(active, result.entryId);
      }
    } else {
      log.debug({ flowId, result: result.type, stepId: result.stepId }, "Flow awaiting input");
    }

    return ok(toView(active));
  }

  function start(
    handler: FlowHandler,
    source: FlowSource,
    entryId: string | null,
    invoke: () => Promise<FlowResult>,
  ): Promise<FlowOutcome> {
    const active = register(handler, source, entryId);
    return enqueue(active, () => runStep(active, invoke));
  }

  return {
    startUserFlow(): Promise<FlowOutcome> {
      const flow = newProvisioningFlow();
      return start(flow, "user", null, () => flow.stepUser(OPEN));
    },

    startDiscoveryFlow(info: DiscoveryInfo): Promise<FlowOutcome> {
      const flow = newProvisioningFlow();
      return start(flow, "discovery", null, () => flow.stepDiscovery(info));
    },

    async startReauthFlow(entryId: string): Promise<FlowOutcome> {
      if (!deps.entries.get(entryId)) {
        return err(entryNotFound(entryId));
      }

      for (const active of flows.values()) {
        if (active.source === "reauth" && active.entryId === entryId) {
          log.debug({ entryId, flowId: active.handler.flowId }, "Re-auth already in progress");
          return ok(toView(active));
        }
      }

      const flow = newProvisioningFlow();
      return start(flow, "reauth", entryId, () => flow.stepReauth(entryId));
    },

    async startOptionsFlow(entryId: string): Promise<FlowOutcome> {
      if (!deps.entries.get(entryId)) {
        return err(entryNotFound(entryId));
      }

      const flow = new OptionsFlow(randomUUID(), entryId, deps.entries);
      return start(flow, "options", entryId, () => flow.handleStep(OPTIONS_STEP_ID, OPEN));
    },

    async configure(flowId: string, input: StepInput): Promise<FlowOutcome> {
      const active = flows.get(flowId);
      if (!active) {
        return err(flowNotFound(flowId));
      }

      return enqueue(active, async (): Promise<FlowOutcome> => {
        // An earlier queued step may have ended the flow
        if (flows.get(flowId) !== active) {
          return err(flowNotFound(flowId));
        }

        const target = resolveTarget(active, input);
        if (target.isErr()) {
          return err(target.error);
        }

        const { stepId, input: stepInput } = target.value;
        log.debug({ flowId, stepId, input: stepInput.kind }, "Routing step input");
        return runStep(active, () => active.handler.handleStep(stepId, stepInput));
      });
    },

    getFlow(flowId: string): FlowView | undefined {
      const active = flows.get(flowId);
      return active ? toView(active) : undefined;
    },

    listFlows(): ReadonlyArray<FlowView> {
      return [...flows.values()].map(toView);
    },

    abortFlow(flowId: string): Result<FlowView, FlowManagerError> {
      const active = flows.get(flowId);
      if (!active) {
        return err(flowNotFound(flowId));
      }
      flows.delete(flowId);
      log.info({ flowId }, "Flow abandoned");
      return ok(toView(active));
    },
  };
}
