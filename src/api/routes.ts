/**
 * API routes for SPAN Panel Link.
 *
 * Routes are organized by domain:
 * - /api/health - Health check
 * - /api/flows/* - Provisioning and options flows
 * - /api/entries/* - Configured panels and their breaker switches
 */
import { Hono } from "hono";
import type { z } from "zod";
import { config } from "../config.js";
import { type EntryRepository, formatEntryError, redactEntry } from "../entries/index.js";
import {
  type FlowManager,
  type FlowManagerError,
  type FlowOutcome,
  formatFlowManagerError,
} from "../flow-manager/index.js";
import { createLogger } from "../logger.js";
import { BACK, OPEN, type StepInput, submit } from "../provisioning/index.js";
import { type PanelRuntime, type RuntimeError, formatRuntimeError } from "../runtime/index.js";
import {
  DiscoveryRequestSchema,
  type StepAction,
  StepActionSchema,
  SwitchCommandSchema,
} from "./schema.js";

const log = createLogger("api");

export type ApiServices = Readonly<{
  entries: EntryRepository;
  flows: FlowManager;
  runtime: PanelRuntime;
}>;

type BodyResult<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly issues: ReadonlyArray<z.ZodIssue> };

/**
 * Parse a JSON body against a schema. A missing or malformed body is
 * validated as an empty object.
 */
async function parseBody<T>(
  request: Request,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<BodyResult<T>> {
  let body: unknown = {};
  const text = await request.text();
  if (text.trim() !== "") {
    try {
      body = JSON.parse(text);
    } catch {
      body = null;
    }
  }

  const parsed = schema.safeParse(body);
  return parsed.success
    ? { success: true, data: parsed.data }
    : { success: false, issues: parsed.error.issues };
}

const toStepInput = (action: StepAction): StepInput => {
  switch (action.action) {
    case "open":
      return OPEN;
    case "back":
      return BACK;
    case "submit":
      return submit(action.data);
  }
};

const flowErrorStatus = (error: FlowManagerError): 400 | 404 => {
  switch (error.type) {
    case "FLOW_NOT_FOUND":
    case "ENTRY_NOT_FOUND":
      return 404;
    case "UNKNOWN_STEP":
    case "INVALID_MENU_OPTION":
      return 400;
  }
};

const runtimeErrorStatus = (error: RuntimeError): 404 | 409 | 502 | 503 => {
  switch (error.type) {
    case "ENTRY_NOT_FOUND":
    case "SWITCH_NOT_FOUND":
      return 404;
    case "NOT_LOADED":
      return 409;
    case "AUTH_FAILED":
    case "RELAY_FAILED":
      return 502;
    case "NOT_READY":
      return 503;
  }
};

export function createRoutes(services: ApiServices): Hono {
  const { entries, flows, runtime } = services;
  const routes = new Hono();

  const respondWithFlow = (outcome: FlowOutcome, created = false) =>
    outcome.match(
      (view) => Response.json(view, { status: created ? 201 : 200 }),
      (error) =>
        Response.json(
          { error: formatFlowManagerError(error), type: error.type },
          { status: flowErrorStatus(error) },
        ),
    );

  // ===========================================================================
  // Health Check
  // ===========================================================================

  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
      appName: config.APP_NAME,
      entries: entries.list().length,
      loadedEntries: entries.list().filter((e) => runtime.isLoaded(e.entryId)).length,
      flowsInProgress: flows.listFlows().length,
    });
  });

  // ===========================================================================
  // Flows
  // ===========================================================================

  routes.get("/api/flows", (c) => c.json({ flows: flows.listFlows() }));

  routes.post("/api/flows", async () => {
    const outcome = await flows.startUserFlow();
    return respondWithFlow(outcome, true);
  });

  routes.post("/api/flows/discovery", async (c) => {
    const body = await parseBody(c.req.raw, DiscoveryRequestSchema);
    if (!body.success) {
      return c.json({ error: "Invalid request", issues: body.issues }, 400);
    }

    log.info({ host: body.data.host, requestId: c.get("requestId") }, "Discovery event");
    const outcome = await flows.startDiscoveryFlow({ host: body.data.host });
    return respondWithFlow(outcome, true);
  });

  routes.get("/api/flows/:flowId", (c) => {
    const flowId = c.req.param("flowId");
    const view = flows.getFlow(flowId);
    if (!view) {
      return c.json({ error: `Flow ${flowId} not found`, type: "FLOW_NOT_FOUND" }, 404);
    }
    return c.json(view);
  });

  routes.post("/api/flows/:flowId", async (c) => {
    const body = await parseBody(c.req.raw, StepActionSchema);
    if (!body.success) {
      return c.json({ error: "Invalid request", issues: body.issues }, 400);
    }

    const outcome = await flows.configure(c.req.param("flowId"), toStepInput(body.data));
    return respondWithFlow(outcome);
  });

  routes.delete("/api/flows/:flowId", (c) => {
    const result = flows.abortFlow(c.req.param("flowId"));
    return result.match(
      (view) => c.json({ success: true, flowId: view.flowId }),
      (error) =>
        c.json(
          { error: formatFlowManagerError(error), type: error.type },
          flowErrorStatus(error),
        ),
    );
  });

  // ===========================================================================
  // Entries
  // ===========================================================================

  routes.get("/api/entries", (c) =>
    c.json({
      entries: entries.list().map((entry) => ({
        ...redactEntry(entry),
        loaded: runtime.isLoaded(entry.entryId),
      })),
    }),
  );

  routes.get("/api/entries/:entryId", (c) => {
    const entryId = c.req.param("entryId");
    const entry = entries.get(entryId);
    if (!entry) {
      return c.json({ error: `Entry ${entryId} not found`, type: "ENTRY_NOT_FOUND" }, 404);
    }
    return c.json({ ...redactEntry(entry), loaded: runtime.isLoaded(entryId) });
  });

  routes.delete("/api/entries/:entryId", async (c) => {
    const entryId = c.req.param("entryId");
    if (!entries.get(entryId)) {
      return c.json({ error: `Entry ${entryId} not found`, type: "ENTRY_NOT_FOUND" }, 404);
    }

    runtime.unloadEntry(entryId);
    const removed = await entries.remove(entryId);
    if (removed.isErr()) {
      log.error({ entryId, error: formatEntryError(removed.error) }, "Failed to remove entry");
      return c.json({ error: formatEntryError(removed.error), type: removed.error.type }, 500);
    }
    return c.json({ success: true, entryId });
  });

  routes.post("/api/entries/:entryId/reauth", async (c) => {
    const outcome = await flows.startReauthFlow(c.req.param("entryId"));
    return respondWithFlow(outcome, true);
  });

  routes.post("/api/entries/:entryId/options", async (c) => {
    const outcome = await flows.startOptionsFlow(c.req.param("entryId"));
    return respondWithFlow(outcome, true);
  });

  // ===========================================================================
  // Switches
  // ===========================================================================

  routes.get("/api/entries/:entryId/switches", (c) => {
    const result = runtime.getSwitches(c.req.param("entryId"));
    return result.match(
      (switches) => c.json({ switches }),
      (error) =>
        c.json(
          { error: formatRuntimeError(error), type: error.type },
          runtimeErrorStatus(error),
        ),
    );
  });

  routes.put("/api/entries/:entryId/switches/:circuitId", async (c) => {
    const body = await parseBody(c.req.raw, SwitchCommandSchema);
    if (!body.success) {
      return c.json({ error: "Invalid request", issues: body.issues }, 400);
    }

    const entryId = c.req.param("entryId");
    const circuitId = c.req.param("circuitId");
    log.info({ entryId, circuitId, on: body.data.on, requestId: c.get("requestId") }, "Switch command");

    const result = await runtime.setSwitch(entryId, circuitId, body.data.on);
    return result.match(
      (view) => c.json({ success: true, switch: view }),
      (error) =>
        c.json(
          { error: formatRuntimeError(error), type: error.type },
          runtimeErrorStatus(error),
        ),
    );
  });

  return routes;
}
