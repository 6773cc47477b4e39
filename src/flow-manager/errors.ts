/**
 * Flow Manager - Error Types
 */

export type FlowManagerError =
  | { readonly type: "FLOW_NOT_FOUND"; readonly flowId: string }
  | { readonly type: "ENTRY_NOT_FOUND"; readonly entryId: string }
  | {
      readonly type: "UNKNOWN_STEP";
      readonly flowId: string;
      readonly stepId: string;
    }
  | {
      readonly type: "INVALID_MENU_OPTION";
      readonly flowId: string;
      readonly option: string;
      readonly allowed: ReadonlyArray<string>;
    };

export const flowNotFound = (flowId: string): FlowManagerError => ({
  type: "FLOW_NOT_FOUND",
  flowId,
});

export const entryNotFound = (entryId: string): FlowManagerError => ({
  type: "ENTRY_NOT_FOUND",
  entryId,
});

export const unknownStep = (flowId: string, stepId: string): FlowManagerError => ({
  type: "UNKNOWN_STEP",
  flowId,
  stepId,
});

export const invalidMenuOption = (
  flowId: string,
  option: string,
  allowed: ReadonlyArray<string>,
): FlowManagerError => ({
  type: "INVALID_MENU_OPTION",
  flowId,
  option,
  allowed,
});

export const formatFlowManagerError = (error: FlowManagerError): string => {
  switch (error.type) {
    case "FLOW_NOT_FOUND":
      return `Flow ${error.flowId} not found`;
    case "ENTRY_NOT_FOUND":
      return `Entry ${error.entryId} not found`;
    case "UNKNOWN_STEP":
      return `Flow ${error.flowId} has no step ${error.stepId}`;
    case "INVALID_MENU_OPTION":
      return `Option "${error.option}" is not offered (expected one of: ${error.allowed.join(", ")})`;
  }
};
