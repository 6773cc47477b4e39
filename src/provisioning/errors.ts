/**
 * Provisioning Module - Error Types
 *
 * User and environment failures are flow results (forms with errors, aborts).
 * Misuse of the state machine by its caller is not: it throws.
 */

export type ContractRule =
  | "SETUP_TWICE"
  | "NOT_SET_UP"
  | "FIELD_ALREADY_SET"
  | "MISSING_FIELD"
  | "ENTRY_MISSING"
  | "UNKNOWN_STEP";

/**
 * Thrown when the caller drives a flow in a way it must never be driven.
 * Never caught inside the flow.
 */
export class FlowContractViolation extends Error {
  readonly type = "CONTRACT_VIOLATION";
  readonly rule: ContractRule;

  constructor(rule: ContractRule, message: string) {
    super(message);
    this.name = "FlowContractViolation";
    this.rule = rule;
  }
}

export function isFlowContractViolation(
  error: unknown,
): error is FlowContractViolation {
  return error instanceof FlowContractViolation;
}
