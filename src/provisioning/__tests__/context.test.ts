/**
 * Provisioning Context Tests
 */
import { describe, expect, test } from "vitest";
import { ProvisioningContext } from "../context.js";
import { FlowContractViolation } from "../errors.js";

const init = {
  trigger: { type: "CREATE_ENTRY" },
  host: "10.0.0.5",
  serialNumber: "sp3-0001",
} as const;

describe("ProvisioningContext", () => {
  test("starts without setup", () => {
    const context = new ProvisioningContext();

    expect(context.isSetUp).toBe(false);
    expect(context.placeholders).toEqual({});
    expect(context.accessToken).toBeUndefined();
  });

  test("reading a field before setup is a contract violation", () => {
    const context = new ProvisioningContext();

    expect(() => context.host).toThrow(FlowContractViolation);
  });

  test("records what setup learned", () => {
    const context = new ProvisioningContext();

    context.setUp(init);

    expect(context.isSetUp).toBe(true);
    expect(context.trigger).toEqual({ type: "CREATE_ENTRY" });
    expect(context.serialNumber).toBe("sp3-0001");
    expect(context.placeholders).toEqual({ host: "10.0.0.5" });
  });

  test("a second setup fails regardless of arguments", () => {
    const context = new ProvisioningContext();
    context.setUp(init);

    expect(() =>
      context.setUp({
        trigger: { type: "UPDATE_ENTRY", entryId: "abc" },
        host: "10.0.0.6",
        serialNumber: "other",
      }),
    ).toThrow("Flow is already set up");
    expect(context.host).toBe("10.0.0.5");
  });

  test("the access token is set once", () => {
    const context = new ProvisioningContext();
    context.setUp(init);

    context.recordAccessToken("test-token");

    expect(context.accessToken).toBe("test-token");
    expect(() => context.recordAccessToken("other-token")).toThrow(
      "Access token is already recorded for this flow",
    );
  });

  test("recording a token before setup is a contract violation", () => {
    const context = new ProvisioningContext();

    expect(() => context.recordAccessToken("test-token")).toThrow("Flow is not set up");
  });
});
