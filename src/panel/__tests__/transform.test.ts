/**
 * Panel Transform Tests
 *
 * Pure functions, no mocking needed.
 */
import { describe, expect, test } from "vitest";
import {
  buildCircuitPath,
  buildHeaders,
  buildPanelUrl,
  buildPingPath,
  buildRegisterRequest,
  buildRelayPayload,
  isAuthFailureStatus,
  toCircuits,
  toPanelStatus,
} from "../transform.js";

describe("Panel Transforms", () => {
  // ===========================================================================
  // URLs
  // ===========================================================================

  describe("buildPanelUrl", () => {
    test("prefixes the local API base path", () => {
      expect(buildPanelUrl("10.0.0.5", "/status")).toBe("http://10.0.0.5/api/v1/status");
    });
  });

  describe("buildCircuitPath", () => {
    test("encodes the circuit id", () => {
      expect(buildCircuitPath("a b")).toBe("/circuits/a%20b");
    });
  });

  describe("buildPingPath", () => {
    test("uses the public status endpoint without a token", () => {
      expect(buildPingPath(undefined)).toBe("/status");
    });

    test("uses the authenticated panel endpoint with a token", () => {
      expect(buildPingPath("test-token")).toBe("/panel");
    });
  });

  // ===========================================================================
  // Headers & Payloads
  // ===========================================================================

  describe("buildHeaders", () => {
    test("sends only Accept for an anonymous GET", () => {
      expect(buildHeaders(undefined, false)).toEqual({ Accept: "application/json" });
    });

    test("adds bearer auth and content type when needed", () => {
      expect(buildHeaders("test-token", true)).toEqual({
        Accept: "application/json",
        Authorization: "Bearer test-token",
        "Content-Type": "application/json",
      });
    });
  });

  test("buildRegisterRequest joins client name and suffix", () => {
    expect(buildRegisterRequest("span-panel-link", "x1")).toEqual({
      name: "span-panel-link-x1",
      description: "SPAN Panel Link local integration",
    });
  });

  test("buildRelayPayload wraps the relay state", () => {
    expect(buildRelayPayload("OPEN")).toEqual({ relayStateIn: { relayState: "OPEN" } });
  });

  // ===========================================================================
  // Status Normalization
  // ===========================================================================

  describe("toPanelStatus", () => {
    test("reads proximityProven from newer firmware", () => {
      // Arrange
      const response = {
        software: { firmwareVersion: "spanos2/r202342/04" },
        system: { serial: "sp3-0001", proximityProven: false },
      };

      // Act
      const status = toPanelStatus(response);

      // Assert
      expect(status).toEqual({
        serialNumber: "sp3-0001",
        firmwareVersion: "spanos2/r202342/04",
        proximityProven: false,
        remainingAuthUnlockButtonPresses: null,
      });
    });

    test("reads remaining button presses from older firmware", () => {
      const status = toPanelStatus({
        system: { serial: "sp3-0002", remainingAuthUnlockButtonPresses: 2 },
      });

      expect(status.proximityProven).toBeNull();
      expect(status.remainingAuthUnlockButtonPresses).toBe(2);
      expect(status.firmwareVersion).toBeNull();
    });

    test("ignores button presses when proximityProven is present", () => {
      const status = toPanelStatus({
        system: {
          serial: "sp3-0003",
          proximityProven: true,
          remainingAuthUnlockButtonPresses: 3,
        },
      });

      expect(status.proximityProven).toBe(true);
      expect(status.remainingAuthUnlockButtonPresses).toBeNull();
    });
  });

  test("toCircuits keeps only the normalized fields", () => {
    const circuits = toCircuits({
      circuits: {
        c1: {
          id: "c1",
          name: "Kitchen",
          relayState: "CLOSED",
          instantPowerW: 80,
          isUserControllable: true,
          tabs: [1, 3],
          priority: "MUST_HAVE",
        },
      },
    });

    expect(circuits).toEqual({
      c1: {
        id: "c1",
        name: "Kitchen",
        relayState: "CLOSED",
        instantPowerW: 80,
        isUserControllable: true,
        tabs: [1, 3],
      },
    });
  });

  test.each([
    [401, true],
    [403, true],
    [404, false],
    [500, false],
  ])("isAuthFailureStatus(%i) is %s", (status, expected) => {
    expect(isAuthFailureStatus(status)).toBe(expected);
  });
});
