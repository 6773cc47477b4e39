/**
 * Panel Service Integration Tests
 *
 * Exercises the REST client with fetch stubbed at the global boundary.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

// Import after mocks
import { createPanelClient, createPanelClientFactory } from "../service.js";

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });

const settings = { timeoutMs: 1000, clientName: "span-panel-link" };

describe("Panel Service", () => {
  let fetchMock: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  // ===========================================================================
  // ping
  // ===========================================================================

  describe("ping", () => {
    test("probes the status endpoint without a token", async () => {
      // Arrange
      fetchMock.mockResolvedValue(jsonResponse({ system: { serial: "sp3-0001" } }));
      const client = createPanelClient({ host: "10.0.0.5", ...settings });

      // Act
      const reachable = await client.ping();

      // Assert
      expect(reachable).toBe(true);
      expect(fetchMock.mock.calls[0]?.[0]).toBe("http://10.0.0.5/api/v1/status");
    });

    test("probes the authenticated panel endpoint with a token", async () => {
      fetchMock.mockResolvedValue(jsonResponse({}));
      const client = createPanelClient({
        host: "10.0.0.5",
        accessToken: "test-token",
        ...settings,
      });

      await client.ping();

      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe("http://10.0.0.5/api/v1/panel");
      expect(init.headers.Authorization).toBe("Bearer test-token");
    });

    test("returns false when the token is rejected", async () => {
      fetchMock.mockResolvedValue(new Response("", { status: 401 }));
      const client = createPanelClient({
        host: "10.0.0.5",
        accessToken: "bad-token",
        ...settings,
      });

      expect(await client.ping()).toBe(false);
    });

    test("returns false when the host is unreachable", async () => {
      fetchMock.mockRejectedValue(new TypeError("fetch failed"));
      const client = createPanelClient({ host: "10.0.0.9", ...settings });

      expect(await client.ping()).toBe(false);
    });
  });

  // ===========================================================================
  // getStatusData
  // ===========================================================================

  describe("getStatusData", () => {
    test("normalizes the status response", async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({
          software: { firmwareVersion: "spanos2/r202342/04" },
          system: { serial: "sp3-0001", proximityProven: true },
        }),
      );
      const client = createPanelClient({ host: "10.0.0.5", ...settings });

      const result = await client.getStatusData();

      expect(result._unsafeUnwrap()).toEqual({
        serialNumber: "sp3-0001",
        firmwareVersion: "spanos2/r202342/04",
        proximityProven: true,
        remainingAuthUnlockButtonPresses: null,
      });
    });

    test("returns INVALID_RESPONSE when the serial is missing", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ system: {} }));
      const client = createPanelClient({ host: "10.0.0.5", ...settings });

      const result = await client.getStatusData();

      expect(result._unsafeUnwrapErr().type).toBe("INVALID_RESPONSE");
    });

    test("returns HTTP_ERROR on a 500", async () => {
      fetchMock.mockResolvedValue(new Response("", { status: 500 }));
      const client = createPanelClient({ host: "10.0.0.5", ...settings });

      const result = await client.getStatusData();

      expect(result._unsafeUnwrapErr().type).toBe("HTTP_ERROR");
    });

    test("returns TIMEOUT when the request times out", async () => {
      fetchMock.mockRejectedValue(Object.assign(new Error("timed out"), { name: "TimeoutError" }));
      const client = createPanelClient({ host: "10.0.0.5", ...settings });

      const result = await client.getStatusData();

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "TIMEOUT",
        host: "10.0.0.5",
        timeoutMs: 1000,
      });
    });

    test("returns NETWORK_ERROR when fetch throws", async () => {
      fetchMock.mockRejectedValue(new TypeError("fetch failed"));
      const client = createPanelClient({ host: "10.0.0.5", ...settings });

      const result = await client.getStatusData();

      expect(result._unsafeUnwrapErr().type).toBe("NETWORK_ERROR");
    });
  });

  // ===========================================================================
  // getAccessToken
  // ===========================================================================

  describe("getAccessToken", () => {
    test("registers with the configured client name", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ accessToken: "test-token" }));
      const client = createPanelClient({ host: "10.0.0.5", ...settings });

      const result = await client.getAccessToken();

      expect(result._unsafeUnwrap()).toBe("test-token");
      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe("http://10.0.0.5/api/v1/auth/register");
      expect(init.method).toBe("POST");
      expect(JSON.parse(init.body).name).toMatch(/^span-panel-link-/);
    });

    test("returns UNAUTHORIZED before proximity is proven", async () => {
      fetchMock.mockResolvedValue(new Response("", { status: 401 }));
      const client = createPanelClient({ host: "10.0.0.5", ...settings });

      const result = await client.getAccessToken();

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "UNAUTHORIZED",
        host: "10.0.0.5",
        status: 401,
      });
    });
  });

  // ===========================================================================
  // Circuits
  // ===========================================================================

  describe("getCircuits", () => {
    test("maps unknown relay states to UNKNOWN", async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({
          circuits: {
            c1: { id: "c1", name: "Kitchen", relayState: "SOMETHING_NEW" },
          },
        }),
      );
      const client = createPanelClient({ host: "10.0.0.5", ...settings });

      const result = await client.getCircuits();

      expect(result._unsafeUnwrap()).toEqual({
        c1: {
          id: "c1",
          name: "Kitchen",
          relayState: "UNKNOWN",
          instantPowerW: 0,
          isUserControllable: false,
          tabs: [],
        },
      });
    });
  });

  describe("setRelay", () => {
    test("posts the relay payload to the circuit", async () => {
      fetchMock.mockResolvedValue(jsonResponse({}));
      const client = createPanelClient({
        host: "10.0.0.5",
        accessToken: "test-token",
        ...settings,
      });

      const result = await client.setRelay(
        {
          id: "c1",
          name: "Kitchen",
          relayState: "CLOSED",
          instantPowerW: 0,
          isUserControllable: true,
          tabs: [1],
        },
        "OPEN",
      );

      expect(result.isOk()).toBe(true);
      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe("http://10.0.0.5/api/v1/circuits/c1");
      expect(JSON.parse(init.body)).toEqual({ relayStateIn: { relayState: "OPEN" } });
    });
  });

  test("factory builds authenticated clients only when given a token", async () => {
    fetchMock.mockResolvedValue(jsonResponse({}));
    const factory = createPanelClientFactory(settings);

    await factory("10.0.0.5").ping();
    await factory("10.0.0.5", "test-token").ping();

    expect(fetchMock.mock.calls.map((call) => call[0])).toEqual([
      "http://10.0.0.5/api/v1/status",
      "http://10.0.0.5/api/v1/panel",
    ]);
  });
});
