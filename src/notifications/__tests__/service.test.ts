/**
 * Notify Client Tests
 *
 * Uses in-process fake connections and a manual clock.
 */
import { type Result, err, ok } from "neverthrow";
import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import type { NotificationError } from "../errors.js";
import { transportUnavailable } from "../errors.js";
import type { ConnectFn, NotifyConnection, NotifyEndpoint } from "../schema.js";
import { NotifyEndpointSchema } from "../schema.js";
import { NotifyClient } from "../service.js";
import { FakeConnection, fakeConnector } from "./fake-connection.js";

const endpoint: NotifyEndpoint = NotifyEndpointSchema.parse({
  host: "api.example.test",
  path: "/2010-04-01/Accounts/AC-test/Messages.json",
  accountId: "AC-test",
  authToken: "test-secret",
  to: "15550001111",
  from: "15550002222",
});

describe("NotifyClient", () => {
  let now: number;
  const clock = () => now;
  const panel = { handlePanel: vi.fn(() => false) };

  beforeEach(() => {
    now = 0;
    panel.handlePanel.mockClear();
  });

  it("is not configured without an endpoint", async () => {
    const client = new NotifyClient({ endpoint: null, panel });

    const result = await client.send("", "Partition 1 armed away");

    expect(client.isConfigured()).toBe(false);
    expect(result._unsafeUnwrapErr().type).toBe("NOT_CONFIGURED");
  });

  it("sends the request and accepts a 2xx response", async () => {
    // Arrange
    const { connect, connections } = fakeConnector(
      "HTTP/1.1 201 Created\r\nContent-Length: 0\r\n\r\n",
    );
    const client = new NotifyClient({ endpoint, panel, connect, clock });

    // Act
    const result = await client.send("[Security system] ", "Zone alarm: 3");

    // Assert
    expect(result.isOk()).toBe(true);
    const connection = connections[0];
    expect(connection?.written.startsWith("POST /2010-04-01/Accounts/AC-test/Messages.json HTTP/1.1\r\n")).toBe(true);
    expect(connection?.written.endsWith("Body=%5BSecurity%20system%5D%20Zone%20alarm%3A%203")).toBe(true);
    expect(connection?.destroyed).toBe(true);
  });

  it("accepts a 200 response", async () => {
    const { connect } = fakeConnector("HTTP/1.1 200 OK\r\n\r\n");
    const client = new NotifyClient({ endpoint, panel, connect, clock });

    const result = await client.send("", "AC power trouble");

    expect(result.isOk()).toBe(true);
  });

  it("classifies a 404 as a failure carrying the response", async () => {
    const response = "HTTP/1.1 404 Not Found\r\n\r\nmissing";
    const { connect } = fakeConnector(response);
    const client = new NotifyClient({ endpoint, panel, connect, clock });

    const error = (await client.send("", "AC power trouble"))._unsafeUnwrapErr();

    expect(error).toEqual({
      type: "NON_SUCCESS_STATUS",
      message: "Endpoint returned a 4xx status",
      statusDigit: "4",
      response,
    });
  });

  it("classifies a 500 as a failure", async () => {
    const { connect } = fakeConnector("HTTP/1.1 500 Internal Server Error\r\n\r\n");
    const client = new NotifyClient({ endpoint, panel, connect, clock });

    const error = (await client.send("", "AC power trouble"))._unsafeUnwrapErr();

    expect(error.type).toBe("NON_SUCCESS_STATUS");
  });

  it("keeps servicing the panel while waiting for the response", async () => {
    // Arrange
    const connection = new FakeConnection();
    const connect: ConnectFn = async () => ok(connection);
    let steps = 0;
    const pause = async () => {
      now += 100;
      steps += 1;
      if (steps === 3) connection.receive("HTTP/1.1 201 Created\r\n\r\n");
    };
    const client = new NotifyClient({ endpoint, panel, connect, clock, pause });

    // Act
    const result = await client.send("", "Partition 1 in alarm");

    // Assert
    expect(result.isOk()).toBe(true);
    expect(panel.handlePanel).toHaveBeenCalledTimes(3);
  });

  it("gives up after the response timeout", async () => {
    const connection = new FakeConnection();
    const connect: ConnectFn = async () => ok(connection);
    const pause = async () => {
      now += 100;
    };
    const client = new NotifyClient({ endpoint, panel, connect, clock, pause });

    const error = (await client.send("", "Partition 1 in alarm"))._unsafeUnwrapErr();

    expect(error).toEqual({
      type: "RESPONSE_TIMEOUT",
      message: "No response within 3000ms",
      timeoutMs: 3000,
    });
    // Once while connecting, then at 100, 200, ... 3100 ms
    expect(panel.handlePanel).toHaveBeenCalledTimes(32);
    expect(connection.destroyed).toBe(true);
  });

  it("fails when the endpoint closes without a status line", async () => {
    const connection = new FakeConnection();
    connection.close();
    const connect: ConnectFn = async () => ok(connection);
    const client = new NotifyClient({ endpoint, panel, connect, clock });

    const error = (await client.send("", "Keybus connected"))._unsafeUnwrapErr();

    expect(error).toEqual({
      type: "NON_SUCCESS_STATUS",
      message: "Endpoint returned no status line",
      statusDigit: null,
      response: "",
    });
  });

  it("reports an unreachable endpoint", async () => {
    const connect: ConnectFn = async () =>
      err(transportUnavailable("Connection refused"));
    const client = new NotifyClient({ endpoint, panel, connect, clock });

    const error = (await client.send("", "Keybus connected"))._unsafeUnwrapErr();

    expect(error).toEqual({
      type: "TRANSPORT_UNAVAILABLE",
      message: "Connection refused",
    });
  });

  describe("while connecting", () => {
    type ConnectResult = Result<NotifyConnection, NotificationError>;

    /** Connect function settled by the test. */
    const slowConnector = () => {
      const pending: { settle: ((result: ConnectResult) => void) | null } = {
        settle: null,
      };
      const connect: ConnectFn = () =>
        new Promise<ConnectResult>((resolve) => {
          pending.settle = resolve;
        });
      return { connect, pending };
    };

    it("keeps servicing the panel until the connection is up", async () => {
      // Arrange
      const { connect, pending } = slowConnector();
      const connection = new FakeConnection();
      connection.receive("HTTP/1.1 201 Created\r\n\r\n");
      let steps = 0;
      const pause = async () => {
        now += 100;
        steps += 1;
        if (steps === 3) pending.settle?.(ok(connection));
      };
      const client = new NotifyClient({ endpoint, panel, connect, clock, pause });

      // Act
      const result = await client.send("", "Partition 1 in alarm");

      // Assert
      expect(result.isOk()).toBe(true);
      expect(panel.handlePanel).toHaveBeenCalledTimes(3);
      expect(connection.written.startsWith("POST ")).toBe(true);
    });

    it("gives up on a connection that takes longer than the timeout", async () => {
      const { connect } = slowConnector();
      const pause = async () => {
        now += 100;
      };
      const client = new NotifyClient({ endpoint, panel, connect, clock, pause });

      const error = (await client.send("", "Partition 1 in alarm"))._unsafeUnwrapErr();

      expect(error).toEqual({
        type: "TRANSPORT_UNAVAILABLE",
        message: "No connection within 3000ms",
      });
      // Serviced at 0, 100, ... 3000 ms
      expect(panel.handlePanel).toHaveBeenCalledTimes(31);
    });

    it("tears down a connection that arrives after the timeout", async () => {
      const { connect, pending } = slowConnector();
      const pause = async () => {
        now += 100;
      };
      const client = new NotifyClient({ endpoint, panel, connect, clock, pause });
      await client.send("", "Partition 1 in alarm");

      const late = new FakeConnection();
      pending.settle?.(ok(late));
      await Promise.resolve();

      expect(late.destroyed).toBe(true);
      expect(late.written).toBe("");
    });

    it("reports a connect function that throws", async () => {
      const connect: ConnectFn = async () => {
        throw new Error("getaddrinfo failed");
      };
      const client = new NotifyClient({ endpoint, panel, connect, clock });

      const error = (await client.send("", "Keybus connected"))._unsafeUnwrapErr();

      expect(error.type).toBe("TRANSPORT_UNAVAILABLE");
    });
  });

  it("reports a failed write as transport unavailable", async () => {
    const connection = new FakeConnection();
    connection.write = () => {
      throw new Error("socket hang up");
    };
    const connect: ConnectFn = async () => ok(connection);
    const client = new NotifyClient({ endpoint, panel, connect, clock });

    const error = (await client.send("", "Keybus connected"))._unsafeUnwrapErr();

    expect(error.type).toBe("TRANSPORT_UNAVAILABLE");
    expect(connection.destroyed).toBe(true);
  });
});
