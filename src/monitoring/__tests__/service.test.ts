/**
 * Monitor Tests
 *
 * Drives the assembled bridge pass by pass with a fake MQTT client
 * and fake notification connections.
 */
import { describe, expect, it } from "vitest";

import { type Bridge, createBridge } from "../../bridge.js";
import { type Config, parseConfig } from "../../config.js";
import {
  type FakeBusClient,
  fakeBusFactory,
} from "../../mqtt/__tests__/fake-bus-client.js";
import { fakeConnector } from "../../notifications/__tests__/fake-connection.js";

const BUS_ENV = {
  MQTT_BROKER_URL: "mqtt://broker.test:1883",
  ACCESS_CODE: "1234",
  PARTITION_COUNT: "2",
};

const NOTIFY_ENV = {
  NOTIFY_HOST: "api.example.test",
  NOTIFY_ACCOUNT_ID: "AC-test",
  NOTIFY_AUTH_TOKEN: "test-secret",
  NOTIFY_TO: "15550001111",
  NOTIFY_FROM: "15550002222",
};

function testConfig(env: Record<string, string>): Config {
  const parsed = parseConfig({ NODE_ENV: "test", LOG_LEVEL: "silent", ...env });
  if (!parsed.success) {
    throw new Error(parsed.error.message);
  }
  return parsed.data;
}

function setup(env: Record<string, string>, response = "HTTP/1.1 201 Created\r\n\r\n") {
  const bus = fakeBusFactory();
  const notify = fakeConnector(response);
  const bridge = createBridge(testConfig(env), {
    createBusClient: bus.factory,
    connectNotify: notify.connect,
  });
  return { bridge, clients: bus.clients, connections: notify.connections };
}

/**
 * Two passes: the first attempts the connection, the second sees it
 * established and resyncs.
 */
async function connectBus(
  bridge: Bridge,
  clients: FakeBusClient[],
  now: number,
): Promise<FakeBusClient> {
  await bridge.monitor.runCycle(now);
  const client = clients[clients.length - 1];
  if (!client) throw new Error("no client created");
  client.acceptConnection();
  await bridge.monitor.runCycle(now + 10);
  return client;
}

describe("Monitor", () => {
  describe("publishing", () => {
    it("publishes full state after the first connection", async () => {
      const { bridge, clients } = setup(BUS_ENV);

      const client = await connectBus(bridge, clients, 0);

      // keybus, power, trouble, 2 partitions x 4 facts, 64 + 64 zones
      expect(client.published).toHaveLength(139);
      expect(client.payloadsOn("dsc/Get/Partition1")).toEqual(["1D", "1D", "1D"]);
      expect(client.payloadsOn("dsc/Get/Fire2")).toEqual(["0"]);
      expect(client.payloadsOn("dsc/Get/Zone64")).toEqual(["0"]);
      expect(client.payloadsOn("dsc/Status")).toEqual(["offline"]);
      expect(client.subscriptions).toEqual(["dsc/Set"]);
    });

    it("publishes a partition armed away", async () => {
      const { bridge, clients } = setup(BUS_ENV);
      const client = await connectBus(bridge, clients, 0);
      client.published.splice(0);

      bridge.panel.updatePartition(1, { armed: true, armedMode: "away" });
      await bridge.monitor.runCycle(20);

      expect(client.published).toEqual([
        { topic: "dsc/Get/Partition1", payload: "1A", retain: true },
      ]);
    });

    it("publishes an opened zone", async () => {
      const { bridge, clients } = setup(BUS_ENV);
      const client = await connectBus(bridge, clients, 0);
      client.published.splice(0);

      bridge.panel.setZoneOpen(5, true);
      await bridge.monitor.runCycle(20);

      expect(client.published).toEqual([
        { topic: "dsc/Get/Zone5", payload: "1", retain: true },
      ]);
    });

    it("publishes each fact once per change", async () => {
      const { bridge, clients } = setup(BUS_ENV);
      const client = await connectBus(bridge, clients, 0);
      client.published.splice(0);

      bridge.panel.setZoneOpen(5, true);
      await bridge.monitor.runCycle(20);
      await bridge.monitor.runCycle(30);

      expect(client.payloadsOn("dsc/Get/Zone5")).toEqual(["1"]);
    });

    it("publishes the birth message when the keybus is up", async () => {
      const { bridge, clients } = setup(BUS_ENV);
      bridge.panel.setKeybusConnected(true);

      const client = await connectBus(bridge, clients, 0);

      // Birth message, then the keybus fact of the resync
      expect(client.payloadsOn("dsc/Status")).toEqual(["online", "online"]);
    });

    it("counts buffer overflows without publishing", async () => {
      const { bridge, clients } = setup(BUS_ENV);
      const client = await connectBus(bridge, clients, 0);
      client.published.splice(0);

      bridge.panel.flagBufferOverflow();
      await bridge.monitor.runCycle(20);

      expect(client.published).toEqual([]);
      expect(bridge.monitor.getSnapshot().stats.overflows).toBe(1);
    });
  });

  describe("reconnection", () => {
    it("re-emits every fact exactly once after a reconnect", async () => {
      // Arrange
      const { bridge, clients } = setup(BUS_ENV);
      const client = await connectBus(bridge, clients, 0);

      client.dropConnection();
      await bridge.monitor.runCycle(30);
      bridge.panel.setZoneOpen(7, true);
      await bridge.monitor.runCycle(40);
      client.published.splice(0);

      // Act
      client.acceptConnection();
      await bridge.monitor.runCycle(50);

      // Assert
      expect(client.reconnects).toBe(1);
      expect(client.published).toHaveLength(139);
      for (let zone = 1; zone <= 64; zone++) {
        expect(client.payloadsOn(`dsc/Get/Zone${zone}`)).toEqual([
          zone === 7 ? "1" : "0",
        ]);
        expect(client.payloadsOn(`dsc/Get/ZoneAlarm${zone}`)).toEqual(["0"]);
      }
      expect(client.payloadsOn("dsc/Get/Power")).toEqual(["0"]);
      expect(bridge.monitor.getSnapshot().supervisor?.connections).toBe(2);
    });

    it("drops publishes while the bus is down", async () => {
      const { bridge, clients } = setup(BUS_ENV);
      const client = await connectBus(bridge, clients, 0);
      client.published.splice(0);

      client.dropConnection();
      bridge.panel.setZoneOpen(7, true);
      await bridge.monitor.runCycle(30);

      expect(client.published).toEqual([]);
    });
  });

  describe("commands", () => {
    it("writes the access code once for a redelivered disarm", async () => {
      const { bridge, clients } = setup(BUS_ENV);
      const client = await connectBus(bridge, clients, 0);
      bridge.panel.updatePartition(1, { armed: true, armedMode: "away" });
      await bridge.monitor.runCycle(20);

      client.deliver("dsc/Set", "1D");
      client.deliver("dsc/Set", "1D");

      expect(bridge.panel.getWrites()).toEqual([{ keys: "1234", partition: 1 }]);
      expect(bridge.monitor.getSnapshot().stats.commands).toBe(2);
    });

    it("ignores messages on other topics", async () => {
      const { bridge, clients } = setup(BUS_ENV);
      const client = await connectBus(bridge, clients, 0);

      client.deliver("dsc/Get/Partition1", "1S");

      expect(bridge.panel.getWrites()).toEqual([]);
      expect(bridge.monitor.getSnapshot().stats.commands).toBe(0);
    });
  });

  describe("notifications", () => {
    it("does not notify facts first seen during a resync", async () => {
      const { bridge, clients, connections } = setup({ ...BUS_ENV, ...NOTIFY_ENV });

      await connectBus(bridge, clients, 0);

      expect(connections).toHaveLength(0);
    });

    it("notifies a zone alarm", async () => {
      // Arrange
      const { bridge, clients, connections } = setup({ ...BUS_ENV, ...NOTIFY_ENV });
      await connectBus(bridge, clients, 0);

      // Act
      bridge.panel.setZoneAlarm(3, true);
      await bridge.monitor.runCycle(20);

      // Assert
      expect(connections).toHaveLength(1);
      expect(
        connections[0]?.written.endsWith(
          "\r\n\r\nTo=+15550001111&From=+15550002222&Body=%5BSecurity%20system%5D%20Zone%20alarm%3A%203",
        ),
      ).toBe(true);
      expect(bridge.monitor.getSnapshot().stats.notificationsSent).toBe(1);
    });

    it("notifies a disarm when an exit delay ends without arming", async () => {
      // Arrange
      const { bridge, clients, connections } = setup({ ...BUS_ENV, ...NOTIFY_ENV });
      const client = await connectBus(bridge, clients, 0);
      client.published.splice(0);

      // Act
      bridge.panel.updatePartition(1, { exitDelay: true });
      await bridge.monitor.runCycle(20);
      bridge.panel.updatePartition(1, { exitDelay: false });
      await bridge.monitor.runCycle(30);

      // Assert
      expect(client.payloadsOn("dsc/Get/Partition1")).toEqual(["1P", "1D"]);
      expect(connections).toHaveLength(1);
      expect(
        connections[0]?.written.endsWith("Body=%5BSecurity%20system%5D%20Partition%201%20disarmed"),
      ).toBe(true);
    });

    it("notifies every disarm, even with the same text as the last one", async () => {
      const { bridge, clients, connections } = setup({ ...BUS_ENV, ...NOTIFY_ENV });
      await connectBus(bridge, clients, 0);

      bridge.panel.updatePartition(1, { exitDelay: true });
      await bridge.monitor.runCycle(20);
      bridge.panel.updatePartition(1, { exitDelay: false });
      await bridge.monitor.runCycle(30);
      bridge.panel.updatePartition(1, { exitDelay: true });
      await bridge.monitor.runCycle(40);
      bridge.panel.updatePartition(1, { exitDelay: false });
      await bridge.monitor.runCycle(50);

      expect(connections).toHaveLength(2);
    });

    it("sends one disarm when armed and exit delay clear in the same pass", async () => {
      const { bridge, clients, connections } = setup({ ...BUS_ENV, ...NOTIFY_ENV });
      await connectBus(bridge, clients, 0);
      bridge.panel.updatePartition(1, { armed: true, armedMode: "away", exitDelay: true });
      await bridge.monitor.runCycle(20);

      bridge.panel.updatePartition(1, { armed: false, exitDelay: false });
      await bridge.monitor.runCycle(30);

      // "armed away", then a single "disarmed"
      expect(connections).toHaveLength(2);
      expect(
        connections[1]?.written.endsWith("Body=%5BSecurity%20system%5D%20Partition%201%20disarmed"),
      ).toBe(true);
    });

    it("does not repeat unchanged facts after a reconnect", async () => {
      const { bridge, clients, connections } = setup({ ...BUS_ENV, ...NOTIFY_ENV });
      const client = await connectBus(bridge, clients, 0);
      bridge.panel.setZoneAlarm(3, true);
      await bridge.monitor.runCycle(20);

      client.dropConnection();
      await bridge.monitor.runCycle(30);
      client.acceptConnection();
      await bridge.monitor.runCycle(40);

      expect(connections).toHaveLength(1);
    });

    it("notifies changes made while the bus was down", async () => {
      const { bridge, clients, connections } = setup({ ...BUS_ENV, ...NOTIFY_ENV });
      const client = await connectBus(bridge, clients, 0);

      client.dropConnection();
      bridge.panel.setPowerTrouble(true);
      await bridge.monitor.runCycle(30);
      client.acceptConnection();
      await bridge.monitor.runCycle(40);

      expect(connections).toHaveLength(1);
      expect(connections[0]?.written.endsWith("Body=%5BSecurity%20system%5D%20AC%20power%20trouble")).toBe(true);
    });

    it("notifies without a bus configured", async () => {
      const { bridge, connections } = setup(NOTIFY_ENV);

      bridge.panel.pressKeypadAlarm("panic");
      await bridge.monitor.runCycle(0);

      expect(bridge.bus).toBeNull();
      expect(connections).toHaveLength(1);
      expect(connections[0]?.written.endsWith("Body=%5BSecurity%20system%5D%20Keypad%20panic%20alarm")).toBe(true);
    });

    it("counts failed notifications and moves on", async () => {
      const { bridge, connections } = setup(
        NOTIFY_ENV,
        "HTTP/1.1 500 Internal Server Error\r\n\r\n",
      );

      bridge.panel.setTrouble(true);
      bridge.panel.setZoneAlarm(2, true);
      await bridge.monitor.runCycle(0);

      expect(connections).toHaveLength(2);
      expect(bridge.monitor.getSnapshot().stats.notificationsFailed).toBe(2);
    });
  });

  describe("run loop", () => {
    it("runs until stopped", async () => {
      const { bridge } = setup({ LOOP_INTERVAL_MS: "0" });

      const loop = bridge.monitor.start();
      expect(bridge.monitor.isRunning()).toBe(true);

      bridge.monitor.stop();
      await loop;

      expect(bridge.monitor.isRunning()).toBe(false);
      expect(bridge.monitor.getSnapshot().stats.cycles).toBeGreaterThanOrEqual(1);
    });
  });
});
