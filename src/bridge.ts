/**
 * Bridge assembly - builds every component from the typed config and
 * wires them into one explicit context. Nothing here is global: the
 * panel-bus decoder receives the returned panel state and writes into it.
 */
import type { Hono } from "hono";

import { createApp } from "./api/routes.js";
import { CommandHandler } from "./commands/index.js";
import type { Config } from "./config.js";
import { getBusConfig, getBusTopics, getNotifyConfig } from "./config.js";
import { BIRTH_MESSAGE, LAST_WILL_MESSAGE } from "./encoding/index.js";
import { Monitor } from "./monitoring/index.js";
import type { BusClientFactory } from "./mqtt/index.js";
import { BusConnectionSchema, BusPublisher } from "./mqtt/index.js";
import type { ConnectFn } from "./notifications/index.js";
import { NotifyClient, NotifyEndpointSchema } from "./notifications/index.js";
import type { PanelStateOptions } from "./panel/index.js";
import { PanelState } from "./panel/index.js";

export type Bridge = Readonly<{
  panel: PanelState;
  monitor: Monitor;
  bus: BusPublisher | null;
  notifier: NotifyClient;
  app: Hono;
}>;

/**
 * Seams for the decoder and for tests.
 */
export type BridgeOverrides = {
  onPanelService?: PanelStateOptions["onService"];
  onPanelWrite?: PanelStateOptions["onWrite"];
  createBusClient?: BusClientFactory;
  connectNotify?: ConnectFn;
  clock?: () => number;
};

export function createBridge(
  config: Config,
  overrides: BridgeOverrides = {},
): Bridge {
  const panel = new PanelState({
    partitionCount: config.PARTITION_COUNT,
    onService: overrides.onPanelService,
    onWrite: overrides.onPanelWrite,
  });

  const topics = getBusTopics(config);

  const busConfig = getBusConfig(config);
  const bus = busConfig
    ? new BusPublisher({
        connection: BusConnectionSchema.parse({
          brokerUrl: busConfig.brokerUrl,
          clientId: busConfig.clientId,
          username: busConfig.username,
          password: busConfig.password,
        }),
        availability: {
          statusTopic: topics.status,
          birthMessage: BIRTH_MESSAGE,
          lastWillMessage: LAST_WILL_MESSAGE,
        },
        createClient: overrides.createBusClient,
      })
    : null;

  const notifyConfig = getNotifyConfig(config);
  const notifier = new NotifyClient({
    endpoint: notifyConfig
      ? NotifyEndpointSchema.parse({
          host: notifyConfig.host,
          port: notifyConfig.port,
          path: notifyConfig.path,
          accountId: notifyConfig.accountId,
          authToken: notifyConfig.authToken,
          to: notifyConfig.to,
          from: notifyConfig.from,
          responseTimeoutMs: notifyConfig.responseTimeoutMs,
        })
      : null,
    panel,
    connect: overrides.connectNotify,
    clock: overrides.clock,
  });

  const commands = new CommandHandler(panel, {
    partitionCount: config.PARTITION_COUNT,
    accessCode: config.ACCESS_CODE,
  });

  const monitor = new Monitor({
    panel,
    commands,
    topics,
    bus,
    notifier,
    notifyPrefix: config.NOTIFY_PREFIX,
    retryIntervalMs: config.RETRY_INTERVAL_MS,
    loopIntervalMs: config.LOOP_INTERVAL_MS,
    clock: overrides.clock,
  });

  return { panel, monitor, bus, notifier, app: createApp({ monitor }) };
}
