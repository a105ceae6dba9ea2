import { connect, type IClientOptions, type MqttClient } from "mqtt";
import { PublishError, TransportError, describeError } from "../../domain/errors";
import type { CommandTransportPort } from "../../ports/transport/CommandTransportPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { ConsoleLogger } from "../sys/ConsoleLogger";
import {
  CLIENT_IDENTITY,
  CLIENT_IDENTITY_HEADER,
  MQTT_CLIENT_ID_SUFFIX,
  MQTT_URL,
  sessionCookie,
} from "./protocol";

export interface MqttTransportOptions {
  logger?: LoggerPort;
  connectTimeoutMs?: number;
  /** Defaults to the Sengled cloud broker. */
  brokerUrl?: string;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

export function mqttClientId(token: string): string {
  return `${token}${MQTT_CLIENT_ID_SUFFIX}`;
}

export function buildConnectOptions(
  token: string,
  connectTimeoutMs = DEFAULT_CONNECT_TIMEOUT_MS
): IClientOptions {
  return {
    clientId: mqttClientId(token),
    clean: true,
    // a dropped connection ends the session; nothing reconnects behind the caller
    reconnectPeriod: 0,
    queueQoSZero: false,
    connectTimeout: connectTimeoutMs,
    wsOptions: {
      headers: {
        Cookie: sessionCookie(token),
        [CLIENT_IDENTITY_HEADER]: CLIENT_IDENTITY,
      },
    },
  };
}

/**
 * Settles on the first of `connect`, `error` or `close`. With reconnects off,
 * a refused handshake or a connack timeout only closes the stream.
 */
function waitForConnack(client: MqttClient): Promise<void> {
  return new Promise((resolve, reject) => {
    const settle = (err?: Error) => {
      client.removeListener("connect", onConnect);
      client.removeListener("error", onError);
      client.removeListener("close", onClose);
      if (err) reject(err);
      else resolve();
    };
    const onConnect = () => settle();
    const onError = (err: Error) => settle(err);
    const onClose = () => settle(new Error("connection closed before the broker accepted it"));

    client.on("connect", onConnect);
    client.on("error", onError);
    client.on("close", onClose);
  });
}

type ConnectionState = "connecting" | "open" | "closed";

export class MqttCommandTransport implements CommandTransportPort {
  private state: ConnectionState = "connecting";

  private constructor(
    private readonly client: MqttClient,
    private readonly log: LoggerPort
  ) {
    client.on("error", (err) => {
      this.log.error("MQTT connection error", { message: err.message });
    });
    client.on("offline", () => {
      this.log.warn("MQTT client offline");
    });
    client.on("close", () => {
      if (this.state === "open") this.log.warn("MQTT connection closed");
    });
  }

  static async open(
    token: string,
    options: MqttTransportOptions = {}
  ): Promise<MqttCommandTransport> {
    const log = options.logger ?? new ConsoleLogger({ scope: "sengled-mqtt" });
    const url = options.brokerUrl ?? MQTT_URL;

    const client = connect(url, buildConnectOptions(token, options.connectTimeoutMs));
    const transport = new MqttCommandTransport(client, log);
    try {
      await waitForConnack(client);
    } catch (err) {
      transport.state = "closed";
      await client.endAsync(true).catch((endErr: unknown) => {
        log.warn("MQTT client cleanup failed", { message: describeError(endErr) });
      });
      throw new TransportError(`MQTT connect to ${url} failed: ${describeError(err)}`, {
        cause: err,
      });
    }

    transport.state = "open";
    log.info("MQTT connected", { url });
    return transport;
  }

  async publish(topic: string, payload: Buffer): Promise<void> {
    if (this.state !== "open" || !this.client.connected) {
      throw new PublishError(topic, `Cannot publish to ${topic}: MQTT connection is not open`);
    }

    try {
      await this.client.publishAsync(topic, payload, { qos: 0 });
    } catch (err) {
      throw new PublishError(topic, `Publish to ${topic} failed: ${describeError(err)}`, {
        cause: err,
      });
    }
    this.log.debug("Published command", { topic, bytes: payload.length });
  }

  async close(): Promise<void> {
    if (this.state === "closed") return;
    this.state = "closed";
    try {
      await this.client.endAsync();
    } catch (err) {
      throw new TransportError(`MQTT disconnect failed: ${describeError(err)}`, { cause: err });
    }
    this.log.info("MQTT connection closed");
  }
}
