import {
  brightnessCommand,
  colorCommand,
  serializeCommand,
  switchCommand,
  topicFor,
  type Command,
  type RgbColor,
} from "../../domain/commands/Command";
import type { Device } from "../../domain/devices/Device";
import type { LightingPort } from "../../ports/devices/LightingPort";
import type { TimePort } from "../../ports/sys/TimePort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { CommandTransportPort } from "../../ports/transport/CommandTransportPort";
import { ConsoleLogger } from "../sys/ConsoleLogger";
import { NodeTime } from "../sys/NodeTime";
import { DeviceDirectory } from "./DeviceDirectory";
import type { FetchLike } from "./http";
import { LoginClient, type Credentials } from "./LoginClient";
import { MqttCommandTransport } from "./MqttCommandTransport";

export type TransportFactory = (token: string, logger: LoggerPort) => Promise<CommandTransportPort>;

export interface SengledSessionOptions {
  fetch?: FetchLike;
  logger?: LoggerPort;
  clock?: TimePort;
  /** Defaults to the MQTT-over-WebSocket transport of the Sengled cloud. */
  openTransport?: TransportFactory;
}

const openMqttTransport: TransportFactory = (token, logger) =>
  MqttCommandTransport.open(token, { logger });

/**
 * A logged-in Sengled account with one open command connection.
 *
 * Obtain one through {@link SengledSession.connect}; there is no way to hold a
 * session that is not ready. If the connection drops, command calls reject
 * and the session should be discarded: it never logs in or reconnects again.
 */
export class SengledSession implements LightingPort {
  private constructor(
    private readonly token: string,
    private readonly directory: DeviceDirectory,
    private readonly transport: CommandTransportPort,
    private readonly clock: TimePort,
    private readonly log: LoggerPort
  ) {}

  static async connect(
    credentials: Credentials,
    options: SengledSessionOptions = {}
  ): Promise<SengledSession> {
    const log = options.logger ?? new ConsoleLogger({ scope: "sengled" });
    const login = new LoginClient({ fetch: options.fetch, logger: log });
    const token = await login.login(credentials);

    const openTransport = options.openTransport ?? openMqttTransport;
    const transport = await openTransport(token, log);

    log.info("Sengled session ready");
    return new SengledSession(
      token,
      new DeviceDirectory({ fetch: options.fetch, logger: log }),
      transport,
      options.clock ?? new NodeTime(),
      log
    );
  }

  listDevices(): Promise<Device[]> {
    return this.directory.listDevices(this.token);
  }

  async sendCommand(command: Command): Promise<void> {
    const topic = topicFor(command.identifier);
    const payload = serializeCommand(command, this.clock);
    this.log.debug("Sending command", { topic, type: command.kind, value: command.value });
    await this.transport.publish(topic, payload);
  }

  turnOn(device: Device): Promise<void> {
    return this.sendCommand(switchCommand(device.identifier, true));
  }

  turnOff(device: Device): Promise<void> {
    return this.sendCommand(switchCommand(device.identifier, false));
  }

  async setBrightness(device: Device, level: number): Promise<void> {
    await this.sendCommand(brightnessCommand(device.identifier, level));
  }

  async setColor(device: Device, color: RgbColor): Promise<void> {
    await this.sendCommand(colorCommand(device.identifier, color));
  }

  close(): Promise<void> {
    return this.transport.close();
  }
}
