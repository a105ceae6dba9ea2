import { setTimeout as delay } from "timers/promises";
import type { AppConfig } from "../config";
import { resolveAlias, resolveCycle } from "../config";
import { findDevice, type Device } from "../domain/devices/Device";
import type { LightingPort } from "../ports/devices/LightingPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import { USAGE, UsageError, type CliCommand } from "./commandLine";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface CommandContext {
  config: AppConfig;
  log: LoggerPort;
  output?: (line: string) => void;
  /** Aborting stops a running `cycle`. */
  signal?: AbortSignal;
  sleep?: Sleep;
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export function formatDeviceLine(device: Device): string {
  return `${device.identifier.format()}  ${device.name}`;
}

async function resolveTarget(
  lights: LightingPort,
  config: AppConfig,
  name: string
): Promise<Device> {
  const devices = await lights.listDevices();
  const target = resolveAlias(config, name);
  const device = findDevice(devices, target);
  if (!device) {
    const known = devices.map((d) => `"${d.name}"`).join(", ") || "none";
    throw new UsageError(`Unknown device "${name}". Known devices: ${known}`);
  }
  return device;
}

async function runCycle(lights: LightingPort, device: Device, context: CommandContext) {
  const { intervalMs, colors } = resolveCycle(context.config);
  const sleep = context.sleep ?? defaultSleep;
  const { signal } = context;

  context.log.info("Cycling colors; press Ctrl+C to stop", {
    device: device.name,
    intervalMs,
  });

  for (let index = 0; !signal?.aborted; index++) {
    await lights.setColor(device, colors[index % colors.length]);
    try {
      await sleep(intervalMs, signal);
    } catch (err) {
      if (signal?.aborted) break;
      throw err;
    }
  }
}

export async function executeCommand(
  lights: LightingPort,
  command: CliCommand,
  context: CommandContext
): Promise<void> {
  const output = context.output ?? ((line: string) => console.log(line));

  switch (command.name) {
    case "help":
      output(USAGE);
      return;
    case "list": {
      const devices = await lights.listDevices();
      if (!devices.length) {
        output("No devices registered on this account.");
        return;
      }
      devices.map(formatDeviceLine).forEach((line) => output(line));
      return;
    }
    case "on": {
      const device = await resolveTarget(lights, context.config, command.device);
      await lights.turnOn(device);
      output(`${device.name} turned on.`);
      return;
    }
    case "off": {
      const device = await resolveTarget(lights, context.config, command.device);
      await lights.turnOff(device);
      output(`${device.name} turned off.`);
      return;
    }
    case "brightness": {
      const device = await resolveTarget(lights, context.config, command.device);
      await lights.setBrightness(device, command.level);
      output(`${device.name} brightness set to ${command.level}/255.`);
      return;
    }
    case "color": {
      const device = await resolveTarget(lights, context.config, command.device);
      await lights.setColor(device, command.color);
      output(`${device.name} color set to ${command.color.join(":")}.`);
      return;
    }
    case "cycle": {
      const device = await resolveTarget(lights, context.config, command.device);
      await runCycle(lights, device, context);
      return;
    }
  }
}
