import type { RgbColor } from "../domain/commands/Command";

export type CliCommand =
  | { name: "list" }
  | { name: "on"; device: string }
  | { name: "off"; device: string }
  | { name: "brightness"; device: string; level: number }
  | { name: "color"; device: string; color: RgbColor }
  | { name: "cycle"; device: string }
  | { name: "help" };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = `Usage: sengled-lights [--config <path>] [--log-file <path>] [--debug] <command>

Commands:
  list                          list devices on the account (default)
  on <device>                   turn a device on
  off <device>                  turn a device off
  brightness <device> <0-255>   set brightness (scaled to a percentage)
  color <device> <r,g,b>        set an RGB color, each channel 0-255
  cycle <device>                alternate the configured colors until interrupted

<device> is an alias from the config file, a display name or an identifier.
Credentials come from SENGLED_USER and SENGLED_PASS.`;

function parseByte(text: string, label: string): number {
  const value = /^\d{1,3}$/.test(text) ? Number(text) : Number.NaN;
  if (!Number.isInteger(value) || value > 255) {
    throw new UsageError(`${label} must be an integer between 0 and 255, got "${text}"`);
  }
  return value;
}

/** Accepts `255,0,0` or `255:0:0`. */
export function parseColor(text: string): RgbColor {
  const parts = text.split(/[,:]/).map((part) => part.trim());
  if (parts.length !== 3) {
    throw new UsageError(`Color must be three channels like 255,0,0, got "${text}"`);
  }
  return [parseByte(parts[0], "Red"), parseByte(parts[1], "Green"), parseByte(parts[2], "Blue")];
}

function requireDevice(name: string, device: string | undefined): string {
  if (!device) {
    throw new UsageError(`"${name}" needs a device name`);
  }
  return device;
}

export function parseCommandLine(args: readonly string[]): CliCommand {
  const [name = "list", device, value] = args;

  switch (name) {
    case "list":
      return { name: "list" };
    case "help":
    case "-h":
      return { name: "help" };
    case "on":
      return { name: "on", device: requireDevice(name, device) };
    case "off":
      return { name: "off", device: requireDevice(name, device) };
    case "cycle":
      return { name: "cycle", device: requireDevice(name, device) };
    case "brightness": {
      const target = requireDevice(name, device);
      if (value === undefined) throw new UsageError('"brightness" needs a level between 0 and 255');
      return { name: "brightness", device: target, level: parseByte(value, "Brightness") };
    }
    case "color": {
      const target = requireDevice(name, device);
      if (value === undefined) throw new UsageError('"color" needs a value like 255,0,0');
      return { name: "color", device: target, color: parseColor(value) };
    }
    default:
      throw new UsageError(`Unknown command "${name}"`);
  }
}
