import { z } from "zod";
import type { DeviceIdentifier } from "../devices/DeviceIdentifier";
import { InvalidCommandValueError, SerializationError } from "../errors";
import type { TimePort } from "../../ports/sys/TimePort";

export type CommandKind = "switch" | "brightness" | "color";

export type RgbColor = readonly [red: number, green: number, blue: number];

export interface Command {
  readonly kind: CommandKind;
  readonly identifier: DeviceIdentifier;
  readonly value: string;
}

/** On-wire shape published to `wifielement/<dn>/update`. */
export interface CommandPayload {
  type: CommandKind;
  dn: string;
  value: string;
  time: number;
}

const byteSchema = z.number().int().min(0).max(255);

function requireByte(value: number, label: string): number {
  const parsed = byteSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidCommandValueError(`${label} must be an integer between 0 and 255, got ${value}`);
  }
  return parsed.data;
}

export function buildCommand(
  kind: CommandKind,
  identifier: DeviceIdentifier,
  value: string
): Command {
  return Object.freeze({ kind, identifier, value });
}

export function switchCommand(identifier: DeviceIdentifier, on: boolean): Command {
  return buildCommand("switch", identifier, on ? "1" : "0");
}

/** Truncating scale of an 8-bit level to a percentage: 255 -> 100, 128 -> 50. */
export function brightnessPercent(level: number): number {
  return Math.floor((requireByte(level, "Brightness") * 100) / 255);
}

export function brightnessCommand(identifier: DeviceIdentifier, level: number): Command {
  return buildCommand("brightness", identifier, String(brightnessPercent(level)));
}

export function colorCommand(identifier: DeviceIdentifier, color: RgbColor): Command {
  const [red, green, blue] = color;
  const value = [
    requireByte(red, "Red"),
    requireByte(green, "Green"),
    requireByte(blue, "Blue"),
  ].join(":");
  return buildCommand("color", identifier, value);
}

export function topicFor(identifier: DeviceIdentifier): string {
  return `wifielement/${identifier.format()}/update`;
}

function sampleTime(clock: TimePort): number {
  const time = clock.now();
  if (!Number.isSafeInteger(time) || time < 0) {
    // Not a protocol error: the host clock itself is unusable.
    throw new Error(`System clock returned an unusable time: ${time}`);
  }
  return time;
}

/** Stamps the command with the current time and encodes it as UTF-8 JSON. */
export function serializeCommand(command: Command, clock: TimePort): Buffer {
  const payload: CommandPayload = {
    type: command.kind,
    dn: command.identifier.format(),
    value: command.value,
    time: sampleTime(clock),
  };

  try {
    return Buffer.from(JSON.stringify(payload), "utf8");
  } catch (err) {
    throw new SerializationError("Failed to encode command payload", { cause: err });
  }
}
