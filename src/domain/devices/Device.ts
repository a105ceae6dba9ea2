import type { DeviceIdentifier } from "./DeviceIdentifier";

export interface Device {
  readonly name: string;
  readonly identifier: DeviceIdentifier;
}

export function createDevice(name: string, identifier: DeviceIdentifier): Device {
  return Object.freeze({ name, identifier });
}

/**
 * Looks a device up by display name (exact, then case-insensitive) and
 * finally by identifier text.
 */
export function findDevice(devices: readonly Device[], query: string): Device | undefined {
  const wanted = query.trim();
  if (!wanted) return undefined;

  const exact = devices.find((device) => device.name === wanted);
  if (exact) return exact;

  const lowered = wanted.toLowerCase();
  const relaxed = devices.find((device) => device.name.toLowerCase() === lowered);
  if (relaxed) return relaxed;

  return devices.find((device) => device.identifier.format() === wanted.toUpperCase());
}
