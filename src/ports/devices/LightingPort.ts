import type { Device } from "../../domain/devices/Device";
import type { RgbColor } from "../../domain/commands/Command";

export interface LightingPort {
  listDevices(): Promise<Device[]>;
  turnOn(device: Device): Promise<void>;
  turnOff(device: Device): Promise<void>;
  /** `level` is 0-255 and is scaled to a percentage on the wire. */
  setBrightness(device: Device, level: number): Promise<void>;
  setColor(device: Device, color: RgbColor): Promise<void>;
}
