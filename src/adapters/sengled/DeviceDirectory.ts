import { z } from "zod";
import { createDevice, type Device } from "../../domain/devices/Device";
import { DeviceIdentifier } from "../../domain/devices/DeviceIdentifier";
import { DirectoryParseError, InvalidIdentifierError } from "../../domain/errors";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { ConsoleLogger } from "../sys/ConsoleLogger";
import { defaultFetch, postJson, type FetchLike } from "./http";
import { DEVICE_LIST_URL, sessionCookie } from "./protocol";

const attributeSchema = z.object({
  name: z.string(),
  value: z.string(),
});

const rawDeviceSchema = z.object({
  deviceUuid: z.string(),
  attributeList: z.array(attributeSchema),
});

const deviceListSchema = z.object({
  deviceList: z.array(rawDeviceSchema),
});

export type RawDevice = z.infer<typeof rawDeviceSchema>;

export const NAME_ATTRIBUTE = "name";

export function deviceFromRecord(raw: RawDevice): Device {
  const nameAttribute = raw.attributeList.find((attr) => attr.name === NAME_ATTRIBUTE);
  if (!nameAttribute) {
    throw new DirectoryParseError(`Device ${raw.deviceUuid} has no "${NAME_ATTRIBUTE}" attribute`);
  }

  let identifier: DeviceIdentifier;
  try {
    identifier = DeviceIdentifier.parse(raw.deviceUuid);
  } catch (err) {
    if (err instanceof InvalidIdentifierError) {
      throw new DirectoryParseError(`Device "${nameAttribute.value}": ${err.message}`, {
        cause: err,
      });
    }
    throw err;
  }

  return createDevice(nameAttribute.value, identifier);
}

/** All-or-nothing: one bad record fails the whole list. */
export function parseDeviceList(body: unknown): Device[] {
  const parsed = deviceListSchema.safeParse(body);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new DirectoryParseError(`Unexpected device list response (${detail})`, {
      cause: parsed.error,
    });
  }
  return parsed.data.deviceList.map(deviceFromRecord);
}

export interface DeviceDirectoryOptions {
  fetch?: FetchLike;
  logger?: LoggerPort;
}

export class DeviceDirectory {
  private readonly fetchImpl: FetchLike;
  private readonly log: LoggerPort;

  constructor(options: DeviceDirectoryOptions = {}) {
    this.fetchImpl = options.fetch ?? defaultFetch;
    this.log = options.logger ?? new ConsoleLogger({ scope: "sengled-devices" });
  }

  async listDevices(token: string): Promise<Device[]> {
    const body = await postJson(this.fetchImpl, DEVICE_LIST_URL, "Sengled device list", {
      headers: { Cookie: sessionCookie(token) },
    });

    const devices = parseDeviceList(body);
    this.log.debug("Fetched Sengled devices", { count: devices.length });
    return devices;
  }
}
