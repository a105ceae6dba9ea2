import { InvalidIdentifierError } from "../errors";

export const IDENTIFIER_LENGTH = 6;

const OCTET_PATTERN = /^[0-9a-fA-F]{1,2}$/;

/**
 * 6-byte device address (the MAC-style `deviceUuid` of the Sengled API).
 *
 * Instances are immutable values: the octets are copied in and copied out, so
 * a command can carry the identifier after the device handle is gone.
 */
export class DeviceIdentifier {
  private readonly octets: readonly number[];

  private constructor(octets: readonly number[]) {
    this.octets = Object.freeze([...octets]);
  }

  /**
   * Parses `AA:BB:CC:DD:EE:FF` (either case). Single-digit octets such as
   * `A` are accepted and read as `0A`.
   */
  static parse(input: string): DeviceIdentifier {
    if (!input) {
      throw new InvalidIdentifierError(input, "empty input");
    }

    const segments = input.split(":");
    if (segments.length !== IDENTIFIER_LENGTH) {
      throw new InvalidIdentifierError(
        input,
        `expected ${IDENTIFIER_LENGTH} octets, got ${segments.length}`
      );
    }

    const octets = segments.map((segment) => {
      if (!OCTET_PATTERN.test(segment)) {
        throw new InvalidIdentifierError(input, `"${segment}" is not a hex octet`);
      }
      return Number.parseInt(segment, 16);
    });

    return new DeviceIdentifier(octets);
  }

  static fromBytes(bytes: ArrayLike<number>): DeviceIdentifier {
    const octets = Array.from(bytes);
    const label = octets.join(",");
    if (octets.length !== IDENTIFIER_LENGTH) {
      throw new InvalidIdentifierError(
        label,
        `expected ${IDENTIFIER_LENGTH} bytes, got ${octets.length}`
      );
    }
    if (!octets.every((byte) => Number.isInteger(byte) && byte >= 0 && byte <= 0xff)) {
      throw new InvalidIdentifierError(label, "bytes must be integers in 0-255");
    }
    return new DeviceIdentifier(octets);
  }

  get bytes(): Uint8Array {
    return Uint8Array.from(this.octets);
  }

  format(): string {
    return this.octets
      .map((byte) => byte.toString(16).toUpperCase().padStart(2, "0"))
      .join(":");
  }

  equals(other: DeviceIdentifier): boolean {
    return this.octets.every((byte, index) => other.octets[index] === byte);
  }

  toString(): string {
    return this.format();
  }

  toJSON(): string {
    return this.format();
  }
}
