import {
  brightnessCommand,
  brightnessPercent,
  buildCommand,
  colorCommand,
  serializeCommand,
  switchCommand,
  topicFor,
  type CommandPayload,
} from '../../../src/domain/commands/Command';
import { DeviceIdentifier } from '../../../src/domain/devices/DeviceIdentifier';
import { InvalidCommandValueError, SerializationError, isSengledError } from '../../../src/domain/errors';
import { NodeTime } from '../../../src/adapters/sys/NodeTime';

const id = DeviceIdentifier.parse('b0:ce:18:00:00:01');
const fixedClock = { now: () => 1_700_000_000_000 };

function decode(payload: Buffer): CommandPayload {
  return JSON.parse(payload.toString('utf8'));
}

describe('command codec', () => {
  test('switch commands encode on/off as 1/0', () => {
    expect(switchCommand(id, true)).toEqual({ kind: 'switch', identifier: id, value: '1' });
    expect(switchCommand(id, false).value).toBe('0');
  });

  test.each([
    [255, 100],
    [128, 50],
    [0, 0],
    [1, 0],
    [3, 1],
    [254, 99],
  ])('brightness %i scales down to %i percent', (level, percent) => {
    expect(brightnessPercent(level)).toBe(percent);
    expect(brightnessCommand(id, level).value).toBe(String(percent));
  });

  test.each([[256], [-1], [12.5], [Number.NaN]])('brightness %p is rejected', (level) => {
    expect(() => brightnessCommand(id, level)).toThrow(InvalidCommandValueError);
  });

  test('color commands pass channels through as r:g:b', () => {
    const command = colorCommand(id, [255, 0, 0]);
    expect(command.kind).toBe('color');
    expect(command.value).toBe('255:0:0');
    expect(colorCommand(id, [12, 34, 56]).value).toBe('12:34:56');
  });

  test('color channels outside 0-255 are rejected', () => {
    expect(() => colorCommand(id, [0, 256, 0])).toThrow('Green must be an integer between 0 and 255, got 256');
  });

  test('topic is derived from the formatted identifier', () => {
    expect(topicFor(id)).toBe('wifielement/B0:CE:18:00:00:01/update');
  });

  test('serializes type, dn, value and time', () => {
    const payload = serializeCommand(colorCommand(id, [255, 0, 0]), fixedClock);
    expect(decode(payload)).toEqual({
      type: 'color',
      dn: 'B0:CE:18:00:00:01',
      value: '255:0:0',
      time: 1_700_000_000_000,
    });
  });

  test('time is sampled when serializing, not when building', () => {
    const times = [1000, 2000];
    const clock = { now: jest.fn(() => times.shift() ?? 0) };
    const command = buildCommand('brightness', id, '40');

    expect(clock.now).not.toHaveBeenCalled();
    expect(decode(serializeCommand(command, clock))).toMatchObject({ time: 1000 });
    expect(decode(serializeCommand(command, clock))).toMatchObject({ time: 2000 });
  });

  test('wall-clock times never go backwards between consecutive commands', () => {
    const clock = new NodeTime();
    const first = decode(serializeCommand(switchCommand(id, true), clock));
    const second = decode(serializeCommand(switchCommand(id, false), clock));
    expect(Number.isInteger(first.time)).toBe(true);
    expect(second.time).toBeGreaterThanOrEqual(first.time);
  });

  test('an unusable clock is an environment fault, not a protocol error', () => {
    let caught: unknown;
    try {
      serializeCommand(switchCommand(id, true), { now: () => Number.NaN });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(Error);
    expect(isSengledError(caught)).toBe(false);
    expect(caught).not.toBeInstanceOf(SerializationError);
  });

  test('a command keeps its identifier after the source is discarded', () => {
    let source: DeviceIdentifier | null = DeviceIdentifier.parse('01:02:03:04:05:06');
    const command = switchCommand(source, true);
    source = null;
    expect(source).toBeNull();
    expect(topicFor(command.identifier)).toBe('wifielement/01:02:03:04:05:06/update');
  });
});
