import { parseColor, parseCommandLine, UsageError } from '../../src/runtime/commandLine';

describe('parseCommandLine', () => {
  test('defaults to list', () => {
    expect(parseCommandLine([])).toEqual({ name: 'list' });
    expect(parseCommandLine(['list'])).toEqual({ name: 'list' });
  });

  test('parses device commands', () => {
    expect(parseCommandLine(['on', 'Desk Lamp'])).toEqual({ name: 'on', device: 'Desk Lamp' });
    expect(parseCommandLine(['off', 'desk'])).toEqual({ name: 'off', device: 'desk' });
    expect(parseCommandLine(['cycle', 'desk'])).toEqual({ name: 'cycle', device: 'desk' });
    expect(parseCommandLine(['brightness', 'desk', '128'])).toEqual({
      name: 'brightness',
      device: 'desk',
      level: 128,
    });
    expect(parseCommandLine(['color', 'desk', '255,0,0'])).toEqual({
      name: 'color',
      device: 'desk',
      color: [255, 0, 0],
    });
  });

  test('help', () => {
    expect(parseCommandLine(['help'])).toEqual({ name: 'help' });
    expect(parseCommandLine(['-h'])).toEqual({ name: 'help' });
  });

  test.each([
    [['on']],
    [['brightness', 'desk']],
    [['brightness', 'desk', '256']],
    [['brightness', 'desk', '-1']],
    [['brightness', 'desk', '12.5']],
    [['color', 'desk']],
    [['color', 'desk', '1,2']],
  ])('rejects %p', (args) => {
    expect(() => parseCommandLine(args)).toThrow(UsageError);
  });

  test('unknown commands are named in the error', () => {
    expect(() => parseCommandLine(['dance'])).toThrow('Unknown command "dance"');
  });
});

describe('parseColor', () => {
  test('accepts commas or colons', () => {
    expect(parseColor('10:20:30')).toEqual([10, 20, 30]);
    expect(parseColor('0, 255, 0')).toEqual([0, 255, 0]);
  });

  test('names the bad channel', () => {
    expect(() => parseColor('0,0,999')).toThrow('Blue must be an integer between 0 and 255, got "999"');
  });
});
