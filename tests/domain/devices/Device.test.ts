import { createDevice, findDevice } from '../../../src/domain/devices/Device';
import { DeviceIdentifier } from '../../../src/domain/devices/DeviceIdentifier';

describe('Device', () => {
  const desk = createDevice('Desk Lamp', DeviceIdentifier.parse('B0:CE:18:00:00:01'));
  const hall = createDevice('Hall', DeviceIdentifier.parse('B0:CE:18:00:00:02'));
  const devices = [desk, hall];

  test('createDevice returns a frozen value', () => {
    expect(Object.isFrozen(desk)).toBe(true);
    expect(desk.name).toBe('Desk Lamp');
    expect(desk.identifier.format()).toBe('B0:CE:18:00:00:01');
  });

  test('findDevice prefers an exact name match', () => {
    const lowerDuplicate = createDevice('desk lamp', DeviceIdentifier.parse('B0:CE:18:00:00:03'));
    expect(findDevice([lowerDuplicate, desk], 'Desk Lamp')).toBe(desk);
  });

  test('findDevice falls back to case-insensitive names and identifiers', () => {
    expect(findDevice(devices, '  hall ')).toBe(hall);
    expect(findDevice(devices, 'b0:ce:18:00:00:01')).toBe(desk);
  });

  test('findDevice returns undefined for unknown or blank queries', () => {
    expect(findDevice(devices, 'Garage')).toBeUndefined();
    expect(findDevice(devices, '   ')).toBeUndefined();
  });
});
