import { DeviceIdentity } from './BleBridgeTypes';

/** Case-insensitive substring match; an empty filter matches every device. */
export function matchesNameFilter(name: string, nameFilter: string): boolean {
  const needle = nameFilter.trim().toLowerCase();
  return needle === '' || name.toLowerCase().includes(needle);
}

export function sortDevicesByName(devices: readonly DeviceIdentity[]): DeviceIdentity[] {
  return [...devices].sort((a, b) => {
    const left = a.name.toLowerCase();
    const right = b.name.toLowerCase();
    if (left < right) return -1;
    if (left > right) return 1;
    return 0;
  });
}

/** Normalize a GATT UUID for comparison (noble reports them lowercase without dashes). */
export function normalizeUuid(uuid: string): string {
  return uuid.replace(/-/g, '').toLowerCase();
}
