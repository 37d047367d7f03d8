import { describe, it, expect } from 'vitest';

import { isMacLikeName, looksLikeMac, normalizeMac, safeNormalizeMac } from './mac';

describe('mac helpers', () => {
  it('normalizes any separator style to upper-case colons', () => {
    expect(normalizeMac('aa-bb-cc-dd-ee-ff')).toBe('AA:BB:CC:DD:EE:FF');
    expect(normalizeMac('aabb.ccdd.eeff')).toBe('AA:BB:CC:DD:EE:FF');
  });

  it('rejects addresses of the wrong length', () => {
    expect(() => normalizeMac('aa:bb')).toThrow('MAC address must contain 12 hexadecimal characters, got "aa:bb".');
    expect(safeNormalizeMac('aa:bb')).toBe('');
  });

  it('tells addresses from names', () => {
    expect(looksLikeMac('AA:BB:CC:DD:EE:FF')).toBe(true);
    expect(looksLikeMac('aabbccddeeff')).toBe(true);
    expect(looksLikeMac('living-room')).toBe(false);
  });

  it('treats empty or address-shaped hostnames as unnamed', () => {
    expect(isMacLikeName('', 'AA:BB:CC:DD:EE:FF')).toBe(true);
    expect(isMacLikeName('aa-bb-cc-dd-ee-ff', 'AA:BB:CC:DD:EE:FF')).toBe(true);
    expect(isMacLikeName('desk', 'AA:BB:CC:DD:EE:FF')).toBe(false);
  });
});
