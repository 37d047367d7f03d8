'use strict';

export function normalizeMac(input: string): string {
  const cleaned = String(input || '').replace(/[^a-fA-F0-9]/g, '').toUpperCase();

  if (cleaned.length !== 12) {
    throw new Error(`MAC address must contain 12 hexadecimal characters, got "${input}".`);
  }

  const octets = cleaned.match(/.{2}/g) ?? [];
  return octets.join(':');
}

export function safeNormalizeMac(input: string): string {
  try {
    return normalizeMac(input);
  } catch (error) {
    return '';
  }
}

export function looksLikeMac(input: string): boolean {
  return /^[0-9a-fA-F]{2}([:-]?[0-9a-fA-F]{2}){5}$/.test(input.trim());
}

/** True when a hostname is just the address again, with or without separators. */
export function isMacLikeName(name: string, mac: string): boolean {
  const bare = (value: string) => value.replace(/[^a-fA-F0-9]/g, '').toLowerCase();
  const candidate = name.trim();

  if (!candidate) {
    return true;
  }

  return candidate.toLowerCase() === mac.toLowerCase() || (looksLikeMac(candidate) && bare(candidate) === bare(mac));
}
