'use strict';

import * as os from 'os';
import { z } from 'zod';

import { readJsonFile, writeJsonFile } from './json-file';
import { createLogger, type Logger } from './logger';
import { normalizeMac, safeNormalizeMac } from './mac';
import type { AllowlistEntry } from './types';

export type AddOutcome = 'added' | 'present' | 'unreadable';

export type RemoveOutcome = 'removed' | 'absent' | 'protected' | 'unreadable';

export type MacDetector = () => string | null;

const OWN_DEVICE_NAME = 'This controller';
const OWN_DEVICE_REASON = 'Control device - never block';

const allowlistFileSchema = z.object({
  devices: z.array(z.object({
    name: z.string(),
    mac: z.string(),
    reason: z.string().default(''),
  })).default([]),
});

export interface AllowlistStoreOptions {
  infrastructure?: AllowlistEntry[];
  detectMac?: MacDetector;
  logger?: Logger;
}

/**
 * Devices that lockdown never blocks, kept in `{ devices: [...] }` JSON.
 * Every mutation re-reads the file first so edits made by hand survive.
 * While the file cannot be parsed it is left untouched and mutations are refused.
 */
export class AllowlistStore {

  private readonly infrastructure: AllowlistEntry[];

  private readonly detectMac: MacDetector;

  private readonly logger: Logger;

  private ownMac: string | null | undefined;

  private devices: AllowlistEntry[] = [];

  private unreadable = false;

  constructor(private readonly filePath: string, options: AllowlistStoreOptions = {}) {
    this.infrastructure = options.infrastructure ?? [];
    this.detectMac = options.detectMac ?? detectOwnMac;
    this.logger = options.logger ?? createLogger('allowlist');
  }

  load(): AllowlistEntry[] {
    const read = readJsonFile(this.filePath, allowlistFileSchema);
    this.unreadable = read.status === 'invalid';

    if (read.status === 'ok') {
      this.devices = dedupe(read.value.devices
        .map((device) => ({ ...device, mac: safeNormalizeMac(device.mac) }))
        .filter((device) => Boolean(device.mac)));
      return this.list();
    }

    this.devices = this.defaults();

    if (read.status === 'missing') {
      this.save();
      this.logger.log(`Created allowlist with ${this.devices.length} default device(s) at ${this.filePath}.`);
    } else {
      this.logger.error(`Allowlist is unreadable, using defaults until it is fixed: ${read.reason}`);
    }

    return this.list();
  }

  /** True when the last load found a file it could not parse. */
  get isUnreadable(): boolean {
    return this.unreadable;
  }

  list(): AllowlistEntry[] {
    return this.devices.map((device) => ({ ...device }));
  }

  isAllowed(mac: string): boolean {
    const address = safeNormalizeMac(mac);
    return Boolean(address) && this.load().some((device) => device.mac === address);
  }

  /** Own address and configured infrastructure; `remove` refuses these. */
  isProtected(mac: string): boolean {
    const address = safeNormalizeMac(mac);
    return Boolean(address) && this.defaults().some((device) => device.mac === address);
  }

  add(name: string, mac: string, reason = 'User added'): AddOutcome {
    const address = normalizeMac(mac);
    this.load();

    if (this.unreadable) {
      this.logger.error(`Not adding ${address}: the allowlist file is unreadable.`);
      return 'unreadable';
    }

    if (this.devices.some((device) => device.mac === address)) {
      return 'present';
    }

    this.devices.push({ name: name.trim() || address, mac: address, reason });
    this.save();
    this.logger.log(`Added ${name} (${address}) to the allowlist.`);
    return 'added';
  }

  remove(mac: string): RemoveOutcome {
    const address = normalizeMac(mac);
    this.load();

    if (this.unreadable) {
      this.logger.error(`Not removing ${address}: the allowlist file is unreadable.`);
      return 'unreadable';
    }

    if (this.isProtected(address)) {
      return 'protected';
    }

    const remaining = this.devices.filter((device) => device.mac !== address);
    if (remaining.length === this.devices.length) {
      return 'absent';
    }

    this.devices = remaining;
    this.save();
    this.logger.log(`Removed ${address} from the allowlist.`);
    return 'removed';
  }

  private defaults(): AllowlistEntry[] {
    if (this.ownMac === undefined) {
      this.ownMac = safeNormalizeMac(this.detectMac() ?? '') || null;
    }

    const devices: AllowlistEntry[] = [];
    if (this.ownMac) {
      devices.push({ name: OWN_DEVICE_NAME, mac: this.ownMac, reason: OWN_DEVICE_REASON });
    }

    return dedupe([...devices, ...this.infrastructure]);
  }

  private save() {
    writeJsonFile(this.filePath, { devices: this.devices });
  }

}

/** First external interface with a real hardware address. */
export function detectOwnMac(interfaces: NodeJS.Dict<os.NetworkInterfaceInfo[]> = os.networkInterfaces()): string | null {
  for (const addresses of Object.values(interfaces)) {
    for (const address of addresses ?? []) {
      if (!address.internal && address.mac && address.mac !== '00:00:00:00:00:00') {
        return address.mac.toUpperCase();
      }
    }
  }

  return null;
}

function dedupe(devices: AllowlistEntry[]): AllowlistEntry[] {
  const seen = new Set<string>();
  return devices.filter((device) => {
    if (seen.has(device.mac)) {
      return false;
    }
    seen.add(device.mac);
    return true;
  });
}
