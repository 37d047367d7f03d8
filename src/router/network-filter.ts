'use strict';

import { ProtocolError } from '../errors';
import { createLogger, type Logger } from '../logger';
import { normalizeMac } from '../mac';
import type { AllowlistEntry, Device, MacFilterEntry, SiteFilterEntry } from '../types';
import type { RouterSession } from './router-session';

export type BlockOutcome = 'blocked' | 'already-blocked';

export type UnblockOutcome = 'unblocked' | 'not-blocked';

export interface NetworkFilterOptions {
  logger?: Logger;
}

/** Single-entry filter changes on top of the shared router session. */
export class NetworkFilter {

  private readonly logger: Logger;

  constructor(private readonly session: RouterSession, options: NetworkFilterOptions = {}) {
    this.logger = options.logger ?? createLogger('filter');
  }

  async listBlockedDevices(): Promise<MacFilterEntry[]> {
    const table = await this.session.readMacFilterTable();
    return table.entries.filter((entry) => entry.action === 'Block');
  }

  /**
   * Appends a Block row. An existing Allow row for the same address is
   * flipped in place instead, since the router keeps one row per address.
   */
  async blockDevice(mac: string, name: string): Promise<BlockOutcome> {
    const address = normalizeMac(mac);
    const table = await this.session.readMacFilterTable();
    const existing = table.entries.find((entry) => entry.mac === address);

    if (existing?.action === 'Block') {
      return 'already-blocked';
    }

    if (existing) {
      const entries = table.entries.map((entry) => (entry === existing
        ? { ...blockEntry(address, name), id: entry.id, wireFields: entry.wireFields }
        : entry));
      await this.session.writeMacFilterTable(entries, { allowAll: table.allowAll, enabled: true });
    } else {
      await this.session.appendMacFilterEntry(blockEntry(address, name));
    }

    this.logger.log(`Blocked ${name} (${address}).`);
    return 'blocked';
  }

  async unblockDevice(mac: string): Promise<UnblockOutcome> {
    const address = normalizeMac(mac);
    const table = await this.session.readMacFilterTable();
    const remaining = table.entries.filter((entry) => !(entry.mac === address && entry.action === 'Block'));

    if (remaining.length === table.entries.length) {
      return 'not-blocked';
    }

    await this.confirmWrite(
      `Unblocking ${address}`,
      () => this.session.writeMacFilterTable(remaining, {
        allowAll: table.allowAll,
        enabled: remaining.length > 0 || !table.allowAll,
      }),
      async () => !(await this.listBlockedDevices()).some((entry) => entry.mac === address),
    );

    this.logger.log(`Unblocked ${address}.`);
    return 'unblocked';
  }

  /** Host-table lookup by hostname, exact match first, then substring. */
  async findDevice(name: string): Promise<Device | null> {
    const wanted = name.trim().toLowerCase();
    if (!wanted) {
      return null;
    }

    const devices = await this.session.getDevices();
    const named = devices.filter((device) => device.hostname);

    return named.find((device) => device.hostname.toLowerCase() === wanted)
      ?? named.find((device) => device.hostname.toLowerCase().includes(wanted))
      ?? devices.find((device) => device.mac === wanted.toUpperCase())
      ?? null;
  }

  async findDeviceMac(name: string): Promise<string | null> {
    const device = await this.findDevice(name);
    return device ? device.mac : null;
  }

  async listBlockedSites(): Promise<string[]> {
    const table = await this.session.readSiteFilterTable();
    return table.entries.map((entry) => entry.site);
  }

  async blockSite(site: string): Promise<BlockOutcome> {
    const wanted = normalizeSite(site);
    const table = await this.session.readSiteFilterTable();

    if (table.entries.some((entry) => entry.site.toLowerCase() === wanted)) {
      return 'already-blocked';
    }

    await this.session.appendSiteFilterEntry({ id: null, site: wanted, blockMethod: 'URL', alwaysBlock: true });
    this.logger.log(`Blocked site ${wanted}.`);
    return 'blocked';
  }

  async unblockSite(site: string): Promise<UnblockOutcome> {
    const wanted = normalizeSite(site);
    const table = await this.session.readSiteFilterTable();
    const remaining: SiteFilterEntry[] = table.entries.filter((entry) => entry.site.toLowerCase() !== wanted);

    if (remaining.length === table.entries.length) {
      return 'not-blocked';
    }

    await this.confirmWrite(
      `Unblocking site ${wanted}`,
      () => this.session.writeSiteFilterTable(remaining, { trusted: table.trusted }),
      async () => !(await this.listBlockedSites()).some((blocked) => blocked.toLowerCase() === wanted),
    );
    this.logger.log(`Unblocked site ${wanted}.`);
    return 'unblocked';
  }

  /** Only the given devices may connect; everyone else is refused. */
  async enableAllowlistMode(entries: AllowlistEntry[]) {
    await this.session.writeMacFilterTable(entries.map(allowEntry), { allowAll: false, enabled: true });
  }

  async restoreAllowAll() {
    await this.confirmWrite(
      'Restoring allow-all',
      () => this.session.writeMacFilterTable([], { allowAll: true, enabled: false }),
      async () => (await this.session.readMacFilterTable()).allowAll,
    );
  }

  /**
   * The router answers some deletions with an error even though it applied
   * them. A rejected write counts as done when a fresh read shows the change.
   */
  private async confirmWrite(label: string, write: () => Promise<void>, applied: () => Promise<boolean>) {
    try {
      await write();
    } catch (error) {
      if (!(error instanceof ProtocolError) || !(await applied())) {
        throw error;
      }

      this.logger.log(`${label} was applied despite the error: ${error.message}`);
    }
  }

}

export function blockEntry(mac: string, name: string): MacFilterEntry {
  return {
    id: null,
    mac,
    description: name,
    action: 'Block',
    alwaysBlock: true,
    startTime: '',
    endTime: '',
    blockDays: '',
  };
}

export function allowEntry(entry: AllowlistEntry): MacFilterEntry {
  return {
    id: null,
    mac: entry.mac,
    description: entry.name,
    action: 'Allow',
    alwaysBlock: false,
    startTime: '',
    endTime: '',
    blockDays: '',
  };
}

function normalizeSite(site: string): string {
  const wanted = site.trim().toLowerCase();
  if (!wanted) {
    throw new Error('Site must not be empty.');
  }
  return wanted;
}
