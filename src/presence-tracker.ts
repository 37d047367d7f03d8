'use strict';

import type { EventSink } from './event-sink';
import { createLogger, describeError, type Logger } from './logger';
import type { PresenceEventKind, PresenceLog } from './presence-log';
import type { ConnectionMedium, Device } from './types';

export interface TrackedDevice {
  mac: string;
  name: string;
  ip: string;
  medium: ConnectionMedium;
  online: boolean;
  firstSeen: Date;
  /** Last snapshot that contained the device at all. */
  lastSeen: Date;
  lastOnline: Date | null;
}

export interface TrackedDeviceView extends TrackedDevice {
  stale: boolean;
}

export interface PresenceTransition {
  kind: PresenceEventKind;
  device: TrackedDevice;
  at: Date;
  notified: boolean;
}

export interface PresenceSummary {
  online: number;
  total: number;
}

export interface PresenceTrackerOptions {
  notifyPatterns?: string[];
  staleAfterMinutes?: number;
  history?: PresenceLog;
  sink?: EventSink;
  logger?: Logger;
}

/**
 * Online/offline state per hardware address. The first sighting only records
 * state; later snapshots that flip it produce exactly one transition.
 */
export class PresenceTracker {

  private readonly devices = new Map<string, TrackedDevice>();

  private readonly notifyPatterns: string[];

  private readonly staleAfterMs: number;

  private readonly logger: Logger;

  constructor(private readonly options: PresenceTrackerOptions = {}) {
    this.notifyPatterns = (options.notifyPatterns ?? []).map((pattern) => pattern.toLowerCase()).filter(Boolean);
    this.staleAfterMs = (options.staleAfterMinutes ?? 0) * 60000;
    this.logger = options.logger ?? createLogger('presence');
  }

  async ingest(snapshot: Device[], now: Date = new Date()): Promise<PresenceTransition[]> {
    const transitions: PresenceTransition[] = [];

    for (const device of snapshot) {
      const tracked = this.devices.get(device.mac);

      if (!tracked) {
        this.devices.set(device.mac, {
          mac: device.mac,
          name: device.name,
          ip: device.ip,
          medium: device.medium,
          online: device.online,
          firstSeen: now,
          lastSeen: now,
          lastOnline: device.online ? now : null,
        });
        continue;
      }

      if (tracked.name === tracked.mac && device.name !== device.mac) {
        this.logger.log(`Resolved ${tracked.mac} as ${device.name}.`);
        tracked.name = device.name;
      }

      tracked.ip = device.ip || tracked.ip;
      tracked.medium = device.medium;
      tracked.lastSeen = now;
      if (device.online) {
        tracked.lastOnline = now;
      }

      if (tracked.online === device.online) {
        continue;
      }

      tracked.online = device.online;
      transitions.push(await this.record(device.online ? 'arrived' : 'departed', tracked, now));
    }

    return transitions;
  }

  get(mac: string): TrackedDevice | undefined {
    const tracked = this.devices.get(mac);
    return tracked ? { ...tracked } : undefined;
  }

  list(now: Date = new Date()): TrackedDeviceView[] {
    return [...this.devices.values()]
      .map((device) => ({ ...device, stale: this.isStale(device, now) }))
      .sort((a, b) => Number(b.online) - Number(a.online) || a.name.localeCompare(b.name));
  }

  summary(): PresenceSummary {
    let online = 0;
    for (const device of this.devices.values()) {
      if (device.online) {
        online += 1;
      }
    }
    return { online, total: this.devices.size };
  }

  shouldNotify(name: string): boolean {
    const lower = name.toLowerCase();
    return this.notifyPatterns.some((pattern) => lower.includes(pattern));
  }

  private isStale(device: TrackedDevice, now: Date): boolean {
    return this.staleAfterMs > 0 && now.getTime() - device.lastSeen.getTime() > this.staleAfterMs;
  }

  private async record(kind: PresenceEventKind, device: TrackedDevice, at: Date): Promise<PresenceTransition> {
    this.logger.log(`${device.name} (${device.mac}) ${kind} at ${device.ip || 'unknown address'}.`);

    try {
      this.options.history?.append(kind, device.name, device.ip, at);
    } catch (error) {
      this.logger.error('Writing presence history failed:', describeError(error));
    }

    const { sink } = this.options;
    let notified = false;
    if (sink && this.shouldNotify(device.name)) {
      notified = true;
      try {
        await sink.notify(kind, device.name, device.ip);
      } catch (error) {
        this.logger.error(`Notifying ${kind} for ${device.name} failed:`, describeError(error));
      }
    }

    return { kind, device: { ...device }, at, notified };
  }

}
