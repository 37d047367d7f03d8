'use strict';

import { z } from 'zod';

import type { AllowlistStore } from './allowlist-store';
import type { StateConflict } from './errors';
import type { EventKind, EventSink } from './event-sink';
import { readJsonFile, writeJsonFile } from './json-file';
import { createLogger, describeError, type Logger } from './logger';
import type { NetworkFilter } from './router/network-filter';
import type { RouterSession } from './router/router-session';
import type { DeviceRef, FailedDevice } from './types';

export type LockdownMode = 'strict' | 'soft';

export interface LockdownState {
  active: boolean;
  mode: LockdownMode | null;
  /** Strict: devices visible at start. Soft: devices this lockdown blocked. */
  blockedDevices: DeviceRef[];
  allowlistedDevices: DeviceRef[];
  failedDevices: FailedDevice[];
  startedAt: string | null;
  stoppedAt: string | null;
}

export interface LockdownResult {
  success: boolean;
  message: string;
  devices: DeviceRef[];
  failures: FailedDevice[];
  conflict?: StateConflict;
}

export interface StartOptions {
  strict?: boolean;
  dryRun?: boolean;
}

export interface LockdownControllerDeps {
  session: RouterSession;
  filter: NetworkFilter;
  allowlist: AllowlistStore;
  stateFile: string;
  sink?: EventSink;
  logger?: Logger;
  clock?: () => Date;
}

const deviceRefSchema = z.object({ mac: z.string(), name: z.string() });

const stateSchema = z.object({
  active: z.boolean().default(false),
  mode: z.enum(['strict', 'soft']).nullable().default(null),
  blockedDevices: z.array(deviceRefSchema).default([]),
  allowlistedDevices: z.array(deviceRefSchema).default([]),
  failedDevices: z.array(deviceRefSchema.extend({ error: z.string() })).default([]),
  startedAt: z.string().nullable().default(null),
  stoppedAt: z.string().nullable().default(null),
});

export const INACTIVE_STATE: LockdownState = {
  active: false,
  mode: null,
  blockedDevices: [],
  allowlistedDevices: [],
  failedDevices: [],
  startedAt: null,
  stoppedAt: null,
};

/**
 * Inactive, strict or soft. Strict hands enforcement to the router's
 * allowlist mode; soft blocks the devices visible right now, one by one,
 * and lets anything new connect.
 */
export class LockdownController {

  private readonly logger: Logger;

  private readonly clock: () => Date;

  constructor(private readonly deps: LockdownControllerDeps) {
    this.logger = deps.logger ?? createLogger('lockdown');
    this.clock = deps.clock ?? (() => new Date());
  }

  status(): LockdownState {
    const read = readJsonFile(this.deps.stateFile, stateSchema);

    if (read.status === 'invalid') {
      this.logger.error(`Lockdown state is unreadable, treating lockdown as inactive: ${read.reason}`);
    }

    return read.status === 'ok' ? read.value : { ...INACTIVE_STATE };
  }

  /** Visible devices that lockdown would cut off. Read-only. */
  async preview(): Promise<DeviceRef[]> {
    const devices = await this.deps.session.getDevices();

    return devices
      .filter((device) => !this.deps.allowlist.isAllowed(device.mac))
      .map((device) => ({ mac: device.mac, name: device.name }));
  }

  async start(options: StartOptions = {}): Promise<LockdownResult> {
    const strict = options.strict ?? true;
    const current = this.status();

    if (current.active) {
      return {
        success: false,
        message: 'Lockdown already active.',
        devices: current.blockedDevices,
        failures: [],
        conflict: 'already-active',
      };
    }

    this.deps.allowlist.load();
    const toBlock = await this.preview();

    if (options.dryRun) {
      const label = strict ? 'STRICT (blocks all unknown devices)' : 'SOFT (blocks visible devices only)';
      return {
        success: true,
        message: `[${label}] Would block ${toBlock.length} device(s).`,
        devices: toBlock,
        failures: [],
      };
    }

    return strict ? this.startStrict(toBlock) : this.startSoft(toBlock);
  }

  async stop(): Promise<LockdownResult> {
    const current = this.status();

    if (!current.active) {
      return {
        success: false,
        message: 'Lockdown is not active.',
        devices: [],
        failures: [],
        conflict: 'not-active',
      };
    }

    return current.mode === 'strict' ? this.stopStrict(current) : this.stopSoft(current);
  }

  private async startStrict(toBlock: DeviceRef[]): Promise<LockdownResult> {
    const allowlisted = this.deps.allowlist.list();

    try {
      await this.deps.filter.enableAllowlistMode(allowlisted);
    } catch (error) {
      this.logger.error('Strict lockdown failed:', describeError(error));
      return { success: false, message: `Router error: ${describeError(error)}`, devices: [], failures: [] };
    }

    this.save({
      active: true,
      mode: 'strict',
      blockedDevices: toBlock,
      allowlistedDevices: allowlisted.map(({ mac, name }) => ({ mac, name })),
      failedDevices: [],
      startedAt: this.clock().toISOString(),
      stoppedAt: null,
    });

    const message = `Strict lockdown active: only ${allowlisted.length} device(s) allowed, ${toBlock.length} blocked plus any new device.`;
    await this.announce('lockdown-started', message);
    return { success: true, message, devices: toBlock, failures: [] };
  }

  private async startSoft(toBlock: DeviceRef[]): Promise<LockdownResult> {
    if (!toBlock.length) {
      return { success: true, message: 'No devices to block, all are allowlisted.', devices: [], failures: [] };
    }

    const blocked: DeviceRef[] = [];
    const alreadyBlocked: DeviceRef[] = [];
    const failed: FailedDevice[] = [];

    for (const device of toBlock) {
      try {
        const outcome = await this.deps.filter.blockDevice(device.mac, device.name);
        (outcome === 'blocked' ? blocked : alreadyBlocked).push(device);
      } catch (error) {
        this.logger.error(`Blocking ${device.name} (${device.mac}) failed:`, describeError(error));
        failed.push({ ...device, error: describeError(error) });
      }
    }

    // Rows that were blocked before lockdown are not recorded, so stop leaves them alone.
    this.save({
      active: true,
      mode: 'soft',
      blockedDevices: blocked,
      allowlistedDevices: [],
      failedDevices: failed,
      startedAt: this.clock().toISOString(),
      stoppedAt: null,
    });

    let message = `Soft lockdown active: blocked ${blocked.length} device(s)`;
    if (alreadyBlocked.length) {
      message += `, ${alreadyBlocked.length} already blocked`;
    }
    if (failed.length) {
      message += ` (${failed.length} failed)`;
    }
    message += '. New devices can still connect.';

    await this.announce('lockdown-started', message);
    return { success: true, message, devices: blocked, failures: failed };
  }

  private async stopStrict(current: LockdownState): Promise<LockdownResult> {
    try {
      await this.deps.filter.restoreAllowAll();
    } catch (error) {
      this.logger.error('Restoring allow-all failed, lockdown stays active:', describeError(error));
      return { success: false, message: `Router error: ${describeError(error)}`, devices: [], failures: [] };
    }

    this.saveInactive(current);

    const message = 'Lockdown ended: all devices can connect again.';
    await this.announce('lockdown-stopped', message);
    return { success: true, message, devices: current.blockedDevices, failures: [] };
  }

  private async stopSoft(current: LockdownState): Promise<LockdownResult> {
    const unblocked: DeviceRef[] = [];
    const failed: FailedDevice[] = [];

    for (const device of current.blockedDevices) {
      try {
        // 'not-blocked' means someone already let it back in.
        await this.deps.filter.unblockDevice(device.mac);
        unblocked.push(device);
      } catch (error) {
        this.logger.error(`Unblocking ${device.name} (${device.mac}) failed:`, describeError(error));
        failed.push({ ...device, error: describeError(error) });
      }
    }

    this.saveInactive(current);

    let message = `Lockdown ended: unblocked ${unblocked.length} device(s)`;
    if (failed.length) {
      message += ` (${failed.length} failed)`;
    }
    message += '.';

    await this.announce('lockdown-stopped', message);
    return { success: true, message, devices: unblocked, failures: failed };
  }

  private saveInactive(previous: LockdownState) {
    this.save({ ...INACTIVE_STATE, startedAt: previous.startedAt, stoppedAt: this.clock().toISOString() });
  }

  private save(state: LockdownState) {
    writeJsonFile(this.deps.stateFile, state);
    this.logger.log(state.active ? `Lockdown state saved (${state.mode}).` : 'Lockdown state cleared.');
  }

  private async announce(kind: EventKind, message: string) {
    if (!this.deps.sink) {
      return;
    }

    try {
      await this.deps.sink.notify(kind, message, '');
    } catch (error) {
      this.logger.error(`Notifying ${kind} failed:`, describeError(error));
    }
  }

}
