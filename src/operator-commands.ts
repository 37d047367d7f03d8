'use strict';

import type { AllowlistStore } from './allowlist-store';
import type { LockdownController, LockdownResult } from './lockdown-controller';
import { createLogger, describeError, type Logger } from './logger';
import { looksLikeMac, normalizeMac } from './mac';
import { formatDate, type PresenceLog } from './presence-log';
import type { PresenceTracker } from './presence-tracker';
import type { NetworkFilter } from './router/network-filter';
import type { RouterSession } from './router/router-session';
import type { AllowlistEntry } from './types';

export interface CommandDevice {
  mac: string;
  name: string;
  /** Short extra column such as "online", an address or a reason. */
  detail?: string;
}

export interface CommandResult {
  success: boolean;
  message: string;
  devices: CommandDevice[];
}

export interface OperatorCommandsDeps {
  session: RouterSession;
  filter: NetworkFilter;
  allowlist: AllowlistStore;
  lockdown: LockdownController;
  tracker?: PresenceTracker;
  history?: PresenceLog;
  /** Access points switched by `wifi on|off`. */
  infrastructure?: AllowlistEntry[];
  logger?: Logger;
  clock?: () => Date;
}

const UNREADABLE_ALLOWLIST = 'The allowlist file is unreadable; fix it before changing the allowlist.';

export const COMMAND_HELP: ReadonlyArray<[string, string]> = [
  ['status', 'Lockdown state and who is online'],
  ['devices', 'Every device the router knows'],
  ['stats', 'Presence history totals'],
  ['today', 'Arrivals and departures today'],
  ['week', 'Daily totals for the last seven days'],
  ['block <site>', 'Block a website'],
  ['unblock <site>', 'Unblock a website'],
  ['blocklist', 'Blocked websites'],
  ['kick <device>', 'Block a device by name'],
  ['allow <device>', 'Let a kicked device back in'],
  ['banned', 'Blocked devices'],
  ['wifi on|off', 'Cut or restore internet for the access points'],
  ['lockdown on|soft|off|preview|status', 'Start, stop or inspect lockdown'],
  ['allowlist [add <name> <mac>|remove <mac>]', 'Devices lockdown never blocks'],
];

/**
 * Everything an operator can ask for, independent of where the request came
 * from. Failures come back as `success: false`, never as exceptions.
 */
export class OperatorCommands {

  private readonly logger: Logger;

  private readonly clock: () => Date;

  constructor(private readonly deps: OperatorCommandsDeps) {
    this.logger = deps.logger ?? createLogger('commands');
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Dispatches a parsed command line such as `kick living room tv`. */
  async execute(command: string, args: string[]): Promise<CommandResult> {
    const name = command.replace(/^\//, '').toLowerCase();
    const rest = args.join(' ').trim();
    this.logger.log(`Command: ${name}${rest ? ` ${rest}` : ''}`);

    switch (name) {
      case 'status':
        return this.status();
      case 'devices':
        return this.devices();
      case 'stats':
        return this.stats();
      case 'today':
        return this.today();
      case 'week':
        return this.week();
      case 'block':
        return rest ? this.blockSite(rest) : usage('block <site>');
      case 'unblock':
        return rest ? this.unblockSite(rest) : usage('unblock <site>');
      case 'blocklist':
        return this.blocklist();
      case 'kick':
        return rest ? this.kick(rest) : usage('kick <device>');
      case 'allow':
        return rest ? this.allow(rest) : usage('allow <device>');
      case 'banned':
        return this.banned();
      case 'wifi': {
        const action = rest.toLowerCase();
        return action === 'on' || action === 'off' ? this.wifi(action) : usage('wifi on|off');
      }
      case 'lockdown':
        return this.lockdown(args);
      case 'allowlist':
        return this.allowlist(args);
      case 'help':
      case 'start':
        return this.help();
      default:
        return { success: false, message: `Unknown command "${name}". Try help.`, devices: [] };
    }
  }

  help(): CommandResult {
    const lines = COMMAND_HELP.map(([usageText, description]) => `${usageText} - ${description}`);
    return { success: true, message: lines.join('\n'), devices: [] };
  }

  async status(): Promise<CommandResult> {
    const state = this.deps.lockdown.status();
    const lines: string[] = [];

    if (state.active) {
      lines.push(`Lockdown ACTIVE (${state.mode ?? 'unknown'} mode) since ${state.startedAt ?? 'unknown'}.`);
    } else {
      lines.push('Lockdown is not active.');
    }

    const tracker = this.deps.tracker;
    if (tracker) {
      const summary = tracker.summary();
      lines.push(`${summary.online}/${summary.total} devices online.`);
    }

    const failure = this.deps.session.lastFailure;
    if (failure) {
      lines.push(`Last router error: ${failure.message}`);
    }

    const online = tracker
      ? tracker.list(this.clock()).filter((device) => device.online).map((device) => ({ mac: device.mac, name: device.name, detail: device.ip }))
      : [];

    return { success: true, message: lines.join('\n'), devices: state.active ? state.blockedDevices : online };
  }

  async devices(): Promise<CommandResult> {
    return this.guard('List devices', async () => {
      const devices = await this.deps.session.getDevices();
      if (!devices.length) {
        const failure = this.deps.session.lastFailure;
        return {
          success: !failure,
          message: failure ? `Could not read devices: ${failure.message}` : 'The router reports no devices.',
          devices: [],
        };
      }

      const online = devices.filter((device) => device.online).length;
      return {
        success: true,
        message: `${devices.length} device(s), ${online} online.`,
        devices: devices.map((device) => ({
          mac: device.mac,
          name: device.name,
          detail: device.online ? `online ${device.ip}` : 'offline',
        })),
      };
    });
  }

  async preview(strict = true): Promise<CommandResult> {
    return this.guard('Preview lockdown', async () => toCommandResult(await this.deps.lockdown.start({ strict, dryRun: true })));
  }

  async lockdownStart(strict: boolean): Promise<CommandResult> {
    return this.guard('Start lockdown', async () => toCommandResult(await this.deps.lockdown.start({ strict })));
  }

  async lockdownStop(): Promise<CommandResult> {
    return this.guard('Stop lockdown', async () => toCommandResult(await this.deps.lockdown.stop()));
  }

  allowlistList(): CommandResult {
    const devices = this.deps.allowlist.load();
    return {
      success: true,
      message: `${devices.length} allowlisted device(s).`,
      devices: devices.map((device) => ({ mac: device.mac, name: device.name, detail: device.reason })),
    };
  }

  allowlistAdd(name: string, mac: string, reason?: string): CommandResult {
    if (!looksLikeMac(mac)) {
      return { success: false, message: `"${mac}" is not a MAC address.`, devices: [] };
    }

    const address = normalizeMac(mac);
    const outcome = this.deps.allowlist.add(name, address, reason);
    const messages = {
      added: `Added ${name} (${address}) to the allowlist.`,
      present: `${address} is already allowlisted.`,
      unreadable: UNREADABLE_ALLOWLIST,
    };

    return { success: outcome === 'added', message: messages[outcome], devices: [{ mac: address, name }] };
  }

  allowlistRemove(mac: string): CommandResult {
    if (!looksLikeMac(mac)) {
      return { success: false, message: `"${mac}" is not a MAC address.`, devices: [] };
    }

    const address = normalizeMac(mac);
    const outcome = this.deps.allowlist.remove(address);
    const messages = {
      removed: `Removed ${address} from the allowlist.`,
      absent: `${address} is not allowlisted.`,
      protected: `${address} is protected and cannot be removed.`,
      unreadable: UNREADABLE_ALLOWLIST,
    };

    return { success: outcome === 'removed', message: messages[outcome], devices: [] };
  }

  async kick(target: string): Promise<CommandResult> {
    return this.guard('Kick', async () => {
      const device = await this.resolveDevice(target);
      if (!device) {
        return { success: false, message: `Device "${target}" not found.`, devices: [] };
      }

      if (this.deps.allowlist.isAllowed(device.mac)) {
        return { success: false, message: `${device.name} (${device.mac}) is allowlisted and cannot be kicked.`, devices: [device] };
      }

      const outcome = await this.deps.filter.blockDevice(device.mac, device.name);
      return {
        success: true,
        message: outcome === 'blocked'
          ? `Kicked ${device.name} (${device.mac}).`
          : `${device.name} (${device.mac}) is already blocked.`,
        devices: [device],
      };
    });
  }

  async allow(target: string): Promise<CommandResult> {
    return this.guard('Allow', async () => {
      let device = await this.resolveDevice(target);

      if (!device) {
        // Kicked devices often drop out of the host table; fall back to the filter descriptions.
        const wanted = target.toLowerCase();
        const blocked = await this.deps.filter.listBlockedDevices();
        const entry = blocked.find((candidate) => candidate.description.toLowerCase().includes(wanted));
        device = entry ? { mac: entry.mac, name: entry.description || entry.mac } : null;
      }

      if (!device) {
        return { success: false, message: `Device "${target}" not found.`, devices: [] };
      }

      const outcome = await this.deps.filter.unblockDevice(device.mac);
      return {
        success: true,
        message: outcome === 'unblocked'
          ? `Allowed ${device.name} (${device.mac}) back in.`
          : `${device.name} (${device.mac}) was not blocked.`,
        devices: [device],
      };
    });
  }

  async banned(): Promise<CommandResult> {
    return this.guard('List banned devices', async () => {
      const blocked = await this.deps.filter.listBlockedDevices();
      return {
        success: true,
        message: blocked.length ? `${blocked.length} banned device(s).` : 'No devices are currently banned.',
        devices: blocked.map((entry) => ({ mac: entry.mac, name: entry.description || entry.mac })),
      };
    });
  }

  /**
   * Blocks or unblocks every configured access point. The allowlist is not
   * consulted: access points are allowlisted by default.
   */
  async wifi(action: 'on' | 'off'): Promise<CommandResult> {
    const accessPoints = this.deps.infrastructure ?? [];
    if (!accessPoints.length) {
      return { success: false, message: 'No access points are configured.', devices: [] };
    }

    const devices: CommandDevice[] = [];
    let failed = 0;

    for (const accessPoint of accessPoints) {
      try {
        const detail = action === 'off'
          ? (await this.deps.filter.blockDevice(accessPoint.mac, accessPoint.name)) === 'blocked' ? 'blocked' : 'already blocked'
          : (await this.deps.filter.unblockDevice(accessPoint.mac)) === 'unblocked' ? 'unblocked' : 'not blocked';
        devices.push({ mac: accessPoint.mac, name: accessPoint.name, detail });
      } catch (error) {
        failed += 1;
        this.logger.error(`WiFi ${action} failed for ${accessPoint.name}:`, describeError(error));
        devices.push({ mac: accessPoint.mac, name: accessPoint.name, detail: `failed: ${describeError(error)}` });
      }
    }

    if (failed) {
      return { success: false, message: `WiFi ${action} failed for ${failed} of ${accessPoints.length} access point(s).`, devices };
    }

    return {
      success: true,
      message: action === 'off' ? 'WiFi is now OFF: access points stay up without internet.' : 'WiFi is now ON.',
      devices,
    };
  }

  async blockSite(site: string): Promise<CommandResult> {
    return this.guard('Block site', async () => {
      const outcome = await this.deps.filter.blockSite(site);
      const label = site.trim().toLowerCase();
      return {
        success: true,
        message: outcome === 'blocked' ? `Blocked ${label}.` : `${label} is already blocked.`,
        devices: [],
      };
    });
  }

  async unblockSite(site: string): Promise<CommandResult> {
    return this.guard('Unblock site', async () => {
      const outcome = await this.deps.filter.unblockSite(site);
      const label = site.trim().toLowerCase();
      return {
        success: true,
        message: outcome === 'unblocked' ? `Unblocked ${label}.` : `${label} was not blocked.`,
        devices: [],
      };
    });
  }

  async blocklist(): Promise<CommandResult> {
    return this.guard('List blocked sites', async () => {
      const sites = await this.deps.filter.listBlockedSites();
      return {
        success: true,
        message: sites.length ? `Blocked sites (${sites.length}):\n${sites.join('\n')}` : 'No sites are currently blocked.',
        devices: [],
      };
    });
  }

  stats(): CommandResult {
    const history = this.deps.history;
    if (!history) {
      return { success: false, message: 'Presence history is not available.', devices: [] };
    }

    const stats = history.stats();
    if (!stats.totalEvents) {
      return { success: true, message: 'No presence data yet.', devices: [] };
    }

    return {
      success: true,
      message: [
        `Total events: ${stats.totalEvents}`,
        `Arrivals: ${stats.arrivals}`,
        `Departures: ${stats.departures}`,
        `Days tracked: ${stats.daysTracked}`,
        `Unique devices: ${stats.uniqueDevices}`,
      ].join('\n'),
      devices: [],
    };
  }

  today(): CommandResult {
    const history = this.deps.history;
    if (!history) {
      return { success: false, message: 'Presence history is not available.', devices: [] };
    }

    const day = formatDate(this.clock());
    const events = history.eventsOn(day);
    if (!events.length) {
      return { success: true, message: `No activity recorded today (${day}).`, devices: [] };
    }

    const lines = events.slice(-15).map((event) => `${event.time} ${event.event} ${event.deviceName}`);
    if (events.length > 15) {
      lines.push(`... and ${events.length - 15} earlier event(s)`);
    }

    return { success: true, message: [`Today (${day}):`, ...lines].join('\n'), devices: [] };
  }

  week(): CommandResult {
    const history = this.deps.history;
    if (!history) {
      return { success: false, message: 'Presence history is not available.', devices: [] };
    }

    const now = this.clock();
    const since = new Date(now.getFullYear(), now.getMonth(), now.getDate() - 6);
    const days = new Map<string, { weekday: string; arrivals: number; departures: number }>();

    for (const event of history.eventsSince(since)) {
      const day = days.get(event.date) ?? { weekday: event.weekday, arrivals: 0, departures: 0 };
      if (event.event === 'arrived') {
        day.arrivals += 1;
      } else if (event.event === 'departed') {
        day.departures += 1;
      }
      days.set(event.date, day);
    }

    if (!days.size) {
      return { success: true, message: 'No data for this week yet.', devices: [] };
    }

    const lines = [...days.entries()]
      .sort(([a], [b]) => b.localeCompare(a))
      .map(([date, day]) => `${day.weekday.slice(0, 3)} ${date}: ${day.arrivals} arrived, ${day.departures} departed`);

    return { success: true, message: ['Last 7 days:', ...lines].join('\n'), devices: [] };
  }

  private async lockdown(args: string[]): Promise<CommandResult> {
    const action = (args[0] ?? 'status').toLowerCase();

    switch (action) {
      case 'on':
      case 'start':
      case 'strict':
        return this.lockdownStart(true);
      case 'soft':
        return this.lockdownStart(false);
      case 'off':
      case 'stop':
        return this.lockdownStop();
      case 'preview':
        return this.preview((args[1] ?? '').toLowerCase() !== 'soft');
      case 'status':
        return this.status();
      default:
        return usage('lockdown on|soft|off|preview|status');
    }
  }

  private allowlist(args: string[]): CommandResult {
    const [action = 'list', ...rest] = args;

    switch (action.toLowerCase()) {
      case 'list':
        return this.allowlistList();
      case 'add': {
        const mac = rest[rest.length - 1] ?? '';
        const name = rest.slice(0, -1).join(' ');
        return name && mac ? this.allowlistAdd(name, mac) : usage('allowlist add <name> <mac>');
      }
      case 'remove':
        return rest[0] ? this.allowlistRemove(rest[0]) : usage('allowlist remove <mac>');
      default:
        return usage('allowlist [add <name> <mac>|remove <mac>]');
    }
  }

  /** A MAC address is taken as-is; anything else is looked up by hostname. */
  private async resolveDevice(target: string): Promise<CommandDevice | null> {
    if (looksLikeMac(target)) {
      const mac = normalizeMac(target);
      return { mac, name: mac };
    }

    const device = await this.deps.filter.findDevice(target);
    return device ? { mac: device.mac, name: device.name } : null;
  }

  private async guard(label: string, run: () => Promise<CommandResult>): Promise<CommandResult> {
    try {
      return await run();
    } catch (error) {
      this.logger.error(`${label} failed:`, describeError(error));
      return { success: false, message: `${label} failed: ${describeError(error)}`, devices: [] };
    }
  }

}

export function toCommandResult(result: LockdownResult): CommandResult {
  const failures = result.failures.map((failure) => ({ mac: failure.mac, name: failure.name, detail: `failed: ${failure.error}` }));
  return {
    success: result.success,
    message: result.message,
    devices: [...result.devices, ...failures],
  };
}

function usage(text: string): CommandResult {
  return { success: false, message: `Usage: ${text}`, devices: [] };
}
