import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { AllowlistStore } from './allowlist-store';
import type { RouterSettings } from './config';
import { LockdownController } from './lockdown-controller';
import { OperatorCommands, type OperatorCommandsDeps } from './operator-commands';
import { PresenceLog } from './presence-log';
import { PresenceTracker } from './presence-tracker';
import { NetworkFilter } from './router/network-filter';
import { RouterSession } from './router/router-session';
import { FakeRouter } from './testing/fake-router';

const settings: RouterSettings = {
  baseUrl: 'http://router.test',
  username: 'admin',
  password: 'test-secret',
  allowInsecureTls: false,
  probeTimeoutMs: 5000,
  readTimeoutMs: 10000,
  writeTimeoutMs: 15000,
};

// Wednesday, local time.
const NOW = new Date(2026, 2, 4, 12, 0, 0);

const DESK = 'AA:AA:AA:AA:AA:AA';
const CONSOLE = 'BB:BB:BB:BB:BB:BB';
const TV = 'CC:CC:CC:CC:CC:CC';
const ACCESS_POINT = { name: 'AP-Hall', mac: 'EE:EE:EE:EE:EE:EE', reason: 'Access point' };

describe('OperatorCommands', () => {
  let dir: string;
  let router: FakeRouter;
  let tracker: PresenceTracker;
  let history: PresenceLog;
  let allowlist: AllowlistStore;
  let deps: OperatorCommandsDeps;
  let commands: OperatorCommands;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lanwatch-commands-'));

    router = new FakeRouter();
    router.addHost(DESK, 'desk');
    router.addHost(CONSOLE, 'console');
    router.addHost(TV, 'living-room-tv');

    const session = new RouterSession(settings, { transport: router.transport });
    const filter = new NetworkFilter(session);
    allowlist = new AllowlistStore(path.join(dir, 'allowlist.json'), { detectMac: () => null });
    allowlist.add('desk', DESK, 'Own device');

    tracker = new PresenceTracker();
    history = new PresenceLog(path.join(dir, 'presence-history.csv'));

    const clock = () => NOW;
    const lockdown = new LockdownController({
      session,
      filter,
      allowlist,
      stateFile: path.join(dir, 'lockdown-state.json'),
      clock,
    });

    deps = { session, filter, allowlist, lockdown, tracker, history, infrastructure: [ACCESS_POINT], clock };
    commands = new OperatorCommands(deps);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('kick and allow', () => {
    it('kicks a device found by part of its hostname', async () => {
      const result = await commands.execute('kick', ['room']);

      expect(result).toEqual({
        success: true,
        message: `Kicked living-room-tv (${TV}).`,
        devices: [{ mac: TV, name: 'living-room-tv' }],
      });
      expect(router.macRows()).toEqual([
        expect.objectContaining({ macaddress: TV, description: 'living-room-tv', type: 'Block' }),
      ]);
    });

    it('reports a device that is already blocked', async () => {
      await commands.execute('kick', ['living-room-tv']);
      const result = await commands.execute('kick', ['living-room-tv']);

      expect(result.success).toBe(true);
      expect(result.message).toBe(`living-room-tv (${TV}) is already blocked.`);
      expect(router.macRows()).toHaveLength(1);
    });

    it('refuses to kick allowlisted devices', async () => {
      const result = await commands.execute('kick', ['desk']);

      expect(result.success).toBe(false);
      expect(result.message).toBe(`desk (${DESK}) is allowlisted and cannot be kicked.`);
      expect(router.writes).toEqual([]);
    });

    it('accepts a MAC address directly', async () => {
      const result = await commands.execute('kick', ['bb-bb-bb-bb-bb-bb']);

      expect(result.message).toBe(`Kicked ${CONSOLE} (${CONSOLE}).`);
    });

    it('reports unknown devices', async () => {
      const result = await commands.execute('kick', ['printer']);

      expect(result).toEqual({ success: false, message: 'Device "printer" not found.', devices: [] });
    });

    it('needs a target', async () => {
      const result = await commands.execute('kick', []);

      expect(result).toEqual({ success: false, message: 'Usage: kick <device>', devices: [] });
    });

    it('lets a device back in by the name stored on its block row', async () => {
      router.seedMacRows([{
        macaddress: 'DD:DD:DD:DD:DD:DD',
        description: 'old-laptop',
        type: 'Block',
        alwaysblock: 'true',
        starttime: '',
        endtime: '',
        blockdays: '',
      }], { enable: 'true' });

      const result = await commands.execute('allow', ['laptop']);

      expect(result.success).toBe(true);
      expect(result.message).toBe('Allowed old-laptop (DD:DD:DD:DD:DD:DD) back in.');
      expect(router.macRows()).toEqual([]);
    });

    it('lists banned devices', async () => {
      await commands.execute('kick', ['console']);
      const result = await commands.execute('banned', []);

      expect(result).toEqual({
        success: true,
        message: '1 banned device(s).',
        devices: [{ mac: CONSOLE, name: 'console' }],
      });
    });

    it('turns router failures into a failed result', async () => {
      router.unreachable = true;

      const result = await commands.execute('banned', []);

      expect(result.success).toBe(false);
      expect(result.message).toMatch(/^List banned devices failed: /);
    });
  });

  describe('lockdown', () => {
    it('runs a soft lockdown and reports it in status', async () => {
      const started = await commands.execute('lockdown', ['soft']);
      const status = await commands.execute('status', []);

      expect(started.success).toBe(true);
      expect(started.message).toBe('Soft lockdown active: blocked 2 device(s). New devices can still connect.');
      expect(status.message).toBe(`Lockdown ACTIVE (soft mode) since ${NOW.toISOString()}.\n0/0 devices online.`);
      expect(status.devices).toEqual([
        { mac: CONSOLE, name: 'console' },
        { mac: TV, name: 'living-room-tv' },
      ]);
    });

    it('previews strict mode without touching the router', async () => {
      const result = await commands.execute('lockdown', ['preview']);

      expect(result.message).toBe('[STRICT (blocks all unknown devices)] Would block 2 device(s).');
      expect(router.writes).toEqual([]);
    });

    it('reports stopping an inactive lockdown as a failure', async () => {
      const result = await commands.execute('lockdown', ['off']);

      expect(result).toEqual({ success: false, message: 'Lockdown is not active.', devices: [] });
    });

    it('rejects unknown actions', async () => {
      const result = await commands.execute('lockdown', ['maybe']);

      expect(result.message).toBe('Usage: lockdown on|soft|off|preview|status');
    });
  });

  it('lists online devices in status while lockdown is off', async () => {
    await tracker.ingest([
      { mac: TV, name: 'living-room-tv', hostname: 'living-room-tv', ip: '192.168.0.12', medium: 'wifi', online: true },
      { mac: CONSOLE, name: 'console', hostname: 'console', ip: '192.168.0.11', medium: 'wired', online: false },
    ], NOW);

    const result = await commands.status();

    expect(result.message).toBe('Lockdown is not active.\n1/2 devices online.');
    expect(result.devices).toEqual([{ mac: TV, name: 'living-room-tv', detail: '192.168.0.12' }]);
  });

  describe('allowlist', () => {
    it('adds a multi-word name and lists it', async () => {
      const added = await commands.execute('allowlist', ['add', 'living', 'room', 'tv', 'cc-cc-cc-cc-cc-cc']);
      const listed = await commands.execute('allowlist', []);

      expect(added.message).toBe(`Added living room tv (${TV}) to the allowlist.`);
      expect(listed.message).toBe('2 allowlisted device(s).');
      expect(listed.devices).toEqual([
        { mac: DESK, name: 'desk', detail: 'Own device' },
        { mac: TV, name: 'living room tv', detail: 'User added' },
      ]);
    });

    it('rejects things that are not MAC addresses', async () => {
      const result = await commands.execute('allowlist', ['remove', 'nope']);

      expect(result).toEqual({ success: false, message: '"nope" is not a MAC address.', devices: [] });
    });

    it('removes a listed device', async () => {
      const result = await commands.execute('allowlist', ['remove', DESK]);

      expect(result).toEqual({ success: true, message: `Removed ${DESK} from the allowlist.`, devices: [] });
    });

    it('leaves an unreadable allowlist file alone', async () => {
      const file = path.join(dir, 'allowlist.json');
      fs.writeFileSync(file, '{ "devices": [ ');

      const added = await commands.execute('allowlist', ['add', 'tv', TV]);
      const removed = await commands.execute('allowlist', ['remove', DESK]);

      const message = 'The allowlist file is unreadable; fix it before changing the allowlist.';
      expect(added).toEqual({ success: false, message, devices: [{ mac: TV, name: 'tv' }] });
      expect(removed).toEqual({ success: false, message, devices: [] });
      expect(fs.readFileSync(file, 'utf8')).toBe('{ "devices": [ ');
    });
  });

  describe('wifi', () => {
    it('blocks the access points even though they are allowlisted', async () => {
      allowlist.add(ACCESS_POINT.name, ACCESS_POINT.mac, ACCESS_POINT.reason);

      const kicked = await commands.execute('kick', [ACCESS_POINT.mac]);
      const result = await commands.execute('wifi', ['OFF']);

      expect(kicked.success).toBe(false);
      expect(result).toEqual({
        success: true,
        message: 'WiFi is now OFF: access points stay up without internet.',
        devices: [{ mac: ACCESS_POINT.mac, name: 'AP-Hall', detail: 'blocked' }],
      });
      expect(router.macRows()).toEqual([
        expect.objectContaining({ macaddress: ACCESS_POINT.mac, description: 'AP-Hall', type: 'Block' }),
      ]);
    });

    it('reports each access point when switching back on', async () => {
      await commands.execute('wifi', ['off']);

      const first = await commands.execute('wifi', ['on']);
      const second = await commands.execute('wifi', ['on']);

      expect(first).toEqual({
        success: true,
        message: 'WiFi is now ON.',
        devices: [{ mac: ACCESS_POINT.mac, name: 'AP-Hall', detail: 'unblocked' }],
      });
      expect(second.devices).toEqual([{ mac: ACCESS_POINT.mac, name: 'AP-Hall', detail: 'not blocked' }]);
      expect(router.macRows()).toEqual([]);
    });

    it('marks access points the router could not switch', async () => {
      router.unreachable = true;

      const result = await commands.execute('wifi', ['off']);

      expect(result.success).toBe(false);
      expect(result.message).toBe('WiFi off failed for 1 of 1 access point(s).');
      expect(result.devices[0]?.detail).toMatch(/^failed: /);
    });

    it('needs configured access points', async () => {
      const result = await new OperatorCommands({ ...deps, infrastructure: [] }).execute('wifi', ['off']);

      expect(result).toEqual({ success: false, message: 'No access points are configured.', devices: [] });
      expect(router.writes).toEqual([]);
    });

    it('needs on or off', async () => {
      const result = await commands.execute('wifi', ['maybe']);

      expect(result).toEqual({ success: false, message: 'Usage: wifi on|off', devices: [] });
    });
  });

  describe('sites', () => {
    it('blocks, lists and unblocks a site', async () => {
      const blocked = await commands.execute('block', ['Example.com']);
      const listed = await commands.execute('blocklist', []);
      const unblocked = await commands.execute('unblock', ['example.com']);

      expect(blocked.message).toBe('Blocked example.com.');
      expect(listed.message).toBe('Blocked sites (1):\nexample.com');
      expect(unblocked.message).toBe('Unblocked example.com.');
      expect(router.siteRows()).toEqual([]);
    });
  });

  describe('history', () => {
    beforeEach(() => {
      history.append('arrived', 'phone', '192.168.0.20', new Date(2026, 1, 20, 7, 0, 0));
      history.append('arrived', 'tablet', '192.168.0.21', new Date(2026, 2, 1, 20, 0, 0));
      history.append('arrived', 'phone', '192.168.0.20', new Date(2026, 2, 4, 8, 5, 0));
      history.append('departed', 'phone', '192.168.0.20', new Date(2026, 2, 4, 9, 30, 0));
    });

    it('summarises the whole history', async () => {
      const result = await commands.execute('stats', []);

      expect(result.message).toBe([
        'Total events: 4',
        'Arrivals: 3',
        'Departures: 1',
        'Days tracked: 3',
        'Unique devices: 2',
      ].join('\n'));
    });

    it('lists today\'s events', async () => {
      const result = await commands.execute('today', []);

      expect(result.message).toBe('Today (2026-03-04):\n08:05:00 arrived phone\n09:30:00 departed phone');
    });

    it('totals the last seven days, newest first', async () => {
      const result = await commands.execute('week', []);

      expect(result.message).toBe([
        'Last 7 days:',
        'Wed 2026-03-04: 1 arrived, 1 departed',
        'Sun 2026-03-01: 1 arrived, 0 departed',
      ].join('\n'));
    });
  });

  it('answers unknown commands with a hint', async () => {
    const result = await commands.execute('/reboot', []);

    expect(result).toEqual({ success: false, message: 'Unknown command "reboot". Try help.', devices: [] });
  });

  it('lists every command in help', async () => {
    const result = await commands.execute('help', []);

    expect(result.message.split('\n')).toContain('kick <device> - Block a device by name');
    expect(result.message.split('\n')).toContain('wifi on|off - Cut or restore internet for the access points');
  });
});
