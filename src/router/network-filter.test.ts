import { describe, it, expect } from 'vitest';

import type { RouterSettings } from '../config';
import { FakeRouter } from '../testing/fake-router';
import { NetworkFilter } from './network-filter';
import { RouterSession } from './router-session';

const settings: RouterSettings = {
  baseUrl: 'http://router.test',
  username: 'admin',
  password: 'test-secret',
  allowInsecureTls: false,
  probeTimeoutMs: 5000,
  readTimeoutMs: 10000,
  writeTimeoutMs: 15000,
};

function setup() {
  const router = new FakeRouter();
  const filter = new NetworkFilter(new RouterSession(settings, { transport: router.transport }));
  return { router, filter };
}

describe('NetworkFilter', () => {
  describe('devices', () => {
    it('blocks a device with an indexed append', async () => {
      const { router, filter } = setup();

      expect(await filter.blockDevice('aa:bb:cc:dd:ee:01', 'tablet')).toBe('blocked');

      expect(router.writes.map((write) => write.encoding)).toEqual(['indexed']);
      expect(router.macRows()).toEqual([{
        __id: '0',
        macaddress: 'AA:BB:CC:DD:EE:01',
        description: 'tablet',
        type: 'Block',
        alwaysblock: 'true',
        starttime: '',
        endtime: '',
        blockdays: '',
      }]);
    });

    it('reports a device that is already blocked without writing', async () => {
      const { router, filter } = setup();
      router.seedMacRows([{ macaddress: 'AA:BB:CC:DD:EE:01', type: 'Block' }], { enable: 'true' });

      expect(await filter.blockDevice('AA:BB:CC:DD:EE:01', 'tablet')).toBe('already-blocked');
      expect(router.writes).toEqual([]);
    });

    it('flips an existing Allow row to Block', async () => {
      const { router, filter } = setup();
      router.seedMacRows([{ macaddress: 'AA:BB:CC:DD:EE:01', type: 'Allow', description: 'tablet' }], { enable: 'true', allowall: 'false' });

      expect(await filter.blockDevice('AA:BB:CC:DD:EE:01', 'tablet')).toBe('blocked');

      expect(router.writes[0]?.encoding).toBe('bulk');
      expect(router.macRows().map((row) => row.type)).toEqual(['Block']);
      expect(router.macFlags().allowall).toBe('false');
    });

    it('unblocks by rewriting the remaining rows', async () => {
      const { router, filter } = setup();
      router.seedMacRows([
        { macaddress: 'AA:BB:CC:DD:EE:01', type: 'Block' },
        { macaddress: 'AA:BB:CC:DD:EE:02', type: 'Block' },
      ], { enable: 'true', allowall: 'true' });

      expect(await filter.unblockDevice('aa-bb-cc-dd-ee-01')).toBe('unblocked');

      expect(router.macRows().map((row) => row.macaddress)).toEqual(['AA:BB:CC:DD:EE:02']);
      expect(router.macFlags()).toEqual({ enable: 'true', allowall: 'true' });
    });

    it('turns the filter off when the last blocked row goes', async () => {
      const { router, filter } = setup();
      router.seedMacRows([{ macaddress: 'AA:BB:CC:DD:EE:01', type: 'Block' }], { enable: 'true', allowall: 'true' });

      await filter.unblockDevice('AA:BB:CC:DD:EE:01');

      expect(router.macRows()).toEqual([]);
      expect(router.macFlags().enable).toBe('false');
    });

    it('keeps the router\'s own row fields when rewriting the table', async () => {
      const { router, filter } = setup();
      router.seedMacRows([
        { macaddress: 'AA:BB:CC:DD:EE:01', type: 'Block', description: 'tablet' },
        { macaddress: 'AA:BB:CC:DD:EE:02', type: 'Block', description: 'console', schedule: 'weekend' },
      ], { enable: 'true', allowall: 'true' });

      await filter.unblockDevice('AA:BB:CC:DD:EE:01');

      expect(router.writes[0]?.rows).toEqual([{
        __id: '1',
        macaddress: 'AA:BB:CC:DD:EE:02',
        description: 'console',
        type: 'Block',
        alwaysblock: 'false',
        starttime: '',
        endtime: '',
        blockdays: '',
        schedule: 'weekend',
      }]);
    });

    it('trusts a fresh read when the router reports an error for an applied unblock', async () => {
      const { router, filter } = setup();
      router.seedMacRows([{ macaddress: 'AA:BB:CC:DD:EE:01', type: 'Block' }], { enable: 'true', allowall: 'true' });
      router.errorAfterWrite = true;

      expect(await filter.unblockDevice('AA:BB:CC:DD:EE:01')).toBe('unblocked');
      expect(router.macRows()).toEqual([]);
    });

    it('still fails when a rejected unblock did not apply', async () => {
      const { router, filter } = setup();
      router.seedMacRows([{ macaddress: 'AA:BB:CC:DD:EE:01', type: 'Block' }], { enable: 'true', allowall: 'true' });
      router.rejectWrites = true;

      await expect(filter.unblockDevice('AA:BB:CC:DD:EE:01')).rejects.toThrow('Router rejected POST /api/v1/macfilter: Write failed.');
    });

    it('reports an address that is not blocked', async () => {
      const { router, filter } = setup();

      expect(await filter.unblockDevice('AA:BB:CC:DD:EE:01')).toBe('not-blocked');
      expect(router.writes).toEqual([]);
    });

    it('finds a device by exact hostname before a substring match', async () => {
      const { router, filter } = setup();
      router.addHost('AA:BB:CC:DD:EE:01', 'phone-old');
      router.addHost('AA:BB:CC:DD:EE:02', 'Phone');

      expect(await filter.findDeviceMac('phone')).toBe('AA:BB:CC:DD:EE:02');
      expect(await filter.findDeviceMac('old')).toBe('AA:BB:CC:DD:EE:01');
      expect(await filter.findDeviceMac('printer')).toBeNull();
    });
  });

  describe('sites', () => {
    it('blocks a site once and lists it', async () => {
      const { router, filter } = setup();

      expect(await filter.blockSite(' Games.Example ')).toBe('blocked');
      expect(await filter.blockSite('games.example')).toBe('already-blocked');

      expect(await filter.listBlockedSites()).toEqual(['games.example']);
      expect(router.writes).toHaveLength(1);
    });

    it('unblocks a site and keeps the trusted table', async () => {
      const { router, filter } = setup();
      router.seedSiteRows([
        { site: 'games.example', blockmethod: 'URL', alwaysblock: 'true' },
        { site: 'video.example', blockmethod: 'URL', alwaysblock: 'true' },
      ], [{ trustedmac: 'AA:BB:CC:DD:EE:01' }]);

      expect(await filter.unblockSite('games.example')).toBe('unblocked');
      expect(await filter.unblockSite('games.example')).toBe('not-blocked');

      expect(router.siteRows().map((row) => row.site)).toEqual(['video.example']);
      expect(router.trustedRows()).toEqual([{ trustedmac: 'AA:BB:CC:DD:EE:01' }]);
    });

    it('trusts a fresh read when the router reports an error for an applied site unblock', async () => {
      const { router, filter } = setup();
      router.seedSiteRows([{ site: 'games.example', blockmethod: 'URL', alwaysblock: 'true' }]);
      router.errorAfterWrite = true;

      expect(await filter.unblockSite('games.example')).toBe('unblocked');
      expect(router.siteRows()).toEqual([]);
    });
  });

  describe('allowlist mode', () => {
    it('pushes allowlisted devices as Allow rows and restores allow-all', async () => {
      const { router, filter } = setup();

      await filter.enableAllowlistMode([{ name: 'desk', mac: 'AA:BB:CC:DD:EE:0A', reason: 'Own device' }]);
      expect(router.macFlags()).toEqual({ enable: 'true', allowall: 'false' });
      expect(router.macRows().map((row) => [row.macaddress, row.type, row.alwaysblock])).toEqual([
        ['AA:BB:CC:DD:EE:0A', 'Allow', 'false'],
      ]);

      await filter.restoreAllowAll();
      expect(router.macFlags()).toEqual({ enable: 'false', allowall: 'true' });
      expect(router.macRows()).toEqual([]);
    });
  });
});
