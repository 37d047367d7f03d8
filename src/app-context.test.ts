import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

import { createAppContext } from './app-context';
import { loadConfig } from './config';
import type { FetchFn } from './telegram';
import { FakeRouter } from './testing/fake-router';

describe('createAppContext', () => {
  let dir: string;
  let router: FakeRouter;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lanwatch-context-'));
    router = new FakeRouter();
    router.addHost('11:22:33:44:55:66', 'kims-phone');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function configWith(extra: Record<string, unknown>) {
    fs.writeFileSync(path.join(dir, 'lanwatch.config.json'), JSON.stringify({
      router: { baseUrl: 'http://router.test', username: 'admin', password: 'test-secret' },
      infrastructure: [{ name: 'Mesh node', mac: 'AA:BB:CC:DD:EE:FF' }],
      ...extra,
    }), 'utf8');
    return loadConfig({ env: {}, cwd: dir });
  }

  it('runs without a command source when no bot is configured', async () => {
    const context = createAppContext(configWith({}), { transport: router.transport, detectMac: () => null });

    const report = await context.monitor.runOnce();

    expect(context.commandSource).toBeNull();
    expect(report.devices).toBe(1);
    expect(context.allowlist.load()).toEqual([{ name: 'Mesh node', mac: 'AA:BB:CC:DD:EE:FF', reason: 'Infrastructure' }]);
  });

  it('answers bot commands through the monitor', async () => {
    const payloads: unknown[] = [
      { ok: true, result: [{ update_id: 4, message: { text: '/banned', chat: { id: 1001 } } }] },
      { ok: true, result: {} },
    ];
    const fetch = vi.fn<FetchFn>(async () => ({ ok: true, status: 200, json: async () => payloads.shift() }));
    const config = configWith({ telegram: { botToken: 'test-token', chatId: '1001' } });
    const context = createAppContext(config, { transport: router.transport, fetch, detectMac: () => null });

    const report = await context.monitor.runOnce();

    expect(report.commands).toBe(1);
    const body = new URLSearchParams(String(fetch.mock.calls[1]?.[1]?.body));
    expect(body.get('text')).toBe('✅ No devices are currently banned.');
  });
});
