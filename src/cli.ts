#!/usr/bin/env node
'use strict';

import { Command } from 'commander';

import { createAppContext, type AppContext } from './app-context';
import { loadConfig } from './config';
import { renderResult } from './console-output';
import { configureLogging, describeError } from './logger';
import type { CommandResult } from './operator-commands';

const program = new Command();

program
  .name('lanwatch')
  .description('Track who is home and lock down the network through the router')
  .version('1.0.0')
  .option('-c, --config <file>', 'Configuration file (default: ./lanwatch.config.json)');

function openContext(): AppContext {
  const { config: configFile } = program.opts<{ config?: string }>();
  const config = loadConfig({ configFile });
  configureLogging(config.logLevel);
  return createAppContext(config);
}

/** Runs one operator command, prints it and logs out of the router. */
async function runCommand(run: (context: AppContext) => CommandResult | Promise<CommandResult>) {
  let context: AppContext;
  try {
    context = openContext();
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    process.exitCode = 1;
    return;
  }

  try {
    const result = await run(context);
    console.log(renderResult(result));
    if (!result.success) {
      process.exitCode = 1;
    }
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    process.exitCode = 1;
  } finally {
    await context.session.logout();
  }
}

program
  .command('monitor')
  .description('Poll the router, track presence and answer bot commands until stopped')
  .action(async () => {
    let context: AppContext;
    try {
      context = openContext();
    } catch (error) {
      console.error(`Error: ${describeError(error)}`);
      process.exitCode = 1;
      return;
    }

    const { monitor } = context;
    const stop = () => monitor.stop();
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    console.log(`Monitoring ${context.config.router.baseUrl} every ${context.config.presence.pollIntervalSeconds}s. Ctrl+C to stop.`);
    await monitor.run();
  });

program
  .command('status')
  .description('Lockdown state and router health')
  .action(() => runCommand((context) => context.commands.status()));

program
  .command('devices')
  .description('Every device the router knows')
  .action(() => runCommand((context) => context.commands.devices()));

program
  .command('preview')
  .description('Devices a lockdown would block, without changing anything')
  .option('--soft', 'Preview soft mode instead of strict', false)
  .action((options: { soft: boolean }) => runCommand((context) => context.commands.preview(!options.soft)));

const lockdown = program
  .command('lockdown')
  .description('Start, stop or inspect lockdown');

lockdown
  .command('start')
  .description('Start lockdown (strict unless --soft)')
  .option('--soft', 'Block only the devices connected now', false)
  .option('--dry-run', 'Show what would be blocked', false)
  .action((options: { soft: boolean; dryRun: boolean }) => runCommand((context) => (options.dryRun
    ? context.commands.preview(!options.soft)
    : context.commands.lockdownStart(!options.soft))));

lockdown
  .command('stop')
  .description('End lockdown and let every device back in')
  .action(() => runCommand((context) => context.commands.lockdownStop()));

lockdown
  .command('status')
  .description('Current lockdown state')
  .action(() => runCommand((context) => context.commands.status()));

const allowlist = program
  .command('allowlist')
  .description('Devices lockdown never blocks');

allowlist
  .command('list', { isDefault: true })
  .description('Show the allowlist')
  .action(() => runCommand((context) => context.commands.allowlistList()));

allowlist
  .command('add <name> <mac> [reason]')
  .description('Add a device to the allowlist')
  .action((name: string, mac: string, reason: string | undefined) => runCommand((context) => context.commands.allowlistAdd(name, mac, reason)));

allowlist
  .command('remove <mac>')
  .description('Remove a device from the allowlist')
  .action((mac: string) => runCommand((context) => context.commands.allowlistRemove(mac)));

program
  .command('kick <device...>')
  .description('Block a device by name or MAC address')
  .action((device: string[]) => runCommand((context) => context.commands.kick(device.join(' '))));

program
  .command('allow <device...>')
  .description('Let a kicked device back in')
  .action((device: string[]) => runCommand((context) => context.commands.allow(device.join(' '))));

program
  .command('banned')
  .description('Devices blocked on the router')
  .action(() => runCommand((context) => context.commands.banned()));

program
  .command('wifi <state>')
  .description('Cut (off) or restore (on) internet for the access points')
  .action((state: string) => runCommand((context) => context.commands.execute('wifi', [state])));

program
  .command('block-site <site>')
  .description('Block a website')
  .action((site: string) => runCommand((context) => context.commands.blockSite(site)));

program
  .command('unblock-site <site>')
  .description('Unblock a website')
  .action((site: string) => runCommand((context) => context.commands.unblockSite(site)));

program
  .command('blocklist')
  .description('Blocked websites')
  .action(() => runCommand((context) => context.commands.blocklist()));

program
  .command('stats')
  .description('Presence history totals')
  .action(() => runCommand((context) => context.commands.stats()));

program
  .command('today')
  .description('Arrivals and departures today')
  .action(() => runCommand((context) => context.commands.today()));

program
  .command('week')
  .description('Daily totals for the last seven days')
  .action(() => runCommand((context) => context.commands.week()));

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${describeError(error)}`);
  process.exit(1);
});
