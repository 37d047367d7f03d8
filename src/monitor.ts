'use strict';

import { setTimeout as delay } from 'timers/promises';

import type { CommandSource, OperatorRequest } from './command-source';
import type { EventSink } from './event-sink';
import { createLogger, describeError, type Logger } from './logger';
import type { CommandResult, OperatorCommands } from './operator-commands';
import type { PresenceTracker, PresenceTransition } from './presence-tracker';
import type { RouterSession } from './router/router-session';

export interface MonitorDeps {
  session: RouterSession;
  tracker: PresenceTracker;
  commands: OperatorCommands;
  commandSource?: CommandSource;
  /** Receives the startup notice. */
  sink?: EventSink;
  pollIntervalSeconds: number;
  logger?: Logger;
  clock?: () => Date;
}

export interface CycleReport {
  devices: number;
  transitions: PresenceTransition[];
  commands: number;
  skipped: boolean;
}

/**
 * The poll loop: read the host table, feed the tracker, answer operator
 * requests, sleep. One cycle at a time; a failed cycle is logged and the
 * next one starts from scratch.
 */
export class Monitor {

  private running = false;

  private isPolling = false;

  private wake: AbortController | null = null;

  private readonly logger: Logger;

  private readonly clock: () => Date;

  lastPollAt: string | null = null;

  lastPollError: string | null = null;

  constructor(private readonly deps: MonitorDeps) {
    this.logger = deps.logger ?? createLogger('monitor');
    this.clock = deps.clock ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.running;
  }

  async runOnce(): Promise<CycleReport> {
    if (this.isPolling) {
      return { devices: 0, transitions: [], commands: 0, skipped: true };
    }

    this.isPolling = true;

    try {
      const now = this.clock();
      const devices = await this.deps.session.getDevices();

      if (!devices.length) {
        // A live network never has zero hosts; the session is the likely culprit.
        this.lastPollError = this.deps.session.lastFailure?.message ?? 'Router returned no devices.';
        this.logger.log('Router returned no devices, logging in again next cycle.');
        this.deps.session.invalidate();
        const commands = await this.drainCommands();
        return { devices: 0, transitions: [], commands, skipped: false };
      }

      const transitions = await this.deps.tracker.ingest(devices, now);
      const commands = await this.drainCommands();

      this.lastPollAt = now.toISOString();
      this.lastPollError = null;
      this.logger.log(`Poll done: ${devices.length} device(s), ${transitions.length} transition(s), ${commands} command(s).`);

      return { devices: devices.length, transitions, commands, skipped: false };
    } finally {
      this.isPolling = false;
    }
  }

  async run() {
    this.running = true;
    const intervalMs = this.deps.pollIntervalSeconds * 1000;
    this.logger.log(`Monitor started, polling every ${this.deps.pollIntervalSeconds}s.`);

    let announced = false;

    while (this.running) {
      try {
        await this.runOnce();
      } catch (error) {
        this.lastPollError = describeError(error);
        this.logger.error('Monitor cycle failed:', this.lastPollError);
      }

      if (!announced) {
        announced = true;
        await this.announceStart();
      }

      if (!this.running) {
        break;
      }

      await this.sleep(intervalMs);
    }

    await this.deps.session.logout();
    this.logger.log('Monitor stopped.');
  }

  /** Ends the loop after the current cycle; a pending sleep returns at once. */
  stop() {
    this.running = false;
    this.wake?.abort();
  }

  private async drainCommands(): Promise<number> {
    const source = this.deps.commandSource;
    if (!source) {
      return 0;
    }

    let requests: OperatorRequest[];
    try {
      requests = await source.poll();
    } catch (error) {
      this.logger.error('Reading operator commands failed:', describeError(error));
      return 0;
    }

    for (const request of requests) {
      let result: CommandResult;
      try {
        result = await this.deps.commands.execute(request.command, request.args);
      } catch (error) {
        this.logger.error(`Command ${request.command} failed:`, describeError(error));
        result = { success: false, message: `${request.command} failed: ${describeError(error)}`, devices: [] };
      }

      try {
        await request.reply(result);
      } catch (error) {
        this.logger.error(`Replying to ${request.command} failed:`, describeError(error));
      }
    }

    return requests.length;
  }

  /** Sent once, after the first cycle, so the counts reflect the first snapshot. */
  private async announceStart() {
    const sink = this.deps.sink;
    if (!sink) {
      return;
    }

    const summary = this.deps.tracker.summary();
    try {
      await sink.notify('monitor-started', `Tracking ${summary.total} device(s), ${summary.online} online.`, '');
    } catch (error) {
      this.logger.error('Sending the startup notice failed:', describeError(error));
    }
  }

  private async sleep(ms: number) {
    const controller = new AbortController();
    this.wake = controller;

    try {
      await delay(ms, undefined, { signal: controller.signal });
    } catch (error) {
      if (!controller.signal.aborted) {
        throw error;
      }
    } finally {
      this.wake = null;
    }
  }

}
