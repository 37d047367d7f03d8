'use strict';

import type { CommandResult } from './operator-commands';

/** Plain-text rendering of a command result for a terminal. */
export function renderResult(result: CommandResult): string {
  const lines = [result.success ? result.message : `Error: ${result.message}`];

  if (result.devices.length) {
    const width = Math.max(...result.devices.map((device) => device.name.length));
    lines.push('');

    for (const device of result.devices) {
      const detail = device.detail ? `  ${device.detail}` : '';
      lines.push(`  ${device.name.padEnd(width)}  ${device.mac}${detail}`);
    }
  }

  return lines.join('\n');
}
