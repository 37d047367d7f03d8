'use strict';

import type { CommandResult } from './operator-commands';

export interface OperatorRequest {
  command: string;
  args: string[];
  reply(result: CommandResult): Promise<void>;
}

/** Polled once per monitor cycle for operator requests that arrived meanwhile. */
export interface CommandSource {
  poll(): Promise<OperatorRequest[]>;
}

/** `/kick@home_bot living room` → `{ command: 'kick', args: ['living', 'room'] }`. */
export function parseCommandText(text: string): { command: string; args: string[] } | null {
  const [head, ...args] = text.trim().split(/\s+/);

  if (!head || !head.startsWith('/') || head.length < 2) {
    return null;
  }

  const command = head.slice(1).split('@')[0]?.toLowerCase() ?? '';
  return command ? { command, args } : null;
}
