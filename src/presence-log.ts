'use strict';

import * as fs from 'fs';
import * as path from 'path';

import { isMissingFileError } from './json-file';
import { createLogger, type Logger } from './logger';

export type PresenceEventKind = 'arrived' | 'departed';

export interface PresenceLogRecord {
  timestamp: string;
  date: string;
  time: string;
  weekday: string;
  event: string;
  deviceName: string;
  address: string;
}

export interface PresenceStats {
  totalEvents: number;
  arrivals: number;
  departures: number;
  daysTracked: number;
  uniqueDevices: number;
}

const COLUMNS: Array<keyof PresenceLogRecord> = ['timestamp', 'date', 'time', 'weekday', 'event', 'deviceName', 'address'];

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

/** Append-only CSV history of arrivals and departures, in local time. */
export class PresenceLog {

  private readonly logger: Logger;

  constructor(private readonly filePath: string, options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createLogger('history');
  }

  append(event: PresenceEventKind, deviceName: string, address: string, at: Date = new Date()) {
    const record: PresenceLogRecord = {
      timestamp: at.toISOString(),
      date: formatDate(at),
      time: formatTime(at),
      weekday: WEEKDAYS[at.getDay()] ?? '',
      event,
      deviceName,
      address,
    };

    const prefix = this.ensureHeader();
    fs.appendFileSync(this.filePath, `${prefix}${toCsvLine(COLUMNS.map((column) => record[column]))}\n`, 'utf8');
  }

  records(): PresenceLogRecord[] {
    let text: string;
    try {
      text = fs.readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return [];
      }
      throw error;
    }

    const [header, ...rows] = parseCsv(text);
    if (!header) {
      return [];
    }

    return rows.map((row) => {
      const record: PresenceLogRecord = {
        timestamp: '', date: '', time: '', weekday: '', event: '', deviceName: '', address: '',
      };
      header.forEach((column, index) => {
        const key = COLUMNS.find((name) => name === column);
        if (key) {
          record[key] = row[index] ?? '';
        }
      });
      return record;
    });
  }

  stats(): PresenceStats {
    let arrivals = 0;
    let departures = 0;
    const days = new Set<string>();
    const devices = new Set<string>();

    for (const record of this.records()) {
      if (record.event === 'arrived') {
        arrivals += 1;
      } else if (record.event === 'departed') {
        departures += 1;
      }
      days.add(record.date);
      devices.add(record.deviceName);
    }

    return {
      totalEvents: arrivals + departures,
      arrivals,
      departures,
      daysTracked: days.size,
      uniqueDevices: devices.size,
    };
  }

  eventsOn(day: Date | string): PresenceLogRecord[] {
    const wanted = typeof day === 'string' ? day : formatDate(day);
    return this.records().filter((record) => record.date === wanted);
  }

  /** Records dated on or after the given local day. */
  eventsSince(day: Date): PresenceLogRecord[] {
    const from = formatDate(day);
    return this.records().filter((record) => record.date >= from);
  }

  /** Header prefix for a file that does not exist yet or is empty. */
  private ensureHeader(): string {
    try {
      if (fs.statSync(this.filePath).size > 0) {
        return '';
      }
    } catch (error) {
      if (!isMissingFileError(error)) {
        throw error;
      }
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.logger.log(`Starting presence history at ${this.filePath}.`);
    }

    return `${toCsvLine(COLUMNS)}\n`;
  }

}

export function formatDate(at: Date): string {
  return `${at.getFullYear()}-${pad(at.getMonth() + 1)}-${pad(at.getDate())}`;
}

export function formatTime(at: Date): string {
  return `${pad(at.getHours())}:${pad(at.getMinutes())}:${pad(at.getSeconds())}`;
}

export function toCsvLine(fields: string[]): string {
  return fields.map(escapeCsvField).join(',');
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];

    if (quoted) {
      if (char === '"' && text[i + 1] === '"') {
        field += '"';
        i += 1;
      } else if (char === '"') {
        quoted = false;
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n') {
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else if (char !== '\r') {
      field += char;
    }
  }

  if (field || row.length) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}
