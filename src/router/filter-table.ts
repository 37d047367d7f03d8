'use strict';

import type { MacFilterEntry, SiteFilterEntry } from '../types';

export type FilterTableName = 'macfilterTbl' | 'sitefilterTbl';

/**
 * `bulk` posts the whole table as one JSON array and replaces it.
 * `indexed` posts `table[i][field]=value` pairs and only touches those rows.
 */
export type FilterEncoding = 'bulk' | 'indexed';

export interface FilterRow {
  index: number;
  fields: Record<string, string>;
}

export interface FilterTableWrite {
  table: FilterTableName;
  /** Top-level switches such as `enable` and `allowall`. */
  flags: Record<string, string>;
  rows: FilterRow[];
  /** Sibling tables sent as JSON alongside, e.g. `sitetrustedTbl`. */
  companions?: Record<string, Array<Record<string, string>>>;
}

export interface DecodedFilterForm {
  flags: Record<string, string>;
  rows: FilterRow[];
}

const INDEXED_FIELD = /^([A-Za-z]+)\[(\d+)\]\[([^\]]+)\]$/;

export function encodeFilterTableWrite(write: FilterTableWrite, encoding: FilterEncoding): URLSearchParams {
  const params = new URLSearchParams();

  for (const [name, value] of Object.entries(write.flags)) {
    params.append(name, value);
  }

  if (encoding === 'bulk') {
    params.append(write.table, JSON.stringify(write.rows.map((row) => row.fields)));
  } else {
    for (const row of write.rows) {
      for (const [field, value] of Object.entries(row.fields)) {
        params.append(`${write.table}[${row.index}][${field}]`, value);
      }
    }
  }

  for (const [name, rows] of Object.entries(write.companions ?? {})) {
    params.append(name, JSON.stringify(rows));
  }

  return params;
}

/**
 * Reads either encoding back into rows. Bulk rows are numbered by position,
 * indexed rows keep their index. Used by the fake router in tests and when
 * logging what was sent.
 */
export function decodeFilterTableForm(params: URLSearchParams, table: FilterTableName): DecodedFilterForm {
  const flags: Record<string, string> = {};
  const indexed = new Map<number, Record<string, string>>();
  let bulk: FilterRow[] | null = null;

  for (const [key, value] of params.entries()) {
    if (key === table) {
      bulk = parseBulkRows(value);
      continue;
    }

    const match = key.match(INDEXED_FIELD);
    if (match && match[1] === table) {
      const index = Number(match[2]);
      const fields = indexed.get(index) ?? {};
      fields[match[3]] = value;
      indexed.set(index, fields);
      continue;
    }

    flags[key] = value;
  }

  if (bulk) {
    return { flags, rows: bulk };
  }

  const rows = [...indexed.entries()]
    .sort(([a], [b]) => a - b)
    .map(([index, fields]) => ({ index, fields }));

  return { flags, rows };
}

/** One past the highest `__id` in use, or 0 for an empty table. */
export function nextFilterIndex(ids: Array<number | null>): number {
  const used = ids.filter((id): id is number => id !== null && Number.isFinite(id));
  return used.length ? Math.max(...used) + 1 : 0;
}

export function macEntryFields(entry: MacFilterEntry): Record<string, string> {
  return {
    ...entry.wireFields,
    macaddress: entry.mac,
    description: entry.description,
    type: entry.action,
    alwaysblock: String(entry.alwaysBlock),
    starttime: entry.startTime,
    endtime: entry.endTime,
    blockdays: entry.blockDays,
  };
}

export function siteEntryFields(entry: SiteFilterEntry): Record<string, string> {
  return {
    ...entry.wireFields,
    site: entry.site,
    blockmethod: entry.blockMethod,
    alwaysblock: String(entry.alwaysBlock),
  };
}

/** Rows for a full replacement, renumbered from zero. */
export function toRows<T>(entries: T[], toFields: (entry: T) => Record<string, string>): FilterRow[] {
  return entries.map((entry, index) => ({ index, fields: toFields(entry) }));
}

function parseBulkRows(value: string): FilterRow[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    throw new Error(`Filter table payload is not a JSON array: ${value.slice(0, 80)}`);
  }

  if (!Array.isArray(parsed)) {
    throw new Error('Filter table payload is not a JSON array.');
  }

  return parsed.map((item: unknown, index) => ({ index, fields: toStringRecord(item) }));
}

function toStringRecord(item: unknown): Record<string, string> {
  const fields: Record<string, string> = {};
  if (!item || typeof item !== 'object') {
    return fields;
  }

  for (const [key, value] of Object.entries(item)) {
    if (value !== null && value !== undefined) {
      fields[key] = String(value);
    }
  }

  return fields;
}
