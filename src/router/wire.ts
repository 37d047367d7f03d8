'use strict';

import { z } from 'zod';

import { isMacLikeName, safeNormalizeMac } from '../mac';
import type {
  ConnectionMedium,
  Device,
  FilterAction,
  MacFilterEntry,
  MacFilterTable,
  SiteFilterEntry,
  SiteFilterTable,
} from '../types';

// The router is loose with types: booleans arrive as "true"/"false", ids as
// strings or numbers, missing fields as absent or null.
const wireText = z
  .union([z.string(), z.number(), z.boolean()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value)));

const wireFlag = wireText.transform((value) => ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase()));

const wireId = wireText.transform((value) => {
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? null : parsed;
});

export const envelopeSchema = z.object({
  error: wireText,
  message: wireText,
  data: z.unknown().optional(),
}).passthrough();

export type RouterEnvelope = z.infer<typeof envelopeSchema>;

export const saltResponseSchema = z.object({
  salt: wireText,
  saltwebui: wireText,
}).passthrough();

const hostEntrySchema = z.object({
  physaddress: wireText,
  ipaddress: wireText,
  hostname: wireText,
  active: wireFlag,
  layer1interface: wireText,
}).passthrough();

export const hostTableSchema = z.object({
  hostTbl: z.array(hostEntrySchema).default([]),
}).passthrough();

const macFilterEntrySchema = z.object({
  __id: wireId,
  macaddress: wireText,
  description: wireText,
  type: wireText,
  alwaysblock: wireFlag,
  starttime: wireText,
  endtime: wireText,
  blockdays: wireText,
}).passthrough();

export const macFilterSchema = z.object({
  enable: wireFlag,
  allowall: wireText,
  macfilterTbl: z.array(macFilterEntrySchema).default([]),
}).passthrough();

const siteFilterEntrySchema = z.object({
  __id: wireId,
  site: wireText,
  blockmethod: wireText,
  alwaysblock: wireFlag,
}).passthrough();

export const siteFilterSchema = z.object({
  enable: wireFlag,
  sitefilterTbl: z.array(siteFilterEntrySchema).default([]),
  sitetrustedTbl: z.array(z.record(wireText)).default([]),
}).passthrough();

export function detectMedium(layer1Interface: string): ConnectionMedium {
  const iface = layer1Interface.toLowerCase();

  if (iface.includes('wifi')) {
    if (iface.includes('ssid.1')) {
      return 'wifi-2.4ghz';
    }

    if (iface.includes('ssid.2')) {
      return 'wifi-5ghz';
    }

    return 'wifi';
  }

  if (iface.includes('ethernet')) {
    return 'wired';
  }

  return 'unknown';
}

export function mapHostTable(data: z.infer<typeof hostTableSchema>): Device[] {
  const devices: Device[] = [];

  for (const host of data.hostTbl) {
    const mac = safeNormalizeMac(host.physaddress);
    if (!mac) {
      continue;
    }

    const hostname = host.hostname.trim();

    devices.push({
      mac,
      name: isMacLikeName(hostname, mac) ? mac : hostname,
      hostname,
      ip: host.ipaddress.trim(),
      medium: detectMedium(host.layer1interface),
      online: host.active,
    });
  }

  return devices;
}

export function toFilterAction(value: string): FilterAction {
  return value.trim().toLowerCase() === 'allow' ? 'Allow' : 'Block';
}

export function mapMacFilter(data: z.infer<typeof macFilterSchema>): MacFilterTable {
  const entries: MacFilterEntry[] = data.macfilterTbl
    .filter((row) => row.macaddress.trim())
    .map((row) => ({
      id: row.__id,
      mac: safeNormalizeMac(row.macaddress) || row.macaddress.trim().toUpperCase(),
      description: row.description,
      action: toFilterAction(row.type),
      alwaysBlock: row.alwaysblock,
      startTime: row.starttime,
      endTime: row.endtime,
      blockDays: row.blockdays,
      wireFields: toWireFields(row),
    }));

  return {
    enabled: data.enable,
    // An absent flag means the router's default, which lets everyone in.
    allowAll: data.allowall === '' ? true : ['true', '1'].includes(data.allowall.trim().toLowerCase()),
    entries,
    ids: collectIds(data.macfilterTbl),
  };
}

export function mapSiteFilter(data: z.infer<typeof siteFilterSchema>): SiteFilterTable {
  const entries: SiteFilterEntry[] = data.sitefilterTbl
    .filter((row) => row.site.trim())
    .map((row) => ({
      id: row.__id,
      site: row.site.trim(),
      blockMethod: row.blockmethod || 'URL',
      alwaysBlock: row.alwaysblock,
      wireFields: toWireFields(row),
    }));

  return {
    enabled: data.enable,
    entries,
    ids: collectIds(data.sitefilterTbl),
    trusted: data.sitetrustedTbl,
  };
}

/** Scalar fields of a parsed row as strings; nested values and nulls are left out. */
function toWireFields(row: Record<string, unknown>): Record<string, string> {
  const fields: Record<string, string> = {};

  for (const [key, value] of Object.entries(row)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      fields[key] = String(value);
    }
  }

  return fields;
}

function collectIds(rows: Array<{ __id: number | null }>): number[] {
  return rows.map((row) => row.__id).filter((id): id is number => id !== null);
}
