'use strict';

export type ConnectionMedium = 'wired' | 'wifi-2.4ghz' | 'wifi-5ghz' | 'wifi' | 'unknown';

/** One row of the router's host table. */
export interface Device {
  mac: string;
  name: string;
  hostname: string;
  ip: string;
  medium: ConnectionMedium;
  online: boolean;
}

/** Address plus label, as stored in lockdown state and command results. */
export interface DeviceRef {
  mac: string;
  name: string;
}

export interface FailedDevice extends DeviceRef {
  error: string;
}

export type FilterAction = 'Allow' | 'Block';

export interface MacFilterEntry {
  /** Router-assigned `__id`; null for rows not yet written. */
  id: number | null;
  mac: string;
  description: string;
  action: FilterAction;
  alwaysBlock: boolean;
  startTime: string;
  endTime: string;
  blockDays: string;
  /** Row exactly as the router returned it; re-posted under the fields above on a rewrite. */
  wireFields?: Record<string, string>;
}

export interface MacFilterTable {
  enabled: boolean;
  allowAll: boolean;
  entries: MacFilterEntry[];
  /** Every `__id` in the raw table, blank rows included. */
  ids: number[];
}

export interface SiteFilterEntry {
  id: number | null;
  site: string;
  blockMethod: string;
  alwaysBlock: boolean;
  wireFields?: Record<string, string>;
}

export interface SiteFilterTable {
  enabled: boolean;
  entries: SiteFilterEntry[];
  ids: number[];
  /** `sitetrustedTbl` rows, carried through untouched. */
  trusted: Array<Record<string, string>>;
}

export interface AllowlistEntry {
  name: string;
  mac: string;
  reason: string;
}
