'use strict';

import type { ZodType, ZodTypeDef } from 'zod';

import type { RouterSettings } from '../config';
import { CookieJar } from '../cookie-jar';
import {
  AuthFailureError,
  ProtocolError,
  RouterError,
  SessionExpiredError,
  TransportError,
} from '../errors';
import {
  encodeForm,
  performHttpRequest,
  type HttpMethod,
  type HttpResponse,
  type HttpTransport,
} from '../http';
import { createLogger, describeError, type Logger } from '../logger';
import type {
  Device,
  MacFilterEntry,
  MacFilterTable,
  SiteFilterEntry,
  SiteFilterTable,
} from '../types';
import { deriveCredential, SALT_REQUEST_SENTINEL } from './credentials';
import {
  encodeFilterTableWrite,
  macEntryFields,
  nextFilterIndex,
  siteEntryFields,
  toRows,
  type FilterEncoding,
  type FilterTableWrite,
} from './filter-table';
import {
  envelopeSchema,
  hostTableSchema,
  macFilterSchema,
  mapHostTable,
  mapMacFilter,
  mapSiteFilter,
  saltResponseSchema,
  siteFilterSchema,
  type RouterEnvelope,
} from './wire';

export const ROUTER_PATHS = {
  root: '/',
  login: '/api/v1/session/login',
  logout: '/api/v1/session/logout',
  menu: '/api/v1/session/menu',
  host: '/api/v1/host',
  macFilter: '/api/v1/macfilter',
  siteFilter: '/api/v1/sitefilter',
} as const;

const AUTH_COOKIE = 'auth';

const SESSION_ERROR_PATTERN = /session|login|auth|csrf|token|permission|denied/i;

export interface RouterSessionOptions {
  transport?: HttpTransport;
  logger?: Logger;
}

export interface MacFilterWriteOptions {
  allowAll: boolean;
  /** Defaults to on whenever the table has rows or allow-all is off. */
  enabled?: boolean;
  encoding?: FilterEncoding;
}

export interface SiteFilterWriteOptions {
  enabled?: boolean;
  trusted?: Array<Record<string, string>>;
  encoding?: FilterEncoding;
}

interface CallOptions {
  form?: URLSearchParams | Record<string, string>;
  timeoutMs: number;
}

/**
 * The one authenticated session against the router's web API. The router keeps
 * a single live session, so every component shares this instance and every
 * write re-validates the session first.
 */
export class RouterSession {

  private readonly cookies = new CookieJar();

  private readonly transport: HttpTransport;

  private readonly logger: Logger;

  private csrfToken: string | null = null;

  private loggedIn = false;

  private authFailure: AuthFailureError | null = null;

  private lastError: RouterError | null = null;

  constructor(private settings: RouterSettings, options: RouterSessionOptions = {}) {
    this.transport = options.transport ?? performHttpRequest;
    this.logger = options.logger ?? createLogger('router');
  }

  get isLoggedIn(): boolean {
    return this.loggedIn;
  }

  /** Most recent failure, cleared by a successful login. */
  get lastFailure(): RouterError | null {
    return this.authFailure ?? this.lastError;
  }

  updateCredentials(username: string, password: string) {
    this.settings = { ...this.settings, username, password };
    this.authFailure = null;
    this.invalidate();
  }

  async login(): Promise<boolean> {
    this.invalidate();

    const { username, password } = this.settings;
    if (!username || !password) {
      this.authFailure = new AuthFailureError('Router username and password are not configured.');
      this.logger.error(this.authFailure.message);
      return false;
    }

    try {
      await this.preflight();

      const saltEnvelope = await this.request('POST', ROUTER_PATHS.login, {
        form: { username, password: SALT_REQUEST_SENTINEL },
        timeoutMs: this.settings.readTimeoutMs,
      });
      if (saltEnvelope.error !== 'ok') {
        throw new ProtocolError(`Router refused the salt request: ${describeEnvelope(saltEnvelope)}.`);
      }

      const salts = saltResponseSchema.parse(saltEnvelope);
      const credential = deriveCredential(password, salts.salt, salts.saltwebui);

      const loginEnvelope = await this.request('POST', ROUTER_PATHS.login, {
        form: { username, password: credential },
        timeoutMs: this.settings.readTimeoutMs,
      });
      if (loginEnvelope.error !== 'ok') {
        throw new AuthFailureError(`Router rejected the credentials for "${username}": ${describeEnvelope(loginEnvelope)}.`);
      }

      this.csrfToken = this.cookies.get(AUTH_COOKIE) ?? '';

      // The web UI reads the menu once after login; the session is not usable before that.
      await this.send('GET', ROUTER_PATHS.menu, undefined, this.settings.readTimeoutMs);

      this.loggedIn = true;
      this.authFailure = null;
      this.lastError = null;
      this.logger.log(`Logged in to ${this.settings.baseUrl} as "${username}".`);
      return true;
    } catch (error) {
      const failure = toRouterError(error);
      if (failure instanceof AuthFailureError) {
        this.authFailure = failure;
      }
      this.lastError = failure;
      this.invalidate();
      this.logger.error('Router login failed:', failure.message);
      return false;
    }
  }

  async ensureLoggedIn(): Promise<boolean> {
    if (this.authFailure) {
      return false;
    }

    if (this.loggedIn) {
      try {
        const response = await this.send('GET', ROUTER_PATHS.menu, undefined, this.settings.probeTimeoutMs);
        if (response.statusCode === 200 && !isBusinessError(response.body)) {
          return true;
        }
        this.logger.log(`Session probe answered HTTP ${response.statusCode}, logging in again.`);
      } catch (error) {
        this.logger.log('Session probe failed, logging in again:', describeError(error));
      }
      this.invalidate();
    }

    return this.login();
  }

  /** Drops the session; the next call logs in from scratch. */
  invalidate() {
    this.loggedIn = false;
    this.csrfToken = null;
    this.cookies.clear();
  }

  async logout() {
    if (!this.loggedIn) {
      return;
    }

    try {
      await this.send('POST', ROUTER_PATHS.logout, '', this.settings.probeTimeoutMs);
      this.logger.log('Logged out of router.');
    } catch (error) {
      this.logger.error('Router logout failed:', describeError(error));
    } finally {
      this.invalidate();
    }
  }

  /** Host table as devices. Never throws; failures come back as an empty list. */
  async getDevices(): Promise<Device[]> {
    try {
      return await this.authenticated(async () => {
        const envelope = await this.call('GET', ROUTER_PATHS.host, { timeoutMs: this.settings.readTimeoutMs });
        return mapHostTable(parseData(hostTableSchema, envelope, 'Host table'));
      });
    } catch (error) {
      this.lastError = toRouterError(error);
      this.logger.error('Fetching devices failed:', this.lastError.message);
      return [];
    }
  }

  async readMacFilterTable(): Promise<MacFilterTable> {
    return this.authenticated(() => this.fetchMacFilter());
  }

  /** Replaces the whole MAC filter table. */
  async writeMacFilterTable(entries: MacFilterEntry[], options: MacFilterWriteOptions): Promise<void> {
    const enabled = options.enabled ?? (entries.length > 0 || !options.allowAll);

    await this.authenticated(() => this.writeTable(ROUTER_PATHS.macFilter, {
      table: 'macfilterTbl',
      flags: { enable: String(enabled), allowall: String(options.allowAll) },
      rows: toRows(entries, macEntryFields),
    }, options.encoding ?? 'bulk'));
  }

  /**
   * Adds one row at the next free index without resending the rest of the
   * table. Keeps the router's current allow-all flag unless told otherwise.
   */
  async appendMacFilterEntry(entry: MacFilterEntry, options: { allowAll?: boolean } = {}): Promise<number> {
    return this.authenticated(async () => {
      const table = await this.fetchMacFilter();
      const index = nextFilterIndex(table.ids);

      await this.writeTable(ROUTER_PATHS.macFilter, {
        table: 'macfilterTbl',
        flags: { enable: 'true', allowall: String(options.allowAll ?? table.allowAll) },
        rows: [{ index, fields: macEntryFields(entry) }],
      }, 'indexed');

      return index;
    });
  }

  async readSiteFilterTable(): Promise<SiteFilterTable> {
    return this.authenticated(() => this.fetchSiteFilter());
  }

  async writeSiteFilterTable(entries: SiteFilterEntry[], options: SiteFilterWriteOptions = {}): Promise<void> {
    const enabled = options.enabled ?? entries.length > 0;

    await this.authenticated(() => this.writeTable(ROUTER_PATHS.siteFilter, {
      table: 'sitefilterTbl',
      flags: { enable: String(enabled) },
      rows: toRows(entries, siteEntryFields),
      companions: options.trusted ? { sitetrustedTbl: options.trusted } : undefined,
    }, options.encoding ?? 'bulk'));
  }

  async appendSiteFilterEntry(entry: SiteFilterEntry): Promise<number> {
    return this.authenticated(async () => {
      const table = await this.fetchSiteFilter();
      const index = nextFilterIndex(table.ids);

      await this.writeTable(ROUTER_PATHS.siteFilter, {
        table: 'sitefilterTbl',
        flags: { enable: 'true' },
        rows: [{ index, fields: siteEntryFields(entry) }],
      }, 'indexed');

      return index;
    });
  }

  /**
   * Runs an operation on a verified session. A session that dies mid-call
   * gets one fresh login and one retry.
   */
  private async authenticated<T>(operation: () => Promise<T>): Promise<T> {
    if (!(await this.ensureLoggedIn())) {
      throw this.lastFailure ?? new SessionExpiredError('Could not establish a router session.');
    }

    try {
      return await operation();
    } catch (error) {
      if (!(error instanceof SessionExpiredError)) {
        throw error;
      }

      this.logger.log('Router session expired during a call, logging in again:', error.message);
      if (!(await this.login())) {
        throw this.lastFailure ?? error;
      }

      return operation();
    }
  }

  private async fetchMacFilter(): Promise<MacFilterTable> {
    const envelope = await this.call('GET', ROUTER_PATHS.macFilter, { timeoutMs: this.settings.readTimeoutMs });
    return mapMacFilter(parseData(macFilterSchema, envelope, 'MAC filter table'));
  }

  private async fetchSiteFilter(): Promise<SiteFilterTable> {
    const envelope = await this.call('GET', ROUTER_PATHS.siteFilter, { timeoutMs: this.settings.readTimeoutMs });
    return mapSiteFilter(parseData(siteFilterSchema, envelope, 'Site filter table'));
  }

  private async writeTable(path: string, write: FilterTableWrite, encoding: FilterEncoding) {
    const form = encodeFilterTableWrite(write, encoding);
    await this.call('POST', path, { form, timeoutMs: this.settings.writeTimeoutMs });
    this.logger.log(`Wrote ${write.rows.length} ${write.table} row(s) (${encoding}).`);
  }

  private async preflight() {
    for (const preflightPath of [ROUTER_PATHS.root, ROUTER_PATHS.menu]) {
      try {
        await this.send('GET', preflightPath, undefined, this.settings.readTimeoutMs);
      } catch (error) {
        // Only primes cookies; the login call reports real connectivity problems.
        this.logger.log(`Preflight ${preflightPath} failed:`, describeError(error));
      }
    }
  }

  /** Request that must come back with `error: "ok"`. */
  private async call(method: HttpMethod, path: string, options: CallOptions): Promise<RouterEnvelope> {
    const envelope = await this.request(method, path, options);

    if (envelope.error !== 'ok') {
      const detail = describeEnvelope(envelope);
      if (SESSION_ERROR_PATTERN.test(detail)) {
        this.invalidate();
        throw new SessionExpiredError(`Router session rejected on ${path}: ${detail}.`);
      }
      throw new ProtocolError(`Router rejected ${method} ${path}: ${detail}.`);
    }

    return envelope;
  }

  private async request(method: HttpMethod, path: string, options: CallOptions): Promise<RouterEnvelope> {
    const body = options.form === undefined ? undefined : encodeForm(options.form);
    const response = await this.send(method, path, body, options.timeoutMs);

    if (response.statusCode !== 200) {
      this.invalidate();
      throw new SessionExpiredError(`Router answered HTTP ${response.statusCode} on ${path}.`);
    }

    const trimmed = response.body.trim();
    if (trimmed.startsWith('<')) {
      this.invalidate();
      throw new SessionExpiredError(`Router answered ${path} with an HTML page instead of JSON.`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (error) {
      throw new ProtocolError(`Router answered ${path} with a body that is not JSON.`);
    }

    const envelope = envelopeSchema.safeParse(parsed);
    if (!envelope.success) {
      throw new ProtocolError(`Router answered ${path} without an error field.`);
    }

    return envelope.data;
  }

  private async send(method: HttpMethod, path: string, body: string | undefined, timeoutMs: number): Promise<HttpResponse> {
    const headers: Record<string, string> = {
      Accept: 'application/json, text/javascript, */*; q=0.01',
      'User-Agent': 'Mozilla/5.0 (compatible; lanwatch/1.0)',
      'X-Requested-With': 'XMLHttpRequest',
      Referer: `${this.settings.baseUrl}/`,
    };

    const cookieHeader = this.cookies.toHeader();
    if (cookieHeader) {
      headers.Cookie = cookieHeader;
    }

    if (this.csrfToken !== null) {
      headers['X-CSRF-TOKEN'] = this.csrfToken;
    }

    if (body !== undefined) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded; charset=UTF-8';
    }

    let response: HttpResponse;
    try {
      response = await this.transport({
        url: new URL(path, `${this.settings.baseUrl}/`),
        method,
        headers,
        timeoutMs,
        allowInsecureTls: this.settings.allowInsecureTls,
        body,
      });
    } catch (error) {
      throw new TransportError(`${method} ${path} failed: ${describeError(error)}`, { cause: error });
    }

    this.cookies.mergeFromSetCookie(response.headers['set-cookie']);
    return response;
  }

}

export function toRouterError(error: unknown): RouterError {
  if (error instanceof RouterError) {
    return error;
  }

  return new ProtocolError(describeError(error), { cause: error });
}

function describeEnvelope(envelope: RouterEnvelope): string {
  return envelope.message || envelope.error || 'no error code';
}

function isBusinessError(body: string): boolean {
  const trimmed = body.trim();
  if (!trimmed) {
    return false;
  }

  if (trimmed.startsWith('<')) {
    return true;
  }

  try {
    const parsed = envelopeSchema.safeParse(JSON.parse(trimmed));
    return parsed.success && parsed.data.error !== '' && parsed.data.error !== 'ok';
  } catch (error) {
    return false;
  }
}

function parseData<T>(schema: ZodType<T, ZodTypeDef, unknown>, envelope: RouterEnvelope, label: string): T {
  const result = schema.safeParse(envelope.data ?? {});
  if (!result.success) {
    throw new ProtocolError(`${label} has an unexpected shape.`);
  }

  return result.data;
}
