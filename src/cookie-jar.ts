'use strict';

/**
 * Minimal cookie store for a single host. Only name/value pairs are kept;
 * attributes such as Path or Expires are dropped.
 */
export class CookieJar {

  private cookies: Record<string, string> = {};

  get(name: string): string | undefined {
    return this.cookies[name];
  }

  clear() {
    this.cookies = {};
  }

  mergeFromSetCookie(setCookie: string[] | string | undefined) {
    let values: string[] = [];
    if (Array.isArray(setCookie)) {
      values = setCookie;
    } else if (setCookie) {
      values = [setCookie];
    }

    for (const value of values) {
      const cookiePair = value.split(';')[0]?.trim();
      if (!cookiePair) {
        continue;
      }

      const index = cookiePair.indexOf('=');
      if (index < 1) {
        continue;
      }

      const name = cookiePair.slice(0, index).trim();
      const cookieValue = cookiePair.slice(index + 1).trim();

      if (!name) {
        continue;
      }

      if (cookieValue === '' || /expires=thu, 01 jan 1970/i.test(value)) {
        delete this.cookies[name];
      } else {
        this.cookies[name] = cookieValue;
      }
    }
  }

  toHeader(): string | null {
    const pairs = Object.entries(this.cookies)
      .filter(([name, value]) => Boolean(name) && value.length > 0)
      .map(([name, value]) => `${name}=${value}`);

    if (!pairs.length) {
      return null;
    }

    return pairs.join('; ');
  }

}
