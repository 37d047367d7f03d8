'use strict';

import * as http from 'http';
import * as https from 'https';

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequest {
  url: URL;
  method: HttpMethod;
  headers: Record<string, string>;
  timeoutMs: number;
  allowInsecureTls: boolean;
  body?: string;
}

export interface HttpResponse {
  statusCode: number;
  body: string;
  headers: http.IncomingHttpHeaders;
}

/** Anything that can carry a router request; swapped for a fake in tests. */
export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

export const performHttpRequest: HttpTransport = (input) => {
  const {
    url,
    method,
    headers,
    timeoutMs,
    allowInsecureTls,
    body,
  } = input;

  return new Promise((resolve, reject) => {
    const requestHeaders: Record<string, string> = {
      Connection: 'close',
      ...headers,
    };

    if (body !== undefined) {
      requestHeaders['Content-Length'] = String(Buffer.byteLength(body, 'utf8'));
    }

    const options: https.RequestOptions = {
      method,
      protocol: url.protocol,
      hostname: url.hostname,
      port: url.port ? Number(url.port) : undefined,
      path: `${url.pathname}${url.search}`,
      headers: requestHeaders,
    };

    if (url.protocol === 'https:') {
      options.agent = new https.Agent({
        rejectUnauthorized: !allowInsecureTls,
      });
    }

    const transport = url.protocol === 'https:' ? https : http;

    const req = transport.request(options, (res) => {
      const chunks: Buffer[] = [];

      res.on('data', (chunk: Buffer | string) => {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      });

      res.on('end', () => {
        resolve({
          statusCode: res.statusCode ?? 0,
          body: Buffer.concat(chunks).toString('utf8'),
          headers: res.headers,
        });
      });

      res.on('error', reject);
    });

    req.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'ECONNRESET') {
        reject(new Error('Connection reset by router (ECONNRESET). Check base URL protocol/port and TLS setting.'));
        return;
      }

      if (error.code === 'ECONNREFUSED') {
        reject(new Error(`Connection refused by ${url.host}. Check the router base URL.`));
        return;
      }

      reject(error);
    });

    req.setTimeout(timeoutMs, () => {
      req.destroy(new Error(`Router request timed out after ${timeoutMs}ms.`));
    });

    if (body) {
      req.write(body);
    }

    req.end();
  });
};

export function encodeForm(fields: Record<string, string> | URLSearchParams): string {
  const params = fields instanceof URLSearchParams ? fields : new URLSearchParams(fields);
  return params.toString();
}
