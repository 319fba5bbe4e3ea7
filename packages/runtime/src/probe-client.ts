/**
 * @bgctl/runtime - HTTP Probe Client
 *
 * Single-shot requests against the pools and the public proxy port.
 * Every request carries a hard timeout; nothing is retried.
 */

import { request as httpRequest, type ClientRequest, type IncomingHttpHeaders } from 'node:http';
import { ProbeError, errorMessage } from '@bgctl/shared';

export type ProbeMethod = 'GET' | 'HEAD' | 'POST';

export interface ProbeRequest {
  method: ProbeMethod;
  url: string;
  timeoutMs?: number;
}

export interface ProbeResponse {
  statusCode: number;
  /** e.g. "HTTP/1.1 200 OK" */
  statusLine: string;
  /** Lower-cased header names */
  headers: Record<string, string>;
}

export interface ProbeClientOptions {
  timeoutMs?: number;
}

export function normalizeHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(headers)) {
    if (Array.isArray(v)) out[k.toLowerCase()] = v.join(', ');
    else if (typeof v === 'string') out[k.toLowerCase()] = v;
  }
  return out;
}

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

export function poolUrl(host: string, port: number, path: string): string {
  return `http://${host}:${port}${path}`;
}

export class ProbeClient {
  private readonly timeoutMs: number;

  constructor(options: ProbeClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  request(req: ProbeRequest): Promise<ProbeResponse> {
    const timeoutMs = req.timeoutMs ?? this.timeoutMs;

    return new Promise((resolve, reject) => {
      let settled = false;
      const settle = (fn: () => void) => {
        if (!settled) {
          settled = true;
          fn();
        }
      };

      let client: ClientRequest;
      try {
        client = httpRequest(
          req.url,
          {
            method: req.method,
            timeout: timeoutMs,
            headers: req.method === 'POST' ? { 'content-length': '0' } : {},
          },
          (res) => {
            // drain the body so the socket is released
            res.resume();
            const statusCode = res.statusCode ?? 0;
            settle(() =>
              resolve({
                statusCode,
                statusLine: `HTTP/${res.httpVersion} ${statusCode} ${res.statusMessage ?? ''}`.trimEnd(),
                headers: normalizeHeaders(res.headers),
              }),
            );
          },
        );
      } catch (error) {
        // invalid URL
        reject(new ProbeError(req.url, errorMessage(error)));
        return;
      }

      client.on('timeout', () => {
        client.destroy(new ProbeError(req.url, `timed out after ${timeoutMs}ms`));
      });

      client.on('error', (err) => {
        settle(() => reject(err instanceof ProbeError ? err : new ProbeError(req.url, err.message)));
      });

      client.end();
    });
  }

  get(url: string): Promise<ProbeResponse> {
    return this.request({ method: 'GET', url });
  }

  post(url: string): Promise<ProbeResponse> {
    return this.request({ method: 'POST', url });
  }
}
