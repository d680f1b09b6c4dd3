import { request as httpRequest, type IncomingHttpHeaders } from 'node:http';
import { request as httpsRequest } from 'node:https';

import { ApiError, ConnectionError } from '../errors.js';
import { debugLog } from '../log.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

const METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'];

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface ApiRequest {
  baseUrl: string;
  endpoint: string;
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  skipCertificateCheck?: boolean;
  timeoutMs?: number;
}

export interface ApiResponse {
  status: number;
  body: string;
  /** Header names are lower-case; repeated headers are joined with ", ". */
  headers: Record<string, string>;
}

export function parseMethod(method: string): HttpMethod {
  const upper = method.trim().toUpperCase();
  const found = METHODS.find((m) => m === upper);
  if (found === undefined) {
    throw new Error(`Invalid HTTP method: ${method}`);
  }
  return found;
}

/** Join a base URL and an endpoint path with exactly one slash between them. */
export function joinUrl(baseUrl: string, endpoint: string): string {
  if (/^https?:\/\//i.test(endpoint)) return endpoint;
  const base = baseUrl.replace(/\/+$/, '');
  if (endpoint === '') return base;
  return `${base}/${endpoint.replace(/^\/+/, '')}`;
}

/** Prefix `https://` onto a bare host name. */
export function normalizeBaseUrl(server: string): string {
  const trimmed = server.trim().replace(/\/+$/, '');
  if (/^https?:\/\//i.test(trimmed)) return trimmed;
  return `https://${trimmed}`;
}

export function basicAuth(username: string, secret: string): string {
  return `Basic ${Buffer.from(`${username}:${secret}`, 'utf8').toString('base64')}`;
}

function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    out[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return out;
}

function send(
  url: URL,
  method: HttpMethod,
  headers: Record<string, string>,
  body: Buffer | null,
  timeoutMs: number,
  skipCertificateCheck: boolean,
): Promise<ApiResponse> {
  const isHttps = url.protocol === 'https:';
  const reqFn = isHttps ? httpsRequest : httpRequest;

  return new Promise((resolve, reject) => {
    const req = reqFn(
      {
        protocol: url.protocol,
        hostname: url.hostname,
        port: url.port ? Number(url.port) : undefined,
        path: `${url.pathname}${url.search}`,
        method,
        headers: body === null ? headers : { ...headers, 'content-length': String(body.length) },
        ...(isHttps ? { rejectUnauthorized: !skipCertificateCheck } : {}),
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('error', (err) => reject(err));
        res.on('end', () => {
          resolve({
            status: res.statusCode ?? 0,
            body: Buffer.concat(chunks).toString('utf8'),
            headers: flattenHeaders(res.headers),
          });
        });
      },
    );

    req.on('error', (err) => reject(err));
    req.setTimeout(timeoutMs, () => {
      req.destroy(new Error(`timed out after ${timeoutMs}ms`));
    });
    if (body !== null) req.write(body);
    req.end();
  });
}

/**
 * Perform one HTTP call.
 *
 * @throws ApiError on a non-2xx status (message carries status and body).
 * @throws ConnectionError when no response arrives (DNS, TLS, socket, timeout).
 */
export async function invokeApi(request: ApiRequest): Promise<ApiResponse> {
  const method = parseMethod(request.method ?? 'GET');
  const urlText = joinUrl(request.baseUrl, request.endpoint);
  const url = new URL(urlText);
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`Unsupported URL protocol: ${url.protocol}`);
  }

  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(request.headers ?? {})) {
    headers[name.toLowerCase()] = value;
  }
  const body = request.body === undefined ? null : Buffer.from(request.body, 'utf8');
  const timeoutMs = request.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const start = Date.now();

  let response: ApiResponse;
  try {
    response = await send(url, method, headers, body, timeoutMs, request.skipCertificateCheck ?? false);
  } catch (err: unknown) {
    debugLog('http', 'fetch_error', {
      method,
      url: urlText,
      duration_ms: Date.now() - start,
      cause: err instanceof Error ? err.message : String(err),
    });
    throw new ConnectionError(urlText, err);
  }

  debugLog('http', 'response', {
    method,
    url: urlText,
    status: response.status,
    duration_ms: Date.now() - start,
    body_length: response.body.length,
  });

  if (response.status < 200 || response.status >= 300) {
    throw new ApiError(method, urlText, response.status, response.body);
  }
  return response;
}
