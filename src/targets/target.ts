import type { SessionScope } from '../session/context.js';
import { invokeApi, normalizeBaseUrl, type ApiResponse } from '../http/invoker.js';

/** Transport settings shared by every target client. */
export interface TransportOptions {
  skipCertificateCheck?: boolean;
  timeoutMs?: number;
}

/** Per-call options for a client's generic `request`. */
export interface RequestOptions {
  method?: string;
  body?: string;
  headers?: Record<string, string>;
}

/** Session keys every target scope uses. */
export const SERVER_KEY = 'server';
export const TOKEN_KEY = 'token';

/**
 * Base of the target clients: remembers the connected server in the
 * target's session scope and sends requests to it.
 */
export abstract class TargetClient {
  protected readonly scope: SessionScope;
  protected readonly transport: TransportOptions;

  protected constructor(scope: SessionScope, transport: TransportOptions) {
    this.scope = scope;
    this.transport = transport;
  }

  /** Base URL of the connected server. */
  protected baseUrl(): string {
    return normalizeBaseUrl(this.scope.sync<string>(SERVER_KEY, undefined, true));
  }

  /** Headers that authenticate a request against the connected server. */
  protected abstract authHeaders(): Record<string, string>;

  /** Headers every request carries unless overridden. */
  protected defaultHeaders(): Record<string, string> {
    return { accept: 'application/json' };
  }

  /** Content type of request bodies unless overridden. */
  protected defaultContentType(): string {
    return 'application/json';
  }

  protected async send(endpoint: string, options: RequestOptions = {}): Promise<ApiResponse> {
    const headers: Record<string, string> = { ...this.defaultHeaders() };
    if (options.body !== undefined) {
      headers['content-type'] = this.defaultContentType();
    }
    for (const [name, value] of Object.entries(options.headers ?? {})) {
      headers[name.toLowerCase()] = value;
    }
    return invokeApi({
      baseUrl: this.baseUrl(),
      endpoint,
      method: options.method ?? 'GET',
      headers: { ...headers, ...this.authHeaders() },
      body: options.body,
      skipCertificateCheck: this.transport.skipCertificateCheck,
      timeoutMs: this.transport.timeoutMs,
    });
  }

  /** Issue an arbitrary request against the connected server. */
  async request(endpoint: string, options: RequestOptions = {}): Promise<ApiResponse> {
    return this.send(endpoint, options);
  }
}
