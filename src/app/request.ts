/**
 * Generic `request` command shared by the HTTP targets.
 */

import type { ApiResponse } from '../http/invoker.js';
import { type ResultFormat, shapeResult } from '../result/shape.js';
import type { RequestOptions } from '../targets/target.js';

export interface RequestCommandOptions {
  method?: string;
  body?: string;
  /** `name:value` pairs as given on the command line. */
  header?: string[];
  raw?: boolean;
  format?: ResultFormat;
}

/** Parse `name:value` header arguments. The value is everything after the first colon. */
export function parseHeaderArgs(args: string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const arg of args) {
    const idx = arg.indexOf(':');
    const name = idx === -1 ? '' : arg.slice(0, idx).trim();
    if (name === '') {
      throw new Error(`Invalid header '${arg}': expected <name>:<value>`);
    }
    headers[name.toLowerCase()] = arg.slice(idx + 1).trim();
  }
  return headers;
}

export function toRequestOptions(options: RequestCommandOptions): RequestOptions {
  return {
    method: options.method,
    body: options.body,
    headers: parseHeaderArgs(options.header ?? []),
  };
}

/** Shape a response body per the command's `--raw` / format options. */
export function shapeResponse(response: ApiResponse, options: RequestCommandOptions): unknown {
  return shapeResult(response.body, {
    raw: options.raw,
    format: options.format,
    contentType: response.headers['content-type'],
  });
}

/** Issue the request through a connected client and shape its body. */
export async function runRequest(
  client: { request(endpoint: string, options?: RequestOptions): Promise<ApiResponse> },
  endpoint: string,
  options: RequestCommandOptions,
): Promise<unknown> {
  const response = await client.request(endpoint, toRequestOptions(options));
  return shapeResponse(response, options);
}
