import { ComputeClientError, describeCause } from '../errors.js';
import type { ErrorCode } from '../errors.js';
import type { LogFn, QueryParams, TimingFn } from '../types.js';

export const USER_AGENT = 'computectl/0.1.0';
export const DEFAULT_TIMEOUT_MS = 30000;

const REDACTED = '<redacted>';

export type HttpMethod = 'GET' | 'POST';

export interface JsonRequestInput {
  method: HttpMethod;
  url: URL;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs?: number;
  /** Error code used when the server cannot be reached or times out. */
  transportErrorCode: Extract<
    ErrorCode,
    'ENDPOINT_UNREACHABLE' | 'TRANSIENT_REQUEST_ERROR'
  >;
  log?: LogFn;
  /** Called once per completed round trip. */
  onTiming?: TimingFn;
}

export type DecodedBody =
  | { bodyType: 'empty' }
  | { bodyType: 'json'; bodyJson: unknown }
  | { bodyType: 'text'; bodyText: string };

export type JsonResponse = {
  status: number;
  headers: Record<string, string>;
} & DecodedBody;

export async function executeJsonRequest(
  input: JsonRequestInput,
): Promise<JsonResponse> {
  const timeoutMs = input.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const headers: Record<string, string> = {
    'user-agent': USER_AGENT,
    accept: 'application/json',
    ...(input.headers ?? {}),
  };

  let body: string | undefined;
  if (input.body !== undefined) {
    body = JSON.stringify(input.body);
    if (!hasHeader(headers, 'content-type')) {
      headers['content-type'] = 'application/json';
    }
  }

  input.log?.(
    `REQ: ${input.method} ${input.url.toString()} headers=${JSON.stringify(
      redactHeaders(headers),
    )}${body !== undefined ? ` body=${JSON.stringify(redactJson(input.body))}` : ''}`,
  );

  const start = Date.now();
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(input.url, {
      method: input.method,
      headers,
      body,
      signal: controller.signal,
    });
    const decoded = await decodeResponseBody(response);
    const elapsedMs = Date.now() - start;

    input.log?.(
      `RESP: [${response.status}] ${input.method} ${input.url.toString()} ${elapsedMs}ms`,
    );
    input.onTiming?.({
      method: input.method,
      url: input.url.toString(),
      elapsedMs,
    });

    return {
      status: response.status,
      headers: Object.fromEntries(response.headers.entries()),
      ...decoded,
    };
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new ComputeClientError(
        input.transportErrorCode,
        `Request timed out after ${timeoutMs}ms`,
        { url: input.url.toString(), method: input.method },
      );
    }

    throw new ComputeClientError(input.transportErrorCode, 'Request failed', {
      url: input.url.toString(),
      method: input.method,
      cause: describeCause(error),
    });
  } finally {
    clearTimeout(timeout);
  }
}

export function appendQueryParams(url: URL, query: QueryParams): void {
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) {
      continue;
    }

    if (Array.isArray(value)) {
      for (const item of value) {
        url.searchParams.append(key, String(item));
      }
      continue;
    }

    url.searchParams.append(key, String(value));
  }
}

export function joinUrl(base: string, path: string): string {
  const trimmedBase = base.replace(/\/+$/, '');
  const trimmedPath = path.replace(/^\/+/, '');
  return `${trimmedBase}/${trimmedPath}`;
}

export function responseBodyForError(response: JsonResponse): unknown {
  if (response.bodyType === 'json') {
    return response.bodyJson;
  }
  if (response.bodyType === 'text') {
    return response.bodyText;
  }
  return undefined;
}

async function decodeResponseBody(response: Response): Promise<DecodedBody> {
  if (response.status === 204 || response.status === 205) {
    return { bodyType: 'empty' };
  }

  const text = await response.text();
  if (!text) {
    return { bodyType: 'empty' };
  }

  const contentType = response.headers.get('content-type') ?? '';
  if (contentType.toLowerCase().includes('json')) {
    try {
      return {
        bodyType: 'json',
        bodyJson: JSON.parse(text),
      };
    } catch {
      return { bodyType: 'text', bodyText: text };
    }
  }

  return { bodyType: 'text', bodyText: text };
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  return Object.keys(headers).some(
    (key) => key.toLowerCase() === name.toLowerCase(),
  );
}

export function redactHeaders(
  headers: Record<string, string>,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    const lower = key.toLowerCase();
    if (
      lower === 'authorization' ||
      lower === 'x-auth-token' ||
      lower === 'x-subject-token' ||
      lower.includes('api-key') ||
      lower === 'cookie'
    ) {
      result[key] = REDACTED;
      continue;
    }
    result[key] = value;
  }
  return result;
}

export function redactJson(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactJson(item));
  }

  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = key.toLowerCase() === 'password' ? REDACTED : redactJson(item);
    }
    return out;
  }

  return value;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}
