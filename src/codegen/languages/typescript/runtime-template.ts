/**
 * Shared runtime module
 *
 * Every group module imports its request helpers from here, so URL
 * resolution and response decoding live in one place per output tree.
 */

import { getBackendUrl, getTargetEnvironment, type GeneratorConfig } from '../../../config.js';
import { escapeSingleQuoted } from '../../utils/naming.js';

export const GENERATED_HEADER = [
  '// Generated by typed-routes. Manual edits are overwritten on the next run.',
  '/* eslint-disable */',
].join('\n');

const RESULT_TYPE = `/**
 * Outcome of a generated call. Failures carry a message instead of throwing.
 */
export type ApiResult<T> =
  | { success: true; status: number; data: T; error?: undefined }
  | { success: false; status: number; error: string; data?: undefined };`;

const URL_HELPERS = `export function buildUrl(path: string, query: Array<[string, unknown]> = []): string {
  const params = new URLSearchParams();
  for (const [key, value] of query) {
    if (value === undefined || value === null) continue;
    if (Array.isArray(value)) {
      for (const item of value) {
        if (item !== undefined && item !== null) params.append(key, String(item));
      }
    } else {
      params.append(key, String(value));
    }
  }
  const search = params.toString();
  return search ? \`\${getBaseUrl()}\${path}?\${search}\` : \`\${getBaseUrl()}\${path}\`;
}

export function encodePathParam(value: unknown): string {
  return encodeURIComponent(String(value));
}

/** Encodes each segment of a catch-all value, keeping its slashes */
export function encodeRestParam(value: unknown): string {
  return String(value).split('/').map(encodeURIComponent).join('/');
}

export function buildHeaders(base: HeadersInit | undefined, entries: Array<[string, unknown]>): Headers {
  const headers = new Headers(base);
  for (const [name, value] of entries) {
    if (value !== undefined && value !== null) headers.set(name, String(value));
  }
  return headers;
}`;

const RESPONSE_HELPERS = `async function readBody(response: Response): Promise<unknown> {
  if (response.status === 204) return null;
  const text = await response.text();
  if (text === '') return null;
  const contentType = response.headers.get('content-type') ?? '';
  return contentType.includes('json') ? JSON.parse(text) : text;
}

function errorMessage(payload: unknown): string | undefined {
  if (typeof payload === 'string') return payload || undefined;
  if (typeof payload !== 'object' || payload === null) return undefined;
  if ('detail' in payload) {
    const detail = payload.detail;
    if (typeof detail === 'string') return detail;
    if (Array.isArray(detail) && detail.length > 0) {
      return detail
        .map(item => (typeof item === 'object' && item !== null && 'msg' in item ? String(item.msg) : String(item)))
        .join('; ');
    }
  }
  if ('message' in payload && typeof payload.message === 'string') return payload.message;
  return undefined;
}

export async function handleResponse<T>(response: Response): Promise<ApiResult<T>> {
  const payload = await readBody(response);
  if (!response.ok) {
    return {
      success: false,
      status: response.status,
      error: errorMessage(payload) ?? (response.statusText || \`Request failed with status \${response.status}\`),
    };
  }
  return { success: true, status: response.status, data: payload as T };
}

export async function request<T>(url: string, init: RequestInit): Promise<ApiResult<T>> {
  try {
    const response = await fetch(url, init);
    return await handleResponse<T>(response);
  } catch (error) {
    return { success: false, status: 0, error: error instanceof Error ? error.message : String(error) };
  }
}`;

/**
 * `getBaseUrl()` for the target environment. With a framework integration
 * in unified mode, server-side code calls the backend directly because a
 * relative URL has no origin there.
 */
export function renderBaseUrl(config: GeneratorConfig): string {
  const environment = getTargetEnvironment(config);
  // Route paths start with a slash
  const apiUrl = environment.apiUrl.replace(/\/+$/, '');
  const lines = [`const API_URL = '${escapeSingleQuoted(apiUrl)}';`];

  if (environment.mode === 'unified' && config.framework !== null) {
    lines.push(
      `const BACKEND_URL = '${escapeSingleQuoted(getBackendUrl(config))}';`,
      '',
      'export function getBaseUrl(): string {',
      "  return 'window' in globalThis ? API_URL : BACKEND_URL;",
      '}'
    );
  } else {
    lines.push('', 'export function getBaseUrl(): string {', '  return API_URL;', '}');
  }

  return lines.join('\n');
}

export function renderRuntime(config: GeneratorConfig): string {
  return [GENERATED_HEADER, RESULT_TYPE, renderBaseUrl(config), URL_HELPERS, RESPONSE_HELPERS].join('\n\n') + '\n';
}
