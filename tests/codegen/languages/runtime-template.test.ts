import { resolveConfig } from '../../../src/config';
import {
  GENERATED_HEADER,
  renderBaseUrl,
  renderRuntime,
} from '../../../src/codegen/languages/typescript/runtime-template';

describe('renderBaseUrl', () => {
  test('uses the environment URL when no framework is configured', () => {
    expect(renderBaseUrl(resolveConfig())).toBe(
      [
        "const API_URL = '/api';",
        '',
        'export function getBaseUrl(): string {',
        '  return API_URL;',
        '}',
      ].join('\n')
    );
  });

  test('calls the backend directly on the server in unified mode', () => {
    const config = resolveConfig({ framework: 'sveltekit', backend: { port: 8001 } });

    expect(renderBaseUrl(config)).toBe(
      [
        "const API_URL = '/api';",
        "const BACKEND_URL = 'http://localhost:8001';",
        '',
        'export function getBaseUrl(): string {',
        "  return 'window' in globalThis ? API_URL : BACKEND_URL;",
        '}',
      ].join('\n')
    );
  });

  test('separate mode always uses the configured URL', () => {
    const config = resolveConfig({
      framework: 'nextjs',
      target: 'production',
      environments: { production: { mode: 'separate', apiUrl: 'https://api.example.com' } },
    });

    expect(renderBaseUrl(config).split('\n')).toEqual([
      "const API_URL = 'https://api.example.com';",
      '',
      'export function getBaseUrl(): string {',
      '  return API_URL;',
      '}',
    ]);
  });

  test('drops a trailing slash from the environment URL', () => {
    const config = resolveConfig({ environments: { development: { mode: 'separate', apiUrl: '/api/' } } });
    expect(renderBaseUrl(config).split('\n')[0]).toBe("const API_URL = '/api';");
  });
});

describe('renderRuntime', () => {
  const runtime = renderRuntime(resolveConfig());

  test('starts with the generated header and ends with a newline', () => {
    expect(runtime.startsWith(`${GENERATED_HEADER}\n\n/**\n`)).toBe(true);
    expect(runtime.endsWith('}\n')).toBe(true);
  });

  test('exports the result type and every helper group modules import', () => {
    expect(runtime).toContain('export type ApiResult<T> =');
    expect(runtime).toContain('export function buildUrl(path: string, query: Array<[string, unknown]> = []): string {');
    expect(runtime).toContain('export function encodePathParam(value: unknown): string {');
    expect(runtime).toContain('export function encodeRestParam(value: unknown): string {');
    expect(runtime).toContain(
      'export function buildHeaders(base: HeadersInit | undefined, entries: Array<[string, unknown]>): Headers {'
    );
    expect(runtime).toContain('export async function request<T>(url: string, init: RequestInit): Promise<ApiResult<T>> {');
  });

  test('an empty body decodes to null before any JSON parsing', () => {
    expect(runtime).toContain(
      [
        'async function readBody(response: Response): Promise<unknown> {',
        '  if (response.status === 204) return null;',
        '  const text = await response.text();',
        "  if (text === '') return null;",
        "  const contentType = response.headers.get('content-type') ?? '';",
        "  return contentType.includes('json') ? JSON.parse(text) : text;",
        '}',
      ].join('\n')
    );
  });
});
