/**
 * Route functions
 *
 * Each route becomes one `export async function` that builds the URL,
 * headers and body from its arguments and resolves to an `ApiResult`.
 */

import { GenerationError } from '../../../errors.js';
import { uniqueName } from '../../ir/builder.js';
import type { ModelId, Parameter, Route } from '../../ir/types.js';
import {
  escapeSingleQuoted,
  escapeTemplateLiteral,
  toHeaderName,
  toPropertyKey,
  toValidIdentifier,
} from '../../utils/naming.js';
import type { TypeMapper } from '../types.js';
import { renderDocComment } from './doc-comment.js';
import type { RenderedDeclaration } from './model-template.js';

export const RUNTIME_HELPERS = [
  'buildHeaders',
  'buildUrl',
  'encodePathParam',
  'encodeRestParam',
  'request',
] as const;

export type RuntimeHelper = (typeof RUNTIME_HELPERS)[number];

export interface RenderedRoute extends RenderedDeclaration {
  helpers: Set<RuntimeHelper>;
  references: Set<ModelId>;
}

export interface PathPlaceholder {
  name: string;
  /** `{name:path}` matches the remaining path, slashes included */
  rest: boolean;
  raw: string;
}

interface Argument {
  param: Parameter;
  identifier: string;
  typeText: string;
}

const PLACEHOLDER = /\{([^}:]+)(?::([^}]+))?\}/g;

/**
 * Placeholders of a path template, in order of appearance
 */
export function parsePathTemplate(path: string): PathPlaceholder[] {
  return [...path.matchAll(PLACEHOLDER)].map(match => ({
    name: match[1],
    rest: match[2] === 'path',
    raw: match[0],
  }));
}

/**
 * Pair each placeholder with exactly one path parameter
 *
 * @throws {GenerationError} When a placeholder has no parameter, appears
 * twice, or a path parameter has no placeholder
 */
export function matchPathParameters(route: Route): Array<{ placeholder: PathPlaceholder; param: Parameter }> {
  const placeholders = parsePathTemplate(route.path);
  const pathParams = route.parameters.filter(param => param.location === 'path');
  const seen = new Set<string>();

  const matched = placeholders.map(placeholder => {
    if (seen.has(placeholder.name)) {
      throw new GenerationError(`Placeholder "${placeholder.raw}" appears twice in ${route.path}`, {
        route: route.name,
      });
    }
    seen.add(placeholder.name);

    const param = pathParams.find(p => p.name === placeholder.name);
    if (!param) {
      throw new GenerationError(
        `Placeholder "${placeholder.raw}" in ${route.path} has no matching path parameter`,
        { route: route.name, parameter: placeholder.name }
      );
    }
    return { placeholder, param };
  });

  const orphan = pathParams.find(param => !seen.has(param.name));
  if (orphan) {
    throw new GenerationError(`Path parameter "${orphan.name}" does not appear in ${route.path}`, {
      route: route.name,
      parameter: orphan.name,
    });
  }

  return matched;
}

function describeParameter(argument: Argument): string | null {
  const { param, identifier } = argument;
  const parts: string[] = [];
  if (param.description) parts.push(param.description);
  if (param.default) parts.push(`(default: ${JSON.stringify(param.default.value)})`);
  return parts.length > 0 ? `@param ${identifier} - ${parts.join(' ')}` : null;
}

/**
 * Render one route function
 *
 * Argument order: path parameters in template order, then required and
 * finally optional parameters in declaration order, then `options`.
 */
export function renderRoute(route: Route, functionName: string, mapper: TypeMapper): RenderedRoute {
  const warnings: RenderedRoute['warnings'] = [];
  const references = new Set<ModelId>();
  const helpers = new Set<RuntimeHelper>(['request', 'buildUrl']);
  const taken = new Set<string>([...RUNTIME_HELPERS, 'options', 'JSON']);

  const toArgument = (param: Parameter): Argument => {
    const mapped = mapper.map(param.type);
    mapped.references.forEach(id => references.add(id));
    mapped.warnings.forEach(message =>
      warnings.push({ subject: `${route.name}.${param.name}`, message })
    );
    return {
      param,
      identifier: uniqueName(toValidIdentifier(param.name), taken),
      typeText: mapped.text,
    };
  };

  const pathMatches = matchPathParameters(route);
  const pathArgs = pathMatches.map(({ param }) => toArgument(param));
  const others = route.parameters.filter(param => param.location !== 'path');
  const requiredArgs = others.filter(param => param.required).map(toArgument);
  const optionalArgs = others.filter(param => !param.required).map(toArgument);
  const allArgs = [...pathArgs, ...requiredArgs, ...optionalArgs];
  const byParam = new Map(allArgs.map(arg => [arg.param, arg]));
  const identifierOf = (param: Parameter): string => byParam.get(param)?.identifier ?? param.name;

  const response = mapper.map(route.response);
  response.references.forEach(id => references.add(id));
  response.warnings.forEach(message => warnings.push({ subject: `${route.name} response`, message }));

  // URL template, placeholders substituted in template order
  let urlTemplate = '';
  let cursor = 0;
  pathMatches.forEach(({ placeholder, param }, index) => {
    const start = route.path.indexOf(placeholder.raw, cursor);
    urlTemplate += escapeTemplateLiteral(route.path.slice(cursor, start));
    const helper: RuntimeHelper = placeholder.rest ? 'encodeRestParam' : 'encodePathParam';
    helpers.add(helper);
    urlTemplate += `\${${helper}(${pathArgs[index].identifier})}`;
    cursor = start + placeholder.raw.length;
  });
  urlTemplate += escapeTemplateLiteral(route.path.slice(cursor));

  // Query parameters keep declaration order
  const query = route.parameters
    .filter(param => param.location === 'query')
    .map(param => `['${escapeSingleQuoted(param.name)}', ${identifierOf(param)}]`);
  const urlExpr =
    query.length > 0 ? `buildUrl(\`${urlTemplate}\`, [${query.join(', ')}])` : `buildUrl(\`${urlTemplate}\`)`;

  const bodyParams = route.parameters.filter(param => param.location === 'body');
  let bodyExpr: string | null = null;
  if (bodyParams.length === 1) {
    bodyExpr = `JSON.stringify(${identifierOf(bodyParams[0])})`;
  } else if (bodyParams.length > 1) {
    const entries = bodyParams.map(param => {
      const key = toPropertyKey(param.name);
      const value = identifierOf(param);
      return key === value ? key : `${key}: ${value}`;
    });
    bodyExpr = `JSON.stringify({ ${entries.join(', ')} })`;
  }

  const headerEntries = route.parameters
    .filter(param => param.location === 'header')
    .map(param => `['${escapeSingleQuoted(toHeaderName(param.name))}', ${identifierOf(param)}]`);
  if (bodyExpr !== null) {
    headerEntries.unshift(`['Content-Type', 'application/json']`);
  }

  const initLines = ['      ...options,', `      method: '${route.method}',`];
  if (headerEntries.length > 0) {
    helpers.add('buildHeaders');
    initLines.push(`      headers: buildHeaders(options?.headers, [${headerEntries.join(', ')}]),`);
  }
  if (bodyExpr !== null) {
    initLines.push(`      body: ${bodyExpr},`);
  }

  const signatureParams = [
    ...pathArgs.map(arg => `${arg.identifier}: ${arg.typeText}`),
    ...requiredArgs.map(arg => `${arg.identifier}: ${arg.typeText}`),
    ...optionalArgs.map(arg => `${arg.identifier}?: ${arg.typeText}`),
    'options?: RequestInit',
  ];
  const returnType = `Promise<ApiResult<${response.text}>>`;
  const signature =
    signatureParams.length === 1
      ? `export async function ${functionName}(${signatureParams[0]}): ${returnType} {`
      : `export async function ${functionName}(\n${signatureParams.map(p => `  ${p}`).join(',\n')}\n): ${returnType} {`;

  const docLines = [route.description ?? `${route.method} ${route.path}`];
  const paramDocs = allArgs.map(describeParameter).filter((line): line is string => line !== null);
  if (paramDocs.length > 0) docLines.push('', ...paramDocs);
  if (route.deprecated) docLines.push('@deprecated');

  const text = [
    `${renderDocComment(docLines)}${signature}`,
    `  return request<${response.text}>(`,
    `    ${urlExpr},`,
    '    {',
    ...initLines,
    '    }',
    '  );',
    '}',
  ].join('\n');

  return { text, warnings, helpers, references };
}

/**
 * Stand-in for a route that failed to render. Calling it resolves to a
 * failure result instead of throwing.
 */
export function renderRoutePlaceholder(functionName: string, reason: string): string {
  const message = escapeSingleQuoted(`Client generation failed for ${functionName}: ${reason}`);
  return [
    `${renderDocComment([`Generation failed: ${reason}`])}export async function ${functionName}(..._args: unknown[]): Promise<ApiResult<never>> {`,
    `  return { success: false, status: 0, error: '${message}' };`,
    '}',
  ].join('\n');
}
