/**
 * OpenAPI document loading
 *
 * Reads a document from a file (JSON or YAML) or takes a parsed object,
 * pulls external file references into the document and converts Swagger 2.0
 * to OpenAPI 3. Component schemas stay referenced by `$ref` so that every
 * record keeps a single identity.
 */

import $RefParser from '@apidevtools/json-schema-ref-parser';
import { promises as fs } from 'fs';
import type { OpenAPIV3 } from 'openapi-types';
import { parse as parseYaml } from 'yaml';
import { DescriptorSourceError, describeError } from '../../errors.js';
import { HTTP_METHODS, type HttpMethod } from '../ir/descriptors.js';
import { ensureOpenAPI3 } from '../utils/swagger-converter.js';

export const COMPONENT_SCHEMA_PREFIX = '#/components/schemas/';

export interface OperationEntry {
  method: HttpMethod;
  path: string;
  operation: OpenAPIV3.OperationObject;
  pathItem: OpenAPIV3.PathItemObject;
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isReference(value: unknown): value is OpenAPIV3.ReferenceObject {
  return isObject(value) && typeof value.$ref === 'string';
}

/**
 * Whether a document refers to other files (`./`, `../` or absolute URLs)
 */
export function hasExternalRefs(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.some(hasExternalRefs);
  }
  if (!isObject(value)) {
    return false;
  }
  if (typeof value.$ref === 'string' && !value.$ref.startsWith('#')) {
    return true;
  }
  return Object.values(value).some(hasExternalRefs);
}

async function readDocumentFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(path, 'utf-8');
  } catch (error) {
    throw new DescriptorSourceError(`Cannot read API document ${path}: ${describeError(error)}`, { path }, error);
  }

  try {
    return /\.ya?ml$/.test(path) ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    const format = /\.ya?ml$/.test(path) ? 'YAML' : 'JSON';
    throw new DescriptorSourceError(
      `Failed to parse ${format} from ${path}: ${describeError(error)}`,
      { path },
      error
    );
  }
}

/**
 * Load an OpenAPI 3 or Swagger 2.0 document
 *
 * @param input - File path (`.json`, `.yaml`, `.yml`) or parsed document
 * @throws {DescriptorSourceError} When the document cannot be read, parsed
 * or resolved, or is not an API document
 */
export async function parseOpenApiDocument(input: string | object): Promise<OpenAPIV3.Document> {
  let data: unknown = typeof input === 'string' ? await readDocumentFile(input) : input;

  if (hasExternalRefs(data)) {
    try {
      // Bundling inlines external files once and keeps internal `$ref`s intact
      data = await $RefParser.bundle(typeof input === 'string' ? input : data, {
        resolve: { http: { timeout: 10000 } },
      });
    } catch (error) {
      throw new DescriptorSourceError(
        `Failed to resolve external references: ${describeError(error)}`,
        typeof input === 'string' ? { path: input } : {},
        error
      );
    }
  }

  return ensureOpenAPI3(data);
}

const METHOD_KEYS = {
  GET: 'get',
  POST: 'post',
  PUT: 'put',
  PATCH: 'patch',
  DELETE: 'delete',
  HEAD: 'head',
  OPTIONS: 'options',
} as const;

/**
 * Every operation in document order: paths as declared, methods in a fixed order
 */
export function extractOperations(spec: OpenAPIV3.Document): OperationEntry[] {
  const operations: OperationEntry[] = [];

  for (const [path, pathItem] of Object.entries(spec.paths)) {
    if (!pathItem) continue;

    for (const method of HTTP_METHODS) {
      const operation = pathItem[METHOD_KEYS[method]];
      if (operation) {
        operations.push({ method, path, operation, pathItem });
      }
    }
  }

  return operations;
}

function decodePointerSegment(segment: string): string {
  return decodeURIComponent(segment).replace(/~1/g, '/').replace(/~0/g, '~');
}

export function encodePointerSegment(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

/**
 * Follow a local `$ref` (`#/components/...`) through the document
 *
 * @returns The referenced value, or `undefined` when the pointer is external or dangling
 */
export function resolveLocalRef(spec: OpenAPIV3.Document, ref: string): unknown {
  if (!ref.startsWith('#/')) {
    return undefined;
  }

  let current: unknown = spec;
  for (const segment of ref.slice(2).split('/').map(decodePointerSegment)) {
    if (Array.isArray(current)) {
      current = current[Number(segment)];
    } else if (isObject(current) && segment in current) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * Resolve a value that may be a `$ref`, following chains of references
 */
export function resolveMaybeRef(spec: OpenAPIV3.Document, value: unknown): unknown {
  const seen = new Set<string>();
  let current = value;
  while (isReference(current)) {
    if (seen.has(current.$ref)) return undefined;
    seen.add(current.$ref);
    current = resolveLocalRef(spec, current.$ref);
  }
  return current;
}

/**
 * Component schemas in declaration order, keyed by their `$ref` identity
 */
export function extractComponentSchemas(spec: OpenAPIV3.Document): Array<{ identity: string; name: string; schema: unknown }> {
  const schemas = spec.components?.schemas ?? {};
  return Object.entries(schemas).map(([name, schema]) => ({
    identity: `${COMPONENT_SCHEMA_PREFIX}${encodePointerSegment(name)}`,
    name,
    schema,
  }));
}
