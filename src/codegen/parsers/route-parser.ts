/**
 * Route extraction
 *
 * Turns the operations of an OpenAPI document into route descriptors:
 * parameters from the path item and the operation, the JSON request body,
 * and the first successful response.
 */

import type { OpenAPIV3 } from 'openapi-types';
import type {
  ParameterLocation,
  RawParameterDescriptor,
  RawRouteDescriptor,
  RawTypeDescriptor,
} from '../ir/descriptors.js';
import { pathToMethodName, toCamelCase, toPascalCase } from '../utils/naming.js';
import {
  COMPONENT_SCHEMA_PREFIX,
  encodePointerSegment,
  extractOperations,
  isObject,
  isReference,
  resolveMaybeRef,
  type OperationEntry,
} from './openapi-parser.js';
import { isRecordSchema, SchemaConverter } from './schema-parser.js';

/** Vendor extension naming the file that defines a handler */
export const SOURCE_FILE_EXTENSION = 'x-source-file';

/** FastAPI wraps several body parameters in a schema with this name prefix */
const EMBEDDED_BODY_PREFIX = 'Body_';

const NO_CONTENT: RawTypeDescriptor = { kind: 'primitive', name: 'none' };
const ANY: RawTypeDescriptor = { kind: 'primitive', name: 'any' };

function isLocation(value: string): value is Exclude<ParameterLocation, 'body'> {
  return value === 'path' || value === 'query' || value === 'header';
}

function isParameterObject(value: unknown): value is OpenAPIV3.ParameterObject {
  return isObject(value) && typeof value.name === 'string' && typeof value.in === 'string';
}

function isRequestBodyObject(value: unknown): value is OpenAPIV3.RequestBodyObject {
  return isObject(value) && isObject(value.content);
}

function isResponseObject(value: unknown): value is OpenAPIV3.ResponseObject {
  return isObject(value) && typeof value.description === 'string';
}

function operationPointer(entry: OperationEntry): string {
  return `#/paths/${encodePointerSegment(entry.path)}/${entry.method.toLowerCase()}`;
}

/**
 * Schema of the preferred media type: JSON first, then the first declared
 */
function pickMediaSchema(content: Record<string, OpenAPIV3.MediaTypeObject> | undefined): { mediaType: string; schema: unknown } | null {
  if (!content) return null;
  const mediaTypes = Object.keys(content);
  const mediaType = mediaTypes.find(type => type.includes('json')) ?? mediaTypes[0];
  if (mediaType === undefined) return null;
  return { mediaType, schema: content[mediaType]?.schema };
}

/**
 * Function name for an operation: its `operationId`, else derived from method and path
 */
export function operationName(entry: OperationEntry): string {
  return entry.operation.operationId ?? pathToMethodName(entry.method, entry.path);
}

export class RouteExtractor {
  constructor(
    private readonly spec: OpenAPIV3.Document,
    private readonly schemas: SchemaConverter = new SchemaConverter(spec)
  ) {}

  extract(): RawRouteDescriptor[] {
    return extractOperations(this.spec).map(entry => this.toRoute(entry));
  }

  toRoute(entry: OperationEntry): RawRouteDescriptor {
    const { operation } = entry;
    const name = operationName(entry);

    const route: RawRouteDescriptor = {
      name,
      method: entry.method,
      path: entry.path,
      parameters: [...this.parameters(entry, name), ...this.bodyParameters(entry, name)],
      response: this.response(entry, name),
      tags: operation.tags ? [...operation.tags] : [],
      deprecated: operation.deprecated === true,
    };

    const description = operation.summary ?? operation.description;
    if (description) route.description = description;

    const sourceFile: unknown = Reflect.get(operation, SOURCE_FILE_EXTENSION);
    if (typeof sourceFile === 'string' && sourceFile !== '') route.sourceFile = sourceFile;

    return route;
  }

  /**
   * Path item parameters overridden by operation parameters with the same
   * name and location. Cookie parameters are not sent by generated clients.
   */
  private parameters(entry: OperationEntry, routeName: string): RawParameterDescriptor[] {
    const merged = new Map<string, OpenAPIV3.ParameterObject>();
    for (const raw of [...(entry.pathItem.parameters ?? []), ...(entry.operation.parameters ?? [])]) {
      const param = resolveMaybeRef(this.spec, raw);
      if (isParameterObject(param)) {
        merged.set(`${param.in}:${param.name}`, param);
      }
    }

    const result: RawParameterDescriptor[] = [];
    for (const param of merged.values()) {
      if (!isLocation(param.in)) continue;

      const pointer = `${operationPointer(entry)}/parameters/${encodePointerSegment(param.name)}`;
      const descriptor: RawParameterDescriptor = {
        name: param.name,
        location: param.in,
        type: this.schemas.convert(param.schema, pointer, `${toPascalCase(routeName)}${toPascalCase(param.name)}`),
        required: param.in === 'path' || param.required === true,
      };

      const schema = resolveMaybeRef(this.spec, param.schema);
      if (isObject(schema) && 'default' in schema) descriptor.default = { value: schema.default };
      if (param.description) descriptor.description = param.description;

      result.push(descriptor);
    }
    return result;
  }

  /**
   * One body parameter per request body, or one per property when the body
   * is an embedded wrapper of several parameters
   */
  private bodyParameters(entry: OperationEntry, routeName: string): RawParameterDescriptor[] {
    const body = resolveMaybeRef(this.spec, entry.operation.requestBody);
    if (!isRequestBodyObject(body)) return [];

    const media = pickMediaSchema(body.content);
    if (!media) return [];

    const required = body.required === true;
    const pointer = `${operationPointer(entry)}/requestBody/content/${encodePointerSegment(media.mediaType)}/schema`;

    const ref = isReference(media.schema) ? media.schema.$ref : undefined;
    const componentName = ref?.startsWith(COMPONENT_SCHEMA_PREFIX)
      ? ref.slice(COMPONENT_SCHEMA_PREFIX.length)
      : undefined;

    const target = resolveMaybeRef(this.spec, media.schema);
    if (componentName?.startsWith(EMBEDDED_BODY_PREFIX) && isRecordSchema(target)) {
      const requiredProps = new Set(Array.isArray(target.required) ? target.required : []);
      const properties = isObject(target.properties) ? target.properties : {};
      return Object.entries(properties).map(([name, schema]): RawParameterDescriptor => ({
        name,
        location: 'body',
        type: this.schemas.convert(schema, `${ref}/properties/${encodePointerSegment(name)}`, toPascalCase(name)),
        required: required && requiredProps.has(name),
      }));
    }

    const name = componentName ? toCamelCase(componentName) : 'body';
    const descriptor: RawParameterDescriptor = {
      name,
      location: 'body',
      type: this.schemas.convert(media.schema, pointer, `${toPascalCase(routeName)}Body`),
      required,
    };
    if (body.description) descriptor.description = body.description;
    return [descriptor];
  }

  /**
   * Type of the lowest 2xx response. No content decodes to `null`.
   */
  private response(entry: OperationEntry, routeName: string): RawTypeDescriptor {
    const statuses = Object.keys(entry.operation.responses)
      .filter(status => /^2\d\d$/.test(status) || status === '2XX')
      .sort();
    const status = statuses[0];
    if (status === undefined) return ANY;
    if (status === '204') return NO_CONTENT;

    const response = resolveMaybeRef(this.spec, entry.operation.responses[status]);
    if (!isResponseObject(response)) return ANY;

    const media = pickMediaSchema(response.content);
    if (!media) return NO_CONTENT;
    if (media.schema === undefined) return ANY;

    const pointer = `${operationPointer(entry)}/responses/${status}/content/${encodePointerSegment(media.mediaType)}/schema`;
    return this.schemas.convert(media.schema, pointer, `${toPascalCase(routeName)}Response`);
  }
}
