/**
 * Descriptor Source boundary
 *
 * Raw, source-ecosystem-specific descriptions of routes and schemas. Adapters
 * (OpenAPI documents, a live backend, plain objects) implement
 * {@link DescriptorSource}; the IR builder and route resolver only see these
 * shapes, never a framework's own objects.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

export const HTTP_METHODS: readonly HttpMethod[] = [
  'GET',
  'POST',
  'PUT',
  'PATCH',
  'DELETE',
  'HEAD',
  'OPTIONS',
];

export type ParameterLocation = 'path' | 'query' | 'header' | 'body';

export type LiteralValue = string | number | boolean | null;

/**
 * Advisory constraints carried through to generated doc comments
 */
export interface FieldConstraints {
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: number;
  exclusiveMaximum?: number;
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  minItems?: number;
  maxItems?: number;
}

/**
 * Raw type as described by the source
 *
 * `schema` embeds a record type inline; `ref` points at one by identity.
 * Either way the record is registered once per identity.
 */
export type RawTypeDescriptor =
  | { kind: 'primitive'; name: string }
  | { kind: 'array'; items: RawTypeDescriptor }
  | { kind: 'optional'; inner: RawTypeDescriptor }
  | { kind: 'union'; members: RawTypeDescriptor[] }
  | { kind: 'map'; key: RawTypeDescriptor; value: RawTypeDescriptor }
  | { kind: 'enum'; name: string; values: Array<string | number> }
  | { kind: 'literal'; value: LiteralValue }
  | { kind: 'schema'; schema: RawSchemaDescriptor }
  | { kind: 'ref'; identity: string }
  | { kind: 'unsupported'; name: string };

export interface RawFieldDescriptor {
  name: string;
  type: RawTypeDescriptor;
  optional: boolean;
  /** Present only when the source declares a default */
  default?: { value: unknown };
  constraints?: FieldConstraints;
  description?: string;
}

export interface RawSchemaDescriptor {
  /** Source identity; two schemas are the same model iff identities match */
  identity: string;
  name: string;
  description?: string;
  fields: RawFieldDescriptor[];
}

export interface RawParameterDescriptor {
  name: string;
  location: ParameterLocation;
  type: RawTypeDescriptor;
  required: boolean;
  default?: { value: unknown };
  description?: string;
}

export interface RawRouteDescriptor {
  /** Handler name, used for the generated function name */
  name: string;
  method: HttpMethod;
  /** Declared path; for auto-discovered files it is relative to the folder prefix */
  path: string;
  parameters: RawParameterDescriptor[];
  response?: RawTypeDescriptor;
  description?: string;
  tags?: string[];
  deprecated?: boolean;
  /** File that defines the handler, relative to the project root (posix separators) */
  sourceFile?: string;
}

type MaybePromise<T> = T | Promise<T>;

/**
 * Capability interface implemented by every descriptor adapter
 */
export interface DescriptorSource {
  enumerateRoutes(): MaybePromise<RawRouteDescriptor[]>;
  enumerateSchemas(): MaybePromise<RawSchemaDescriptor[]>;
}

/**
 * Check whether an upper-case string names a supported HTTP method
 */
export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some(method => method === value);
}
