/**
 * Intermediate Representation
 *
 * Language-agnostic model of one generation run. Everything here is built
 * fresh from a descriptor snapshot, frozen, and discarded after rendering.
 */

import type {
  FieldConstraints,
  HttpMethod,
  LiteralValue,
  ParameterLocation,
} from './descriptors.js';

/** Stable source identity of a model */
export type ModelId = string;

export type PrimitiveKind =
  | 'string'
  | 'integer'
  | 'float'
  | 'boolean'
  | 'null'
  | 'bytes'
  | 'date'
  | 'datetime'
  | 'uuid'
  | 'any';

/**
 * Closed set of type shapes. `reference` edges are never expanded inline,
 * which is what keeps recursive models finite.
 */
export type TypeRef =
  | { kind: 'primitive'; primitive: PrimitiveKind }
  | { kind: 'array'; items: TypeRef }
  | { kind: 'optional'; inner: TypeRef }
  | { kind: 'union'; members: TypeRef[] }
  | { kind: 'map'; key: TypeRef; value: TypeRef }
  | { kind: 'enum'; name: string; values: Array<string | number> }
  | { kind: 'reference'; id: ModelId }
  | { kind: 'literal'; value: LiteralValue }
  | { kind: 'unknown'; reason: string };

export type TypeRefKind = TypeRef['kind'];

export interface Field {
  name: string;
  type: TypeRef;
  optional: boolean;
  default?: { value: unknown };
  constraints?: FieldConstraints;
  description?: string;
}

export interface Model {
  id: ModelId;
  /** Unique within one Project IR */
  name: string;
  fields: Field[];
  description?: string;
}

export interface Parameter {
  name: string;
  location: ParameterLocation;
  type: TypeRef;
  required: boolean;
  default?: { value: unknown };
  description?: string;
}

export interface Route {
  /** Generated function name, unique within its group */
  name: string;
  method: HttpMethod;
  /** Resolved template, `{name}` and `{name:path}` placeholders */
  path: string;
  parameters: Parameter[];
  response: TypeRef;
  description?: string;
  sourceFile?: string;
  tags: string[];
  deprecated: boolean;
}

export interface RouteGroup {
  /** Display name of the group, e.g. `users` */
  name: string;
  /** Folder-derived path prefix, `''` when the group was not auto-discovered */
  prefix: string;
  /** Originating file (or pseudo-file for tag/path groups), posix, relative to the project root */
  file: string;
  /** Tag or path group with no originating file */
  virtual?: boolean;
  routes: Route[];
}

export interface ProjectIR {
  /** Models in registration order */
  models: ReadonlyMap<ModelId, Model>;
  /** Groups sorted by file */
  groups: RouteGroup[];
}

export const primitive = (kind: PrimitiveKind): TypeRef => ({ kind: 'primitive', primitive: kind });

export const unknownType = (reason: string): TypeRef => ({ kind: 'unknown', reason });

/**
 * Collect every model id a type refers to directly
 */
export function collectReferences(type: TypeRef, into: Set<ModelId> = new Set()): Set<ModelId> {
  switch (type.kind) {
    case 'reference':
      into.add(type.id);
      break;
    case 'array':
      collectReferences(type.items, into);
      break;
    case 'optional':
      collectReferences(type.inner, into);
      break;
    case 'union':
      type.members.forEach(member => collectReferences(member, into));
      break;
    case 'map':
      collectReferences(type.key, into);
      collectReferences(type.value, into);
      break;
    case 'primitive':
    case 'enum':
    case 'literal':
    case 'unknown':
      break;
  }
  return into;
}

/**
 * Models reachable from a set of types, following references through model
 * fields. Result keeps the order of `models`.
 */
export function reachableModels(
  roots: Iterable<TypeRef>,
  models: ReadonlyMap<ModelId, Model>
): Model[] {
  const seen = new Set<ModelId>();
  const queue: ModelId[] = [];

  for (const root of roots) {
    for (const id of collectReferences(root)) {
      if (!seen.has(id)) {
        seen.add(id);
        queue.push(id);
      }
    }
  }

  while (queue.length > 0) {
    const id = queue.shift();
    const model = id === undefined ? undefined : models.get(id);
    if (!model) continue;

    for (const field of model.fields) {
      for (const ref of collectReferences(field.type)) {
        if (!seen.has(ref)) {
          seen.add(ref);
          queue.push(ref);
        }
      }
    }
  }

  return [...models.values()].filter(model => seen.has(model.id));
}
