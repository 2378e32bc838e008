/**
 * IR Builder
 *
 * Turns raw schema and route descriptors into a Project IR. Models are
 * registered breadth-first from the types routes expose (pass 1) and only
 * then filled in (pass 2), so forward, self and mutual references all
 * resolve to `reference(id)` edges.
 */

import type { DiagnosticCollector } from '../../errors.js';
import { deepFreeze } from '../utils/freeze.js';
import type {
  RawParameterDescriptor,
  RawRouteDescriptor,
  RawSchemaDescriptor,
  RawTypeDescriptor,
} from './descriptors.js';
import {
  primitive,
  unknownType,
  type Field,
  type Model,
  type ModelId,
  type Parameter,
  type PrimitiveKind,
  type ProjectIR,
  type Route,
  type RouteGroup,
  type TypeRef,
} from './types.js';

/**
 * A route group whose paths are already resolved but whose types are still raw
 */
export interface RawRouteGroup {
  name: string;
  prefix: string;
  file: string;
  /** Tag or path group with no originating file */
  virtual?: boolean;
  routes: RawRouteDescriptor[];
}

/**
 * Accepted spellings of primitive types, keyed in lower case
 */
const PRIMITIVE_ALIASES: Record<string, PrimitiveKind> = {
  str: 'string',
  string: 'string',
  text: 'string',
  int: 'integer',
  integer: 'integer',
  long: 'integer',
  float: 'float',
  number: 'float',
  double: 'float',
  decimal: 'float',
  bool: 'boolean',
  boolean: 'boolean',
  none: 'null',
  nonetype: 'null',
  null: 'null',
  bytes: 'bytes',
  binary: 'bytes',
  bytearray: 'bytes',
  date: 'date',
  datetime: 'datetime',
  'date-time': 'datetime',
  uuid: 'uuid',
  any: 'any',
};

export function resolvePrimitive(name: string): PrimitiveKind | undefined {
  return PRIMITIVE_ALIASES[name.toLowerCase()];
}

interface ModelStub {
  id: ModelId;
  name: string;
  schema: RawSchemaDescriptor;
}

export class IRBuilder {
  private readonly schemaTable = new Map<string, RawSchemaDescriptor>();
  private readonly stubs = new Map<ModelId, ModelStub>();
  private readonly takenNames = new Set<string>();

  /**
   * @param schemas - Every schema descriptor the source knows about
   * @param diagnostics - Collector for non-fatal problems
   */
  constructor(
    schemas: readonly RawSchemaDescriptor[],
    private readonly diagnostics: DiagnosticCollector
  ) {
    for (const schema of schemas) {
      if (!this.schemaTable.has(schema.identity)) {
        this.schemaTable.set(schema.identity, schema);
      }
    }
  }

  /**
   * Build the Project IR for the given route groups. Only schemas reachable
   * from route parameters and responses become models.
   */
  build(groups: readonly RawRouteGroup[]): ProjectIR {
    const roots: RawTypeDescriptor[] = [];
    for (const group of groups) {
      for (const route of group.routes) {
        route.parameters.forEach(param => roots.push(param.type));
        if (route.response) roots.push(route.response);
      }
    }

    this.register(roots);
    const models = this.buildModels();

    const routeGroups = [...groups]
      .sort((a, b) => compareStrings(a.file, b.file))
      .map(group => this.convertGroup(group));

    return deepFreeze({ models, groups: routeGroups });
  }

  /**
   * Pass 1: breadth-first registration of a stub for every schema identity
   */
  register(roots: readonly RawTypeDescriptor[]): void {
    const queue: RawTypeDescriptor[] = [...roots];

    while (queue.length > 0) {
      const raw = queue.shift();
      if (!raw) continue;

      switch (raw.kind) {
        case 'array':
          queue.push(raw.items);
          break;
        case 'optional':
          queue.push(raw.inner);
          break;
        case 'union':
          queue.push(...raw.members);
          break;
        case 'map':
          queue.push(raw.key, raw.value);
          break;
        case 'schema':
          if (this.registerSchema(raw.schema)) {
            raw.schema.fields.forEach(field => queue.push(field.type));
          }
          break;
        case 'ref': {
          const schema = this.schemaTable.get(raw.identity);
          if (schema && this.registerSchema(schema)) {
            schema.fields.forEach(field => queue.push(field.type));
          }
          break;
        }
        default:
          break;
      }
    }
  }

  /**
   * Pass 2: fill in the fields of every registered stub
   */
  buildModels(): Map<ModelId, Model> {
    const models = new Map<ModelId, Model>();

    // Map iteration also visits stubs registered while converting fields
    for (const stub of this.stubs.values()) {
      const fields: Field[] = [];
      const fieldNames = new Set<string>();

      for (const rawField of stub.schema.fields) {
        if (fieldNames.has(rawField.name)) {
          this.diagnostics.warn(
            `Duplicate field "${rawField.name}" ignored; the first declaration is kept`,
            stub.name
          );
          continue;
        }
        fieldNames.add(rawField.name);

        const field: Field = {
          name: rawField.name,
          type: this.convertType(rawField.type),
          optional: rawField.optional,
        };
        if (rawField.default) field.default = { value: rawField.default.value };
        if (rawField.constraints) field.constraints = { ...rawField.constraints };
        if (rawField.description) field.description = rawField.description;
        fields.push(field);
      }

      const model: Model = { id: stub.id, name: stub.name, fields };
      if (stub.schema.description) model.description = stub.schema.description;
      models.set(stub.id, model);
    }

    return models;
  }

  /**
   * Convert a raw type. Records are turned into references, never inlined.
   * Anything without a mapping rule degrades to `unknown`.
   */
  convertType(raw: RawTypeDescriptor): TypeRef {
    switch (raw.kind) {
      case 'primitive': {
        const kind = resolvePrimitive(raw.name);
        return kind ? primitive(kind) : unknownType(`no mapping rule for type "${raw.name}"`);
      }
      case 'array':
        return { kind: 'array', items: this.convertType(raw.items) };
      case 'optional': {
        const inner = this.convertType(raw.inner);
        return inner.kind === 'optional' ? inner : { kind: 'optional', inner };
      }
      case 'union':
        return this.convertUnion(raw.members);
      case 'map':
        return { kind: 'map', key: this.convertType(raw.key), value: this.convertType(raw.value) };
      case 'enum':
        if (raw.values.length === 0) {
          return unknownType(`enum "${raw.name}" has no values`);
        }
        return { kind: 'enum', name: raw.name, values: [...raw.values] };
      case 'literal':
        return { kind: 'literal', value: raw.value };
      case 'schema':
        this.registerSchema(raw.schema);
        return { kind: 'reference', id: raw.schema.identity };
      case 'ref': {
        if (this.stubs.has(raw.identity)) {
          return { kind: 'reference', id: raw.identity };
        }
        const schema = this.schemaTable.get(raw.identity);
        if (!schema) {
          return unknownType(`unresolved schema reference "${raw.identity}"`);
        }
        this.registerSchema(schema);
        return { kind: 'reference', id: raw.identity };
      }
      case 'unsupported':
        return unknownType(`no mapping rule for type "${raw.name}"`);
      default:
        return unknownType('unrecognized type descriptor');
    }
  }

  private convertUnion(rawMembers: readonly RawTypeDescriptor[]): TypeRef {
    const members = rawMembers.map(member => this.convertType(member));
    const nonNull = members.filter(m => !(m.kind === 'primitive' && m.primitive === 'null'));

    if (members.length === 0) {
      return unknownType('empty union');
    }
    if (nonNull.length === 0) {
      return primitive('null');
    }

    const core: TypeRef = nonNull.length === 1 ? nonNull[0] : { kind: 'union', members: nonNull };
    if (nonNull.length === members.length) {
      return core;
    }
    // Union[X, None] is an optional X
    return core.kind === 'optional' ? core : { kind: 'optional', inner: core };
  }

  private convertGroup(group: RawRouteGroup): RouteGroup {
    const usedNames = new Set<string>();
    const routes = group.routes.map(raw => {
      const name = uniqueName(raw.name, usedNames);
      if (name !== raw.name) {
        this.diagnostics.warn(
          `Route name "${raw.name}" is already used in ${group.file}; renamed to "${name}"`,
          `${raw.method} ${raw.path}`
        );
      }
      return this.convertRoute(raw, name);
    });

    return {
      name: group.name,
      prefix: group.prefix,
      file: group.file,
      ...(group.virtual ? { virtual: true } : {}),
      routes,
    };
  }

  private convertRoute(raw: RawRouteDescriptor, name: string): Route {
    const route: Route = {
      name,
      method: raw.method,
      path: raw.path,
      parameters: raw.parameters.map(param => this.convertParameter(param)),
      response: raw.response ? this.convertType(raw.response) : primitive('any'),
      tags: raw.tags ? [...raw.tags] : [],
      deprecated: raw.deprecated ?? false,
    };
    if (raw.description) route.description = raw.description;
    if (raw.sourceFile) route.sourceFile = raw.sourceFile;
    return route;
  }

  private convertParameter(raw: RawParameterDescriptor): Parameter {
    const param: Parameter = {
      name: raw.name,
      location: raw.location,
      type: this.convertType(raw.type),
      // Path parameters are always required
      required: raw.location === 'path' ? true : raw.required,
    };
    if (raw.default) param.default = { value: raw.default.value };
    if (raw.description) param.description = raw.description;
    return param;
  }

  /**
   * Register a stub for a schema identity. Returns false if it was already known.
   */
  private registerSchema(schema: RawSchemaDescriptor): boolean {
    if (this.stubs.has(schema.identity)) {
      return false;
    }

    const name = uniqueName(schema.name, this.takenNames);
    if (name !== schema.name) {
      this.diagnostics.warn(
        `Model name "${schema.name}" is used by another schema; renamed to "${name}"`,
        schema.identity
      );
    }

    this.stubs.set(schema.identity, { id: schema.identity, name, schema });
    return true;
  }
}

/**
 * Build a Project IR in one call
 */
export function buildProjectIR(
  schemas: readonly RawSchemaDescriptor[],
  groups: readonly RawRouteGroup[],
  diagnostics: DiagnosticCollector
): ProjectIR {
  return new IRBuilder(schemas, diagnostics).build(groups);
}

/**
 * Take `base` if free, otherwise `base2`, `base3`, ... and mark it as used
 */
export function uniqueName(base: string, taken: Set<string>): string {
  let candidate = base;
  let counter = 2;
  while (taken.has(candidate)) {
    candidate = `${base}${counter}`;
    counter++;
  }
  taken.add(candidate);
  return candidate;
}

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
