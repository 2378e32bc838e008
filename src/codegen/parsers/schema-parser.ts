/**
 * OpenAPI schema conversion
 *
 * Turns JSON Schema fragments of an OpenAPI 3.0 or 3.1 document into raw
 * type descriptors. Object schemas with properties become records: component
 * schemas are referenced by `$ref` identity, inline ones are embedded with
 * their JSON pointer as identity. Anything else (enums, aliases, maps) is
 * expanded where it is used.
 */

import type { OpenAPIV3 } from 'openapi-types';
import type {
  FieldConstraints,
  LiteralValue,
  RawFieldDescriptor,
  RawSchemaDescriptor,
  RawTypeDescriptor,
} from '../ir/descriptors.js';
import { toPascalCase } from '../utils/naming.js';
import {
  COMPONENT_SCHEMA_PREFIX,
  encodePointerSegment,
  extractComponentSchemas,
  isObject,
  resolveLocalRef,
} from './openapi-parser.js';

type SchemaNode = Record<string, unknown>;

const NUMERIC_CONSTRAINTS = [
  'minimum',
  'maximum',
  'minLength',
  'maxLength',
  'minItems',
  'maxItems',
] as const;

const STRING_FORMATS: Record<string, string> = {
  date: 'date',
  'date-time': 'datetime',
  uuid: 'uuid',
  binary: 'bytes',
  byte: 'bytes',
};

function isLiteral(value: unknown): value is LiteralValue {
  return (
    value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
  );
}

function stringOf(node: SchemaNode, key: string): string | undefined {
  const value = node[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function schemaList(node: SchemaNode, key: string): unknown[] {
  const value = node[key];
  return Array.isArray(value) ? value : [];
}

function declaredTypes(node: SchemaNode): string[] {
  const type = node.type;
  if (typeof type === 'string') return [type];
  if (Array.isArray(type)) return type.filter((t): t is string => typeof t === 'string');
  return [];
}

/**
 * Whether a schema describes a record: an object with declared properties,
 * or a composition of several schemas
 */
export function isRecordSchema(schema: unknown): schema is SchemaNode {
  if (!isObject(schema) || typeof schema.$ref === 'string') return false;
  if (isObject(schema.properties)) return true;
  return schemaList(schema, 'allOf').length > 1;
}

export function constraintsOf(node: SchemaNode): FieldConstraints | undefined {
  const constraints: FieldConstraints = {};
  for (const key of NUMERIC_CONSTRAINTS) {
    const value = node[key];
    if (typeof value === 'number') constraints[key] = value;
  }
  // 3.0 uses booleans here, 3.1 uses the bound itself
  if (typeof node.exclusiveMinimum === 'number') constraints.exclusiveMinimum = node.exclusiveMinimum;
  if (typeof node.exclusiveMaximum === 'number') constraints.exclusiveMaximum = node.exclusiveMaximum;
  const pattern = stringOf(node, 'pattern');
  if (pattern) constraints.pattern = pattern;

  return Object.keys(constraints).length > 0 ? constraints : undefined;
}

export class SchemaConverter {
  /** Local refs being expanded, to stop alias cycles */
  private readonly expanding = new Set<string>();

  constructor(private readonly spec: OpenAPIV3.Document) {}

  /**
   * Records declared under `components.schemas`, in declaration order
   */
  componentRecords(): RawSchemaDescriptor[] {
    return extractComponentSchemas(this.spec)
      .filter(component => isRecordSchema(component.schema))
      .map(component => this.toRecord(component.schema, component.identity, component.name));
  }

  /**
   * @param schema - Schema or `$ref`
   * @param pointer - JSON pointer of `schema`, identity of inline records
   * @param nameHint - Name for inline records and enums without a title
   */
  convert(schema: unknown, pointer: string, nameHint: string): RawTypeDescriptor {
    if (!isObject(schema)) {
      return schema === true || schema === undefined
        ? { kind: 'primitive', name: 'any' }
        : { kind: 'unsupported', name: String(schema) };
    }

    if (typeof schema.$ref === 'string') {
      return this.convertRef(schema.$ref);
    }

    const type = this.convertNode(schema, pointer, nameHint);
    return schema.nullable === true ? { kind: 'optional', inner: type } : type;
  }

  private convertRef(ref: string): RawTypeDescriptor {
    const target = resolveLocalRef(this.spec, ref);
    if (target === undefined) {
      return { kind: 'unsupported', name: `unresolved reference ${ref}` };
    }

    if (ref.startsWith(COMPONENT_SCHEMA_PREFIX) && isRecordSchema(target)) {
      return { kind: 'ref', identity: ref };
    }

    if (this.expanding.has(ref)) {
      return { kind: 'unsupported', name: `circular alias ${ref}` };
    }
    this.expanding.add(ref);
    try {
      const name = ref.slice(ref.lastIndexOf('/') + 1);
      return this.convert(target, ref, name);
    } finally {
      this.expanding.delete(ref);
    }
  }

  private convertNode(node: SchemaNode, pointer: string, nameHint: string): RawTypeDescriptor {
    const title = stringOf(node, 'title');
    const name = title ?? nameHint;

    if ('const' in node && isLiteral(node.const)) {
      return { kind: 'literal', value: node.const };
    }

    const enumValues = node.enum;
    if (Array.isArray(enumValues)) {
      return this.convertEnum(enumValues, name);
    }

    for (const key of ['anyOf', 'oneOf'] as const) {
      const members = schemaList(node, key);
      if (members.length > 0) {
        return this.union(members.map((member, i) => this.convert(member, `${pointer}/${key}/${i}`, nameHint)));
      }
    }

    const allOf = schemaList(node, 'allOf');
    if (allOf.length === 1 && !isObject(node.properties)) {
      return this.convert(allOf[0], `${pointer}/allOf/0`, nameHint);
    }

    if (isRecordSchema(node)) {
      return { kind: 'schema', schema: this.toRecord(node, pointer, name) };
    }

    const types = declaredTypes(node);
    if (types.length > 1) {
      return this.union(types.map(type => this.convertTyped({ ...node, type }, type, pointer, nameHint)));
    }
    if (types.length === 1) {
      return this.convertTyped(node, types[0], pointer, nameHint);
    }

    if (node.items !== undefined) {
      return this.convertTyped(node, 'array', pointer, nameHint);
    }
    if (node.additionalProperties !== undefined) {
      return this.convertTyped(node, 'object', pointer, nameHint);
    }
    return { kind: 'primitive', name: 'any' };
  }

  private convertTyped(node: SchemaNode, type: string, pointer: string, nameHint: string): RawTypeDescriptor {
    switch (type) {
      case 'string': {
        const format = stringOf(node, 'format');
        return { kind: 'primitive', name: (format && STRING_FORMATS[format]) || 'string' };
      }
      case 'integer':
        return { kind: 'primitive', name: 'int' };
      case 'number':
        return { kind: 'primitive', name: 'float' };
      case 'boolean':
        return { kind: 'primitive', name: 'bool' };
      case 'null':
        return { kind: 'primitive', name: 'none' };
      case 'array':
        return {
          kind: 'array',
          items: this.convert(node.items, `${pointer}/items`, `${nameHint}Item`),
        };
      case 'object': {
        const additional = node.additionalProperties;
        const value =
          isObject(additional)
            ? this.convert(additional, `${pointer}/additionalProperties`, `${nameHint}Value`)
            : ({ kind: 'primitive', name: 'any' } satisfies RawTypeDescriptor);
        return { kind: 'map', key: { kind: 'primitive', name: 'string' }, value };
      }
      default:
        return { kind: 'unsupported', name: type };
    }
  }

  private convertEnum(values: unknown[], name: string): RawTypeDescriptor {
    const members = values.filter((v): v is string | number => typeof v === 'string' || typeof v === 'number');
    const type: RawTypeDescriptor =
      members.length === 1 ? { kind: 'literal', value: members[0] } : { kind: 'enum', name, values: members };
    return values.includes(null) ? { kind: 'optional', inner: type } : type;
  }

  private union(members: RawTypeDescriptor[]): RawTypeDescriptor {
    return members.length === 1 ? members[0] : { kind: 'union', members };
  }

  /**
   * Property schemas of a record, following `allOf` members in order
   */
  private collectProperties(node: SchemaNode, pointer: string): Array<{ name: string; schema: unknown; pointer: string; required: boolean }> {
    const collected: Array<{ name: string; schema: unknown; pointer: string; required: boolean }> = [];
    const visited = new Set<string>();

    const visit = (current: unknown, currentPointer: string): void => {
      let target = current;
      let targetPointer = currentPointer;
      if (isObject(current) && typeof current.$ref === 'string') {
        if (visited.has(current.$ref)) return;
        visited.add(current.$ref);
        target = resolveLocalRef(this.spec, current.$ref);
        targetPointer = current.$ref;
      }
      if (!isObject(target)) return;

      schemaList(target, 'allOf').forEach((member, i) => visit(member, `${targetPointer}/allOf/${i}`));

      const required = new Set(schemaList(target, 'required').filter((r): r is string => typeof r === 'string'));
      const properties = target.properties;
      if (!isObject(properties)) return;

      for (const [name, schema] of Object.entries(properties)) {
        const entry = {
          name,
          schema,
          pointer: `${targetPointer}/properties/${encodePointerSegment(name)}`,
          required: required.has(name),
        };
        const existing = collected.findIndex(p => p.name === name);
        if (existing >= 0) {
          collected[existing] = { ...entry, required: entry.required || collected[existing].required };
        } else {
          collected.push(entry);
        }
      }
    };

    visit(node, pointer);
    return collected;
  }

  private toRecord(schema: unknown, identity: string, name: string): RawSchemaDescriptor {
    const node = isObject(schema) ? schema : {};
    const fields = this.collectProperties(node, identity).map(property => this.toField(property, name));
    const description = stringOf(node, 'description');

    return description ? { identity, name, description, fields } : { identity, name, fields };
  }

  private toField(
    property: { name: string; schema: unknown; pointer: string; required: boolean },
    recordName: string
  ): RawFieldDescriptor {
    const node = isObject(property.schema) ? property.schema : {};
    const field: RawFieldDescriptor = {
      name: property.name,
      type: this.convert(property.schema, property.pointer, `${recordName}${toPascalCase(property.name)}`),
      optional: !property.required,
    };

    if ('default' in node) field.default = { value: node.default };
    const constraints = constraintsOf(node);
    if (constraints) field.constraints = constraints;
    const description = stringOf(node, 'description');
    if (description) field.description = description;

    return field;
  }
}
