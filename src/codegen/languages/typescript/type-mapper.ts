/**
 * TypeScript Type Mapper
 *
 * Pure translation from IR types to TypeScript type syntax. Model references
 * render as the model's name and are reported back so the caller can declare
 * each referenced model once per module.
 */

import { GenerationError } from '../../../errors.js';
import type { Model, ModelId, PrimitiveKind, TypeRef } from '../../ir/types.js';
import type { LiteralValue } from '../../ir/descriptors.js';
import { uniqueName } from '../../ir/builder.js';
import { escapeSingleQuoted, toTypeName } from '../../utils/naming.js';
import type { MappedType, TypeMapper } from '../types.js';

/** Most permissive TypeScript type, used for anything without a mapping */
export const PERMISSIVE_TYPE = 'any';

/** Names exported by the runtime module that models must not shadow */
export const RUNTIME_TYPE_NAMES = ['ApiResult'] as const;

/** Global types that generated modules refer to */
export const GLOBAL_TYPE_NAMES = ['Blob', 'Promise', 'Record', 'RequestInit'] as const;

const PRIMITIVES: Record<PrimitiveKind, string> = {
  string: 'string',
  integer: 'number',
  float: 'number',
  boolean: 'boolean',
  null: 'null',
  bytes: 'Blob',
  date: 'string',
  datetime: 'string',
  uuid: 'string',
  any: 'any',
};

/**
 * Assign every model a unique TypeScript type name, in model order
 */
export function createTypeNames(models: ReadonlyMap<ModelId, Model>): Map<ModelId, string> {
  const taken = new Set<string>([...RUNTIME_TYPE_NAMES, ...GLOBAL_TYPE_NAMES]);
  const names = new Map<ModelId, string>();
  for (const model of models.values()) {
    names.set(model.id, uniqueName(toTypeName(model.name), taken));
  }
  return names;
}

export function renderLiteral(value: LiteralValue): string {
  if (typeof value === 'string') {
    return `'${escapeSingleQuoted(value)}'`;
  }
  return String(value);
}

function needsParentheses(type: TypeRef): boolean {
  switch (type.kind) {
    case 'union':
      return type.members.length > 1;
    case 'optional':
      return true;
    case 'enum':
      return type.values.length > 1;
    default:
      return false;
  }
}

export class TypeScriptTypeMapper implements TypeMapper {
  constructor(private readonly typeNames: ReadonlyMap<ModelId, string>) {}

  map(type: TypeRef): MappedType {
    const result: MappedType = { text: '', references: new Set(), warnings: [] };
    result.text = this.render(type, result);
    return result;
  }

  /**
   * @throws {GenerationError} For a reference to a model the run does not know
   */
  private render(type: TypeRef, acc: MappedType): string {
    switch (type.kind) {
      case 'primitive':
        return PRIMITIVES[type.primitive];

      case 'array': {
        const items = this.render(type.items, acc);
        return needsParentheses(type.items) ? `(${items})[]` : `${items}[]`;
      }

      case 'optional': {
        const inner = this.render(type.inner, acc);
        return inner === 'null' ? inner : `${inner} | null`;
      }

      case 'union': {
        const members = type.members.map(member => this.render(member, acc));
        return [...new Set(members)].join(' | ');
      }

      case 'map': {
        const value = this.render(type.value, acc);
        return `Record<${this.renderKey(type.key, acc)}, ${value}>`;
      }

      case 'enum':
        return [...new Set(type.values.map(value => renderLiteral(value)))].join(' | ');

      case 'reference': {
        const name = this.typeNames.get(type.id);
        if (!name) {
          throw new GenerationError(`Reference to unknown model "${type.id}"`, { model: type.id });
        }
        acc.references.add(type.id);
        return name;
      }

      case 'literal':
        return renderLiteral(type.value);

      case 'unknown':
        acc.warnings.push(`rendered as ${PERMISSIVE_TYPE}: ${type.reason}`);
        return PERMISSIVE_TYPE;
    }
  }

  private renderKey(key: TypeRef, acc: MappedType): string {
    if (key.kind === 'primitive') {
      return key.primitive === 'integer' || key.primitive === 'float' ? 'number' : 'string';
    }
    if (key.kind === 'enum' || (key.kind === 'literal' && typeof key.value === 'string')) {
      return this.render(key, acc);
    }
    return 'string';
  }
}
