/**
 * Model declarations
 */

import type { FieldConstraints } from '../../ir/descriptors.js';
import type { Field, Model } from '../../ir/types.js';
import { toPropertyKey } from '../../utils/naming.js';
import type { TypeMapper } from '../types.js';
import { renderDocComment } from './doc-comment.js';
import { PERMISSIVE_TYPE } from './type-mapper.js';

export interface TypeWarning {
  subject: string;
  message: string;
}

export interface RenderedDeclaration {
  text: string;
  warnings: TypeWarning[];
}

const CONSTRAINT_TAGS: Array<keyof FieldConstraints> = [
  'minimum',
  'maximum',
  'exclusiveMinimum',
  'exclusiveMaximum',
  'minLength',
  'maxLength',
  'pattern',
  'minItems',
  'maxItems',
];

function fieldDocLines(field: Field): string[] {
  const tags: string[] = [];

  if (field.default) {
    tags.push(`@default ${JSON.stringify(field.default.value)}`);
  }
  for (const tag of CONSTRAINT_TAGS) {
    const value = field.constraints?.[tag];
    if (value !== undefined) {
      tags.push(`@${tag} ${value}`);
    }
  }

  if (!field.description) return tags;
  return tags.length > 0 ? [field.description, '', ...tags] : [field.description];
}

/**
 * Render one `export interface` with a member per field, in field order
 */
export function renderModel(model: Model, typeName: string, mapper: TypeMapper): RenderedDeclaration {
  const warnings: TypeWarning[] = [];
  const members: string[] = [];

  for (const field of model.fields) {
    const mapped = mapper.map(field.type);
    mapped.warnings.forEach(message =>
      warnings.push({ subject: `${model.name}.${field.name}`, message })
    );

    const optional = field.optional ? '?' : '';
    members.push(
      `${renderDocComment(fieldDocLines(field), '  ')}  ${toPropertyKey(field.name)}${optional}: ${mapped.text};`
    );
  }

  const doc = renderDocComment(model.description ? [model.description] : []);
  const body = members.length > 0 ? `{\n${members.join('\n')}\n}` : '{}';

  return { text: `${doc}export interface ${typeName} ${body}`, warnings };
}

/**
 * Stand-in for a model that failed to render
 */
export function renderModelPlaceholder(typeName: string, reason: string): string {
  return `${renderDocComment([`Generation failed: ${reason}`])}export type ${typeName} = ${PERMISSIVE_TYPE};`;
}
