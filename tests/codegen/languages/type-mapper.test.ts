import { GenerationError } from '../../../src/errors';
import { primitive, type Model, type TypeRef } from '../../../src/codegen/ir/types';
import {
  TypeScriptTypeMapper,
  createTypeNames,
  renderLiteral,
} from '../../../src/codegen/languages/typescript/type-mapper';

const mapper = new TypeScriptTypeMapper(new Map([['app.User', 'User']]));

function text(type: TypeRef): string {
  return mapper.map(type).text;
}

describe('TypeScriptTypeMapper', () => {
  test('maps primitives', () => {
    expect(text(primitive('integer'))).toBe('number');
    expect(text(primitive('float'))).toBe('number');
    expect(text(primitive('datetime'))).toBe('string');
    expect(text(primitive('bytes'))).toBe('Blob');
    expect(text(primitive('null'))).toBe('null');
  });

  test('adds null for optional types', () => {
    expect(text({ kind: 'optional', inner: primitive('string') })).toBe('string | null');
    expect(text({ kind: 'optional', inner: primitive('null') })).toBe('null');
  });

  test('parenthesizes compound array items', () => {
    expect(text({ kind: 'array', items: primitive('string') })).toBe('string[]');
    expect(text({ kind: 'array', items: { kind: 'optional', inner: primitive('integer') } })).toBe(
      '(number | null)[]'
    );
    expect(
      text({ kind: 'array', items: { kind: 'union', members: [primitive('string'), primitive('integer')] } })
    ).toBe('(string | number)[]');
  });

  test('collapses duplicate union members', () => {
    expect(text({ kind: 'union', members: [primitive('integer'), primitive('float')] })).toBe('number');
  });

  test('maps records with string or number keys', () => {
    expect(text({ kind: 'map', key: primitive('string'), value: primitive('integer') })).toBe(
      'Record<string, number>'
    );
    expect(text({ kind: 'map', key: primitive('integer'), value: primitive('boolean') })).toBe(
      'Record<number, boolean>'
    );
    expect(
      text({ kind: 'map', key: { kind: 'enum', name: 'Role', values: ['admin', 'user'] }, value: primitive('any') })
    ).toBe("Record<'admin' | 'user', any>");
  });

  test('renders enums and literals', () => {
    expect(text({ kind: 'enum', name: 'Status', values: ['active', "it's", 3] })).toBe(
      "'active' | 'it\\'s' | 3"
    );
    expect(text({ kind: 'literal', value: true })).toBe('true');
    expect(renderLiteral(null)).toBe('null');
  });

  test('records model references', () => {
    const mapped = mapper.map({ kind: 'array', items: { kind: 'reference', id: 'app.User' } });
    expect(mapped.text).toBe('User[]');
    expect([...mapped.references]).toEqual(['app.User']);
  });

  test('unknown types become any with a warning', () => {
    const mapped = mapper.map({
      kind: 'optional',
      inner: { kind: 'unknown', reason: 'no mapping rule for type "Decimal"' },
    });
    expect(mapped.text).toBe('any | null');
    expect(mapped.warnings).toEqual(['rendered as any: no mapping rule for type "Decimal"']);
  });

  test('a reference to an unknown model is an error', () => {
    expect(() => text({ kind: 'reference', id: 'missing' })).toThrow(GenerationError);
  });
});

describe('createTypeNames', () => {
  test('keeps names unique and clear of runtime exports', () => {
    const model = (id: string, name: string): Model => ({ id, name, fields: [] });
    const models = new Map([
      ['a', model('a', 'user_profile')],
      ['b', model('b', 'UserProfile')],
      ['c', model('c', 'ApiResult')],
    ]);

    expect([...createTypeNames(models).values()]).toEqual(['UserProfile', 'UserProfile2', 'ApiResult2']);
  });

  test('models named after global types get a suffix', () => {
    const labels: Model = {
      id: 'app.models.Record',
      name: 'Record',
      fields: [
        {
          name: 'labels',
          type: { kind: 'map', key: primitive('string'), value: primitive('string') },
          optional: false,
        },
      ],
    };
    const names = createTypeNames(new Map([[labels.id, labels]]));

    expect(names.get('app.models.Record')).toBe('Record2');
    expect(new TypeScriptTypeMapper(names).map(labels.fields[0].type).text).toBe('Record<string, string>');
  });
});
