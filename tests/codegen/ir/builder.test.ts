import { DiagnosticCollector } from '../../../src/errors';
import { buildProjectIR, uniqueName, type RawRouteGroup } from '../../../src/codegen/ir/builder';
import type {
  RawRouteDescriptor,
  RawSchemaDescriptor,
  RawTypeDescriptor,
} from '../../../src/codegen/ir/descriptors';
import { reachableModels } from '../../../src/codegen/ir/types';

const str: RawTypeDescriptor = { kind: 'primitive', name: 'str' };
const int: RawTypeDescriptor = { kind: 'primitive', name: 'int' };
const none: RawTypeDescriptor = { kind: 'primitive', name: 'None' };

function route(overrides: Partial<RawRouteDescriptor> = {}): RawRouteDescriptor {
  return { name: 'get_item', method: 'GET', path: '/items', parameters: [], ...overrides };
}

function group(file: string, routes: RawRouteDescriptor[]): RawRouteGroup {
  return { name: file.replace(/\.py$/, ''), prefix: '', file, routes };
}

const categorySchema: RawSchemaDescriptor = {
  identity: 'app.models.Category',
  name: 'Category',
  fields: [
    { name: 'name', type: str, optional: false },
    {
      name: 'parent',
      type: { kind: 'optional', inner: { kind: 'ref', identity: 'app.models.Category' } },
      optional: true,
    },
    {
      name: 'children',
      type: { kind: 'array', items: { kind: 'ref', identity: 'app.models.Category' } },
      optional: false,
    },
  ],
};

describe('buildProjectIR', () => {
  let diagnostics: DiagnosticCollector;

  beforeEach(() => {
    diagnostics = new DiagnosticCollector();
  });

  test('self-referencing models terminate as references', () => {
    const ir = buildProjectIR(
      [categorySchema],
      [group('categories.py', [route({ response: { kind: 'ref', identity: 'app.models.Category' } })])],
      diagnostics
    );

    expect([...ir.models.keys()]).toEqual(['app.models.Category']);
    expect(ir.models.get('app.models.Category')?.fields).toEqual([
      { name: 'name', type: { kind: 'primitive', primitive: 'string' }, optional: false },
      {
        name: 'parent',
        type: { kind: 'optional', inner: { kind: 'reference', id: 'app.models.Category' } },
        optional: true,
      },
      {
        name: 'children',
        type: { kind: 'array', items: { kind: 'reference', id: 'app.models.Category' } },
        optional: false,
      },
    ]);
    expect(ir.groups[0].routes[0].response).toEqual({ kind: 'reference', id: 'app.models.Category' });
  });

  test('mutually recursive models each appear once', () => {
    const author: RawSchemaDescriptor = {
      identity: 'Author',
      name: 'Author',
      fields: [{ name: 'books', type: { kind: 'array', items: { kind: 'ref', identity: 'Book' } }, optional: false }],
    };
    const book: RawSchemaDescriptor = {
      identity: 'Book',
      name: 'Book',
      fields: [{ name: 'author', type: { kind: 'ref', identity: 'Author' }, optional: false }],
    };

    const ir = buildProjectIR(
      [book, author],
      [group('books.py', [route({ response: { kind: 'ref', identity: 'Book' } })])],
      diagnostics
    );

    expect([...ir.models.keys()]).toEqual(['Book', 'Author']);
    expect(diagnostics.size).toBe(0);
  });

  test('an inline schema used twice is registered once by identity', () => {
    const address: RawSchemaDescriptor = {
      identity: 'Address',
      name: 'Address',
      fields: [{ name: 'city', type: str, optional: false }],
    };

    const ir = buildProjectIR(
      [],
      [
        group('users.py', [
          route({ name: 'get_home', response: { kind: 'schema', schema: address } }),
          route({ name: 'get_work', response: { kind: 'schema', schema: address } }),
        ]),
      ],
      diagnostics
    );

    expect(ir.models.size).toBe(1);
    expect(ir.groups[0].routes.map(r => r.response)).toEqual([
      { kind: 'reference', id: 'Address' },
      { kind: 'reference', id: 'Address' },
    ]);
  });

  test('distinct schemas sharing a name get a numeric suffix', () => {
    const first: RawSchemaDescriptor = { identity: 'a.Item', name: 'Item', fields: [] };
    const second: RawSchemaDescriptor = { identity: 'b.Item', name: 'Item', fields: [] };

    const ir = buildProjectIR(
      [first, second],
      [
        group('items.py', [
          route({
            response: {
              kind: 'union',
              members: [
                { kind: 'ref', identity: 'a.Item' },
                { kind: 'ref', identity: 'b.Item' },
              ],
            },
          }),
        ]),
      ],
      diagnostics
    );

    expect([...ir.models.values()].map(model => model.name)).toEqual(['Item', 'Item2']);
    expect(diagnostics.list()).toEqual([
      {
        severity: 'warning',
        code: 'TYPE_MAPPING_ERROR',
        message: 'Model name "Item" is used by another schema; renamed to "Item2"',
        subject: 'b.Item',
      },
    ]);
  });

  test('types without a mapping rule degrade to unknown', () => {
    const ir = buildProjectIR(
      [],
      [
        group('misc.py', [
          route({
            parameters: [
              { name: 'amount', location: 'query', type: { kind: 'primitive', name: 'Decimal128' }, required: true },
              { name: 'blob', location: 'query', type: { kind: 'unsupported', name: 'Frozenset' }, required: false },
              { name: 'owner', location: 'query', type: { kind: 'ref', identity: 'missing.Owner' }, required: false },
            ],
          }),
        ]),
      ],
      diagnostics
    );

    expect(ir.groups[0].routes[0].parameters.map(param => param.type)).toEqual([
      { kind: 'unknown', reason: 'no mapping rule for type "Decimal128"' },
      { kind: 'unknown', reason: 'no mapping rule for type "Frozenset"' },
      { kind: 'unknown', reason: 'unresolved schema reference "missing.Owner"' },
    ]);
  });

  test('a union with null becomes optional', () => {
    const ir = buildProjectIR(
      [],
      [
        group('misc.py', [
          route({ response: { kind: 'union', members: [str, none] } }),
          route({ name: 'get_mixed', response: { kind: 'union', members: [str, int, none] } }),
          route({ name: 'get_null', response: { kind: 'union', members: [none] } }),
        ]),
      ],
      diagnostics
    );

    expect(ir.groups[0].routes.map(r => r.response)).toEqual([
      { kind: 'optional', inner: { kind: 'primitive', primitive: 'string' } },
      {
        kind: 'optional',
        inner: {
          kind: 'union',
          members: [
            { kind: 'primitive', primitive: 'string' },
            { kind: 'primitive', primitive: 'integer' },
          ],
        },
      },
      { kind: 'primitive', primitive: 'null' },
    ]);
  });

  test('path parameters are required and a missing response is any', () => {
    const ir = buildProjectIR(
      [],
      [
        group('users.py', [
          route({
            path: '/users/{user_id}',
            parameters: [{ name: 'user_id', location: 'path', type: int, required: false }],
          }),
        ]),
      ],
      diagnostics
    );

    const built = ir.groups[0].routes[0];
    expect(built.parameters[0].required).toBe(true);
    expect(built.response).toEqual({ kind: 'primitive', primitive: 'any' });
    expect(built.tags).toEqual([]);
    expect(built.deprecated).toBe(false);
  });

  test('duplicate route names within a group are renamed', () => {
    const ir = buildProjectIR(
      [],
      [group('users.py', [route({ path: '/a' }), route({ path: '/b' })])],
      diagnostics
    );

    expect(ir.groups[0].routes.map(r => r.name)).toEqual(['get_item', 'get_item2']);
    expect(diagnostics.list()[0]).toEqual({
      severity: 'warning',
      code: 'TYPE_MAPPING_ERROR',
      message: 'Route name "get_item" is already used in users.py; renamed to "get_item2"',
      subject: 'GET /b',
    });
  });

  test('groups are sorted by file and the result is frozen', () => {
    const ir = buildProjectIR(
      [],
      [group('users.py', [route()]), group('items.py', [route()])],
      diagnostics
    );

    expect(ir.groups.map(g => g.file)).toEqual(['items.py', 'users.py']);
    expect(Object.isFrozen(ir.groups)).toBe(true);
    expect(Object.isFrozen(ir.groups[0].routes[0])).toBe(true);
  });

  test('schemas no route reaches are not modelled', () => {
    const ir = buildProjectIR(
      [categorySchema, { identity: 'Unused', name: 'Unused', fields: [] }],
      [group('categories.py', [route({ response: { kind: 'ref', identity: 'app.models.Category' } })])],
      diagnostics
    );

    expect(ir.models.has('Unused')).toBe(false);
  });
});

describe('reachableModels', () => {
  test('follows references through model fields in model order', () => {
    const ir = buildProjectIR(
      [
        { identity: 'Order', name: 'Order', fields: [{ name: 'customer', type: { kind: 'ref', identity: 'Customer' }, optional: false }] },
        { identity: 'Customer', name: 'Customer', fields: [] },
        { identity: 'Tag', name: 'Tag', fields: [] },
      ],
      [
        group('orders.py', [route({ response: { kind: 'ref', identity: 'Order' } })]),
        group('tags.py', [route({ response: { kind: 'ref', identity: 'Tag' } })]),
      ],
      new DiagnosticCollector()
    );

    const reached = reachableModels([{ kind: 'reference', id: 'Order' }], ir.models);
    expect(reached.map(model => model.name)).toEqual(['Order', 'Customer']);
  });
});

describe('uniqueName', () => {
  test('appends the first free counter', () => {
    const taken = new Set(['user', 'user2']);
    expect(uniqueName('user', taken)).toBe('user3');
    expect(taken.has('user3')).toBe(true);
  });
});
