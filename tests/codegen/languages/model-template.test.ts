import { primitive, type Model } from '../../../src/codegen/ir/types';
import { renderDocComment } from '../../../src/codegen/languages/typescript/doc-comment';
import { renderModel, renderModelPlaceholder } from '../../../src/codegen/languages/typescript/model-template';
import { TypeScriptTypeMapper } from '../../../src/codegen/languages/typescript/type-mapper';

const mapper = new TypeScriptTypeMapper(new Map([['User', 'User']]));

describe('renderModel', () => {
  test('declares one member per field in field order', () => {
    const user: Model = {
      id: 'User',
      name: 'User',
      fields: [
        { name: 'id', type: primitive('integer'), optional: false },
        { name: 'name', type: primitive('string'), optional: false },
        { name: 'email', type: primitive('string'), optional: false },
      ],
    };

    const rendered = renderModel(user, 'User', mapper);
    expect(rendered.text).toBe(
      ['export interface User {', '  id: number;', '  name: string;', '  email: string;', '}'].join('\n')
    );
    expect(rendered.warnings).toEqual([]);
  });

  test('documents descriptions, defaults and constraints', () => {
    const account: Model = {
      id: 'Account',
      name: 'Account',
      description: 'A billing account',
      fields: [
        {
          name: 'active',
          type: primitive('boolean'),
          optional: true,
          default: { value: true },
          description: 'Whether the account can be billed',
        },
        { name: 'code', type: primitive('string'), optional: false, constraints: { maxLength: 8 } },
        { name: 'display-name', type: primitive('string'), optional: false },
      ],
    };

    expect(renderModel(account, 'Account', mapper).text).toBe(
      [
        '/** A billing account */',
        'export interface Account {',
        '  /**',
        '   * Whether the account can be billed',
        '   *',
        '   * @default true',
        '   */',
        '  active?: boolean;',
        '  /** @maxLength 8 */',
        '  code: string;',
        "  'display-name': string;",
        '}',
      ].join('\n')
    );
  });

  test('a field without a mapping rule becomes any and is reported', () => {
    const invoice: Model = {
      id: 'Invoice',
      name: 'Invoice',
      fields: [
        { name: 'number', type: primitive('string'), optional: false },
        { name: 'total', type: { kind: 'unknown', reason: 'no mapping rule for type "Decimal"' }, optional: false },
        { name: 'owner', type: { kind: 'reference', id: 'User' }, optional: false },
      ],
    };

    const rendered = renderModel(invoice, 'Invoice', mapper);
    expect(rendered.text).toBe(
      ['export interface Invoice {', '  number: string;', '  total: any;', '  owner: User;', '}'].join('\n')
    );
    expect(rendered.warnings).toEqual([
      { subject: 'Invoice.total', message: 'rendered as any: no mapping rule for type "Decimal"' },
    ]);
  });

  test('a model without fields is an empty interface', () => {
    expect(renderModel({ id: 'Empty', name: 'Empty', fields: [] }, 'Empty', mapper).text).toBe(
      'export interface Empty {}'
    );
  });
});

describe('renderModelPlaceholder', () => {
  test('aliases the name to any', () => {
    expect(renderModelPlaceholder('User', 'boom')).toBe(
      '/** Generation failed: boom */\nexport type User = any;'
    );
  });
});

describe('renderDocComment', () => {
  test('renders nothing without lines', () => {
    expect(renderDocComment([])).toBe('');
    expect(renderDocComment(['', ''])).toBe('');
  });

  test('escapes comment terminators', () => {
    expect(renderDocComment(['a */ b'])).toBe('/** a *\\/ b */\n');
  });
});
