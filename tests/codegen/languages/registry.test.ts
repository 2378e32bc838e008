import { ConfigError } from '../../../src/errors';
import { LanguageRegistry, createLanguageRegistry } from '../../../src/codegen/languages/registry';
import type { LanguagePlugin } from '../../../src/codegen/languages/types';

describe('LanguageRegistry', () => {
  test('ships the typescript target', () => {
    const registry = createLanguageRegistry();
    expect(registry.ids()).toEqual(['typescript']);
    expect(registry.get('typescript').fileExtension).toBe('.ts');
  });

  test('accepts further plugins without touching the built-in ones', () => {
    const plain: LanguagePlugin = {
      id: 'plain',
      fileExtension: '.txt',
      runtimeModuleName: 'runtime',
      renderGroupModule: group => group.name,
      renderRuntimeModule: () => '',
    };

    const registry = createLanguageRegistry().register(plain);
    expect(registry.has('plain')).toBe(true);
    expect(registry.ids()).toEqual(['typescript', 'plain']);
  });

  test('an unknown language is a configuration error', () => {
    expect(() => new LanguageRegistry().get('kotlin')).toThrow(ConfigError);
    expect(() => createLanguageRegistry().get('kotlin')).toThrow(
      'Unsupported language "kotlin". Available: typescript'
    );
  });
});
