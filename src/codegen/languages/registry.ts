import { ConfigError } from '../../errors.js';
import type { LanguagePlugin } from './types.js';
import { typescriptPlugin } from './typescript/index.js';

/**
 * Language plugins keyed by target identifier
 */
export class LanguageRegistry {
  private readonly plugins = new Map<string, LanguagePlugin>();

  constructor(plugins: readonly LanguagePlugin[] = []) {
    plugins.forEach(plugin => this.register(plugin));
  }

  register(plugin: LanguagePlugin): this {
    this.plugins.set(plugin.id, plugin);
    return this;
  }

  has(id: string): boolean {
    return this.plugins.has(id);
  }

  /**
   * @throws {ConfigError} When no plugin is registered for `id`
   */
  get(id: string): LanguagePlugin {
    const plugin = this.plugins.get(id);
    if (!plugin) {
      throw new ConfigError(
        `Unsupported language "${id}". Available: ${[...this.plugins.keys()].join(', ')}`,
        ['language']
      );
    }
    return plugin;
  }

  ids(): string[] {
    return [...this.plugins.keys()];
  }
}

/**
 * A fresh registry holding the built-in targets
 */
export function createLanguageRegistry(): LanguageRegistry {
  return new LanguageRegistry([typescriptPlugin]);
}
