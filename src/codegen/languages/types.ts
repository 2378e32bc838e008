/**
 * Language plugin contract
 *
 * A target language supplies a type mapper and renderers. Adding one does
 * not touch the IR builder or the route resolver.
 */

import type { GeneratorConfig } from '../../config.js';
import type { DiagnosticCollector } from '../../errors.js';
import type { ModelId, ProjectIR, RouteGroup, TypeRef } from '../ir/types.js';

export interface MappedType {
  /** Type syntax in the target language */
  text: string;
  /** Models the text names; each must be declared in the same module */
  references: Set<ModelId>;
  /** Reasons for every part that fell back to the permissive type */
  warnings: string[];
}

export interface TypeMapper {
  map(type: TypeRef): MappedType;
}

export interface ModuleRenderContext {
  ir: ProjectIR;
  config: GeneratorConfig;
  diagnostics: DiagnosticCollector;
  /** Import specifier of the shared runtime module, relative to the module being rendered */
  runtimeImport: string;
}

export interface LanguagePlugin {
  /** Registry key, matched against `config.language` */
  id: string;
  /** Extension of generated files, including the dot */
  fileExtension: string;
  /** File name of the shared runtime module, without extension */
  runtimeModuleName: string;
  /** Render one module for a route group: its models and one callable per route */
  renderGroupModule(group: RouteGroup, context: ModuleRenderContext): string;
  /** Render the shared runtime module */
  renderRuntimeModule(config: GeneratorConfig): string;
}
