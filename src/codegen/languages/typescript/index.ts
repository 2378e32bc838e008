import type { LanguagePlugin } from '../types.js';
import { renderGroupModule } from './module-template.js';
import { renderRuntime } from './runtime-template.js';

export const typescriptPlugin: LanguagePlugin = {
  id: 'typescript',
  fileExtension: '.ts',
  runtimeModuleName: 'runtime',
  renderGroupModule,
  renderRuntimeModule: renderRuntime,
};

export { TypeScriptTypeMapper, createTypeNames } from './type-mapper.js';
export { GENERATED_HEADER } from './runtime-template.js';
