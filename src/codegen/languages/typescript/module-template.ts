/**
 * Group module
 *
 * One module per route group: the models its routes reach, then one
 * function per route. A route or model that fails to render is replaced by
 * a placeholder and reported; the rest of the module still renders.
 */

import { describeError, GenerationError } from '../../../errors.js';
import type { DiagnosticCollector } from '../../../errors.js';
import { uniqueName } from '../../ir/builder.js';
import { reachableModels } from '../../ir/types.js';
import type { ModelId, RouteGroup, TypeRef } from '../../ir/types.js';
import { toCamelCase, toValidIdentifier } from '../../utils/naming.js';
import type { ModuleRenderContext } from '../types.js';
import { renderModel, renderModelPlaceholder, type TypeWarning } from './model-template.js';
import {
  renderRoute,
  renderRoutePlaceholder,
  RUNTIME_HELPERS,
  type RuntimeHelper,
} from './route-template.js';
import { GENERATED_HEADER } from './runtime-template.js';
import { createTypeNames, RUNTIME_TYPE_NAMES, TypeScriptTypeMapper } from './type-mapper.js';

function toGenerationError(error: unknown, details: Record<string, string>): GenerationError {
  if (error instanceof GenerationError) return error;
  return new GenerationError(describeError(error), details, error);
}

function reportWarnings(warnings: readonly TypeWarning[], diagnostics: DiagnosticCollector): void {
  warnings.forEach(warning => diagnostics.warn(warning.message, warning.subject));
}

export function renderImports(helpers: ReadonlySet<RuntimeHelper>, runtimeImport: string): string {
  const used = RUNTIME_HELPERS.filter(helper => helpers.has(helper));
  const lines = [`import type { ApiResult } from '${runtimeImport}';`];
  if (used.length > 0) {
    lines.push(`import { ${used.join(', ')} } from '${runtimeImport}';`);
  }
  return lines.join('\n');
}

export function renderGroupModule(group: RouteGroup, context: ModuleRenderContext): string {
  const { ir, diagnostics } = context;
  const typeNames = createTypeNames(ir.models);
  const mapper = new TypeScriptTypeMapper(typeNames);

  const helpers = new Set<RuntimeHelper>();
  const references = new Set<ModelId>();
  const functionNames = new Set<string>([...RUNTIME_HELPERS, ...RUNTIME_TYPE_NAMES, 'getBaseUrl']);
  const routeBlocks: string[] = [];

  for (const route of group.routes) {
    const functionName = uniqueName(toValidIdentifier(toCamelCase(route.name)), functionNames);
    try {
      const rendered = renderRoute(route, functionName, mapper);
      rendered.helpers.forEach(helper => helpers.add(helper));
      rendered.references.forEach(id => references.add(id));
      reportWarnings(rendered.warnings, diagnostics);
      routeBlocks.push(rendered.text);
    } catch (error) {
      const failure = toGenerationError(error, { route: route.name, file: group.file });
      diagnostics.report(failure, `${group.file}#${route.name}`);
      routeBlocks.push(renderRoutePlaceholder(functionName, failure.message));
    }
  }

  const roots: TypeRef[] = [...references].map(id => ({ kind: 'reference', id }));
  const modelBlocks = reachableModels(roots, ir.models).map(model => {
    const typeName = typeNames.get(model.id) ?? model.name;
    try {
      const rendered = renderModel(model, typeName, mapper);
      reportWarnings(rendered.warnings, diagnostics);
      return rendered.text;
    } catch (error) {
      const failure = toGenerationError(error, { model: model.id });
      diagnostics.report(failure, model.name);
      return renderModelPlaceholder(typeName, failure.message);
    }
  });

  const sections = [GENERATED_HEADER, renderImports(helpers, context.runtimeImport)];
  if (modelBlocks.length > 0) sections.push(modelBlocks.join('\n\n'));
  if (routeBlocks.length > 0) sections.push(routeBlocks.join('\n\n'));

  return sections.join('\n\n') + '\n';
}
