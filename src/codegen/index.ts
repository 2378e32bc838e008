/**
 * Typed client generator
 *
 * @example
 * ```typescript
 * import { resolveConfig } from 'typed-routes';
 * import { generateClient, OpenApiDescriptorSource } from 'typed-routes/codegen';
 *
 * await generateClient({
 *   config: resolveConfig({ framework: 'sveltekit' }),
 *   source: new OpenApiDescriptorSource('./openapi.json'),
 * });
 * ```
 */

export {
  generateClient,
  validateDiscovery,
  createGenerationScheduler,
} from './generator.js';
export type { GenerateOptions, GenerationReport } from './generator.js';
export { GenerationScheduler } from './scheduler.js';

export type {
  DescriptorSource,
  HttpMethod,
  ParameterLocation,
  RawFieldDescriptor,
  RawParameterDescriptor,
  RawRouteDescriptor,
  RawSchemaDescriptor,
  RawTypeDescriptor,
} from './ir/descriptors.js';
export type { Field, Model, Parameter, ProjectIR, Route, RouteGroup, TypeRef } from './ir/types.js';
export { buildProjectIR, type RawRouteGroup } from './ir/builder.js';

export { resolveRouteTable, routeTableOptionsFromConfig } from './discovery/resolver.js';

export { LanguageRegistry, createLanguageRegistry } from './languages/registry.js';
export type { LanguagePlugin, MappedType, ModuleRenderContext, TypeMapper } from './languages/types.js';
export { typescriptPlugin } from './languages/typescript/index.js';

export { planOutput, type OutputPlan, type PlannedArtifact } from './output/planner.js';
export { writeArtifacts, type WriteResult } from './output/writer.js';

export { StaticDescriptorSource } from './sources/static-source.js';
export { OpenApiDescriptorSource } from './sources/openapi-source.js';
export { RemoteDescriptorSource, type RemoteSourceOptions } from './sources/remote-source.js';
