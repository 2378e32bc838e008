/**
 * Client generation pipeline
 *
 * descriptors -> route table -> Project IR -> output plan -> files
 *
 * Fatal errors propagate before anything is written. Everything else ends up
 * in the report's diagnostics.
 */

import type { GeneratorConfig } from '../config.js';
import {
  DescriptorSourceError,
  DiagnosticCollector,
  describeError,
  formatDiagnostics,
  isTypedRoutesError,
  type Diagnostic,
} from '../errors.js';
import { logInfo, logWarning } from '../logger.js';
import { resolveRouteTable, routeTableOptionsFromConfig } from './discovery/resolver.js';
import { buildProjectIR, type RawRouteGroup } from './ir/builder.js';
import type { DescriptorSource, RawRouteDescriptor, RawSchemaDescriptor } from './ir/descriptors.js';
import { createLanguageRegistry, type LanguageRegistry } from './languages/registry.js';
import { planOutput } from './output/planner.js';
import { writeArtifacts } from './output/writer.js';
import { GenerationScheduler } from './scheduler.js';

export interface GenerateOptions {
  config: GeneratorConfig;
  source: DescriptorSource;
  /** Project root that relative paths resolve against. Defaults to `process.cwd()`. */
  rootDir?: string;
  registry?: LanguageRegistry;
  /** Plan and render without touching the file system */
  dryRun?: boolean;
  /** Suppress the summary and diagnostic lines */
  quiet?: boolean;
}

export interface GenerationReport {
  /** Every planned artifact path, sorted */
  files: string[];
  written: string[];
  unchanged: string[];
  failed: string[];
  routeCount: number;
  modelCount: number;
  diagnostics: Diagnostic[];
}

interface Refreshable {
  refresh(): void;
}

function isRefreshable(source: DescriptorSource): source is DescriptorSource & Refreshable {
  return 'refresh' in source && typeof source.refresh === 'function';
}

async function readDescriptors(
  source: DescriptorSource
): Promise<{ routes: RawRouteDescriptor[]; schemas: RawSchemaDescriptor[] }> {
  try {
    const routes = await source.enumerateRoutes();
    const schemas = await source.enumerateSchemas();
    return { routes, schemas };
  } catch (error) {
    if (isTypedRoutesError(error)) throw error;
    throw new DescriptorSourceError(`Failed to read descriptors: ${describeError(error)}`, {}, error);
  }
}

/**
 * Resolve the route table only, for hosts that refuse to serve the API when
 * a discovered file does not declare its folder parameters
 *
 * @throws {DiscoveryValidationError} On the first folder/handler mismatch
 */
export async function validateDiscovery(
  source: DescriptorSource,
  config: GeneratorConfig
): Promise<RawRouteGroup[]> {
  const { routes } = await readDescriptors(source);
  return resolveRouteTable(routes, routeTableOptionsFromConfig(config));
}

function logReport(report: GenerationReport): void {
  const parts = [`${report.written.length} written`, `${report.unchanged.length} unchanged`];
  if (report.failed.length > 0) parts.push(`${report.failed.length} failed`);

  logInfo(
    `Generated ${report.files.length} files for ${report.routeCount} routes and ${report.modelCount} models (${parts.join(', ')})`
  );
  formatDiagnostics(report.diagnostics).forEach(line => logWarning(line));
}

/**
 * Run one generation
 *
 * @throws {ConfigError} When no plugin exists for `config.language`
 * @throws {DescriptorSourceError} When the descriptors cannot be read
 * @throws {DiscoveryValidationError} When a discovered file is invalid
 * @throws {OutputCollisionError} When two artifacts claim the same path
 */
export async function generateClient(options: GenerateOptions): Promise<GenerationReport> {
  const { config, source } = options;
  const rootDir = options.rootDir ?? process.cwd();
  const plugin = (options.registry ?? createLanguageRegistry()).get(config.language);
  const diagnostics = new DiagnosticCollector();

  const { routes, schemas } = await readDescriptors(source);
  const groups = resolveRouteTable(routes, routeTableOptionsFromConfig(config));
  const ir = buildProjectIR(schemas, groups, diagnostics);
  const plan = planOutput(ir, config, plugin, diagnostics);

  const files = plan.artifacts.map(artifact => artifact.path);
  const result = options.dryRun
    ? { written: [], unchanged: [], failed: [] }
    : await writeArtifacts(rootDir, plan.artifacts, diagnostics);

  const report: GenerationReport = {
    files,
    ...result,
    routeCount: ir.groups.reduce((count, group) => count + group.routes.length, 0),
    modelCount: ir.models.size,
    diagnostics: diagnostics.drain(),
  };

  if (!options.quiet) {
    logReport(report);
  }
  return report;
}

/**
 * Scheduler for watch mode. Sources that cache a snapshot are refreshed
 * before every run.
 */
export function createGenerationScheduler(options: GenerateOptions): GenerationScheduler<GenerationReport> {
  return new GenerationScheduler(() => {
    if (isRefreshable(options.source)) {
      options.source.refresh();
    }
    return generateClient(options);
  });
}
