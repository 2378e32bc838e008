/**
 * Output Planner
 *
 * Decides where every artifact of a run goes and renders its content.
 * Paths are posix and relative to the project root. Nothing is written here;
 * collisions are detected before the writer runs.
 */

import { posix } from 'path';
import type { GeneratorConfig } from '../../config.js';
import { OutputCollisionError, type DiagnosticCollector } from '../../errors.js';
import { compareStrings } from '../ir/builder.js';
import type { ProjectIR, RouteGroup } from '../ir/types.js';
import type { LanguagePlugin } from '../languages/types.js';

export type ArtifactKind = 'runtime' | 'group';

export interface PlannedArtifact {
  kind: ArtifactKind;
  /** Posix path relative to the project root */
  path: string;
  /** Source file or group the artifact was generated from */
  origin: string;
  content: string;
}

export interface OutputPlan {
  runtimePath: string;
  /** Sorted by path */
  artifacts: PlannedArtifact[];
}

function normalize(path: string): string {
  return posix.normalize(path.replace(/\\/g, '/')).replace(/^\.\//, '');
}

function withExtension(file: string, extension: string): string {
  const parsed = posix.parse(file);
  return posix.join(parsed.dir, `${parsed.name}${extension}`);
}

/**
 * Output path of a group module. Groups without a source file always go
 * under the output location, whatever the strategy.
 *
 * @example
 * ```typescript
 * // mirror, location `.typed-routes`
 * groupOutputPath({ file: 'src/users/_route.py' }, output, '.ts') // '.typed-routes/src/users/_route.ts'
 * // co-locate
 * groupOutputPath({ file: 'src/users/_route.py' }, output, '.ts') // 'src/users/_route.ts'
 * groupOutputPath({ file: 'orders', virtual: true }, output, '.ts') // '.typed-routes/orders.ts'
 * ```
 */
export function groupOutputPath(
  group: Pick<RouteGroup, 'file' | 'virtual'>,
  output: GeneratorConfig['output'],
  extension: string
): string {
  const target = withExtension(normalize(group.file), extension);
  return output.strategy === 'mirror' || group.virtual
    ? normalize(posix.join(output.location, target))
    : target;
}

export function runtimeOutputPath(output: GeneratorConfig['output'], plugin: LanguagePlugin): string {
  return normalize(posix.join(output.location, `${plugin.runtimeModuleName}${plugin.fileExtension}`));
}

/**
 * Extensionless relative import specifier from one artifact to another
 *
 * @example
 * ```typescript
 * relativeImport('.typed-routes/src/users/_route.ts', '.typed-routes/runtime.ts') // '../../runtime'
 * ```
 */
export function relativeImport(from: string, to: string): string {
  const relative = posix.relative(posix.dirname(from), to);
  const parsed = posix.parse(relative);
  const specifier = posix.join(parsed.dir, parsed.name);
  return specifier.startsWith('.') ? specifier : `./${specifier}`;
}

/**
 * Map every group to its output path
 *
 * @throws {OutputCollisionError} When two groups share a path, a group lands
 * on the runtime module, or a group would overwrite its own source file
 */
export function assignOutputPaths(
  groups: readonly RouteGroup[],
  config: GeneratorConfig,
  plugin: LanguagePlugin
): Map<string, RouteGroup> {
  const runtimePath = runtimeOutputPath(config.output, plugin);
  const assigned = new Map<string, RouteGroup>();

  for (const group of groups) {
    const path = groupOutputPath(group, config.output, plugin.fileExtension);

    if (path === runtimePath) {
      throw new OutputCollisionError(path, ['runtime module', group.file]);
    }
    if (path === normalize(group.file)) {
      throw new OutputCollisionError(path, [`source file ${group.file}`, `client for ${group.file}`]);
    }
    const existing = assigned.get(path);
    if (existing) {
      throw new OutputCollisionError(path, [existing.file, group.file]);
    }

    assigned.set(path, group);
  }

  return assigned;
}

/**
 * Plan and render every artifact of a run
 */
export function planOutput(
  ir: ProjectIR,
  config: GeneratorConfig,
  plugin: LanguagePlugin,
  diagnostics: DiagnosticCollector
): OutputPlan {
  const runtimePath = runtimeOutputPath(config.output, plugin);
  const assigned = assignOutputPaths(ir.groups, config, plugin);

  const artifacts: PlannedArtifact[] = [
    {
      kind: 'runtime',
      path: runtimePath,
      origin: plugin.runtimeModuleName,
      content: plugin.renderRuntimeModule(config),
    },
  ];

  for (const [path, group] of assigned) {
    artifacts.push({
      kind: 'group',
      path,
      origin: group.file,
      content: plugin.renderGroupModule(group, {
        ir,
        config,
        diagnostics,
        runtimeImport: relativeImport(path, runtimePath),
      }),
    });
  }

  artifacts.sort((a, b) => compareStrings(a.path, b.path));
  return { runtimePath, artifacts };
}
