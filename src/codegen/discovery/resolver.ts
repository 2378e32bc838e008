/**
 * Route Resolver
 *
 * Builds the route table for one run. Files that match the auto-discovery
 * patterns get a path prefix derived from their folders; every other route
 * is grouped by its source file, first tag or first path segment.
 */

import { posix } from 'path';
import type { GeneratorConfig } from '../../config.js';
import { DiscoveryValidationError } from '../../errors.js';
import type { RawRouteGroup } from '../ir/builder.js';
import type { RawRouteDescriptor } from '../ir/descriptors.js';
import { pathToMethodName, toCamelCase } from '../utils/naming.js';
import { isDiscoveryCandidate, isIncluded } from './file-patterns.js';
import {
  isParameterSegment,
  parseSegment,
  renderSegment,
  type FolderSegment,
  type ParameterSegment,
} from './segments.js';

export interface DiscoveryOptions {
  enabled: boolean;
  /** Scan root, relative to the project root */
  root: string;
  filePatterns: readonly string[];
  include: readonly string[];
  exclude: readonly string[];
}

export interface RouteTableOptions {
  discovery: DiscoveryOptions;
  includeDeprecated: boolean;
}

export interface FolderPrefix {
  /** `/users/{user_id}`, or `''` for files directly under the scan root */
  prefix: string;
  /** Dynamic and rest segments, outermost first */
  parameters: ParameterSegment[];
}

export function routeTableOptionsFromConfig(config: GeneratorConfig): RouteTableOptions {
  return {
    discovery: {
      enabled: config.autoDiscovery.enabled,
      root: config.autoDiscovery.root,
      filePatterns: config.autoDiscovery.filePatterns,
      include: config.include,
      exclude: config.exclude,
    },
    includeDeprecated: config.includeDeprecated,
  };
}

function normalizeFile(file: string): string {
  return posix.normalize(file.replace(/\\/g, '/')).replace(/^\.\//, '');
}

/**
 * Path of a file relative to the scan root, or `null` when it lies outside
 */
export function relativeToRoot(file: string, root: string): string | null {
  const normalizedRoot = normalizeFile(root);
  const normalizedFile = normalizeFile(file);
  const relative =
    normalizedRoot === '.' ? normalizedFile : posix.relative(normalizedRoot, normalizedFile);

  if (!relative || relative.startsWith('..') || posix.isAbsolute(relative)) {
    return null;
  }
  return relative;
}

/**
 * Whether routes from this file are auto-discovered
 */
export function isAutoDiscoveredFile(file: string, options: DiscoveryOptions): boolean {
  if (!options.enabled) return false;

  const normalized = normalizeFile(file);
  if (!isIncluded(normalized, options.include, options.exclude)) return false;
  if (relativeToRoot(normalized, options.root) === null) return false;

  return isDiscoveryCandidate(posix.basename(normalized), options.filePatterns);
}

/**
 * Resolve the folders between the scan root and a file into a path prefix
 *
 * @throws {DiscoveryValidationError} For malformed folder names or a
 * parameter name introduced twice on the same path
 */
export function resolveFolderPrefix(file: string, root: string): FolderPrefix {
  const relative = relativeToRoot(file, root) ?? normalizeFile(file);
  const directory = posix.dirname(relative);
  const components = directory === '.' ? [] : directory.split('/');

  const rendered: string[] = [];
  const parameters: ParameterSegment[] = [];

  for (const component of components) {
    const segment: FolderSegment | null = parseSegment(component);
    if (!segment) {
      throw new DiscoveryValidationError(
        `Malformed folder name "${component}" in ${file}: expected [name], [...name] or (name)`,
        { file, segment: component }
      );
    }

    if (isParameterSegment(segment)) {
      const duplicate = parameters.find(p => p.name === segment.name);
      if (duplicate) {
        throw new DiscoveryValidationError(
          `Path parameter "${segment.name}" is introduced twice above ${file} ` +
            `(by "${duplicate.raw}" and "${segment.raw}")`,
          { file, segment: segment.raw, parameter: segment.name }
        );
      }
      parameters.push(segment);
    }

    const text = renderSegment(segment);
    if (text !== null) rendered.push(text);
  }

  return { prefix: rendered.length > 0 ? `/${rendered.join('/')}` : '', parameters };
}

/**
 * Append a declared route path to a folder prefix
 *
 * @example
 * ```typescript
 * joinPaths('/files/{path:path}', '/download') // '/files/{path:path}/download'
 * joinPaths('/users', '/') // '/users'
 * ```
 */
export function joinPaths(prefix: string, path: string): string {
  const parts = `${prefix}/${path}`.split('/').filter(part => part.length > 0);
  return `/${parts.join('/')}`;
}

/**
 * Check every route of a discovered file against the parameters its folders require
 *
 * @throws {DiscoveryValidationError} Naming the file, the segment, the route and the parameter
 */
export function validateFolderParameters(
  file: string,
  parameters: readonly ParameterSegment[],
  routes: readonly RawRouteDescriptor[]
): void {
  for (const segment of parameters) {
    for (const route of routes) {
      const routeId = `${route.name || pathToMethodName(route.method, route.path)} (${route.method} ${route.path})`;
      const declared = route.parameters.find(param => param.name === segment.name);

      if (declared && declared.location === 'path') continue;

      const detail = declared ? ` (declared as a ${declared.location} parameter)` : '';
      throw new DiscoveryValidationError(
        `Route ${routeId} in ${file} must declare path parameter "${segment.name}" ` +
          `required by folder segment "${segment.raw}"${detail}`,
        { file, segment: segment.raw, route: routeId, parameter: segment.name }
      );
    }
  }
}

/**
 * Resolve all routes of one auto-discovered file
 */
export function resolveDiscoveredFile(
  file: string,
  routes: readonly RawRouteDescriptor[],
  root: string
): RawRouteGroup {
  const { prefix, parameters } = resolveFolderPrefix(file, root);
  validateFolderParameters(file, parameters, routes);

  return {
    name: fileGroupName(file),
    prefix,
    file: normalizeFile(file),
    routes: routes.map(route => ({ ...route, path: joinPaths(prefix, route.path) })),
  };
}

/**
 * Group name for routes that are not tied to a file
 */
export function getGroupName(route: RawRouteDescriptor): string {
  const tag = route.tags?.[0];
  if (tag) {
    return toCamelCase(tag);
  }

  const pathSegments = route.path
    .split('/')
    .filter(segment => segment && !segment.startsWith('{'));
  if (pathSegments.length > 0) {
    return toCamelCase(pathSegments[0]);
  }

  return 'default';
}

function fileGroupName(file: string): string {
  const base = posix.basename(normalizeFile(file));
  const stem = base.includes('.') ? base.slice(0, base.indexOf('.')) : base;
  return toCamelCase(stem.replace(/^_+/, '')) || 'index';
}

/**
 * Build the route table for a run
 *
 * Discovered files are validated before deprecated routes are dropped, so a
 * deprecated handler with a missing folder parameter still fails startup.
 *
 * @throws {DiscoveryValidationError} On the first folder/handler mismatch
 */
export function resolveRouteTable(
  routes: readonly RawRouteDescriptor[],
  options: RouteTableOptions
): RawRouteGroup[] {
  const byFile = new Map<string, RawRouteDescriptor[]>();
  const byGroup = new Map<string, RawRouteDescriptor[]>();

  for (const route of routes) {
    const key = route.sourceFile ? normalizeFile(route.sourceFile) : undefined;
    if (key !== undefined) {
      const list = byFile.get(key) ?? [];
      list.push(route);
      byFile.set(key, list);
    } else {
      const name = getGroupName(route);
      const list = byGroup.get(name) ?? [];
      list.push(route);
      byGroup.set(name, list);
    }
  }

  const keep = (route: RawRouteDescriptor): boolean =>
    options.includeDeprecated || !route.deprecated;

  const groups: RawRouteGroup[] = [];

  for (const [file, fileRoutes] of byFile) {
    const group = isAutoDiscoveredFile(file, options.discovery)
      ? resolveDiscoveredFile(file, fileRoutes, options.discovery.root)
      : { name: fileGroupName(file), prefix: '', file, routes: fileRoutes };
    groups.push({ ...group, routes: group.routes.filter(keep) });
  }

  for (const [name, groupRoutes] of byGroup) {
    groups.push({ name, prefix: '', file: name, virtual: true, routes: groupRoutes.filter(keep) });
  }

  return groups
    .filter(group => group.routes.length > 0)
    .map(group => ({
      ...group,
      routes: group.routes.map(route => ({
        ...route,
        name: route.name || pathToMethodName(route.method, route.path),
      })),
    }));
}
