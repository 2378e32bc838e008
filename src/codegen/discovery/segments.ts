/**
 * Folder segment grammar for auto-discovery
 *
 * - `users`      literal, kept as is
 * - `[id]`       dynamic segment, `{id}`
 * - `[...path]`  rest segment, `{path:path}`
 * - `(admin)`    route group, contributes nothing to the path
 */

export type FolderSegment =
  | { kind: 'literal'; raw: string; value: string }
  | { kind: 'dynamic'; raw: string; name: string }
  | { kind: 'rest'; raw: string; name: string }
  | { kind: 'group'; raw: string; name: string };

export type ParameterSegment = Extract<FolderSegment, { kind: 'dynamic' | 'rest' }>;

const REST = /^\[\.\.\.([A-Za-z_][A-Za-z0-9_]*)\]$/;
const DYNAMIC = /^\[([A-Za-z_][A-Za-z0-9_]*)\]$/;
const GROUP = /^\(([^()/]+)\)$/;

/**
 * Parse one folder name
 *
 * @returns The segment, or `null` when the name uses bracket or parenthesis
 * syntax but is malformed (`[]`, `[...]`, `()`, `[a b]`)
 */
export function parseSegment(component: string): FolderSegment | null {
  const rest = REST.exec(component);
  if (rest) return { kind: 'rest', raw: component, name: rest[1] };

  const dynamic = DYNAMIC.exec(component);
  if (dynamic) return { kind: 'dynamic', raw: component, name: dynamic[1] };

  const group = GROUP.exec(component);
  if (group) return { kind: 'group', raw: component, name: group[1] };

  if (/^[[(]/.test(component) || /[\])]$/.test(component)) {
    return null;
  }

  return { kind: 'literal', raw: component, value: component };
}

/**
 * Path template text of a segment; `null` for route groups
 */
export function renderSegment(segment: FolderSegment): string | null {
  switch (segment.kind) {
    case 'literal':
      return segment.value;
    case 'dynamic':
      return `{${segment.name}}`;
    case 'rest':
      return `{${segment.name}:path}`;
    case 'group':
      return null;
  }
}

export function isParameterSegment(segment: FolderSegment): segment is ParameterSegment {
  return segment.kind === 'dynamic' || segment.kind === 'rest';
}
