/**
 * Naming Utilities
 *
 * Converts route, schema and parameter names coming from descriptors into
 * valid identifiers for generated code.
 */

/**
 * Words that cannot be used as a binding name in generated TypeScript
 */
export const RESERVED_WORDS: ReadonlySet<string> = new Set([
  'break',
  'case',
  'catch',
  'class',
  'const',
  'continue',
  'debugger',
  'default',
  'delete',
  'do',
  'else',
  'enum',
  'export',
  'extends',
  'false',
  'finally',
  'for',
  'function',
  'if',
  'implements',
  'import',
  'in',
  'instanceof',
  'interface',
  'let',
  'new',
  'null',
  'package',
  'private',
  'protected',
  'public',
  'return',
  'static',
  'super',
  'switch',
  'this',
  'throw',
  'true',
  'try',
  'typeof',
  'var',
  'void',
  'while',
  'with',
  'yield',
  'await',
  'arguments',
  'eval',
  'undefined',
]);

function splitWords(str: string): string[] {
  return str
    .split(/[^a-zA-Z0-9]+/)
    .flatMap(word => word.replace(/([a-z0-9])([A-Z])/g, '$1 $2').split(' '))
    .filter(word => word.length > 0);
}

/**
 * Convert a string to camelCase
 *
 * @example
 * ```typescript
 * toCamelCase('user-profile') // 'userProfile'
 * toCamelCase('get_user_by_id') // 'getUserById'
 * ```
 */
export function toCamelCase(str: string): string {
  if (!str) return str;

  // Already camelCase
  if (/^[a-z][a-zA-Z0-9]*$/.test(str)) {
    return str;
  }

  return splitWords(str)
    .map((word, index) => {
      if (index === 0) {
        return word.toLowerCase();
      }
      return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
    })
    .join('');
}

/**
 * Convert a string to PascalCase, keeping capitals inside words
 *
 * @example
 * ```typescript
 * toPascalCase('user-profile') // 'UserProfile'
 * toPascalCase('UserProfile') // 'UserProfile'
 * toPascalCase('orders.patch_400') // 'OrdersPatch400'
 * ```
 */
export function toPascalCase(str: string): string {
  return str
    .split(/[^a-zA-Z0-9]+/)
    .filter(word => word.length > 0)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join('');
}

/**
 * Check if a string is a valid identifier
 */
export function isValidIdentifier(str: string): boolean {
  return /^[a-zA-Z_$][a-zA-Z0-9_$]*$/.test(str);
}

/**
 * Strip characters that cannot appear in an identifier
 */
export function sanitizeIdentifier(str: string): string {
  let sanitized = str.replace(/[^a-zA-Z0-9_$]/g, '_');

  if (!sanitized) {
    return 'unknown';
  }

  if (!/^[a-zA-Z_$]/.test(sanitized)) {
    sanitized = `_${sanitized}`;
  }

  return sanitized;
}

/**
 * Turn a descriptor name into a binding name. Valid names are kept as they
 * are (`user_id` stays `user_id`); reserved words get a `Param` suffix.
 *
 * @example
 * ```typescript
 * toValidIdentifier('user_id') // 'user_id'
 * toValidIdentifier('x-token') // 'x_token'
 * toValidIdentifier('class') // 'classParam'
 * toValidIdentifier('123invalid') // '_123invalid'
 * ```
 */
export function toValidIdentifier(name: string): string {
  const identifier = isValidIdentifier(name) ? name : sanitizeIdentifier(name);

  if (RESERVED_WORDS.has(identifier)) {
    return `${identifier}Param`;
  }

  return identifier;
}

/**
 * Generate a type name from a schema name
 *
 * @example
 * ```typescript
 * toTypeName('user_profile') // 'UserProfile'
 * toTypeName('Page[User]') // 'PageUser'
 * toTypeName('2fa') // '_2fa'
 * ```
 */
export function toTypeName(schemaName: string): string {
  const pascal = toPascalCase(schemaName);
  if (!pascal) return 'Unnamed';
  return /^[0-9]/.test(pascal) ? `_${pascal}` : pascal;
}

/**
 * Property key as written in an interface: bare when it is an identifier,
 * quoted otherwise
 */
export function toPropertyKey(name: string): string {
  return isValidIdentifier(name) ? name : `'${escapeSingleQuoted(name)}'`;
}

/**
 * HTTP header name for a header parameter: underscores become hyphens
 *
 * @example
 * ```typescript
 * toHeaderName('x_request_id') // 'x-request-id'
 * ```
 */
export function toHeaderName(name: string): string {
  return name.replace(/_/g, '-');
}

/**
 * Derive a function name from an HTTP method and path when the source
 * gives the route no name
 *
 * @example
 * ```typescript
 * pathToMethodName('GET', '/users/{id}') // 'getUsers'
 * pathToMethodName('GET', '/users') // 'listUsers'
 * pathToMethodName('POST', '/users') // 'createUsers'
 * ```
 */
export function pathToMethodName(method: string, path: string): string {
  const resourceName = path
    .split('/')
    .filter(segment => segment && !segment.startsWith('{'))
    .map(segment => toPascalCase(segment))
    .join('');
  const methodLower = method.toLowerCase();
  const hasParams = path.includes('{');

  switch (methodLower) {
    case 'get':
      return hasParams ? `get${resourceName}` : `list${resourceName}`;
    case 'post':
      return `create${resourceName}`;
    case 'put':
      return `update${resourceName}`;
    case 'patch':
      return `patch${resourceName}`;
    case 'delete':
      return `delete${resourceName}`;
    default:
      return `${methodLower}${resourceName}`;
  }
}

/**
 * Escape a value for a single-quoted string literal in generated code
 */
export function escapeSingleQuoted(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n');
}

/**
 * Escape text for a generated template literal
 */
export function escapeTemplateLiteral(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/`/g, '\\`').replace(/\$\{/g, '\\${');
}
