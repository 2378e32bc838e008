/**
 * Render a JSDoc block. One line collapses to `/** text *\/`; no lines renders nothing.
 */
export function renderDocComment(lines: readonly string[], indent = ''): string {
  const cleaned = lines.flatMap(line => line.replace(/\*\//g, '*\\/').split(/\r?\n/));

  while (cleaned.length > 0 && cleaned[cleaned.length - 1].trim() === '') {
    cleaned.pop();
  }

  if (cleaned.length === 0) {
    return '';
  }

  if (cleaned.length === 1) {
    return `${indent}/** ${cleaned[0]} */\n`;
  }

  const body = cleaned.map(line => (line ? `${indent} * ${line}` : `${indent} *`)).join('\n');
  return `${indent}/**\n${body}\n${indent} */\n`;
}
