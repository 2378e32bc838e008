/**
 * Console logger
 *
 * ANSI-coloured output in Node.js, plain text when running in a browser.
 */

const COLORS = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  reset: '\x1b[0m',
} as const;

type Color = Exclude<keyof typeof COLORS, 'reset'>;

function isBrowser(): boolean {
  return typeof Reflect.get(globalThis, 'window') !== 'undefined';
}

function colorize(text: string, color: Color): string {
  if (isBrowser()) {
    return text;
  }
  return `${COLORS[color]}${text}${COLORS.reset}`;
}

/**
 * JSON.stringify that replaces repeated object references with "[Circular]"
 */
function safeStringify(value: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(
    value,
    (_key, current: unknown) => {
      if (typeof current === 'object' && current !== null) {
        if (seen.has(current)) {
          return '[Circular]';
        }
        seen.add(current);
      }
      return current;
    },
    2
  );
}

export function logInfo(message: string): void {
  console.log(colorize(message, 'green'));
}

export function logWarning(message: string): void {
  console.log(colorize(message, 'yellow'));
}

/**
 * Log a titled block of data. Objects are pretty-printed, other values are
 * passed to the console as they are. Nothing is printed for null/undefined data.
 */
export function logData(title: string | undefined, data?: unknown): void {
  console.log('');
  console.log(colorize(`== ${title === undefined ? '' : String(title)} ==`, 'cyan'));

  if (data === undefined || data === null) {
    return;
  }

  if (typeof data === 'object') {
    console.log(safeStringify(data));
  } else {
    console.log(data);
  }
}

export function logError(error: unknown, title?: string): void {
  if (title) {
    console.log('');
    console.log(`== ${title} ==`);
  }

  if (!(error instanceof Error)) {
    console.error(colorize(String(error), 'red'));
    return;
  }

  console.log(colorize(error.stack ?? error.message, 'red'));

  const cause: unknown = error.cause;
  if (cause === undefined || cause === null) {
    return;
  }

  console.log('');
  console.log(colorize('== Error Cause ==', 'red'));
  if (cause instanceof Error) {
    console.log(colorize(cause.stack ?? cause.message, 'red'));
  } else {
    console.log(colorize(safeStringify(cause), 'red'));
  }
}
