import type { SpiderInfo } from '../runtime/types.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
} as const;

/**
 * Colors follow NO_COLOR / FORCE_COLOR, then whether stdout is a TTY.
 */
function useColors(): boolean {
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, 'bold');
}

function dim(text: string): string {
  return colorize(text, 'dim');
}

function red(text: string): string {
  return colorize(text, 'red');
}

function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

/**
 * Cut text to `maxLength`, ending with an ellipsis when shortened.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, Math.max(maxLength - 3, 0))}...`;
}

function padRight(text: string, width: number): string {
  return text.padEnd(width);
}

interface TableColumn<T> {
  header: string;
  width: number;
  value: (item: T) => string;
}

/**
 * Format rows as a fixed-width table.
 */
function formatTable<T>(items: T[], columns: TableColumn<T>[]): string {
  const lines: string[] = [];

  lines.push(columns.map((col) => bold(padRight(col.header, col.width))).join('  '));
  lines.push(dim(columns.map((col) => '-'.repeat(col.width)).join('  ')));

  for (const item of items) {
    lines.push(
      columns.map((col) => padRight(truncate(col.value(item), col.width), col.width)).join('  ')
    );
  }

  return lines.join('\n');
}

export function formatSpiderList(spiders: SpiderInfo[]): string {
  if (spiders.length === 0) {
    return dim('No spiders registered.');
  }

  return formatTable(spiders, [
    { header: 'NAME', width: 20, value: (s) => s.name },
    { header: 'DOMAINS', width: 24, value: (s) => s.allowedDomains.join(', ') || '-' },
    { header: 'DESCRIPTION', width: 60, value: (s) => s.description ?? '' },
  ]);
}

export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Format validation errors, one bullet per issue.
 */
export function formatValidationErrors(errors: Array<{ path: string; message: string }>): string {
  const lines = errors.map((e) => {
    const path = e.path ? `${bold(e.path)}: ` : '';
    return `  ${red('•')} ${path}${e.message}`;
  });
  return [formatError('Validation failed:'), ...lines].join('\n');
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}
