/**
 * Terminal output helpers for the tracemark CLI.
 *
 * Every helper reads one process-wide switch; with colors off the output is
 * plain ASCII, which is what `bin.ts` selects for pipes and `NO_COLOR`.
 *
 * @packageDocumentation
 */

export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  underline: '\x1b[4m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

let colorsEnabled = true;

export function setColorsEnabled(enabled: boolean): void {
  colorsEnabled = enabled;
}

export function getColorsEnabled(): boolean {
  return colorsEnabled;
}

// ─── Colorizers ───────────────────────────────────────────────────────────────

function paint(...codes: string[]): (text: string) => string {
  const prefix = codes.join('');
  return (text) => (colorsEnabled ? `${prefix}${text}${colors.reset}` : text);
}

export const bold = paint(colors.bold);
export const cyan = paint(colors.cyan);
export const dim = paint(colors.gray);
export const header = paint(colors.bold, colors.underline);

// ─── Status lines ─────────────────────────────────────────────────────────────

type Status = 'success' | 'failure' | 'info';

/** Symbol and color with colors on; bracketed label with colors off. */
const STATUS: Record<Status, { symbol: string; code: string; label: string }> = {
  success: { symbol: '✔', code: colors.green, label: 'OK' },
  failure: { symbol: '✘', code: colors.red, label: 'FAIL' },
  info: { symbol: 'i', code: colors.cyan, label: 'INFO' },
};

function statusLine(status: Status, msg: string): string {
  const { symbol, code, label } = STATUS[status];
  return colorsEnabled ? `${code}${symbol}${colors.reset} ${msg}` : `[${label}] ${msg}`;
}

export function success(msg: string): string {
  return statusLine('success', msg);
}

export function failure(msg: string): string {
  return statusLine('failure', msg);
}

export function info(msg: string): string {
  return statusLine('info', msg);
}

// ─── Layout ───────────────────────────────────────────────────────────────────

/**
 * One `key  value` line per pair, values aligned two spaces after the
 * longest key. Keys are bold.
 */
export function keyValue(pairs: ReadonlyArray<readonly [string, string]>): string {
  const width = pairs.reduce((max, [key]) => Math.max(max, key.length), 0);
  return pairs.map(([key, value]) => `${bold(key.padEnd(width))}  ${value}`).join('\n');
}
