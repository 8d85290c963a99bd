/**
 * Terminal formatting for the bftsim CLI.
 *
 * Plain ANSI escape codes behind a global toggle, so `--no-color` and tests
 * get bare text from the same call sites.
 *
 * @packageDocumentation
 */

// ─── ANSI codes ─────────────────────────────────────────────────────────────────

export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  underline: '\x1b[4m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

export type ColorName = keyof typeof colors;

// ─── Color toggle ───────────────────────────────────────────────────────────────

let colorsEnabled = true;

export function setColorsEnabled(enabled: boolean): void {
  colorsEnabled = enabled;
}

export function getColorsEnabled(): boolean {
  return colorsEnabled;
}

// ─── Colorizers ─────────────────────────────────────────────────────────────────

/** Wrap `text` in one or more styles; plain text while colors are off. */
export function paint(text: string, ...styles: ColorName[]): string {
  if (!colorsEnabled || styles.length === 0) return text;
  return `${styles.map((style) => colors[style]).join('')}${text}${colors.reset}`;
}

export const bold = (text: string): string => paint(text, 'bold');
export const red = (text: string): string => paint(text, 'red');
export const green = (text: string): string => paint(text, 'green');
export const yellow = (text: string): string => paint(text, 'yellow');
export const cyan = (text: string): string => paint(text, 'cyan');
export const magenta = (text: string): string => paint(text, 'magenta');
export const dim = (text: string): string => paint(text, 'gray');

// ─── Status markers ─────────────────────────────────────────────────────────────

function marked(plain: string, symbol: string, color: ColorName, msg: string): string {
  return colorsEnabled ? `${paint(symbol, color)} ${msg}` : `${plain} ${msg}`;
}

export function success(msg: string): string {
  return marked('[OK]', '✔', 'green', msg);
}

export function error(msg: string): string {
  return marked('[ERROR]', '✘', 'red', msg);
}

export function warning(msg: string): string {
  return marked('[WARN]', '!', 'yellow', msg);
}

export function info(msg: string): string {
  return marked('[INFO]', 'i', 'blue', msg);
}

export function header(msg: string): string {
  return paint(msg, 'bold', 'underline');
}

/** Divider line announcing a driver phase, e.g. `── qc-formation (view 1) ──`. */
export function banner(title: string): string {
  return paint(`── ${title} ──`, 'cyan');
}

// ─── Strip ANSI ─────────────────────────────────────────────────────────────────

export function stripAnsi(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

function visibleWidth(text: string): number {
  return stripAnsi(text).length;
}

function padVisible(text: string, width: number): string {
  const pad = width - visibleWidth(text);
  return pad > 0 ? text + ' '.repeat(pad) : text;
}

// ─── Layout ─────────────────────────────────────────────────────────────────────

/**
 * Left-aligned table with a two-space gutter. Column widths are measured on
 * visible characters so colored cells line up.
 */
export function table(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const widths = headers.map((h, col) =>
    rows.reduce((max, row) => Math.max(max, visibleWidth(row[col] ?? '')), visibleWidth(h)),
  );
  const gutter = '  ';

  const lines = [
    headers.map((h, col) => bold(padVisible(h, widths[col] ?? 0))).join(gutter).trimEnd(),
    dim(widths.map((w) => '─'.repeat(w)).join(gutter)),
    ...rows.map((row) => row.map((cell, col) => padVisible(cell, widths[col] ?? 0)).join(gutter).trimEnd()),
  ];
  return lines.join('\n');
}

/** Aligned `key  value` lines with bold keys. */
export function keyValue(pairs: readonly (readonly [string, string])[]): string {
  if (pairs.length === 0) return '';
  const keyWidth = Math.max(...pairs.map(([key]) => key.length));
  return pairs.map(([key, value]) => `${bold(key.padEnd(keyWidth))}  ${value}`).join('\n');
}
