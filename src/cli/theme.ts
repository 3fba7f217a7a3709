/**
 * Terminal theme: symbols, labels and ANSI styling shared by every presenter.
 * Built once at startup and frozen; presenters never reach for globals.
 */

export interface Theme {
  readonly color: boolean;
  readonly symbols: {
    readonly ok: string;
    readonly fail: string;
    readonly skip: string;
    readonly cursor: string;
    readonly selected: string;
    readonly unselected: string;
    readonly barFilled: string;
    readonly barEmpty: string;
  };
  readonly labels: {
    readonly tagged: string;
    readonly skipped: string;
    readonly failed: string;
    readonly verified: string;
    readonly mismatch: string;
  };
}

const ANSI = {
  bold: ['\u001b[1m', '\u001b[22m'],
  dim: ['\u001b[2m', '\u001b[22m'],
  red: ['\u001b[31m', '\u001b[39m'],
  green: ['\u001b[32m', '\u001b[39m'],
  yellow: ['\u001b[33m', '\u001b[39m'],
  cyan: ['\u001b[36m', '\u001b[39m'],
} as const;

export type Style = keyof typeof ANSI;

export function createTheme(color: boolean): Theme {
  return Object.freeze({
    color,
    symbols: Object.freeze({
      ok: '✓',
      fail: '✗',
      skip: '-',
      cursor: '>',
      selected: '[x]',
      unselected: '[ ]',
      barFilled: '█',
      barEmpty: '░',
    }),
    labels: Object.freeze({
      tagged: 'tagged',
      skipped: 'skipped',
      failed: 'failed',
      verified: 'ok',
      mismatch: 'MISMATCH',
    }),
  });
}

/**
 * Wrap text in an ANSI style when the theme has colour enabled
 */
export function paint(theme: Theme, style: Style, text: string): string {
  if (!theme.color) {
    return text;
  }
  const [open, close] = ANSI[style];
  return `${open}${text}${close}`;
}
