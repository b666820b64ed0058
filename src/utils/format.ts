/**
 * Exponent-notation formatting used by optimizer reports.
 *
 * Produces `1.0e+05` style output: fixed mantissa precision, signed exponent
 * padded to at least two digits, optionally left-padded to a minimum width.
 */
export function formatExponential(value: number, precision: number, width = 0): string {
  let text: string;

  if (Number.isNaN(value)) {
    text = 'nan';
  } else if (!Number.isFinite(value)) {
    text = value > 0 ? 'inf' : '-inf';
  } else {
    text = value
      .toExponential(precision)
      .replace(/e([+-])(\d)$/, (_match, sign: string, digit: string) => `e${sign}0${digit}`);
  }

  return text.padStart(width, ' ');
}

/**
 * Format a duration in milliseconds as seconds for log lines.
 */
export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}
