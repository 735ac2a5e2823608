/**
 * Compound duration strings: a signed sequence of decimal numbers, each with
 * a unit suffix, e.g. "300ms", "-1.5h", "2h45m". Values are milliseconds.
 */

export const SECOND = 1000;
export const MINUTE = 60 * SECOND;
export const HOUR = 60 * MINUTE;

const UNIT_MS: Readonly<Record<string, number>> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  'μs': 1e-3,
  ms: 1,
  s: SECOND,
  m: MINUTE,
  h: HOUR,
};

// Longer units first so "ms" wins over "m".
const COMPONENT = /^(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/;

export function parseDuration(input: string): number {
  let rest = input.trim();
  let sign = 1;

  if (rest.startsWith('-') || rest.startsWith('+')) {
    sign = rest.startsWith('-') ? -1 : 1;
    rest = rest.slice(1);
  }

  if (rest === '0') {
    return 0;
  }
  if (rest.length === 0) {
    throw new Error(`Invalid duration: "${input}"`);
  }

  let total = 0;
  while (rest.length > 0) {
    const match = COMPONENT.exec(rest);
    const amount = match?.[1];
    const unit = match?.[2];
    const factor = unit === undefined ? undefined : UNIT_MS[unit];
    if (match === null || amount === undefined || factor === undefined) {
      throw new Error(`Invalid duration: "${input}"`);
    }
    total += parseFloat(amount) * factor;
    rest = rest.slice(match[0].length);
  }

  return sign * total;
}

function trimNumber(n: number): string {
  return String(Number(n.toFixed(6)));
}

/**
 * Inverse of parseDuration, in canonical form: "1h0m0s", "1m30s",
 * "1.5s", "250ms".
 */
export function formatDuration(ms: number): string {
  if (ms === 0) {
    return '0s';
  }

  const sign = ms < 0 ? '-' : '';
  let rest = Math.abs(ms);

  if (rest < 1) {
    return `${sign}${trimNumber(rest * 1000)}µs`;
  }
  if (rest < SECOND) {
    return `${sign}${trimNumber(rest)}ms`;
  }

  const hours = Math.floor(rest / HOUR);
  rest -= hours * HOUR;
  const minutes = Math.floor(rest / MINUTE);
  rest -= minutes * MINUTE;

  let out = sign;
  if (hours > 0) {
    out += `${hours}h`;
  }
  if (hours > 0 || minutes > 0) {
    out += `${minutes}m`;
  }
  return `${out}${trimNumber(rest / SECOND)}s`;
}
