const DURATION_PATTERN = /^\s*(\d+(?:\.\d+)?)\s*([smh]?)\s*$/i;

const UNIT_MS: Readonly<Record<string, number>> = {
  '': 1000,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/**
 * Parse a capture duration such as `20s`, `5m`, `4h` or `30` (seconds) into milliseconds.
 *
 * @throws Error when the text is not a positive number with an optional `s`/`m`/`h` unit.
 */
export function parseDuration(text: string): number {
  const match = DURATION_PATTERN.exec(text);
  const amount = match?.[1];
  const factor = UNIT_MS[(match?.[2] ?? '').toLowerCase()];
  if (amount === undefined || factor === undefined) {
    throw new Error(`Invalid duration '${text}'. Use e.g. 20s, 5m, 4h or a number of seconds`);
  }

  const ms = Number(amount) * factor;
  if (ms <= 0) {
    throw new Error(`Invalid duration '${text}'. It must be greater than 0`);
  }
  return ms;
}
