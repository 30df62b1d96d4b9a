import { ConfigError, SetupError, errorMessage } from '../errors.js';

export function isJsonMode(opts: { json?: boolean }): boolean {
  return opts.json === true || !process.stdout.isTTY;
}

export function outputJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function outputTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map(r => (r[i] ?? '').length))
  );
  const sep = widths.map(w => '─'.repeat(w + 2)).join('┼');

  const fmtRow = (cells: string[]) =>
    cells.map((c, i) => ` ${(c ?? '').padEnd(widths[i])} `).join('│');

  console.log(fmtRow(headers));
  console.log(sep);
  for (const row of rows) {
    console.log(fmtRow(row));
  }
}

/** Print any failure and exit 1; setup and config errors print without the "Unexpected" prefix. */
export function exitOnSetupError(err: unknown): never {
  if (err instanceof ConfigError || err instanceof SetupError) {
    console.error(`Error: ${err.message}`);
    process.exit(1);
  }
  console.error(`Unexpected error: ${errorMessage(err)}`);
  process.exit(1);
}

export function parseDays(value: string): number {
  const days = Number(value);
  if (!Number.isInteger(days) || days <= 0) {
    throw new ConfigError(`--lookback expects a positive whole number of days, got "${value}"`);
  }
  return days;
}
