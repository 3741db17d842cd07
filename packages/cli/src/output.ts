/**
 * Plain-text rendering of command results.
 *
 * @module cli/output
 */

function cell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Render rows under a header line, columns padded to the widest cell and
 * separated by two spaces. Trailing spaces are trimmed.
 */
export function formatTable(headers: string[], rows: unknown[][]): string {
  const text = [headers, ...rows.map((row) => headers.map((_, i) => cell(row[i])))];
  const widths = headers.map((_, i) => Math.max(...text.map((row) => cell(row[i]).length)));
  const line = (row: unknown[]) =>
    widths
      .map((width, i) => cell(row[i]).padEnd(width))
      .join('  ')
      .trimEnd();
  const rule = widths.map((width) => '-'.repeat(width)).join('  ');
  return [line(headers), rule, ...text.slice(1).map(line)].join('\n');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Table of objects keyed by the union of their keys, in first-seen order. */
export function formatRecords(records: Record<string, unknown>[]): string {
  const headers: string[] = [];
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!headers.includes(key)) headers.push(key);
    }
  }
  return formatTable(
    headers,
    records.map((record) => headers.map((key) => record[key])),
  );
}

/**
 * Print a result the way a human reads it best: arrays of objects and
 * single objects as tables, anything else as is.
 */
export function displayResult(result: unknown): void {
  if (Array.isArray(result) && result.length > 0 && result.every(isRecord)) {
    console.log(formatRecords(result));
  } else if (isRecord(result)) {
    console.log(formatRecords([result]));
  } else if (typeof result === 'string') {
    console.log(result);
  } else {
    console.log(JSON.stringify(result));
  }
}
