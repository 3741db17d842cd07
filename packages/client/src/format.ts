const UNITS: Array<[suffix: string, seconds: number]> = [
  ['d', 86_400],
  ['h', 3_600],
  ['m', 60],
  ['s', 1],
];

/**
 * Render an elapsed number of seconds as `"1d 2h 3m 4s"`, dropping zero
 * units. Fractions are truncated; anything under a second is `"0s"`.
 */
export function formatDuration(seconds: number): string {
  let remaining = Math.max(0, Math.floor(seconds));
  const parts: string[] = [];
  for (const [suffix, size] of UNITS) {
    if (remaining >= size) {
      parts.push(`${Math.floor(remaining / size)}${suffix}`);
      remaining %= size;
    }
  }
  return parts.length > 0 ? parts.join(' ') : '0s';
}
