/**
 * Size strings: "1024", "512K", "1.5M", "2G", "1T" (binary multiples).
 */

const MULTIPLIERS: Record<string, number> = {
  K: 1024,
  M: 1024 ** 2,
  G: 1024 ** 3,
  T: 1024 ** 4,
};

/**
 * Parse a size limit into a byte floor. 'unlimited', '' and anything
 * unparseable give 0 (no floor).
 */
export function parseSizeToBytes(value: number | string): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
  }

  const text = value.trim().toUpperCase();
  if (text === '' || text === 'UNLIMITED') {
    return 0;
  }

  const suffix = text.slice(-1);
  const multiplier = MULTIPLIERS[suffix];
  const numeric = Number(multiplier === undefined ? text : text.slice(0, -1));
  if (!Number.isFinite(numeric) || numeric <= 0) {
    return 0;
  }
  return Math.floor(numeric * (multiplier ?? 1));
}

/**
 * Human-readable size for CLI output, e.g. 1536 -> "1.5 KiB".
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  const units = ['KiB', 'MiB', 'GiB', 'TiB'];
  let value = bytes;
  let unit = 'B';
  for (const next of units) {
    if (value < 1024) break;
    value /= 1024;
    unit = next;
  }
  return `${Number(value.toFixed(1))} ${unit}`;
}
