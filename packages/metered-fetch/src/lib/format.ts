const UNITS = ["B", "KiB", "MiB", "GiB", "TiB"];

/**
 * Human-readable byte count using binary units, e.g. `1.5 MiB`.
 * Whole bytes are printed without decimals.
 */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes)) return "unlimited";

  let value = bytes;
  let unit = 0;
  while (Math.abs(value) >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

/**
 * Parse a byte size such as `4096`, `64KiB`, `1.5M` or `2G`.
 * Returns undefined for anything that is not a non-negative size.
 */
export function parseByteSize(input: string): number | undefined {
  const match = /^\s*(\d+(?:\.\d+)?)\s*([kmgt]?)(?:i?b)?\s*$/i.exec(input);
  if (!match) return undefined;

  const exponent = ["", "k", "m", "g", "t"].indexOf(match[2].toLowerCase());
  const bytes = Math.floor(Number(match[1]) * 1024 ** exponent);
  return Number.isSafeInteger(bytes) ? bytes : undefined;
}
