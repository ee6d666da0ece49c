export function round(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function formatSigned(value: number, digits = 2): string {
  const fixed = value.toFixed(digits);
  return value > 0 ? `+${fixed}` : fixed;
}

export function parseIsoDate(value: string | undefined | null): number | null {
  if (!value) {
    return null;
  }
  const ts = new Date(value).getTime();
  if (!Number.isFinite(ts)) {
    return null;
  }
  return ts;
}
