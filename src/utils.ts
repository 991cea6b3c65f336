export function pickString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

export function pickNumber(value: unknown): number | null {
  const n = typeof value === 'number' ? value : typeof value === 'string' && value.trim() ? Number(value) : Number.NaN;
  if (!Number.isFinite(n)) return null;
  return n;
}

export function pickInt(value: unknown, fallback: number, opts: { min?: number; max?: number } = {}): number {
  const raw = pickNumber(value);
  const n = raw == null ? fallback : Math.floor(raw);
  const min = opts.min ?? -Infinity;
  const max = opts.max ?? Infinity;
  return Math.max(min, Math.min(max, n));
}

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];

export function humanBytes(bytes: number): string {
  let n = bytes;
  for (const unit of BYTE_UNITS) {
    if (Math.abs(n) < 1024) return `${n.toFixed(1)}${unit}`;
    n /= 1024;
  }
  return `${n.toFixed(1)}EB`;
}

export function percent(part: number, total: number): number {
  if (total <= 0) return 0;
  return Math.round((part / total) * 1000) / 10;
}
