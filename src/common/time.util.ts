import { DateWindow } from '../types/scrape';

const DAY_MS = 24 * 60 * 60 * 1000;

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((r) => setTimeout(r, ms));
}

export function toRfc3339DateTime(s?: string): string | undefined {
  if (!s) return undefined;
  const t = s.trim();
  if (/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?Z$/.test(t)) return t;
  // Accept plain YYYY-MM-DD and upgrade to start-of-day Zulu
  if (/^\d{4}-\d{2}-\d{2}$/.test(t)) return `${t}T00:00:00Z`;
  return t;
}

/** `2024-01-05T10:00:00Z`, whole seconds, UTC. */
export function formatRfc3339Seconds(d: Date): string {
  return d.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function parseDate(s: string): Date | null {
  const d = new Date(s);
  return Number.isNaN(d.getTime()) ? null : d;
}

/**
 * Widens [after, before] by `bufferDays` on both sides. Values that cannot
 * be parsed are returned as given and reported through `onUnparsed`.
 */
export function widenWindow(
  window: DateWindow,
  bufferDays: number,
  onUnparsed?: (value: string) => void,
): DateWindow {
  const after = toRfc3339DateTime(window.publishedAfter);
  const before = toRfc3339DateTime(window.publishedBefore);
  if (bufferDays <= 0) {
    return { publishedAfter: after, publishedBefore: before };
  }

  const shift = (value: string | undefined, days: number) => {
    if (!value) return undefined;
    const d = parseDate(value);
    if (!d) {
      onUnparsed?.(value);
      return value;
    }
    return formatRfc3339Seconds(new Date(d.getTime() + days * DAY_MS));
  };

  return {
    publishedAfter: shift(after, -bufferDays),
    publishedBefore: shift(before, bufferDays),
  };
}

const ISO_DURATION =
  /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?)?$/;

export function isoDurationToSec(iso?: string | null): number | null {
  if (!iso) return null;
  const m = ISO_DURATION.exec(iso.trim());
  if (!m) return null;
  const [, d, h, min, s] = m;
  return (
    Number(d ?? 0) * 86400 +
    Number(h ?? 0) * 3600 +
    Number(min ?? 0) * 60 +
    Math.floor(Number(s ?? 0))
  );
}

/** `PT4M13S` -> `4:13`, `PT1H2M3S` -> `1:02:03`. */
export function formatDuration(iso?: string | null): string {
  const total = isoDurationToSec(iso) ?? 0;
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;
  const ss = String(seconds).padStart(2, '0');
  if (hours > 0) return `${hours}:${String(minutes).padStart(2, '0')}:${ss}`;
  return `${minutes}:${ss}`;
}

/** Local time as `YYYYMMDD_HHMMSS`. */
export function fileTimestamp(d: Date = new Date()): string {
  const p = (n: number) => String(n).padStart(2, '0');
  return (
    `${d.getFullYear()}${p(d.getMonth() + 1)}${p(d.getDate())}_` +
    `${p(d.getHours())}${p(d.getMinutes())}${p(d.getSeconds())}`
  );
}
