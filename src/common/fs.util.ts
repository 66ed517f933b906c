import * as fs from 'fs';
import * as path from 'path';

export type CsvValue = string | number | null | undefined;

export function ensureDir(p: string) {
  if (!fs.existsSync(p)) fs.mkdirSync(p, { recursive: true });
}

export function writeJson(filePath: string, data: unknown) {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2) + '\n', 'utf8');
}

export function csvEscape(v: CsvValue): string {
  if (v === null || v === undefined) return '';
  const s = String(v);
  if (/[",\r\n]/.test(s)) return `"${s.replace(/"/g, '""')}"`;
  return s;
}

export function writeCsv(
  filePath: string,
  headers: readonly string[],
  rows: CsvValue[][],
) {
  ensureDir(path.dirname(filePath));
  const out =
    [headers.map(csvEscape).join(',')]
      .concat(rows.map((r) => r.map(csvEscape).join(',')))
      .join('\n') + '\n';
  fs.writeFileSync(filePath, out, 'utf8');
}

/** Channel names and search terms -> filename-safe stem. */
export function toFileStem(s: string): string {
  return s.trim().replace(/ /g, '_').replace(/@/g, '').replace(/\//g, '_');
}
