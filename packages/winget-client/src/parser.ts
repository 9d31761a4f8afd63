import stringWidth from 'string-width';
import { createPackage, emptyDetails, type Package, type PackageDetails, type PackageSource } from '@wingetdash/shared';

interface Column {
  name: string;
  start: number;
}

/**
 * winget redraws its progress spinner with bare carriage returns. Normalize
 * line endings, then keep only what follows the last `\r` on each line.
 */
export function cleanOutput(raw: string): string {
  return raw
    .replace(/\r\n/g, '\n')
    .split('\n')
    .map((line) => (line.includes('\r') ? line.slice(line.lastIndexOf('\r') + 1) : line))
    .join('\n');
}

function isSeparator(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length > 10 && /^[- ]+$/.test(trimmed) && trimmed.includes('-');
}

/**
 * Footer lines such as "3 upgrades available." start with a digit and end
 * before the Version column, where every data row still has text.
 */
function isFooter(line: string, versionStart: number): boolean {
  return /^\d/.test(line.trimStart()) && line.trimEnd().length < versionStart;
}

function detectColumns(header: string): Column[] {
  const columns: Column[] = [];
  const pattern = /\S+/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(header)) !== null) {
    columns.push({ name: match[0], start: match.index });
  }
  return columns;
}

/**
 * Header offsets are display columns. Rows can hold wide or multi-unit
 * characters (CJK names, `…`), so walk characters by display width.
 */
function sliceByWidth(line: string, start: number, end: number): string {
  let result = '';
  let width = 0;
  for (const char of line) {
    const charWidth = stringWidth(char);
    if (width + charWidth > start && width < end) {
      result += char;
    }
    width += charWidth;
    if (width >= end) break;
  }
  return result.trim();
}

function findTable(output: string): { columns: Column[]; rows: string[] } | null {
  const lines = output.split('\n');
  const separatorIndex = lines.findIndex(isSeparator);
  if (separatorIndex <= 0) {
    return null;
  }

  const columns = detectColumns(lines[separatorIndex - 1]);
  const versionStart = columns.find((column) => column.name === 'Version')?.start ?? 21;
  const rows: string[] = [];
  for (const line of lines.slice(separatorIndex + 1)) {
    if (line.trim() === '') continue;
    if (isFooter(line, versionStart)) break;
    // A second table (packages that need explicit targeting) starts here;
    // the line before its separator was that table's header.
    if (isSeparator(line)) {
      rows.pop();
      break;
    }
    rows.push(line);
  }
  return { columns, rows };
}

function fieldReader(columns: Column[], line: string): (name: string) => string {
  return (name) => {
    const index = columns.findIndex((column) => column.name === name);
    if (index === -1) return '';
    const end = index + 1 < columns.length ? columns[index + 1].start : Number.POSITIVE_INFINITY;
    return sliceByWidth(line, columns[index].start, end);
  };
}

/**
 * Parses the tables printed by `winget list`, `winget search` and
 * `winget upgrade`. When `--source` is given winget drops the Source column,
 * so `defaultSource` stands in for it.
 */
export function parsePackageTable(output: string, defaultSource?: PackageSource): Package[] {
  const table = findTable(output);
  if (!table) {
    return [];
  }

  const packages: Package[] = [];
  for (const row of table.rows) {
    const field = fieldReader(table.columns, row);
    const id = field('Id');
    // Ids never contain whitespace; sentences in the output do
    if (!id || /\s/.test(id)) continue;

    const source = field('Source') || defaultSource;
    const availableVersion = field('Available');
    packages.push(
      createPackage({
        id,
        name: field('Name'),
        version: field('Version'),
        ...(availableVersion ? { availableVersion } : {}),
        ...(source ? { source } : {}),
      })
    );
  }
  return packages;
}

/**
 * Parses `winget show` output: a `Found <Name> [<Id>]` header followed by
 * top-level `Key: Value` lines. Description values may continue on indented
 * lines.
 */
export function parseShowOutput(output: string): PackageDetails {
  const detail = emptyDetails('');
  const lines = output.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const trimmed = line.trim();

    if (trimmed.startsWith('Found ')) {
      const open = trimmed.lastIndexOf('[');
      const close = trimmed.lastIndexOf(']');
      if (open !== -1 && close > open) {
        detail.name = trimmed.slice(6, open).trim();
        detail.id = trimmed.slice(open + 1, close);
      }
      continue;
    }

    if (line.startsWith(' ') || line.startsWith('\t')) continue;

    const colon = trimmed.indexOf(':');
    if (colon === -1) continue;
    const key = trimmed.slice(0, colon).trim();
    const value = trimmed.slice(colon + 1).trim();

    switch (key) {
      case 'Version':
      case 'PackageVersion':
        detail.version = value;
        break;
      case 'Publisher':
        detail.publisher = value;
        break;
      case 'Description': {
        let description = value;
        while (i + 1 < lines.length && lines[i + 1].startsWith('  ')) {
          i++;
          description = description ? `${description} ${lines[i].trim()}` : lines[i].trim();
        }
        detail.description = description;
        break;
      }
      case 'Homepage':
        detail.homepage = value;
        break;
      case 'Publisher Url':
        if (!detail.homepage) detail.homepage = value;
        break;
      case 'License':
        detail.license = value;
        break;
      case 'Source':
        detail.source = value;
        break;
    }
  }

  return detail;
}
