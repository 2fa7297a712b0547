export type CellValue = string | number | boolean | null | undefined | readonly string[];

export interface CsvField<T> {
  header: string;
  value(record: T): CellValue;
}

export function escapeCsv(value: string): string {
  if (value.includes('"') || value.includes(',') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCell(value: CellValue): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return value.join(';');
}

/** Header plus one line per record, newline-terminated. Empty input renders nothing. */
export function renderCsv<T>(fields: readonly CsvField<T>[], records: readonly T[]): string {
  if (records.length === 0 || fields.length === 0) {
    return '';
  }
  const header = fields.map((field) => escapeCsv(field.header)).join(',');
  const lines = records.map((record) => fields.map((field) => escapeCsv(formatCell(field.value(record)))).join(','));
  return `${[header, ...lines].join('\n')}\n`;
}
