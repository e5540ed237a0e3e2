import type { AnnotationRecord, AnnotationValue } from '../types.js';
import { stringifyAnnotationValue } from '../wire/codec.js';

export type AnnotationFormat = { mode: 'jsonl' } | { mode: 'csv'; fields: string[] };

export type AnnotationWriterOptions = {
  format: AnnotationFormat;
  flatten?: boolean;
};

export function resolveAnnotationFormat(csvFields: readonly string[]): AnnotationFormat {
  return csvFields.length > 0 ? { mode: 'csv', fields: [...csvFields] } : { mode: 'jsonl' };
}

function childEntries(value: AnnotationValue): Array<[string, AnnotationValue]> | null {
  if (Array.isArray(value)) {
    return value.map((item, index) => [String(index), item]);
  }
  if (value instanceof Set) {
    return Array.from(value, (item, index): [string, AnnotationValue] => [String(index), item]);
  }
  if (value !== null && typeof value === 'object') {
    return Object.entries(value);
  }
  return null;
}

function flattenInto(target: AnnotationRecord, prefix: string, value: AnnotationValue) {
  const entries = childEntries(value);
  if (!entries || entries.length === 0) {
    target[prefix] = value;
    return;
  }
  for (const [key, child] of entries) {
    flattenInto(target, `${prefix}.${key}`, child);
  }
}

/**
 * Collapses nested mappings, arrays and sets into dotted keys
 * (`{ c: { x: 2 } }` becomes `{ 'c.x': 2 }`, list items use their index).
 * Set elements are numbered in iteration order, which callers must not rely on.
 * Empty containers are kept as values.
 */
export function flattenAnnotation(record: AnnotationRecord): AnnotationRecord {
  const flat: AnnotationRecord = {};
  for (const [key, value] of Object.entries(record)) {
    flattenInto(flat, key, value);
  }
  return flat;
}

export function mergeReservedKeys(
  annotation: AnnotationRecord,
  sourceId: string,
  frameTime: number
): AnnotationRecord {
  return { ...annotation, source_id: sourceId, frame_time: frameTime };
}

export function prepareRecord(
  annotation: AnnotationRecord,
  sourceId: string,
  frameTime: number,
  options: { flatten?: boolean } = {}
): AnnotationRecord {
  const merged = mergeReservedKeys(annotation, sourceId, frameTime);
  return options.flatten ? flattenAnnotation(merged) : merged;
}

export function serializeJsonLine(record: AnnotationRecord): string {
  return `${stringifyAnnotationValue(record)}\n`;
}

function quoteCsv(text: string): string {
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function csvCell(value: AnnotationValue | undefined): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return quoteCsv(value);
  }
  if (typeof value === 'object') {
    return quoteCsv(stringifyAnnotationValue(value));
  }
  return quoteCsv(String(value));
}

export function csvHeader(fields: readonly string[]): string {
  return `${fields.map(quoteCsv).join(',')}\n`;
}

export function serializeCsvRow(record: AnnotationRecord, fields: readonly string[]): string {
  const cells = fields.map(field =>
    csvCell(Object.prototype.hasOwnProperty.call(record, field) ? record[field] : undefined)
  );
  return `${cells.join(',')}\n`;
}

export class AnnotationWriter {
  readonly format: AnnotationFormat;
  private readonly flatten: boolean;

  constructor(options: AnnotationWriterOptions) {
    this.format = options.format;
    this.flatten = options.flatten ?? false;
  }

  get extension(): string {
    return this.format.mode === 'csv' ? '.csv' : '.jsonl';
  }

  /** Text written once at the top of every log file. */
  header(): string {
    return this.format.mode === 'csv' ? csvHeader(this.format.fields) : '';
  }

  prepare(annotation: AnnotationRecord, sourceId: string, frameTime: number): AnnotationRecord {
    return prepareRecord(annotation, sourceId, frameTime, { flatten: this.flatten });
  }

  serialize(record: AnnotationRecord): string {
    return this.format.mode === 'csv'
      ? serializeCsvRow(record, this.format.fields)
      : serializeJsonLine(record);
  }
}
