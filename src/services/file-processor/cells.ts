import type { CellValue } from 'exceljs';

export type FieldValue = string | number | boolean | Date | null;

function normalizeText(text: string): string | null {
  const trimmed = text.trim();
  return trimmed === '' ? null : trimmed;
}

/** Flattens an exceljs cell value to the scalar carried in a Record. */
export function toFieldValue(value: CellValue): FieldValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return normalizeText(value);
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;

  if ('richText' in value) return normalizeText(value.richText.map((part) => part.text).join(''));
  if ('hyperlink' in value) return normalizeText(String(value.text));
  if ('error' in value) return null;
  if ('formula' in value || 'sharedFormula' in value) {
    const result = value.result;
    if (result === undefined || result === null) return null;
    if (typeof result === 'object' && !(result instanceof Date)) return null;
    return typeof result === 'string' ? normalizeText(result) : result;
  }

  return null;
}

export function toKeyValue(value: FieldValue): string | null {
  if (value === null) return null;
  if (value instanceof Date) return value.toISOString();
  return normalizeText(String(value));
}

/** Header text of a cell; rich text, hyperlinks and formulas included. */
export function headerText(value: CellValue): string {
  const field = toFieldValue(value);
  if (field === null) return '';
  return field instanceof Date ? field.toISOString() : String(field);
}
