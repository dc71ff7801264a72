import type { CellValue } from 'exceljs';
import { describe, expect, it } from 'vitest';
import { headerText, toFieldValue, toKeyValue } from '../../src/services/file-processor/cells.js';

describe('toFieldValue', () => {
  it('trims strings and maps blanks to null', () => {
    expect(toFieldValue('  DHL ')).toBe('DHL');
    expect(toFieldValue('   ')).toBeNull();
    expect(toFieldValue(null)).toBeNull();
  });

  it('keeps numbers, booleans and dates', () => {
    const when = new Date(Date.UTC(2026, 2, 1));
    expect(toFieldValue(12.5)).toBe(12.5);
    expect(toFieldValue(false)).toBe(false);
    expect(toFieldValue(when)).toBe(when);
  });

  it('flattens rich text, hyperlinks, formulas and errors', () => {
    const richText: CellValue = { richText: [{ text: 'Air ' }, { text: 'Freight' }] };
    const hyperlink: CellValue = { text: 'Track', hyperlink: 'https://example.com/track' };
    const formula: CellValue = { formula: 'A1*2', result: 84, date1904: false };
    const pendingFormula: CellValue = { formula: 'A1*2', date1904: false };
    const error: CellValue = { error: '#N/A' };

    expect(toFieldValue(richText)).toBe('Air Freight');
    expect(toFieldValue(hyperlink)).toBe('Track');
    expect(toFieldValue(formula)).toBe(84);
    expect(toFieldValue(pendingFormula)).toBeNull();
    expect(toFieldValue(error)).toBeNull();
  });
});

describe('toKeyValue', () => {
  it('renders keys as trimmed strings', () => {
    expect(toKeyValue(12345)).toBe('12345');
    expect(toKeyValue('HAWB001')).toBe('HAWB001');
    expect(toKeyValue(new Date(Date.UTC(2026, 0, 5)))).toBe('2026-01-05T00:00:00.000Z');
    expect(toKeyValue(null)).toBeNull();
  });
});

describe('headerText', () => {
  it('reads plain and rich text headers', () => {
    expect(headerText('Ship Date')).toBe('Ship Date');
    expect(headerText({ richText: [{ text: 'HA' }, { text: 'WB' }] })).toBe('HAWB');
    expect(headerText(null)).toBe('');
  });
});
