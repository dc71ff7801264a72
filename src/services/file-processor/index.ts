import { createHash } from 'crypto';
import { Readable } from 'stream';
import ExcelJS from 'exceljs';
import type { Row, Worksheet } from 'exceljs';
import { normalizeColumnName, type ColumnConfig } from '../../config/index.js';
import { ValidationError, errorMessage } from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';
import type { DedupIndex, FileFingerprint } from '../dedup-index/index.js';
import { headerText, toFieldValue, toKeyValue, type FieldValue } from './cells.js';

export type { FieldValue } from './cells.js';

export interface IngestRecord {
  uniqueKey: string;
  /** Configured columns, in configuration order. */
  fields: ReadonlyMap<string, FieldValue>;
  sourceJobId: string;
}

export interface RowWarning {
  row: number;
  message: string;
}

export interface ParsedFile {
  /** Data rows that are not completely empty. */
  dataRowCount: number;
  /**
   * One-shot sequence of records. Throws ValidationError at the end of
   * iteration if every data row was dropped.
   */
  records: Generator<IngestRecord, void, undefined>;
  /** Filled in while `records` is consumed. */
  warnings: RowWarning[];
}

export class FileProcessor {
  private readonly uniqueKey: string;

  constructor(
    private readonly columns: ColumnConfig,
    private readonly dedup: DedupIndex,
  ) {
    const [uniqueKey] = columns.required;
    if (!uniqueKey) throw new Error('Column configuration has no unique key');
    this.uniqueKey = uniqueKey;
  }

  fingerprint(bytes: Buffer): string {
    return createHash('sha256').update(bytes).digest('hex');
  }

  async isDuplicate(contentHash: string): Promise<boolean> {
    return (await this.findDuplicate(contentHash)) !== undefined;
  }

  findDuplicate(contentHash: string): Promise<FileFingerprint | undefined> {
    return this.dedup.findCommittedFile(contentHash);
  }

  async parse(bytes: Buffer, context: { jobId: string }): Promise<ParsedFile> {
    if (bytes.length === 0) throw new ValidationError('File is empty');

    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.read(Readable.from([bytes]));
    } catch (error) {
      throw new ValidationError(`Unreadable workbook: ${errorMessage(error)}`);
    }

    const sheet = workbook.worksheets[0];
    if (!sheet) throw new ValidationError('Workbook contains no worksheet');

    const columnIndex = this.matchHeaders(sheet);

    const dataRows: Row[] = [];
    for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber++) {
      const row = sheet.getRow(rowNumber);
      if (!row.hasValues) continue;
      const anyValue = [...columnIndex.values()].some((col) => toFieldValue(row.getCell(col).value) !== null);
      if (anyValue) dataRows.push(row);
    }

    if (dataRows.length === 0) throw new ValidationError('Sheet contains no data rows');

    logger.debug(
      { jobId: context.jobId, sheet: sheet.name, dataRows: dataRows.length },
      'Workbook parsed',
    );

    const warnings: RowWarning[] = [];
    return {
      dataRowCount: dataRows.length,
      records: this.readRecords(dataRows, columnIndex, context.jobId, warnings),
      warnings,
    };
  }

  /** Maps each configured column to its 1-based sheet column. */
  private matchHeaders(sheet: Worksheet): Map<string, number> {
    const found = new Map<string, number>();
    sheet.getRow(1).eachCell((cell, col) => {
      const name = normalizeColumnName(headerText(cell.value));
      if (name && !found.has(name)) found.set(name, col);
    });

    const missing = this.columns.required.filter((name) => !found.has(name));
    if (missing.length > 0) {
      throw new ValidationError(`Missing required columns: ${missing.join(', ')}`, missing);
    }

    const index = new Map<string, number>();
    for (const name of this.columns.all) {
      const col = found.get(name);
      if (col !== undefined) index.set(name, col);
    }
    return index;
  }

  private *readRecords(
    rows: Row[],
    columnIndex: Map<string, number>,
    jobId: string,
    warnings: RowWarning[],
  ): Generator<IngestRecord, void, undefined> {
    const seen = new Set<string>();
    let yielded = 0;

    for (const row of rows) {
      const fields = new Map<string, FieldValue>();
      for (const name of this.columns.all) {
        const col = columnIndex.get(name);
        fields.set(name, col === undefined ? null : toFieldValue(row.getCell(col).value));
      }

      const uniqueKey = toKeyValue(fields.get(this.uniqueKey) ?? null);
      if (uniqueKey === null) {
        warnings.push({ row: row.number, message: `Missing value for ${this.uniqueKey}` });
        continue;
      }
      if (seen.has(uniqueKey)) {
        warnings.push({ row: row.number, message: `Repeated ${this.uniqueKey} '${uniqueKey}' ignored` });
        continue;
      }
      seen.add(uniqueKey);
      fields.set(this.uniqueKey, uniqueKey);

      yielded++;
      yield { uniqueKey, fields, sourceJobId: jobId };
    }

    if (yielded === 0) {
      throw new ValidationError(
        `Every data row was dropped (${warnings.length} warnings)`,
        warnings.map((w) => `row ${w.row}: ${w.message}`),
      );
    }
  }
}
