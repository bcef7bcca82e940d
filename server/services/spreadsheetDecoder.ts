/**
 * Spreadsheet (.xlsx) decoding on exceljs, plus the decoder the pipeline
 * runs with: spreadsheets go to SpreadsheetDecoder, everything else to
 * the delimited-text decoder.
 *
 * Only the first worksheet is read. Cells become the text a user would
 * see, so the value normalizer treats them like CSV cells.
 */

import ExcelJS, { type CellValue, type Row } from 'exceljs';
import { FileFormat } from '../../shared/schema';
import type { DecodedTable } from '../../shared/types';
import { DecodeError } from '../lib/errors';
import { buildTable, DelimitedTextDecoder, type Decoder } from './csvDecoder';

/** Cell value → display text. Dates at UTC midnight lose their time part. */
export function cellText(value: CellValue): string {
  if (value === null || value === undefined) return '';

  if (value instanceof Date) {
    const iso = value.toISOString();
    return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso.slice(0, 19);
  }

  if (typeof value === 'object') {
    if ('richText' in value) return value.richText.map((run) => run.text).join('');
    if ('hyperlink' in value) return value.text;
    if ('error' in value) return '';
    // formula or shared formula: the cached result
    return cellText(value.result);
  }

  return String(value);
}

function rowCells(row: Row): string[] {
  const cells: string[] = [];
  for (let column = 1; column <= row.cellCount; column++) {
    cells.push(cellText(row.getCell(column).value));
  }
  return cells;
}

export class SpreadsheetDecoder implements Decoder {
  async decode(bytes: Buffer, formatHint: FileFormat = FileFormat.XLSX): Promise<DecodedTable> {
    const workbook = new ExcelJS.Workbook();
    const data = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(data).set(bytes);

    try {
      await workbook.xlsx.load(data);
    } catch (error) {
      throw new DecodeError('File is not a readable spreadsheet', { format: formatHint }, { cause: error });
    }

    const sheet = workbook.worksheets[0];
    if (!sheet) {
      throw new DecodeError('Workbook has no worksheets');
    }

    const cellRows: string[][] = [];
    sheet.eachRow({ includeEmpty: false }, (row) => {
      const cells = rowCells(row);
      if (cells.some((cell) => cell.trim() !== '')) cellRows.push(cells);
    });

    const [headerRow] = cellRows;
    if (headerRow) {
      // styled but empty columns past the last header
      while (headerRow.length > 0 && headerRow[headerRow.length - 1].trim() === '') {
        headerRow.pop();
      }
    }

    return buildTable(cellRows);
  }
}

export class TabularFileDecoder implements Decoder {
  constructor(
    private readonly text: Decoder = new DelimitedTextDecoder(),
    private readonly spreadsheet: Decoder = new SpreadsheetDecoder()
  ) {}

  decode(bytes: Buffer, formatHint: FileFormat): Promise<DecodedTable> {
    return formatHint === FileFormat.XLSX ? this.spreadsheet.decode(bytes, formatHint) : this.text.decode(bytes, formatHint);
  }
}
