/**
 * Delimited-text decoder (CSV / TSV) built on papaparse.
 *
 * Output is the first non-blank line as ordered headers plus one
 * header → cell mapping per following row. Anything that is not a
 * well-formed table fails with DecodeError. Spreadsheets go through
 * ./spreadsheetDecoder, which shares buildTable with this module.
 */

import Papa from 'papaparse';
import { FileFormat } from '../../shared/schema';
import type { DecodedTable, RawRow } from '../../shared/types';
import { DecodeError } from '../lib/errors';

export interface Decoder {
  decode(bytes: Buffer, formatHint: FileFormat): Promise<DecodedTable>;
}

/**
 * Turns cell rows into a header-keyed table. The first row is the header;
 * empty or repeated headers and rows wider than the header are rejected.
 */
export function buildTable(cellRows: string[][]): DecodedTable {
  const [headerRow, ...dataRows] = cellRows;
  if (!headerRow) {
    throw new DecodeError('File is empty: no header row');
  }

  const headers = headerRow.map((header) => header.trim());
  const seen = new Set<string>();
  headers.forEach((header, index) => {
    if (!header) {
      throw new DecodeError(`Header in column ${index + 1} is empty`);
    }
    if (seen.has(header)) {
      throw new DecodeError(`Duplicate header '${header}'`);
    }
    seen.add(header);
  });

  const rows = dataRows.map((cells, rowIndex) => {
    const extra = cells.slice(headers.length).filter((cell) => cell.trim() !== '');
    if (extra.length > 0) {
      throw new DecodeError(`Row ${rowIndex + 1} has ${cells.length} cells but there are ${headers.length} headers`);
    }

    const row: RawRow = {};
    headers.forEach((header, column) => {
      row[header] = cells[column] ?? '';
    });
    return row;
  });

  return { headers, rows };
}

export class DelimitedTextDecoder implements Decoder {
  async decode(bytes: Buffer, formatHint: FileFormat): Promise<DecodedTable> {
    return this.decodeText(bytes, formatHint);
  }

  decodeText(bytes: Buffer, formatHint: FileFormat): DecodedTable {
    if (formatHint === FileFormat.XLSX) {
      throw new DecodeError('Spreadsheet files are not delimited text', { format: formatHint });
    }
    if (bytes.includes(0)) {
      throw new DecodeError('File contains binary data and is not delimited text');
    }

    const text = bytes.toString('utf-8').replace(/^\uFEFF/, '');
    const result = Papa.parse<string[]>(text, {
      header: false,
      delimiter: formatHint === FileFormat.TSV ? '\t' : '',
      skipEmptyLines: 'greedy',
    });

    const fatal = result.errors.find((error) => error.type === 'Quotes');
    if (fatal) {
      throw new DecodeError(`Malformed quoting at row ${fatal.row ?? 'unknown'}: ${fatal.message}`);
    }

    return buildTable(result.data);
  }
}
