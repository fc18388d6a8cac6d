/**
 * Minimal delimited-text codec (RFC 4180 quoting).
 *
 * Reading strips a leading byte-order mark and accepts `\n` or `\r\n`.
 * Writing always ends lines with `\n` and can prepend a BOM.
 */

import { CaptureError } from '../errors.js';

export const BOM = '\uFEFF';

export interface CsvWriteOptions {
    delimiter?: string;
    bom?: boolean;
}

export function parseCsv(text: string, delimiter: string = ','): string[][] {
    const input = text.startsWith(BOM) ? text.slice(1) : text;
    const rows: string[][] = [];
    let row: string[] = [];
    let field = '';
    let inQuotes = false;

    for (let i = 0; i < input.length; i++) {
        const ch = input[i];
        if (inQuotes) {
            if (ch !== '"') {
                field += ch;
            } else if (input[i + 1] === '"') {
                field += '"';
                i++;
            } else {
                inQuotes = false;
            }
            continue;
        }

        if (ch === '"') {
            inQuotes = true;
        } else if (ch === delimiter) {
            row.push(field);
            field = '';
        } else if (ch === '\n' || ch === '\r') {
            if (ch === '\r' && input[i + 1] === '\n') i++;
            row.push(field);
            rows.push(row);
            row = [];
            field = '';
        } else {
            field += ch;
        }
    }

    if (inQuotes) {
        throw new CaptureError(`Unterminated quoted field in row ${rows.length + 1}`);
    }
    if (field.length > 0 || row.length > 0) {
        row.push(field);
        rows.push(row);
    }
    return rows;
}

function escapeField(value: string, delimiter: string): string {
    if (value.includes(delimiter) || value.includes('"') || value.includes('\n') || value.includes('\r')) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

/** Null cells are written empty. */
export function stringifyCsv(rows: ReadonlyArray<ReadonlyArray<string | number | null>>, options: CsvWriteOptions = {}): string {
    const delimiter = options.delimiter ?? ',';
    const lines = rows.map(row =>
        row.map(cell => escapeField(cell === null ? '' : String(cell), delimiter)).join(delimiter)
    );
    const body = lines.length > 0 ? lines.join('\n') + '\n' : '';
    return (options.bom ? BOM : '') + body;
}
