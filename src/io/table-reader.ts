/**
 * Tags table reader.
 *
 * Loads the flat tags table (one row per resource and tag) and turns it into
 * RawObservations for the engine. Column layout: `path`, `datetime` (or the
 * legacy `datetime_original`), `species`, `individual`, plus any extra
 * columns, which are ignored.
 */

import { readFile } from 'node:fs/promises';
import { CaptureError, MissingColumnError, TimeFormatError } from '../errors.js';
import { deploymentFromPath } from '../record/observation.js';
import { parseNaiveTimestamp } from '../time.js';
import { targetColumn } from '../types.js';
import type { RawObservation, Target } from '../types.js';
import { parseCsv } from './csv.js';

export const PATH_COLUMN = 'path';
export const TIME_COLUMNS = ['datetime', 'datetime_original'] as const;

export interface TagsTable {
    columns: string[];
    /** Data rows; empty cells are null. */
    rows: Array<Array<string | null>>;
}

export interface ObservationOptions {
    target: Target;
    deploymentLevel: number;
}

export function parseTagsTable(text: string): TagsTable {
    const [header, ...body] = parseCsv(text);
    if (!header) {
        return { columns: [], rows: [] };
    }
    const rows = body
        .filter(cells => !(cells.length === 1 && cells[0] === ''))
        .map(cells => header.map((_, i) => {
            const cell = cells[i];
            return cell === undefined || cell === '' ? null : cell;
        }));
    return { columns: header.map(name => name.trim()), rows };
}

function columnIndex(table: TagsTable, name: string): number {
    const idx = table.columns.indexOf(name);
    if (idx === -1) {
        throw new MissingColumnError(name, table.columns);
    }
    return idx;
}

function timeColumnIndex(table: TagsTable): number {
    for (const name of TIME_COLUMNS) {
        const idx = table.columns.indexOf(name);
        if (idx !== -1) return idx;
    }
    throw new MissingColumnError(TIME_COLUMNS[0], table.columns);
}

/** First non-empty path, shown when asking for the deployment level. */
export function samplePath(table: TagsTable): string | null {
    const idx = table.columns.indexOf(PATH_COLUMN);
    if (idx === -1) return null;
    for (const row of table.rows) {
        const path = row[idx];
        if (path !== null) return path;
    }
    return null;
}

/**
 * Build RawObservations. Empty cells stay null for the exclusion filter to drop;
 * a time cell that is present but unparseable fails the whole read.
 */
export function toObservations(table: TagsTable, options: ObservationOptions): RawObservation[] {
    const pathIdx = columnIndex(table, PATH_COLUMN);
    const timeIdx = timeColumnIndex(table);
    const tagIdx = columnIndex(table, targetColumn(options.target));

    return table.rows.map((row, i) => {
        const path = row[pathIdx] ?? '';
        const rawTime = row[timeIdx];
        let time: number | null = null;
        if (rawTime !== null) {
            time = parseNaiveTimestamp(rawTime);
            if (time === null) {
                throw new TimeFormatError(i + 1, rawTime);
            }
        }
        return {
            path,
            deployment: path ? deploymentFromPath(path, options.deploymentLevel) : null,
            tag: row[tagIdx],
            time,
        };
    });
}

export function readTagsTable(text: string, options: ObservationOptions): RawObservation[] {
    return toObservations(parseTagsTable(text), options);
}

export async function loadTagsTable(file: string): Promise<TagsTable> {
    let text: string;
    try {
        text = await readFile(file, 'utf8');
    } catch (err) {
        throw new CaptureError(`Failed to read CSV file ${file}: ${err instanceof Error ? err.message : String(err)}`, err);
    }
    return parseTagsTable(text);
}
