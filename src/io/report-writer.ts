/**
 * Writes an IndependenceReport as BOM-prefixed CSV files.
 * Every file is rendered before the first one is written.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { formatNaiveTimestamp } from '../time.js';
import { targetColumn } from '../types.js';
import type { CaptureLogger, IndependenceReport } from '../types.js';
import { stringifyCsv } from './csv.js';

export interface RenderedFile {
    filename: string;
    content: string;
}

export interface WriteReportOptions {
    logger?: CaptureLogger | null;
}

export function renderReport(report: IndependenceReport): RenderedFile[] {
    const tagCol = targetColumn(report.config.target);
    const files: RenderedFile[] = [];

    files.push({
        filename: `temporal-independence${report.outputSuffix}`,
        content: stringifyCsv([
            ['path', 'deployment', 'time', tagCol],
            ...report.independent.map(r => [r.path, r.deployment, formatNaiveTimestamp(r.time), r.tag]),
        ], { bom: true }),
    });

    if (report.events) {
        files.push({
            filename: `events${report.outputSuffix}`,
            content: stringifyCsv([
                ['path', 'deployment', 'time', tagCol, 'event_id'],
                ...report.events.map(r => [r.path, r.deployment, formatNaiveTimestamp(r.time), r.tag, r.eventId]),
            ], { bom: true }),
        });
    }

    files.push({
        filename: 'count_by_deployment.csv',
        content: stringifyCsv([
            ['deployment', tagCol, 'count'],
            ...report.countByDeployment.map(r => [r.deployment, r.tag, r.count]),
        ], { bom: true }),
    });

    if (report.countAll) {
        files.push({
            filename: 'count_all.csv',
            content: stringifyCsv([
                [tagCol, 'count'],
                ...report.countAll.map(r => [r.tag, r.count]),
            ], { bom: true }),
        });
    }

    return files;
}

/** Returns the absolute paths written, in write order. */
export async function writeReport(report: IndependenceReport, outputDir: string, options: WriteReportOptions = {}): Promise<string[]> {
    const files = renderReport(report);
    const dir = path.resolve(outputDir);
    await mkdir(dir, { recursive: true });

    const written: string[] = [];
    for (const file of files) {
        const target = path.join(dir, file.filename);
        await writeFile(target, file.content, 'utf8');
        options.logger?.info?.(`Saved to ${target}`);
        written.push(target);
    }
    return written;
}
