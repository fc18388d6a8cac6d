import * as fs from 'fs/promises';
import * as path from 'path';
import {
    loadTagsTable,
    parseTagsTable,
    readTagsTable,
    samplePath,
    toObservations,
} from '../src/io/table-reader.js';
import { deploymentFromPath, pathLevels } from '../src/record/observation.js';
import { CaptureError, MissingColumnError, TimeFormatError } from '../src/errors.js';
import { ts, withTempDir } from './helpers/test-utils.js';

const TABLE = [
    'path,datetime,species,individual,rating',
    '/data/survey/siteA/IMG_0001.JPG,2024-05-01 10:00:00,Fox,,3',
    '/data/survey/siteB/IMG_0002.JPG,2024-05-01 11:30:00,,F01,',
    '/data/survey/siteB/IMG_0003.JPG,,Deer,,',
    '',
].join('\n');

describe('pathLevels / deploymentFromPath', () => {
    it('splits on both separators and skips empty segments', () => {
        expect(pathLevels('/data/survey/siteA/x.jpg')).toEqual(['data', 'survey', 'siteA', 'x.jpg']);
        expect(pathLevels('D:\\survey\\cam1\\IMG_1.JPG')).toEqual(['D:', 'survey', 'cam1', 'IMG_1.JPG']);
    });

    it('takes a 1-based level and gives null past the end', () => {
        expect(deploymentFromPath('D:\\survey\\cam1\\IMG_1.JPG', 3)).toBe('cam1');
        expect(deploymentFromPath('siteA/x.jpg', 5)).toBeNull();
    });
});

describe('parseTagsTable', () => {
    it('reads columns and turns empty cells into null', () => {
        const table = parseTagsTable(TABLE);
        expect(table.columns).toEqual(['path', 'datetime', 'species', 'individual', 'rating']);
        expect(table.rows).toHaveLength(3);
        expect(table.rows[1]).toEqual(['/data/survey/siteB/IMG_0002.JPG', '2024-05-01 11:30:00', null, 'F01', null]);
    });

    it('pads short rows', () => {
        const table = parseTagsTable('path,datetime,species\nx.jpg');
        expect(table.rows).toEqual([['x.jpg', null, null]]);
    });

    it('handles a header-only or empty file', () => {
        expect(parseTagsTable('path,datetime,species\n').rows).toEqual([]);
        expect(parseTagsTable('')).toEqual({ columns: [], rows: [] });
    });

    it('finds a sample path for the deployment prompt', () => {
        expect(samplePath(parseTagsTable(TABLE))).toBe('/data/survey/siteA/IMG_0001.JPG');
        expect(samplePath(parseTagsTable('species\nFox'))).toBeNull();
    });
});

describe('toObservations', () => {
    it('builds raw observations for the species column', () => {
        const records = readTagsTable(TABLE, { target: 'species', deploymentLevel: 3 });
        expect(records).toEqual([
            { path: '/data/survey/siteA/IMG_0001.JPG', deployment: 'siteA', tag: 'Fox', time: ts('2024-05-01 10:00:00') },
            { path: '/data/survey/siteB/IMG_0002.JPG', deployment: 'siteB', tag: null, time: ts('2024-05-01 11:30:00') },
            { path: '/data/survey/siteB/IMG_0003.JPG', deployment: 'siteB', tag: 'Deer', time: null },
        ]);
    });

    it('reads the individual column when targeted', () => {
        const records = readTagsTable(TABLE, { target: 'individual', deploymentLevel: 3 });
        expect(records.map(r => r.tag)).toEqual([null, 'F01', null]);
    });

    it('accepts the legacy datetime_original column', () => {
        const records = readTagsTable('path,datetime_original,species\nsiteA/x.jpg,2024-05-01 10:00:00,Fox\n', {
            target: 'species',
            deploymentLevel: 1,
        });
        expect(records[0].time).toBe(ts('2024-05-01 10:00:00'));
        expect(records[0].deployment).toBe('siteA');
    });

    it('names the missing column', () => {
        const noTarget = parseTagsTable('path,datetime\nx.jpg,2024-05-01 10:00:00');
        expect(() => toObservations(noTarget, { target: 'species', deploymentLevel: 1 })).toThrow(MissingColumnError);
        expect(() => toObservations(noTarget, { target: 'species', deploymentLevel: 1 }))
            .toThrow('Missing required column "species" (found: path, datetime)');

        const noTime = parseTagsTable('path,species\nx.jpg,Fox');
        expect(() => toObservations(noTime, { target: 'species', deploymentLevel: 1 }))
            .toThrow('Missing required column "datetime"');
    });

    it('fails on a time that does not parse, naming the row and format', () => {
        const table = parseTagsTable('path,datetime,species\na.jpg,2024-05-01 10:00:00,Fox\nb.jpg,01/05/2024 10:00,Fox\n');
        let caught: unknown = null;
        try {
            toObservations(table, { target: 'species', deploymentLevel: 1 });
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(TimeFormatError);
        if (caught instanceof TimeFormatError) {
            expect(caught.row).toBe(2);
            expect(caught.value).toBe('01/05/2024 10:00');
            expect(caught.message).toContain("'yyyy-MM-dd HH:mm:ss'");
        }
    });
});

describe('loadTagsTable', () => {
    it('reads a BOM-prefixed file from disk', async () => {
        await withTempDir(async (dir) => {
            const file = path.join(dir, 'tags.csv');
            await fs.writeFile(file, `\uFEFF${TABLE}`, 'utf8');
            const table = await loadTagsTable(file);
            expect(table.columns[0]).toBe('path');
            expect(table.rows).toHaveLength(3);
        });
    });

    it('wraps a missing file in a CaptureError', async () => {
        await withTempDir(async (dir) => {
            await expect(loadTagsTable(path.join(dir, 'absent.csv'))).rejects.toThrow(CaptureError);
        });
    });
});
