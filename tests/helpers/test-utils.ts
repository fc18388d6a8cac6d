import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { CaptureLogger, Observation, RawObservation } from '../../src/types.js';
import { parseNaiveTimestamp } from '../../src/time.js';

/** Parse a test timestamp, failing loudly on typos. */
export function ts(value: string): number {
    const ms = parseNaiveTimestamp(value);
    if (ms === null) throw new Error(`bad test timestamp: ${value}`);
    return ms;
}

/** Observation at `yyyy-MM-dd HH:mm:ss`; the path defaults to `<deployment>/<time>.jpg`. */
export function obs(deployment: string, tag: string, time: string, file?: string): Observation {
    return {
        path: file ?? `${deployment}/${time.replace(/[ :]/g, '_')}.jpg`,
        deployment,
        tag,
        time: ts(time),
    };
}

export function raw(fields: Partial<RawObservation> & { path: string }): RawObservation {
    return {
        deployment: null,
        tag: null,
        time: null,
        ...fields,
    };
}

/** Times of a record list, as HH:mm, for compact assertions. */
export function clock(records: readonly Observation[]): string[] {
    return records.map(r => new Date(r.time).toISOString().slice(11, 16));
}

export async function withTempDir(run: (dir: string) => Promise<void>): Promise<void> {
    const root = process.env.CAPTURE_TEST_ROOT ?? os.tmpdir();
    const dir = await fs.mkdtemp(path.join(root, 'case-'));
    try {
        await run(dir);
    } finally {
        await fs.rm(dir, { recursive: true, force: true });
    }
}

export function captureLogger(): { lines: string[]; logger: Required<CaptureLogger> } {
    const lines: string[] = [];
    return {
        lines,
        logger: {
            info: (m: string) => lines.push(`INFO ${m}`),
            warn: (m: string) => lines.push(`WARN ${m}`),
            error: (m: string) => lines.push(`ERROR ${m}`),
        },
    };
}

/** Park-Miller generator, so property tests see the same data every run. */
export class SeededRNG {
    private state: number;

    constructor(seed: number) {
        this.state = seed % 2147483647;
        if (this.state <= 0) this.state += 2147483646;
    }

    next(): number {
        this.state = (this.state * 16807) % 2147483647;
        return (this.state - 1) / 2147483646;
    }

    /** Integer in [min, max). */
    nextInt(min: number, max: number): number {
        return Math.floor(this.next() * (max - min)) + min;
    }

    pick<T>(items: readonly T[]): T {
        return items[this.nextInt(0, items.length)];
    }
}

/**
 * Detections spread over one day for a few sites and species,
 * with frequent bursts so both policies have something to collapse.
 */
export function generateObservations(seed: number, count: number): Observation[] {
    const rng = new SeededRNG(seed);
    const base = ts('2024-06-01 00:00:00');
    const out: Observation[] = [];
    for (let i = 0; i < count; i++) {
        const deployment = rng.pick(['site1', 'site2', 'site3']);
        const tag = rng.pick(['Fox', 'Deer', 'Badger']);
        const time = base + rng.nextInt(0, 24 * 60) * 60_000 + rng.nextInt(0, 4) * 15_000;
        out.push({ path: `${deployment}/IMG_${i}.JPG`, deployment, tag, time });
    }
    return out;
}
