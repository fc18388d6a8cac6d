/**
 * Deduplication and the canonical order the classifier depends on:
 * grouped by deployment, then tag, then ascending time.
 */

import { NoDataError } from '../errors.js';
import { tripleKey } from '../record/observation.js';
import type { Observation } from '../types.js';

/** Code point order, which is also UTF-8 byte order. */
export function compareStrings(a: string, b: string): number {
    const left = a[Symbol.iterator]();
    const right = b[Symbol.iterator]();
    for (;;) {
        const x = left.next();
        const y = right.next();
        if (x.done || y.done) return x.done ? (y.done ? 0 : -1) : 1;
        const cx = x.value.codePointAt(0) ?? 0;
        const cy = y.value.codePointAt(0) ?? 0;
        if (cx !== cy) return cx - cy;
    }
}

export function compareCanonical(a: Observation, b: Observation): number {
    return compareStrings(a.deployment, b.deployment)
        || compareStrings(a.tag, b.tag)
        || a.time - b.time;
}

/** Keep the first record of each (deployment, time, tag) triple. */
export function dedupeObservations<T extends Observation>(records: readonly T[]): T[] {
    const seen = new Set<string>();
    const out: T[] = [];
    for (const record of records) {
        const key = tripleKey(record);
        if (seen.has(key)) continue;
        seen.add(key);
        out.push(record);
    }
    return out;
}

/** Stable sort into a new array; ties keep their input order. */
export function canonicalSort<T extends Observation>(records: readonly T[]): T[] {
    return [...records].sort(compareCanonical);
}

export function isCanonicallySorted(records: readonly Observation[]): boolean {
    for (let i = 1; i < records.length; i++) {
        if (compareCanonical(records[i - 1], records[i]) > 0) return false;
    }
    return true;
}

/**
 * Deduplicate and sort filtered observations.
 * @throws NoDataError when nothing is left to analyze
 */
export function prepareObservations(records: readonly Observation[]): Observation[] {
    if (records.length === 0) {
        throw new NoDataError();
    }
    return canonicalSort(dedupeObservations(records));
}
