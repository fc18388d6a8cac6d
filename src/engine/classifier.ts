/**
 * Independence classifier.
 *
 * Decides which detections are independent events under one of two policies,
 * each parameterized by a minimum time difference Δ in minutes:
 *
 * - `LastRecord`: a record is independent iff no other record of its
 *   (deployment, tag) partition lies in the trailing window (t - Δ, t].
 *   Every record is tested against its own fixed window.
 * - `LastIndependentRecord`: a record is independent iff it opens its
 *   partition or more than Δ has elapsed since the last independent record
 *   of that partition. The clock restarts at each independent record, so a
 *   chain of close detections collapses into its first record.
 *
 * Boundaries differ: a gap of exactly Δ is independent under `LastRecord`
 * and not under `LastIndependentRecord`.
 */

import { ParameterError } from '../errors.js';
import { groupKey } from '../record/observation.js';
import { minutesToMs } from '../time.js';
import type { Observation, Policy } from '../types.js';
import { canonicalSort } from './canonical.js';

export interface ClassifierOptions {
    minDeltaTime: number;
    policy?: Policy;
}

/**
 * Split canonically sorted records into contiguous (deployment, tag) partitions.
 */
export function* partitions<T extends Observation>(sorted: readonly T[]): Generator<T[]> {
    let current: T[] = [];
    let currentKey: string | null = null;
    for (const record of sorted) {
        const key = groupKey(record);
        if (key !== currentKey && current.length > 0) {
            yield current;
            current = [];
        }
        currentKey = key;
        current.push(record);
    }
    if (current.length > 0) yield current;
}

/** Flags for one partition, times ascending. */
function markLastRecord(group: readonly Observation[], deltaMs: number): boolean[] {
    const flags: boolean[] = [];
    let left = 0;
    let right = 0;
    for (const record of group) {
        while (left < group.length && group[left].time <= record.time - deltaMs) left++;
        while (right < group.length && group[right].time <= record.time) right++;
        flags.push(right - left === 1);
    }
    return flags;
}

function markLastIndependentRecord(group: readonly Observation[], deltaMs: number): boolean[] {
    const flags: boolean[] = [];
    let lastIndependent: number | null = null;
    for (const record of group) {
        const independent = lastIndependent === null || record.time - lastIndependent > deltaMs;
        if (independent) lastIndependent = record.time;
        flags.push(independent);
    }
    return flags;
}

export function validateMinDeltaTime(minDeltaTime: number): void {
    if (!Number.isInteger(minDeltaTime)) {
        throw new ParameterError('minDeltaTime', 'must be a whole number of minutes');
    }
    if (minDeltaTime <= 0) {
        throw new ParameterError('minDeltaTime', 'must be greater than 0');
    }
}

/**
 * Return the independent records in canonical order.
 * The input is sorted here; callers' ordering is never relied on.
 */
export function classifyIndependence(records: readonly Observation[], options: ClassifierOptions): Observation[] {
    validateMinDeltaTime(options.minDeltaTime);
    const deltaMs = minutesToMs(options.minDeltaTime);
    const mark = (options.policy ?? 'LastIndependentRecord') === 'LastRecord'
        ? markLastRecord
        : markLastIndependentRecord;

    const independent: Observation[] = [];
    for (const group of partitions(canonicalSort(records))) {
        const flags = mark(group, deltaMs);
        group.forEach((record, i) => {
            if (flags[i]) {
                independent.push({
                    path: record.path,
                    deployment: record.deployment,
                    time: record.time,
                    tag: record.tag,
                });
            }
        });
    }
    return independent;
}
