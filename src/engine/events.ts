/**
 * Event assignment: number the independent records, then attach to every
 * filtered detection the event it belongs to via a backward as-of match
 * on (deployment, tag).
 */

import { groupKey } from '../record/observation.js';
import type { EventObservation, EventRecord, Observation } from '../types.js';
import { canonicalSort } from './canonical.js';

/** Sequential event IDs from 1, in the given row order. */
export function assignEventIds(independent: readonly Observation[]): EventObservation[] {
    return independent.map((record, i) => ({ ...record, eventId: i + 1 }));
}

/** Index of the last entry with time <= t, or -1. */
function floorIndex(events: readonly EventObservation[], t: number): number {
    let lo = 0;
    let hi = events.length - 1;
    let found = -1;
    while (lo <= hi) {
        const mid = (lo + hi) >>> 1;
        if (events[mid].time <= t) {
            found = mid;
            lo = mid + 1;
        } else {
            hi = mid - 1;
        }
    }
    return found;
}

/**
 * For each record (filtered, not deduplicated), take the event ID of the most
 * recent independent record of the same (deployment, tag) at or before its time.
 * Records are returned in canonical order; ones with no such predecessor get null.
 */
export function attachEvents(records: readonly Observation[], events: readonly EventObservation[]): EventRecord[] {
    const byGroup = new Map<string, EventObservation[]>();
    for (const event of events) {
        const key = groupKey(event);
        const list = byGroup.get(key);
        if (list) list.push(event);
        else byGroup.set(key, [event]);
    }
    for (const list of byGroup.values()) {
        list.sort((a, b) => a.time - b.time);
    }

    return canonicalSort(records).map(record => {
        const candidates = byGroup.get(groupKey(record));
        const idx = candidates ? floorIndex(candidates, record.time) : -1;
        return {
            path: record.path,
            deployment: record.deployment,
            time: record.time,
            tag: record.tag,
            eventId: candidates && idx >= 0 ? candidates[idx].eventId : null,
        };
    });
}
