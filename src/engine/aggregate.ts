import { groupKey } from '../record/observation.js';
import type { CountRow, Observation, TagCountRow } from '../types.js';

/** Independent events per (deployment, tag), in first-seen order. */
export function countByDeployment(independent: readonly Observation[]): CountRow[] {
    const rows = new Map<string, CountRow>();
    for (const record of independent) {
        const key = groupKey(record);
        const row = rows.get(key);
        if (row) row.count++;
        else rows.set(key, { deployment: record.deployment, tag: record.tag, count: 1 });
    }
    return [...rows.values()];
}

/** Independent events per tag across all deployments, in first-seen order. */
export function countByTag(independent: readonly Observation[]): TagCountRow[] {
    const rows = new Map<string, TagCountRow>();
    for (const record of independent) {
        const row = rows.get(record.tag);
        if (row) row.count++;
        else rows.set(record.tag, { tag: record.tag, count: 1 });
    }
    return [...rows.values()];
}
