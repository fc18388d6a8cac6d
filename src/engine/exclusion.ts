import { isCompleteObservation } from '../record/observation.js';
import { DEFAULT_EXCLUDE_TAGS } from '../types.js';
import type { Observation, RawObservation } from '../types.js';

export interface ExclusionOptions {
    /** Skip the tag exclusion; records with null key fields are still dropped. */
    noExclude?: boolean;
    excludeTags?: readonly string[];
}

/**
 * Drop records with a null deployment, time or tag, then (unless `noExclude`)
 * every record whose tag is in the exclusion set. An empty result is valid here.
 */
export function filterObservations(records: readonly RawObservation[], options: ExclusionOptions = {}): Observation[] {
    const complete = records.filter(isCompleteObservation);
    if (options.noExclude) {
        return complete;
    }
    const excluded = new Set(options.excludeTags ?? DEFAULT_EXCLUDE_TAGS);
    return complete.filter(o => !excluded.has(o.tag));
}
