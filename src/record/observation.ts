/**
 * Observation record helpers.
 *
 * A deployment (camera/site) is not stored in the tags table; it is one
 * level of the resource path, chosen by the user.
 */

import type { Observation, RawObservation } from '../types.js';

/** Non-empty path segments, with `\` treated as a separator. */
export function pathLevels(path: string): string[] {
    return path.replace(/\\/g, '/').split('/').filter(segment => segment.length > 0);
}

/**
 * Deployment name at the given 1-based path level, or null when the path is shallower.
 */
export function deploymentFromPath(path: string, level: number): string | null {
    const levels = pathLevels(path);
    return levels[level - 1] ?? null;
}

export function isCompleteObservation(raw: RawObservation): raw is Observation {
    return raw.deployment !== null && raw.tag !== null && raw.time !== null;
}

/** Key of the (deployment, tag) partition the classifier groups by. */
export function groupKey(o: Pick<Observation, 'deployment' | 'tag'>): string {
    return `${o.deployment}\u0000${o.tag}`;
}

/** Key of the (deployment, time, tag) triple deduplication works on. */
export function tripleKey(o: Observation): string {
    return `${o.deployment}\u0000${o.tag}\u0000${o.time}`;
}
