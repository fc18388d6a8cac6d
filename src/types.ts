export type CaptureLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

/**
 * Which tag column the analysis runs on.
 */
export type Target = 'species' | 'individual';

export const TARGET_COLUMNS: Record<Target, string> = {
    species: 'species',
    individual: 'individual',
};

export function targetColumn(target: Target): string {
    return TARGET_COLUMNS[target];
}

/**
 * What the minimum time difference is measured against.
 *
 * - `LastIndependentRecord`: the running gap since the last record kept as independent (default)
 * - `LastRecord`: a fixed trailing window before each record
 */
export type Policy = 'LastIndependentRecord' | 'LastRecord';

export const POLICY_ABBREVIATIONS: Record<Policy, string> = {
    LastIndependentRecord: 'LIR',
    LastRecord: 'LR',
};

/** Administrative and non-biological tags left out of the analysis. */
export const DEFAULT_EXCLUDE_TAGS: readonly string[] = [
    '',
    'Blank',
    'Useless data',
    'Unidentified',
    'Human',
    'Unknown',
    'Blur',
];

/** One week in minutes; larger windows are accepted but flagged. */
export const UNUSUAL_DELTA_MINUTES = 10080;

export const MS_PER_MINUTE = 60 * 1000;

/**
 * A detection as read from the tags table, before filtering.
 * `time` is milliseconds on a naive wall-clock axis.
 */
export interface RawObservation {
    path: string;
    deployment: string | null;
    tag: string | null;
    time: number | null;
}

export interface Observation {
    path: string;
    deployment: string;
    tag: string;
    time: number;
}

export interface EventObservation extends Observation {
    eventId: number;
}

export interface EventRecord extends Observation {
    /** Null when no independent record of the group precedes this one. */
    eventId: number | null;
}

export interface CountRow {
    deployment: string;
    tag: string;
    count: number;
}

export interface TagCountRow {
    tag: string;
    count: number;
}

export interface IndependenceConfig {
    /** Minimum time difference in whole minutes (> 0). */
    minDeltaTime: number;
    policy: Policy;
    target: Target;
    /** Keep excluded tags in the analysis (null key fields are still dropped). */
    noExclude: boolean;
    /** Back-propagate event IDs to every filtered record. */
    event: boolean;
    excludeTags: readonly string[];
    /** 1-based level of the path segment naming the deployment. */
    deploymentLevel: number;
}

export interface PipelineStats {
    rawCount: number;
    filteredCount: number;
    uniqueCount: number;
    independentCount: number;
}

export interface IndependenceReport {
    config: IndependenceConfig;
    /** `_<target>_<N>m_<LIR|LR>.csv` */
    outputSuffix: string;
    independent: Observation[];
    events: EventRecord[] | null;
    countByDeployment: CountRow[];
    /** Global per-tag totals, species target only. */
    countAll: TagCountRow[] | null;
    stats: PipelineStats;
}
