/**
 * Temporal independence pipeline.
 *
 * raw → exclusion filter → dedup/sort → classifier → (events, counts).
 * Pure and synchronous; all validation happens before classification.
 */

import { resolveConfig } from '../config.js';
import type { IndependenceConfigInput } from '../config.js';
import { POLICY_ABBREVIATIONS } from '../types.js';
import type { CaptureLogger, IndependenceConfig, IndependenceReport, RawObservation } from '../types.js';
import { countByDeployment, countByTag } from './aggregate.js';
import { prepareObservations } from './canonical.js';
import { classifyIndependence } from './classifier.js';
import { assignEventIds, attachEvents } from './events.js';
import { filterObservations } from './exclusion.js';

export interface PipelineOptions {
    logger?: CaptureLogger | null;
}

/** `_<target>_<N>m_<LIR|LR>.csv` */
export function buildOutputSuffix(config: Pick<IndependenceConfig, 'target' | 'minDeltaTime' | 'policy'>): string {
    return `_${config.target}_${config.minDeltaTime}m_${POLICY_ABBREVIATIONS[config.policy]}.csv`;
}

export function runIndependence(
    records: readonly RawObservation[],
    input: IndependenceConfig | IndependenceConfigInput,
    options: PipelineOptions = {}
): IndependenceReport {
    const logger = options.logger ?? null;
    const config = resolveConfig(input, logger);

    const filtered = filterObservations(records, {
        noExclude: config.noExclude,
        excludeTags: config.excludeTags,
    });
    logger?.info?.(`Filtered ${records.length} records to ${filtered.length}${config.noExclude ? ' (no tag exclusion)' : ''}`);

    const unique = prepareObservations(filtered);
    const independent = classifyIndependence(unique, config);
    logger?.info?.(
        `${independent.length} independent ${config.target} records out of ${unique.length} ` +
        `(Δ=${config.minDeltaTime}m, ${config.policy})`
    );

    const events = config.event ? attachEvents(filtered, assignEventIds(independent)) : null;

    return {
        config,
        outputSuffix: buildOutputSuffix(config),
        independent,
        events,
        countByDeployment: countByDeployment(independent),
        countAll: config.target === 'species' ? countByTag(independent) : null,
        stats: {
            rawCount: records.length,
            filteredCount: filtered.length,
            uniqueCount: unique.length,
            independentCount: independent.length,
        },
    };
}
