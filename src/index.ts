/**
 * Camera-trap capture: temporal independence public API
 *
 * @module camtrap-capture
 */

import { runIndependence } from './engine/pipeline.js';
import { classifyIndependence } from './engine/classifier.js';
import { readTagsTable, loadTagsTable, toObservations } from './io/table-reader.js';
import { writeReport, renderReport } from './io/report-writer.js';
import { parseIndependenceConfig } from './config.js';
import type { IndependenceConfigInput } from './config.js';
import type { CaptureLogger, IndependenceConfig, IndependenceReport } from './types.js';

export type {
    CaptureLogger as Logger,
    Target,
    Policy,
    RawObservation,
    Observation,
    EventObservation,
    EventRecord,
    CountRow,
    TagCountRow,
    IndependenceConfig,
    IndependenceReport,
    PipelineStats,
} from './types.js';
export { DEFAULT_EXCLUDE_TAGS, POLICY_ABBREVIATIONS, TARGET_COLUMNS, targetColumn } from './types.js';
export { CaptureError, ParameterError, TimeFormatError, MissingColumnError, NoDataError } from './errors.js';
export { IndependenceConfigSchema, parseIndependenceConfig } from './config.js';
export type { IndependenceConfigInput } from './config.js';
export { parseNaiveTimestamp, formatNaiveTimestamp, TIMESTAMP_FORMAT } from './time.js';
export { pathLevels, deploymentFromPath } from './record/observation.js';
export * from './engine/index.js';
export * from './io/index.js';

export interface AnalyzeFileOptions {
    outputDir: string;
    logger?: CaptureLogger | null;
}

// The Capture Namespace Object
export const Capture = {
    /**
     * Runs the full pipeline over in-memory rows.
     */
    analyze: runIndependence,

    /**
     * Independence flags only, without events or counts.
     */
    classify: classifyIndependence,

    /**
     * Parses tags CSV text into observations.
     */
    read: readTagsTable,

    /**
     * Reads a tags CSV, runs the pipeline and writes the report files.
     * Resolves with the report and the written paths.
     */
    analyzeFile: async (
        file: string,
        input: IndependenceConfig | IndependenceConfigInput,
        options: AnalyzeFileOptions
    ): Promise<{ report: IndependenceReport; files: string[] }> => {
        const logger = options.logger ?? null;
        const config = parseIndependenceConfig(input);
        const table = await loadTagsTable(file);
        const report = runIndependence(toObservations(table, config), config, { logger });
        const files = await writeReport(report, options.outputDir, { logger });
        return { report, files };
    },

    render: renderReport,
};

export default Capture;
