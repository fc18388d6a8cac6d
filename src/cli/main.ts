/**
 * CLI: Temporal independence analysis
 *
 * Usage:  capture <csv_path> [--delta N] [--policy lir|lr] [--target species|individual]
 *                 [--deployment-level N] [--exclude a,b] [--no-exclude] [--event] [-o DIR]
 *
 * Reads a tags CSV, asks for any missing parameter when attached to a terminal,
 * and writes the independence tables. Nothing is written if any step fails.
 */

import * as path from 'node:path';
import { parseIndependenceConfig } from '../config.js';
import { validateMinDeltaTime } from '../engine/classifier.js';
import { runIndependence } from '../engine/pipeline.js';
import { NoDataError, ParameterError } from '../errors.js';
import { loadTagsTable, samplePath, toObservations } from '../io/table-reader.js';
import { writeReport } from '../io/report-writer.js';
import type { CaptureLogger } from '../types.js';
import { parseCaptureArgs, USAGE } from './args.js';
import type { CaptureArgs } from './args.js';
import { createTerminalPrompt, missingParameters, promptMissingParameters } from './prompt.js';
import type { Ask, PromptedParameters } from './prompt.js';

export const consoleLogger: CaptureLogger = {
    info: msg => console.log(msg),
    warn: msg => console.warn(msg),
    error: msg => console.error(msg),
};

export interface MainOptions {
    logger?: CaptureLogger;
    /**
     * Source of interactive answers. Omitted: the terminal, when stdin is a TTY.
     * Null: never prompt.
     */
    ask?: Ask | null;
}

async function resolveParameters(args: CaptureArgs, sample: string | null, ask: Ask | null | undefined): Promise<PromptedParameters> {
    if (missingParameters(args).length > 0) {
        if (ask) {
            return promptMissingParameters(args, sample, ask);
        }
        if (ask === undefined && process.stdin.isTTY) {
            const terminal = createTerminalPrompt();
            try {
                return await promptMissingParameters(args, sample, terminal.ask);
            } finally {
                terminal.close();
            }
        }
    }

    if (args.minDeltaTime === undefined) {
        throw new ParameterError('minDeltaTime', 'is required (pass --delta)');
    }
    if (args.deploymentLevel === undefined) {
        throw new ParameterError('deploymentLevel', 'is required (pass --deployment-level)');
    }
    return {
        minDeltaTime: args.minDeltaTime,
        policy: args.policy ?? 'LastIndependentRecord',
        target: args.target ?? 'species',
        deploymentLevel: args.deploymentLevel,
    };
}

/** Returns the process exit code. */
export async function main(argv: readonly string[], options: MainOptions = {}): Promise<number> {
    const logger = options.logger ?? consoleLogger;
    try {
        const args = parseCaptureArgs(argv);
        if (args.help) {
            logger.info?.(USAGE);
            return 0;
        }
        if (args.minDeltaTime !== undefined) {
            validateMinDeltaTime(args.minDeltaTime);
        }

        const file = path.resolve(args.csvPath);
        const table = await loadTagsTable(file);
        if (table.rows.length === 0) {
            throw new NoDataError(`No records in ${file}`);
        }
        const params = await resolveParameters(args, samplePath(table), options.ask);
        const config = parseIndependenceConfig({
            ...params,
            noExclude: args.noExclude,
            event: args.event,
            ...(args.excludeTags ? { excludeTags: args.excludeTags } : {}),
        });

        const records = toObservations(table, config);
        const report = runIndependence(records, config, { logger });
        await writeReport(report, args.outputDir, { logger });
        return 0;
    } catch (err) {
        logger.error?.(err instanceof Error ? err.message : String(err));
        return 1;
    }
}
