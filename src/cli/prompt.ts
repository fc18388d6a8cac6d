/**
 * Interactive adapter: asks for the analysis parameters the command line left out.
 * It only fills a config input; validation stays in parseIndependenceConfig.
 */

import { createInterface } from 'node:readline/promises';
import { ParameterError } from '../errors.js';
import { pathLevels } from '../record/observation.js';
import type { Policy, Target } from '../types.js';
import { parseInteger, parsePolicy, parseTarget } from './args.js';
import type { CaptureArgs } from './args.js';

export type Ask = (question: string) => Promise<string>;

export interface PromptedParameters {
    minDeltaTime: number;
    policy: Policy;
    target: Target;
    deploymentLevel: number;
}

export type ParameterArgs = Pick<CaptureArgs, 'minDeltaTime' | 'policy' | 'target' | 'deploymentLevel'>;

export function missingParameters(args: ParameterArgs): Array<keyof PromptedParameters> {
    const keys: Array<keyof PromptedParameters> = ['minDeltaTime', 'policy', 'target', 'deploymentLevel'];
    return keys.filter(key => args[key] === undefined);
}

function withDefault(answer: string): string {
    return answer.trim() === '' ? '1' : answer;
}

export async function promptMissingParameters(args: ParameterArgs, sample: string | null, ask: Ask): Promise<PromptedParameters> {
    const minDeltaTime = args.minDeltaTime ?? parseInteger('minDeltaTime', await ask(
        'Input the Minimum Time Difference (when considering records as independent) in minutes (e.g. 30): '
    ));

    // An empty answer picks option 1.
    const policy = args.policy ?? parsePolicy(withDefault(await ask(
        '\nThe Minimum Time Difference should be compared with?\n' +
        '1) Last independent record 2) Last record\nEnter a selection (e.g. 1): '
    )));

    const target = args.target ?? parseTarget(withDefault(await ask(
        '\nPerform analysis on\n1) species 2) individual\nEnter a selection: '
    )));

    let deploymentLevel = args.deploymentLevel;
    if (deploymentLevel === undefined) {
        const levels = sample ? pathLevels(sample) : [];
        if (levels.length === 0) {
            throw new ParameterError('deploymentLevel', 'no file path available to choose a deployment level from');
        }
        const listing = levels.map((entry, i) => `${i + 1}): ${entry}`).join('\n');
        deploymentLevel = parseInteger('deploymentLevel', await ask(
            `\nHere is a sample of the file path (${sample})\n${listing}\n` +
            'Select the number corresponding to the deployment: '
        ));
        if (deploymentLevel < 1 || deploymentLevel > levels.length) {
            throw new ParameterError('deploymentLevel', `must be between 1 and ${levels.length}`);
        }
    }

    return { minDeltaTime, policy, target, deploymentLevel };
}

export interface TerminalPrompt {
    ask: Ask;
    close: () => void;
}

export function createTerminalPrompt(): TerminalPrompt {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    return {
        ask: question => rl.question(question),
        close: () => rl.close(),
    };
}
