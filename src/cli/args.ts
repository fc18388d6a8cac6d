import { ParameterError } from '../errors.js';
import type { Policy, Target } from '../types.js';

export const DEFAULT_OUTPUT_DIR = './capture_output';

export const USAGE = `Usage: capture <csv_path> [options]

Temporal independence analysis on a tags CSV file.

Options:
  --delta <minutes>            Minimum time difference between independent records
  --policy <lir|lr>            Compare with the last independent record (lir) or the last record (lr)
  --target <species|individual>
  --deployment-level <n>       1-based path level naming the deployment
  --exclude <a,b,...>          Tags to exclude (default: Blank, Useless data, Unidentified, Human, Unknown, Blur)
  --no-exclude                 Do not exclude any tags
  --event                      Write event IDs for every record
  -o, --output <dir>           Output directory (default: ${DEFAULT_OUTPUT_DIR})
  -h, --help                   Show this message

Parameters not given on the command line are asked for interactively.`;

export interface CaptureArgs {
    csvPath: string;
    outputDir: string;
    event: boolean;
    noExclude: boolean;
    help: boolean;
    minDeltaTime?: number;
    policy?: Policy;
    target?: Target;
    deploymentLevel?: number;
    excludeTags?: string[];
}

const VALUE_FLAGS = new Set(['--delta', '--policy', '--target', '--deployment-level', '--exclude', '--output', '-o']);

export function parseInteger(field: string, value: string): number {
    const trimmed = value.trim();
    if (!/^[+-]?\d+$/.test(trimmed)) {
        throw new ParameterError(field, `"${value}" is not a whole number`);
    }
    const parsed = Number(trimmed);
    if (!Number.isSafeInteger(parsed)) {
        throw new ParameterError(field, `"${value}" is too large`);
    }
    return parsed;
}

export function parsePolicy(value: string): Policy {
    switch (value.trim().toLowerCase()) {
        case '1':
        case 'lir':
        case 'lastindependentrecord':
            return 'LastIndependentRecord';
        case '2':
        case 'lr':
        case 'lastrecord':
            return 'LastRecord';
        default:
            throw new ParameterError('policy', `"${value}" is not one of lir, lr`);
    }
}

export function parseTarget(value: string): Target {
    switch (value.trim().toLowerCase()) {
        case '1':
        case 'species':
            return 'species';
        case '2':
        case 'individual':
            return 'individual';
        default:
            throw new ParameterError('target', `"${value}" is not one of species, individual`);
    }
}

export function parseCaptureArgs(argv: readonly string[]): CaptureArgs {
    const args: CaptureArgs = {
        csvPath: '',
        outputDir: DEFAULT_OUTPUT_DIR,
        event: false,
        noExclude: false,
        help: false,
    };
    const positional: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        const token = argv[i];
        const eq = token.startsWith('--') ? token.indexOf('=') : -1;
        const flag = eq !== -1 ? token.slice(0, eq) : token;

        let value = '';
        if (VALUE_FLAGS.has(flag)) {
            if (eq !== -1) {
                value = token.slice(eq + 1);
            } else if (i + 1 < argv.length) {
                value = argv[++i];
            } else {
                throw new ParameterError(flag.replace(/^-+/, ''), 'missing value');
            }
        }

        switch (flag) {
            case '--event': args.event = true; break;
            case '--no-exclude': args.noExclude = true; break;
            case '-h':
            case '--help': args.help = true; break;
            case '-o':
            case '--output': args.outputDir = value; break;
            case '--delta': args.minDeltaTime = parseInteger('minDeltaTime', value); break;
            case '--policy': args.policy = parsePolicy(value); break;
            case '--target': args.target = parseTarget(value); break;
            case '--deployment-level': args.deploymentLevel = parseInteger('deploymentLevel', value); break;
            case '--exclude':
                args.excludeTags = value.split(',').map(tag => tag.trim());
                break;
            default:
                if (token.startsWith('-')) {
                    throw new ParameterError('option', `unknown option ${token}`);
                }
                positional.push(token);
        }
    }

    if (positional.length > 1) {
        throw new ParameterError('csv_path', `expected one CSV file, got ${positional.length}`);
    }
    if (positional.length === 0 && !args.help) {
        throw new ParameterError('csv_path', 'a tags CSV file is required');
    }
    args.csvPath = positional[0] ?? '';
    return args;
}
