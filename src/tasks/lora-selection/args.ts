/**
 * @module tasks/lora-selection/args
 * @description Command-line argument parsing
 */

import { ConfigError } from '../../core/errors';
import type { ExperimentConfig, PolicySharing } from './config';

export type OutputFormat = 'text' | 'json';

export interface CliArgs {
    algorithm?: string;
    preset?: string;
    devices?: number;
    seed?: number;
    durationS?: number;
    payloadBytes?: number;
    intervalS?: number;
    /** Share of mobile devices, in [0, 1] */
    mobility?: number;
    spreadingFactor?: number;
    transmissions?: number;
    sharing?: PolicySharing;
    format: OutputFormat;
    verbose: boolean;
    help: boolean;
}

function readValue(argv: readonly string[], i: number, flag: string): string {
    const value = argv[i];
    if (value === undefined || value.startsWith('--')) {
        throw new ConfigError(`Missing value for ${flag}`);
    }
    return value;
}

function toNumber(raw: string, flag: string): number {
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(value)) {
        throw new ConfigError(`${flag} expects a number, got "${raw}"`);
    }
    return value;
}

function toInteger(raw: string, flag: string): number {
    const value = toNumber(raw, flag);
    if (!Number.isInteger(value)) {
        throw new ConfigError(`${flag} expects an integer, got "${raw}"`);
    }
    return value;
}

/**
 * Parse CLI arguments (without the node and script entries)
 *
 * @throws ConfigError for unknown flags or malformed values
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
    const args: CliArgs = {
        format: 'text',
        verbose: false,
        help: false,
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        switch (arg) {
            case '--help':
            case '-h':
                args.help = true;
                break;
            case '--verbose':
            case '-v':
                args.verbose = true;
                break;
            case '--algorithm':
            case '-a':
                args.algorithm = readValue(argv, ++i, arg);
                break;
            case '--preset':
            case '-p':
                args.preset = readValue(argv, ++i, arg);
                break;
            case '--devices':
            case '-n':
                args.devices = toInteger(readValue(argv, ++i, arg), arg);
                break;
            case '--seed':
            case '-s':
                args.seed = toInteger(readValue(argv, ++i, arg), arg);
                break;
            case '--duration':
            case '-d':
                args.durationS = toNumber(readValue(argv, ++i, arg), arg);
                break;
            case '--payload':
                args.payloadBytes = toInteger(readValue(argv, ++i, arg), arg);
                break;
            case '--interval':
                args.intervalS = toNumber(readValue(argv, ++i, arg), arg);
                break;
            case '--mobility':
                args.mobility = toNumber(readValue(argv, ++i, arg), arg);
                break;
            case '--sf':
                args.spreadingFactor = toInteger(readValue(argv, ++i, arg), arg);
                break;
            case '--transmissions':
                args.transmissions = toInteger(readValue(argv, ++i, arg), arg);
                break;
            case '--sharing': {
                const value = readValue(argv, ++i, arg);
                if (value !== 'per-device' && value !== 'shared') {
                    throw new ConfigError(`--sharing expects per-device or shared, got "${value}"`);
                }
                args.sharing = value;
                break;
            }
            case '--format': {
                const value = readValue(argv, ++i, arg);
                if (value !== 'text' && value !== 'json') {
                    throw new ConfigError(`--format expects text or json, got "${value}"`);
                }
                args.format = value;
                break;
            }
            default:
                throw new ConfigError(`Unknown option: ${arg}`);
        }
    }

    return args;
}

/**
 * Config overrides described by the parsed arguments, applied over `base`
 */
export function cliOverrides(args: CliArgs, base: ExperimentConfig): Partial<ExperimentConfig> {
    const overrides: Partial<ExperimentConfig> = {};
    if (args.algorithm !== undefined) overrides.algorithm = args.algorithm;
    if (args.devices !== undefined) overrides.devices = args.devices;
    if (args.seed !== undefined) overrides.seed = args.seed;
    if (args.durationS !== undefined) overrides.simulationTimeS = args.durationS;
    if (args.payloadBytes !== undefined) overrides.payloadBytes = args.payloadBytes;
    if (args.intervalS !== undefined) overrides.meanIntervalS = args.intervalS;
    if (args.mobility !== undefined) overrides.mobility = { ...base.mobility, fraction: args.mobility };
    if (args.spreadingFactor !== undefined) overrides.fixedSpreadingFactor = args.spreadingFactor;
    if (args.transmissions !== undefined) overrides.maxTransmissions = args.transmissions;
    if (args.sharing !== undefined) overrides.policySharing = args.sharing;
    return overrides;
}
