#!/usr/bin/env node
/**
 * @module tasks/lora-selection/cli
 * @description Command-line front end for parameter-selection experiments
 *
 * Usage:
 *   npx tsx src/tasks/lora-selection/cli.ts --algorithm ucb1 --devices 20
 *   npx tsx src/tasks/lora-selection/cli.ts --preset d-lora --seed 7 --format json
 */

import { ConsoleLogger } from '../../core/logging';
import { UnknownPolicyError } from '../../core/errors';
import { POLICY_NAMES, isPolicyName } from '../../bandits/registry';
import { cliOverrides, parseCliArgs, type CliArgs } from './args';
import { DEFAULT_EXPERIMENT_CONFIG, PRESETS, createExperimentConfig, presetConfig } from './config';
import { runExperiment, type RunReport } from './driver';

function printHelp(): void {
    console.log(`
lora-arms - LoRa transmission parameter selection experiments

Usage:
  lora-arms [options]

Options:
  -h, --help              Show this help message
  -a, --algorithm NAME    Policy (${POLICY_NAMES.join(', ')})
  -p, --preset NAME       Scenario preset (${Object.keys(PRESETS).join(', ')})
  -n, --devices N         Number of devices
  -s, --seed N            Random seed
  -d, --duration S        Simulated time in seconds
      --payload BYTES     Payload size
      --interval S        Mean transmission interval
      --mobility F        Share of mobile devices (0..1)
      --sf SF             Pin the spreading factor
      --transmissions N   Per-device transmission budget
      --sharing MODE      per-device or shared policy
      --format FMT        text or json
  -v, --verbose           Log every transmission
`);
}

function printText(report: RunReport): void {
    const { summary } = report;
    console.log('');
    console.log(`Experiment:     ${report.manifest.experiment} (${report.policy})`);
    console.log(`Config hash:    ${report.manifest.configHash}`);
    console.log(`Packets:        ${summary.packetsReceived}/${summary.packetsSent} delivered`);
    console.log(`PDR:            ${(summary.pdr * 100).toFixed(2)}%`);
    console.log(`Collisions:     ${summary.collisions}`);
    console.log(`Energy:         ${summary.energyMj.toFixed(2)} mJ`);
    console.log(`Efficiency:     ${summary.energyEfficiencyBitsPerJ.toFixed(1)} bits/J`);
    console.log(`Avg ToA:        ${(summary.avgTimeOnAirS * 1000).toFixed(2)} ms`);
    console.log(`Avg RSSI/SNR:   ${summary.avgRssiDbm.toFixed(1)} dBm / ${summary.avgSnrDb.toFixed(1)} dB`);
    console.log('');
    console.log('Arm selections:');
    for (const arm of report.armSelections) {
        console.log(`  ${arm.arm.padEnd(28)} ${String(arm.count).padStart(6)}  ${(arm.ratio * 100).toFixed(1)}%`);
    }
    console.log('');
}

function run(args: CliArgs): void {
    if (args.algorithm !== undefined && !isPolicyName(args.algorithm)) {
        throw new UnknownPolicyError(args.algorithm, POLICY_NAMES);
    }
    const base = args.preset !== undefined ? presetConfig(args.preset) : DEFAULT_EXPERIMENT_CONFIG;
    const config = createExperimentConfig(cliOverrides(args, base), base);
    const logger = new ConsoleLogger({
        task: config.experiment,
        seed: config.seed,
        level: args.verbose ? 'debug' : args.format === 'json' ? 'error' : 'warn',
    });

    const report = runExperiment(config, { logger });
    logger.close();

    if (args.format === 'json') {
        console.log(JSON.stringify(report, null, 2));
    } else {
        printText(report);
    }
}

function main(argv: readonly string[]): number {
    try {
        const args = parseCliArgs(argv);
        if (args.help) {
            printHelp();
            return 0;
        }
        run(args);
        return 0;
    } catch (error) {
        console.error(`[FAILED] ${error instanceof Error ? error.message : String(error)}`);
        return 1;
    }
}

process.exitCode = main(process.argv.slice(2));
