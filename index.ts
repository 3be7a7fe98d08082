/**
 * @packageDocumentation
 * @module lora-arms
 *
 * Bandit-driven selection of LoRa transmission parameters (spreading factor,
 * bandwidth, carrier frequency, transmit power) with a link outcome model to
 * score each choice.
 *
 * ## Modules
 * - `core` - errors, structured logging, seeded randomness, event scheduler
 * - `models` - path loss, propagation, airtime, energy, sensitivity tables, collisions
 * - `bandits` - arm statistics, UCB1 / UCB1-Tuned / QoC-A / DQoC-A / ToW / ε-greedy,
 *   ADR-style ladders, baselines and the D-LoRa variants
 * - `tasks` - device agents, run aggregation and the experiment driver
 *
 * ## Usage Example
 * ```typescript
 * import { tasks } from 'lora-arms';
 *
 * const config = tasks.loraSelection.presetConfig('d-lora', { devices: 20, seed: 7 });
 * const report = tasks.loraSelection.runExperiment(config);
 * console.log(report.summary.pdr);
 * ```
 *
 * @license MIT
 */

export * as core from './src/core';
export * as models from './src/models';
export * as bandits from './src/bandits';
export * as tasks from './src/tasks';

// ==================== Version ====================
export const VERSION = '1.0.0';
