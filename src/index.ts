/**
 * @module src
 * @description Source entry point
 *
 * - core/: errors, logging, reproducibility, scheduling
 * - models/: link-level models
 * - bandits/: selection policies
 * - tasks/: experiment layer
 */

export * as core from './core';
export * as models from './models';
export * as bandits from './bandits';
export * as tasks from './tasks';
