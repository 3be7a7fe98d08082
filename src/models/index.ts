/**
 * @module src/models
 * @description Link-level models
 *
 * - channel/: path loss, noise floor, propagation samples
 * - phy/lora/: airtime, energy, sensitivity tables, collisions, link outcome
 * - utils/: conversions and statistics
 */

export * as channel from './channel';
export * as phy from './phy';
export * as utils from './utils';
