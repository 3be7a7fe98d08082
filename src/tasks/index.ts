/**
 * @module tasks
 * @description Experiment layer on top of the link model and the policies
 */

export * as loraSelection from './lora-selection';
