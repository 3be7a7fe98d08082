/**
 * @packageDocumentation
 * @module lora-arms/node
 *
 * Node.js entry point. Same modules as the default entry; the command-line
 * front end lives in `src/tasks/lora-selection/cli.ts` and ships as the
 * `lora-arms` binary.
 */

export * from './index';
