/**
 * @module phy
 * @description Physical layer models
 */

export * as lora from './lora';
