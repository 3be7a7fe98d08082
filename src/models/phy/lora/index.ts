/**
 * @module phy/lora
 * @description LoRa link metric model
 */

export * from './types';
export * from './tables';
export * from './airtime';
export * from './energy';
export * from './collision';
export * from './link';
