/**
 * @module phy/lora/types
 * @description Shared LoRa parameter types
 */

/**
 * One full transmission parameter choice
 */
export interface TxParams {
    /** Spreading factor (7..12) */
    spreadingFactor: number;
    /** Bandwidth in Hz */
    bandwidthHz: number;
    /** Carrier frequency in Hz */
    frequencyHz: number;
    /** Transmit power in dBm */
    txPowerDbm: number;
}

/**
 * Names of the four selectable dimensions
 */
export type Dimension = keyof TxParams;

/** Canonical dimension order (outermost first in joint arm indexing) */
export const DIMENSIONS: readonly Dimension[] = [
    'spreadingFactor',
    'bandwidthHz',
    'frequencyHz',
    'txPowerDbm',
];

/**
 * 2-D position in metres
 */
export interface Position {
    x: number;
    y: number;
}

/**
 * Compact label, e.g. "SF7/125k/868.1MHz/14dBm"
 */
export function formatTxParams(params: TxParams): string {
    const bw = `${params.bandwidthHz / 1e3}k`;
    const cf = `${(params.frequencyHz / 1e6).toFixed(1)}MHz`;
    return `SF${params.spreadingFactor}/${bw}/${cf}/${params.txPowerDbm}dBm`;
}
