/**
 * @module channel/path-loss
 * @description Log-distance path loss, noise floor and received-signal metrics
 *
 * Defaults follow a sub-GHz urban LoRa calibration:
 * L0 = 128.95 dB at D0 = 1 km, exponent 2.32, shadowing sigma 7.8 dB.
 */

import type { Position } from '../phy/lora/types';
import { dbToLinear } from '../utils/conversion';

// ==================== Constants ====================

/** Thermal noise power spectral density in dBm/Hz */
export const THERMAL_NOISE_DENSITY_DBM_HZ = -174;

/** Receiver noise figure in dB */
export const DEFAULT_NOISE_FIGURE_DB = 6;

/** Distances below this value are clamped (metres) */
export const MIN_DISTANCE_M = 1;

/**
 * Log-distance model parameters
 */
export interface LogDistanceParams {
    /** Path loss at the reference distance (dB) */
    referenceLossDb: number;
    /** Reference distance (m) */
    referenceDistanceM: number;
    /** Path loss exponent */
    exponent: number;
    /** Shadowing standard deviation (dB) */
    shadowingSigmaDb: number;
}

export const DEFAULT_LOG_DISTANCE: LogDistanceParams = {
    referenceLossDb: 128.95,
    referenceDistanceM: 1000,
    exponent: 2.32,
    shadowingSigmaDb: 7.8,
};

// ==================== Functions ====================

/**
 * Euclidean distance, floored at 1 m
 */
export function distance(p1: Position, p2: Position): number {
    const d = Math.hypot(p1.x - p2.x, p1.y - p2.y);
    return Math.max(d, MIN_DISTANCE_M);
}

/**
 * Log-distance path loss in dB
 *
 * @param distanceM - Link distance (clamped to 1 m)
 * @param exponent - Path loss exponent
 * @param shadowingDb - Shadowing sample already drawn by the caller
 */
export function pathLossDb(
    distanceM: number,
    exponent: number = DEFAULT_LOG_DISTANCE.exponent,
    shadowingDb: number = 0,
    params: Pick<LogDistanceParams, 'referenceLossDb' | 'referenceDistanceM'> = DEFAULT_LOG_DISTANCE
): number {
    const d = Math.max(distanceM, MIN_DISTANCE_M);
    return params.referenceLossDb
        + 10 * exponent * Math.log10(d / params.referenceDistanceM)
        + shadowingDb;
}

/**
 * RSSI = TP - PL
 */
export function rssiDbm(txPowerDbm: number, pathLoss: number): number {
    return txPowerDbm - pathLoss;
}

/**
 * Receiver noise floor: -174 + 10 log10(BW) + NF
 */
export function noiseFloorDbm(bandwidthHz: number, noiseFigureDb: number = DEFAULT_NOISE_FIGURE_DB): number {
    if (bandwidthHz <= 0) {
        throw new RangeError('Bandwidth must be positive');
    }
    return THERMAL_NOISE_DENSITY_DBM_HZ + 10 * Math.log10(bandwidthHz) + noiseFigureDb;
}

/**
 * SNR = RSSI - noise floor
 */
export function snrDb(rssi: number, bandwidthHz: number, noiseFigureDb: number = DEFAULT_NOISE_FIGURE_DB): number {
    return rssi - noiseFloorDbm(bandwidthHz, noiseFigureDb);
}

/**
 * Effective signal power: ESP = RSSI + SNR - 10 log10(1 + 10^(SNR/10))
 */
export function effectiveSignalPowerDbm(rssi: number, snr: number): number {
    return rssi + snr - 10 * Math.log10(1 + dbToLinear(snr));
}
