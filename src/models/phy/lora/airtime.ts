/**
 * @module phy/lora/airtime
 * @description LoRa time-on-air
 *
 * T_sym = 2^SF / BW
 * T_pre = (n_pre + 4.25) T_sym
 * n_pay = 8 + max(ceil((8 PL - 4 SF + 28 + 16 CRC - 20 IH) / (4 (SF - 2 DE))) (CR + 4), 0)
 */

import { ValidationError } from '../../../core/errors';

export interface AirtimeOptions {
    /** Programmed preamble length in symbols */
    preambleSymbols: number;
    /** Payload CRC present */
    crcEnabled: boolean;
    /** Implicit header mode (no PHY header) */
    implicitHeader: boolean;
    /** Low data rate optimisation */
    lowDataRateOptimize: boolean;
    /** Coding rate offset: 1 for 4/5 ... 4 for 4/8 */
    codingRate: number;
}

export const DEFAULT_AIRTIME_OPTIONS: AirtimeOptions = {
    preambleSymbols: 8,
    crcEnabled: true,
    implicitHeader: false,
    lowDataRateOptimize: false,
    codingRate: 1,
};

export function symbolDuration(spreadingFactor: number, bandwidthHz: number): number {
    return Math.pow(2, spreadingFactor) / bandwidthHz;
}

/**
 * Number of payload symbols (including the 8 fixed header symbols)
 */
export function payloadSymbols(
    spreadingFactor: number,
    payloadBytes: number,
    options: AirtimeOptions = DEFAULT_AIRTIME_OPTIONS
): number {
    const crc = options.crcEnabled ? 1 : 0;
    const ih = options.implicitHeader ? 1 : 0;
    const de = options.lowDataRateOptimize ? 1 : 0;
    const numerator = 8 * payloadBytes - 4 * spreadingFactor + 28 + 16 * crc - 20 * ih;
    const denominator = 4 * (spreadingFactor - 2 * de);
    return 8 + Math.max(Math.ceil(numerator / denominator) * (options.codingRate + 4), 0);
}

/**
 * Time-on-air in seconds
 *
 * @example
 * ```typescript
 * timeOnAir(7, 125000, 20); // 0.056576
 * ```
 */
export function timeOnAir(
    spreadingFactor: number,
    bandwidthHz: number,
    payloadBytes: number,
    options: Partial<AirtimeOptions> = {}
): number {
    const opts = { ...DEFAULT_AIRTIME_OPTIONS, ...options };
    if (!Number.isInteger(spreadingFactor) || spreadingFactor < 6 || spreadingFactor > 12) {
        throw new ValidationError(`Spreading factor out of range: ${spreadingFactor}`);
    }
    if (!(bandwidthHz > 0)) {
        throw new ValidationError(`Bandwidth must be positive: ${bandwidthHz}`);
    }
    if (!Number.isInteger(payloadBytes) || payloadBytes < 0) {
        throw new ValidationError(`Payload must be a non-negative integer: ${payloadBytes}`);
    }
    if (!Number.isInteger(opts.codingRate) || opts.codingRate < 1 || opts.codingRate > 4) {
        throw new ValidationError(`Coding rate offset must be 1..4: ${opts.codingRate}`);
    }

    const tSym = symbolDuration(spreadingFactor, bandwidthHz);
    const preamble = (opts.preambleSymbols + 4.25) * tSym;
    return preamble + payloadSymbols(spreadingFactor, payloadBytes, opts) * tSym;
}

/**
 * Semtech recommends low data rate optimisation once a symbol exceeds 16 ms
 */
export function requiresLowDataRateOptimize(spreadingFactor: number, bandwidthHz: number): boolean {
    return symbolDuration(spreadingFactor, bandwidthHz) > 0.016;
}
