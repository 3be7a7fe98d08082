/**
 * @module phy/lora/tables
 * @description Receiver sensitivity and demodulation SINR thresholds
 *
 * Sensitivity in dBm, indexed by spreading factor then bandwidth (Hz);
 * SINR requirement in dB by spreading factor. Both tighten as SF grows.
 */

import { ValidationError } from '../../../core/errors';

export const SENSITIVITY_TABLE_DBM: Readonly<Record<number, Readonly<Record<number, number>>>> = {
    7: { 125000: -123, 250000: -120, 500000: -116 },
    8: { 125000: -126, 250000: -123, 500000: -119 },
    9: { 125000: -129, 250000: -125, 500000: -122 },
    10: { 125000: -132, 250000: -128, 500000: -125 },
    11: { 125000: -133, 250000: -130, 500000: -128 },
    12: { 125000: -136, 250000: -133, 500000: -130 },
};

export const SINR_REQUIREMENT_DB: Readonly<Record<number, number>> = {
    7: -7.5,
    8: -10.0,
    9: -12.5,
    10: -15.0,
    11: -17.5,
    12: -20.0,
};

/** Spreading factors present in both tables */
export const SUPPORTED_SPREADING_FACTORS: readonly number[] = [7, 8, 9, 10, 11, 12];

/** Bandwidths present in the sensitivity table */
export const SUPPORTED_BANDWIDTHS_HZ: readonly number[] = [125000, 250000, 500000];

export function hasSensitivity(spreadingFactor: number, bandwidthHz: number): boolean {
    const row = SENSITIVITY_TABLE_DBM[spreadingFactor];
    return row !== undefined && row[bandwidthHz] !== undefined;
}

/**
 * Receiver sensitivity for (SF, BW)
 */
export function receiverSensitivityDbm(spreadingFactor: number, bandwidthHz: number): number {
    const row = SENSITIVITY_TABLE_DBM[spreadingFactor];
    const value = row === undefined ? undefined : row[bandwidthHz];
    if (value === undefined) {
        throw new ValidationError(`No sensitivity entry for SF${spreadingFactor}/${bandwidthHz} Hz`, {
            spreadingFactor,
            bandwidthHz,
        });
    }
    return value;
}

/**
 * Minimum SINR needed to demodulate at `spreadingFactor`
 */
export function sinrRequirementDb(spreadingFactor: number): number {
    const value = SINR_REQUIREMENT_DB[spreadingFactor];
    if (value === undefined) {
        throw new ValidationError(`No SINR requirement for SF${spreadingFactor}`, { spreadingFactor });
    }
    return value;
}
