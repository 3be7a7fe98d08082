/**
 * @module utils/conversion
 * @description Unit conversion utility functions
 */

/**
 * Convert linear value to dB (decibels)
 *
 * @param linear - Linear value (must be > 0)
 *
 * @example
 * ```typescript
 * linearToDb(10);   // returns 10
 * linearToDb(100);  // returns 20
 * ```
 */
export function linearToDb(linear: number): number {
    if (linear <= 0) {
        throw new RangeError('Linear value must be positive');
    }
    return 10 * Math.log10(linear);
}

/**
 * Convert dB (decibels) to linear value
 *
 * @example
 * ```typescript
 * dbToLinear(10);   // returns 10
 * dbToLinear(-3);   // returns ~0.5
 * ```
 */
export function dbToLinear(db: number): number {
    return Math.pow(10, db / 10);
}

/**
 * Convert dBm to milliwatts
 *
 * @example
 * ```typescript
 * dbmToMilliwatts(14); // ~25.12 mW
 * ```
 */
export function dbmToMilliwatts(dbm: number): number {
    return Math.pow(10, dbm / 10);
}

/**
 * Convert milliwatts to dBm
 */
export function milliwattsToDbm(mw: number): number {
    return linearToDb(mw);
}

/** Millijoules in one milliwatt-hour */
export const MJ_PER_MWH = 3600;

/**
 * Convert milliwatt-hours to millijoules
 */
export function mwhToMj(mwh: number): number {
    return mwh * MJ_PER_MWH;
}
