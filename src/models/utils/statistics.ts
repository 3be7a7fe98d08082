/**
 * @module utils/statistics
 * @description Statistical helpers used by arm statistics and run aggregates
 *
 * Averages over nothing are defined as 0 so that a report computed before
 * the first transmission never contains NaN.
 */

/**
 * Ratio that returns 0 when the denominator is 0
 *
 * @example
 * ```typescript
 * safeRatio(3, 4); // 0.75
 * safeRatio(0, 0); // 0
 * ```
 */
export function safeRatio(numerator: number, denominator: number): number {
    return denominator === 0 ? 0 : numerator / denominator;
}

/**
 * Mean of an array (0 for an empty array)
 */
export function mean(arr: readonly number[]): number {
    if (arr.length === 0) return 0;
    return arr.reduce((sum, val) => sum + val, 0) / arr.length;
}

/**
 * Sample variance (n - 1 denominator); 0 when fewer than two values
 */
export function sampleVariance(arr: readonly number[]): number {
    if (arr.length <= 1) return 0;
    const m = mean(arr);
    return arr.reduce((sum, val) => sum + (val - m) ** 2, 0) / (arr.length - 1);
}

/**
 * Incremental mean update: returns the mean after adding `value` as the n-th sample
 */
export function incrementalMean(previousMean: number, value: number, n: number): number {
    return previousMean + (value - previousMean) / n;
}

/**
 * Index of the maximum value; ties go to the lowest index. -1 for an empty array.
 */
export function argmax(values: readonly number[]): number {
    let best = -1;
    let bestValue = -Infinity;
    for (let i = 0; i < values.length; i++) {
        if (best === -1 || values[i] > bestValue) {
            best = i;
            bestValue = values[i];
        }
    }
    return best;
}
