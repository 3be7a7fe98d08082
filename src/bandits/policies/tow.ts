/**
 * @module bandits/policies/tow
 * @description Tug-of-War dynamics
 *
 * X_k = Q_k - mean(Q_others) + A cos(2 pi (t + k) / D)
 *
 * Success pulls Q up by one, failure pushes it down by a penalty derived
 * from the two best success-rate estimates. Counts and successes are
 * forgotten with factor beta every decision.
 */

import { ConfigError } from '../../core/errors';
import type { ArmObservation, SelectionContext } from '../types';
import { StatisticalPolicy, bestIndex } from './base';

export interface TugOfWarOptions {
    /** Discount on Q per update (alpha) */
    alpha: number;
    /** Forgetting factor on counts (beta) */
    beta: number;
    /** Oscillation amplitude A */
    amplitude: number;
    /** Penalty used when fewer than two arms have data or the two best rates tie */
    fallbackPenalty: number;
}

export const DEFAULT_TOW_OPTIONS: TugOfWarOptions = {
    alpha: 0.9,
    beta: 0.9,
    amplitude: 0.5,
    fallbackPenalty: 0.1,
};

/**
 * Penalty from success-rate estimates: (p1 + p2) / 2 - (p1 - p2)
 */
export function towPenalty(rates: readonly number[], fallback: number = DEFAULT_TOW_OPTIONS.fallbackPenalty): number {
    if (rates.length < 2) return fallback;
    const sorted = [...rates].sort((a, b) => b - a);
    const [p1, p2] = sorted;
    if (p1 === p2) return fallback;
    return (p1 + p2) / 2 - (p1 - p2);
}

export class TugOfWarPolicy extends StatisticalPolicy {
    readonly name = 'tow';
    readonly options: TugOfWarOptions;
    private q: number[];
    private n: number[];
    private r: number[];

    constructor(size: number, options: Partial<TugOfWarOptions> = {}) {
        super(size);
        this.options = { ...DEFAULT_TOW_OPTIONS, ...options };
        const { alpha, beta, amplitude, fallbackPenalty } = this.options;
        if (!(alpha >= 0 && alpha <= 1) || !(beta >= 0 && beta <= 1)) {
            throw new ConfigError('ToW alpha and beta must be in [0, 1]', { alpha, beta });
        }
        if (!(amplitude >= 0) || !(fallbackPenalty >= 0)) {
            throw new ConfigError('ToW amplitude and fallback penalty must be non-negative', { amplitude, fallbackPenalty });
        }
        this.q = new Array<number>(size).fill(0);
        this.n = new Array<number>(size).fill(0);
        this.r = new Array<number>(size).fill(0);
    }

    /** Current Q values */
    values(): readonly number[] {
        return this.q;
    }

    /** Success-rate estimates of the arms that have data */
    successRates(): number[] {
        const rates: number[] = [];
        for (let i = 0; i < this.size; i++) {
            if (this.n[i] > 0) rates.push(this.r[i] / this.n[i]);
        }
        return rates;
    }

    score(arm: number): number {
        const D = this.size;
        const others = D > 1
            ? (this.q.reduce((acc, v) => acc + v, 0) - this.q[arm]) / (D - 1)
            : 0;
        const oscillation = this.options.amplitude * Math.cos(2 * Math.PI * (this.stats.t + arm) / D);
        return this.q[arm] - others + oscillation;
    }

    protected exploit(): number {
        return bestIndex(this.size, arm => this.score(arm));
    }

    updateIndex(arm: number, observation: ArmObservation, ctx: SelectionContext): void {
        const { alpha, beta, fallbackPenalty } = this.options;

        if (observation.success) {
            this.q[arm] = alpha * this.q[arm] + 1;
        } else {
            this.q[arm] = alpha * this.q[arm] - towPenalty(this.successRates(), fallbackPenalty);
        }

        for (let i = 0; i < this.size; i++) {
            const selected = i === arm;
            this.n[i] = beta * this.n[i] + (selected ? 1 : 0);
            this.r[i] = beta * this.r[i] + (selected && observation.success ? 1 : 0);
        }

        super.updateIndex(arm, observation, ctx);
    }

    reset(): void {
        super.reset();
        this.q.fill(0);
        this.n.fill(0);
        this.r.fill(0);
    }
}
