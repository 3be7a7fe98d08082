/**
 * @module bandits/policies/qoca
 * @description Quality-of-channel aware UCB (QoC-A) and its discounted variant (DQoC-A)
 *
 * B_i = R_i + beta (G_i / G_max - 1) ln(T) / N_i + alpha sqrt(ln(T) / N_i)
 *
 * QoC-A uses plain counts with T the number of decisions; DQoC-A uses
 * counts and means discounted over the selection history with T the total
 * discounted weight.
 */

import { ConfigError } from '../../core/errors';
import { StatisticalPolicy, bestIndex } from './base';

export interface QualityScoreInput {
    meanReward: number;
    meanQuality: number;
    maxQuality: number;
    count: number;
    total: number;
    alpha: number;
    beta: number;
}

export function qualityAwareScore(input: QualityScoreInput): number {
    const { meanReward, meanQuality, maxQuality, count, total, alpha, beta } = input;
    if (count === 0) return Infinity;
    const logTotal = Math.log(total);
    const qualityBonus = maxQuality > 0
        ? beta * (meanQuality / maxQuality - 1) * logTotal / count
        : 0;
    return meanReward + qualityBonus + alpha * Math.sqrt(logTotal / count);
}

export interface QocaOptions {
    /** Exploration weight alpha */
    alpha: number;
    /** Quality weight beta */
    beta: number;
}

export interface DqocaOptions extends QocaOptions {
    /** Discount on counts and rewards (lambda) */
    lambda: number;
    /** Discount on quality (lambda_G) */
    lambdaQuality: number;
}

export const DEFAULT_QOCA_OPTIONS: QocaOptions = { alpha: 1.9, beta: 0.9 };

export const DEFAULT_DQOCA_OPTIONS: DqocaOptions = {
    alpha: 0.6,
    beta: 0.2,
    lambda: 0.98,
    lambdaQuality: 0.90,
};

function checkWeights(options: QocaOptions): void {
    if (!(options.alpha >= 0) || !(options.beta >= 0)) {
        throw new ConfigError('alpha and beta must be non-negative', { ...options });
    }
}

export class QocaPolicy extends StatisticalPolicy {
    readonly name = 'qoca';
    readonly options: QocaOptions;

    constructor(size: number, options: Partial<QocaOptions> = {}) {
        super(size);
        this.options = { ...DEFAULT_QOCA_OPTIONS, ...options };
        checkWeights(this.options);
    }

    score(arm: number): number {
        const s = this.stats.get(arm);
        return qualityAwareScore({
            meanReward: s.meanReward,
            meanQuality: s.meanQuality,
            maxQuality: this.stats.maxMeanQuality(),
            count: s.selectionCount,
            total: this.stats.t,
            ...this.options,
        });
    }

    protected exploit(): number {
        return bestIndex(this.size, arm => this.score(arm));
    }
}

export class DqocaPolicy extends StatisticalPolicy {
    readonly name = 'dqoca';
    readonly options: DqocaOptions;

    constructor(size: number, options: Partial<DqocaOptions> = {}) {
        const resolved = { ...DEFAULT_DQOCA_OPTIONS, ...options };
        super(size, { rewardDiscount: resolved.lambda, qualityDiscount: resolved.lambdaQuality });
        checkWeights(resolved);
        this.options = resolved;
    }

    score(arm: number): number {
        return qualityAwareScore({
            meanReward: this.stats.discountedMeanReward(arm),
            meanQuality: this.stats.discountedMeanQuality(arm),
            maxQuality: this.stats.maxDiscountedMeanQuality(),
            count: this.stats.get(arm).discountedCount,
            total: this.stats.discountedTotal(),
            alpha: this.options.alpha,
            beta: this.options.beta,
        });
    }

    protected exploit(): number {
        return bestIndex(this.size, arm => this.score(arm));
    }
}
