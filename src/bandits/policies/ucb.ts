/**
 * @module bandits/policies/ucb
 * @description UCB1 and UCB1-Tuned
 */

import { ConfigError } from '../../core/errors';
import { StatisticalPolicy, bestIndex } from './base';

// ==================== Scores ====================

/**
 * UCB1: mean + c * sqrt(ln(t + 1) / (2n)); untried arms score +Infinity
 */
export function ucb1Score(meanReward: number, n: number, t: number, c: number): number {
    if (n === 0) return Infinity;
    return meanReward + c * Math.sqrt(Math.log(t + 1) / (2 * n));
}

/**
 * UCB1-Tuned: mean + sqrt((ln t / n) * min(1/4, var + sqrt(2 ln t / n)))
 */
export function ucb1TunedScore(meanReward: number, variance: number, n: number, t: number): number {
    if (n === 0) return Infinity;
    const logT = Math.log(t);
    const bound = Math.min(0.25, variance + Math.sqrt((2 * logT) / n));
    return meanReward + Math.sqrt((logT / n) * bound);
}

// ==================== Policies ====================

export interface Ucb1Options {
    /** Exploration weight c */
    exploration: number;
}

export const DEFAULT_UCB1_OPTIONS: Ucb1Options = { exploration: 1.0 };

export class Ucb1Policy extends StatisticalPolicy {
    readonly name = 'ucb1';
    readonly exploration: number;

    constructor(size: number, options: Partial<Ucb1Options> = {}) {
        super(size);
        this.exploration = options.exploration ?? DEFAULT_UCB1_OPTIONS.exploration;
        if (!(this.exploration >= 0)) {
            throw new ConfigError('UCB1 exploration weight must be non-negative', { exploration: this.exploration });
        }
    }

    score(arm: number): number {
        const s = this.stats.get(arm);
        return ucb1Score(s.meanReward, s.selectionCount, this.stats.t, this.exploration);
    }

    protected exploit(): number {
        return bestIndex(this.size, arm => this.score(arm));
    }
}

export class Ucb1TunedPolicy extends StatisticalPolicy {
    readonly name = 'ucb1-tuned';

    score(arm: number): number {
        const s = this.stats.get(arm);
        return ucb1TunedScore(s.meanReward, this.stats.variance(arm), s.selectionCount, this.stats.t);
    }

    protected exploit(): number {
        return bestIndex(this.size, arm => this.score(arm));
    }
}
