/**
 * @module bandits/policies/greedy
 * @description Epsilon-greedy
 */

import { ConfigError } from '../../core/errors';
import type { SelectionContext } from '../types';
import { StatisticalPolicy, bestIndex } from './base';

export interface EpsilonGreedyOptions {
    /** Exploration probability */
    epsilon: number;
}

export const DEFAULT_EPSILON_GREEDY_OPTIONS: EpsilonGreedyOptions = { epsilon: 0.1 };

export class EpsilonGreedyPolicy extends StatisticalPolicy {
    readonly name = 'epsilon-greedy';
    readonly epsilon: number;

    constructor(size: number, options: Partial<EpsilonGreedyOptions> = {}) {
        super(size);
        this.epsilon = options.epsilon ?? DEFAULT_EPSILON_GREEDY_OPTIONS.epsilon;
        if (!(this.epsilon >= 0 && this.epsilon <= 1)) {
            throw new ConfigError('epsilon must be in [0, 1]', { epsilon: this.epsilon });
        }
    }

    protected exploit(ctx: SelectionContext): number {
        if (ctx.rng.random() < this.epsilon) {
            return ctx.rng.randint(0, this.size);
        }
        return bestIndex(this.size, arm => this.stats.get(arm).meanReward);
    }
}
