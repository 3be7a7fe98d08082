/**
 * @module bandits/policies/base
 * @description Shared forced-exploration behaviour
 */

import { ArmStatsStore, type ArmStatsOptions } from '../arm-stats';
import type { ArmObservation, IndexPolicy, SelectionContext } from '../types';

/**
 * Index policy backed by an `ArmStatsStore`.
 *
 * Every never-selected arm is returned, in listed order, before the
 * subclass scoring rule is consulted.
 */
export abstract class StatisticalPolicy implements IndexPolicy {
    abstract readonly name: string;
    readonly stats: ArmStatsStore;

    constructor(size: number, statsOptions: ArmStatsOptions = {}) {
        this.stats = new ArmStatsStore(size, statsOptions);
    }

    get size(): number {
        return this.stats.size;
    }

    selectIndex(ctx: SelectionContext): number {
        return this.stats.firstUntried() ?? this.exploit(ctx);
    }

    updateIndex(arm: number, observation: ArmObservation, _ctx: SelectionContext): void {
        this.stats.record(arm, observation.reward, observation.quality);
    }

    reset(): void {
        this.stats.reset();
    }

    /** Choose among arms that have all been tried at least once */
    protected abstract exploit(ctx: SelectionContext): number;
}

/**
 * Index of the highest score; the first-listed arm wins ties
 */
export function bestIndex(size: number, score: (arm: number) => number): number {
    let best = 0;
    let bestScore = score(0);
    for (let arm = 1; arm < size; arm++) {
        const s = score(arm);
        if (s > bestScore) {
            best = arm;
            bestScore = s;
        }
    }
    return best;
}
