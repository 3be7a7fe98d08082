/**
 * @module bandits/arm-stats
 * @description Per-arm running statistics shared by the bandit policies
 *
 * Arms are identified by their position in an ordered set. The store keeps
 * plain sums and means, the full per-arm reward history (for variance-based
 * scores), and exponentially discounted sums over the global selection
 * history for non-stationary policies.
 *
 * Discounted sums are updated incrementally: before an observation is added,
 * every arm's discounted sums are multiplied by their factor, so an
 * observation made `k` selections ago carries weight `lambda^k`.
 * `recomputeDiscounted` rebuilds the same values from the history.
 */

import { ConfigError } from '../core/errors';
import { safeRatio, sampleVariance } from '../models/utils/statistics';

// ==================== Types ====================

export interface ArmStatistics {
    selectionCount: number;
    rewardSum: number;
    meanReward: number;
    rewardHistory: number[];
    qualitySum: number;
    meanQuality: number;
    /** Count discounted with the reward factor */
    discountedCount: number;
    discountedRewardSum: number;
    /** Count discounted with the quality factor */
    discountedQualityCount: number;
    discountedQualitySum: number;
}

export interface DiscountedStatistics {
    discountedCount: number;
    discountedRewardSum: number;
    discountedQualityCount: number;
    discountedQualitySum: number;
}

export interface ArmStatsOptions {
    /** Discount applied to counts and rewards per selection (lambda), in (0, 1] */
    rewardDiscount?: number;
    /** Discount applied to quality per selection, in (0, 1] */
    qualityDiscount?: number;
}

interface SelectionRecord {
    arm: number;
    reward: number;
    quality: number;
}

function emptyStatistics(): ArmStatistics {
    return {
        selectionCount: 0,
        rewardSum: 0,
        meanReward: 0,
        rewardHistory: [],
        qualitySum: 0,
        meanQuality: 0,
        discountedCount: 0,
        discountedRewardSum: 0,
        discountedQualityCount: 0,
        discountedQualitySum: 0,
    };
}

function requireDiscount(value: number, label: string): void {
    if (!(value > 0 && value <= 1)) {
        throw new ConfigError(`${label} must be in (0, 1]`, { [label]: value });
    }
}

// ==================== Store ====================

export class ArmStatsStore {
    readonly size: number;
    readonly rewardDiscount: number;
    readonly qualityDiscount: number;
    private arms: ArmStatistics[];
    private history: SelectionRecord[] = [];

    constructor(size: number, options: ArmStatsOptions = {}) {
        if (!Number.isInteger(size) || size < 1) {
            throw new ConfigError('Arm set must contain at least one arm', { size });
        }
        this.size = size;
        this.rewardDiscount = options.rewardDiscount ?? 1;
        this.qualityDiscount = options.qualityDiscount ?? 1;
        requireDiscount(this.rewardDiscount, 'rewardDiscount');
        requireDiscount(this.qualityDiscount, 'qualityDiscount');
        this.arms = Array.from({ length: size }, emptyStatistics);
    }

    /** Decision index: number of completed updates */
    get t(): number {
        return this.history.length;
    }

    get(arm: number): Readonly<ArmStatistics> {
        return this.arms[this.checkArm(arm)];
    }

    all(): readonly Readonly<ArmStatistics>[] {
        return this.arms;
    }

    /** Arm indices in selection order */
    selectionHistory(): number[] {
        return this.history.map(r => r.arm);
    }

    /**
     * Record one observation for `arm`
     */
    record(arm: number, reward: number, quality: number = 0): void {
        const stats = this.arms[this.checkArm(arm)];
        if (!Number.isFinite(reward) || !Number.isFinite(quality)) {
            throw new RangeError(`Non-finite observation for arm ${arm}`);
        }

        if (this.rewardDiscount !== 1 || this.qualityDiscount !== 1) {
            for (const s of this.arms) {
                s.discountedCount *= this.rewardDiscount;
                s.discountedRewardSum *= this.rewardDiscount;
                s.discountedQualityCount *= this.qualityDiscount;
                s.discountedQualitySum *= this.qualityDiscount;
            }
        }

        stats.selectionCount++;
        stats.rewardSum += reward;
        stats.meanReward = stats.rewardSum / stats.selectionCount;
        stats.rewardHistory.push(reward);
        stats.qualitySum += quality;
        stats.meanQuality = stats.qualitySum / stats.selectionCount;

        stats.discountedCount += 1;
        stats.discountedRewardSum += reward;
        stats.discountedQualityCount += 1;
        stats.discountedQualitySum += quality;

        this.history.push({ arm, reward, quality });
    }

    /** First never-selected arm in listed order, if any */
    firstUntried(): number | undefined {
        const index = this.arms.findIndex(s => s.selectionCount === 0);
        return index < 0 ? undefined : index;
    }

    /** Sample variance (n - 1) of the arm's reward history; 0 for n <= 1 */
    variance(arm: number): number {
        return sampleVariance(this.get(arm).rewardHistory);
    }

    maxMeanQuality(): number {
        return this.arms.reduce((max, s) => Math.max(max, s.meanQuality), 0);
    }

    /** Discounted reward mean (0 when the arm has no discounted weight) */
    discountedMeanReward(arm: number): number {
        const s = this.get(arm);
        return safeRatio(s.discountedRewardSum, s.discountedCount);
    }

    /** Discounted quality mean (0 when the arm has no discounted weight) */
    discountedMeanQuality(arm: number): number {
        const s = this.get(arm);
        return safeRatio(s.discountedQualitySum, s.discountedQualityCount);
    }

    /** Total discounted selection weight W */
    discountedTotal(): number {
        return this.arms.reduce((sum, s) => sum + s.discountedCount, 0);
    }

    maxDiscountedMeanQuality(): number {
        let max = 0;
        for (let i = 0; i < this.size; i++) {
            max = Math.max(max, this.discountedMeanQuality(i));
        }
        return max;
    }

    /**
     * Rebuild discounted sums from the full selection history:
     * the j-th of h selections carries weight lambda^(h - 1 - j).
     */
    recomputeDiscounted(): DiscountedStatistics[] {
        const result: DiscountedStatistics[] = Array.from({ length: this.size }, () => ({
            discountedCount: 0,
            discountedRewardSum: 0,
            discountedQualityCount: 0,
            discountedQualitySum: 0,
        }));
        const h = this.history.length;
        this.history.forEach((record, j) => {
            const age = h - 1 - j;
            const wr = Math.pow(this.rewardDiscount, age);
            const wq = Math.pow(this.qualityDiscount, age);
            const target = result[record.arm];
            target.discountedCount += wr;
            target.discountedRewardSum += wr * record.reward;
            target.discountedQualityCount += wq;
            target.discountedQualitySum += wq * record.quality;
        });
        return result;
    }

    reset(): void {
        this.arms = Array.from({ length: this.size }, emptyStatistics);
        this.history = [];
    }

    private checkArm(arm: number): number {
        if (!Number.isInteger(arm) || arm < 0 || arm >= this.size) {
            throw new RangeError(`Arm index out of range: ${arm} (size ${this.size})`);
        }
        return arm;
    }
}
