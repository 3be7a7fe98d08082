/**
 * Arm Statistics Tests
 * Arm spaces and the per-arm statistics store
 */

import { describe, it, expect } from 'vitest';
import { ArmSpace } from '../src/bandits/arm-space';
import { ArmStatsStore } from '../src/bandits/arm-stats';
import { ConfigError } from '../src/core/errors';

// ==================== Arm Space ====================

describe('ArmSpace', () => {
    const space = new ArmSpace({
        spreadingFactors: [7, 8],
        bandwidthsHz: [125000],
        frequenciesHz: [868100000, 868300000],
        txPowersDbm: [2, 14],
    });

    it('should enumerate SF outermost and power innermost', () => {
        expect(space.size).toBe(8);
        expect(space.at(0)).toEqual({ spreadingFactor: 7, bandwidthHz: 125000, frequencyHz: 868100000, txPowerDbm: 2 });
        expect(space.at(1)).toEqual({ spreadingFactor: 7, bandwidthHz: 125000, frequencyHz: 868100000, txPowerDbm: 14 });
        expect(space.at(5)).toEqual({ spreadingFactor: 8, bandwidthHz: 125000, frequencyHz: 868100000, txPowerDbm: 14 });
    });

    it('should map tuples back to their joint index', () => {
        space.all().forEach((arm, i) => expect(space.indexOf(arm)).toBe(i));
        expect(space.indexOf({ spreadingFactor: 9, bandwidthHz: 125000, frequencyHz: 868100000, txPowerDbm: 2 })).toBe(-1);
    });

    it('should reject empty and duplicate sets', () => {
        expect(() => new ArmSpace({ spreadingFactors: [], bandwidthsHz: [125000], frequenciesHz: [868100000], txPowersDbm: [14] }))
            .toThrow(ConfigError);
        expect(() => new ArmSpace({ spreadingFactors: [7, 7], bandwidthsHz: [125000], frequenciesHz: [868100000], txPowersDbm: [14] }))
            .toThrow(ConfigError);
    });

    it('should pin one dimension', () => {
        const pinned = space.pin('spreadingFactor', 9);
        expect(pinned.values('spreadingFactor')).toEqual([9]);
        expect(pinned.size).toBe(4);
        expect(space.values('spreadingFactor')).toEqual([7, 8]);
    });

    it('should reject indices outside the space', () => {
        expect(() => space.at(8)).toThrow(RangeError);
        expect(() => space.at(-1)).toThrow(RangeError);
    });
});

// ==================== Statistics Store ====================

describe('ArmStatsStore', () => {
    it('should start with every arm untried', () => {
        const store = new ArmStatsStore(3);
        expect(store.t).toBe(0);
        expect(store.firstUntried()).toBe(0);
        for (const s of store.all()) {
            expect(s.selectionCount).toBe(0);
            expect(s.meanReward).toBe(0);
            expect(s.rewardHistory).toEqual([]);
        }
    });

    it('should keep counts, sums and means', () => {
        const store = new ArmStatsStore(2);
        store.record(0, 1, 4);
        store.record(0, 0, 2);
        store.record(1, 1, 6);

        expect(store.t).toBe(3);
        const s0 = store.get(0);
        expect(s0.selectionCount).toBe(2);
        expect(s0.rewardSum).toBe(1);
        expect(s0.meanReward).toBe(0.5);
        expect(s0.meanQuality).toBe(3);
        expect(store.maxMeanQuality()).toBe(6);
        expect(store.selectionHistory()).toEqual([0, 0, 1]);
        expect(store.firstUntried()).toBeUndefined();
    });

    it('should report the first untried arm in listed order', () => {
        const store = new ArmStatsStore(4);
        store.record(0, 1);
        store.record(2, 1);
        expect(store.firstUntried()).toBe(1);
    });

    it('should compute the sample variance of the reward history', () => {
        const store = new ArmStatsStore(1);
        store.record(0, 1);
        expect(store.variance(0)).toBe(0);
        store.record(0, 0);
        store.record(0, 1);
        expect(store.variance(0)).toBeCloseTo(1 / 3, 12);
    });

    it('should match the history-based discounted sums', () => {
        const store = new ArmStatsStore(2, { rewardDiscount: 0.9, qualityDiscount: 0.8 });
        store.record(0, 1, 2);
        store.record(1, 0, 1);
        store.record(0, 1, 4);

        const rebuilt = store.recomputeDiscounted();
        for (let arm = 0; arm < 2; arm++) {
            const s = store.get(arm);
            expect(s.discountedCount).toBeCloseTo(rebuilt[arm].discountedCount, 12);
            expect(s.discountedRewardSum).toBeCloseTo(rebuilt[arm].discountedRewardSum, 12);
            expect(s.discountedQualityCount).toBeCloseTo(rebuilt[arm].discountedQualityCount, 12);
            expect(s.discountedQualitySum).toBeCloseTo(rebuilt[arm].discountedQualitySum, 12);
        }

        expect(store.get(0).discountedCount).toBeCloseTo(1.81, 12);
        expect(store.get(0).discountedQualitySum).toBeCloseTo(5.28, 12);
        expect(store.get(1).discountedCount).toBeCloseTo(0.9, 12);
        expect(store.discountedTotal()).toBeCloseTo(2.71, 12);
        expect(store.discountedMeanReward(0)).toBeCloseTo(1, 12);
        expect(store.discountedMeanQuality(0)).toBeCloseTo(5.28 / 1.64, 12);
    });

    it('should equal the plain statistics without discounting', () => {
        const store = new ArmStatsStore(2);
        store.record(0, 1, 3);
        store.record(1, 0, 1);
        store.record(0, 0, 5);

        expect(store.discountedTotal()).toBe(store.t);
        expect(store.discountedMeanReward(0)).toBe(store.get(0).meanReward);
        expect(store.discountedMeanQuality(0)).toBe(store.get(0).meanQuality);
        expect(store.maxDiscountedMeanQuality()).toBe(store.maxMeanQuality());
    });

    it('should return zero means for arms without weight', () => {
        const store = new ArmStatsStore(2, { rewardDiscount: 0.5 });
        expect(store.discountedMeanReward(1)).toBe(0);
        expect(store.discountedMeanQuality(1)).toBe(0);
    });

    it('should reject bad sizes, discounts and observations', () => {
        expect(() => new ArmStatsStore(0)).toThrow(ConfigError);
        expect(() => new ArmStatsStore(2, { rewardDiscount: 0 })).toThrow(ConfigError);
        expect(() => new ArmStatsStore(2, { qualityDiscount: 1.5 })).toThrow(ConfigError);

        const store = new ArmStatsStore(2);
        expect(() => store.record(2, 1)).toThrow(RangeError);
        expect(() => store.record(0, NaN)).toThrow(RangeError);
        expect(() => store.get(-1)).toThrow(RangeError);
    });

    it('should forget everything on reset', () => {
        const store = new ArmStatsStore(2, { rewardDiscount: 0.9 });
        store.record(1, 1, 2);
        store.reset();
        expect(store.t).toBe(0);
        expect(store.get(1).selectionCount).toBe(0);
        expect(store.discountedTotal()).toBe(0);
        expect(store.firstUntried()).toBe(0);
    });
});
