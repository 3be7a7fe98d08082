/**
 * Index Policy Tests
 * Forced exploration, scoring rules and baselines of the single-set policies
 */

import { describe, it, expect } from 'vitest';
import { ConfigError } from '../src/core/errors';
import { bestIndex } from '../src/bandits/policies/base';
import { Ucb1Policy, Ucb1TunedPolicy, ucb1Score, ucb1TunedScore } from '../src/bandits/policies/ucb';
import { DqocaPolicy, QocaPolicy, qualityAwareScore } from '../src/bandits/policies/qoca';
import { TugOfWarPolicy, towPenalty } from '../src/bandits/policies/tow';
import { EpsilonGreedyPolicy } from '../src/bandits/policies/greedy';
import { AdrLitePolicy, ladderAfterFailure, ladderAfterSuccess } from '../src/bandits/policies/ladder';
import { FixedIndexPolicy, RandomIndexPolicy, RoundRobinIndexPolicy } from '../src/bandits/policies/baselines';
import type { ArmObservation, IndexPolicy, SelectionContext } from '../src/bandits/types';
import { makeCtx, observe } from './test-utils';

/**
 * Run `steps` select/update rounds and return the chosen indices
 */
function drive(
    policy: IndexPolicy,
    outcome: (arm: number, step: number) => ArmObservation,
    steps: number,
    ctx: SelectionContext = makeCtx()
): number[] {
    const picks: number[] = [];
    for (let step = 0; step < steps; step++) {
        const arm = policy.selectIndex(ctx);
        picks.push(arm);
        policy.updateIndex(arm, outcome(arm, step), ctx);
    }
    return picks;
}

// ==================== Forced Exploration ====================

describe('Forced exploration', () => {
    const factories: [string, (size: number) => IndexPolicy][] = [
        ['ucb1', size => new Ucb1Policy(size)],
        ['ucb1-tuned', size => new Ucb1TunedPolicy(size)],
        ['qoca', size => new QocaPolicy(size)],
        ['dqoca', size => new DqocaPolicy(size)],
        ['tow', size => new TugOfWarPolicy(size)],
        ['epsilon-greedy', size => new EpsilonGreedyPolicy(size, { epsilon: 1 })],
    ];

    for (const [name, create] of factories) {
        it(`should try every arm once in listed order (${name})`, () => {
            const picks = drive(create(5), arm => observe(arm === 4, 1), 5);
            expect(picks).toEqual([0, 1, 2, 3, 4]);
        });
    }

    it('should give the first listed arm every tie', () => {
        expect(bestIndex(4, () => 1)).toBe(0);
        expect(bestIndex(4, arm => (arm === 2 || arm === 3 ? 5 : 0))).toBe(2);
    });
});

// ==================== UCB ====================

describe('UCB1', () => {
    it('should add the exploration bonus to the mean', () => {
        expect(ucb1Score(0.5, 2, 3, 1)).toBeCloseTo(0.5 + Math.sqrt(Math.log(4) / 4), 12);
        expect(ucb1Score(0.5, 2, 3, 2)).toBeCloseTo(0.5 + 2 * Math.sqrt(Math.log(4) / 4), 12);
        expect(ucb1Score(0.9, 0, 3, 1)).toBe(Infinity);
    });

    it('should never lower a score as decisions accumulate', () => {
        let previous = ucb1Score(0.4, 3, 1, 1);
        for (let t = 2; t <= 200; t++) {
            const current = ucb1Score(0.4, 3, t, 1);
            expect(current).toBeGreaterThanOrEqual(previous);
            previous = current;
        }
    });

    it('should pick the first arm when all scores tie', () => {
        const policy = new Ucb1Policy(3);
        drive(policy, () => observe(true), 3);
        expect(policy.selectIndex(makeCtx())).toBe(0);
    });

    it('should settle on the only arm that succeeds', () => {
        const picks = drive(new Ucb1Policy(3), arm => observe(arm === 0), 10);
        expect(picks).toEqual([0, 1, 2, 0, 0, 0, 0, 0, 0, 0]);
    });

    it('should reject a negative exploration weight', () => {
        expect(() => new Ucb1Policy(3, { exploration: -1 })).toThrow(ConfigError);
    });
});

describe('UCB1-Tuned', () => {
    it('should cap the variance term at one quarter', () => {
        expect(ucb1TunedScore(0.5, 0.25, 4, 10)).toBeCloseTo(0.5 + Math.sqrt(Math.log(10) / 4 * 0.25), 12);
    });

    it('should use the variance bound when it is below the cap', () => {
        const bound = Math.sqrt(2 * Math.log(2) / 100);
        expect(ucb1TunedScore(0.3, 0, 100, 2)).toBeCloseTo(0.3 + Math.sqrt(Math.log(2) / 100 * bound), 12);
    });

    it('should score from the arm history', () => {
        const policy = new Ucb1TunedPolicy(2);
        drive(policy, arm => observe(arm === 0), 2);
        const expected = ucb1TunedScore(1, 0, 1, 2);
        expect(policy.score(0)).toBeCloseTo(expected, 12);
        expect(policy.score(0)).toBeGreaterThan(policy.score(1));
    });
});

// ==================== QoC-A ====================

describe('QoC-A', () => {
    it('should penalise arms with poorer channel quality', () => {
        const policy = new QocaPolicy(2);
        drive(policy, arm => observe(true, arm === 0 ? 1 : 4), 2);
        expect(policy.score(0)).toBeCloseTo(1 + 0.9 * (0.25 - 1) * Math.log(2) + 1.9 * Math.sqrt(Math.log(2)), 12);
        expect(policy.selectIndex(makeCtx())).toBe(1);
    });

    it('should drop the quality term when no arm has quality', () => {
        const score = qualityAwareScore({
            meanReward: 0.5,
            meanQuality: 0,
            maxQuality: 0,
            count: 2,
            total: 8,
            alpha: 1.9,
            beta: 0.9,
        });
        expect(score).toBeCloseTo(0.5 + 1.9 * Math.sqrt(Math.log(8) / 2), 12);
    });

    it('should reject negative weights', () => {
        expect(() => new QocaPolicy(2, { alpha: -0.1 })).toThrow(ConfigError);
        expect(() => new DqocaPolicy(2, { beta: -1 })).toThrow(ConfigError);
        expect(() => new DqocaPolicy(2, { lambda: 0 })).toThrow(ConfigError);
    });
});

describe('DQoC-A', () => {
    it('should reproduce QoC-A exactly without discounting', () => {
        const outcome = (arm: number, step: number): ArmObservation =>
            observe((arm + step) % 3 !== 0, 1 + arm * 0.5 + (step % 4));

        const plain = drive(new QocaPolicy(4), outcome, 40);
        const discounted = drive(
            new DqocaPolicy(4, { alpha: 1.9, beta: 0.9, lambda: 1, lambdaQuality: 1 }),
            outcome,
            40
        );
        expect(discounted).toEqual(plain);
    });

    it('should move away from an arm whose rewards stop', () => {
        const policy = new DqocaPolicy(2, { lambda: 0.5, lambdaQuality: 0.5 });
        drive(policy, arm => observe(arm === 0, 1), 6);
        expect(policy.selectIndex(makeCtx())).toBe(0);

        drive(policy, arm => observe(arm === 1, 1), 20);
        expect(policy.stats.discountedMeanReward(1)).toBeGreaterThan(policy.stats.discountedMeanReward(0));
    });
});

// ==================== Tug-of-War ====================

describe('Tug-of-War', () => {
    it('should derive the penalty from the two best rates', () => {
        expect(towPenalty([0.8, 0.5])).toBeCloseTo(0.35, 12);
        expect(towPenalty([0.2, 0.9, 0.4])).toBeCloseTo(0.15, 12);
        expect(towPenalty([0.7])).toBe(0.1);
        expect(towPenalty([0.5, 0.5])).toBe(0.1);
        expect(towPenalty([], 0.3)).toBe(0.3);
    });

    it('should pull and push Q and oscillate the scores', () => {
        const policy = new TugOfWarPolicy(2);
        const picks = drive(policy, arm => observe(arm === 0), 2);
        expect(picks).toEqual([0, 1]);
        expect(policy.values()[0]).toBeCloseTo(1, 12);
        expect(policy.values()[1]).toBeCloseTo(-0.1, 12);
        expect(policy.score(0)).toBeCloseTo(1.6, 12);
        expect(policy.score(1)).toBeCloseTo(-1.6, 12);
        expect(policy.selectIndex(makeCtx())).toBe(0);
    });

    it('should penalise a failure with the rate-based penalty', () => {
        const policy = new TugOfWarPolicy(2);
        drive(policy, arm => observe(arm === 0), 2);
        expect(policy.successRates()).toEqual([1, 0]);
        policy.updateIndex(0, observe(false), makeCtx());
        expect(policy.values()[0]).toBeCloseTo(1.4, 12);
    });

    it('should clear Q on reset', () => {
        const policy = new TugOfWarPolicy(3);
        drive(policy, () => observe(true), 4);
        policy.reset();
        expect(policy.values()).toEqual([0, 0, 0]);
        expect(policy.successRates()).toEqual([]);
        expect(policy.stats.t).toBe(0);
    });

    it('should reject out-of-range factors', () => {
        expect(() => new TugOfWarPolicy(2, { alpha: 1.2 })).toThrow(ConfigError);
        expect(() => new TugOfWarPolicy(2, { amplitude: -1 })).toThrow(ConfigError);
    });
});

// ==================== Epsilon-greedy ====================

describe('Epsilon-greedy', () => {
    it('should always exploit at epsilon 0', () => {
        const picks = drive(new EpsilonGreedyPolicy(3, { epsilon: 0 }), arm => observe(arm === 1), 12);
        expect(picks.slice(3)).toEqual(new Array<number>(9).fill(1));
    });

    it('should draw uniformly at epsilon 1', () => {
        const policy = new EpsilonGreedyPolicy(3, { epsilon: 1 });
        const picks = drive(policy, arm => observe(arm === 1), 200, makeCtx(0, 7));
        expect(new Set(picks.slice(3)).size).toBe(3);
        expect(picks.every(p => p >= 0 && p < 3)).toBe(true);
    });

    it('should reject epsilon outside [0, 1]', () => {
        expect(() => new EpsilonGreedyPolicy(3, { epsilon: 1.5 })).toThrow(ConfigError);
    });
});

// ==================== ADR-Lite ====================

describe('ADR-Lite', () => {
    it('should halve on success and move up on failure', () => {
        expect(ladderAfterSuccess(7)).toBe(3);
        expect(ladderAfterSuccess(0)).toBe(0);
        expect(ladderAfterFailure(1, 8)).toBe(4);
        expect(ladderAfterFailure(7, 8)).toBe(7);
    });

    it('should walk the ladder from the strongest arm', () => {
        const policy = new AdrLitePolicy(8);
        const positions: number[] = [policy.position];
        for (const success of [true, true, false, false, false, false]) {
            policy.updateIndex(policy.selectIndex(), observe(success));
            positions.push(policy.position);
        }
        expect(positions).toEqual([7, 3, 1, 4, 6, 7, 7]);
        expect(policy.selectIndex()).toBe(7);
    });

    it('should restart at the top on reset', () => {
        const policy = new AdrLitePolicy(5);
        policy.updateIndex(4, observe(true));
        expect(policy.position).toBe(2);
        policy.reset();
        expect(policy.position).toBe(4);
    });

    it('should reject an empty ladder', () => {
        expect(() => new AdrLitePolicy(0)).toThrow(ConfigError);
    });
});

// ==================== Baselines ====================

describe('Baselines', () => {
    it('should pin each device to its own arm', () => {
        const policy = new FixedIndexPolicy(4);
        expect(policy.selectIndex(makeCtx(6))).toBe(2);
        expect(policy.selectIndex(makeCtx(6))).toBe(2);
        expect(policy.selectIndex(makeCtx(3))).toBe(3);
    });

    it('should cycle per device', () => {
        const policy = new RoundRobinIndexPolicy(3);
        const one = makeCtx(1);
        const zero = makeCtx(0);
        expect([policy.selectIndex(one), policy.selectIndex(one), policy.selectIndex(one), policy.selectIndex(one)])
            .toEqual([1, 2, 0, 1]);
        expect([policy.selectIndex(zero), policy.selectIndex(zero)]).toEqual([0, 1]);
        policy.reset();
        expect(policy.selectIndex(one)).toBe(1);
    });

    it('should replay random picks from the same seed', () => {
        const policy = new RandomIndexPolicy(5);
        const a = drive(policy, () => observe(true), 30, makeCtx(0, 99));
        const b = drive(policy, () => observe(true), 30, makeCtx(0, 99));
        expect(a).toEqual(b);
        expect(a.every(p => p >= 0 && p < 5)).toBe(true);
    });

    it('should reject an empty arm set', () => {
        expect(() => new FixedIndexPolicy(0)).toThrow(ConfigError);
        expect(() => new RandomIndexPolicy(0)).toThrow(ConfigError);
    });
});
