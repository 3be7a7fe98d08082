/**
 * @module bandits/registry
 * @description Policy construction by algorithm name
 */

import { UnknownPolicyError } from '../core/errors';
import { DIMENSIONS, type Dimension, type TxParams } from '../models/phy/lora/types';
import type { ArmSpace } from './arm-space';
import { JointPolicy, PerDimensionPolicy } from './composite';
import { AdrDistancePolicy, RsLoraPolicy, type RsLoraWeights } from './heuristics';
import { FixedIndexPolicy, RandomIndexPolicy, RoundRobinIndexPolicy } from './policies/baselines';
import { EpsilonGreedyPolicy, type EpsilonGreedyOptions } from './policies/greedy';
import { AdrLitePolicy } from './policies/ladder';
import { DqocaPolicy, QocaPolicy, type DqocaOptions, type QocaOptions } from './policies/qoca';
import { TugOfWarPolicy, type TugOfWarOptions } from './policies/tow';
import { Ucb1Policy, Ucb1TunedPolicy, type Ucb1Options } from './policies/ucb';
import { RewardShaper, type RewardBias, type RewardShaping } from './reward';
import type { IndexPolicy, SelectionPolicy } from './types';

// ==================== Names ====================

export const POLICY_NAMES = [
    'ucb1',
    'ucb1-tuned',
    'qoca',
    'dqoca',
    'tow',
    'epsilon-greedy',
    'adr-lite',
    'fixed',
    'round-robin',
    'random',
    'adr',
    'rs-lora',
    'd-lora',
    'd-lora-pdr',
    'd-lora-ee',
    'd-lora-th',
] as const;

export type PolicyName = typeof POLICY_NAMES[number];

export function isPolicyName(name: string): name is PolicyName {
    return POLICY_NAMES.some(n => n === name);
}

/** Bias weights of the D-LoRa experiment variants */
export const D_LORA_VARIANTS: Record<'d-lora' | 'd-lora-pdr' | 'd-lora-ee' | 'd-lora-th', RewardBias> = {
    'd-lora': { throughput: 0, energy: 1.8, bandwidth: 0 },
    'd-lora-pdr': { throughput: 0, energy: 0, bandwidth: 0 },
    'd-lora-ee': { throughput: 0, energy: 3.5, bandwidth: 0 },
    'd-lora-th': { throughput: 10, energy: 0, bandwidth: 10 },
};

// ==================== Options ====================

export type PolicyGranularity = 'joint' | 'per-dimension';

export interface PolicyOptions {
    /** One bandit over all tuples, or one bandit per learned dimension */
    granularity?: PolicyGranularity;
    /** Learned dimensions for per-dimension policies */
    dimensions?: Dimension[];
    reward?: Partial<RewardShaping>;
    ucb1?: Partial<Ucb1Options>;
    qoca?: Partial<QocaOptions>;
    dqoca?: Partial<DqocaOptions>;
    tow?: Partial<TugOfWarOptions>;
    epsilonGreedy?: Partial<EpsilonGreedyOptions>;
    rsLora?: Partial<RsLoraWeights>;
    /** Channels from worst to best, used to order the ADR-Lite ladder */
    channelOrderHz?: number[];
}

/** Exploration weight of the per-dimension UCB1 learners in the D-LoRa variants */
export const D_LORA_EXPLORATION = 2.0;

/** Learned dimensions of ToW when none are given */
export const DEFAULT_TOW_DIMENSIONS: Dimension[] = ['frequencyHz', 'spreadingFactor'];

// ==================== Factory ====================

/**
 * ADR-Lite ladder: all tuples by ascending transmit power, channels within
 * one power level in `channelOrderHz` order (listed order when absent).
 */
export function buildAdrLadder(space: ArmSpace, channelOrderHz?: readonly number[]): TxParams[] {
    const order = channelOrderHz ?? space.values('frequencyHz');
    const rank = (hz: number): number => {
        const i = order.indexOf(hz);
        return i < 0 ? order.length : i;
    };
    return space
        .all()
        .map((arm, index) => ({ arm, index }))
        .sort((a, b) =>
            a.arm.txPowerDbm - b.arm.txPowerDbm
            || rank(a.arm.frequencyHz) - rank(b.arm.frequencyHz)
            || a.index - b.index)
        .map(entry => entry.arm);
}

function varyingDimensions(space: ArmSpace): Dimension[] {
    const varying = DIMENSIONS.filter(dim => space.values(dim).length > 1);
    return varying.length > 0 ? varying : ['spreadingFactor'];
}

function statisticalFactory(name: PolicyName, options: PolicyOptions): ((size: number) => IndexPolicy) | undefined {
    switch (name) {
        case 'ucb1':
            return size => new Ucb1Policy(size, options.ucb1);
        case 'ucb1-tuned':
            return size => new Ucb1TunedPolicy(size);
        case 'qoca':
            return size => new QocaPolicy(size, options.qoca);
        case 'dqoca':
            return size => new DqocaPolicy(size, options.dqoca);
        case 'tow':
            return size => new TugOfWarPolicy(size, options.tow);
        case 'epsilon-greedy':
            return size => new EpsilonGreedyPolicy(size, options.epsilonGreedy);
        default:
            return undefined;
    }
}

/**
 * Create a selection policy by algorithm name.
 *
 * @throws UnknownPolicyError for a name outside `POLICY_NAMES`
 */
export function createPolicy(name: string, space: ArmSpace, options: PolicyOptions = {}): SelectionPolicy {
    if (!isPolicyName(name)) {
        throw new UnknownPolicyError(name, [...POLICY_NAMES]);
    }

    switch (name) {
        case 'adr':
            return new AdrDistancePolicy(space);
        case 'rs-lora':
            return new RsLoraPolicy(space, options.rsLora);
        case 'adr-lite': {
            const ladder = buildAdrLadder(space, options.channelOrderHz);
            return new JointPolicy(name, ladder, new AdrLitePolicy(ladder.length), new RewardShaper(options.reward ?? {}, space));
        }
        case 'fixed':
            return new JointPolicy(name, space.all(), new FixedIndexPolicy(space.size), new RewardShaper(options.reward ?? {}, space));
        case 'round-robin':
            return new JointPolicy(name, space.all(), new RoundRobinIndexPolicy(space.size), new RewardShaper(options.reward ?? {}, space));
        case 'random':
            return new JointPolicy(name, space.all(), new RandomIndexPolicy(space.size), new RewardShaper(options.reward ?? {}, space));
        case 'd-lora':
        case 'd-lora-pdr':
        case 'd-lora-ee':
        case 'd-lora-th': {
            const shaper = new RewardShaper({
                convention: options.reward?.convention ?? 'success',
                bias: D_LORA_VARIANTS[name],
            }, space);
            return new PerDimensionPolicy(name, space, [...DIMENSIONS], (_dim, size) => new Ucb1Policy(size, { exploration: D_LORA_EXPLORATION }), shaper);
        }
        default:
            break;
    }

    const factory = statisticalFactory(name, options);
    if (factory === undefined) {
        throw new UnknownPolicyError(name, [...POLICY_NAMES]);
    }
    const shaper = new RewardShaper(options.reward ?? {}, space);
    const granularity = options.granularity ?? (name === 'tow' ? 'per-dimension' : 'joint');

    if (granularity === 'per-dimension') {
        const dims = options.dimensions
            ?? (name === 'tow' ? DEFAULT_TOW_DIMENSIONS : varyingDimensions(space));
        return new PerDimensionPolicy(name, space, dims, (_dim, size) => factory(size), shaper);
    }
    return new JointPolicy(name, space.all(), factory(space.size), shaper);
}
