/**
 * @module bandits/reward
 * @description Reward shaping
 *
 * The base reward is either the success indicator or the inverse of the
 * transmission energy on success. Three additive bias terms can favour
 * higher spreading factors (xi), lower transmit power (eta) and wider
 * bandwidth (zeta); each is zero unless its weight is set.
 */

import { ConfigError } from '../core/errors';
import type { Dimension, TxParams } from '../models/phy/lora/types';
import type { ArmSpace } from './arm-space';
import type { TransmissionFeedback } from './types';

export type RewardConvention = 'success' | 'inverse-energy';

export interface RewardBias {
    /** xi: weight of 2^SF / sum(2^SF') */
    throughput: number;
    /** eta: weight of 1 - TP / sum(TP') */
    energy: number;
    /** zeta: weight of BW / sum(BW') */
    bandwidth: number;
}

export interface RewardShaping {
    convention: RewardConvention;
    bias: RewardBias;
}

export const NO_BIAS: RewardBias = { throughput: 0, energy: 0, bandwidth: 0 };

export const DEFAULT_REWARD_SHAPING: RewardShaping = {
    convention: 'success',
    bias: NO_BIAS,
};

/**
 * Base reward of a transmission
 */
export function baseReward(convention: RewardConvention, feedback: TransmissionFeedback): number {
    if (!feedback.success) return 0;
    if (convention === 'success') return 1;
    return feedback.energyMj > 0 ? 1 / feedback.energyMj : 0;
}

function sum(values: readonly number[]): number {
    return values.reduce((acc, v) => acc + v, 0);
}

export class RewardShaper {
    readonly shaping: RewardShaping;
    private readonly sfNorm: number;
    private readonly tpSum: number;
    private readonly bwSum: number;

    constructor(shaping: Partial<RewardShaping>, space: ArmSpace) {
        this.shaping = {
            convention: shaping.convention ?? DEFAULT_REWARD_SHAPING.convention,
            bias: { ...NO_BIAS, ...shaping.bias },
        };
        const { bias } = this.shaping;
        for (const [key, weight] of Object.entries(bias)) {
            if (!(weight >= 0) || !Number.isFinite(weight)) {
                throw new ConfigError(`Reward bias weight ${key} must be a non-negative number`, { [key]: weight });
            }
        }
        this.sfNorm = sum(space.values('spreadingFactor').map(sf => Math.pow(2, sf)));
        this.tpSum = sum(space.values('txPowerDbm'));
        this.bwSum = sum(space.values('bandwidthHz'));
        if (bias.energy > 0 && this.tpSum === 0) {
            throw new ConfigError('Energy bias needs transmit powers that do not sum to zero');
        }
    }

    base(feedback: TransmissionFeedback): number {
        return baseReward(this.shaping.convention, feedback);
    }

    throughputTerm(spreadingFactor: number): number {
        return this.shaping.bias.throughput * Math.pow(2, spreadingFactor) / this.sfNorm;
    }

    energyTerm(txPowerDbm: number): number {
        if (this.shaping.bias.energy === 0) return 0;
        return this.shaping.bias.energy * (1 - txPowerDbm / this.tpSum);
    }

    bandwidthTerm(bandwidthHz: number): number {
        return this.shaping.bias.bandwidth * bandwidthHz / this.bwSum;
    }

    /** Reward for a joint arm: base plus every enabled bias */
    joint(params: TxParams, feedback: TransmissionFeedback): number {
        return this.base(feedback)
            + this.throughputTerm(params.spreadingFactor)
            + this.energyTerm(params.txPowerDbm)
            + this.bandwidthTerm(params.bandwidthHz);
    }

    /** Reward for one dimension: base plus the bias that belongs to it */
    forDimension(dim: Dimension, params: TxParams, feedback: TransmissionFeedback): number {
        const base = this.base(feedback);
        switch (dim) {
            case 'spreadingFactor':
                return base + this.throughputTerm(params.spreadingFactor);
            case 'bandwidthHz':
                return base + this.bandwidthTerm(params.bandwidthHz);
            case 'txPowerDbm':
                return base + this.energyTerm(params.txPowerDbm);
            case 'frequencyHz':
                return base;
        }
    }
}
