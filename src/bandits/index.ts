/**
 * @module bandits
 * @description Bandit policies for LoRa parameter selection
 *
 * ## Layers
 * - `IndexPolicy`: scores the arms of one ordered set (UCB1, QoC-A, ToW, ...)
 * - `SelectionPolicy`: turns index policies into full `TxParams` choices
 *   (joint over tuples, or one learner per dimension)
 */

// ==================== Contracts ====================

export type {
    SelectionContext,
    TransmissionFeedback,
    ArmObservation,
    IndexPolicy,
    PolicyCounters,
    SelectionPolicy,
} from './types';

// ==================== Arms ====================

export type { ArmSetConfig } from './arm-space';
export { ArmSpace } from './arm-space';

export type { ArmStatistics, ArmStatsOptions, DiscountedStatistics } from './arm-stats';
export { ArmStatsStore } from './arm-stats';

// ==================== Reward ====================

export type { RewardConvention, RewardBias, RewardShaping } from './reward';
export { NO_BIAS, DEFAULT_REWARD_SHAPING, baseReward, RewardShaper } from './reward';

// ==================== Index Policies ====================

export { StatisticalPolicy, bestIndex } from './policies/base';

export type { Ucb1Options } from './policies/ucb';
export { ucb1Score, ucb1TunedScore, Ucb1Policy, Ucb1TunedPolicy, DEFAULT_UCB1_OPTIONS } from './policies/ucb';

export type { QualityScoreInput, QocaOptions, DqocaOptions } from './policies/qoca';
export { qualityAwareScore, QocaPolicy, DqocaPolicy, DEFAULT_QOCA_OPTIONS, DEFAULT_DQOCA_OPTIONS } from './policies/qoca';

export type { TugOfWarOptions } from './policies/tow';
export { towPenalty, TugOfWarPolicy, DEFAULT_TOW_OPTIONS } from './policies/tow';

export type { EpsilonGreedyOptions } from './policies/greedy';
export { EpsilonGreedyPolicy, DEFAULT_EPSILON_GREEDY_OPTIONS } from './policies/greedy';

export { ladderAfterSuccess, ladderAfterFailure, AdrLitePolicy } from './policies/ladder';

export { FixedIndexPolicy, RoundRobinIndexPolicy, RandomIndexPolicy } from './policies/baselines';

// ==================== Selection Policies ====================

export type { IndexPolicyFactory } from './composite';
export { CountingPolicy, JointPolicy, PerDimensionPolicy } from './composite';

export type { RsLoraWeights } from './heuristics';
export {
    ADR_DISTANCE_THRESHOLDS_M,
    adrSpreadingFactor,
    AdrDistancePolicy,
    DEFAULT_RS_LORA_WEIGHTS,
    weightedChoice,
    RsLoraPolicy,
} from './heuristics';

// ==================== Registry ====================

export type { PolicyName, PolicyGranularity, PolicyOptions } from './registry';
export {
    POLICY_NAMES,
    isPolicyName,
    D_LORA_VARIANTS,
    D_LORA_EXPLORATION,
    DEFAULT_TOW_DIMENSIONS,
    buildAdrLadder,
    createPolicy,
} from './registry';
