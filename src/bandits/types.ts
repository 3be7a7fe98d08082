/**
 * @module bandits/types
 * @description Selection policy contracts
 *
 * Two layers: an `IndexPolicy` chooses among the arms of one ordered set,
 * and a `SelectionPolicy` turns one or several index policies into a full
 * `TxParams` choice.
 */

import type { SeededRandom } from '../core/repro';
import type { TxParams } from '../models/phy/lora/types';

/**
 * Per-decision context supplied by the device agent
 */
export interface SelectionContext {
    deviceId: number;
    /** Simulated time in seconds */
    timeS: number;
    /** Device-to-gateway distance, when known */
    distanceM?: number;
    /** Random stream of the deciding device */
    rng: SeededRandom;
}

/**
 * Observed outcome fed back after a transmission
 */
export interface TransmissionFeedback {
    success: boolean;
    energyMj: number;
    /** Channel-quality signal (linear mW) */
    qualityMw: number;
}

/**
 * Observation for one arm of one index policy
 */
export interface ArmObservation {
    reward: number;
    success: boolean;
    quality: number;
}

export interface IndexPolicy {
    readonly name: string;
    readonly size: number;
    selectIndex(ctx: SelectionContext): number;
    updateIndex(arm: number, observation: ArmObservation, ctx: SelectionContext): void;
    reset(): void;
}

/**
 * Aggregate success counters kept by every policy
 */
export interface PolicyCounters {
    attempts: number;
    successes: number;
}

export interface SelectionPolicy {
    readonly name: string;
    select(ctx: SelectionContext): TxParams;
    update(params: TxParams, feedback: TransmissionFeedback, ctx: SelectionContext): void;
    counters(): PolicyCounters;
    reset(): void;
}
