/**
 * @module bandits/heuristics
 * @description Rule-based parameter baselines that act on whole tuples
 */

import { ConfigError } from '../core/errors';
import type { SeededRandom } from '../core/repro';
import type { TxParams } from '../models/phy/lora/types';
import type { ArmSpace } from './arm-space';
import { CountingPolicy } from './composite';
import type { SelectionContext } from './types';

// ==================== Distance-based ADR ====================

/** Upper distance bound (m) for SF7, SF8, ... SF11; beyond the last, SF12 */
export const ADR_DISTANCE_THRESHOLDS_M: readonly number[] = [500, 800, 1100, 1400, 1700];

/**
 * Spreading factor an ADR server would assign at `distanceM`
 */
export function adrSpreadingFactor(distanceM: number, thresholds: readonly number[] = ADR_DISTANCE_THRESHOLDS_M): number {
    const step = thresholds.findIndex(limit => distanceM < limit);
    return 7 + (step < 0 ? thresholds.length : step);
}

/**
 * Distance-driven ADR: SF from the distance ladder, narrowest bandwidth,
 * minimum power, random channel.
 */
export class AdrDistancePolicy extends CountingPolicy {
    readonly name = 'adr';

    constructor(private readonly space: ArmSpace) {
        super();
    }

    select(ctx: SelectionContext): TxParams {
        const sfs = this.space.values('spreadingFactor');
        const bandwidthHz = Math.min(...this.space.values('bandwidthHz'));
        const txPowerDbm = Math.min(...this.space.values('txPowerDbm'));
        const frequencies = this.space.values('frequencyHz');

        if (ctx.distanceM === undefined) {
            return { spreadingFactor: sfs[0], bandwidthHz, frequencyHz: frequencies[0], txPowerDbm };
        }

        const wanted = adrSpreadingFactor(ctx.distanceM);
        const atLeast = sfs.filter(sf => sf >= wanted);
        const spreadingFactor = atLeast.length > 0 ? Math.min(...atLeast) : Math.max(...sfs);
        return { spreadingFactor, bandwidthHz, frequencyHz: ctx.rng.choice(frequencies), txPowerDbm };
    }

    protected learn(): void {
        // Selection does not depend on outcomes
    }

    protected resetState(): void {
        // No state to reset
    }
}

// ==================== RS-LoRa ====================

export interface RsLoraWeights {
    spreadingFactor: Record<number, number>;
    bandwidthHz: Record<number, number>;
}

/** Favour low SF and wide bandwidth */
export const DEFAULT_RS_LORA_WEIGHTS: RsLoraWeights = {
    spreadingFactor: { 7: 0.4, 8: 0.3, 9: 0.15, 10: 0.08, 11: 0.05, 12: 0.02 },
    bandwidthHz: { 500000: 0.5, 250000: 0.3, 125000: 0.2 },
};

/**
 * Draw from `values` with the given weights; uniform if no value has weight
 */
export function weightedChoice(values: readonly number[], weights: Record<number, number>, rng: SeededRandom): number {
    const w = values.map(v => weights[v] ?? 0);
    const total = w.reduce((acc, x) => acc + x, 0);
    if (total <= 0) return rng.choice(values);
    let u = rng.random() * total;
    for (let i = 0; i < values.length; i++) {
        u -= w[i];
        if (u < 0) return values[i];
    }
    return values[values.length - 1];
}

export class RsLoraPolicy extends CountingPolicy {
    readonly name = 'rs-lora';
    private readonly weights: RsLoraWeights;

    constructor(private readonly space: ArmSpace, weights: Partial<RsLoraWeights> = {}) {
        super();
        this.weights = { ...DEFAULT_RS_LORA_WEIGHTS, ...weights };
        for (const table of [this.weights.spreadingFactor, this.weights.bandwidthHz]) {
            if (Object.values(table).some(w => !(w >= 0))) {
                throw new ConfigError('RS-LoRa weights must be non-negative', { ...this.weights });
            }
        }
    }

    select(ctx: SelectionContext): TxParams {
        return {
            spreadingFactor: weightedChoice(this.space.values('spreadingFactor'), this.weights.spreadingFactor, ctx.rng),
            bandwidthHz: weightedChoice(this.space.values('bandwidthHz'), this.weights.bandwidthHz, ctx.rng),
            frequencyHz: ctx.rng.choice(this.space.values('frequencyHz')),
            txPowerDbm: ctx.rng.choice(this.space.values('txPowerDbm')),
        };
    }

    protected learn(): void {
        // Selection does not depend on outcomes
    }

    protected resetState(): void {
        // No state to reset
    }
}
