/**
 * @module phy/lora/collision
 * @description Injectable collision models
 *
 * None of these is a physical interference model; each reproduces one of the
 * heuristics used when comparing selection policies. Pick one per experiment.
 */

import type { SeededRandom } from '../../../core/repro';
import { ConfigError } from '../../../core/errors';
import type { TxParams } from './types';

// ==================== Types ====================

/**
 * A transmission currently on air
 */
export interface AirborneTransmission {
    deviceId: number;
    spreadingFactor: number;
    frequencyHz: number;
    startS: number;
    endS: number;
}

export interface CollisionContext {
    deviceId: number;
    params: TxParams;
    /** Start time of the attempt (s) */
    timeS: number;
    /** Time-on-air of the attempt (s) */
    timeOnAirS: number;
    /** Packets offered in the whole run before this one */
    offeredPackets: number;
    /** Other transmissions overlapping this one in time */
    concurrent: readonly AirborneTransmission[];
}

export interface CollisionModel {
    readonly name: string;
    collides(ctx: CollisionContext, rng: SeededRandom): boolean;
}

function requireProbability(p: number, label: string): void {
    if (!(p >= 0 && p <= 1)) {
        throw new ConfigError(`${label} must be in [0, 1]`, { [label]: p });
    }
}

// ==================== Models ====================

/**
 * Never collides
 */
export function noCollisions(): CollisionModel {
    return {
        name: 'none',
        collides: () => false,
    };
}

/**
 * Independent Bernoulli(p) per attempt
 */
export function constantCollision(probability: number): CollisionModel {
    requireProbability(probability, 'probability');
    return {
        name: `constant-${probability}`,
        collides: (_ctx, rng) => rng.bernoulli(probability),
    };
}

export interface LoadProportionalOptions {
    /** Probability added per packet already offered */
    perPacket: number;
    /** Upper bound on the probability */
    cap: number;
}

/**
 * p = min(cap, offeredPackets * perPacket)
 */
export function loadProportionalCollision(
    options: Partial<LoadProportionalOptions> = {}
): CollisionModel {
    const { perPacket = 1 / 10000, cap = 0.3 } = options;
    if (perPacket < 0) {
        throw new ConfigError('perPacket must be non-negative', { perPacket });
    }
    requireProbability(cap, 'cap');
    return {
        name: 'load-proportional',
        collides: (ctx, rng) => rng.bernoulli(Math.min(cap, ctx.offeredPackets * perPacket)),
    };
}

export interface ProximityOptions {
    /** Frequencies closer than this are treated as the same channel (Hz) */
    frequencyToleranceHz: number;
    /** Collision probability for |dSF| <= 1 on the same channel */
    adjacentSfProbability: number;
    /** Collision probability for |dSF| == 2 on the same channel */
    nearSfProbability: number;
}

/**
 * Pairwise check against every concurrent transmission: same SF on the same
 * channel always collides; a neighbouring SF collides with 0.3, two steps
 * away with 0.1, anything else never.
 */
export function proximityCollision(options: Partial<ProximityOptions> = {}): CollisionModel {
    const {
        frequencyToleranceHz = 1e6,
        adjacentSfProbability = 0.3,
        nearSfProbability = 0.1,
    } = options;
    requireProbability(adjacentSfProbability, 'adjacentSfProbability');
    requireProbability(nearSfProbability, 'nearSfProbability');

    return {
        name: 'sf-frequency-proximity',
        collides(ctx, rng) {
            for (const other of ctx.concurrent) {
                if (other.deviceId === ctx.deviceId) continue;
                if (Math.abs(other.frequencyHz - ctx.params.frequencyHz) >= frequencyToleranceHz) continue;

                const sfDiff = Math.abs(other.spreadingFactor - ctx.params.spreadingFactor);
                if (sfDiff === 0) return true;
                if (sfDiff <= 1 && rng.bernoulli(adjacentSfProbability)) return true;
                if (sfDiff === 2 && rng.bernoulli(nearSfProbability)) return true;
            }
            return false;
        },
    };
}

export type CollisionModelSpec =
    | { kind: 'none' }
    | { kind: 'constant'; probability: number }
    | ({ kind: 'load-proportional' } & Partial<LoadProportionalOptions>)
    | ({ kind: 'proximity' } & Partial<ProximityOptions>);

/**
 * Build a collision model from its serialisable description
 */
export function createCollisionModel(spec: CollisionModelSpec): CollisionModel {
    switch (spec.kind) {
        case 'none':
            return noCollisions();
        case 'constant':
            return constantCollision(spec.probability);
        case 'load-proportional':
            return loadProportionalCollision(spec);
        case 'proximity':
            return proximityCollision(spec);
    }
}
