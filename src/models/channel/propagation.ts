/**
 * @module channel/propagation
 * @description Sources of received-signal samples for a transmission
 *
 * A propagation model turns a parameter choice plus the device context into
 * an RSSI sample. It returns `undefined` when it has nothing to work with
 * (no position for a distance-based model); the caller decides how to
 * degrade.
 */

import type { SeededRandom } from '../../core/repro';
import { ConfigError } from '../../core/errors';
import type { Position, TxParams } from '../phy/lora/types';
import {
    DEFAULT_LOG_DISTANCE,
    distance,
    pathLossDb,
    rssiDbm,
    type LogDistanceParams,
} from './path-loss';
import profileData from './channel-profiles.json';

// ==================== Interface ====================

/**
 * Per-sample context supplied by the experiment driver
 */
export interface PropagationContext {
    deviceId: number;
    /** Current device position; absent when the device has no mobility data */
    position?: Position;
    /** Gateway position */
    gateway: Position;
    /** Simulated time in seconds */
    timeS: number;
}

export interface PropagationModel {
    readonly name: string;
    /** Draw one RSSI sample (dBm), or `undefined` if the context is insufficient */
    sampleRssi(params: TxParams, ctx: PropagationContext, rng: SeededRandom): number | undefined;
}

// ==================== Log-distance ====================

/**
 * Log-distance path loss with log-normal shadowing, drawn once per sample
 */
export class LogDistancePropagation implements PropagationModel {
    readonly name = 'log-distance';
    private readonly params: LogDistanceParams;

    constructor(params: Partial<LogDistanceParams> = {}) {
        this.params = { ...DEFAULT_LOG_DISTANCE, ...params };
        if (this.params.shadowingSigmaDb < 0) {
            throw new ConfigError('shadowingSigmaDb must be non-negative', this.params);
        }
        if (this.params.referenceDistanceM <= 0) {
            throw new ConfigError('referenceDistanceM must be positive', this.params);
        }
    }

    sampleRssi(params: TxParams, ctx: PropagationContext, rng: SeededRandom): number | undefined {
        if (!ctx.position) return undefined;
        const d = distance(ctx.position, ctx.gateway);
        const shadowing = this.params.shadowingSigmaDb > 0
            ? rng.normal(0, this.params.shadowingSigmaDb)
            : 0;
        return rssiDbm(params.txPowerDbm, pathLossDb(d, this.params.exponent, shadowing, this.params));
    }
}

// ==================== Channel profiles ====================

/**
 * Measured-style per-channel signal levels, optionally switching between
 * several location profiles over time (non-stationary conditions).
 */
export interface ChannelProfileOptions {
    /** Channel centre frequencies in Hz, same order as every profile row */
    frequenciesHz: number[];
    /** One row of mean RSSI values (dBm at SF7) per location */
    profiles: number[][];
    /** Time spent at each location before moving to the next (s); Infinity keeps the first */
    dwellTimeS: number;
    /** Gain per spreading-factor step above SF7 (dB) */
    sfGainDb: number;
    /** Shadowing standard deviation (dB) */
    shadowingSigmaDb: number;
    /** Transmit power the profile levels were measured at (dBm) */
    referenceTxPowerDbm: number;
    /** Frequency match tolerance (Hz) */
    frequencyToleranceHz: number;
}

export class ChannelProfilePropagation implements PropagationModel {
    readonly name = 'channel-profile';
    private readonly options: ChannelProfileOptions;

    constructor(options: ChannelProfileOptions) {
        const { frequenciesHz, profiles, dwellTimeS, shadowingSigmaDb } = options;
        if (frequenciesHz.length === 0 || profiles.length === 0) {
            throw new ConfigError('Channel profile needs at least one channel and one location');
        }
        for (const row of profiles) {
            if (row.length !== frequenciesHz.length) {
                throw new ConfigError('Every profile row must list one level per channel', {
                    channels: frequenciesHz.length,
                    row: row.length,
                });
            }
        }
        if (!(dwellTimeS > 0)) {
            throw new ConfigError('dwellTimeS must be positive', { dwellTimeS });
        }
        if (shadowingSigmaDb < 0) {
            throw new ConfigError('shadowingSigmaDb must be non-negative', { shadowingSigmaDb });
        }
        this.options = options;
    }

    /** Index of the active location profile at `timeS` */
    locationAt(timeS: number): number {
        if (!Number.isFinite(this.options.dwellTimeS)) return 0;
        return Math.floor(timeS / this.options.dwellTimeS) % this.options.profiles.length;
    }

    /** Mean level (dBm) for a channel at a location, before shadowing */
    meanLevel(params: TxParams, location: number): number | undefined {
        const { frequenciesHz, profiles, sfGainDb, referenceTxPowerDbm, frequencyToleranceHz } = this.options;
        const channel = frequenciesHz.findIndex(f => Math.abs(f - params.frequencyHz) <= frequencyToleranceHz);
        if (channel < 0) return undefined;
        return profiles[location][channel]
            + (params.spreadingFactor - 7) * sfGainDb
            + (params.txPowerDbm - referenceTxPowerDbm);
    }

    sampleRssi(params: TxParams, ctx: PropagationContext, rng: SeededRandom): number | undefined {
        const level = this.meanLevel(params, this.locationAt(ctx.timeS));
        if (level === undefined) return undefined;
        const sigma = this.options.shadowingSigmaDb;
        return sigma > 0 ? level + rng.normal(0, sigma) : level;
    }
}

/**
 * Built-in eight-channel EU868 profiles: one stationary location with a deep
 * fade at 867.3 MHz, and three locations visited in turn.
 */
export function createBuiltinChannelProfile(
    kind: 'stationary' | 'non-stationary',
    overrides: Partial<ChannelProfileOptions> = {}
): ChannelProfilePropagation {
    return new ChannelProfilePropagation({
        frequenciesHz: profileData.frequenciesMHz.map(f => Math.round(f * 1e6)),
        profiles: kind === 'stationary' ? profileData.stationary : profileData.nonStationary,
        dwellTimeS: kind === 'stationary' ? Infinity : 200,
        sfGainDb: 2.5,
        shadowingSigmaDb: 1.5,
        referenceTxPowerDbm: 14,
        frequencyToleranceHz: 1e3,
        ...overrides,
    });
}
