/**
 * @module phy/lora/link
 * @description Link outcome of one transmission attempt
 *
 * Combines a propagation sample, the noise floor, the sensitivity and SINR
 * tables and a collision draw into RSSI, SNR, time-on-air, energy and a
 * success flag.
 */

import type { SeededRandom } from '../../../core/repro';
import type { Logger } from '../../../core/logging';
import { ConfigError } from '../../../core/errors';
import {
    DEFAULT_NOISE_FIGURE_DB,
    effectiveSignalPowerDbm,
    snrDb,
} from '../../channel/path-loss';
import type { PropagationContext, PropagationModel } from '../../channel/propagation';
import { LogDistancePropagation } from '../../channel/propagation';
import { dbmToMilliwatts } from '../../utils/conversion';
import { timeOnAir, type AirtimeOptions } from './airtime';
import { transmissionEnergy, RADIO_ONLY_PROFILE, type EnergyProfile } from './energy';
import { noCollisions, type AirborneTransmission, type CollisionModel } from './collision';
import { receiverSensitivityDbm, sinrRequirementDb } from './tables';
import type { TxParams } from './types';

// ==================== Success Predicate ====================

/**
 * Success iff RSSI clears the sensitivity, SNR clears the SINR requirement
 * and the attempt did not collide.
 */
export function transmissionSucceeds(
    rssi: number,
    snr: number,
    spreadingFactor: number,
    bandwidthHz: number,
    collided: boolean
): boolean {
    return rssi >= receiverSensitivityDbm(spreadingFactor, bandwidthHz)
        && snr >= sinrRequirementDb(spreadingFactor)
        && !collided;
}

// ==================== Link Model ====================

export interface LinkContext extends PropagationContext {
    /** Packets offered in the run before this attempt */
    offeredPackets: number;
    /** Transmissions on air when this one starts */
    concurrent: readonly AirborneTransmission[];
}

export interface LinkOutcome {
    rssiDbm: number;
    snrDb: number;
    timeOnAirS: number;
    energyMj: number;
    collided: boolean;
    success: boolean;
    /** Effective signal power in linear mW, used as the channel-quality signal */
    qualityMw: number;
    /** True when the RSSI fell back to the default value */
    degraded: boolean;
}

/**
 * Anything able to produce a link outcome; tests substitute scripted models
 */
export interface LinkModel {
    evaluate(params: TxParams, ctx: LinkContext, rng: SeededRandom): LinkOutcome;
}

export interface LoraLinkModelOptions {
    payloadBytes: number;
    propagation: PropagationModel;
    collision: CollisionModel;
    energyProfile: EnergyProfile;
    airtime: Partial<AirtimeOptions>;
    noiseFigureDb: number;
    /** RSSI used when the propagation model cannot produce a sample */
    defaultRssiDbm: number;
    logger?: Logger;
}

export const DEFAULT_RSSI_DBM = -100;

export class LoraLinkModel implements LinkModel {
    private readonly options: LoraLinkModelOptions;

    constructor(options: Partial<LoraLinkModelOptions> = {}) {
        this.options = {
            payloadBytes: 20,
            propagation: new LogDistancePropagation(),
            collision: noCollisions(),
            energyProfile: RADIO_ONLY_PROFILE,
            airtime: {},
            noiseFigureDb: DEFAULT_NOISE_FIGURE_DB,
            defaultRssiDbm: DEFAULT_RSSI_DBM,
            ...options,
        };
        const { payloadBytes } = this.options;
        if (!Number.isInteger(payloadBytes) || payloadBytes < 0 || payloadBytes > 255) {
            throw new ConfigError('payloadBytes must be an integer in [0, 255]', { payloadBytes });
        }
    }

    get payloadBytes(): number {
        return this.options.payloadBytes;
    }

    get collisionModelName(): string {
        return this.options.collision.name;
    }

    evaluate(params: TxParams, ctx: LinkContext, rng: SeededRandom): LinkOutcome {
        const { propagation, collision, noiseFigureDb, energyProfile, payloadBytes } = this.options;

        let rssi = propagation.sampleRssi(params, ctx, rng);
        let degraded = false;
        if (rssi === undefined) {
            rssi = this.options.defaultRssiDbm;
            degraded = true;
            this.options.logger?.logEvent('warn', 'No propagation sample, using default RSSI', {
                deviceId: ctx.deviceId,
                time: ctx.timeS,
                propagation: propagation.name,
                rssiDbm: rssi,
            });
        }

        const snr = snrDb(rssi, params.bandwidthHz, noiseFigureDb);
        const toa = timeOnAir(params.spreadingFactor, params.bandwidthHz, payloadBytes, this.options.airtime);
        const collided = collision.collides({
            deviceId: ctx.deviceId,
            params,
            timeS: ctx.timeS,
            timeOnAirS: toa,
            offeredPackets: ctx.offeredPackets,
            concurrent: ctx.concurrent,
        }, rng);

        return {
            rssiDbm: rssi,
            snrDb: snr,
            timeOnAirS: toa,
            energyMj: transmissionEnergy(params.txPowerDbm, toa, energyProfile),
            collided,
            success: transmissionSucceeds(rssi, snr, params.spreadingFactor, params.bandwidthHz, collided),
            qualityMw: dbmToMilliwatts(effectiveSignalPowerDbm(rssi, snr)),
            degraded,
        };
    }
}
