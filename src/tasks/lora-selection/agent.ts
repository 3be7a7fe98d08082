/**
 * @module tasks/lora-selection/agent
 * @description Per-device decision loop
 *
 * Each `step` runs one cycle: select parameters, evaluate the link, update
 * running totals, feed the outcome back to the policy, and work out when the
 * next cycle is due. The agent never touches run-level state; the driver
 * folds the returned attempt into the run aggregate.
 */

import { AgentStoppedError, ConfigError } from '../../core/errors';
import type { SeededRandom } from '../../core/repro';
import { baseReward, type RewardConvention } from '../../bandits/reward';
import type { SelectionContext, SelectionPolicy } from '../../bandits/types';
import { distance } from '../../models/channel/path-loss';
import type { AirborneTransmission } from '../../models/phy/lora/collision';
import type { LinkModel } from '../../models/phy/lora/link';
import type { Position, TxParams } from '../../models/phy/lora/types';

// ==================== Types ====================

export type AgentState = 'idle' | 'active' | 'stopped';

export interface DeviceAgentOptions {
    deviceId: number;
    /** Owned policy, or one shared with other agents */
    policy: SelectionPolicy;
    linkModel: LinkModel;
    rng: SeededRandom;
    payloadBytes: number;
    /** Mean of the exponential interval drawn at the first transmission (s) */
    meanIntervalS: number;
    /** Upper bound of the uniform jitter added to every interval (s) */
    jitterS?: number;
    /** No cycle starts at or after this time */
    stopTimeS: number;
    maxTransmissions?: number;
    /** Reward convention reported with each attempt */
    rewardConvention?: RewardConvention;
}

/**
 * Inputs the driver supplies for one cycle
 */
export interface StepInput {
    /** Current position; absent when the device has no position data */
    position?: Position;
    gateway: Position;
    /** Packets offered in the run before this attempt */
    offeredPackets: number;
    /** Transmissions on air when this one starts */
    concurrent: readonly AirborneTransmission[];
}

/**
 * Outcome of one cycle
 */
export interface TransmissionAttempt {
    deviceId: number;
    timeS: number;
    params: TxParams;
    rssiDbm: number;
    snrDb: number;
    timeOnAirS: number;
    energyMj: number;
    success: boolean;
    collided: boolean;
    qualityMw: number;
    /** Base reward under the agent's convention */
    reward: number;
    bitsDelivered: number;
    /** RSSI fell back to the default because position data was missing */
    degraded: boolean;
    /** When the next cycle is due, or undefined if the agent stopped */
    nextTimeS: number | undefined;
}

export interface DeviceTotals {
    packetsSent: number;
    packetsReceived: number;
    energyMj: number;
    bitsDelivered: number;
    airtimeS: number;
}

// ==================== Agent ====================

export class DeviceAgent {
    readonly deviceId: number;
    readonly policy: SelectionPolicy;
    private readonly options: Required<Omit<DeviceAgentOptions, 'maxTransmissions'>> & { maxTransmissions?: number };
    private current: AgentState = 'idle';
    private intervalS: number | undefined;
    private running: DeviceTotals = {
        packetsSent: 0,
        packetsReceived: 0,
        energyMj: 0,
        bitsDelivered: 0,
        airtimeS: 0,
    };

    constructor(options: DeviceAgentOptions) {
        this.options = {
            ...options,
            jitterS: options.jitterS ?? 0,
            rewardConvention: options.rewardConvention ?? 'success',
        };
        this.deviceId = options.deviceId;
        this.policy = options.policy;

        const { meanIntervalS, jitterS, maxTransmissions, payloadBytes } = this.options;
        if (!(meanIntervalS > 0)) {
            throw new ConfigError('meanIntervalS must be positive', { meanIntervalS });
        }
        if (!(jitterS >= 0)) {
            throw new ConfigError('jitterS must be non-negative', { jitterS });
        }
        if (maxTransmissions !== undefined && (!Number.isInteger(maxTransmissions) || maxTransmissions < 1)) {
            throw new ConfigError('maxTransmissions must be a positive integer', { maxTransmissions });
        }
        if (!Number.isInteger(payloadBytes) || payloadBytes < 0) {
            throw new ConfigError('payloadBytes must be a non-negative integer', { payloadBytes });
        }
    }

    get state(): AgentState {
        return this.current;
    }

    /** Fixed inter-transmission interval, known after the first step */
    get interval(): number | undefined {
        return this.intervalS;
    }

    totals(): DeviceTotals {
        return { ...this.running };
    }

    /** Packet delivery ratio so far; 0 before any transmission */
    get pdr(): number {
        return this.running.packetsSent === 0 ? 0 : this.running.packetsReceived / this.running.packetsSent;
    }

    stop(): void {
        this.current = 'stopped';
    }

    /**
     * Run one select-transmit-update cycle at `timeS`
     *
     * @throws AgentStoppedError once the agent has stopped
     */
    step(timeS: number, input: StepInput): TransmissionAttempt {
        if (this.current === 'stopped') {
            throw new AgentStoppedError();
        }
        if (timeS >= this.options.stopTimeS) {
            this.stop();
            throw new AgentStoppedError(`Device ${this.deviceId} reached its stop time`);
        }
        this.current = 'active';

        const { rng, linkModel, payloadBytes } = this.options;
        const ctx: SelectionContext = {
            deviceId: this.deviceId,
            timeS,
            distanceM: input.position ? distance(input.position, input.gateway) : undefined,
            rng,
        };

        const params = this.policy.select(ctx);
        const outcome = linkModel.evaluate(params, {
            deviceId: this.deviceId,
            position: input.position,
            gateway: input.gateway,
            timeS,
            offeredPackets: input.offeredPackets,
            concurrent: input.concurrent,
        }, rng);

        const bitsDelivered = outcome.success ? payloadBytes * 8 : 0;
        this.running.packetsSent++;
        if (outcome.success) this.running.packetsReceived++;
        this.running.energyMj += outcome.energyMj;
        this.running.bitsDelivered += bitsDelivered;
        this.running.airtimeS += outcome.timeOnAirS;

        const feedback = {
            success: outcome.success,
            energyMj: outcome.energyMj,
            qualityMw: outcome.qualityMw,
        };
        this.policy.update(params, feedback, ctx);

        return {
            deviceId: this.deviceId,
            timeS,
            params,
            rssiDbm: outcome.rssiDbm,
            snrDb: outcome.snrDb,
            timeOnAirS: outcome.timeOnAirS,
            energyMj: outcome.energyMj,
            success: outcome.success,
            collided: outcome.collided,
            qualityMw: outcome.qualityMw,
            reward: baseReward(this.options.rewardConvention, feedback),
            bitsDelivered,
            degraded: outcome.degraded,
            nextTimeS: this.scheduleNext(timeS),
        };
    }

    private scheduleNext(timeS: number): number | undefined {
        const { rng, meanIntervalS, jitterS, maxTransmissions, stopTimeS } = this.options;
        if (maxTransmissions !== undefined && this.running.packetsSent >= maxTransmissions) {
            this.stop();
            return undefined;
        }
        if (this.intervalS === undefined) {
            this.intervalS = rng.exponential(meanIntervalS);
        }
        const next = timeS + this.intervalS + (jitterS > 0 ? rng.uniform(0, jitterS) : 0);
        if (next >= stopTimeS) {
            this.stop();
            return undefined;
        }
        return next;
    }
}
