/**
 * @module tasks/lora-selection/driver
 * @description In-process experiment driver
 *
 * Places devices, builds their agents and policies, and runs the decision
 * cycles through the event scheduler. Events at the same time run in
 * ascending device id; anything due at or after the stop time is dropped.
 */

import { EventScheduler, type SchedulerStats } from '../../core/scheduler';
import { createRng, createRunManifest, type RunManifest, type SeededRandom } from '../../core/repro';
import { NullLogger, type Logger } from '../../core/logging';
import { ArmSpace } from '../../bandits/arm-space';
import { createPolicy } from '../../bandits/registry';
import type { PolicyCounters, SelectionPolicy } from '../../bandits/types';
import {
    LogDistancePropagation,
    createBuiltinChannelProfile,
    type PropagationModel,
} from '../../models/channel/propagation';
import { createCollisionModel, type AirborneTransmission } from '../../models/phy/lora/collision';
import { ACTIVE_CYCLE_PROFILE, RADIO_ONLY_PROFILE } from '../../models/phy/lora/energy';
import { LoraLinkModel, type LinkModel } from '../../models/phy/lora/link';
import { formatTxParams, type Position } from '../../models/phy/lora/types';
import { DeviceAgent, type DeviceTotals } from './agent';
import { RunAggregate, type ArmSelection, type LossPoint, type RunSummary } from './aggregate';
import {
    effectiveArms,
    validateExperimentConfig,
    type ExperimentConfig,
    type PropagationSpec,
} from './config';
import { RandomWalk, uniformDiscPosition } from './mobility';

// ==================== Types ====================

export interface RunOptions {
    logger?: Logger;
    /** Replaces the link model built from the config */
    linkModel?: LinkModel;
}

export interface DeviceReport {
    deviceId: number;
    mobile: boolean;
    initialPosition: Position;
    totals: DeviceTotals;
    pdr: number;
    /** Counters of the device's own policy; absent under shared policies */
    policyCounters?: PolicyCounters;
}

export interface RunReport {
    manifest: RunManifest;
    policy: string;
    summary: RunSummary;
    armSelections: ArmSelection[];
    lossSeries: LossPoint[];
    devices: DeviceReport[];
    /** Counters of the shared policy, when devices share one */
    sharedPolicyCounters?: PolicyCounters;
    scheduler: SchedulerStats;
}

/** Gateway sits at the centre of the deployment disc */
export const GATEWAY_POSITION: Position = { x: 0, y: 0 };

// Stream salts; device streams use the device id
const PLACEMENT_STREAM = 1_000_003;
const MOBILITY_STREAM_BASE = 2_000_000;

// ==================== Builders ====================

export function buildPropagation(spec: PropagationSpec): PropagationModel {
    switch (spec.kind) {
        case 'log-distance':
            return new LogDistancePropagation({
                ...(spec.referenceLossDb !== undefined && { referenceLossDb: spec.referenceLossDb }),
                ...(spec.referenceDistanceM !== undefined && { referenceDistanceM: spec.referenceDistanceM }),
                ...(spec.exponent !== undefined && { exponent: spec.exponent }),
                ...(spec.shadowingSigmaDb !== undefined && { shadowingSigmaDb: spec.shadowingSigmaDb }),
            });
        case 'channel-profile':
            return createBuiltinChannelProfile(spec.profile, {
                ...(spec.dwellTimeS !== undefined && { dwellTimeS: spec.dwellTimeS }),
                ...(spec.shadowingSigmaDb !== undefined && { shadowingSigmaDb: spec.shadowingSigmaDb }),
            });
    }
}

/**
 * Link model described by an experiment config
 */
export function buildLinkModel(config: ExperimentConfig, logger?: Logger): LoraLinkModel {
    return new LoraLinkModel({
        payloadBytes: config.payloadBytes,
        propagation: buildPropagation(config.propagation),
        collision: createCollisionModel(config.collision),
        energyProfile: config.energyProfile === 'active-cycle' ? ACTIVE_CYCLE_PROFILE : RADIO_ONLY_PROFILE,
        noiseFigureDb: config.noiseFigureDb,
        logger,
    });
}

interface DeviceSlot {
    agent: DeviceAgent;
    rng: SeededRandom;
    initialPosition: Position;
    walk?: RandomWalk;
}

// ==================== Driver ====================

/**
 * Run one experiment to completion
 *
 * @throws ConfigError for an invalid config
 * @throws UnknownPolicyError before any event runs if the algorithm is unknown
 */
export function runExperiment(config: ExperimentConfig, options: RunOptions = {}): RunReport {
    validateExperimentConfig(config);
    const logger = options.logger ?? new NullLogger();
    const space = new ArmSpace(effectiveArms(config));
    const makePolicy = (): SelectionPolicy => createPolicy(config.algorithm, space, config.policy);
    const shared = config.policySharing === 'shared' ? makePolicy() : undefined;

    const snapshot: Record<string, unknown> = JSON.parse(JSON.stringify(config));
    const manifest = createRunManifest({ experiment: config.experiment, seed: config.seed, config: snapshot });
    const linkModel = options.linkModel ?? buildLinkModel(config, logger);

    const root = createRng(config.seed);
    const placement = root.fork(PLACEMENT_STREAM);
    const mobileFrom = config.devices - Math.floor(config.devices * config.mobility.fraction);

    const slots: DeviceSlot[] = [];
    for (let id = 0; id < config.devices; id++) {
        const rng = root.fork(id);
        const initialPosition = uniformDiscPosition(config.radiusM, placement, GATEWAY_POSITION);
        slots.push({
            rng,
            initialPosition,
            walk: id >= mobileFrom
                ? new RandomWalk(initialPosition, config.mobility, root.fork(MOBILITY_STREAM_BASE + id))
                : undefined,
            agent: new DeviceAgent({
                deviceId: id,
                policy: shared ?? makePolicy(),
                linkModel,
                rng,
                payloadBytes: config.payloadBytes,
                meanIntervalS: config.meanIntervalS,
                jitterS: config.jitterS,
                stopTimeS: config.simulationTimeS,
                maxTransmissions: config.maxTransmissions,
                rewardConvention: config.policy.reward?.convention,
            }),
        });
    }

    logger.logEvent('info', 'Experiment started', {
        experiment: config.experiment,
        algorithm: config.algorithm,
        devices: config.devices,
        arms: space.size,
        configHash: manifest.configHash,
    });

    const aggregate = new RunAggregate();
    const scheduler = new EventScheduler();
    let airborne: AirborneTransmission[] = [];

    const cycle = (slot: DeviceSlot, timeS: number): void => {
        airborne = airborne.filter(tx => tx.endS > timeS);
        const position = slot.walk ? slot.walk.positionAt(timeS) : slot.initialPosition;
        const attempt = slot.agent.step(timeS, {
            position,
            gateway: GATEWAY_POSITION,
            offeredPackets: aggregate.packetsSent,
            concurrent: airborne,
        });
        aggregate.record(attempt);
        airborne.push({
            deviceId: attempt.deviceId,
            spreadingFactor: attempt.params.spreadingFactor,
            frequencyHz: attempt.params.frequencyHz,
            startS: timeS,
            endS: timeS + attempt.timeOnAirS,
        });
        logger.logTransmission({
            time: timeS,
            deviceId: attempt.deviceId,
            arm: formatTxParams(attempt.params),
            rssiDbm: attempt.rssiDbm,
            snrDb: attempt.snrDb,
            timeOnAirS: attempt.timeOnAirS,
            energyMj: attempt.energyMj,
            success: attempt.success,
            collided: attempt.collided,
            reward: attempt.reward,
        });
        if (attempt.nextTimeS !== undefined) {
            scheduler.schedule(attempt.nextTimeS, slot.agent.deviceId, t => cycle(slot, t));
        }
    };

    for (const slot of slots) {
        scheduler.schedule(slot.rng.uniform(0, 1), slot.agent.deviceId, t => cycle(slot, t));
    }
    const schedulerStats = scheduler.runUntil(config.simulationTimeS);

    const devices = slots.map((slot): DeviceReport => {
        slot.agent.stop();
        const totals = slot.agent.totals();
        logger.logDevice({
            deviceId: slot.agent.deviceId,
            policy: slot.agent.policy.name,
            packetsSent: totals.packetsSent,
            packetsReceived: totals.packetsReceived,
            pdr: slot.agent.pdr,
            energyMj: totals.energyMj,
            bitsDelivered: totals.bitsDelivered,
        });
        return {
            deviceId: slot.agent.deviceId,
            mobile: slot.walk !== undefined,
            initialPosition: slot.initialPosition,
            totals,
            pdr: slot.agent.pdr,
            policyCounters: shared ? undefined : slot.agent.policy.counters(),
        };
    });

    const summary = aggregate.summary();
    logger.logReport({
        policy: config.algorithm,
        devices: config.devices,
        packetsSent: summary.packetsSent,
        packetsReceived: summary.packetsReceived,
        pdr: summary.pdr,
        energyEfficiencyBitsPerJ: summary.energyEfficiencyBitsPerJ,
        avgTimeOnAirS: summary.avgTimeOnAirS,
        config: snapshot,
    });
    logger.flush();

    return {
        manifest,
        policy: config.algorithm,
        summary,
        armSelections: aggregate.armSelections(),
        lossSeries: aggregate.lossSeries(),
        devices,
        sharedPolicyCounters: shared?.counters(),
        scheduler: schedulerStats,
    };
}
