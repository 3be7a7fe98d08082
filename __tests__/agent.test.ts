/**
 * Device Agent Tests
 * Decision cycle, scheduling and stop conditions
 */

import { describe, it, expect } from 'vitest';
import { AgentStoppedError, ConfigError, ErrorCodes } from '../src/core/errors';
import { createRng } from '../src/core/repro';
import { ArmSpace } from '../src/bandits/arm-space';
import { createPolicy } from '../src/bandits/registry';
import { DeviceAgent, type DeviceAgentOptions, type StepInput, type TransmissionAttempt } from '../src/tasks/lora-selection/agent';
import { ScriptedLinkModel, channelSpace } from './test-utils';

const GATEWAY = { x: 0, y: 0 };
const INPUT: StepInput = { gateway: GATEWAY, offeredPackets: 0, concurrent: [] };

function makeAgent(overrides: Partial<DeviceAgentOptions> = {}): DeviceAgent {
    return new DeviceAgent({
        deviceId: 0,
        policy: createPolicy('ucb1', channelSpace(3)),
        linkModel: new ScriptedLinkModel(params => params.frequencyHz === 868100000),
        rng: createRng(1),
        payloadBytes: 20,
        meanIntervalS: 4,
        stopTimeS: 1e6,
        ...overrides,
    });
}

/**
 * Step the agent until it stops on its own
 */
function runToCompletion(agent: DeviceAgent, input: StepInput = INPUT): TransmissionAttempt[] {
    const attempts: TransmissionAttempt[] = [];
    let next: number | undefined = 0;
    while (next !== undefined) {
        const attempt = agent.step(next, input);
        attempts.push(attempt);
        next = attempt.nextTimeS;
    }
    return attempts;
}

describe('DeviceAgent', () => {
    it('should converge on the only working channel', () => {
        const agent = makeAgent({ maxTransmissions: 10 });
        const attempts = runToCompletion(agent);
        const channels = attempts.map(a => (a.params.frequencyHz - 868100000) / 200000);
        expect(channels.map(Math.round)).toEqual([0, 1, 2, 0, 0, 0, 0, 0, 0, 0]);
        expect(attempts.map(a => a.reward)).toEqual([1, 0, 0, 1, 1, 1, 1, 1, 1, 1]);
    });

    it('should report the success indicator by default whatever the energy', () => {
        const agent = makeAgent({
            linkModel: new ScriptedLinkModel(params => params.frequencyHz === 868100000, 0.05, 4),
            maxTransmissions: 4,
            rewardConvention: undefined,
        });
        const attempts = runToCompletion(agent);
        expect(attempts.map(a => a.reward)).toEqual([1, 0, 0, 1]);
    });

    it('should report inverse energy when configured', () => {
        const agent = makeAgent({
            linkModel: new ScriptedLinkModel(params => params.frequencyHz === 868100000, 0.05, 4),
            maxTransmissions: 4,
            rewardConvention: 'inverse-energy',
        });
        const attempts = runToCompletion(agent);
        expect(attempts.map(a => a.reward)).toEqual([0.25, 0, 0, 0.25]);
    });

    it('should keep running totals', () => {
        const agent = makeAgent({ maxTransmissions: 10 });
        runToCompletion(agent);
        const totals = agent.totals();
        expect(totals.packetsSent).toBe(10);
        expect(totals.packetsReceived).toBe(8);
        expect(totals.bitsDelivered).toBe(1280);
        expect(totals.energyMj).toBe(10);
        expect(totals.airtimeS).toBeCloseTo(0.5, 12);
        expect(agent.pdr).toBeCloseTo(0.8, 12);
        expect(agent.policy.counters()).toEqual({ attempts: 10, successes: 8 });
    });

    it('should stop once the transmission budget is spent', () => {
        const agent = makeAgent({ maxTransmissions: 3 });
        expect(agent.state).toBe('idle');
        const attempts = runToCompletion(agent);
        expect(attempts).toHaveLength(3);
        expect(attempts[2].nextTimeS).toBeUndefined();
        expect(agent.state).toBe('stopped');
        expect(() => agent.step(100, INPUT)).toThrow(AgentStoppedError);
        expect(() => agent.step(100, INPUT)).toThrow(expect.objectContaining({ code: ErrorCodes.AGENT_STOPPED }));
    });

    it('should draw the interval once and reuse it', () => {
        const agent = makeAgent({ maxTransmissions: 5 });
        expect(agent.interval).toBeUndefined();
        const attempts = runToCompletion(agent);
        const interval = createRng(1).exponential(4);
        expect(agent.interval).toBe(interval);
        for (const attempt of attempts.slice(0, 4)) {
            expect(attempt.nextTimeS).toBe(attempt.timeS + interval);
        }
    });

    it('should add jitter within its bound', () => {
        const agent = makeAgent({ maxTransmissions: 20, jitterS: 0.5 });
        const attempts = runToCompletion(agent);
        const interval = agent.interval ?? NaN;
        for (const attempt of attempts.slice(0, 19)) {
            const extra = (attempt.nextTimeS ?? NaN) - attempt.timeS - interval;
            expect(extra).toBeGreaterThanOrEqual(-1e-9);
            expect(extra).toBeLessThan(0.5);
        }
    });

    it('should stop when the next cycle falls after the stop time', () => {
        const agent = makeAgent({ stopTimeS: 50 });
        const attempts = runToCompletion(agent);
        expect(attempts.length).toBeGreaterThan(0);
        for (const attempt of attempts) {
            expect(attempt.timeS).toBeLessThan(50);
        }
        expect(attempts[attempts.length - 1].nextTimeS).toBeUndefined();
        expect(agent.state).toBe('stopped');
    });

    it('should refuse a step at or after the stop time', () => {
        const agent = makeAgent({ stopTimeS: 5 });
        expect(() => agent.step(5, INPUT)).toThrow(AgentStoppedError);
        expect(agent.state).toBe('stopped');
        expect(agent.totals().packetsSent).toBe(0);
    });

    it('should pass the gateway distance to the policy', () => {
        const space = new ArmSpace({
            spreadingFactors: [7, 8, 9, 10, 11, 12],
            bandwidthsHz: [125000],
            frequenciesHz: [868100000],
            txPowersDbm: [14],
        });
        const link = new ScriptedLinkModel(() => true);
        const agent = makeAgent({ policy: createPolicy('adr', space), linkModel: link, maxTransmissions: 1 });
        const attempt = agent.step(0, { ...INPUT, position: { x: 300, y: 400 } });
        expect(attempt.params.spreadingFactor).toBe(8);
        expect(link.calls[0].ctx.position).toEqual({ x: 300, y: 400 });
    });

    it('should report zero PDR before transmitting', () => {
        expect(makeAgent().pdr).toBe(0);
    });

    it('should feed a shared policy from several agents', () => {
        const policy = createPolicy('ucb1', channelSpace(3));
        const a = makeAgent({ deviceId: 0, policy, maxTransmissions: 2 });
        const b = makeAgent({ deviceId: 1, policy, maxTransmissions: 3 });
        runToCompletion(a);
        runToCompletion(b);
        expect(policy.counters().attempts).toBe(5);
    });

    it('should reject bad options', () => {
        expect(() => makeAgent({ meanIntervalS: 0 })).toThrow(ConfigError);
        expect(() => makeAgent({ jitterS: -1 })).toThrow(ConfigError);
        expect(() => makeAgent({ maxTransmissions: 0 })).toThrow(ConfigError);
    });
});
