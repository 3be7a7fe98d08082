/**
 * @module tasks/lora-selection/aggregate
 * @description Run-level accumulators
 *
 * Updated only from the attempts agents return; policies never see it.
 */

import { formatTxParams, type TxParams } from '../../models/phy/lora/types';
import { safeRatio } from '../../models/utils/statistics';
import type { DeviceTotals, TransmissionAttempt } from './agent';

// ==================== Types ====================

export interface ArmSelection {
    /** Label from `formatTxParams` */
    arm: string;
    params: TxParams;
    count: number;
    /** Share of all attempts */
    ratio: number;
}

export interface LossPoint {
    timeS: number;
    cumulativeLost: number;
}

export interface RunSummary {
    packetsSent: number;
    packetsReceived: number;
    packetsLost: number;
    collisions: number;
    pdr: number;
    energyMj: number;
    bitsDelivered: number;
    /** Bits delivered per joule consumed */
    energyEfficiencyBitsPerJ: number;
    avgTimeOnAirS: number;
    avgRssiDbm: number;
    avgSnrDb: number;
    /** Attempts that fell back to the default RSSI */
    degradedSamples: number;
}

// ==================== Aggregate ====================

export class RunAggregate {
    private sent = 0;
    private received = 0;
    private collided = 0;
    private degraded = 0;
    private energyMj = 0;
    private bits = 0;
    private airtimeS = 0;
    private rssiSum = 0;
    private snrSum = 0;
    private readonly arms = new Map<string, { params: TxParams; count: number }>();
    private readonly lossTimeline: LossPoint[] = [];
    private readonly perDevice = new Map<number, DeviceTotals>();

    /** Packets offered so far; fed to load-dependent collision models */
    get packetsSent(): number {
        return this.sent;
    }

    record(attempt: TransmissionAttempt): void {
        this.sent++;
        if (attempt.success) {
            this.received++;
        } else {
            this.lossTimeline.push({ timeS: attempt.timeS, cumulativeLost: this.sent - this.received });
        }
        if (attempt.collided) this.collided++;
        if (attempt.degraded) this.degraded++;
        this.energyMj += attempt.energyMj;
        this.bits += attempt.bitsDelivered;
        this.airtimeS += attempt.timeOnAirS;
        this.rssiSum += attempt.rssiDbm;
        this.snrSum += attempt.snrDb;

        const label = formatTxParams(attempt.params);
        const arm = this.arms.get(label);
        if (arm) {
            arm.count++;
        } else {
            this.arms.set(label, { params: { ...attempt.params }, count: 1 });
        }

        const device = this.perDevice.get(attempt.deviceId) ?? {
            packetsSent: 0,
            packetsReceived: 0,
            energyMj: 0,
            bitsDelivered: 0,
            airtimeS: 0,
        };
        device.packetsSent++;
        if (attempt.success) device.packetsReceived++;
        device.energyMj += attempt.energyMj;
        device.bitsDelivered += attempt.bitsDelivered;
        device.airtimeS += attempt.timeOnAirS;
        this.perDevice.set(attempt.deviceId, device);
    }

    /** Delivery ratio; 0 when nothing was sent */
    get pdr(): number {
        return safeRatio(this.received, this.sent);
    }

    get energyEfficiencyBitsPerJ(): number {
        return safeRatio(this.bits, this.energyMj / 1000);
    }

    /** Arms in order of first use */
    armSelections(): ArmSelection[] {
        return Array.from(this.arms, ([arm, { params, count }]) => ({
            arm,
            params: { ...params },
            count,
            ratio: safeRatio(count, this.sent),
        }));
    }

    /** One point per lost packet */
    lossSeries(): LossPoint[] {
        return this.lossTimeline.map(p => ({ ...p }));
    }

    /** Packets lost at or before `timeS` */
    lostBy(timeS: number): number {
        let lost = 0;
        for (const point of this.lossTimeline) {
            if (point.timeS > timeS) break;
            lost = point.cumulativeLost;
        }
        return lost;
    }

    /** Totals of one device; zeros if it never transmitted */
    device(deviceId: number): DeviceTotals {
        const totals = this.perDevice.get(deviceId);
        return totals
            ? { ...totals }
            : { packetsSent: 0, packetsReceived: 0, energyMj: 0, bitsDelivered: 0, airtimeS: 0 };
    }

    summary(): RunSummary {
        return {
            packetsSent: this.sent,
            packetsReceived: this.received,
            packetsLost: this.sent - this.received,
            collisions: this.collided,
            pdr: this.pdr,
            energyMj: this.energyMj,
            bitsDelivered: this.bits,
            energyEfficiencyBitsPerJ: this.energyEfficiencyBitsPerJ,
            avgTimeOnAirS: safeRatio(this.airtimeS, this.sent),
            avgRssiDbm: safeRatio(this.rssiSum, this.sent),
            avgSnrDb: safeRatio(this.snrSum, this.sent),
            degradedSamples: this.degraded,
        };
    }
}
