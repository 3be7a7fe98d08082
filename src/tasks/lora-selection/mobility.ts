/**
 * @module tasks/lora-selection/mobility
 * @description Device placement and bounded random-walk mobility
 */

import type { SeededRandom } from '../../core/repro';
import type { Position } from '../../models/phy/lora/types';
import type { MobilityConfig } from './config';

/**
 * Uniform point in a disc of `radiusM` around `center`
 */
export function uniformDiscPosition(radiusM: number, rng: SeededRandom, center: Position = { x: 0, y: 0 }): Position {
    const r = radiusM * Math.sqrt(rng.random());
    const theta = rng.uniform(0, 2 * Math.PI);
    return { x: center.x + r * Math.cos(theta), y: center.y + r * Math.sin(theta) };
}

function reflect(value: number, velocity: number, bound: number): [number, number] {
    let v = value;
    let dv = velocity;
    while (v > bound || v < -bound) {
        v = v > bound ? 2 * bound - v : -2 * bound - v;
        dv = -dv;
    }
    return [v, dv];
}

/**
 * Constant-speed walk that picks a new heading every `legDurationS` and
 * bounces off the walls of a square of half-width `boundM`.
 */
export class RandomWalk {
    private pos: Position;
    private vx = 0;
    private vy = 0;
    private clockS = 0;
    private legEndS: number;

    constructor(
        start: Position,
        private readonly config: Pick<MobilityConfig, 'speedMps' | 'legDurationS' | 'boundM'>,
        private readonly rng: SeededRandom
    ) {
        this.pos = { ...start };
        this.legEndS = config.legDurationS;
        this.turn();
    }

    /**
     * Position at `timeS`. Time only moves forward.
     */
    positionAt(timeS: number): Position {
        if (timeS < this.clockS) {
            throw new RangeError(`Random walk cannot go back in time (${timeS} < ${this.clockS})`);
        }
        const { boundM, legDurationS } = this.config;
        while (this.clockS < timeS) {
            const end = Math.min(timeS, this.legEndS);
            const dt = end - this.clockS;
            [this.pos.x, this.vx] = reflect(this.pos.x + this.vx * dt, this.vx, boundM);
            [this.pos.y, this.vy] = reflect(this.pos.y + this.vy * dt, this.vy, boundM);
            this.clockS = end;
            if (this.clockS >= this.legEndS) {
                this.legEndS += legDurationS;
                this.turn();
            }
        }
        return { ...this.pos };
    }

    private turn(): void {
        const heading = this.rng.uniform(0, 2 * Math.PI);
        this.vx = this.config.speedMps * Math.cos(heading);
        this.vy = this.config.speedMps * Math.sin(heading);
    }
}
