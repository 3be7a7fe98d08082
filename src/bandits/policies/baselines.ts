/**
 * @module bandits/policies/baselines
 * @description Non-learning index baselines
 */

import { ConfigError } from '../../core/errors';
import type { IndexPolicy, SelectionContext } from '../types';

function checkSize(size: number, name: string): void {
    if (!Number.isInteger(size) || size < 1) {
        throw new ConfigError(`${name} needs at least one arm`, { size });
    }
}

/**
 * Fixed Policy: device `d` always uses arm `d mod K`
 */
export class FixedIndexPolicy implements IndexPolicy {
    readonly name = 'fixed';

    constructor(readonly size: number) {
        checkSize(size, this.name);
    }

    selectIndex(ctx: SelectionContext): number {
        return ctx.deviceId % this.size;
    }

    updateIndex(): void {
        // No state to update
    }

    reset(): void {
        // No state to reset
    }
}

/**
 * Round-Robin Policy: each device cycles through the arms, starting at `d mod K`
 */
export class RoundRobinIndexPolicy implements IndexPolicy {
    readonly name = 'round-robin';
    private turns = new Map<number, number>();

    constructor(readonly size: number) {
        checkSize(size, this.name);
    }

    selectIndex(ctx: SelectionContext): number {
        const turn = this.turns.get(ctx.deviceId) ?? 0;
        this.turns.set(ctx.deviceId, turn + 1);
        return (ctx.deviceId + turn) % this.size;
    }

    updateIndex(): void {
        // Selection does not depend on outcomes
    }

    reset(): void {
        this.turns.clear();
    }
}

/**
 * Random Policy: uniform draw from the device's random stream
 */
export class RandomIndexPolicy implements IndexPolicy {
    readonly name = 'random';

    constructor(readonly size: number) {
        checkSize(size, this.name);
    }

    selectIndex(ctx: SelectionContext): number {
        return ctx.rng.randint(0, this.size);
    }

    updateIndex(): void {
        // Selection does not depend on outcomes
    }

    reset(): void {
        // No state to reset
    }
}
