/**
 * @module bandits/policies/ladder
 * @description ADR-Lite binary search over a power ladder
 *
 * Arms are listed from the weakest to the strongest configuration. The
 * search starts at the strongest; a success halves the index, a failure
 * moves it halfway towards the top.
 */

import { ConfigError } from '../../core/errors';
import type { ArmObservation, IndexPolicy } from '../types';

export function ladderAfterSuccess(index: number): number {
    return Math.floor(index / 2);
}

export function ladderAfterFailure(index: number, length: number): number {
    return Math.min(length - 1, Math.floor((index + length) / 2));
}

export class AdrLitePolicy implements IndexPolicy {
    readonly name = 'adr-lite';
    readonly size: number;
    private index: number;

    constructor(size: number) {
        if (!Number.isInteger(size) || size < 1) {
            throw new ConfigError('ADR-Lite ladder must contain at least one arm', { size });
        }
        this.size = size;
        this.index = size - 1;
    }

    /** Current ladder position */
    get position(): number {
        return this.index;
    }

    selectIndex(): number {
        return this.index;
    }

    updateIndex(_arm: number, observation: ArmObservation): void {
        this.index = observation.success
            ? ladderAfterSuccess(this.index)
            : ladderAfterFailure(this.index, this.size);
    }

    reset(): void {
        this.index = this.size - 1;
    }
}
