/**
 * @module bandits/arm-space
 * @description Ordered arm sets for the four LoRa dimensions
 *
 * Joint arms are the Cartesian product with spreading factor outermost and
 * transmit power innermost.
 */

import { ConfigError } from '../core/errors';
import { DIMENSIONS, type Dimension, type TxParams } from '../models/phy/lora/types';

export interface ArmSetConfig {
    spreadingFactors: number[];
    bandwidthsHz: number[];
    frequenciesHz: number[];
    txPowersDbm: number[];
}

const DIMENSION_KEYS: Record<Dimension, keyof ArmSetConfig> = {
    spreadingFactor: 'spreadingFactors',
    bandwidthHz: 'bandwidthsHz',
    frequencyHz: 'frequenciesHz',
    txPowerDbm: 'txPowersDbm',
};

export class ArmSpace {
    private readonly sets: Readonly<Record<Dimension, readonly number[]>>;

    constructor(config: ArmSetConfig) {
        const sets: Record<Dimension, number[]> = {
            spreadingFactor: [],
            bandwidthHz: [],
            frequencyHz: [],
            txPowerDbm: [],
        };
        for (const dim of DIMENSIONS) {
            const key = DIMENSION_KEYS[dim];
            const values = config[key];
            if (values.length === 0) {
                throw new ConfigError(`Arm set ${key} must not be empty`);
            }
            if (values.some(v => !Number.isFinite(v))) {
                throw new ConfigError(`Arm set ${key} contains a non-finite value`, { [key]: values });
            }
            if (new Set(values).size !== values.length) {
                throw new ConfigError(`Arm set ${key} contains duplicates`, { [key]: values });
            }
            sets[dim] = [...values];
        }
        this.sets = sets;
    }

    values(dim: Dimension): readonly number[] {
        return this.sets[dim];
    }

    get size(): number {
        return DIMENSIONS.reduce((n, dim) => n * this.sets[dim].length, 1);
    }

    /**
     * Joint arm at `index`
     */
    at(index: number): TxParams {
        if (!Number.isInteger(index) || index < 0 || index >= this.size) {
            throw new RangeError(`Joint arm index out of range: ${index}`);
        }
        let rest = index;
        const picked: Record<Dimension, number> = {
            spreadingFactor: 0,
            bandwidthHz: 0,
            frequencyHz: 0,
            txPowerDbm: 0,
        };
        for (let d = DIMENSIONS.length - 1; d >= 0; d--) {
            const dim = DIMENSIONS[d];
            const values = this.sets[dim];
            picked[dim] = values[rest % values.length];
            rest = Math.floor(rest / values.length);
        }
        return picked;
    }

    /**
     * Joint index of `params`, or -1 if any value is outside the sets
     */
    indexOf(params: TxParams): number {
        let index = 0;
        for (const dim of DIMENSIONS) {
            const values = this.sets[dim];
            const i = values.indexOf(params[dim]);
            if (i < 0) return -1;
            index = index * values.length + i;
        }
        return index;
    }

    all(): TxParams[] {
        return Array.from({ length: this.size }, (_, i) => this.at(i));
    }

    /**
     * Copy with one dimension pinned to a single value
     */
    pin(dim: Dimension, value: number): ArmSpace {
        return new ArmSpace({ ...this.toJSON(), [DIMENSION_KEYS[dim]]: [value] });
    }

    toJSON(): ArmSetConfig {
        return {
            spreadingFactors: [...this.sets.spreadingFactor],
            bandwidthsHz: [...this.sets.bandwidthHz],
            frequenciesHz: [...this.sets.frequencyHz],
            txPowersDbm: [...this.sets.txPowerDbm],
        };
    }
}
