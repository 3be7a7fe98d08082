/**
 * @module bandits/composite
 * @description Selection policies over full transmission parameters
 *
 * `JointPolicy` runs one index policy over an explicit list of parameter
 * tuples. `PerDimensionPolicy` runs one index policy per learned dimension
 * and combines the picks; dimensions that are not learned stay at their
 * first listed value.
 */

import { ConfigError, ValidationError } from '../core/errors';
import { DIMENSIONS, formatTxParams, type Dimension, type TxParams } from '../models/phy/lora/types';
import type { ArmSpace } from './arm-space';
import type { RewardShaper } from './reward';
import type {
    IndexPolicy,
    PolicyCounters,
    SelectionContext,
    SelectionPolicy,
    TransmissionFeedback,
} from './types';

// ==================== Counting Base ====================

/**
 * Keeps the aggregate attempt/success counters every policy reports
 */
export abstract class CountingPolicy implements SelectionPolicy {
    abstract readonly name: string;
    private tally: PolicyCounters = { attempts: 0, successes: 0 };

    abstract select(ctx: SelectionContext): TxParams;

    update(params: TxParams, feedback: TransmissionFeedback, ctx: SelectionContext): void {
        this.tally.attempts++;
        if (feedback.success) this.tally.successes++;
        this.learn(params, feedback, ctx);
    }

    counters(): PolicyCounters {
        return { ...this.tally };
    }

    reset(): void {
        this.tally = { attempts: 0, successes: 0 };
        this.resetState();
    }

    /** Feed the outcome into the learning state; baselines leave this empty */
    protected abstract learn(params: TxParams, feedback: TransmissionFeedback, ctx: SelectionContext): void;

    protected abstract resetState(): void;
}

function armKey(params: TxParams): string {
    return `${params.spreadingFactor}|${params.bandwidthHz}|${params.frequencyHz}|${params.txPowerDbm}`;
}

// ==================== Joint ====================

export class JointPolicy extends CountingPolicy {
    readonly arms: readonly TxParams[];
    private readonly lookup = new Map<string, number>();

    constructor(
        readonly name: string,
        arms: readonly TxParams[],
        readonly inner: IndexPolicy,
        private readonly shaper: RewardShaper
    ) {
        super();
        if (arms.length !== inner.size) {
            throw new ConfigError('Index policy size does not match the arm list', {
                arms: arms.length,
                policy: inner.size,
            });
        }
        this.arms = arms.map(a => ({ ...a }));
        this.arms.forEach((arm, i) => {
            const key = armKey(arm);
            if (this.lookup.has(key)) {
                throw new ConfigError(`Duplicate arm ${formatTxParams(arm)}`);
            }
            this.lookup.set(key, i);
        });
    }

    select(ctx: SelectionContext): TxParams {
        return { ...this.arms[this.inner.selectIndex(ctx)] };
    }

    protected learn(params: TxParams, feedback: TransmissionFeedback, ctx: SelectionContext): void {
        const index = this.lookup.get(armKey(params));
        if (index === undefined) {
            throw new ValidationError(`Arm ${formatTxParams(params)} is not managed by policy ${this.name}`);
        }
        this.inner.updateIndex(index, {
            reward: this.shaper.joint(params, feedback),
            success: feedback.success,
            quality: feedback.qualityMw,
        }, ctx);
    }

    protected resetState(): void {
        this.inner.reset();
    }
}

// ==================== Per Dimension ====================

export type IndexPolicyFactory = (dim: Dimension, size: number) => IndexPolicy;

export class PerDimensionPolicy extends CountingPolicy {
    private readonly learners = new Map<Dimension, IndexPolicy>();

    constructor(
        readonly name: string,
        private readonly space: ArmSpace,
        learned: readonly Dimension[],
        factory: IndexPolicyFactory,
        private readonly shaper: RewardShaper
    ) {
        super();
        if (learned.length === 0) {
            throw new ConfigError('Per-dimension policy needs at least one learned dimension');
        }
        for (const dim of learned) {
            if (this.learners.has(dim)) {
                throw new ConfigError(`Dimension ${dim} listed twice`);
            }
            this.learners.set(dim, factory(dim, space.values(dim).length));
        }
    }

    /** Dimensions with their own learner, in canonical order */
    get dimensions(): Dimension[] {
        return DIMENSIONS.filter(dim => this.learners.has(dim));
    }

    /** Learner of one dimension */
    learner(dim: Dimension): IndexPolicy | undefined {
        return this.learners.get(dim);
    }

    select(ctx: SelectionContext): TxParams {
        const pick = (dim: Dimension): number => {
            const values = this.space.values(dim);
            const learner = this.learners.get(dim);
            return values[learner ? learner.selectIndex(ctx) : 0];
        };
        return {
            spreadingFactor: pick('spreadingFactor'),
            bandwidthHz: pick('bandwidthHz'),
            frequencyHz: pick('frequencyHz'),
            txPowerDbm: pick('txPowerDbm'),
        };
    }

    protected learn(params: TxParams, feedback: TransmissionFeedback, ctx: SelectionContext): void {
        for (const [dim, learner] of this.learners) {
            const index = this.space.values(dim).indexOf(params[dim]);
            if (index < 0) {
                throw new ValidationError(`Value ${params[dim]} is not in the ${dim} arm set`);
            }
            learner.updateIndex(index, {
                reward: this.shaper.forDimension(dim, params, feedback),
                success: feedback.success,
                quality: feedback.qualityMw,
            }, ctx);
        }
    }

    protected resetState(): void {
        for (const learner of this.learners.values()) {
            learner.reset();
        }
    }
}
