/**
 * @module core/repro
 * @description Reproducibility helpers for experiments
 *
 * Seeded random streams, run manifests and canonical config hashing.
 */

// Library version recorded in every manifest; keep in step with package.json
export const LIBRARY_VERSION = '1.0.0';

// ==================== Hash ====================

/**
 * djb2 string hash
 */
function simpleHash(str: string): string {
    let hash = 5381;
    for (let i = 0; i < str.length; i++) {
        hash = ((hash << 5) + hash) ^ str.charCodeAt(i);
    }
    return (hash >>> 0).toString(16).padStart(8, '0');
}

/**
 * 128-bit style hash built from four chained djb2 rounds
 */
function createHash(data: string): string {
    const h1 = simpleHash(data);
    const h2 = simpleHash(data + h1);
    const h3 = simpleHash(h1 + data);
    const h4 = simpleHash(h2 + h3);
    return h1 + h2 + h3 + h4;
}

// ==================== Run Manifest ====================

/**
 * Everything needed to rerun an experiment bit-for-bit
 */
export interface RunManifest {
    /** Experiment name (preset or custom label) */
    experiment: string;
    /** Random seed */
    seed: number;
    /** Library version that produced the run */
    libraryVersion: string;
    /** Canonical hash of `config` */
    configHash: string;
    /** Timestamp when the manifest was created */
    createdAt: number;
    /** Full experiment configuration */
    config: Record<string, unknown>;
}

export interface RunManifestInput {
    experiment: string;
    seed: number;
    config: Record<string, unknown>;
}

/**
 * Create a manifest for a run
 */
export function createRunManifest(input: RunManifestInput): RunManifest {
    return {
        experiment: input.experiment,
        seed: input.seed,
        libraryVersion: LIBRARY_VERSION,
        configHash: computeConfigHash(input.config),
        createdAt: Date.now(),
        config: input.config,
    };
}

/**
 * Hash a configuration object independently of key order
 */
export function computeConfigHash(config: Record<string, unknown>): string {
    return createHash(JSON.stringify(sortObjectKeys(config)));
}

/**
 * Serialize a manifest to canonical JSON (sorted keys)
 */
export function serializeManifest(manifest: RunManifest): string {
    return JSON.stringify(sortObjectKeys(manifest), null, 2);
}

/**
 * Check whether two manifests describe the same experiment
 */
export function sameExperiment(a: RunManifest, b: RunManifest): boolean {
    return a.configHash === b.configHash && a.seed === b.seed;
}

// ==================== Seeded Random ====================

/**
 * Seeded random number generator (Mulberry32)
 *
 * Use this instead of Math.random() for reproducibility.
 */
export class SeededRandom {
    private state: number;
    private readonly seed: number;

    constructor(seed: number) {
        this.seed = seed >>> 0;
        this.state = this.seed;
    }

    /**
     * Generate a random float in [0, 1)
     */
    random(): number {
        this.state = (this.state + 0x6D2B79F5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /**
     * Generate a random integer in [min, max)
     */
    randint(min: number, max: number): number {
        return Math.floor(this.random() * (max - min)) + min;
    }

    /**
     * Generate a random float in [min, max)
     */
    uniform(min: number, max: number): number {
        return this.random() * (max - min) + min;
    }

    /**
     * Generate a random sample from a normal distribution
     */
    normal(mean: number = 0, std: number = 1): number {
        // Box-Muller transform; 1 - u keeps the log argument in (0, 1]
        const u1 = 1 - this.random();
        const u2 = this.random();
        const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
        return mean + std * z;
    }

    /**
     * Sample an exponential distribution with the given mean
     */
    exponential(mean: number): number {
        return -mean * Math.log(1 - this.random());
    }

    /**
     * True with probability p
     */
    bernoulli(p: number): boolean {
        return this.random() < p;
    }

    /**
     * Pick one element uniformly
     */
    choice<T>(items: readonly T[]): T {
        if (items.length === 0) {
            throw new RangeError('Cannot choose from an empty array');
        }
        return items[this.randint(0, items.length)];
    }

    /**
     * Derive an independent stream from this generator's seed.
     * The result depends only on the seed and `salt`, never on how many
     * numbers were drawn before.
     */
    fork(salt: number): SeededRandom {
        let h = Math.imul(this.seed ^ 0x85EBCA6B, 0xC2B2AE35);
        h = Math.imul(h ^ (salt + 1), 0x9E3779B1);
        h ^= h >>> 16;
        return new SeededRandom(h >>> 0);
    }

    /**
     * Get the current state (for saving/restoring)
     */
    getState(): number {
        return this.state;
    }

    /**
     * Set the state (for restoring)
     */
    setState(state: number): void {
        this.state = state >>> 0;
    }
}

/**
 * Create a seeded random number generator
 */
export function createRng(seed: number): SeededRandom {
    return new SeededRandom(seed);
}

// ==================== Utility Functions ====================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Sort object keys recursively for deterministic serialization
 */
function sortObjectKeys(obj: unknown): unknown {
    if (Array.isArray(obj)) {
        return obj.map(sortObjectKeys);
    }
    if (!isRecord(obj)) {
        return obj;
    }

    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(obj).sort()) {
        sorted[key] = sortObjectKeys(obj[key]);
    }
    return sorted;
}
