/**
 * @module core
 * @description Shared infrastructure for reproducible experiments
 *
 * ## Modules
 * - `scheduler`: deterministic discrete-event queue
 * - `logging`: structured transmission/device/report logging
 * - `repro`: seeded RNG, run manifests, config hashing
 * - `errors`: error types and codes
 */

// ==================== Scheduler ====================

export type {
    EventAction,
    EventHandle,
    SchedulerStats,
} from './scheduler';

export { EventScheduler } from './scheduler';

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    TransmissionLogEntry,
    DeviceLogEntry,
    ReportLogEntry,
    EventLogEntry,
    LogEntry,
    TransmissionLogInput,
    DeviceLogInput,
    ReportLogInput,
    Logger,
    LoggerConfig,
} from './logging';

export {
    ConsoleLogger,
    MemoryLogger,
    NullLogger,
    MultiLogger,
    createLogger,
} from './logging';

// ==================== Repro ====================

export type {
    RunManifest,
    RunManifestInput,
} from './repro';

export {
    LIBRARY_VERSION,
    createRunManifest,
    computeConfigHash,
    serializeManifest,
    sameExperiment,
    SeededRandom,
    createRng,
} from './repro';

// ==================== Errors ====================

export {
    ErrorCodes,
    LoraArmsError,
    ConfigError,
    UnknownPolicyError,
    ValidationError,
    AgentStoppedError,
    isLoraArmsError,
    hasErrorCode,
    wrapError,
    requireConfig,
} from './errors';

export type { ErrorCode } from './errors';
