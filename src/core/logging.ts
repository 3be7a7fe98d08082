/**
 * @module core/logging
 * @description Structured run logging for reproducible experiments
 *
 * Every entry carries a fixed, versioned base schema. Transmission-level,
 * device-level and report-level entries are kept apart so that the
 * verbose transmission stream can be switched off independently.
 */

// ==================== Types ====================

/**
 * Log level for console output and diagnostic events
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Experiment identifier */
    task: string;
    /** Random seed for reproducibility */
    seed: number;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * One transmission attempt
 */
export interface TransmissionLogEntry extends BaseLogEntry {
    logType: 'transmission';
    /** Simulated time in seconds */
    time: number;
    deviceId: number;
    /** Human-readable arm label, e.g. "SF7/125k/868.1MHz/14dBm" */
    arm: string;
    rssiDbm: number;
    snrDb: number;
    timeOnAirS: number;
    energyMj: number;
    success: boolean;
    collided: boolean;
    reward: number;
}

/**
 * Per-device summary written at teardown
 */
export interface DeviceLogEntry extends BaseLogEntry {
    logType: 'device';
    deviceId: number;
    policy: string;
    packetsSent: number;
    packetsReceived: number;
    pdr: number;
    energyMj: number;
    bitsDelivered: number;
}

/**
 * Run summary
 */
export interface ReportLogEntry extends BaseLogEntry {
    logType: 'report';
    policy: string;
    devices: number;
    packetsSent: number;
    packetsReceived: number;
    pdr: number;
    energyEfficiencyBitsPerJ: number;
    avgTimeOnAirS: number;
    config: Record<string, unknown>;
}

/**
 * Diagnostic event (degradations, warnings)
 */
export interface EventLogEntry extends BaseLogEntry {
    logType: 'event';
    level: LogLevel;
    message: string;
    data?: Record<string, unknown>;
}

/**
 * Union of all log entry types
 */
export type LogEntry = TransmissionLogEntry | DeviceLogEntry | ReportLogEntry | EventLogEntry;

type EntryInput<T extends BaseLogEntry> = Omit<T, 'logType' | 'schemaVersion' | 'timestamp' | 'task' | 'seed'>;

export type TransmissionLogInput = EntryInput<TransmissionLogEntry>;
export type DeviceLogInput = EntryInput<DeviceLogEntry>;
export type ReportLogInput = EntryInput<ReportLogEntry>;

/**
 * Logger interface
 */
export interface Logger {
    /** Log one transmission attempt */
    logTransmission(entry: TransmissionLogInput): void;
    /** Log a per-device summary */
    logDevice(entry: DeviceLogInput): void;
    /** Log final report */
    logReport(entry: ReportLogInput): void;
    /** Log a diagnostic event */
    logEvent(level: LogLevel, message: string, data?: Record<string, unknown>): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Experiment name */
    task: string;
    /** Random seed */
    seed: number;
    /** Schema version */
    schemaVersion?: string;
    /** Minimum level printed / kept */
    level?: LogLevel;
    /** Whether transmission-level entries are kept (can be verbose) */
    logTransmissions?: boolean;
}

// ==================== Constants ====================

const DEFAULT_SCHEMA_VERSION = '1.0.0';

interface ResolvedLoggerConfig {
    task: string;
    seed: number;
    schemaVersion: string;
    level: LogLevel;
    logTransmissions: boolean;
}

function resolveConfig(config: LoggerConfig): ResolvedLoggerConfig {
    return {
        task: config.task,
        seed: config.seed,
        schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
        level: config.level ?? 'info',
        logTransmissions: config.logTransmissions ?? true,
    };
}

// ==================== Console Logger ====================

/**
 * Console Logger: print to console (for debugging and the CLI)
 */
export class ConsoleLogger implements Logger {
    private config: ResolvedLoggerConfig;

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'info') {
        if (typeof levelOrConfig === 'string') {
            this.config = resolveConfig({ task: 'unknown', seed: 0, level: levelOrConfig });
        } else {
            this.config = resolveConfig(levelOrConfig);
        }
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.config.level];
    }

    logTransmission(entry: TransmissionLogInput): void {
        if (this.config.logTransmissions && this.enabled('debug')) {
            console.log(
                `[TX] t=${entry.time.toFixed(3)} dev=${entry.deviceId} ${entry.arm} ` +
                `rssi=${entry.rssiDbm.toFixed(1)} snr=${entry.snrDb.toFixed(1)} ` +
                `ok=${entry.success}`
            );
        }
    }

    logDevice(entry: DeviceLogInput): void {
        if (this.enabled('info')) {
            console.log(
                `[DEVICE] ${entry.deviceId}: sent=${entry.packetsSent}, ` +
                `received=${entry.packetsReceived}, pdr=${(entry.pdr * 100).toFixed(1)}%`
            );
        }
    }

    logReport(entry: ReportLogInput): void {
        if (!this.enabled('info')) return;
        console.log(
            `[REPORT] ${entry.policy}: devices=${entry.devices}, ` +
            `PDR=${(entry.pdr * 100).toFixed(2)}%, ` +
            `EE=${entry.energyEfficiencyBitsPerJ.toFixed(2)} bits/J`
        );
    }

    logEvent(level: LogLevel, message: string, data?: Record<string, unknown>): void {
        if (!this.enabled(level)) return;
        const suffix = data ? ` ${JSON.stringify(data)}` : '';
        const line = `[${level.toUpperCase()}] ${message}${suffix}`;
        if (level === 'warn' || level === 'error') {
            console.warn(line);
        } else {
            console.log(line);
        }
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger ====================

/**
 * Memory Logger: store logs in memory.
 * Useful for testing and for post-processing a run in-process.
 */
export class MemoryLogger implements Logger {
    private config: ResolvedLoggerConfig;
    public transmissions: TransmissionLogEntry[] = [];
    public devices: DeviceLogEntry[] = [];
    public reports: ReportLogEntry[] = [];
    public events: EventLogEntry[] = [];

    constructor(config: LoggerConfig) {
        this.config = resolveConfig({ level: 'debug', ...config });
    }

    private createBaseEntry(): BaseLogEntry {
        return {
            schemaVersion: this.config.schemaVersion,
            task: this.config.task,
            seed: this.config.seed,
            timestamp: Date.now(),
        };
    }

    logTransmission(entry: TransmissionLogInput): void {
        if (!this.config.logTransmissions) return;
        this.transmissions.push({ ...this.createBaseEntry(), logType: 'transmission', ...entry });
    }

    logDevice(entry: DeviceLogInput): void {
        this.devices.push({ ...this.createBaseEntry(), logType: 'device', ...entry });
    }

    logReport(entry: ReportLogInput): void {
        this.reports.push({ ...this.createBaseEntry(), logType: 'report', ...entry });
    }

    logEvent(level: LogLevel, message: string, data?: Record<string, unknown>): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.config.level]) return;
        this.events.push({ ...this.createBaseEntry(), logType: 'event', level, message, data });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.transmissions, ...this.devices, ...this.reports, ...this.events];
    }

    /** Export to JSON string */
    toJSON(): string {
        return JSON.stringify({
            transmissions: this.transmissions,
            devices: this.devices,
            reports: this.reports,
            events: this.events,
        }, null, 2);
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.transmissions = [];
        this.devices = [];
        this.reports = [];
        this.events = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Null Logger ====================

/**
 * Discards everything
 */
export class NullLogger implements Logger {
    logTransmission(): void { /* discard */ }
    logDevice(): void { /* discard */ }
    logReport(): void { /* discard */ }
    logEvent(): void { /* discard */ }
    flush(): void { /* discard */ }
    close(): void { /* discard */ }
}

// ==================== Multi-Logger ====================

/**
 * Multi-Logger: write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    logTransmission(entry: TransmissionLogInput): void {
        for (const logger of this.loggers) {
            logger.logTransmission(entry);
        }
    }

    logDevice(entry: DeviceLogInput): void {
        for (const logger of this.loggers) {
            logger.logDevice(entry);
        }
    }

    logReport(entry: ReportLogInput): void {
        for (const logger of this.loggers) {
            logger.logReport(entry);
        }
    }

    logEvent(level: LogLevel, message: string, data?: Record<string, unknown>): void {
        for (const logger of this.loggers) {
            logger.logEvent(level, message, data);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger based on format
 */
export function createLogger(
    format: 'console' | 'memory' | 'null',
    config: LoggerConfig
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
        case 'null':
            return new NullLogger();
    }
}
