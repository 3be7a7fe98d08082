/**
 * @module core/scheduler
 * @description Deterministic discrete-event scheduler
 *
 * A single logical clock advanced by popping the earliest pending event.
 * Events at the same time are ordered by an explicit `order` key (the device
 * id in experiments) and then by insertion, so that runs with the same seed
 * replay identically. Nothing here is asynchronous.
 */

// ==================== Types ====================

/**
 * Action executed when an event fires. Receives the event time.
 */
export type EventAction = (time: number) => void;

/**
 * Opaque handle returned by `schedule`
 */
export interface EventHandle {
    readonly id: number;
    readonly time: number;
}

interface ScheduledEvent {
    id: number;
    time: number;
    order: number;
    seq: number;
    action: EventAction;
}

/**
 * Counters describing a completed `runUntil`
 */
export interface SchedulerStats {
    /** Events executed */
    executed: number;
    /** Events dropped because they were due at or after the stop time */
    dropped: number;
    /** Events cancelled before they fired */
    cancelled: number;
}

// ==================== Scheduler ====================

function precedes(a: ScheduledEvent, b: ScheduledEvent): boolean {
    if (a.time !== b.time) return a.time < b.time;
    if (a.order !== b.order) return a.order < b.order;
    return a.seq < b.seq;
}

/**
 * Discrete-event scheduler backed by a binary min-heap
 */
export class EventScheduler {
    private heap: ScheduledEvent[] = [];
    private cancelledIds = new Set<number>();
    private nextId = 0;
    private nextSeq = 0;
    private clock = 0;
    private stats: SchedulerStats = { executed: 0, dropped: 0, cancelled: 0 };

    /** Current logical time */
    get now(): number {
        return this.clock;
    }

    /** Number of pending (not cancelled) events */
    get pending(): number {
        return this.heap.length - this.cancelledIds.size;
    }

    /**
     * Schedule `action` at absolute time `time`.
     * Scheduling in the past is a programming error.
     */
    schedule(time: number, order: number, action: EventAction): EventHandle {
        if (!Number.isFinite(time) || time < this.clock) {
            throw new RangeError(`Cannot schedule event at ${time} (now ${this.clock})`);
        }
        const event: ScheduledEvent = {
            id: this.nextId++,
            time,
            order,
            seq: this.nextSeq++,
            action,
        };
        this.push(event);
        return { id: event.id, time };
    }

    /**
     * Drop a pending event. Returns false if it already fired or was cancelled.
     */
    cancel(handle: EventHandle): boolean {
        const inHeap = this.heap.some(e => e.id === handle.id);
        if (!inHeap || this.cancelledIds.has(handle.id)) return false;
        this.cancelledIds.add(handle.id);
        return true;
    }

    /**
     * Execute events in order while their time is strictly before `stopTime`.
     * Remaining events are discarded and the clock is left at `stopTime`.
     */
    runUntil(stopTime: number): SchedulerStats {
        while (this.heap.length > 0) {
            const head = this.heap[0];
            if (head.time >= stopTime) break;
            this.pop();
            if (this.cancelledIds.delete(head.id)) {
                this.stats.cancelled++;
                continue;
            }
            this.clock = head.time;
            this.stats.executed++;
            head.action(head.time);
        }

        for (const event of this.heap) {
            if (this.cancelledIds.has(event.id)) {
                this.stats.cancelled++;
            } else {
                this.stats.dropped++;
            }
        }
        this.heap = [];
        this.cancelledIds.clear();
        this.clock = Math.max(this.clock, stopTime);
        return { ...this.stats };
    }

    // ==================== Heap ====================

    private push(event: ScheduledEvent): void {
        const heap = this.heap;
        heap.push(event);
        let i = heap.length - 1;
        while (i > 0) {
            const parent = (i - 1) >> 1;
            if (!precedes(heap[i], heap[parent])) break;
            [heap[i], heap[parent]] = [heap[parent], heap[i]];
            i = parent;
        }
    }

    private pop(): void {
        const heap = this.heap;
        const last = heap.pop();
        if (last === undefined || heap.length === 0) return;
        heap[0] = last;
        let i = 0;
        for (;;) {
            const left = 2 * i + 1;
            const right = left + 1;
            let smallest = i;
            if (left < heap.length && precedes(heap[left], heap[smallest])) smallest = left;
            if (right < heap.length && precedes(heap[right], heap[smallest])) smallest = right;
            if (smallest === i) break;
            [heap[i], heap[smallest]] = [heap[smallest], heap[i]];
            i = smallest;
        }
    }
}
