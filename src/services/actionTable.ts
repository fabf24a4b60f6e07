import type {
    ActionEntry,
    ActionPayload,
    ActionSchedule,
} from '@/types/actionTable';
import type { ResourceHandle } from '@/types/devices';
import { ActionOrderError } from '@/utils/schedulingErrors';
import { Time } from '@/utils/time';

/**
 * Busy time of a resource after an entry; `previous` is the entry before it
 * on the same resource.
 */
export type BusyDurationResolver = (entry: ActionEntry, previous: ActionEntry | null) => Time;

interface ResourceHistory {
    last: ActionEntry;
    previous: ActionEntry | null;
}

const noBusyTime: BusyDurationResolver = () => Time.ZERO;

/**
 * Stable timestamp order for handoff; equal timestamps keep append order.
 */
export const compareForHandoff = (a: ActionEntry, b: ActionEntry): number =>
    a.timestamp.compare(b.timestamp) || a.sequence - b.sequence;

export const sortForHandoff = (entries: readonly ActionEntry[]): ActionEntry[] =>
    [...entries].sort(compareForHandoff);

/**
 * Append-only ledger of timed hardware commands.
 *
 * Entries for one resource never go back in time. Entries for different
 * resources may interleave in any order; `toSchedule()` sorts them.
 */
export class ActionTable {
    private readonly log: ActionEntry[] = [];

    private readonly history = new Map<string, ResourceHistory>();

    private latest = Time.ZERO;

    constructor(private readonly resolveBusyDuration: BusyDurationResolver = noBusyTime) {}

    public get size(): number {
        return this.log.length;
    }

    /** Latest timestamp in the table, zero when empty. */
    public get endTime(): Time {
        return this.latest;
    }

    public append(timestamp: Time, target: ResourceHandle, payload: ActionPayload): ActionEntry {
        const record = this.history.get(target.id);
        if (record && timestamp.isBefore(record.last.timestamp)) {
            throw new ActionOrderError(target.id, timestamp, record.last.timestamp);
        }

        const entry: ActionEntry = Object.freeze({
            timestamp,
            target: Object.freeze({ ...target }),
            payload: Object.freeze({ ...payload }),
            sequence: this.log.length,
        });

        this.log.push(entry);
        this.history.set(target.id, { last: entry, previous: record?.last ?? null });
        this.latest = Time.max(this.latest, timestamp);
        return entry;
    }

    public lastEntryFor(target: ResourceHandle): ActionEntry | null {
        return this.history.get(target.id)?.last ?? null;
    }

    /**
     * Earliest time a new command may be issued to `target`: its last entry
     * plus that entry's busy duration, or zero if it has none.
     */
    public earliestAvailable(target: ResourceHandle): Time {
        const record = this.history.get(target.id);
        if (!record) {
            return Time.ZERO;
        }
        return record.last.timestamp.add(this.resolveBusyDuration(record.last, record.previous));
    }

    /** Entries in append order. */
    public entries(): readonly ActionEntry[] {
        return Object.freeze([...this.log]);
    }

    public entriesFor(target: ResourceHandle): ActionEntry[] {
        return this.log.filter((entry) => entry.target.id === target.id);
    }

    /**
     * Frozen snapshot for the executor, globally sorted by timestamp.
     */
    public toSchedule(): ActionSchedule {
        return Object.freeze({
            entries: Object.freeze(sortForHandoff(this.log)),
            duration: this.latest,
        });
    }
}
