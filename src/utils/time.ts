/**
 * Exact schedule time.
 *
 * Milliseconds since experiment start, held as an integer count of ticks
 * (10^6 ticks per millisecond). Thousands of small additions stay exact and
 * two plans built from the same inputs produce identical timestamps.
 */

const TICKS_PER_MS = 1_000_000n;
const FRACTION_DIGITS = 6;
const DECIMAL_PATTERN = /^(\d+)(?:\.(\d{1,6}))?$/;

export class TimeUnderflowError extends Error {
    constructor(message = 'Time value would be negative') {
        super(message);
        this.name = 'TimeUnderflowError';
    }
}

export type TimeComparison = -1 | 0 | 1;

export class Time {
    static readonly ZERO = new Time(0n);

    private constructor(readonly ticks: bigint) {}

    static fromTicks(ticks: bigint): Time {
        if (ticks < 0n) {
            throw new TimeUnderflowError(`Cannot create a negative time (${ticks} ticks)`);
        }
        return ticks === 0n ? Time.ZERO : new Time(ticks);
    }

    /**
     * Convert a millisecond number, rounding once to the nearest tick.
     * This is the only place a float enters the schedule.
     */
    static fromMs(ms: number): Time {
        if (!Number.isFinite(ms)) {
            throw new RangeError(`Time must be a finite number of milliseconds, got ${ms}`);
        }
        if (ms < 0) {
            throw new TimeUnderflowError(`Cannot create a negative time (${ms} ms)`);
        }
        return Time.fromTicks(BigInt(Math.round(ms * Number(TICKS_PER_MS))));
    }

    /** Parse a canonical decimal millisecond string such as "65" or "12.5". */
    static parse(text: string): Time {
        const match = DECIMAL_PATTERN.exec(text.trim());
        if (!match) {
            throw new RangeError(`Invalid time value "${text}"`);
        }
        const whole = BigInt(match[1]);
        const fraction = BigInt((match[2] ?? '').padEnd(FRACTION_DIGITS, '0'));
        return Time.fromTicks(whole * TICKS_PER_MS + fraction);
    }

    static max(first: Time, ...rest: Time[]): Time {
        return rest.reduce((latest, value) => (value.ticks > latest.ticks ? value : latest), first);
    }

    add(other: Time): Time {
        if (other.ticks === 0n) return this;
        return new Time(this.ticks + other.ticks);
    }

    sub(other: Time): Time {
        if (other.ticks > this.ticks) {
            throw new TimeUnderflowError(
                `Cannot subtract ${other.toString()} ms from ${this.toString()} ms`,
            );
        }
        return Time.fromTicks(this.ticks - other.ticks);
    }

    compare(other: Time): TimeComparison {
        if (this.ticks < other.ticks) return -1;
        if (this.ticks > other.ticks) return 1;
        return 0;
    }

    equals(other: Time): boolean {
        return this.ticks === other.ticks;
    }

    isBefore(other: Time): boolean {
        return this.ticks < other.ticks;
    }

    isAfter(other: Time): boolean {
        return this.ticks > other.ticks;
    }

    /** Approximate value for display and logging only. */
    toMs(): number {
        return Number(this.ticks) / Number(TICKS_PER_MS);
    }

    toString(): string {
        const whole = this.ticks / TICKS_PER_MS;
        const fraction = this.ticks % TICKS_PER_MS;
        if (fraction === 0n) {
            return whole.toString();
        }
        const digits = fraction.toString().padStart(FRACTION_DIGITS, '0').replace(/0+$/, '');
        return `${whole}.${digits}`;
    }

    toJSON(): string {
        return this.toString();
    }
}
