export interface Clock {
    /** Current time in unix seconds. */
    now(): number;
}

export const systemClock: Clock = {
    now: () => Math.floor(Date.now() / 1000),
};

export class ManualClock implements Clock {
    constructor(private current: number) {}

    now(): number {
        return this.current;
    }

    set(time: number): void {
        this.current = time;
    }

    advance(seconds: number): void {
        this.current += seconds;
    }
}
