export interface Clock {
    now(): Date;
}

export const systemClock: Clock = {
    now: () => new Date(),
};

/** A clock that only moves when told to. */
export class ManualClock implements Clock {
    private current: Date;

    constructor(start: Date = new Date()) {
        this.current = new Date(start.getTime());
    }

    now(): Date {
        return new Date(this.current.getTime());
    }

    set(date: Date): void {
        this.current = new Date(date.getTime());
    }

    advance(ms: number): void {
        this.current = new Date(this.current.getTime() + ms);
    }
}
