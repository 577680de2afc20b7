export interface ClockPort {
  nowMs(): number;
  nowIso(): string;
}

export class SystemClock implements ClockPort {
  nowMs(): number {
    return Date.now();
  }

  nowIso(): string {
    return new Date(this.nowMs()).toISOString();
  }
}

/** Clock pinned to one instant; used by tests and the reference server. */
export class FixedClock implements ClockPort {
  constructor(private readonly iso: string) {}

  nowMs(): number {
    return Date.parse(this.iso);
  }

  nowIso(): string {
    return this.iso;
  }
}
