import type { Clock } from "@strikehouse/matching";

export class ManualClock implements Clock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }
}
