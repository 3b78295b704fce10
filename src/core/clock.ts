export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Manually advanced clock for deterministic decay and ordering.
 */
export class ManualClock {
  private current: number;

  constructor(start: Date | string = '2026-01-01T09:00:00.000Z') {
    this.current = new Date(start).getTime();
  }

  readonly now: Clock = () => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }

  advanceHours(hours: number): void {
    this.advance(hours * 3_600_000);
  }

  set(date: Date | string): void {
    this.current = new Date(date).getTime();
  }
}
