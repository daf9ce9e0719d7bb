import { Clock } from '../../src/utils/clock';

export const START_TIME = '2026-01-15T12:00:00.000Z';

/**
 * Manually advanced clock
 */
export class TestClock {
  private current: number;

  constructor(start: string = START_TIME) {
    this.current = new Date(start).getTime();
  }

  readonly now: Clock = () => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }

  advanceMinutes(minutes: number): void {
    this.advance(minutes * 60_000);
  }
}
