import { Clock } from '../../services/clock';

// Clock the tests move by hand
export class ManualClock implements Clock {
  private current: number;

  constructor(start: Date) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advanceHours(hours: number): void {
    this.current += hours * 60 * 60 * 1000;
  }
}
