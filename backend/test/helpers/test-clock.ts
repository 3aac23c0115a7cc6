/**
 * Controllable wall clock for token expiry + timestamp assertions.
 * Shared by the app (`now`) and InMemCache (`clockMs`).
 */
export class TestClock {
  private current: Date;

  constructor(start: Date | string = '2026-01-15T09:00:00.000Z') {
    this.current = new Date(start);
  }

  readonly now = (): Date => new Date(this.current.getTime());

  readonly nowMs = (): number => this.current.getTime();

  advanceSeconds(seconds: number): void {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }

  advanceMinutes(minutes: number): void {
    this.advanceSeconds(minutes * 60);
  }
}
