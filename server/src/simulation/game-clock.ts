import { GAME_DAY_SECONDS, GAME_HOUR_SECONDS } from '@hustle/shared';

/** In-game time source; all decay and deadline math reads this, never the wall clock. */
export interface TimeProvider {
  /** Game seconds since the simulation epoch */
  now(): number;
  advance(minutes: number): void;
}

export class GameClock implements TimeProvider {
  private seconds: number;

  constructor(startSeconds = 0) {
    this.seconds = Math.max(0, startSeconds);
  }

  now(): number {
    return this.seconds;
  }

  advance(minutes: number): void {
    this.advanceSeconds(minutes * 60);
  }

  advanceSeconds(seconds: number): void {
    // Monotonic: negative or NaN steps are dropped
    if (!(seconds > 0)) return;
    this.seconds += seconds;
  }

  /** Restore from a snapshot. Only moves forward. */
  set(seconds: number): void {
    if (seconds > this.seconds) this.seconds = seconds;
  }

  gameHours(): number {
    return this.seconds / GAME_HOUR_SECONDS;
  }

  gameDays(): number {
    return this.seconds / GAME_DAY_SECONDS;
  }
}
