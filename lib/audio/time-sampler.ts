/**
 * Playback Time Sampler
 *
 * Polls the active player's position and duration on a fixed interval and
 * hands each sample to the session. Runs only while a player is active.
 */

export interface TimeSample {
  positionSec: number;
  durationSec: number;
}

export interface TimeSamplerCallbacks {
  /** Read the current sample from the player */
  read: () => TimeSample;
  /** Receive a sample */
  onSample: (sample: TimeSample) => void;
}

/** Schedules `callback` every `ms` and returns a function that cancels it. */
export type IntervalScheduler = (callback: () => void, ms: number) => () => void;

export const scheduleInterval: IntervalScheduler = (callback, ms) => {
  const handle = setInterval(callback, ms);
  return () => clearInterval(handle);
};

export class PlaybackTimeSampler {
  private cancelInterval: (() => void) | null = null;
  private isRunning = false;

  constructor(
    private readonly callbacks: TimeSamplerCallbacks,
    private readonly intervalMs: number,
    private readonly schedule: IntervalScheduler = scheduleInterval,
  ) {}

  /**
   * Start sampling; takes one sample immediately.
   */
  start(): void {
    if (this.isRunning) return;

    this.isRunning = true;
    this.cancelInterval = this.schedule(() => this.tick(), this.intervalMs);
    this.tick();
  }

  stop(): void {
    if (!this.isRunning) return;

    this.isRunning = false;
    this.cancelInterval?.();
    this.cancelInterval = null;
  }

  get sampling(): boolean {
    return this.isRunning;
  }

  private tick(): void {
    if (!this.isRunning) return;
    this.callbacks.onSample(this.callbacks.read());
  }
}
