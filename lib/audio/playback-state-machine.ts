/**
 * Playback State Machine
 *
 * Tracks the phase of the resolve-and-play pipeline. The session's published
 * `phase` field derives from this.
 */

import { createLogger, type Logger } from "@/lib/logger";

export type PlaybackPhase =
  | 'IDLE'
  | 'RESOLVING'
  | 'STARTING'
  | 'PLAYING'
  | 'PAUSED'
  | 'COMPLETED';

export interface PhaseContext {
  phase: PlaybackPhase;
  previousPhase: PlaybackPhase | null;
  lastTransitionTime: number;
}

// Valid transitions - anything not listed is invalid
const VALID_TRANSITIONS: Record<PlaybackPhase, PlaybackPhase[]> = {
  IDLE: ['RESOLVING', 'PLAYING'],
  RESOLVING: ['RESOLVING', 'STARTING', 'PLAYING', 'PAUSED', 'COMPLETED', 'IDLE'],
  STARTING: ['PLAYING', 'PAUSED', 'COMPLETED', 'IDLE'],
  PLAYING: ['PAUSED', 'RESOLVING', 'COMPLETED', 'IDLE'],
  PAUSED: ['PLAYING', 'RESOLVING', 'COMPLETED', 'IDLE'],
  COMPLETED: ['RESOLVING', 'PLAYING', 'IDLE'],
};

export class PlaybackStateMachine {
  private context: PhaseContext = {
    phase: 'IDLE',
    previousPhase: null,
    lastTransitionTime: Date.now(),
  };

  private readonly log: Logger;

  constructor(log: Logger = createLogger('PlaybackStateMachine')) {
    this.log = log;
  }

  getPhase(): PlaybackPhase {
    return this.context.phase;
  }

  getContext(): Readonly<PhaseContext> {
    return { ...this.context };
  }

  canTransition(to: PlaybackPhase): boolean {
    return VALID_TRANSITIONS[this.context.phase].includes(to);
  }

  transition(to: PlaybackPhase): boolean {
    if (!this.canTransition(to)) {
      this.log.debug(`Invalid transition: ${this.context.phase} → ${to}`);
      return false;
    }

    this.apply(to);
    return true;
  }

  /**
   * Force transition - bypasses validation for teardown
   */
  forceTransition(to: PlaybackPhase): void {
    this.apply(to);
  }

  private apply(to: PlaybackPhase): void {
    const from = this.context.phase;
    if (from === to) {
      return;
    }

    this.context = {
      previousPhase: from,
      phase: to,
      lastTransitionTime: Date.now(),
    };
    this.log.debug(`${from} → ${to}`);
  }
}
