import type { Track } from "@shelfcast/media-contract";
import type { PlaybackError } from "@/lib/errors";

export type PlayerBackendKind = "stream" | "local-file";

/**
 * Handle for an end-of-track or error registration. Owned by the adapter
 * that issued it; removing it twice is a no-op.
 */
export interface PlayerObserver {
  remove(): void;
}

/**
 * Wraps one concrete media engine instance. Every backend exposes the same
 * semantics; an adapter plays exactly one source and is discarded after
 * `release()`.
 */
export interface PlayerAdapter {
  readonly kind: PlayerBackendKind;
  play(): void;
  pause(): void;
  seek(timeSec: number): void;
  getCurrentTime(): number;
  /** Duration in seconds, or 0 while unknown. */
  getDuration(): number;
  setRate(rate: number): void;
  onCompletion(callback: () => void): PlayerObserver;
  /** Load and playback failures reported after construction. */
  onError(callback: (error: PlaybackError) => void): PlayerObserver;
  release(): void;
}

export interface PlayerSource {
  /** Remote URL, `file:` URL or local path. */
  location: string;
  mimeType?: string;
  format?: string;
}

export type PlayerAdapterFactory = (source: PlayerSource) => PlayerAdapter;

/**
 * Turns a track reference into a playable location. Single shot, no retry;
 * `null` means the track cannot be played right now.
 */
export interface StreamResolver {
  resolve(track: Track): Promise<string | null>;
}
