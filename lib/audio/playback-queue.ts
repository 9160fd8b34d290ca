/**
 * Ordered playback queue with a cursor. Insertion order is playback order.
 */

import type { Track } from "@shelfcast/media-contract";

export interface PlaybackQueueSnapshot {
    tracks: readonly Track[];
    cursor: number;
    hasPrevious: boolean;
    hasNext: boolean;
}

const EMPTY_TRACKS: readonly Track[] = Object.freeze([]);

const freezeTrack = (track: Track): Track =>
    Object.isFrozen(track) ? track : Object.freeze({ ...track });

export class PlaybackQueue {
    private tracks: readonly Track[] = EMPTY_TRACKS;
    private cursor = 0;
    private previousAvailable = false;
    private nextAvailable = false;

    /** Replaces the queue wholesale. `startIndex` is stored even when out of range. */
    replace(tracks: readonly Track[], startIndex = 0): void {
        this.tracks = Object.freeze(tracks.map(freezeTrack));
        this.cursor = startIndex;
        this.recompute();
    }

    append(track: Track): void {
        this.tracks = Object.freeze([...this.tracks, freezeTrack(track)]);
        this.recompute();
    }

    clear(): void {
        this.tracks = EMPTY_TRACKS;
        this.cursor = 0;
        this.recompute();
    }

    /** Moves the cursor back one slot; returns false when there is no previous track. */
    stepBack(): boolean {
        if (!this.previousAvailable) {
            return false;
        }
        this.cursor -= 1;
        this.recompute();
        return true;
    }

    /** Moves the cursor forward one slot; returns false when there is no next track. */
    stepForward(): boolean {
        if (!this.nextAvailable) {
            return false;
        }
        this.cursor += 1;
        this.recompute();
        return true;
    }

    isCursorInBounds(): boolean {
        return this.cursor >= 0 && this.cursor < this.tracks.length;
    }

    current(): Track | null {
        return this.isCursorInBounds() ? this.tracks[this.cursor] : null;
    }

    get length(): number {
        return this.tracks.length;
    }

    get position(): number {
        return this.cursor;
    }

    get hasPrevious(): boolean {
        return this.previousAvailable;
    }

    get hasNext(): boolean {
        return this.nextAvailable;
    }

    getSnapshot(): PlaybackQueueSnapshot {
        return {
            tracks: this.tracks,
            cursor: this.cursor,
            hasPrevious: this.previousAvailable,
            hasNext: this.nextAvailable,
        };
    }

    private recompute(): void {
        this.previousAvailable = this.cursor > 0;
        this.nextAvailable = this.cursor < this.tracks.length - 1;
    }
}
