/**
 * Playback Session
 *
 * Process-wide owner of the one live player adapter. Every way of starting
 * audio goes through `installAdapter`, which tears the previous adapter down
 * first, so at most one adapter is active at any time.
 *
 * Queue playback resolves tracks asynchronously. Each request carries a
 * generation token; a resolution that comes back after a newer request,
 * a direct stream start or a stop is discarded before it can touch state.
 */

import { filterAudioTracks, type Track } from "@shelfcast/media-contract";
import { PlaybackGeneration } from "@/lib/audio/playback-generation";
import { PlaybackQueue } from "@/lib/audio/playback-queue";
import {
    PlaybackStateMachine,
    type PlaybackPhase,
} from "@/lib/audio/playback-state-machine";
import {
    PlaybackTimeSampler,
    type IntervalScheduler,
    type TimeSample,
} from "@/lib/audio/time-sampler";
import { createPlayerAdapterFactory } from "@/lib/audio-engine";
import type {
    PlayerAdapter,
    PlayerAdapterFactory,
    PlayerObserver,
    PlayerSource,
    StreamResolver,
} from "@/lib/audio-engine/types";
import { CatalogStreamResolver } from "@/lib/catalog/catalog-stream-resolver";
import { loadPlaybackConfig } from "@/lib/config";
import {
    ErrorCategory,
    ErrorCode,
    PlaybackError,
    toPlaybackError,
} from "@/lib/errors";
import { clampPlaybackFraction } from "@/lib/format";
import { createLogger, type Logger } from "@/lib/logger";
import type { ListeningProgressSink } from "@/lib/progress/listening-progress";

export const MIN_PLAYBACK_RATE = 0.5;
export const MAX_PLAYBACK_RATE = 3;

export interface PlaybackSnapshot {
    readonly phase: PlaybackPhase;
    readonly isPlaying: boolean;
    readonly title: string;
    /** Display identifier, used for artwork lookup. */
    readonly identifier: string;
    readonly currentTrack: Track | null;
    readonly queue: readonly Track[];
    readonly cursor: number;
    readonly hasPrevious: boolean;
    readonly hasNext: boolean;
    readonly hasActivePlayer: boolean;
    readonly positionSec: number;
    readonly durationSec: number;
    readonly playbackRate: number;
}

export type SnapshotListener = (snapshot: PlaybackSnapshot) => void;

export type PlaybackRequestOutcome =
    | { status: "started"; title: string }
    | { status: "superseded" }
    | { status: "failed"; error: PlaybackError }
    | { status: "rejected"; error: PlaybackError };

export interface StandaloneSource extends PlayerSource {
    title: string;
    identifier?: string;
}

export interface PlaybackSessionOptions {
    resolver: StreamResolver;
    createAdapter: PlayerAdapterFactory;
    progressSink?: ListeningProgressSink;
    logger?: Logger;
    /** Position sampling interval while a player is active (default 100ms). */
    timeSampleIntervalMs?: number;
    /** Minimum gap between throttled progress records (default 5000ms). */
    progressIntervalMs?: number;
    /** Default skip distance for skipForward/skipBackward (default 15s). */
    skipIntervalSec?: number;
    scheduleInterval?: IntervalScheduler;
    now?: () => number;
}

type AdapterOrigin = "queue" | "direct";

interface InstallRequest {
    title: string;
    identifier: string;
    track: Track | null;
    origin: AdapterOrigin;
}

const clampPlaybackRate = (rate: number): number => {
    if (!Number.isFinite(rate)) return 1;
    return Math.max(MIN_PLAYBACK_RATE, Math.min(MAX_PLAYBACK_RATE, rate));
};

const SNAPSHOT_KEYS = [
    "phase",
    "isPlaying",
    "title",
    "identifier",
    "currentTrack",
    "queue",
    "cursor",
    "hasPrevious",
    "hasNext",
    "hasActivePlayer",
    "positionSec",
    "durationSec",
    "playbackRate",
] as const satisfies ReadonlyArray<keyof PlaybackSnapshot>;

const snapshotsEqual = (a: PlaybackSnapshot, b: PlaybackSnapshot): boolean =>
    SNAPSHOT_KEYS.every((key) => Object.is(a[key], b[key]));

export class PlaybackSession {
    private readonly resolver: StreamResolver;
    private readonly createAdapter: PlayerAdapterFactory;
    private readonly progressSink: ListeningProgressSink | null;
    private readonly log: Logger;
    private readonly progressIntervalMs: number;
    private readonly skipIntervalSec: number;
    private readonly now: () => number;

    private readonly queue = new PlaybackQueue();
    private readonly machine: PlaybackStateMachine;
    private readonly generation = new PlaybackGeneration();
    private readonly sampler: PlaybackTimeSampler;
    private readonly listeners = new Set<SnapshotListener>();

    private adapter: PlayerAdapter | null = null;
    private completionObserver: PlayerObserver | null = null;
    private errorObserver: PlayerObserver | null = null;
    private adapterOrigin: AdapterOrigin | null = null;
    private isPlaying = false;
    private finished = false;
    private title = "";
    private identifier = "";
    private currentTrack: Track | null = null;
    private positionSec = 0;
    private durationSec = 0;
    private playbackRate = 1;
    private lastProgressAt = 0;
    private snapshot: PlaybackSnapshot;

    constructor(options: PlaybackSessionOptions) {
        this.resolver = options.resolver;
        this.createAdapter = options.createAdapter;
        this.progressSink = options.progressSink ?? null;
        this.log = options.logger ?? createLogger("PlaybackSession");
        this.progressIntervalMs = options.progressIntervalMs ?? 5000;
        this.skipIntervalSec = options.skipIntervalSec ?? 15;
        this.now = options.now ?? Date.now;
        this.machine = new PlaybackStateMachine(this.log.child("Phase"));
        this.sampler = new PlaybackTimeSampler(
            {
                read: () => this.readSample(),
                onSample: (sample) => this.handleSample(sample),
            },
            options.timeSampleIntervalMs ?? 100,
            options.scheduleInterval,
        );
        this.snapshot = this.buildSnapshot();
    }

    getSnapshot(): PlaybackSnapshot {
        return this.snapshot;
    }

    /**
     * Calls `listener` with the current snapshot right away and after every
     * change. Returns the unsubscribe function.
     */
    subscribe(listener: SnapshotListener): () => void {
        this.listeners.add(listener);
        this.deliver(listener, this.snapshot);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * Installs `adapter` as the only live player and starts it. Any previous
     * adapter is torn down first and pending resolutions are discarded. The
     * queue is left as it is.
     */
    startStream(
        adapter: PlayerAdapter,
        title: string,
        identifier = "",
    ): PlaybackRequestOutcome {
        this.generation.invalidate();
        return this.startAdapter(adapter, {
            title,
            identifier,
            track: null,
            origin: "direct",
        });
    }

    /**
     * Plays a standalone source (audiobook file, radio URL) outside the queue.
     * Clears the queue like any other stop.
     */
    playSource(source: StandaloneSource): PlaybackRequestOutcome {
        this.stopAll();

        let adapter: PlayerAdapter;
        try {
            adapter = this.createAdapter(source);
        } catch (error) {
            return this.failRequest(
                toPlaybackError(
                    error,
                    ErrorCode.PLAYER_CONSTRUCTION_FAILED,
                    `Could not open ${source.location}`,
                ),
            );
        }

        return this.startAdapter(adapter, {
            title: source.title,
            identifier: source.identifier ?? "",
            track: null,
            origin: "direct",
        });
    }

    stopAll(): void {
        this.log.debug("Stopping all playback");
        this.generation.invalidate();
        this.teardownAdapter();

        this.queue.clear();
        this.isPlaying = false;
        this.finished = false;
        this.clearDisplay();

        this.machine.forceTransition("IDLE");
        this.publish();
    }

    pause(): void {
        const adapter = this.adapter;
        if (!adapter) return;

        if (!this.callAdapter("pause", () => adapter.pause())) return;
        this.isPlaying = false;
        this.positionSec = this.readSample().positionSec;
        this.emitProgress(true);
        if (this.machine.getPhase() === "PLAYING") {
            this.setPhase("PAUSED");
        }
        this.publish();
    }

    resume(): void {
        const adapter = this.adapter;
        if (!adapter) return;

        if (!this.callAdapter("resume", () => adapter.play())) return;
        this.isPlaying = true;
        if (this.machine.getPhase() === "PAUSED") {
            this.setPhase("PLAYING");
        }
        this.publish();
    }

    togglePlayPause(): void {
        if (this.isPlaying) {
            this.pause();
        } else {
            this.resume();
        }
    }

    setQueue(tracks: readonly Track[], startIndex = 0): void {
        this.queue.replace(tracks, startIndex);
        this.publish();
    }

    addToQueue(track: Track): void {
        this.queue.append(track);
        this.publish();
    }

    /**
     * Resolves and plays the track under the cursor. State for the request
     * (phase RESOLVING, new generation) is written before this returns its
     * promise.
     */
    async playCurrent(): Promise<PlaybackRequestOutcome> {
        const track = this.queue.current();
        if (!track) {
            const error = new PlaybackError(
                ErrorCode.INVALID_QUEUE_POSITION,
                ErrorCategory.RECOVERABLE,
                `Invalid track index ${this.queue.position}`,
                { cursor: this.queue.position, length: this.queue.length },
            );
            this.log.warn(error.message, { code: error.code });
            this.publish();
            return { status: "rejected", error };
        }

        const token = this.generation.issue();
        this.log.info(
            `Playing track ${this.queue.position + 1} of ${this.queue.length}: ${track.title}`,
        );
        this.setPhase("RESOLVING");
        this.publish();

        let location: string | null;
        try {
            location = await this.resolver.resolve(track);
        } catch (error) {
            if (this.generation.isStale(token)) {
                return this.supersede(track);
            }
            return this.failRequest(
                toPlaybackError(
                    error,
                    ErrorCode.RESOLUTION_FAILED,
                    `Failed to get streaming URL for ${track.title}`,
                ),
            );
        }

        if (this.generation.isStale(token)) {
            return this.supersede(track);
        }

        if (!location) {
            return this.failRequest(
                new PlaybackError(
                    ErrorCode.RESOLUTION_FAILED,
                    ErrorCategory.RECOVERABLE,
                    `Failed to get streaming URL for ${track.title}`,
                    { trackId: track.id, identifier: track.identifier },
                ),
            );
        }

        this.setPhase("STARTING");
        let adapter: PlayerAdapter;
        try {
            adapter = this.createAdapter({ location });
        } catch (error) {
            return this.failRequest(
                toPlaybackError(
                    error,
                    ErrorCode.PLAYER_CONSTRUCTION_FAILED,
                    `Could not open stream for ${track.title}`,
                ),
            );
        }

        return this.startAdapter(adapter, {
            title: track.title,
            identifier: track.identifier,
            track,
            origin: "queue",
        });
    }

    playPrevious(): Promise<PlaybackRequestOutcome> {
        if (!this.queue.stepBack()) {
            return Promise.resolve(this.rejectNavigation("No previous track"));
        }
        return this.playCurrent();
    }

    playNext(): Promise<PlaybackRequestOutcome> {
        if (!this.queue.stepForward()) {
            return Promise.resolve(this.rejectNavigation("No next track"));
        }
        return this.playCurrent();
    }

    /**
     * Queues the audio items of `allTracks` and plays `track` from within them.
     */
    startTrackInContext(
        track: Track,
        allTracks: readonly Track[],
    ): Promise<PlaybackRequestOutcome> {
        const audioTracks = filterAudioTracks(allTracks);
        this.log.debug(
            `Setting up queue with ${audioTracks.length} items from ${allTracks.length} total items`,
        );

        const index = audioTracks.findIndex((candidate) => candidate.id === track.id);
        if (index < 0) {
            const error = new PlaybackError(
                ErrorCode.TRACK_NOT_FOUND,
                ErrorCategory.RECOVERABLE,
                `Could not find ${track.title} among playable items`,
                { trackId: track.id },
            );
            this.log.warn(error.message, { code: error.code });
            return Promise.resolve({ status: "rejected", error });
        }

        this.queue.replace(audioTracks, index);
        return this.playCurrent();
    }

    seek(toSec: number): void {
        const adapter = this.adapter;
        if (!adapter || !Number.isFinite(toSec)) return;

        const duration = this.readSample().durationSec;
        let target = Math.max(0, toSec);
        if (duration > 0) {
            target = Math.min(target, duration);
        }

        if (!this.callAdapter("seek", () => adapter.seek(target))) return;
        this.positionSec = target;
        this.durationSec = duration;
        this.publish();
    }

    /** Seeks to a fraction of the duration; ignored while the duration is unknown. */
    seekToFraction(fraction: number): void {
        if (!this.adapter) return;

        const duration = this.readSample().durationSec;
        if (duration <= 0) {
            this.log.debug("Seek ignored, duration unknown");
            return;
        }
        this.seek(clampPlaybackFraction(fraction) * duration);
    }

    skipForward(seconds = this.skipIntervalSec): void {
        if (!this.adapter) return;
        this.seek(this.readSample().positionSec + seconds);
    }

    skipBackward(seconds = this.skipIntervalSec): void {
        if (!this.adapter) return;
        this.seek(Math.max(0, this.readSample().positionSec - seconds));
    }

    /** Remembered across tracks; applied to the current and every later adapter. */
    setPlaybackRate(rate: number): void {
        this.playbackRate = clampPlaybackRate(rate);
        const adapter = this.adapter;
        if (adapter) {
            this.callAdapter("rate change", () => adapter.setRate(this.playbackRate));
        }
        this.publish();
    }

    dispose(): void {
        this.stopAll();
        this.listeners.clear();
    }

    private startAdapter(
        adapter: PlayerAdapter,
        request: InstallRequest,
    ): PlaybackRequestOutcome {
        const error = this.installAdapter(adapter, request);
        if (error) {
            return this.failRequest(error);
        }
        return { status: "started", title: request.title };
    }

    /**
     * Makes `adapter` the live player and starts it. When the adapter throws
     * while being wired up it is released again and nothing is left playing.
     */
    private installAdapter(
        adapter: PlayerAdapter,
        request: InstallRequest,
    ): PlaybackError | null {
        this.teardownAdapter();

        this.adapter = adapter;
        this.adapterOrigin = request.origin;
        let durationSec = 0;
        try {
            this.completionObserver = adapter.onCompletion(() =>
                this.handleCompletion(adapter),
            );
            this.errorObserver = adapter.onError((error) =>
                this.handleAdapterError(adapter, error),
            );
            adapter.setRate(this.playbackRate);
            durationSec = adapter.getDuration();
            this.log.info(`Starting stream for ${request.title}`);
            adapter.play();
        } catch (error) {
            this.clearDisplay();
            this.teardownAdapter();
            return toPlaybackError(
                error,
                ErrorCode.PLAYER_CONSTRUCTION_FAILED,
                `Could not start ${request.title}`,
            );
        }

        this.title = request.title;
        this.identifier = request.identifier;
        this.currentTrack = request.track;
        this.positionSec = 0;
        this.durationSec = durationSec;
        this.lastProgressAt = this.now();
        this.isPlaying = true;
        this.finished = false;

        this.setPhase("PLAYING");
        this.sampler.start();
        this.publish();
        return null;
    }

    /**
     * Releases the current adapter: final progress record, observers removed,
     * paused, released. Display fields are left to the caller. Adapter
     * failures are logged; the session always ends up without a player.
     */
    private teardownAdapter(): void {
        this.sampler.stop();

        const adapter = this.adapter;
        if (!adapter) {
            return;
        }

        const sample = this.readSample();
        this.positionSec = sample.positionSec;
        this.durationSec = sample.durationSec;
        this.emitProgress(true);

        const observers = [this.completionObserver, this.errorObserver];
        this.completionObserver = null;
        this.errorObserver = null;
        this.adapter = null;
        this.adapterOrigin = null;
        this.isPlaying = false;

        observers.forEach((observer) => {
            this.callAdapter("observer removal", () => observer?.remove());
        });
        this.callAdapter("pause", () => adapter.pause());
        try {
            adapter.release();
        } catch (error) {
            this.log.error("Failed to release player", error);
        }
    }

    private clearDisplay(): void {
        this.title = "";
        this.identifier = "";
        this.currentTrack = null;
        this.positionSec = 0;
        this.durationSec = 0;
    }

    /** Runs one adapter call, logging instead of throwing when it fails. */
    private callAdapter(action: string, call: () => void): boolean {
        try {
            call();
            return true;
        } catch (error) {
            this.log.warn(`Player ${action} failed`, error);
            return false;
        }
    }

    /** A newer request is resolving or starting its player. */
    private hasPendingRequest(): boolean {
        const phase = this.machine.getPhase();
        return phase === "RESOLVING" || phase === "STARTING";
    }

    private handleCompletion(adapter: PlayerAdapter): void {
        if (adapter !== this.adapter) {
            return;
        }

        const origin = this.adapterOrigin;
        this.log.info(`Finished ${this.title}`);
        this.teardownAdapter();

        // The pending request already chose what plays next.
        if (this.hasPendingRequest()) {
            this.publish();
            return;
        }

        this.finished = true;
        this.setPhase("COMPLETED");
        this.publish();

        if (origin !== "queue") {
            return;
        }

        if (!this.queue.hasNext) {
            this.log.info("Reached the end of the queue");
            return;
        }

        void this.playNext().then(
            (outcome) => {
                this.log.debug(`Auto-advance ${outcome.status}`);
            },
            (error: unknown) => {
                this.log.error("Auto-advance failed", error);
            },
        );
    }

    private handleAdapterError(adapter: PlayerAdapter, error: PlaybackError): void {
        if (adapter !== this.adapter) {
            return;
        }

        this.log.warn(`Playback of ${this.title} failed: ${error.message}`, {
            code: error.code,
        });
        this.teardownAdapter();
        if (!this.hasPendingRequest()) {
            this.setPhase(this.restingPhase());
        }
        this.publish();
    }

    private supersede(track: Track): PlaybackRequestOutcome {
        this.log.debug(`Discarding stale resolution for ${track.title}`, {
            code: ErrorCode.STALE_RESOLUTION,
        });
        return { status: "superseded" };
    }

    private failRequest(error: PlaybackError): PlaybackRequestOutcome {
        this.log.warn(error.message, { code: error.code });
        this.setPhase(this.restingPhase());
        this.publish();
        return { status: "failed", error };
    }

    private rejectNavigation(message: string): PlaybackRequestOutcome {
        this.log.debug(message);
        return {
            status: "rejected",
            error: new PlaybackError(
                ErrorCode.INVALID_QUEUE_POSITION,
                ErrorCategory.RECOVERABLE,
                message,
                { cursor: this.queue.position, length: this.queue.length },
            ),
        };
    }

    private restingPhase(): PlaybackPhase {
        if (!this.adapter) {
            return this.finished ? "COMPLETED" : "IDLE";
        }
        return this.isPlaying ? "PLAYING" : "PAUSED";
    }

    private setPhase(to: PlaybackPhase): void {
        const from = this.machine.getPhase();
        if (from === to) {
            return;
        }
        if (!this.machine.transition(to)) {
            this.log.warn(`Unexpected phase change ${from} → ${to}`);
            this.machine.forceTransition(to);
        }
    }

    private readSample(): TimeSample {
        const last = { positionSec: this.positionSec, durationSec: this.durationSec };
        const adapter = this.adapter;
        if (!adapter) {
            return last;
        }
        try {
            return {
                positionSec: adapter.getCurrentTime(),
                durationSec: adapter.getDuration(),
            };
        } catch (error) {
            this.log.debug("Could not read player time", error);
            return last;
        }
    }

    private handleSample(sample: TimeSample): void {
        this.positionSec = sample.positionSec;
        this.durationSec = sample.durationSec;
        if (this.isPlaying) {
            this.emitProgress(false);
        }
        this.publish();
    }

    /** Fire-and-forget; sink failures are logged and never reach the session. */
    private emitProgress(force: boolean): void {
        const sink = this.progressSink;
        if (!sink || !this.adapter || !this.identifier || this.positionSec <= 0) {
            return;
        }

        const now = this.now();
        if (!force && now - this.lastProgressAt < this.progressIntervalMs) {
            return;
        }
        this.lastProgressAt = now;

        const record = {
            identifier: this.identifier,
            title: this.title,
            positionSec: this.positionSec,
            durationSec: this.durationSec,
            updatedAt: new Date(now).toISOString(),
        };
        void Promise.resolve()
            .then(() => sink.record(record))
            .catch((error: unknown) => {
                this.log.warn("Failed to record listening progress", {
                    identifier: record.identifier,
                    error,
                });
            });
    }

    private buildSnapshot(): PlaybackSnapshot {
        const queue = this.queue.getSnapshot();
        return Object.freeze({
            phase: this.machine.getPhase(),
            isPlaying: this.isPlaying,
            title: this.title,
            identifier: this.identifier,
            currentTrack: this.currentTrack,
            queue: queue.tracks,
            cursor: queue.cursor,
            hasPrevious: queue.hasPrevious,
            hasNext: queue.hasNext,
            hasActivePlayer: this.adapter !== null,
            positionSec: this.positionSec,
            durationSec: this.durationSec,
            playbackRate: this.playbackRate,
        });
    }

    private publish(): void {
        const next = this.buildSnapshot();
        if (snapshotsEqual(this.snapshot, next)) {
            return;
        }
        this.snapshot = next;
        for (const listener of [...this.listeners]) {
            // A listener that changed the session has already published a newer snapshot.
            if (this.snapshot !== next) {
                return;
            }
            this.deliver(listener, next);
        }
    }

    private deliver(listener: SnapshotListener, snapshot: PlaybackSnapshot): void {
        try {
            listener(snapshot);
        } catch (error) {
            this.log.error("Listener error", error);
        }
    }
}

let sharedPlaybackSession: PlaybackSession | null = null;

/**
 * The process-wide session, built on first use from the environment
 * configuration, the catalog resolver and the Howler backends. `overrides`
 * only apply to that first call.
 */
export const getSharedPlaybackSession = (
    overrides: Partial<PlaybackSessionOptions> = {},
): PlaybackSession => {
    if (!sharedPlaybackSession) {
        const config = loadPlaybackConfig();
        sharedPlaybackSession = new PlaybackSession({
            resolver:
                overrides.resolver ??
                new CatalogStreamResolver({
                    baseUrl: config.catalogBaseUrl,
                    timeoutMs: config.catalogTimeoutMs,
                }),
            createAdapter: overrides.createAdapter ?? createPlayerAdapterFactory(),
            timeSampleIntervalMs: config.timeSampleIntervalMs,
            progressIntervalMs: config.progressIntervalMs,
            skipIntervalSec: config.skipIntervalSec,
            ...overrides,
        });
    }
    return sharedPlaybackSession;
};

export const disposeSharedPlaybackSession = (): void => {
    sharedPlaybackSession?.dispose();
    sharedPlaybackSession = null;
};
