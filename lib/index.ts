export {
    PlaybackSession,
    disposeSharedPlaybackSession,
    getSharedPlaybackSession,
    MAX_PLAYBACK_RATE,
    MIN_PLAYBACK_RATE,
} from "@/lib/playback-session";
export type {
    PlaybackRequestOutcome,
    PlaybackSessionOptions,
    PlaybackSnapshot,
    SnapshotListener,
    StandaloneSource,
} from "@/lib/playback-session";
export type { PlaybackPhase } from "@/lib/audio/playback-state-machine";
export {
    createPlayerAdapterFactory,
    resolvePlayerBackendKind,
    HowlerPlayerAdapter,
    createLocalFilePlayerAdapter,
    createStreamPlayerAdapter,
} from "@/lib/audio-engine";
export type {
    PlayerObserver,
    HowlFactory,
    HowlLike,
    PlayerAdapter,
    PlayerAdapterFactory,
    PlayerBackendKind,
    PlayerSource,
    StreamResolver,
} from "@/lib/audio-engine";
export { CatalogStreamResolver } from "@/lib/catalog/catalog-stream-resolver";
export { loadPlaybackConfig, type PlaybackConfig } from "@/lib/config";
export {
    ErrorCategory,
    ErrorCode,
    PlaybackError,
    isRecoverable,
    isTransient,
} from "@/lib/errors";
export { formatPlaybackTime } from "@/lib/format";
export { createLogger, logger, type Logger, type LogLevel } from "@/lib/logger";
export {
    MemoryKeyValueStorage,
    createStorageProgressSink,
    readListeningProgress,
    type KeyValueStorage,
    type ListeningProgressRecord,
    type ListeningProgressSink,
} from "@/lib/progress/listening-progress";
export {
    filterAudioTracks,
    toTrack,
    type Track,
} from "@shelfcast/media-contract";
