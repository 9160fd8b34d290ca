import { existsSync } from "node:fs";
import { fileURLToPath, pathToFileURL } from "node:url";
import { Howl, type HowlOptions } from "howler";
import type {
  PlayerObserver,
  PlayerAdapter,
  PlayerBackendKind,
  PlayerSource,
} from "@/lib/audio-engine/types";
import { ErrorCategory, ErrorCode, PlaybackError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

const log = createLogger("HowlerPlayerAdapter");

const MIME_TYPE_FORMAT_MAP: Record<string, string> = {
  "audio/aac": "aac",
  "audio/flac": "flac",
  "audio/mp3": "mp3",
  "audio/mp4": "mp4",
  "audio/mpeg": "mp3",
  "audio/ogg": "ogg",
  "audio/opus": "opus",
  "audio/wav": "wav",
  "audio/webm": "webm",
  "audio/x-flac": "flac",
  "audio/x-wav": "wav",
  "application/ogg": "ogg",
};

const FILE_EXTENSION_FORMAT_MAP: Record<string, string> = {
  aac: "aac",
  flac: "flac",
  m4a: "mp4",
  mp3: "mp3",
  mp4: "mp4",
  ogg: "ogg",
  opus: "opus",
  wav: "wav",
  webm: "webm",
};

/**
 * The slice of Howler's `Howl` the adapter drives. Tests hand in fakes.
 */
export interface HowlLike {
  play(): unknown;
  pause(): unknown;
  stop(): unknown;
  seek(position?: number): unknown;
  duration(): number;
  state(): "unloaded" | "loading" | "loaded";
  rate(rate: number): unknown;
  on(event: "end", callback: () => void): unknown;
  off(event: "end", callback: () => void): unknown;
  unload(): unknown;
}

export type HowlFactory = (options: HowlOptions) => HowlLike;

export interface HowlerPlayerAdapterOptions {
  createHowl?: HowlFactory;
}

export interface LocalFilePlayerAdapterOptions extends HowlerPlayerAdapterOptions {
  fileExists?: (path: string) => boolean;
}

const defaultHowlFactory: HowlFactory = (options) => new Howl(options);

export const inferFormatFromUrl = (url: string): string | undefined => {
  const withoutQuery = url.split(/[?#]/, 1)[0];
  const dotIndex = withoutQuery.lastIndexOf(".");
  if (dotIndex < 0 || dotIndex === withoutQuery.length - 1) {
    return undefined;
  }

  const extension = withoutQuery.slice(dotIndex + 1).toLowerCase();
  return FILE_EXTENSION_FORMAT_MAP[extension];
};

export const resolveFormat = (source: PlayerSource): string | undefined => {
  const explicitFormat = source.format?.trim().toLowerCase();
  if (explicitFormat) {
    return explicitFormat;
  }

  const mimeType = source.mimeType?.trim().toLowerCase();
  if (mimeType && MIME_TYPE_FORMAT_MAP[mimeType]) {
    return MIME_TYPE_FORMAT_MAP[mimeType];
  }

  return inferFormatFromUrl(source.location);
};

export const isRemoteLocation = (location: string): boolean =>
  /^https?:\/\//i.test(location.trim());

/**
 * PlayerAdapter over a single Howl instance. The stream and local-file
 * backends differ only in how the Howl is configured.
 */
export class HowlerPlayerAdapter implements PlayerAdapter {
  private readonly howl: HowlLike;
  private readonly completionHandlers = new Set<() => void>();
  private readonly errorHandlers = new Set<(error: PlaybackError) => void>();
  private released = false;

  constructor(
    readonly kind: PlayerBackendKind,
    howl: HowlLike,
  ) {
    this.howl = howl;
  }

  play(): void {
    if (this.released) return;
    this.howl.play();
  }

  pause(): void {
    if (this.released) return;
    this.howl.pause();
  }

  seek(timeSec: number): void {
    if (this.released) return;
    this.howl.seek(Math.max(0, timeSec));
  }

  // Howler only tracks position and duration once the source has loaded.
  getCurrentTime(): number {
    if (this.released || this.howl.state() !== "loaded") return 0;
    const position = this.howl.seek();
    return typeof position === "number" && Number.isFinite(position)
      ? position
      : 0;
  }

  getDuration(): number {
    if (this.released || this.howl.state() !== "loaded") return 0;
    const duration = this.howl.duration();
    return Number.isFinite(duration) && duration > 0 ? duration : 0;
  }

  setRate(rate: number): void {
    if (this.released) return;
    this.howl.rate(rate);
  }

  onCompletion(callback: () => void): PlayerObserver {
    const handler = () => callback();
    this.completionHandlers.add(handler);
    this.howl.on("end", handler);

    return {
      remove: () => {
        if (!this.completionHandlers.delete(handler)) {
          return;
        }
        this.howl.off("end", handler);
      },
    };
  }

  onError(callback: (error: PlaybackError) => void): PlayerObserver {
    const handler = (error: PlaybackError) => callback(error);
    this.errorHandlers.add(handler);
    return {
      remove: () => {
        this.errorHandlers.delete(handler);
      },
    };
  }

  reportError(error: PlaybackError): void {
    if (this.released) return;
    [...this.errorHandlers].forEach((handler) => handler(error));
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.errorHandlers.clear();
    this.completionHandlers.forEach((handler) => {
      this.howl.off("end", handler);
    });
    this.completionHandlers.clear();
    this.howl.stop();
    this.howl.unload();
  }

  isReleased(): boolean {
    return this.released;
  }
}

const toPlaybackFailure = (
  stage: "Load" | "Play",
  src: string,
  error: unknown,
): PlaybackError =>
  new PlaybackError(
    ErrorCode.PLAYBACK_FAILED,
    ErrorCategory.TRANSIENT,
    `${stage} error for ${src}`,
    { src, error },
  );

const buildHowlOptions = (
  src: string,
  html5: boolean,
  format: string | undefined,
  onError: (error: PlaybackError) => void,
): HowlOptions => ({
  src: [src],
  html5,
  preload: true,
  autoplay: false,
  ...(format ? { format: [format] } : {}),
  onloaderror: (_soundId: number, error: unknown) => {
    log.warn("Load error", { src, error });
    onError(toPlaybackFailure("Load", src, error));
  },
  onplayerror: (_soundId: number, error: unknown) => {
    log.warn("Play error", { src, error });
    onError(toPlaybackFailure("Play", src, error));
  },
});

/**
 * Howler reads its error callbacks from the options it was built with, so
 * they forward to the adapter once it exists.
 */
const openHowlAdapter = (
  kind: PlayerBackendKind,
  createHowl: HowlFactory,
  src: string,
  html5: boolean,
  format: string | undefined,
): HowlerPlayerAdapter => {
  let adapter: HowlerPlayerAdapter | null = null;
  const howl = createHowl(
    buildHowlOptions(src, html5, format, (error) => adapter?.reportError(error)),
  );
  adapter = new HowlerPlayerAdapter(kind, howl);
  return adapter;
};

/**
 * Network-stream backend: HTML5 audio so playback starts before the whole
 * file (or an endless radio stream) has downloaded.
 */
export const createStreamPlayerAdapter = (
  source: PlayerSource,
  options: HowlerPlayerAdapterOptions = {},
): HowlerPlayerAdapter => {
  const location = source.location.trim();
  if (!location) {
    throw new Error("createStreamPlayerAdapter requires a non-empty source URL.");
  }

  return openHowlAdapter(
    "stream",
    options.createHowl ?? defaultHowlFactory,
    location,
    true,
    resolveFormat({ ...source, location }),
  );
};

const toLocalPath = (location: string): string =>
  location.startsWith("file:") ? fileURLToPath(location) : location;

/**
 * Local-file backend: Web Audio decode of a file already on disk.
 */
export const createLocalFilePlayerAdapter = (
  source: PlayerSource,
  options: LocalFilePlayerAdapterOptions = {},
): HowlerPlayerAdapter => {
  const path = toLocalPath(source.location.trim());
  const fileExists = options.fileExists ?? existsSync;
  if (!path || !fileExists(path)) {
    throw new PlaybackError(
      ErrorCode.FILE_NOT_FOUND,
      ErrorCategory.RECOVERABLE,
      `File not found: ${path}`,
      { path },
    );
  }

  return openHowlAdapter(
    "local-file",
    options.createHowl ?? defaultHowlFactory,
    pathToFileURL(path).href,
    false,
    resolveFormat({ ...source, location: path }),
  );
};
