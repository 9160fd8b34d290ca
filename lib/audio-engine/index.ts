import {
  createLocalFilePlayerAdapter,
  createStreamPlayerAdapter,
  isRemoteLocation,
  type LocalFilePlayerAdapterOptions,
} from "@/lib/audio-engine/howlerPlayerAdapter";
import type {
  PlayerAdapterFactory,
  PlayerBackendKind,
  PlayerSource,
} from "@/lib/audio-engine/types";

export const resolvePlayerBackendKind = (
  source: PlayerSource,
): PlayerBackendKind =>
  isRemoteLocation(source.location) ? "stream" : "local-file";

/**
 * Picks the backend per source: remote URLs stream through HTML5 audio,
 * paths and `file:` URLs decode locally.
 */
export const createPlayerAdapterFactory = (
  options: LocalFilePlayerAdapterOptions = {},
): PlayerAdapterFactory => {
  return (source) =>
    resolvePlayerBackendKind(source) === "stream"
      ? createStreamPlayerAdapter(source, options)
      : createLocalFilePlayerAdapter(source, options);
};

export type {
  PlayerObserver,
  PlayerAdapter,
  PlayerAdapterFactory,
  PlayerBackendKind,
  PlayerSource,
  StreamResolver,
} from "@/lib/audio-engine/types";
export {
  HowlerPlayerAdapter,
  createLocalFilePlayerAdapter,
  createStreamPlayerAdapter,
} from "@/lib/audio-engine/howlerPlayerAdapter";
export type { HowlFactory, HowlLike } from "@/lib/audio-engine/howlerPlayerAdapter";
