export const CATALOG_MEDIA_TYPE_VALUES = [
    "audio",
    "texts",
    "movies",
    "image",
    "software",
] as const;

export type CatalogMediaType = (typeof CATALOG_MEDIA_TYPE_VALUES)[number];

export type LibraryItemKind = "pdf" | "audiobook" | "video" | "other";

/** A playable reference to a catalog item. */
export interface Track {
    readonly id: string;
    readonly title: string;
    /** Raw catalog media-type tag, e.g. "audio" or "texts". */
    readonly mediaType: string;
    /** Source reference handed to the stream resolver; also used for artwork. */
    readonly identifier: string;
}

const normalizeString = (value: unknown): string | undefined => {
    if (typeof value !== "string") {
        return undefined;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
};

export const normalizeCatalogMediaType = (
    value: unknown,
): CatalogMediaType | null => {
    const normalized = normalizeString(value)?.toLowerCase();
    if (!normalized) {
        return null;
    }
    for (const candidate of CATALOG_MEDIA_TYPE_VALUES) {
        if (candidate === normalized) {
            return candidate;
        }
    }
    return null;
};

export const resolveLibraryItemKind = (value: unknown): LibraryItemKind => {
    switch (normalizeCatalogMediaType(value)) {
        case "texts":
            return "pdf";
        case "audio":
            return "audiobook";
        case "movies":
            return "video";
        default:
            return "other";
    }
};

export const isAudioTrack = (track: Pick<Track, "mediaType">): boolean =>
    normalizeCatalogMediaType(track.mediaType) === "audio";

/** Keeps the audio-capable subset, preserving order. */
export const filterAudioTracks = <T extends Pick<Track, "mediaType">>(
    tracks: readonly T[],
): T[] => tracks.filter((track) => isAudioTrack(track));

export const toTrack = (value: {
    id?: unknown;
    title?: unknown;
    mediaType?: unknown;
    mediatype?: unknown;
    identifier?: unknown;
}): Track | null => {
    const id = normalizeString(value.id);
    const identifier = normalizeString(value.identifier) ?? id;
    if (!id || !identifier) {
        return null;
    }
    return Object.freeze({
        id,
        title: normalizeString(value.title) ?? identifier,
        mediaType:
            normalizeString(value.mediaType) ??
            normalizeString(value.mediatype) ??
            "",
        identifier,
    });
};
