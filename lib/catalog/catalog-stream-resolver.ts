import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { Track } from "@shelfcast/media-contract";
import type { StreamResolver } from "@/lib/audio-engine/types";
import { ErrorCode } from "@/lib/errors";
import { createLogger, type Logger } from "@/lib/logger";

/** Preferred formats, best first. */
export const STREAM_FORMATS = ["mp3", "ogg", "m4a", "flac"] as const;

export const STREAMABLE_EXTENSIONS = [
    "mp3",
    "ogg",
    "m4a",
    "flac",
    "wav",
    "m3u",
    "opus",
    "aac",
] as const;

const catalogFileSchema = z
    .object({
        name: z.string().optional(),
        format: z.string().optional(),
        source: z.string().optional(),
    })
    .passthrough();

const catalogMetadataSchema = z
    .object({
        files: z
            .union([
                z.array(catalogFileSchema),
                z.record(catalogFileSchema),
            ])
            .optional(),
    })
    .passthrough();

export type CatalogFile = z.infer<typeof catalogFileSchema>;

export interface CatalogStreamResolverOptions {
    baseUrl: string;
    timeoutMs?: number;
    /** Pre-built client; defaults to `axios.create` with `baseUrl`. */
    client?: AxiosInstance;
    logger?: Logger;
}

const matchesFormat = (file: CatalogFile, format: string): boolean => {
    const name = (file.name ?? "").toLowerCase();
    const fileFormat = (file.format ?? "").toLowerCase();
    return name.endsWith(`.${format}`) || fileFormat.includes(format);
};

/**
 * Picks the best streamable file: original uploads first, in format
 * preference order, then any derivative in the same order.
 */
export function selectStreamFile(files: readonly CatalogFile[]): CatalogFile | null {
    const passes: Array<(file: CatalogFile) => boolean> = [
        (file) => file.source === "original",
        () => true,
    ];

    for (const accept of passes) {
        for (const format of STREAM_FORMATS) {
            const match = files.find(
                (file) =>
                    accept(file) &&
                    typeof file.name === "string" &&
                    file.name.length > 0 &&
                    matchesFormat(file, format),
            );
            if (match) {
                return match;
            }
        }
    }

    return null;
}

export function encodeCatalogPath(fileName: string): string {
    return fileName.split("/").map(encodeURIComponent).join("/");
}

export function isStreamableUrl(url: string): boolean {
    const path = url.split(/[?#]/, 1)[0];
    const lastSegment = path.slice(path.lastIndexOf("/") + 1);
    const dotIndex = lastSegment.lastIndexOf(".");
    if (dotIndex < 0) {
        return false;
    }
    const extension = lastSegment.slice(dotIndex + 1).toLowerCase();
    return STREAMABLE_EXTENSIONS.some((candidate) => candidate === extension);
}

/**
 * Resolves catalog items to direct download URLs by reading the item's
 * file listing from the catalog metadata endpoint.
 */
export class CatalogStreamResolver implements StreamResolver {
    private readonly client: AxiosInstance;
    private readonly baseUrl: string;
    private readonly log: Logger;

    constructor(options: CatalogStreamResolverOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, "");
        this.client =
            options.client ??
            axios.create({
                baseURL: this.baseUrl,
                timeout: options.timeoutMs ?? 10000,
            });
        this.log = options.logger ?? createLogger("CatalogStreamResolver");
    }

    async resolve(track: Track): Promise<string | null> {
        const identifier = track.identifier;
        let body: unknown;

        try {
            this.log.debug(`Requesting metadata for ${identifier}`);
            const response = await this.client.get<unknown>(
                `/metadata/${encodeURIComponent(identifier)}`,
            );
            body = response.data;
        } catch (error) {
            this.log.warn("Metadata request failed", {
                code: ErrorCode.CATALOG_REQUEST_FAILED,
                identifier,
                error: axios.isAxiosError(error) ? error.message : error,
            });
            return null;
        }

        const parsed = catalogMetadataSchema.safeParse(body);
        if (!parsed.success) {
            this.log.warn("Metadata response did not match the expected shape", {
                identifier,
                issues: parsed.error.errors.map((issue) => issue.message),
            });
            return null;
        }

        const rawFiles = parsed.data.files;
        if (!rawFiles) {
            this.log.warn("No files found in metadata", { identifier });
            return null;
        }

        const files = Array.isArray(rawFiles) ? rawFiles : Object.values(rawFiles);
        const file = selectStreamFile(files);
        if (!file?.name) {
            this.log.info("No streamable files found", {
                identifier,
                title: track.title,
                fileCount: files.length,
            });
            return null;
        }

        const streamUrl = `${this.baseUrl}/download/${encodeURIComponent(identifier)}/${encodeCatalogPath(file.name)}`;
        if (!isStreamableUrl(streamUrl)) {
            this.log.info("Selected file is not streamable", {
                identifier,
                streamUrl,
            });
            return null;
        }

        this.log.debug("Resolved stream URL", { identifier, streamUrl });
        return streamUrl;
    }
}
