import { z } from "zod";
import { ErrorCategory, ErrorCode, PlaybackError } from "@/lib/errors";
import { parseEnvInt } from "@/lib/env-parsers";

export const DEFAULT_CATALOG_BASE_URL = "https://archive.org";

const configSchema = z.object({
    catalogBaseUrl: z
        .string()
        .url("SHELFCAST_CATALOG_BASE_URL must be an absolute URL")
        .transform((value) => value.replace(/\/+$/, "")),
    catalogTimeoutMs: z
        .number()
        .int()
        .positive("SHELFCAST_CATALOG_TIMEOUT_MS must be positive"),
    timeSampleIntervalMs: z
        .number()
        .int()
        .min(10, "SHELFCAST_TIME_SAMPLE_INTERVAL_MS must be at least 10"),
    progressIntervalMs: z
        .number()
        .int()
        .min(0, "SHELFCAST_PROGRESS_INTERVAL_MS must not be negative"),
    skipIntervalSec: z
        .number()
        .int()
        .positive("SHELFCAST_SKIP_INTERVAL_SEC must be positive"),
});

export type PlaybackConfig = z.infer<typeof configSchema>;

/**
 * Reads playback settings from the environment. Numeric values that are
 * missing fall back to defaults; values that fail validation throw.
 */
export function loadPlaybackConfig(
    env: NodeJS.ProcessEnv = process.env,
): PlaybackConfig {
    const result = configSchema.safeParse({
        catalogBaseUrl:
            env.SHELFCAST_CATALOG_BASE_URL?.trim() || DEFAULT_CATALOG_BASE_URL,
        catalogTimeoutMs: parseEnvInt(env.SHELFCAST_CATALOG_TIMEOUT_MS, 10000),
        timeSampleIntervalMs: parseEnvInt(
            env.SHELFCAST_TIME_SAMPLE_INTERVAL_MS,
            100,
        ),
        progressIntervalMs: parseEnvInt(env.SHELFCAST_PROGRESS_INTERVAL_MS, 5000),
        skipIntervalSec: parseEnvInt(env.SHELFCAST_SKIP_INTERVAL_SEC, 15),
    });

    if (!result.success) {
        const issues = result.error.errors.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`,
        );
        throw new PlaybackError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            `Invalid playback configuration (${issues.join("; ")})`,
            { issues },
        );
    }

    return result.data;
}
