/**
 * DepoIndex: Configuration
 *
 * Centralized validation of environment variables using zod. The CLI loads
 * `.env` through dotenv before calling `loadConfig`.
 */

import { z } from "zod";
import { ConfigError } from "./errors";
import { DEFAULT_WORKERS, MAX_TOPICS_PER_SEGMENT } from "./extractor";
import type { LogLevel } from "./logger";
import { DEFAULT_CHUNK_CHARS } from "./preprocess";
import type { SegmentKind } from "./types";

export interface DepoIndexConfig {
    /** Unset means pure fallback mode */
    apiKey?: string;
    model: string;
    baseUrl?: string;
    workers: number;
    topicsPerSegment: number;
    unit: SegmentKind;
    chunkChars: number;
    logLevel: LogLevel;
}

// Unset and blank variables both fall back to the default
const blankAsUnset = (value: unknown) =>
    typeof value === "string" && value.trim() === "" ? undefined : value;

const positiveInt = (fallback: number) =>
    z.preprocess(
        blankAsUnset,
        z.coerce
            .number({ invalid_type_error: "must be a number" })
            .int("must be an integer")
            .min(1, "must be at least 1")
            .default(fallback)
    );

const envSchema = z.object({
    OPENAI_API_KEY: z.preprocess(blankAsUnset, z.string().trim().optional()),
    OPENAI_MODEL: z.preprocess(blankAsUnset, z.string().trim().default("gpt-4o-mini")),
    OPENAI_BASE_URL: z.preprocess(blankAsUnset, z.string().url("must be a URL").optional()),
    DEPO_WORKERS: positiveInt(DEFAULT_WORKERS),
    DEPO_TOPIC_COUNT: z.preprocess(
        blankAsUnset,
        z.coerce
            .number({ invalid_type_error: "must be a number" })
            .int("must be an integer")
            .min(1, "must be at least 1")
            .max(MAX_TOPICS_PER_SEGMENT, `must be at most ${MAX_TOPICS_PER_SEGMENT}`)
            .default(1)
    ),
    DEPO_UNIT: z.preprocess(
        blankAsUnset,
        z.enum(["segment", "chunk"], { errorMap: () => ({ message: 'must be "segment" or "chunk"' }) }).default("segment")
    ),
    DEPO_CHUNK_CHARS: positiveInt(DEFAULT_CHUNK_CHARS),
    LOG_LEVEL: z.preprocess(
        (value) => (typeof value === "string" ? blankAsUnset(value.toLowerCase()) : value),
        z
            .enum(["debug", "info", "warn", "error"], {
                errorMap: () => ({ message: "must be debug, info, warn or error" }),
            })
            .default("info")
    ),
});

/**
 * Read and validate the environment.
 *
 * @throws ConfigError listing every offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DepoIndexConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`));
    }

    const values = parsed.data;
    return {
        apiKey: values.OPENAI_API_KEY,
        model: values.OPENAI_MODEL,
        baseUrl: values.OPENAI_BASE_URL,
        workers: values.DEPO_WORKERS,
        topicsPerSegment: values.DEPO_TOPIC_COUNT,
        unit: values.DEPO_UNIT,
        chunkChars: values.DEPO_CHUNK_CHARS,
        logLevel: values.LOG_LEVEL,
    };
}
