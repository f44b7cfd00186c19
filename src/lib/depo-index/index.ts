/**
 * DepoIndex: Public API
 *
 * Barrel export. Import everything from `./lib/depo-index`.
 */

export { TopicPipeline } from "./pipeline";
export type { PipelineOptions, PipelineResult, PipelineStatus, RunOptions } from "./pipeline";
export { TopicExtractor, fallbackCandidate, collectCandidates } from "./extractor";
export { TocSynthesizer, buildFallbackToc, parseTocMarkdown, TOC_TITLE } from "./toc";
export { annotateTranscript } from "./annotate";
export { cleanTranscript, segmentLines, chunkLines, titleFromLine } from "./preprocess";
export { normalizeCharacters, normalizeCandidate, parseTopicResponse } from "./normalize";
export { validateTopic, validateTopics, REQUIRED_FIELDS } from "./validate";
export { orderTopics, deduplicateTopics, canonicalizeTopics } from "./order";
export { RateLimiter, systemClock } from "./rate-limit";
export type { Clock } from "./rate-limit";
export { withRetry, DEFAULT_BACKOFF } from "./retry";
export type { BackoffPolicy, RetryResult } from "./retry";
export {
    buildArtifact,
    deserializeTopics,
    parseArtifact,
    serializeTopic,
    stringifyArtifact,
} from "./artifact";
export type { ArtifactMetadata, ParsedArtifact, RejectedCandidateRecord, TopicArtifact, TopicRecord } from "./artifact";
export { loadConfig } from "./config";
export type { DepoIndexConfig } from "./config";
export { createLogger, defaultLogger, silentLogger } from "./logger";
export type { LogLevel } from "./logger";
export { OpenAITopicCapability, createCapability } from "./providers/openai";
export {
    CapabilityUnavailableError,
    ConfigError,
    DepoIndexError,
    EmptyInputError,
    InternalInvariantError,
    MalformedResponseError,
    SortKeyError,
} from "./errors";
export type {
    AiCapability,
    AnnotatedEntry,
    CleanedLine,
    ExtractionOutcome,
    InvalidTopicReport,
    Logger,
    Segment,
    SegmentKind,
    TocBlock,
    TocDocument,
    Topic,
    TopicCandidate,
    TopicRequest,
    TopicSource,
    ValidationRejection,
    ValidationResult,
} from "./types";
