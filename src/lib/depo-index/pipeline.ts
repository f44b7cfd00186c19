/**
 * DepoIndex: Topic Pipeline
 *
 * End-to-end run: clean → segment (or chunk) → extract → validate →
 * canonicalize → synthesize TOC → annotate.
 *
 * One pipeline instance owns one rate limiter, shared by topic extraction and
 * TOC synthesis since both call the same AI capability.
 */

import { v4 as uuidv4 } from "uuid";
import { annotateTranscript } from "./annotate";
import type { ArtifactMetadata } from "./artifact";
import { collectCandidates, DEFAULT_WORKERS, TopicExtractor } from "./extractor";
import { defaultLogger } from "./logger";
import { canonicalizeTopics } from "./order";
import { chunkLines, cleanTranscript, DEFAULT_CHUNK_CHARS, segmentLines } from "./preprocess";
import { DEFAULT_MIN_INTERVAL_MS, RateLimiter, systemClock, type Clock } from "./rate-limit";
import type { BackoffPolicy } from "./retry";
import { TocSynthesizer } from "./toc";
import type {
    AiCapability,
    AnnotatedEntry,
    ExtractionOutcome,
    InvalidTopicReport,
    Logger,
    SegmentKind,
    TocDocument,
    Topic,
    TopicSource,
} from "./types";
import { validateTopics } from "./validate";

export interface PipelineOptions {
    /** Omit (or pass null) to run every stage on its fallback path */
    ai?: AiCapability | null;
    unit?: SegmentKind;
    /** Character budget per chunk when `unit` is "chunk" */
    maxChunkChars?: number;
    workers?: number;
    topicsPerSegment?: number;
    backoff?: BackoffPolicy;
    clock?: Clock;
    rateLimiter?: RateLimiter;
    logger?: Logger;
}

export interface RunOptions {
    /** Where the transcript came from (file name, "stdin", ...) */
    source?: string;
}

export type PipelineStatus = "ok" | "no_topics";

export interface PipelineResult {
    runId: string;
    /** "no_topics" when nothing survived validation; not an error */
    status: PipelineStatus;
    mode: TopicSource;
    topics: Topic[];
    invalid: InvalidTopicReport;
    toc: TocDocument;
    annotated: AnnotatedEntry[];
    outcomes: ExtractionOutcome[];
    metadata: ArtifactMetadata;
}

export class TopicPipeline {
    private readonly extractor: TopicExtractor;
    private readonly synthesizer: TocSynthesizer;
    private readonly unit: SegmentKind;
    private readonly maxChunkChars: number;
    private readonly logger: Logger;

    constructor(options: PipelineOptions = {}) {
        const clock = options.clock ?? systemClock;
        const rateLimiter = options.rateLimiter ?? new RateLimiter(DEFAULT_MIN_INTERVAL_MS, clock);
        const ai = options.ai ?? null;

        this.unit = options.unit ?? "segment";
        this.maxChunkChars = options.maxChunkChars ?? DEFAULT_CHUNK_CHARS;
        this.logger = options.logger ?? defaultLogger;

        this.extractor = new TopicExtractor({
            ai,
            rateLimiter,
            clock,
            backoff: options.backoff,
            concurrency: options.workers ?? DEFAULT_WORKERS,
            topicsPerSegment: options.topicsPerSegment,
            logger: this.logger,
        });
        this.synthesizer = new TocSynthesizer({
            ai,
            rateLimiter,
            clock,
            backoff: options.backoff,
            logger: this.logger,
        });
    }

    get mode(): TopicSource {
        return this.extractor.mode;
    }

    /**
     * Run the whole pipeline on decoded transcript text.
     *
     * @throws EmptyInputError before any extraction when the text has no
     * usable content
     */
    async run(rawText: string, options: RunOptions = {}): Promise<PipelineResult> {
        const runId = uuidv4();
        const lines = cleanTranscript(rawText);
        const units =
            this.unit === "chunk"
                ? chunkLines(lines, { maxChars: this.maxChunkChars })
                : segmentLines(lines);
        this.logger.info(`[TopicPipeline] run ${runId}: ${lines.length} cleaned line(s), ${units.length} ${this.unit}(s).`);

        const outcomes = await this.extractor.extractAll(units);
        const failed = outcomes.filter((outcome) => outcome.status === "error").length;
        if (failed > 0) {
            this.logger.warn(`[TopicPipeline] ${failed} ${this.unit}(s) produced no candidates.`);
        }

        const { valid, invalid } = validateTopics(collectCandidates(outcomes), this.logger);
        const topics = canonicalizeTopics(valid);
        const status: PipelineStatus = topics.length > 0 ? "ok" : "no_topics";
        if (status === "no_topics") {
            this.logger.warn(`[TopicPipeline] run ${runId}: no topics found.`);
        }

        const toc = await this.synthesizer.synthesize(topics);
        const annotated = annotateTranscript(topics);

        const metadata: ArtifactMetadata = {
            run_id: runId,
            generated_at: new Date().toISOString(),
            source: options.source ?? "text",
            mode: this.mode,
            unit: this.unit,
            topic_count: topics.length,
            key_issue_count: topics.filter((topic) => topic.isKeyIssue).length,
            invalid_count: invalid.length,
            rejected: invalid.map(({ position, reason, missing }) => ({ position, reason, missing: [...missing] })),
            toc_source: toc.source,
        };

        return {
            runId,
            status,
            mode: this.mode,
            topics,
            invalid,
            toc,
            annotated,
            outcomes,
            metadata,
        };
    }
}
