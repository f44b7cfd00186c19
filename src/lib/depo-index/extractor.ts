/**
 * DepoIndex: Topic Extractor
 *
 * Requests topic candidates for each segment from the AI capability, under a
 * shared rate limit and a bounded retry policy. When the capability is absent
 * or every attempt fails, a minimal topic is derived from the segment itself.
 * One segment's failure never fails the batch.
 */

import { mapWithConcurrency } from "./concurrency";
import { defaultLogger } from "./logger";
import { normalizeCandidate, parseTopicResponse, segmentExcerpt } from "./normalize";
import { titleFromLine } from "./preprocess";
import { DEFAULT_MIN_INTERVAL_MS, RateLimiter, systemClock, type Clock } from "./rate-limit";
import { DEFAULT_BACKOFF, withRetry, type BackoffPolicy } from "./retry";
import type {
    AiCapability,
    ExtractionOutcome,
    Logger,
    Segment,
    TopicCandidate,
    TopicRequest,
    TopicSource,
} from "./types";

/** Confidence of a topic derived without the AI capability */
export const FALLBACK_CONFIDENCE = 0.5;

/** Upper bound on the excerpt sent for one segment */
export const MAX_EXCERPT_CHARS = 8000;

export const DEFAULT_WORKERS = 4;
export const MAX_TOPICS_PER_SEGMENT = 10;

export interface ExtractionHint {
    /** Page to report to the capability, defaults to the segment's page */
    page?: number;
    precedingLines?: string[];
}

export interface TopicExtractorOptions {
    /** Omit (or pass null) to run in pure fallback mode */
    ai?: AiCapability | null;
    rateLimiter?: RateLimiter;
    backoff?: BackoffPolicy;
    clock?: Clock;
    /** Worker pool size for `extractAll` */
    concurrency?: number;
    /** Topics requested per segment (1-10) */
    topicsPerSegment?: number;
    precedingLineCount?: number;
    logger?: Logger;
}

/** Deterministic topic for a segment: first line as title, leading lines as excerpt */
export function fallbackCandidate(segment: Segment): TopicCandidate {
    return {
        title: titleFromLine(segment.lines.find(Boolean) ?? ""),
        page: segment.page,
        line: segment.startLine,
        context: segmentExcerpt(segment),
        is_key_issue: false,
        confidence: FALLBACK_CONFIDENCE,
        related_topics: [],
    };
}

/** Flatten outcomes into one candidate list, in segment order */
export function collectCandidates(outcomes: ExtractionOutcome[]): unknown[] {
    return outcomes.flatMap((outcome) => (outcome.status === "topics" ? outcome.candidates : []));
}

export class TopicExtractor {
    readonly name = "TopicExtractor";

    private readonly ai: AiCapability | null;
    private readonly clock: Clock;
    private readonly rateLimiter: RateLimiter;
    private readonly backoff: BackoffPolicy;
    private readonly concurrency: number;
    private readonly topicsPerSegment: number;
    private readonly precedingLineCount: number;
    private readonly logger: Logger;

    constructor(options: TopicExtractorOptions = {}) {
        this.ai = options.ai ?? null;
        this.clock = options.clock ?? systemClock;
        this.rateLimiter = options.rateLimiter ?? new RateLimiter(DEFAULT_MIN_INTERVAL_MS, this.clock);
        this.backoff = options.backoff ?? DEFAULT_BACKOFF;
        this.concurrency = options.concurrency ?? DEFAULT_WORKERS;
        this.topicsPerSegment = options.topicsPerSegment ?? 1;
        this.precedingLineCount = options.precedingLineCount ?? 3;
        this.logger = options.logger ?? defaultLogger;

        if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
            throw new RangeError(`concurrency must be a positive integer, received ${this.concurrency}`);
        }
        if (
            !Number.isInteger(this.topicsPerSegment) ||
            this.topicsPerSegment < 1 ||
            this.topicsPerSegment > MAX_TOPICS_PER_SEGMENT
        ) {
            throw new RangeError(
                `topicsPerSegment must be between 1 and ${MAX_TOPICS_PER_SEGMENT}, received ${this.topicsPerSegment}`
            );
        }
    }

    /** "ai" when a capability is configured, else "fallback" */
    get mode(): TopicSource {
        return this.ai ? "ai" : "fallback";
    }

    // ---------------------------------------------------------------------------
    // Public API
    // ---------------------------------------------------------------------------

    buildRequest(segment: Segment, hint: ExtractionHint = {}): TopicRequest {
        return {
            kind: segment.kind,
            text: segment.lines.join("\n").slice(0, MAX_EXCERPT_CHARS),
            page: hint.page ?? segment.page,
            line: segment.startLine,
            precedingLines: (hint.precedingLines ?? []).slice(-this.precedingLineCount),
            maxTopics: this.topicsPerSegment,
        };
    }

    /**
     * Extract candidates for one segment. Falls back to the deterministic
     * topic when no capability is configured or retries are exhausted; a
     * successful reply with no topics yields no candidates.
     */
    async extract(segment: Segment, hint: ExtractionHint = {}): Promise<ExtractionOutcome> {
        const ai = this.ai;
        if (!ai) {
            return this.fallback(segment);
        }

        const request = this.buildRequest(segment, hint);
        const anchor: Segment = { ...segment, page: request.page };
        const result = await withRetry(
            async () => {
                await this.rateLimiter.acquire();
                const reply = await ai.generateTopics(request);
                return parseTopicResponse(reply)
                    .slice(0, this.topicsPerSegment)
                    .map((entry) => normalizeCandidate(entry, anchor));
            },
            {
                policy: this.backoff,
                clock: this.clock,
                label: `[TopicExtractor] line ${segment.startLine}`,
                logger: this.logger,
            }
        );

        if (result.ok) {
            return { status: "topics", source: "ai", segment, candidates: result.value };
        }

        this.logger.warn(
            `[TopicExtractor] ${ai.name} failed ${result.attempts} times for line ${segment.startLine}; using fallback topic.`
        );
        return this.fallback(segment);
    }

    /**
     * Extract every segment on a bounded worker pool. Outcomes line up with
     * `segments` by index whatever order the workers finish in.
     */
    async extractAll(segments: Segment[]): Promise<ExtractionOutcome[]> {
        this.logger.info(
            `[TopicExtractor] extracting ${segments.length} ${segments[0]?.kind ?? "segment"}(s) in ${this.mode} mode with ${this.concurrency} worker(s).`
        );

        return mapWithConcurrency(segments, this.concurrency, async (segment, index): Promise<ExtractionOutcome> => {
            const precedingLines =
                index > 0 ? segments[index - 1].lines.filter(Boolean).slice(-this.precedingLineCount) : [];

            try {
                return await this.extract(segment, { precedingLines });
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                this.logger.error(
                    `[TopicExtractor] segment ${index + 1} (line ${segment.startLine}) failed: ${message}`
                );
                return { status: "error", segment, error: message };
            }
        });
    }

    // ---------------------------------------------------------------------------
    // Internals
    // ---------------------------------------------------------------------------

    private fallback(segment: Segment): ExtractionOutcome {
        return {
            status: "topics",
            source: "fallback",
            segment,
            candidates: [fallbackCandidate(segment)],
        };
    }
}
