/**
 * DepoIndex: Table of Contents
 *
 * Builds a structural TOC (typed heading / line blocks) from the canonical
 * topic list. Rendering to a document format is left to exporters.
 */

import { MalformedResponseError } from "./errors";
import { defaultLogger } from "./logger";
import { DEFAULT_MIN_INTERVAL_MS, RateLimiter, systemClock, type Clock } from "./rate-limit";
import { DEFAULT_BACKOFF, withRetry, type BackoffPolicy } from "./retry";
import type { AiCapability, Logger, TocBlock, TocDocument, Topic } from "./types";

export const TOC_TITLE = "Deposition Topic Table of Contents";

export function emptyToc(): TocDocument {
    return { source: "empty", blocks: [] };
}

export function formatConfidence(confidence: number): string {
    return `${Math.round(confidence * 100)}%`;
}

// ---------------------------------------------------------------------------
// Deterministic listing
// ---------------------------------------------------------------------------

/**
 * Group topics by page, in the order given: a `Page N` heading whenever the
 * page changes, then one bullet per topic.
 */
export function buildFallbackToc(topics: Topic[]): TocDocument {
    if (topics.length === 0) return emptyToc();

    const blocks: TocBlock[] = [{ kind: "heading", level: 1, text: TOC_TITLE }];
    let currentPage: number | null = null;

    for (const topic of topics) {
        if (topic.page !== currentPage) {
            blocks.push({ kind: "heading", level: 2, text: `Page ${topic.page}` });
            currentPage = topic.page;
        }
        const marker = topic.isKeyIssue ? " · KEY ISSUE" : "";
        blocks.push({
            kind: "line",
            bullet: true,
            text: `${topic.title} · Line ${topic.line} · ${formatConfidence(topic.confidence)}${marker}`,
        });
    }

    return { source: "fallback", blocks };
}

// ---------------------------------------------------------------------------
// Markdown reply parsing
// ---------------------------------------------------------------------------

function headingLevel(hashes: number): 1 | 2 | 3 {
    if (hashes >= 3) return 3;
    return hashes === 2 ? 2 : 1;
}

function stripEmphasis(text: string): string {
    return text.replace(/\*\*|__/g, "").trim();
}

/**
 * Turn a Markdown TOC into blocks. Headings keep their depth (capped at 3),
 * `-`, `*` and `•` items become bullets, everything else a plain line.
 * Code fences and horizontal rules are dropped.
 */
export function parseTocMarkdown(markdown: string): TocBlock[] {
    const blocks: TocBlock[] = [];

    for (const raw of markdown.split(/\r?\n/)) {
        const line = raw.trim();
        if (line.length === 0 || line.startsWith("```") || /^-{3,}$/.test(line)) continue;

        const heading = /^(#{1,6})\s*(.*)$/.exec(line);
        if (heading) {
            const text = stripEmphasis(heading[2]);
            if (text) blocks.push({ kind: "heading", level: headingLevel(heading[1].length), text });
            continue;
        }

        const bullet = /^[-*•]\s+(.*)$/.exec(line);
        if (bullet) {
            const text = stripEmphasis(bullet[1]);
            if (text) blocks.push({ kind: "line", bullet: true, text });
            continue;
        }

        const text = stripEmphasis(line);
        if (text) blocks.push({ kind: "line", bullet: false, text });
    }

    return blocks;
}

// ---------------------------------------------------------------------------
// Synthesizer
// ---------------------------------------------------------------------------

export interface TocSynthesizerOptions {
    ai?: AiCapability | null;
    rateLimiter?: RateLimiter;
    backoff?: BackoffPolicy;
    clock?: Clock;
    logger?: Logger;
}

export class TocSynthesizer {
    readonly name = "TocSynthesizer";

    private readonly ai: AiCapability | null;
    private readonly clock: Clock;
    private readonly rateLimiter: RateLimiter;
    private readonly backoff: BackoffPolicy;
    private readonly logger: Logger;

    constructor(options: TocSynthesizerOptions = {}) {
        this.ai = options.ai ?? null;
        this.clock = options.clock ?? systemClock;
        this.rateLimiter = options.rateLimiter ?? new RateLimiter(DEFAULT_MIN_INTERVAL_MS, this.clock);
        this.backoff = options.backoff ?? DEFAULT_BACKOFF;
        this.logger = options.logger ?? defaultLogger;
    }

    /**
     * Build the TOC for canonical topics. Uses the AI capability when present,
     * and the page-grouped listing when it is absent or keeps failing. Never
     * throws; an empty topic list gives an empty document.
     */
    async synthesize(topics: Topic[]): Promise<TocDocument> {
        if (topics.length === 0) return emptyToc();

        const ai = this.ai;
        if (ai) {
            const result = await withRetry(
                async () => {
                    await this.rateLimiter.acquire();
                    const blocks = parseTocMarkdown(await ai.generateToc(topics));
                    if (blocks.length === 0) {
                        throw new MalformedResponseError("TOC reply contained no content.");
                    }
                    return blocks;
                },
                { policy: this.backoff, clock: this.clock, label: "[TocSynthesizer]", logger: this.logger }
            );

            if (result.ok) {
                return { source: "ai", blocks: result.value };
            }
            this.logger.warn(
                `[TocSynthesizer] ${ai.name} failed ${result.attempts} times; using page-grouped listing.`
            );
        }

        return buildFallbackToc(topics);
    }
}
