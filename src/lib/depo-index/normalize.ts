/**
 * DepoIndex: Normalization Engine
 *
 * Standardizes what enters the pipeline: raw transcript characters on one
 * side, heterogeneous AI replies on the other. Replies are reduced to
 * wire-shaped `TopicCandidate` records so the validator sees one shape
 * regardless of how the model phrased its answer.
 */

import { MalformedResponseError } from "./errors";
import type { Segment, TopicCandidate } from "./types";

/** Confidence assumed when the AI capability does not supply one */
export const DEFAULT_AI_CONFIDENCE = 0.7;

/** Number of leading segment lines used as a topic's excerpt */
export const CONTEXT_LINES = 3;

// ---------------------------------------------------------------------------
// Text-level normalization
// ---------------------------------------------------------------------------

/**
 * Normalize raw transcript characters:
 * 1. Remove null bytes
 * 2. Turn form-feeds (PDF page breaks) into line breaks
 * 3. Replace non-breaking spaces / zero-width chars with regular space
 */
export function normalizeCharacters(raw: string): string {
    return raw
        .replace(/\x00/g, "")
        .replace(/\x0C/g, "\n")
        .replace(/[\u00A0\u200B\u200C\u200D\uFEFF]/g, " ");
}

// ---------------------------------------------------------------------------
// Reply parsing
// ---------------------------------------------------------------------------

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a structured (JSON) reply, tolerating code fences and stray prose
 * around the payload.
 *
 * @throws MalformedResponseError when no JSON payload can be recovered
 */
export function parseStructuredResponse(raw: string): unknown {
    const text = raw.trim();
    if (text.length === 0) {
        throw new MalformedResponseError("AI capability returned an empty response.");
    }

    const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
    const body = fenced ? fenced[1].trim() : text;

    const start = body.search(/[[{]/);
    if (start === -1) {
        throw new MalformedResponseError("Response contains no JSON payload.", {
            excerpt: body.slice(0, 200),
        });
    }
    const closer = body[start] === "{" ? "}" : "]";
    const end = body.lastIndexOf(closer);
    if (end <= start) {
        throw new MalformedResponseError("Response JSON payload is truncated.", {
            excerpt: body.slice(0, 200),
        });
    }

    try {
        return JSON.parse(body.slice(start, end + 1));
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new MalformedResponseError(`Response is not valid JSON: ${message}`, {
            excerpt: body.slice(0, 200),
        });
    }
}

/**
 * Extract the topic list from a reply. Accepts `{ "topics": [...] }`, a bare
 * array, or a single topic object.
 */
export function parseTopicResponse(raw: string): unknown[] {
    const payload = parseStructuredResponse(raw);

    if (Array.isArray(payload)) return payload;
    if (isRecord(payload)) {
        if (Array.isArray(payload.topics)) return payload.topics;
        if ("title" in payload || "topic" in payload) return [payload];
    }
    throw new MalformedResponseError("Response does not contain a topic list.");
}

// ---------------------------------------------------------------------------
// Candidate-level normalization
// ---------------------------------------------------------------------------

function pick(record: Record<string, unknown>, keys: string[]): unknown {
    for (const key of keys) {
        const value = record[key];
        if (value !== undefined && value !== null) return value;
    }
    return undefined;
}

function coerceNumber(value: unknown): unknown {
    if (typeof value === "string" && /^\s*-?\d+(?:\.\d+)?\s*$/.test(value)) {
        return Number(value);
    }
    return value;
}

function coerceBoolean(value: unknown): unknown {
    if (typeof value !== "string") return value;
    const lowered = value.trim().toLowerCase();
    if (lowered === "true" || lowered === "yes") return true;
    if (lowered === "false" || lowered === "no") return false;
    return value;
}

function coerceStringList(value: unknown): unknown {
    if (typeof value === "string") {
        return value
            .split(",")
            .map((item) => item.trim())
            .filter(Boolean);
    }
    if (Array.isArray(value)) {
        // Scalars become strings; nested structures and nulls are dropped
        return value
            .map((item) =>
                typeof item === "string"
                    ? item.trim()
                    : typeof item === "number" || typeof item === "boolean"
                      ? String(item)
                      : ""
            )
            .filter((item) => item !== "");
    }
    return value;
}

/** First few non-empty lines of a segment, joined */
export function segmentExcerpt(segment: Segment): string {
    return segment.lines.filter(Boolean).slice(0, CONTEXT_LINES).join(" ");
}

/**
 * Map a reply entry onto the wire field names. Missing anchors fall back to
 * the segment's anchor, a missing excerpt to the segment's leading lines and
 * a missing confidence to `DEFAULT_AI_CONFIDENCE`. A missing title stays
 * missing. Non-record entries are returned untouched for the validator to
 * reject.
 */
export function normalizeCandidate(raw: unknown, segment: Segment): unknown {
    if (!isRecord(raw)) return raw;

    const title = pick(raw, ["title", "topic", "name"]);
    const candidate: TopicCandidate = {
        title: typeof title === "string" ? title.trim() : title,
        page: coerceNumber(pick(raw, ["page", "page_number", "pageNumber"])) ?? segment.page,
        line: coerceNumber(pick(raw, ["line", "line_number", "lineNumber"])) ?? segment.startLine,
        context: pick(raw, ["context", "text", "excerpt"]) ?? segmentExcerpt(segment),
        is_key_issue:
            coerceBoolean(pick(raw, ["is_key_issue", "isKeyIssue", "key_issue"])) ?? false,
        confidence: coerceNumber(pick(raw, ["confidence", "score"])) ?? DEFAULT_AI_CONFIDENCE,
        related_topics: coerceStringList(pick(raw, ["related_topics", "relatedTopics"])) ?? [],
    };

    const significance = pick(raw, ["legal_significance", "legalSignificance"]);
    if (significance !== undefined) {
        candidate.legal_significance = significance;
    }
    if (candidate.title === undefined) {
        delete candidate.title;
    }
    return candidate;
}
