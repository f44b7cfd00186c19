/**
 * DepoIndex: Type Definitions
 *
 * Shared types for the topic extraction pipeline. Every stage consumes one
 * immutable snapshot of these records and emits the next.
 */

// ---------------------------------------------------------------------------
// Transcript units
// ---------------------------------------------------------------------------

/** A transcript line after speaker tags and annotations were stripped */
export interface CleanedLine {
    text: string;
    /** 1-based line index in the raw transcript */
    line: number;
    /** 1-based page anchor */
    page: number;
}

/** How the transcript was decomposed before extraction */
export type SegmentKind = "segment" | "chunk";

/**
 * A run of cleaned content lines. `segment` units are maximal runs of
 * content-bearing lines; `chunk` units are size-bounded groups of paragraphs.
 */
export interface Segment {
    kind: SegmentKind;
    lines: string[];
    /** Raw line index of the first line */
    startLine: number;
    page: number;
}

// ---------------------------------------------------------------------------
// Topics
// ---------------------------------------------------------------------------

/** Canonical topic record */
export interface Topic {
    title: string;
    page: number;
    line: number;
    /** Source excerpt; empty when unavailable */
    context: string;
    isKeyIssue: boolean;
    /** Always within [0, 1] */
    confidence: number;
    relatedTopics: string[];
    legalSignificance?: string;
}

/**
 * Untrusted, wire-shaped topic record (snake_case field names) as produced by
 * extraction. Only the validator turns it into a `Topic`.
 */
export type TopicCandidate = Record<string, unknown>;

/** A candidate that failed required-field or type checks */
export interface ValidationRejection {
    /** 1-based position of the candidate in the validated batch */
    position: number;
    reason: string;
    /** Required fields that were absent */
    missing: string[];
    candidate: unknown;
}

export type InvalidTopicReport = ValidationRejection[];

export interface ValidationResult {
    valid: Topic[];
    invalid: InvalidTopicReport;
}

// ---------------------------------------------------------------------------
// Extraction results
// ---------------------------------------------------------------------------

export type TopicSource = "ai" | "fallback";

/** Per-segment result wrapper: either candidates or an isolated failure */
export type ExtractionOutcome =
    | {
          status: "topics";
          source: TopicSource;
          segment: Segment;
          /** Normalized reply entries; may include non-records the validator rejects */
          candidates: unknown[];
      }
    | { status: "error"; segment: Segment; error: string };

// ---------------------------------------------------------------------------
// Table of contents
// ---------------------------------------------------------------------------

export type TocBlock =
    | { kind: "heading"; level: 1 | 2 | 3; text: string }
    | { kind: "line"; text: string; bullet: boolean };

export interface TocDocument {
    source: TopicSource | "empty";
    blocks: TocBlock[];
}

/** One numbered entry of the annotated transcript */
export interface AnnotatedEntry {
    index: number;
    heading: string;
    anchor: string;
    text: string;
}

// ---------------------------------------------------------------------------
// AI capability
// ---------------------------------------------------------------------------

/** Payload handed to the AI capability for one segment or chunk */
export interface TopicRequest {
    kind: SegmentKind;
    /** Bounded excerpt of the unit's text */
    text: string;
    page: number;
    line: number;
    /** A few lines preceding the unit, for context */
    precedingLines: string[];
    /** Upper bound on topics the capability should return */
    maxTopics: number;
}

/**
 * Contract for the language-model backend. Implementations return the raw
 * reply text; parsing and normalization happen in the core so that malformed
 * replies can be retried uniformly.
 */
export interface AiCapability {
    /** Human-readable name (for logging / metadata) */
    readonly name: string;

    generateTopics(request: TopicRequest): Promise<string>;

    generateToc(topics: Topic[]): Promise<string>;
}

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;
