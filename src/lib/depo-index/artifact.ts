/**
 * DepoIndex: Persisted Artifact
 *
 * The JSON document handed to exporters: top-level `metadata` and an ordered
 * `topics` list. Field names on the wire are fixed; `Topic` objects only cross
 * this boundary through `serializeTopic` / `deserializeTopics`.
 */

import { MalformedResponseError } from "./errors";
import { silentLogger } from "./logger";
import { isRecord, parseStructuredResponse } from "./normalize";
import type {
    InvalidTopicReport,
    Logger,
    SegmentKind,
    TocDocument,
    Topic,
    TopicSource,
    ValidationResult,
} from "./types";
import { validateTopics } from "./validate";

/** Wire shape of one topic */
export interface TopicRecord {
    title: string;
    page: number;
    line: number;
    context: string;
    is_key_issue: boolean;
    confidence: number;
    related_topics: string[];
    legal_significance?: string;
}

/** A rejected candidate as recorded in the artifact */
export interface RejectedCandidateRecord {
    position: number;
    reason: string;
    missing: string[];
}

export interface ArtifactMetadata {
    run_id: string;
    generated_at: string;
    source: string;
    mode: TopicSource;
    unit: SegmentKind;
    topic_count: number;
    key_issue_count: number;
    invalid_count: number;
    rejected: RejectedCandidateRecord[];
    toc_source: TocDocument["source"];
}

export interface TopicArtifact {
    metadata: ArtifactMetadata;
    topics: TopicRecord[];
}

export interface ParsedArtifact {
    /** Metadata as found in the document; not validated */
    metadata: Record<string, unknown>;
    topics: Topic[];
    invalid: InvalidTopicReport;
}

export function serializeTopic(topic: Topic): TopicRecord {
    const record: TopicRecord = {
        title: topic.title,
        page: topic.page,
        line: topic.line,
        context: topic.context,
        is_key_issue: topic.isKeyIssue,
        confidence: topic.confidence,
        related_topics: [...topic.relatedTopics],
    };
    if (topic.legalSignificance !== undefined) {
        record.legal_significance = topic.legalSignificance;
    }
    return record;
}

/**
 * Read wire records back into topics. Older artifacts that use `topic` and
 * `text` instead of `title` and `context` are accepted.
 */
export function deserializeTopics(records: unknown[], logger: Logger = silentLogger): ValidationResult {
    const aliased = records.map((record) => {
        if (!isRecord(record)) return record;
        const { topic, text, ...rest } = record;
        return {
            ...rest,
            title: rest.title ?? topic,
            context: rest.context ?? text,
        };
    });
    return validateTopics(aliased, logger);
}

export function buildArtifact(topics: Topic[], metadata: ArtifactMetadata): TopicArtifact {
    return { metadata, topics: topics.map(serializeTopic) };
}

export function stringifyArtifact(artifact: TopicArtifact): string {
    return JSON.stringify(artifact, null, 2);
}

/**
 * Parse a persisted artifact.
 *
 * @throws MalformedResponseError when the document is neither a topic list
 * nor an object with a `topics` list
 */
export function parseArtifact(json: string, logger: Logger = silentLogger): ParsedArtifact {
    const document = parseStructuredResponse(json);

    // Bare topic lists predate the metadata envelope
    if (Array.isArray(document)) {
        const { valid, invalid } = deserializeTopics(document, logger);
        return { metadata: {}, topics: valid, invalid };
    }
    if (!isRecord(document) || !Array.isArray(document.topics)) {
        throw new MalformedResponseError("Artifact must be an object with a `topics` list.");
    }

    const { valid, invalid } = deserializeTopics(document.topics, logger);
    return {
        metadata: isRecord(document.metadata) ? document.metadata : {},
        topics: valid,
        invalid,
    };
}
