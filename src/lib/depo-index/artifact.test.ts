import { describe, expect, it } from "vitest";
import { annotateTranscript } from "./annotate";
import {
    buildArtifact,
    parseArtifact,
    serializeTopic,
    stringifyArtifact,
    type ArtifactMetadata,
} from "./artifact";
import { MalformedResponseError } from "./errors";
import type { Topic } from "./types";

const lease: Topic = {
    title: "Lease renewal",
    page: 2,
    line: 14,
    context: "  Q. Did you renew the lease? A. In May.  ",
    isKeyIssue: true,
    confidence: 0.8,
    relatedTopics: ["rent"],
    legalSignificance: "Shows notice of the renewal clause.",
};

const deposit: Topic = {
    title: "Security deposit",
    page: 3,
    line: 2,
    context: "A. It was never returned.",
    isKeyIssue: false,
    confidence: 0.6,
    relatedTopics: [],
};

const metadata: ArtifactMetadata = {
    run_id: "run-1",
    generated_at: "2024-05-01T12:00:00.000Z",
    source: "depo.txt",
    mode: "ai",
    unit: "segment",
    topic_count: 2,
    key_issue_count: 1,
    invalid_count: 1,
    rejected: [{ position: 3, reason: "missing required field(s): title", missing: ["title"] }],
    toc_source: "ai",
};

describe("serializeTopic", () => {
    it("uses wire field names and omits an absent legal significance", () => {
        expect(serializeTopic(deposit)).toStrictEqual({
            title: "Security deposit",
            page: 3,
            line: 2,
            context: "A. It was never returned.",
            is_key_issue: false,
            confidence: 0.6,
            related_topics: [],
        });
    });
});

describe("parseArtifact", () => {
    it("reads back what was written", () => {
        const parsed = parseArtifact(stringifyArtifact(buildArtifact([lease, deposit], metadata)));

        expect(parsed.topics).toEqual([lease, deposit]);
        expect(parsed.metadata).toEqual(metadata);
        expect(parsed.invalid).toEqual([]);
    });

    it("accepts a bare list with older field names", () => {
        const parsed = parseArtifact('[{"topic": "Lease", "page": 2, "line": 4, "text": "excerpt", "confidence": 0.6}]');

        expect(parsed.metadata).toEqual({});
        expect(parsed.topics).toEqual([
            {
                title: "Lease",
                page: 2,
                line: 4,
                context: "excerpt",
                isKeyIssue: false,
                confidence: 0.6,
                relatedTopics: [],
            },
        ]);
    });

    it("reports invalid records instead of dropping them silently", () => {
        const parsed = parseArtifact('{"topics": [{"title": "No anchor", "confidence": 0.5}]}');

        expect(parsed.topics).toEqual([]);
        expect(parsed.invalid.map((rejection) => rejection.missing)).toEqual([["page", "line"]]);
    });

    it("rejects a document without topics", () => {
        expect(() => parseArtifact('{"foo": 1}')).toThrow(MalformedResponseError);
    });
});

describe("annotateTranscript", () => {
    it("numbers entries and anchors them", () => {
        expect(annotateTranscript([lease, deposit])).toEqual([
            {
                index: 1,
                heading: "1. Lease renewal",
                anchor: "(Page 2 · Line 14)",
                text: "Q. Did you renew the lease? A. In May.",
            },
            {
                index: 2,
                heading: "2. Security deposit",
                anchor: "(Page 3 · Line 2)",
                text: "A. It was never returned.",
            },
        ]);
    });
});
