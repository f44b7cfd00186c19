import { describe, expect, it, vi } from "vitest";
import { EmptyInputError } from "./errors";
import { silentLogger } from "./logger";
import { TopicPipeline } from "./pipeline";
import { RateLimiter, type Clock } from "./rate-limit";
import { TOC_TITLE } from "./toc";
import type { AiCapability, TopicRequest } from "./types";

const transcript = [
    "Page 1",
    "MS. LOPEZ: The contract was signed on March 3rd.",
    "THE WITNESS: Yes, I was present.",
    "",
    "Q. Who else attended the meeting?",
    "A. Only the project manager.",
].join("\n");

function recordingClock() {
    const sleeps: number[] = [];
    const clock: Clock = {
        now: () => 0,
        sleep: async (ms) => {
            sleeps.push(ms);
        },
    };
    return { clock, sleeps };
}

function fakeAi(topics: (request: TopicRequest) => Promise<string>, toc: () => Promise<string>) {
    return {
        name: "fake",
        generateTopics: vi.fn(topics),
        generateToc: vi.fn(toc),
    } satisfies AiCapability;
}

describe("TopicPipeline", () => {
    it("runs end to end without an AI capability", async () => {
        const pipeline = new TopicPipeline({ logger: silentLogger });
        const result = await pipeline.run(transcript, { source: "depo.txt" });

        expect(result.status).toBe("ok");
        expect(result.mode).toBe("fallback");
        expect(result.topics.map((topic) => [topic.title, topic.page, topic.line, topic.confidence])).toEqual([
            ["The contract was signed on March 3rd", 1, 2, 0.5],
            ["Who else attended the meeting", 1, 5, 0.5],
        ]);
        expect(result.toc).toEqual({
            source: "fallback",
            blocks: [
                { kind: "heading", level: 1, text: TOC_TITLE },
                { kind: "heading", level: 2, text: "Page 1" },
                { kind: "line", bullet: true, text: "The contract was signed on March 3rd · Line 2 · 50%" },
                { kind: "line", bullet: true, text: "Who else attended the meeting · Line 5 · 50%" },
            ],
        });
        expect(result.annotated[1]).toEqual({
            index: 2,
            heading: "2. Who else attended the meeting",
            anchor: "(Page 1 · Line 5)",
            text: "Q. Who else attended the meeting? A. Only the project manager.",
        });
        expect(result.metadata).toMatchObject({
            run_id: result.runId,
            source: "depo.txt",
            mode: "fallback",
            unit: "segment",
            topic_count: 2,
            key_issue_count: 0,
            invalid_count: 0,
            rejected: [],
            toc_source: "fallback",
        });
        expect(result.runId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    });

    it("anchors topics on printed page and line numbers", async () => {
        const pipeline = new TopicPipeline({ logger: silentLogger });
        const result = await pipeline.run(
            "Page 1\nLine 1: The lease was signed in May.\nPage 2\nLine 1: The rent was never paid."
        );

        expect(result.topics.map((topic) => [topic.page, topic.line, topic.title])).toEqual([
            [1, 1, "The lease was signed in May"],
            [2, 1, "The rent was never paid"],
        ]);
    });

    it("raises EmptyInputError before any extraction", async () => {
        const ai = fakeAi(async () => '{"topics": []}', async () => "");
        const pipeline = new TopicPipeline({ ai, logger: silentLogger });

        await expect(pipeline.run("")).rejects.toBeInstanceOf(EmptyInputError);
        expect(ai.generateTopics).not.toHaveBeenCalled();
    });

    it("orders valid topics, reports invalid ones and shares one rate limit", async () => {
        const { clock, sleeps } = recordingClock();
        const ai = fakeAi(
            async () =>
                JSON.stringify([
                    { title: "X", page: 2, line: 5, confidence: 0.9 },
                    { title: "Y", page: 1, line: 9, confidence: 0.4 },
                    { page: 1, line: 2 },
                ]),
            async () => "# Index\n- Y\n- X"
        );
        const pipeline = new TopicPipeline({ ai, clock, topicsPerSegment: 3, logger: silentLogger });

        const result = await pipeline.run("MS. LOPEZ: The contract was signed on March 3rd.");

        expect(result.mode).toBe("ai");
        expect(result.topics.map((topic) => topic.title)).toEqual(["Y", "X"]);
        expect(result.invalid.map((rejection) => [rejection.position, rejection.missing])).toEqual([[3, ["title"]]]);
        expect(result.metadata.invalid_count).toBe(1);
        expect(result.metadata.rejected).toEqual([
            { position: 3, reason: "missing required field(s): title", missing: ["title"] },
        ]);
        expect(result.toc.source).toBe("ai");
        // topic call at t=0, TOC call held back by the shared 1.5s interval
        expect(sleeps).toEqual([1500]);
    });

    it("finishes with no_topics when nothing survives", async () => {
        const { clock } = recordingClock();
        const ai = fakeAi(async () => '{"topics": []}', async () => "# Index");
        const pipeline = new TopicPipeline({
            ai,
            clock,
            rateLimiter: new RateLimiter(0, clock),
            logger: silentLogger,
        });

        const result = await pipeline.run(transcript);

        expect(result.status).toBe("no_topics");
        expect(result.topics).toEqual([]);
        expect(result.toc).toEqual({ source: "empty", blocks: [] });
        expect(result.metadata.topic_count).toBe(0);
        expect(ai.generateToc).not.toHaveBeenCalled();
    });

    it("can extract per chunk", async () => {
        const pipeline = new TopicPipeline({ unit: "chunk", logger: silentLogger });
        const result = await pipeline.run(transcript);

        expect(result.metadata.unit).toBe("chunk");
        expect(result.outcomes.map((outcome) => outcome.segment.startLine)).toEqual([2, 5]);
    });
});
