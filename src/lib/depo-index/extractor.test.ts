import { describe, expect, it, vi } from "vitest";
import { collectCandidates, fallbackCandidate, TopicExtractor } from "./extractor";
import { silentLogger } from "./logger";
import { cleanTranscript, segmentLines } from "./preprocess";
import { RateLimiter, type Clock } from "./rate-limit";
import type { AiCapability, ExtractionOutcome, Segment, TopicRequest } from "./types";

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

function fakeAi(generateTopics: (request: TopicRequest) => Promise<string>) {
    const capability = {
        name: "fake",
        generateTopics: vi.fn(generateTopics),
        generateToc: vi.fn(async () => ""),
    } satisfies AiCapability;
    return capability;
}

const contractSegment: Segment = {
    kind: "segment",
    lines: ["The contract was signed on March 3rd."],
    startLine: 4,
    page: 1,
};

describe("fallback mode", () => {
    it("derives a topic from the cleaned statement", async () => {
        const [segment] = segmentLines(cleanTranscript("MS. LOPEZ: The contract was signed on March 3rd."));
        const extractor = new TopicExtractor({ logger: silentLogger });

        expect(extractor.mode).toBe("fallback");
        expect(await extractor.extract(segment)).toEqual({
            status: "topics",
            source: "fallback",
            segment,
            candidates: [
                {
                    title: "The contract was signed on March 3rd",
                    page: 1,
                    line: 1,
                    context: "The contract was signed on March 3rd.",
                    is_key_issue: false,
                    confidence: 0.5,
                    related_topics: [],
                },
            ],
        });
    });

    it("never touches the rate limiter", async () => {
        const { clock, sleeps } = recordingClock();
        const rateLimiter = new RateLimiter(1500, clock);
        const reserve = rateLimiter.acquire.bind(rateLimiter);
        const slots: number[] = [];
        const acquire = vi.spyOn(rateLimiter, "acquire").mockImplementation(async () => {
            const slot = await reserve();
            slots.push(slot);
            return slot;
        });
        const extractor = new TopicExtractor({ rateLimiter, clock, logger: silentLogger });

        const outcomes = await extractor.extractAll([contractSegment, { ...contractSegment, startLine: 9 }]);

        expect(outcomes.map((outcome) => outcome.status)).toEqual(["topics", "topics"]);
        expect(acquire).not.toHaveBeenCalled();
        expect(sleeps).toEqual([]);
    });
});

describe("AI mode", () => {
    it("normalizes the reply and caps it at topicsPerSegment", async () => {
        const { clock } = recordingClock();
        const ai = fakeAi(async () =>
            JSON.stringify({
                topics: [
                    { title: "Contract signing", page: 1, line: 4, confidence: 0.9, is_key_issue: true },
                    { title: "Second", confidence: 0.2 },
                ],
            })
        );
        const extractor = new TopicExtractor({
            ai,
            clock,
            rateLimiter: new RateLimiter(0, clock),
            logger: silentLogger,
        });

        const outcome = await extractor.extract(contractSegment);

        expect(outcome).toEqual({
            status: "topics",
            source: "ai",
            segment: contractSegment,
            candidates: [
                {
                    title: "Contract signing",
                    page: 1,
                    line: 4,
                    context: "The contract was signed on March 3rd.",
                    is_key_issue: true,
                    confidence: 0.9,
                    related_topics: [],
                },
            ],
        });
    });

    it("retries a malformed reply", async () => {
        const { clock, sleeps } = recordingClock();
        const replies = ["not json", '{"topics": [{"title": "Contract signing"}]}'];
        const ai = fakeAi(async () => replies.shift() ?? "");
        const extractor = new TopicExtractor({
            ai,
            clock,
            rateLimiter: new RateLimiter(0, clock),
            logger: silentLogger,
        });

        const outcome = await extractor.extract(contractSegment);

        expect(outcome.status === "topics" && outcome.source).toBe("ai");
        expect(ai.generateTopics).toHaveBeenCalledTimes(2);
        expect(sleeps).toEqual([1000]);
    });

    it("treats an empty topic list as no candidates", async () => {
        const { clock } = recordingClock();
        const ai = fakeAi(async () => '{"topics": []}');
        const extractor = new TopicExtractor({
            ai,
            clock,
            rateLimiter: new RateLimiter(0, clock),
            logger: silentLogger,
        });

        expect(await extractor.extract(contractSegment)).toEqual({
            status: "topics",
            source: "ai",
            segment: contractSegment,
            candidates: [],
        });
    });

    it("falls back per segment after three failures and keeps the batch going", async () => {
        const { clock, sleeps } = recordingClock();
        const ai = fakeAi(async () => {
            throw new Error("service unavailable");
        });
        const extractor = new TopicExtractor({
            ai,
            clock,
            concurrency: 1,
            rateLimiter: new RateLimiter(0, clock),
            logger: silentLogger,
        });
        const second: Segment = { kind: "segment", lines: ["Q. Who drafted the lease?"], startLine: 12, page: 1 };

        const outcomes = await extractor.extractAll([contractSegment, second]);

        expect(ai.generateTopics).toHaveBeenCalledTimes(6);
        expect(sleeps).toEqual([1000, 2000, 1000, 2000]);
        expect(outcomes).toEqual([
            { status: "topics", source: "fallback", segment: contractSegment, candidates: [fallbackCandidate(contractSegment)] },
            { status: "topics", source: "fallback", segment: second, candidates: [fallbackCandidate(second)] },
        ]);
        expect(fallbackCandidate(second).title).toBe("Who drafted the lease");
    });

    it("passes the previous segment's closing lines as context", async () => {
        const { clock } = recordingClock();
        const requests: TopicRequest[] = [];
        const ai = fakeAi(async (request) => {
            requests.push(request);
            return '{"topics": []}';
        });
        const extractor = new TopicExtractor({
            ai,
            clock,
            concurrency: 1,
            rateLimiter: new RateLimiter(0, clock),
            logger: silentLogger,
        });
        const first: Segment = {
            kind: "segment",
            lines: ["Line one here.", "Line two here.", "Line three here.", "Line four here."],
            startLine: 1,
            page: 1,
        };

        await extractor.extractAll([first, contractSegment]);

        expect(requests[0].precedingLines).toEqual([]);
        expect(requests[1]).toEqual({
            kind: "segment",
            text: "The contract was signed on March 3rd.",
            page: 1,
            line: 4,
            precedingLines: ["Line two here.", "Line three here.", "Line four here."],
            maxTopics: 1,
        });
    });
});

describe("pacing", () => {
    it("spaces every call at least 1.5s apart across four workers", async () => {
        const { clock } = recordingClock();
        const rateLimiter = new RateLimiter(1500, clock);
        const reserve = rateLimiter.acquire.bind(rateLimiter);
        const slots: number[] = [];
        vi.spyOn(rateLimiter, "acquire").mockImplementation(async () => {
            const slot = await reserve();
            slots.push(slot);
            return slot;
        });
        let active = 0;
        let peak = 0;
        const ai = fakeAi(async () => {
            active++;
            peak = Math.max(peak, active);
            await Promise.resolve();
            active--;
            return '{"topics": []}';
        });
        const extractor = new TopicExtractor({ ai, clock, rateLimiter, concurrency: 4, logger: silentLogger });
        const segments = Array.from(
            { length: 120 },
            (_, index): Segment => ({
                kind: "segment",
                lines: [`Statement ${index + 1} about the lease.`],
                startLine: index + 1,
                page: 1,
            })
        );

        const outcomes = await extractor.extractAll(segments);
        slots.sort((a, b) => a - b);

        expect(outcomes).toHaveLength(120);
        expect(ai.generateTopics).toHaveBeenCalledTimes(120);
        expect(peak).toBeLessThanOrEqual(4);
        expect(slots).toHaveLength(120);
        expect(slots[119]).toBe(119 * 1500);
        slots.slice(1).forEach((slot, index) => {
            expect(slot - slots[index]).toBeGreaterThanOrEqual(1500);
        });
    });
});

describe("TopicExtractor options", () => {
    it("rejects out-of-range settings", () => {
        expect(() => new TopicExtractor({ topicsPerSegment: 11 })).toThrow(RangeError);
        expect(() => new TopicExtractor({ concurrency: 0 })).toThrow(RangeError);
    });
});

describe("collectCandidates", () => {
    it("skips failed outcomes", () => {
        const outcomes: ExtractionOutcome[] = [
            { status: "topics", source: "ai", segment: contractSegment, candidates: [{ title: "A" }] },
            { status: "error", segment: contractSegment, error: "boom" },
            { status: "topics", source: "fallback", segment: contractSegment, candidates: [{ title: "B" }] },
        ];
        expect(collectCandidates(outcomes)).toEqual([{ title: "A" }, { title: "B" }]);
    });
});
