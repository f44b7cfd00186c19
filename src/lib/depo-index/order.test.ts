import { describe, expect, it } from "vitest";
import { SortKeyError } from "./errors";
import { canonicalizeTopics, deduplicateTopics, orderTopics } from "./order";
import type { Topic } from "./types";

function topic(title: string, page: number, line: number, confidence = 0.5): Topic {
    return { title, page, line, context: "", isKeyIssue: false, confidence, relatedTopics: [] };
}

describe("orderTopics", () => {
    it("sorts by page, line, then confidence descending", () => {
        const ordered = orderTopics([
            topic("c", 2, 1),
            topic("b", 1, 8, 0.3),
            topic("a", 1, 8, 0.9),
            topic("d", 1, 2),
        ]);

        expect(ordered.map((t) => t.title)).toEqual(["d", "a", "b", "c"]);
    });

    it("keeps discovery order for full ties", () => {
        const ordered = orderTopics([topic("first", 1, 1), topic("second", 1, 1), topic("third", 1, 1)]);
        expect(ordered.map((t) => t.title)).toEqual(["first", "second", "third"]);
    });

    it("is idempotent", () => {
        const once = orderTopics([topic("b", 3, 1), topic("a", 1, 4), topic("c", 1, 4, 0.8)]);
        expect(orderTopics(once)).toEqual(once);
    });

    it("throws SortKeyError for a topic without an anchor", () => {
        expect(() => orderTopics([topic("ok", 1, 1), topic("bad", 0, 3)])).toThrow(SortKeyError);
    });
});

describe("deduplicateTopics", () => {
    it("drops later repeats of page, line and title regardless of case", () => {
        const kept = deduplicateTopics([topic("Lease", 1, 4, 0.9), topic("lease ", 1, 4, 0.4), topic("Lease", 1, 5)]);

        expect(kept).toEqual([topic("Lease", 1, 4, 0.9), topic("Lease", 1, 5)]);
    });
});

describe("canonicalizeTopics", () => {
    it("keeps the most confident of duplicate topics", () => {
        const canonical = canonicalizeTopics([topic("Rent", 2, 3, 0.4), topic("RENT", 2, 3, 0.8)]);
        expect(canonical).toEqual([topic("RENT", 2, 3, 0.8)]);
    });
});
