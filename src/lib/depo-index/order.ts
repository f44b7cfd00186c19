/**
 * DepoIndex: Canonical Ordering
 *
 * The canonical list is sorted by (page asc, line asc, confidence desc), with
 * ties kept in discovery order. Every exporter relies on this order.
 */

import { SortKeyError } from "./errors";
import type { Topic } from "./types";

function isAnchor(value: unknown): value is number {
    return typeof value === "number" && Number.isInteger(value) && value >= 1;
}

/** Compare two topics by the canonical key, without the discovery tiebreak */
export function compareTopics(a: Topic, b: Topic): number {
    return a.page - b.page || a.line - b.line || b.confidence - a.confidence;
}

/**
 * Stable sort into canonical order. Idempotent.
 *
 * @throws SortKeyError if a topic lacks a positive integer page or line,
 * which validation should have made impossible
 */
export function orderTopics(topics: Topic[]): Topic[] {
    topics.forEach((topic, index) => {
        if (!isAnchor(topic.page) || !isAnchor(topic.line)) {
            throw new SortKeyError(`Topic at index ${index} has no sortable page/line anchor.`, {
                index,
                page: topic.page,
                line: topic.line,
            });
        }
    });

    return topics
        .map((topic, index) => ({ topic, index }))
        .sort((a, b) => compareTopics(a.topic, b.topic) || a.index - b.index)
        .map((entry) => entry.topic);
}

function dedupeKey(topic: Topic): string {
    return `${topic.page}:${topic.line}:${topic.title.trim().toLowerCase()}`;
}

/**
 * Drop topics repeating an earlier topic's page, line and (case-insensitive)
 * title. On an ordered list the survivor is the most confident one.
 */
export function deduplicateTopics(ordered: Topic[]): Topic[] {
    const seen = new Set<string>();
    return ordered.filter((topic) => {
        const key = dedupeKey(topic);
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
    });
}

/** Order, then deduplicate */
export function canonicalizeTopics(topics: Topic[]): Topic[] {
    return deduplicateTopics(orderTopics(topics));
}
