import type { AnnotatedEntry, Topic } from "./types";

/**
 * One numbered entry per topic, in canonical order, each carrying its
 * page/line anchor and the excerpt that produced it.
 */
export function annotateTranscript(topics: Topic[]): AnnotatedEntry[] {
    return topics.map((topic, index) => ({
        index: index + 1,
        heading: `${index + 1}. ${topic.title}`,
        anchor: `(Page ${topic.page} · Line ${topic.line})`,
        text: topic.context.trim(),
    }));
}
