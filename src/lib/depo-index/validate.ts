/**
 * DepoIndex: Topic Validation
 *
 * Partitions candidate records into canonical topics and rejections. Nothing
 * here throws: every candidate ends up in exactly one partition.
 */

import { z } from "zod";
import { defaultLogger } from "./logger";
import { isRecord } from "./normalize";
import type { Logger, Topic, ValidationRejection, ValidationResult } from "./types";

/** Fields every downstream stage depends on */
export const REQUIRED_FIELDS = ["title", "page", "line", "confidence"] as const;

const clampConfidence = (value: number) => Math.min(1, Math.max(0, value));

const anchorSchema = z
    .number({ invalid_type_error: "must be a number" })
    .int("must be an integer")
    .min(1, "must be at least 1");

const candidateSchema = z.object({
    title: z.string({ invalid_type_error: "must be a string" }).trim().min(1, "must not be empty"),
    page: anchorSchema,
    line: anchorSchema,
    confidence: z.number({ invalid_type_error: "must be a number" }).transform(clampConfidence),
    context: z
        .string({ invalid_type_error: "must be a string" })
        .nullish()
        .transform((value) => value ?? ""),
    is_key_issue: z
        .boolean({ invalid_type_error: "must be a boolean" })
        .nullish()
        .transform((value) => value ?? false),
    related_topics: z
        .array(z.string({ invalid_type_error: "must be a string" }), {
            invalid_type_error: "must be a list",
        })
        .nullish()
        .transform((value) => value ?? []),
    legal_significance: z
        .string({ invalid_type_error: "must be a string" })
        .nullish()
        .transform((value) => value ?? undefined),
});

export type TopicCheck =
    | { ok: true; topic: Topic }
    | { ok: false; rejection: ValidationRejection };

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.join(".") || "candidate"} ${issue.message}`)
        .join("; ");
}

/** Check a single candidate found at the given 1-based position */
export function validateTopic(candidate: unknown, position: number): TopicCheck {
    if (!isRecord(candidate)) {
        return {
            ok: false,
            rejection: { position, reason: "candidate is not a record", missing: [], candidate },
        };
    }

    const missing = REQUIRED_FIELDS.filter(
        (field) => candidate[field] === undefined || candidate[field] === null
    );
    if (missing.length > 0) {
        return {
            ok: false,
            rejection: {
                position,
                reason: `missing required field(s): ${missing.join(", ")}`,
                missing: [...missing],
                candidate,
            },
        };
    }

    const parsed = candidateSchema.safeParse(candidate);
    if (!parsed.success) {
        return {
            ok: false,
            rejection: { position, reason: formatIssues(parsed.error), missing: [], candidate },
        };
    }

    const data = parsed.data;
    const topic: Topic = {
        title: data.title,
        page: data.page,
        line: data.line,
        context: data.context,
        isKeyIssue: data.is_key_issue,
        confidence: data.confidence,
        relatedTopics: data.related_topics,
    };
    if (data.legal_significance !== undefined) {
        topic.legalSignificance = data.legal_significance;
    }
    return { ok: true, topic };
}

/**
 * Partition candidates into valid topics (input order preserved) and
 * rejections carrying their 1-based position and reason.
 */
export function validateTopics(candidates: unknown[], logger: Logger = defaultLogger): ValidationResult {
    const result: ValidationResult = { valid: [], invalid: [] };

    candidates.forEach((candidate, index) => {
        const check = validateTopic(candidate, index + 1);
        if (check.ok) {
            result.valid.push(check.topic);
            return;
        }
        logger.warn(
            `[TopicValidator] candidate ${check.rejection.position} rejected: ${check.rejection.reason}`
        );
        result.invalid.push(check.rejection);
    });

    return result;
}
