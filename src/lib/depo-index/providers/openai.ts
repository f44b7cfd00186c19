import OpenAI from "openai";
import { serializeTopic } from "../artifact";
import type { DepoIndexConfig } from "../config";
import { CapabilityUnavailableError } from "../errors";
import type { AiCapability, Topic, TopicRequest } from "../types";

export const DEFAULT_MODEL = "gpt-4o-mini";
const DEFAULT_TEMPERATURE = 0.3;
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

interface OpenAITopicCapabilityOptions {
    apiKey?: string;
    model?: string;
    baseUrl?: string;
    temperature?: number;
    /** Per-request timeout; a timed-out call counts as one failed attempt */
    timeoutMs?: number;
}

const TOPIC_SYSTEM_PROMPT =
    "You index legal deposition transcripts. Reply with a single JSON object and nothing else.";

const TOC_SYSTEM_PROMPT =
    "You format tables of contents for legal deposition transcripts. Reply in Markdown only.";

export function isPlaceholderKey(apiKey: string): boolean {
    return apiKey.includes("your_openai_api_key_here") || apiKey.startsWith("your_");
}

export function buildTopicPrompt(request: TopicRequest): string {
    const preceding =
        request.precedingLines.length > 0
            ? `Preceding lines (context only, do not index):\n${request.precedingLines.join("\n")}\n\n`
            : "";

    return [
        `Identify up to ${request.maxTopics} key topic(s) discussed in this deposition ${request.kind}.`,
        `It starts on page ${request.page}, line ${request.line}.`,
        "For each topic give a concise 3-7 word title, the page and line where it starts,",
        "a short verbatim context excerpt, whether it is a key legal issue,",
        "a confidence score between 0 and 1 and related legal concepts.",
        "",
        'Return {"topics": [{"title": string, "page": int, "line": int, "context": string,',
        '"is_key_issue": bool, "confidence": float, "related_topics": [string],',
        '"legal_significance": string}]}. Return {"topics": []} when nothing is worth indexing.',
        "",
        `${preceding}Transcript:\n${request.text}`,
    ].join("\n");
}

export function buildTocPrompt(topics: Topic[]): string {
    return [
        "Create a professional table of contents for a legal deposition from these topics,",
        "which are already in page and line order:",
        JSON.stringify(topics.map(serializeTopic), null, 2),
        "",
        "Group related topics into sections, keep every page/line reference,",
        "mark key issues and use Markdown headings and bullet lists.",
    ].join("\n");
}

/**
 * AI capability backed by the OpenAI chat completions API. Returns raw reply
 * text; parsing and retries belong to the callers.
 */
export class OpenAITopicCapability implements AiCapability {
    readonly name: string;

    private readonly client: OpenAI;
    private readonly model: string;
    private readonly temperature: number;

    constructor(options: OpenAITopicCapabilityOptions = {}) {
        const apiKey = (options.apiKey ?? process.env.OPENAI_API_KEY ?? "").trim();
        if (!apiKey) {
            throw new CapabilityUnavailableError(
                "[OpenAITopicCapability] Missing OPENAI_API_KEY. Pass it via options or environment variable."
            );
        }
        if (isPlaceholderKey(apiKey)) {
            throw new CapabilityUnavailableError(
                "[OpenAITopicCapability] OPENAI_API_KEY is still a placeholder. Update .env with a real key."
            );
        }

        // One call is one HTTP request: retries and pacing belong to withRetry and the RateLimiter
        this.client = new OpenAI({
            apiKey,
            baseURL: options.baseUrl,
            maxRetries: 0,
            timeout: options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
        });
        this.model = options.model ?? DEFAULT_MODEL;
        this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
        this.name = `openai:${this.model}`;
    }

    async generateTopics(request: TopicRequest): Promise<string> {
        const completion = await this.client.chat.completions.create({
            model: this.model,
            temperature: this.temperature,
            response_format: { type: "json_object" },
            messages: [
                { role: "system", content: TOPIC_SYSTEM_PROMPT },
                { role: "user", content: buildTopicPrompt(request) },
            ],
        });
        return completion.choices[0]?.message?.content ?? "";
    }

    async generateToc(topics: Topic[]): Promise<string> {
        const completion = await this.client.chat.completions.create({
            model: this.model,
            temperature: this.temperature,
            messages: [
                { role: "system", content: TOC_SYSTEM_PROMPT },
                { role: "user", content: buildTocPrompt(topics) },
            ],
        });
        return completion.choices[0]?.message?.content ?? "";
    }
}

/**
 * Build the configured capability, or null when no key is set so the
 * pipeline runs on its fallback paths. A placeholder key still throws.
 */
export function createCapability(
    config: Pick<DepoIndexConfig, "apiKey" | "model" | "baseUrl">
): AiCapability | null {
    if (!config.apiKey) return null;
    return new OpenAITopicCapability({
        apiKey: config.apiKey,
        model: config.model,
        baseUrl: config.baseUrl,
    });
}
