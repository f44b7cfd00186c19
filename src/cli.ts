/**
 * depo-index: command-line entry point
 *
 * Reads a plain-text deposition transcript, runs the topic pipeline and
 * writes the JSON artifact. The TOC is echoed as plain text for a quick look.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { parseArgs } from "node:util";
import {
    buildArtifact,
    CapabilityUnavailableError,
    ConfigError,
    createCapability,
    createLogger,
    DepoIndexError,
    loadConfig,
    stringifyArtifact,
    TopicPipeline,
} from "./lib/depo-index";
import type { AiCapability, DepoIndexConfig, Logger, SegmentKind, TocDocument } from "./lib/depo-index";
import { MAX_TOPICS_PER_SEGMENT } from "./lib/depo-index/extractor";

export const USAGE =
    "Usage: depo-index --in <transcript.txt> [--out <topics.json>] [--topics N] " +
    "[--workers N] [--unit segment|chunk] [--api-key KEY]";

export interface CliOptions {
    input: string;
    output: string;
    topicsPerSegment: number;
    workers: number;
    unit: SegmentKind;
    apiKey?: string;
}

type Output = Pick<Console, "log" | "error">;

function parseCount(flag: string, raw: string | undefined, fallback: number, max?: number): number {
    if (raw === undefined) return fallback;
    const value = /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : NaN;
    const upper = max ?? Number.MAX_SAFE_INTEGER;
    if (!Number.isInteger(value) || value < 1 || value > upper) {
        const range = max === undefined ? "a positive integer" : `an integer between 1 and ${max}`;
        throw new ConfigError([`--${flag} must be ${range}, received "${raw}"`]);
    }
    return value;
}

/** `<dir>/<name>.topics.json` beside the transcript */
export function defaultOutputPath(input: string): string {
    const parsed = path.parse(input);
    return path.join(parsed.dir, `${parsed.name}.topics.json`);
}

/**
 * Parse command-line flags on top of the environment config; flags win.
 *
 * @throws ConfigError for unknown flags, a missing `--in` or out-of-range values
 */
export function parseCliArgs(argv: string[], config: DepoIndexConfig): CliOptions {
    let values: {
        in?: string;
        out?: string;
        topics?: string;
        workers?: string;
        unit?: string;
        "api-key"?: string;
    };
    try {
        ({ values } = parseArgs({
            args: argv,
            options: {
                in: { type: "string" },
                out: { type: "string" },
                topics: { type: "string" },
                workers: { type: "string" },
                unit: { type: "string" },
                "api-key": { type: "string" },
            },
            strict: true,
            allowPositionals: false,
        }));
    } catch (error) {
        throw new ConfigError([error instanceof Error ? error.message : String(error)]);
    }

    const input = values.in?.trim();
    if (!input) {
        throw new ConfigError(["--in is required"]);
    }

    let unit: SegmentKind = config.unit;
    if (values.unit !== undefined) {
        if (values.unit !== "segment" && values.unit !== "chunk") {
            throw new ConfigError([`--unit must be "segment" or "chunk", received "${values.unit}"`]);
        }
        unit = values.unit;
    }

    return {
        input,
        output: values.out?.trim() || defaultOutputPath(input),
        topicsPerSegment: parseCount("topics", values.topics, config.topicsPerSegment, MAX_TOPICS_PER_SEGMENT),
        workers: parseCount("workers", values.workers, config.workers),
        unit,
        apiKey: values["api-key"]?.trim() || config.apiKey,
    };
}

/** Indented plain-text view of a TOC, for the terminal */
export function renderTocText(doc: TocDocument): string {
    if (doc.blocks.length === 0) return "(no table of contents)";

    let depth = 0;
    return doc.blocks
        .map((block) => {
            if (block.kind === "heading") {
                depth = block.level;
                return `${"  ".repeat(block.level - 1)}${block.text}`;
            }
            const indent = "  ".repeat(depth);
            return block.bullet ? `${indent}- ${block.text}` : `${indent}${block.text}`;
        })
        .join("\n");
}

function resolveCapability(config: DepoIndexConfig, apiKey: string | undefined, logger: Logger): AiCapability | null {
    try {
        return createCapability({ ...config, apiKey });
    } catch (error) {
        if (!(error instanceof CapabilityUnavailableError)) throw error;
        logger.warn(`[depo-index] ${error.message} Continuing without AI.`);
        return null;
    }
}

/**
 * Run the CLI and resolve to the process exit code: 0 on success (including
 * a run that found no topics), 1 on bad input, bad configuration or IO errors.
 */
export async function runCli(
    argv: string[],
    env: NodeJS.ProcessEnv = process.env,
    out: Output = console
): Promise<number> {
    try {
        const config = loadConfig(env);
        const options = parseCliArgs(argv, config);
        const logger = createLogger(config.logLevel);

        const rawText = await readFile(options.input, "utf-8");
        const pipeline = new TopicPipeline({
            ai: resolveCapability(config, options.apiKey, logger),
            unit: options.unit,
            maxChunkChars: config.chunkChars,
            workers: options.workers,
            topicsPerSegment: options.topicsPerSegment,
            logger,
        });
        const result = await pipeline.run(rawText, { source: path.basename(options.input) });

        await mkdir(path.dirname(path.resolve(options.output)), { recursive: true });
        await writeFile(options.output, stringifyArtifact(buildArtifact(result.topics, result.metadata)), "utf-8");

        if (result.status === "no_topics") {
            out.log("No topics found.");
        }
        out.log(
            `${result.metadata.topic_count} topic(s), ${result.metadata.key_issue_count} key issue(s), ` +
                `${result.metadata.invalid_count} invalid candidate(s) [${result.mode} mode].`
        );
        out.log(`Wrote ${options.output}`);
        out.log("");
        out.log(renderTocText(result.toc));
        return 0;
    } catch (error) {
        if (error instanceof ConfigError) {
            out.error(error.message);
            out.error(USAGE);
        } else if (error instanceof DepoIndexError) {
            out.error(`[${error.code}] ${error.message}`);
        } else {
            out.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        }
        return 1;
    }
}

