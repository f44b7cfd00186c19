/**
 * DepoIndex: Transcript Preprocessing
 *
 * Turns raw deposition text into cleaned lines, then groups those lines into
 * segments (runs of content-bearing lines) or size-bounded chunks. Everything
 * here is a pure transformation.
 */

import { EmptyInputError } from "./errors";
import { normalizeCharacters } from "./normalize";
import type { CleanedLine, Segment } from "./types";

/** Lines per transcript page when the text carries no explicit page markers */
export const LINES_PER_PAGE = 30;

export const DEFAULT_CHUNK_CHARS = 8000;

const MIN_CONTENT_LENGTH = 5;
const MIN_CONTENT_LETTERS = 3;

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

const PAGE_MARKER = /^page\s+(\d+)(?:\s+of\s+\d+)?$/i;
const LINE_MARKER = /^line\s+\d+$/i;
const SEPARATOR_ONLY = /^[\d\s\-–—·•.:|_*=~]+$/;

const LINE_LABEL_PREFIX = /^line\s+(\d+)\s*[:.]\s*/i;
const LINE_NUMBER_PREFIX = /^(\d{1,2})(?:\s{2,}|\s+(?=(?:Q|A)\s*[.:]))/;
const SPEAKER_PREFIX =
    /^(?:(?:BY\s+)?(?:MR|MS|MRS|DR)\.?\s+[A-Z][A-Za-z'-]*|THE\s+(?:WITNESS|COURT|REPORTER|VIDEOGRAPHER|DEPONENT)|EXAMINER|COUNSEL|WITNESS)\s*:\s*/i;
const DISCOURSE_PREFIX = /^(?:Q|A|QUESTION|ANSWER)\s*[.:]\s*/i;
const QUESTION_MARKER = /^(?:Q|QUESTION)\s*[.:](?:\s|$)/i;
const EXCHANGE_MARKER = /^(?:Q|A|QUESTION|ANSWER)\s*[.:](?:\s|$)/i;
const BRACKETED = /\[[^\]]*\]/g;
const WHOLE_PARENTHETICAL = /^\([^)]*\)$/;

// ---------------------------------------------------------------------------
// Cleaning
// ---------------------------------------------------------------------------

/**
 * A line is content when it is long enough, is not made of digits and
 * separators only, and carries a handful of letters.
 */
export function isContentLine(text: string): boolean {
    if (text.length < MIN_CONTENT_LENGTH) return false;
    if (SEPARATOR_ONLY.test(text)) return false;
    const letters = text.match(/\p{L}/gu) ?? [];
    return letters.length >= MIN_CONTENT_LETTERS;
}

/** Line number the transcript itself prints (`Line 4:` or a leading `4  `), if any */
function declaredLineNumber(text: string): number | null {
    const match = LINE_LABEL_PREFIX.exec(text) ?? LINE_NUMBER_PREFIX.exec(text);
    if (!match) return null;
    const line = Number(match[1]);
    return line >= 1 ? line : null;
}

function stripPrefixes(text: string): string {
    let result = text.replace(LINE_LABEL_PREFIX, "").replace(LINE_NUMBER_PREFIX, "");
    // Speaker tags may be stacked, e.g. "BY MR. REED: THE WITNESS:"
    let previous = "";
    while (result !== previous) {
        previous = result;
        result = result.replace(SPEAKER_PREFIX, "");
    }
    return result;
}

/**
 * Clean raw transcript text:
 * 1. Drop page/line markers and digit-or-separator noise lines
 * 2. Strip line labels, transcript line numbers and speaker tags
 * 3. Remove bracketed annotations and whole-line parentheticals
 * 4. Collapse whitespace
 *
 * Lines keep the number the transcript prints for them, else their 1-based
 * position in the raw text. Blank lines are kept (as empty text) so paragraph
 * boundaries survive.
 * Question/answer markers are kept as discourse markers.
 *
 * @throws EmptyInputError when no content line remains
 */
export function cleanTranscript(rawText: string): CleanedLine[] {
    const rawLines = normalizeCharacters(rawText).split(/\r?\n/);
    const cleaned: CleanedLine[] = [];
    let markedPage: number | null = null;

    rawLines.forEach((raw, index) => {
        const trimmed = raw.trim();
        const page = markedPage ?? Math.floor(index / LINES_PER_PAGE) + 1;

        if (trimmed.length === 0) {
            cleaned.push({ text: "", line: index + 1, page });
            return;
        }

        const pageMatch = PAGE_MARKER.exec(trimmed);
        if (pageMatch) {
            markedPage = Math.max(1, Number(pageMatch[1]));
            return;
        }
        if (LINE_MARKER.test(trimmed) || SEPARATOR_ONLY.test(trimmed)) {
            return;
        }

        const text = stripPrefixes(trimmed)
            .replace(BRACKETED, " ")
            .replace(/\s+/g, " ")
            .trim();

        if (text.length === 0 || WHOLE_PARENTHETICAL.test(text)) {
            return;
        }

        cleaned.push({ text, line: declaredLineNumber(trimmed) ?? index + 1, page });
    });

    if (!cleaned.some((line) => isContentLine(line.text))) {
        throw new EmptyInputError();
    }

    return cleaned;
}

// ---------------------------------------------------------------------------
// Segmentation
// ---------------------------------------------------------------------------

function toSegment(kind: Segment["kind"], lines: CleanedLine[]): Segment {
    return {
        kind,
        lines: lines.map((line) => line.text),
        startLine: lines[0].line,
        page: lines[0].page,
    };
}

/**
 * Group consecutive content lines into segments. A non-content line, a page
 * change or the end of input closes the current segment.
 *
 * @throws EmptyInputError when no segment is produced
 */
export function segmentLines(lines: CleanedLine[]): Segment[] {
    const segments: Segment[] = [];
    let run: CleanedLine[] = [];

    for (const line of lines) {
        const content = isContentLine(line.text);
        if (run.length > 0 && (!content || line.page !== run[0].page)) {
            segments.push(toSegment("segment", run));
            run = [];
        }
        if (content) run.push(line);
    }
    if (run.length > 0) {
        segments.push(toSegment("segment", run));
    }

    if (segments.length === 0) {
        throw new EmptyInputError();
    }
    return segments;
}

// ---------------------------------------------------------------------------
// Chunking
// ---------------------------------------------------------------------------

export interface ChunkOptions {
    /** Character budget per chunk */
    maxChars?: number;
}

function textSize(lines: CleanedLine[]): number {
    return lines.reduce((sum, line) => sum + line.text.length, 0) + Math.max(0, lines.length - 1);
}

/** Split one oversized paragraph at line boundaries, and oversized lines at the budget */
function splitParagraph(paragraph: CleanedLine[], maxChars: number): CleanedLine[][] {
    const pieces: CleanedLine[][] = [];
    let piece: CleanedLine[] = [];

    for (const line of paragraph) {
        const parts: CleanedLine[] = [];
        for (let offset = 0; offset < line.text.length; offset += maxChars) {
            parts.push({ ...line, text: line.text.slice(offset, offset + maxChars) });
        }

        for (const part of parts) {
            if (piece.length > 0 && textSize([...piece, part]) > maxChars) {
                pieces.push(piece);
                piece = [];
            }
            piece.push(part);
        }
    }
    if (piece.length > 0) pieces.push(piece);
    return pieces;
}

function toParagraphs(lines: CleanedLine[]): CleanedLine[][] {
    const paragraphs: CleanedLine[][] = [];
    let current: CleanedLine[] = [];

    for (const line of lines) {
        if (line.text.length === 0) {
            if (current.length > 0) paragraphs.push(current);
            current = [];
            continue;
        }
        // Each question or answer opens its own paragraph, and so does a new page
        if (current.length > 0 && (EXCHANGE_MARKER.test(line.text) || line.page !== current[0].page)) {
            paragraphs.push(current);
            current = [];
        }
        current.push(line);
    }
    if (current.length > 0) paragraphs.push(current);
    return paragraphs;
}

/**
 * Split cleaned lines into chunks of at most `maxChars` characters, breaking
 * at paragraph boundaries. A paragraph that opens with a question marker
 * always starts a new chunk, so each answer stays with its question.
 * Paragraphs inside a chunk are separated by an empty line.
 *
 * @throws EmptyInputError when no chunk carries content
 */
export function chunkLines(lines: CleanedLine[], options: ChunkOptions = {}): Segment[] {
    const maxChars = options.maxChars ?? DEFAULT_CHUNK_CHARS;
    if (!Number.isInteger(maxChars) || maxChars <= 0) {
        throw new RangeError(`maxChars must be a positive integer, received ${maxChars}`);
    }

    const chunks: CleanedLine[][] = [];
    let current: CleanedLine[] = [];
    let size = 0;

    const flush = () => {
        if (current.length > 0) chunks.push(current);
        current = [];
        size = 0;
    };

    for (const paragraph of toParagraphs(lines)) {
        const opensQuestion = QUESTION_MARKER.test(paragraph[0].text);

        splitParagraph(paragraph, maxChars).forEach((piece, pieceIndex) => {
            const pieceSize = textSize(piece);
            const startsQuestion = opensQuestion && pieceIndex === 0;

            if (current.length > 0 && (startsQuestion || size + 2 + pieceSize > maxChars)) {
                flush();
            }
            if (current.length > 0) {
                current.push({ ...piece[0], text: "" });
                size += 2;
            }
            current.push(...piece);
            size += pieceSize;
        });
    }
    flush();

    const segments = chunks
        .filter((chunk) => chunk.some((line) => isContentLine(line.text)))
        .map((chunk) => toSegment("chunk", chunk));

    if (segments.length === 0) {
        throw new EmptyInputError();
    }
    return segments;
}

// ---------------------------------------------------------------------------
// Titles
// ---------------------------------------------------------------------------

/**
 * Derive a short title from a transcript line: speaker and Q/A prefixes are
 * removed along with punctuation, then the first `maxWords` words are kept.
 */
export function titleFromLine(line: string, maxWords = 7, maxChars = 60): string {
    const words = stripPrefixes(line.trim())
        .replace(DISCOURSE_PREFIX, "")
        .replace(/[^\p{L}\p{N}\s]/gu, "")
        .split(/\s+/)
        .filter(Boolean)
        .slice(0, maxWords);

    if (words.length === 0) return "Untitled Topic";
    return words.join(" ").slice(0, maxChars).trimEnd();
}
