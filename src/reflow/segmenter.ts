/**
 * Paragraph reconstruction for line-wrapped CJK text.
 *
 * The segmenter walks the input line by line, classifies each line once and
 * decides whether it continues the paragraph being assembled, closes it, or
 * stands on its own as a structural line (title, metadata, divider, ...).
 *
 * All state lives inside one call: the paragraph buffer, the dialogue and
 * bracket trackers fed by that buffer, and an optional pending heading.
 *
 * @module segmenter
 */

import type { ReflowOptions } from '../types/options.js';
import type { FlushReason, Segment, SegmentKind } from '../types/segments.js';
import {
    endsWithColonLike,
    endsWithCommaLike,
    endsWithStrongSentenceEnd,
    isClauseOrEndPunct,
    isCommaLike,
    lastNonWhitespace,
} from '../text/punctuation.js';
import { hasLeadingIndent, normalizeLineEndings } from '../utils/textUtils.js';
import { endsWithCjkBracketBoundary, endsWithSentenceBoundary } from './boundaries.js';
import { createBracketTracker, createDialogState } from './dialog-state.js';
import { classifyLine, type LineClass } from './line-classifier.js';
import { type ResolvedReflowOptions, resolveReflowOptions } from './options.js';

/**
 * A short heading held in the buffer until the next line shows whether it
 * really is a heading.
 *
 * - `plain`: all-CJK line such as `今天天氣`, which may be the first half of a
 *   wrapped sentence. An unindented, non-dialogue prose line merges into it.
 * - `colon`: lead-in such as `他說：`. Only a dialogue line merges into it.
 */
type PendingHeading = 'plain' | 'colon';

type ProseFlags = {
    dialogueStart: boolean;
    indented: boolean;
};

type HeadingLine = Extract<LineClass, { kind: 'shortHeading' }>;

/**
 * Runs the segmentation state machine over already-resolved options.
 */
const segmentLines = (lines: readonly string[], options: ResolvedReflowOptions): Segment[] => {
    const { debug, logger, addPdfPageHeader, sentenceBoundaryLevel } = options;

    const segments: Segment[] = [];
    const dialog = createDialogState();
    const brackets = createBracketTracker();

    let buffer = '';
    let bufferKind: SegmentKind = 'paragraph';
    let pending: PendingHeading | null = null;

    const emit = (content: string, kind: SegmentKind, reason: FlushReason) => {
        segments.push(debug ? { content, kind, reason } : { content, kind });
    };

    const append = (text: string) => {
        buffer += text;
        dialog.update(text);
        brackets.update(text);
    };

    const flush = (reason: FlushReason) => {
        if (!buffer) {
            return;
        }
        logger?.debug?.('[reflow] flush', { kind: bufferKind, length: buffer.length, reason });
        emit(buffer, bufferKind, reason);

        buffer = '';
        bufferKind = 'paragraph';
        pending = null;
        dialog.reset();
        brackets.reset();
    };

    /** Closes whatever the buffer holds because a new unit starts. */
    const closeBuffer = () => flush(pending ? 'headingConfirmed' : 'structural');

    const emitStructural = (text: string, kind: SegmentKind) => {
        closeBuffer();
        emit(text, kind, 'structural');
    };

    const startParagraph = (text: string) => {
        append(text);
        bufferKind = 'paragraph';
    };

    const boundaryBeforeLine = (indented: boolean): FlushReason | null => {
        if (!brackets.isUnclosed && endsWithSentenceBoundary(buffer, sentenceBoundaryLevel)) {
            return 'sentenceBoundary';
        }
        if (endsWithCjkBracketBoundary(buffer)) {
            return 'bracketBoundary';
        }
        return indented ? 'indentation' : null;
    };

    const onProse = (text: string, { dialogueStart, indented }: ProseFlags) => {
        if (!buffer) {
            startParagraph(text);
            return;
        }

        if (pending) {
            const merges = pending === 'colon' ? dialogueStart : !dialogueStart && !indented;
            if (merges) {
                append(text);
                bufferKind = 'paragraph';
                pending = null;
                return;
            }
            flush('headingConfirmed');
            startParagraph(text);
            return;
        }

        // 他說： + 「……」
        if (dialogueStart && endsWithColonLike(buffer)) {
            append(text);
            return;
        }

        if (dialog.isUnclosed) {
            append(text);
            return;
        }

        if (dialogueStart) {
            if (endsWithCommaLike(buffer) || brackets.isUnclosed) {
                append(text);
                return;
            }
            flush('dialogueStart');
            startParagraph(text);
            return;
        }

        const reason = boundaryBeforeLine(indented);
        if (reason) {
            flush(reason);
            startParagraph(text);
            return;
        }

        append(text);
    };

    /**
     * A heading candidate is a wrapped sentence fragment when the buffer is
     * mid-sentence: unclosed brackets, a trailing comma, or (for all-CJK and
     * colon candidates) no clause-or-end punctuation at its end.
     */
    const isHeadingAllowed = (line: HeadingLine) => {
        if (!buffer) {
            return true;
        }
        if (brackets.isUnclosed) {
            return false;
        }
        const last = lastNonWhitespace(buffer);
        if (!last) {
            return true;
        }
        if (isCommaLike(last.ch)) {
            return false;
        }
        return !((line.allCjk || line.colonLeadIn) && !isClauseOrEndPunct(last.ch));
    };

    const onHeading = (line: HeadingLine, raw: string) => {
        // two heading candidates in a row: the first one stands alone
        if (pending === 'plain') {
            flush('headingConfirmed');
        }

        if (dialog.isUnclosed || !isHeadingAllowed(line)) {
            onProse(line.text, { dialogueStart: false, indented: hasLeadingIndent(raw) });
            return;
        }

        // an all-CJK line only waits for the next line when nothing precedes it
        const afterParagraph = buffer !== '';
        closeBuffer();

        if (line.colonLeadIn || (line.allCjk && !afterParagraph)) {
            append(line.text);
            bufferKind = 'shortHeading';
            pending = line.colonLeadIn ? 'colon' : 'plain';
            return;
        }

        emit(line.text, 'shortHeading', 'structural');
    };

    const onBracketLine = (line: LineClass, raw: string) => {
        const midSentence = buffer !== '' && !pending && (brackets.isUnclosed || endsWithCommaLike(buffer));
        if (dialog.isUnclosed || midSentence) {
            onProse(line.text, { dialogueStart: false, indented: hasLeadingIndent(raw) });
            return;
        }
        emitStructural(line.text, 'bracketStructural');
    };

    const onBlankLine = () => {
        if (!buffer) {
            return;
        }
        if (pending) {
            flush('headingConfirmed');
            return;
        }
        if (dialog.isUnclosed || brackets.isUnclosed) {
            return;
        }
        // PDF page breaks leave blank lines in the middle of sentences
        if (!addPdfPageHeader && !endsWithStrongSentenceEnd(buffer)) {
            return;
        }
        flush('blankLine');
    };

    for (const raw of lines) {
        const line = classifyLine(raw, options);
        logger?.trace?.('[reflow] line', { kind: line.kind, text: line.text });

        switch (line.kind) {
            case 'empty':
                onBlankLine();
                break;
            case 'pageMarker':
                if (addPdfPageHeader) {
                    emitStructural(line.text, 'pageMarker');
                } else {
                    onBlankLine();
                }
                break;
            case 'divider':
            case 'customTitle':
            case 'title':
            case 'metadata':
                emitStructural(line.text, line.kind);
                break;
            case 'shortHeading':
                onHeading(line, raw);
                break;
            case 'bracketStructural':
                onBracketLine(line, raw);
                break;
            case 'prose':
                onProse(line.text, line);
                break;
        }
    }

    flush('endOfInput');

    return segments;
};

/**
 * Splits line-wrapped text into paragraphs and structural lines.
 *
 * @param text - Line-oriented text (`\n`, `\r\n` or `\r` line endings)
 * @returns Segments in input order. Empty or whitespace-only input yields `[]`.
 *
 * @example
 * segmentText('第一章\n很久以前，\n有一座山。');
 * // → [
 * //   { content: '第一章', kind: 'title' },
 * //   { content: '很久以前，有一座山。', kind: 'paragraph' },
 * // ]
 */
export const segmentText = (text: string, options: ReflowOptions = {}): Segment[] => {
    if (!text.trim()) {
        return [];
    }

    const resolved = resolveReflowOptions(options);
    const lines = normalizeLineEndings(text).split('\n');

    resolved.logger?.debug?.('[reflow] segmenting', {
        level: resolved.sentenceBoundaryLevel,
        lines: lines.length,
        pageHeaders: resolved.addPdfPageHeader,
    });

    const segments = segmentLines(lines, resolved);

    resolved.logger?.info?.('[reflow] done', { lines: lines.length, segments: segments.length });

    return segments;
};

/**
 * Joins segments into the final text: one `\n` between segments in compact
 * mode, a blank line between them otherwise.
 */
export const joinSegments = (segments: readonly Segment[], compact = false) =>
    segments.map((s) => s.content).join(compact ? '\n' : '\n\n');

/**
 * Reflows line-wrapped CJK text into paragraphs.
 *
 * @example
 * reflowCjkParagraphs('今天天氣\n很好。')    // → '今天天氣很好。'
 * reflowCjkParagraphs('他說：\n「你好」')    // → '他說：「你好」'
 * reflowCjkParagraphs('第一章\n很久以前……') // → '第一章\n\n很久以前……'
 */
export const reflowCjkParagraphs = (text: string, options: ReflowOptions = {}): string =>
    joinSegments(segmentText(text, options), options.compact ?? false);
