import { isWhitespace } from '../text/cjk.js';
import { isPageMarkerLine } from '../text/punctuation.js';
import type { ReflowOptions } from '../types/options.js';
import type { ReflowIssue, ReflowValidationReport } from '../types/validation.js';
import { normalizeLineEndings, toProbe, toStrippedLine } from '../utils/textUtils.js';
import { MAX_REPORTED_ISSUES, PREVIEW_LIMIT } from './validation-constants.js';

/**
 * Creates a short preview string of text content for error reporting.
 * Truncates content exceeding PREVIEW_LIMIT.
 */
const buildPreview = (text: string) => {
    const normalized = text.replace(/\s+/g, ' ').trim();
    if (normalized.length <= PREVIEW_LIMIT) {
        return normalized;
    }
    return `${normalized.slice(0, PREVIEW_LIMIT)}...`;
};

const countCharacters = (text: string) => {
    const counts = new Map<string, number>();
    let total = 0;
    for (const ch of text) {
        if (!isWhitespace(ch)) {
            counts.set(ch, (counts.get(ch) ?? 0) + 1);
            total++;
        }
    }
    return { counts, total };
};

/**
 * Normalizes the input the way the engine sees it: line endings, and (when
 * page headers are off) page markers removed.
 */
const normalizeInputLines = (input: string, options: ReflowOptions) => {
    const lines = normalizeLineEndings(input).split('\n');

    if (options.addPdfPageHeader) {
        return lines;
    }
    return lines.filter((line) => !isPageMarkerLine(toProbe(toStrippedLine(line))));
};

const findLine = (lines: readonly string[], ch: string) => {
    const index = lines.findIndex((line) => line.includes(ch));
    return index === -1 ? undefined : { line: index + 1, preview: buildPreview(lines[index]) };
};

/**
 * Checks that a reflow kept every non-whitespace character of its input.
 *
 * Compares the multiset of non-whitespace characters of `input` (without
 * page markers when `addPdfPageHeader` is off) with that of `output`. Line numbers in issues
 * refer to the normalized input.
 *
 * Styled-repeat collapse (`標題 標題 標題` → `標題`) removes characters on
 * purpose and shows up here as `content_lost`.
 *
 * @example
 * const output = reflowCjkParagraphs(input, options);
 * const report = validateReflow(input, output, options);
 * if (!report.ok) {
 *     console.warn(report.issues);
 * }
 */
export const validateReflow = (input: string, output: string, options: ReflowOptions = {}): ReflowValidationReport => {
    const lines = normalizeInputLines(input, options);
    const expected = countCharacters(lines.join('\n'));
    const actual = countCharacters(output);

    const issues: ReflowIssue[] = [];
    const chars = new Set([...expected.counts.keys(), ...actual.counts.keys()]);

    for (const ch of chars) {
        const want = expected.counts.get(ch) ?? 0;
        const got = actual.counts.get(ch) ?? 0;
        if (want === got) {
            continue;
        }
        const location = want > got ? findLine(lines, ch) : undefined;
        issues.push({
            actual: got,
            char: ch,
            expected: want,
            type: want > got ? 'content_lost' : 'content_added',
            ...location,
        });
    }

    if (issues.length) {
        options.logger?.warn?.('[validate] reflow changed content', { issues: issues.length });
    }

    return {
        issues: issues.slice(0, MAX_REPORTED_ISSUES),
        ok: issues.length === 0,
        summary: { inputChars: expected.total, issues: issues.length, outputChars: actual.total },
    };
};
