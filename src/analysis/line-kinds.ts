// Line-kind analysis module

import { classifyLine, type LineKind } from '../reflow/line-classifier.js';
import { resolveReflowOptions } from '../reflow/options.js';
import type { ReflowOptions } from '../types/options.js';
import { normalizeLineEndings } from '../utils/textUtils.js';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export type LineKindAnalysisOptions = Pick<ReflowOptions, 'shortHeading' | 'titlePattern' | 'logger'> & {
    maxExamples?: number;
    includeEmpty?: boolean;
};

export type LineKindExample = { line: number; text: string };

export type LineKindStats = {
    kind: LineKind;
    count: number;
    examples: LineKindExample[];
};

export type LineKindReport = {
    totalLines: number;
    kinds: LineKindStats[];
};

// ─────────────────────────────────────────────────────────────
// Options resolution
// ─────────────────────────────────────────────────────────────

const resolveOptions = (options: LineKindAnalysisOptions) => ({
    includeEmpty: options.includeEmpty ?? false,
    maxExamples: Math.max(0, options.maxExamples ?? 3),
});

const compareByCount = (a: LineKindStats, b: LineKindStats): number =>
    b.count - a.count || a.kind.localeCompare(b.kind);

// ─────────────────────────────────────────────────────────────
// Main export
// ─────────────────────────────────────────────────────────────

/**
 * Classifies every line without paragraph context and tallies the kinds.
 *
 * Useful for tuning short-heading settings or a custom title pattern before
 * a full reflow: the examples show which lines each rule catches. Line
 * numbers are 1-based. Kinds are sorted by count, most frequent first.
 *
 * @example
 * analyzeLineKinds('第一章\n作者：王小明\n很久以前，\n有一座山。');
 * // → {
 * //   totalLines: 4,
 * //   kinds: [
 * //     { kind: 'prose', count: 2, examples: [{ line: 3, text: '很久以前，' }, { line: 4, text: '有一座山。' }] },
 * //     { kind: 'metadata', count: 1, examples: [{ line: 2, text: '作者：王小明' }] },
 * //     { kind: 'title', count: 1, examples: [{ line: 1, text: '第一章' }] },
 * //   ],
 * // }
 */
export const analyzeLineKinds = (text: string, options: LineKindAnalysisOptions = {}): LineKindReport => {
    const opts = resolveOptions(options);
    const rules = resolveReflowOptions(options);
    const lines = normalizeLineEndings(text).split('\n');

    const acc = new Map<LineKind, LineKindStats>();

    lines.forEach((raw, index) => {
        const classified = classifyLine(raw, rules);
        if (classified.kind === 'empty' && !opts.includeEmpty) {
            return;
        }

        let entry = acc.get(classified.kind);
        if (!entry) {
            entry = { count: 0, examples: [], kind: classified.kind };
            acc.set(classified.kind, entry);
        }
        entry.count++;
        if (entry.examples.length < opts.maxExamples) {
            entry.examples.push({ line: index + 1, text: classified.text });
        }
    });

    rules.logger?.debug?.('[analysis] line kinds', { kinds: acc.size, lines: lines.length });

    return { kinds: [...acc.values()].sort(compareByCount), totalLines: lines.length };
};
