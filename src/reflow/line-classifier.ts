/**
 * Ordered, first-match line classification.
 *
 * Each input line is classified exactly once, without looking at the
 * paragraph buffer. Context-dependent decisions (is this short heading really
 * a wrapped sentence?) belong to the segmenter.
 *
 * @module line-classifier
 */

import type { ShortHeadingSettings } from '../types/options.js';
import { beginsWithDialogueOpener, isPageMarkerLine, isVisualDividerLine } from '../text/punctuation.js';
import { hasLeadingIndent, toProbe, toStrippedLine } from '../utils/textUtils.js';
import { endsWithCjkBracketBoundary } from './boundaries.js';
import { parseMetadataLine } from './metadata.js';
import { collapseRepeatedSegments } from './repeat-collapse.js';
import { matchShortHeading } from './short-heading.js';
import { isTitleHeading } from './title-heading.js';

type LineForms = {
    /** Output form: trailing whitespace and half-width indent removed, styled repeats collapsed */
    text: string;
    /** Classification form: `text` without any leading indentation */
    probe: string;
};

/**
 * Classification of a single line. Exactly one variant per line.
 */
export type LineClass = LineForms &
    (
        | { kind: 'divider' }
        | { kind: 'empty' }
        | { kind: 'pageMarker' }
        | { kind: 'customTitle' }
        | { kind: 'title' }
        | { kind: 'metadata'; key: string; value: string }
        | { kind: 'shortHeading'; colonLeadIn: boolean; allCjk: boolean }
        | { kind: 'bracketStructural' }
        | { kind: 'prose'; dialogueStart: boolean; indented: boolean }
    );

export type LineKind = LineClass['kind'];

export type ClassifierRules = {
    shortHeading: Readonly<ShortHeadingSettings>;
    titlePattern: RegExp | null;
};

/**
 * Classifies one raw line.
 *
 * Order: divider → (styled-repeat collapse) → empty → page marker → custom
 * title → built-in title → metadata → short heading → bracket-wrapped line →
 * prose. Dividers are detected before the repeat collapse, which would
 * otherwise shorten `--- --- ---`.
 *
 * @param raw - The line as split from the input, without its newline
 *
 * @example
 * classifyLine('第一章', rules)            // → { kind: 'title', text: '第一章', probe: '第一章' }
 * classifyLine('作者：王小明', rules)       // → { kind: 'metadata', key: '作者', value: '王小明', ... }
 * classifyLine('　　他走了。', rules)       // → { kind: 'prose', indented: true, dialogueStart: false, ... }
 */
export const classifyLine = (raw: string, rules: ClassifierRules): LineClass => {
    const stripped = toStrippedLine(raw);

    const strippedProbe = toProbe(stripped);

    if (isVisualDividerLine(strippedProbe)) {
        return { kind: 'divider', probe: strippedProbe, text: stripped };
    }

    const text = collapseRepeatedSegments(stripped);
    const probe = toProbe(text);

    if (!probe) {
        return { kind: 'empty', probe, text };
    }
    if (isPageMarkerLine(probe)) {
        return { kind: 'pageMarker', probe, text };
    }
    if (rules.titlePattern?.test(probe)) {
        return { kind: 'customTitle', probe, text };
    }
    if (isTitleHeading(probe)) {
        return { kind: 'title', probe, text };
    }

    const metadata = parseMetadataLine(text);
    if (metadata) {
        return { key: metadata.key, kind: 'metadata', probe, text, value: metadata.value };
    }

    const heading = matchShortHeading(probe, rules.shortHeading);
    if (heading) {
        return { ...heading, kind: 'shortHeading', probe, text };
    }

    if (endsWithCjkBracketBoundary(probe)) {
        return { kind: 'bracketStructural', probe, text };
    }

    return {
        dialogueStart: beginsWithDialogueOpener(probe),
        indented: hasLeadingIndent(raw),
        kind: 'prose',
        probe,
        text,
    };
};
