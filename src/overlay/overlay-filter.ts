/**
 * Watermark and overlay suppression for PDF object-level extraction.
 *
 * Page furniture such as `CONFIDENTIAL` stamps or tiled `DRAFT DRAFT DRAFT`
 * watermarks shows up as text objects that repeat on the same visual band.
 * Fragments are bucketed by vertical position, counted by normalized text,
 * and the repeated ones are dropped before the page is turned back into
 * line-oriented text for the reflow engine.
 *
 * Operates on one page at a time.
 *
 * @module overlay-filter
 */

import type {
    OverlayFilterOptions,
    OverlayFilterResult,
    OverlayReason,
    RawTextObject,
    ResolvedOverlayFilterOptions,
    TextObjectFragment,
} from '../types/overlay.js';
import { collapseWhitespace } from '../utils/textUtils.js';

export const DEFAULT_OVERLAY_OPTIONS = Object.freeze({
    bandStep: 4,
    lineTolerance: 1,
    minRepeats: 4,
    tiledMaxTokenLength: 16,
    tiledMinTokens: 6,
});

const positiveOr = (value: number | undefined, fallback: number) =>
    value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;

const countOr = (value: number | undefined, fallback: number, min: number) =>
    value !== undefined && Number.isFinite(value) ? Math.max(min, Math.floor(value)) : fallback;

export const resolveOverlayOptions = (options: OverlayFilterOptions = {}): ResolvedOverlayFilterOptions => ({
    bandStep: positiveOr(options.bandStep, DEFAULT_OVERLAY_OPTIONS.bandStep),
    lineTolerance: countOr(options.lineTolerance, DEFAULT_OVERLAY_OPTIONS.lineTolerance, 0),
    logger: options.logger,
    minRepeats: countOr(options.minRepeats, DEFAULT_OVERLAY_OPTIONS.minRepeats, 2),
    tiledMaxTokenLength: countOr(options.tiledMaxTokenLength, DEFAULT_OVERLAY_OPTIONS.tiledMaxTokenLength, 1),
    tiledMinTokens: countOr(options.tiledMinTokens, DEFAULT_OVERLAY_OPTIONS.tiledMinTokens, 2),
});

/**
 * Prepares a raw text object for overlay detection.
 *
 * @example
 * toTextObjectFragment({ text: ' CONFIDENTIAL ', yMid: 101.5 }, 4)
 * // → { text: ' CONFIDENTIAL ', key: 'CONFIDENTIAL', bucket: 25 }
 */
export const toTextObjectFragment = (raw: RawTextObject, bandStep: number): TextObjectFragment => ({
    bucket: Number.isFinite(raw.yMid) ? Math.floor(raw.yMid / bandStep) : 0,
    key: collapseWhitespace(raw.text),
    text: raw.text,
});

/**
 * Detects a single word tiled across the page: at least `tiledMinTokens`
 * space-separated tokens, all but at most one of them the same short token.
 *
 * @example
 * isTiledWatermark('DRAFT DRAFT DRAFT DRAFT DRAFT DRAFT') // → true
 * isTiledWatermark('DRAFT DRAFT DRAFT DRAFT DRAFT v2')    // → true (one outlier)
 * isTiledWatermark('the cat sat on the mat')              // → false
 */
export const isTiledWatermark = (
    key: string,
    options: Pick<ResolvedOverlayFilterOptions, 'tiledMinTokens' | 'tiledMaxTokenLength'> = DEFAULT_OVERLAY_OPTIONS,
): boolean => {
    const tokens = key.split(' ').filter(Boolean);
    if (tokens.length < options.tiledMinTokens) {
        return false;
    }

    const counts = new Map<string, number>();
    for (const token of tokens) {
        if (token.length <= options.tiledMaxTokenLength) {
            counts.set(token, (counts.get(token) ?? 0) + 1);
        }
    }

    let best = 0;
    for (const count of counts.values()) {
        best = Math.max(best, count);
    }

    return best >= tokens.length - 1;
};

const frequencyKey = (fragment: TextObjectFragment) => `${fragment.bucket}\u0000${fragment.key}`;

const classifyOverlay = (
    fragment: TextObjectFragment,
    frequencies: ReadonlyMap<string, number>,
    options: ResolvedOverlayFilterOptions,
): OverlayReason | null => {
    if (!fragment.key) {
        return null;
    }
    if ((frequencies.get(frequencyKey(fragment)) ?? 0) >= options.minRepeats) {
        return 'repeatedInBand';
    }
    return isTiledWatermark(fragment.key, options) ? 'tiledWatermark' : null;
};

/**
 * Splits one page's text objects into kept and dropped fragments.
 *
 * A fragment is dropped when its normalized text occurs at least
 * `minRepeats` times in the same vertical band, or when it is a tiled
 * watermark. Whitespace-only fragments are always kept. Kept fragments stay
 * in page order.
 */
export const filterOverlayFragments = (
    raws: readonly RawTextObject[],
    options: OverlayFilterOptions = {},
): OverlayFilterResult => {
    const resolved = resolveOverlayOptions(options);
    const fragments = raws.map((raw) => toTextObjectFragment(raw, resolved.bandStep));

    const frequencies = new Map<string, number>();
    for (const fragment of fragments) {
        if (fragment.key) {
            const key = frequencyKey(fragment);
            frequencies.set(key, (frequencies.get(key) ?? 0) + 1);
        }
    }

    const result: OverlayFilterResult = { dropped: [], kept: [] };

    for (const fragment of fragments) {
        const reason = classifyOverlay(fragment, frequencies, resolved);
        if (reason) {
            result.dropped.push({ fragment, reason });
        } else {
            result.kept.push(fragment);
        }
    }

    if (result.dropped.length) {
        resolved.logger?.debug?.('[overlay] dropped fragments', {
            dropped: result.dropped.length,
            kept: result.kept.length,
            samples: [...new Set(result.dropped.map((d) => d.fragment.key))].slice(0, 5),
        });
    }

    return result;
};

/**
 * Concatenates fragments in page order into line-oriented text.
 *
 * A newline is inserted only when a fragment's band differs from the
 * previous fragment's band by more than `lineTolerance`; otherwise the
 * fragments are joined directly (CJK text has no inter-word spaces, and
 * punctuation glyphs often sit one band off the line they belong to).
 *
 * @example
 * assembleFragmentText([
 *   { text: '很久', key: '很久', bucket: 10 },
 *   { text: '以前，', key: '以前，', bucket: 11 },
 *   { text: '有一座山。', key: '有一座山。', bucket: 15 },
 * ]);
 * // → '很久以前，\n有一座山。'
 */
export const assembleFragmentText = (
    fragments: readonly TextObjectFragment[],
    options: Pick<OverlayFilterOptions, 'lineTolerance'> = {},
): string => {
    const tolerance = countOr(options.lineTolerance, DEFAULT_OVERLAY_OPTIONS.lineTolerance, 0);

    let text = '';
    let previous: number | null = null;

    for (const fragment of fragments) {
        if (previous !== null && Math.abs(fragment.bucket - previous) > tolerance) {
            text += '\n';
        }
        text += fragment.text;
        previous = fragment.bucket;
    }

    return text;
};

/**
 * Filters overlays out of one page's text objects and assembles the rest.
 */
export const extractOverlayFreeText = (raws: readonly RawTextObject[], options: OverlayFilterOptions = {}): string =>
    assembleFragmentText(filterOverlayFragments(raws, options).kept, options);
