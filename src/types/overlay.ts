import type { Logger } from './options.js';

/**
 * A text object as reported by a PDF object-level extractor.
 *
 * `yMid` is the page-relative vertical centre of the object's bounding box,
 * in whatever unit the extractor uses (PDF points for most engines).
 */
export type RawTextObject = {
    text: string;
    yMid: number;
};

/**
 * A raw text object prepared for overlay detection.
 *
 * @example
 * // bandStep = 4
 * { text: 'CONFIDENTIAL ', key: 'CONFIDENTIAL', bucket: 25 } // yMid = 101.5
 */
export type TextObjectFragment = {
    /** Original text, emitted verbatim if the fragment survives */
    text: string;
    /** Trimmed, whitespace-collapsed text used as the dedup key */
    key: string;
    /** `floor(yMid / bandStep)` */
    bucket: number;
};

export type OverlayFilterOptions = {
    /**
     * Height of one vertical band. Fragments whose `yMid` falls in the same
     * band are considered to be on the same visual line.
     *
     * @default 4
     */
    bandStep?: number;

    /**
     * Number of identical `(key, bucket)` occurrences on one page at which all
     * of them are treated as overlay text.
     *
     * @default 4
     */
    minRepeats?: number;

    /**
     * Minimum number of space-separated tokens for the tiled-watermark check.
     *
     * @default 6
     */
    tiledMinTokens?: number;

    /**
     * Tokens longer than this never count as watermark tiles.
     *
     * @default 16
     */
    tiledMaxTokenLength?: number;

    /**
     * Bucket gap (in bands) absorbed without inserting a line break, so
     * per-glyph bounding-box jitter does not split a visual line.
     *
     * @default 1
     */
    lineTolerance?: number;

    logger?: Logger;
};

export type ResolvedOverlayFilterOptions = Readonly<Required<Omit<OverlayFilterOptions, 'logger'>>> & {
    logger?: Logger;
};

/**
 * Why a fragment was classified as overlay text.
 */
export type OverlayReason = 'repeatedInBand' | 'tiledWatermark';

export type OverlayFilterResult = {
    kept: TextObjectFragment[];
    dropped: { fragment: TextObjectFragment; reason: OverlayReason }[];
};
