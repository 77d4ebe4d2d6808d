import type { Logger, ReflowOptions } from './options.js';
import type { RawTextObject } from './overlay.js';

/**
 * A document whose pages can be read as plain text (1-based page numbers).
 *
 * Implemented by callers on top of their PDF/EPUB/Office extractor of choice.
 */
export interface PageTextSource {
    readonly pageCount: number;
    getPageText(pageNumber: number): string | Promise<string>;
}

/**
 * A document whose pages can be read as positioned text objects.
 * Adapt it with `fromTextObjects()` to run the overlay filter on each page.
 */
export interface PageObjectSource {
    readonly pageCount: number;
    getPageObjects(pageNumber: number): readonly RawTextObject[] | Promise<readonly RawTextObject[]>;
}

export type ProgressCallback = (percent: number) => void;

export type ExtractionOptions = {
    /**
     * Insert `=== [Page X/Y] ===` before each page's text.
     *
     * @default false
     */
    addPdfPageHeader?: boolean;

    /** Receives integer percent-complete values at an adaptive cadence */
    onProgress?: ProgressCallback;

    /** Checked once before each page is read */
    signal?: AbortSignal;

    logger?: Logger;
};

export type ExtractionResult = {
    text: string;
    pageCount: number;
};

export type LoadOptions = ExtractionOptions & {
    /** Options for the reflow pass. `addPdfPageHeader` and `logger` are inherited when omitted. */
    reflow?: ReflowOptions;

    /** Skip reflow and return the raw extracted text */
    skipReflow?: boolean;
};

/**
 * Outcome of `loadAndReflow()`. Failures never reach the reflow engine.
 */
export type LoadResult =
    | { success: true; text: string; pageCount: number }
    | { success: false; canceled: boolean; message: string };
