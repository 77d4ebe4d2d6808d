/**
 * Page-by-page text assembly on top of an external document extractor,
 * with adaptive progress reporting and cooperative cancellation.
 *
 * @module page-assembler
 */

import { extractOverlayFreeText } from '../overlay/overlay-filter.js';
import { reflowCjkParagraphs } from '../reflow/segmenter.js';
import { formatPageMarker } from '../text/punctuation.js';
import type {
    ExtractionOptions,
    ExtractionResult,
    LoadOptions,
    LoadResult,
    PageObjectSource,
    PageTextSource,
} from '../types/extraction.js';
import type { OverlayFilterOptions } from '../types/overlay.js';

/**
 * How many pages pass between two progress reports.
 *
 * - up to 20 pages: every page
 * - up to 100: every 3 pages
 * - up to 300: every 5 pages
 * - larger: roughly every 5% of the document
 */
export const getProgressBlock = (totalPages: number): number => {
    if (totalPages <= 20) {
        return 1;
    }
    if (totalPages <= 100) {
        return 3;
    }
    if (totalPages <= 300) {
        return 5;
    }
    return Math.max(1, Math.floor(totalPages / 20));
};

const PAGE_EDGE = /^[\r\n ]+|[\r\n ]+$/g;

/**
 * Trims CR, LF and ASCII spaces from both ends of a page. Ideographic
 * indentation on the first line is kept.
 */
export const trimPageText = (text: string) => text.replace(PAGE_EDGE, '');

/**
 * Reads every page of `source` and concatenates the text.
 *
 * Each page contributes an optional `=== [Page i/N] ===` line, its trimmed
 * text and a blank line; an empty page contributes only the optional marker
 * and the blank line. Progress is reported before page 1, before the last
 * page and before every `getProgressBlock(N)`-th page.
 *
 * @throws The signal's abort reason when `signal` is aborted between pages,
 * or whatever the source throws
 */
export const extractPagedText = async (
    source: PageTextSource,
    options: ExtractionOptions = {},
): Promise<ExtractionResult> => {
    const { addPdfPageHeader = false, onProgress, signal, logger } = options;
    const total = source.pageCount;

    if (total <= 0) {
        onProgress?.(0);
        return { pageCount: 0, text: '' };
    }

    const block = getProgressBlock(total);
    const parts: string[] = [];

    logger?.info?.('[extract] reading pages', { block, total });

    for (let i = 1; i <= total; i++) {
        signal?.throwIfAborted();

        if (onProgress && (i % block === 0 || i === 1 || i === total)) {
            onProgress(Math.floor((i / total) * 100));
        }

        const text = trimPageText(await source.getPageText(i));

        if (addPdfPageHeader) {
            parts.push(`${formatPageMarker(i, total)}\n`);
        }

        if (text.trim()) {
            parts.push(`${text}\n`);
        } else {
            logger?.debug?.('[extract] empty page', { page: i });
        }

        parts.push('\n');
    }

    return { pageCount: total, text: parts.join('') };
};

/**
 * Adapts a positioned-text-object source into a plain-text source, running
 * the overlay filter on every page.
 */
export const fromTextObjects = (source: PageObjectSource, overlay: OverlayFilterOptions = {}): PageTextSource => ({
    async getPageText(pageNumber: number) {
        return extractOverlayFreeText(await source.getPageObjects(pageNumber), overlay);
    },
    pageCount: source.pageCount,
});

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

/**
 * Extracts a document and reflows the result.
 *
 * Failures and cancellation come back as `{ success: false }`; the reflow
 * engine only ever sees the text of a complete, uncanceled extraction.
 *
 * @example
 * const result = await loadAndReflow(source, { addPdfPageHeader: true, signal: controller.signal });
 * if (result.success) {
 *     editor.setText(result.text);
 * } else if (!result.canceled) {
 *     showError(result.message);
 * }
 */
export const loadAndReflow = async (source: PageTextSource, options: LoadOptions = {}): Promise<LoadResult> => {
    const { reflow, skipReflow = false, ...extraction } = options;
    const { logger, signal } = extraction;

    let extracted: ExtractionResult;
    try {
        extracted = await extractPagedText(source, extraction);
    } catch (error) {
        if (signal?.aborted) {
            logger?.info?.('[extract] canceled');
            return { canceled: true, message: 'Extraction canceled', success: false };
        }
        const message = describeError(error);
        logger?.error?.('[extract] failed', { message });
        return { canceled: false, message, success: false };
    }

    if (signal?.aborted) {
        logger?.info?.('[extract] canceled before reflow');
        return { canceled: true, message: 'Extraction canceled', success: false };
    }

    const text = skipReflow
        ? extracted.text
        : reflowCjkParagraphs(extracted.text, { addPdfPageHeader: extraction.addPdfPageHeader, logger, ...reflow });

    return { pageCount: extracted.pageCount, success: true, text };
};
