/**
 * cjk-reflow - Paragraph reconstruction for line-wrapped CJK text.
 *
 * Rebuilds paragraphs from text extracted out of PDF, EPUB and office
 * documents, where every visual line became a hard line break. Titles,
 * metadata lines, short headings and dividers stay on their own lines;
 * wrapped prose is merged back together without ever splitting an open
 * quotation. A companion overlay filter drops repeated watermark text from
 * PDF object-level extraction before reflow.
 *
 * @packageDocumentation
 *
 * @example
 * import { reflowCjkParagraphs } from 'cjk-reflow';
 *
 * const text = reflowCjkParagraphs('第一章\n很久以前，\n有一座山。\n他說：\n「走吧。」', {
 *   compact: true,
 * });
 * // → '第一章\n很久以前，有一座山。\n他說：「走吧。」'
 */

// ─────────────────────────────────────────────────────────────
// Paragraph reflow
// ─────────────────────────────────────────────────────────────

export { endsWithCjkBracketBoundary, endsWithSentenceBoundary } from './reflow/boundaries.js';
export { type BracketTracker, createBracketTracker, createDialogState, type DialogState } from './reflow/dialog-state.js';
export { classifyLine, type ClassifierRules, type LineClass, type LineKind } from './reflow/line-classifier.js';
export { isMetadataLine, METADATA_KEYS, type MetadataLine, parseMetadataLine } from './reflow/metadata.js';
export {
    DEFAULT_SENTENCE_BOUNDARY_LEVEL,
    type ResolvedReflowOptions,
    resolveReflowOptions,
} from './reflow/options.js';
export { collapseRepeatedSegments } from './reflow/repeat-collapse.js';
export { joinSegments, reflowCjkParagraphs, segmentText } from './reflow/segmenter.js';
export {
    DEFAULT_SHORT_HEADING_SETTINGS,
    isShortHeadingCandidate,
    matchShortHeading,
    type ShortHeadingMatch,
} from './reflow/short-heading.js';
export { compileTitlePattern, isTitleHeading, TITLE_HEADING_PATTERN } from './reflow/title-heading.js';

// ─────────────────────────────────────────────────────────────
// Character and punctuation tables
// ─────────────────────────────────────────────────────────────

export {
    containsAnyCjk,
    endsWithEllipsis,
    isAllAscii,
    isAllAsciiDigits,
    isAllCjk,
    isCjk,
    isDigitAsciiOrFullWidth,
    isMixedCjkAscii,
    isMostlyCjk,
} from './text/cjk.js';
export {
    BRACKET_PAIRS,
    formatPageMarker,
    hasUnclosedBracket,
    isBracketTypeBalanced,
    isClauseOrEndPunct,
    isDialogueCloser,
    isDialogueOpener,
    isPageMarkerLine,
    isStrongSentenceEnd,
    isVisualDividerLine,
} from './text/punctuation.js';

// ─────────────────────────────────────────────────────────────
// Overlay filter and extraction
// ─────────────────────────────────────────────────────────────

export {
    fromTextObjects,
    extractPagedText,
    getProgressBlock,
    loadAndReflow,
} from './extraction/page-assembler.js';
export {
    assembleFragmentText,
    DEFAULT_OVERLAY_OPTIONS,
    extractOverlayFreeText,
    filterOverlayFragments,
    isTiledWatermark,
    toTextObjectFragment,
} from './overlay/overlay-filter.js';

// ─────────────────────────────────────────────────────────────
// Analysis and validation
// ─────────────────────────────────────────────────────────────

export { type LineKindAnalysisOptions, type LineKindReport, analyzeLineKinds } from './analysis/line-kinds.js';
export { normalizeLineEndings } from './utils/textUtils.js';
export { validateReflowOptions } from './validation/validate-options.js';
export { validateReflow } from './validation/validate-reflow.js';

// Type definitions
export type * from './types/index.js';
