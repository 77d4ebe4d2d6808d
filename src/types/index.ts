export type {
    ExtractionOptions,
    ExtractionResult,
    LoadOptions,
    LoadResult,
    PageObjectSource,
    PageTextSource,
    ProgressCallback,
} from './extraction.js';
export type {
    Logger,
    ReflowOptions,
    SentenceBoundaryLevel,
    ShortHeadingSettings,
} from './options.js';
export type {
    OverlayFilterOptions,
    OverlayFilterResult,
    OverlayReason,
    RawTextObject,
    ResolvedOverlayFilterOptions,
    TextObjectFragment,
} from './overlay.js';
export type { FlushReason, Segment, SegmentKind } from './segments.js';
export type {
    OptionIssue,
    OptionIssueType,
    ReflowIssue,
    ReflowIssueType,
    ReflowValidationReport,
} from './validation.js';
