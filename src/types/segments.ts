/**
 * Kind of an emitted segment.
 *
 * `paragraph` is reconstructed prose; every other kind is a structural line
 * emitted verbatim (after trailing-whitespace and half-width indent removal).
 */
export type SegmentKind =
    | 'paragraph'
    | 'shortHeading'
    | 'title'
    | 'customTitle'
    | 'metadata'
    | 'pageMarker'
    | 'divider'
    | 'bracketStructural';

/**
 * Why the engine closed a segment. Only attached when `debug` is enabled.
 */
export type FlushReason =
    | 'sentenceBoundary'
    | 'bracketBoundary'
    | 'indentation'
    | 'dialogueStart'
    | 'blankLine'
    | 'structural'
    | 'headingConfirmed'
    | 'endOfInput';

/**
 * Output unit of `segmentText()`.
 *
 * @example
 * { content: '第一章', kind: 'title' }
 *
 * @example
 * // With `debug: true`
 * { content: '今天天氣很好。', kind: 'paragraph', reason: 'endOfInput' }
 */
export type Segment = {
    content: string;
    kind: SegmentKind;
    reason?: FlushReason;
};
