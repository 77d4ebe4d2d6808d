import { describe, expect, it, vi } from 'vitest';
import { validateReflow } from '../validation/validate-reflow.js';
import { joinSegments, reflowCjkParagraphs, segmentText } from './segmenter.js';

const NOVEL = [
    '第一章　啟程',
    '　　很久很久以前，在一個遙遠的',
    '山谷裡，住著一位老人。',
    '　　他每天都會走到河邊，',
    '看著流水發呆。',
    '「你在看什麼？」',
    '孩子問。',
].join('\n');

describe('segmenter', () => {
    describe('reflowCjkParagraphs', () => {
        it('should merge a short first line into the sentence it starts', () => {
            expect(reflowCjkParagraphs('今天天氣\n很好。')).toBe('今天天氣很好。');
        });

        it('should keep a title on its own line', () => {
            expect(reflowCjkParagraphs('第一章\n很久以前……')).toBe('第一章\n\n很久以前……');
        });

        it('should join a colon lead-in with the dialogue it introduces', () => {
            expect(reflowCjkParagraphs('他說：\n「你好」')).toBe('他說：「你好」');
        });

        it('should join segments with a single newline in compact mode', () => {
            const input = '第一章\n很久以前，\n有一座山。\n他說：\n「走吧。」';
            expect(reflowCjkParagraphs(input, { compact: true })).toBe('第一章\n很久以前，有一座山。\n他說：「走吧。」');
        });

        it('should return an empty string for blank input', () => {
            expect(reflowCjkParagraphs('')).toBe('');
            expect(reflowCjkParagraphs('  \n　\n')).toBe('');
        });

        it('should accept Windows line endings', () => {
            expect(reflowCjkParagraphs('今天天氣\r\n很好。')).toBe('今天天氣很好。');
        });

        it('should rebuild indented novel paragraphs', () => {
            expect(reflowCjkParagraphs(NOVEL)).toBe(
                [
                    '第一章　啟程',
                    '　　很久很久以前，在一個遙遠的山谷裡，住著一位老人。',
                    '　　他每天都會走到河邊，看著流水發呆。',
                    '「你在看什麼？」',
                    '孩子問。',
                ].join('\n\n'),
            );
        });

        it('should be idempotent on its own output', () => {
            const once = reflowCjkParagraphs(NOVEL);
            expect(reflowCjkParagraphs(once)).toBe(once);
        });

        it('should keep every non-whitespace character', () => {
            const output = reflowCjkParagraphs(NOVEL);
            expect(validateReflow(NOVEL, output).ok).toBe(true);
        });
    });

    describe('segmentText', () => {
        it('should return no segments for blank input', () => {
            expect(segmentText('')).toEqual([]);
            expect(segmentText(' \n ')).toEqual([]);
        });

        it('should attach flush reasons only in debug mode', () => {
            expect(segmentText('他走了。\n\n她來了。')).toEqual([
                { content: '他走了。', kind: 'paragraph' },
                { content: '她來了。', kind: 'paragraph' },
            ]);
            expect(segmentText('他走了。\n\n她來了。', { debug: true })).toEqual([
                { content: '他走了。', kind: 'paragraph', reason: 'blankLine' },
                { content: '她來了。', kind: 'paragraph', reason: 'endOfInput' },
            ]);
        });

        it('should report why each paragraph of a novel page closed', () => {
            const reasons = segmentText(NOVEL, { debug: true }).map((s) => s.reason);
            expect(reasons).toEqual(['structural', 'sentenceBoundary', 'dialogueStart', 'sentenceBoundary', 'endOfInput']);
        });

        it('should emit metadata, dividers and titles as structural lines', () => {
            const input = '書名：測試之書\n作者：王小明\n──────\n第一章\n很久以前，\n有一座山。';
            expect(segmentText(input)).toEqual([
                { content: '書名：測試之書', kind: 'metadata' },
                { content: '作者：王小明', kind: 'metadata' },
                { content: '──────', kind: 'divider' },
                { content: '第一章', kind: 'title' },
                { content: '很久以前，有一座山。', kind: 'paragraph' },
            ]);
        });

        it('should use a custom title pattern', () => {
            const segments = segmentText('他走了。\nScene 2\n她來了。', { titlePattern: '^Scene \\d+$' });
            expect(segments.map((s) => s.kind)).toEqual(['paragraph', 'customTitle', 'paragraph']);
        });

        it('should log progress through the injected logger', () => {
            const debug = vi.fn();
            const info = vi.fn();
            segmentText('今天天氣\n很好。', { logger: { debug, info } });
            expect(info).toHaveBeenCalledWith('[reflow] done', { lines: 2, segments: 1 });
            expect(debug).toHaveBeenCalledWith('[reflow] segmenting', { level: 2, lines: 2, pageHeaders: false });
        });
    });

    describe('blank lines and page breaks', () => {
        it('should heal a blank line inside a sentence', () => {
            expect(reflowCjkParagraphs('很久以前，\n\n有一座山。')).toBe('很久以前，有一座山。');
        });

        it('should heal a page break inside a sentence when page headers are off', () => {
            const input = '很久以前，有一\n\n=== [Page 2/2] ===\n座山。';
            expect(reflowCjkParagraphs(input)).toBe('很久以前，有一座山。');
        });

        it('should keep page markers and split on blank lines when page headers are on', () => {
            const input = '=== [Page 1/2] ===\n很久以前，\n有一座山。\n\n=== [Page 2/2] ===\n山裡有座廟。\n';
            expect(segmentText(input, { addPdfPageHeader: true })).toEqual([
                { content: '=== [Page 1/2] ===', kind: 'pageMarker' },
                { content: '很久以前，有一座山。', kind: 'paragraph' },
                { content: '=== [Page 2/2] ===', kind: 'pageMarker' },
                { content: '山裡有座廟。', kind: 'paragraph' },
            ]);
        });

        it('should drop page markers when page headers are off', () => {
            const input = '=== [Page 1/2] ===\n很久以前，\n有一座山。\n\n=== [Page 2/2] ===\n山裡有座廟。\n';
            expect(reflowCjkParagraphs(input, { compact: true })).toBe('很久以前，有一座山。\n山裡有座廟。');
        });
    });

    describe('sentence boundaries', () => {
        it('should split after a strong ender', () => {
            expect(reflowCjkParagraphs('他走了。\n她來了。', { compact: true })).toBe('他走了。\n她來了。');
        });

        it('should merge lines wrapped mid-sentence', () => {
            expect(reflowCjkParagraphs('很久很久以前，在一個\n遙遠的地方。')).toBe('很久很久以前，在一個遙遠的地方。');
        });

        it('should split on semicolons only at the lenient level', () => {
            expect(reflowCjkParagraphs('首先；\n其次。')).toBe('首先；其次。');
            expect(reflowCjkParagraphs('首先；\n其次。', { compact: true, sentenceBoundaryLevel: 1 })).toBe('首先；\n其次。');
        });

        it('should not split after a closing quote at the strict level', () => {
            expect(reflowCjkParagraphs('「走吧。」\n他說。', { sentenceBoundaryLevel: 3 })).toBe('「走吧。」他說。');
            expect(reflowCjkParagraphs('「走吧。」\n他說。', { compact: true })).toBe('「走吧。」\n他說。');
        });

        it('should split before an indented line', () => {
            const segments = segmentText('他走了很遠很遠的路\n　　隔天早上天色終於亮了', { debug: true });
            expect(segments).toEqual([
                { content: '他走了很遠很遠的路', kind: 'paragraph', reason: 'indentation' },
                { content: '　　隔天早上天色終於亮了', kind: 'paragraph', reason: 'endOfInput' },
            ]);
        });
    });

    describe('dialogue', () => {
        it('should never split inside an open quotation', () => {
            const input = '「今天天氣很好。\n我們出去走走吧。」\n他點點頭。';
            expect(reflowCjkParagraphs(input, { compact: true })).toBe('「今天天氣很好。我們出去走走吧。」\n他點點頭。');
        });

        it('should ignore blank lines inside an open quotation', () => {
            expect(reflowCjkParagraphs('「今天。\n\n明天。」')).toBe('「今天。明天。」');
        });

        it('should not treat a short line inside a quotation as a heading', () => {
            expect(reflowCjkParagraphs('「你看\n天空\n多美。」')).toBe('「你看天空多美。」');
        });

        it('should start a new paragraph at a dialogue line', () => {
            expect(segmentText('他慢慢地走了過來了\n「你好。」', { debug: true })).toEqual([
                { content: '他慢慢地走了過來了', kind: 'paragraph', reason: 'dialogueStart' },
                { content: '「你好。」', kind: 'paragraph', reason: 'endOfInput' },
            ]);
        });

        it('should continue into dialogue after a comma', () => {
            expect(reflowCjkParagraphs('他回頭看了看，\n「你好。」')).toBe('他回頭看了看，「你好。」');
        });

        it('should still break at titles inside an open quotation', () => {
            expect(segmentText('「你好\n第二章\n再見」').map((s) => s.content)).toEqual(['「你好', '第二章', '再見」']);
        });
    });

    describe('short headings', () => {
        it('should confirm a pending heading at a blank line', () => {
            expect(segmentText('序\n\n很久以前。', { debug: true })).toEqual([
                { content: '序', kind: 'shortHeading', reason: 'headingConfirmed' },
                { content: '很久以前。', kind: 'paragraph', reason: 'endOfInput' },
            ]);
        });

        it('should confirm a pending heading at an indented line', () => {
            expect(segmentText('序\n　　很久以前。').map((s) => s.kind)).toEqual(['shortHeading', 'paragraph']);
        });

        it('should emit a heading that follows a finished paragraph right away', () => {
            expect(segmentText('他走了很遠很遠的路。\n山中歲月\n他又走了。', { debug: true })).toEqual([
                { content: '他走了很遠很遠的路。', kind: 'paragraph', reason: 'structural' },
                { content: '山中歲月', kind: 'shortHeading', reason: 'structural' },
                { content: '他又走了。', kind: 'paragraph', reason: 'endOfInput' },
            ]);
        });

        it('should confirm a pending heading when another heading follows', () => {
            expect(segmentText('山中歲月\n江湖夜雨\n\n他走了。', { debug: true })).toEqual([
                { content: '山中歲月', kind: 'shortHeading', reason: 'headingConfirmed' },
                { content: '江湖夜雨', kind: 'shortHeading', reason: 'headingConfirmed' },
                { content: '他走了。', kind: 'paragraph', reason: 'endOfInput' },
            ]);
        });

        it('should keep a colon lead-in as a heading when no dialogue follows', () => {
            expect(segmentText('物品准备：\n一把刀。')).toEqual([
                { content: '物品准备：', kind: 'shortHeading' },
                { content: '一把刀。', kind: 'paragraph' },
            ]);
        });

        it('should emit non-CJK headings immediately', () => {
            expect(segmentText('他走了。\nChapter One\n她來了。', { debug: true })).toEqual([
                { content: '他走了。', kind: 'paragraph', reason: 'structural' },
                { content: 'Chapter One', kind: 'shortHeading', reason: 'structural' },
                { content: '她來了。', kind: 'paragraph', reason: 'endOfInput' },
            ]);
        });

        it('should treat a heading candidate after a comma as wrapped prose', () => {
            expect(reflowCjkParagraphs('他走到了門口，\n看見\n一個人。')).toBe('他走到了門口，看見一個人。');
        });

        it('should treat a heading candidate after unfinished prose as wrapped prose', () => {
            expect(reflowCjkParagraphs('這是一段很長的文字沒有\n結束\n的地方。')).toBe('這是一段很長的文字沒有結束的地方。');
        });
    });

    describe('brackets', () => {
        it('should hold a paragraph open across a blank line inside brackets', () => {
            expect(segmentText('（註：此處\n\n省略）\n下文。', { debug: true })).toEqual([
                { content: '（註：此處省略）', kind: 'paragraph', reason: 'bracketBoundary' },
                { content: '下文。', kind: 'paragraph', reason: 'endOfInput' },
            ]);
        });

        it('should emit bracket-wrapped lines as structural', () => {
            expect(segmentText('他走了。\n【附錄】\n內容如下。', { debug: true })).toEqual([
                { content: '他走了。', kind: 'paragraph', reason: 'structural' },
                { content: '【附錄】', kind: 'bracketStructural', reason: 'structural' },
                { content: '內容如下。', kind: 'paragraph', reason: 'endOfInput' },
            ]);
        });

        it('should merge a bracket-wrapped line that continues a sentence', () => {
            expect(reflowCjkParagraphs('他拿起了一本，\n《三國演義》\n讀了起來。')).toBe('他拿起了一本，《三國演義》讀了起來。');
        });
    });

    describe('joinSegments', () => {
        it('should separate segments with a blank line by default', () => {
            const segments = [
                { content: '甲', kind: 'title' as const },
                { content: '乙', kind: 'paragraph' as const },
            ];
            expect(joinSegments(segments)).toBe('甲\n\n乙');
            expect(joinSegments(segments, true)).toBe('甲\n乙');
        });
    });
});
