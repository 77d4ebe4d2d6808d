import { describe, expect, it } from 'vitest';
import { type ClassifierRules, classifyLine } from './line-classifier.js';
import { DEFAULT_SHORT_HEADING_SETTINGS } from './short-heading.js';

const rules: ClassifierRules = { shortHeading: DEFAULT_SHORT_HEADING_SETTINGS, titlePattern: null };

describe('line-classifier', () => {
    describe('classifyLine', () => {
        it('should classify blank lines as empty', () => {
            expect(classifyLine('', rules).kind).toBe('empty');
            expect(classifyLine('  \t', rules).kind).toBe('empty');
            expect(classifyLine('　　', rules).kind).toBe('empty');
        });

        it('should classify dividers before collapsing repeats', () => {
            expect(classifyLine('--- --- ---', rules)).toEqual({
                kind: 'divider',
                probe: '--- --- ---',
                text: '--- --- ---',
            });
            expect(classifyLine('──────', rules).kind).toBe('divider');
        });

        it('should classify page markers', () => {
            expect(classifyLine('=== [Page 1/3] ===', rules).kind).toBe('pageMarker');
        });

        it('should classify built-in titles and keep full-width indentation in the text', () => {
            expect(classifyLine('　　第一章  ', rules)).toEqual({ kind: 'title', probe: '第一章', text: '　　第一章' });
        });

        it('should test the custom title pattern before the built-in one', () => {
            const custom: ClassifierRules = { ...rules, titlePattern: /^(Scene \d+|第一章)$/ };
            expect(classifyLine('Scene 12', custom).kind).toBe('customTitle');
            expect(classifyLine('第一章', custom).kind).toBe('customTitle');
            expect(classifyLine('Scene 12', rules).kind).toBe('shortHeading');
        });

        it('should classify metadata lines with their key and value', () => {
            expect(classifyLine('作者：王小明', rules)).toEqual({
                key: '作者',
                kind: 'metadata',
                probe: '作者：王小明',
                text: '作者：王小明',
                value: '王小明',
            });
        });

        it('should classify short headings with their match details', () => {
            expect(classifyLine('今天天氣', rules)).toEqual({
                allCjk: true,
                colonLeadIn: false,
                kind: 'shortHeading',
                probe: '今天天氣',
                text: '今天天氣',
            });
            expect(classifyLine('他說：', rules)).toMatchObject({ colonLeadIn: true, kind: 'shortHeading' });
        });

        it('should classify bracket-wrapped lines', () => {
            expect(classifyLine('【附錄】', rules).kind).toBe('bracketStructural');
            expect(classifyLine('（完）', rules).kind).toBe('bracketStructural');
        });

        it('should classify everything else as prose with its flags', () => {
            expect(classifyLine('　　他走了。', rules)).toEqual({
                dialogueStart: false,
                indented: true,
                kind: 'prose',
                probe: '他走了。',
                text: '　　他走了。',
            });
            expect(classifyLine('  他走了。', rules)).toMatchObject({ indented: true, kind: 'prose', text: '他走了。' });
            expect(classifyLine('「走吧。」', rules)).toMatchObject({ dialogueStart: true, indented: false, kind: 'prose' });
        });

        it('should collapse styled repeats before classifying', () => {
            expect(classifyLine('標題 標題 標題', rules)).toMatchObject({ kind: 'shortHeading', text: '標題' });
        });
    });
});
