import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, type StyleSet } from '../src/browser/config';
import {
  classifyLine,
  parseLinkLine,
  renderGemtext,
  renderPlain,
  wrapText,
} from '../src/browser/gemtext';

const plainStyles: StyleSet = {
  header1: '',
  header2: '',
  header3: '',
  quote: '',
  'link-bullet': '',
  'link-text': '',
  'list-bullet': '',
  'list-text': '',
};

describe('Gemtext renderer', () => {
  describe('document rendering', () => {
    it('renders headers, links and list items in order with a link table', () => {
      const result = renderGemtext('# Title\n=> /a Link A\n=> /b\n* item\n', {
        columns: 40,
        margin: 2,
        styles: plainStyles,
      });

      expect(result.links).toEqual([
        { index: 1, target: '/a', label: 'Link A' },
        { index: 2, target: '/b', label: '/b' },
      ]);
      expect(result.lines).toEqual(['  Title', '  [1] Link A', '  [2] /b', '  • item']);
    });

    it('wraps every physical line in the category style', () => {
      const styles: StyleSet = { ...plainStyles, header1: '1', 'link-bullet': '33', 'link-text': '36' };
      const result = renderGemtext('# T\n=> /a A\n', { columns: 40, margin: 1, styles });

      expect(result.lines).toEqual([
        ' \x1b[1mT\x1b[0m',
        ' \x1b[33m[1]\x1b[0m \x1b[36mA\x1b[0m',
      ]);
    });

    it('styles each wrapped line of a header separately', () => {
      const styles: StyleSet = { ...plainStyles, header2: '1;36' };
      const result = renderGemtext('## alpha beta\n', { columns: 7, margin: 1, styles });

      expect(result.lines).toEqual([' \x1b[1;36malpha\x1b[0m', ' \x1b[1;36mbeta\x1b[0m']);
    });

    it('wraps paragraphs to the columns left inside the margins', () => {
      const result = renderGemtext('one two three four\n', { columns: 14, margin: 2, styles: plainStyles });
      expect(result.lines).toEqual(['  one two', '  three four']);
    });

    it('indents wrapped link text past the bullet', () => {
      const result = renderGemtext('=> /x alpha beta gamma\n', { columns: 16, margin: 1, styles: plainStyles });
      expect(result.lines).toEqual([' [1] alpha beta', '     gamma']);
    });

    it('marks quotes', () => {
      const result = renderGemtext('> hello there\n', { columns: 40, margin: 2, styles: plainStyles });
      expect(result.lines).toEqual(['  > hello there']);
    });

    it('keeps blank lines and strips carriage returns', () => {
      const result = renderGemtext('a\r\n\r\nb\r\n', { columns: 40, margin: 2, styles: plainStyles });
      expect(result.lines).toEqual(['  a', '', '  b']);
    });

    it('renders a link line without a target as text', () => {
      const result = renderGemtext('=>\n', { columns: 40, margin: 0, styles: plainStyles });
      expect(result.lines).toEqual(['=>']);
      expect(result.links).toEqual([]);
    });

    it('numbers links from 1 for every document', () => {
      const options = { columns: 40, margin: 0, styles: plainStyles };
      renderGemtext('=> /a\n=> /b\n', options);
      expect(renderGemtext('=> /c\n', options).links).toEqual([{ index: 1, target: '/c', label: '/c' }]);
    });

    it('uses the configured default styles', () => {
      const result = renderGemtext('* x\n', { columns: 40, margin: 0, styles: DEFAULT_CONFIG.styles });
      // list-text has no style by default, so the text is left bare
      expect(result.lines).toEqual(['\x1b[1;32m•\x1b[0m x']);
    });
  });

  describe('preformatted blocks', () => {
    it('shows the content raw and drops the delimiter lines', () => {
      const body = '```ascii art\n#  not a header   \n=> /x\n```\nafter\n';
      const result = renderGemtext(body, { columns: 40, margin: 2, styles: { ...plainStyles, header1: '1' } });

      expect(result.lines).toEqual(['  #  not a header   ', '  => /x', '  after']);
      expect(result.links).toEqual([]);
    });

    it('does not wrap long preformatted lines', () => {
      const line = 'x'.repeat(30);
      const result = renderGemtext(`\`\`\`\n${line}\n\`\`\`\n`, { columns: 10, margin: 1, styles: plainStyles });
      expect(result.lines).toEqual([` ${line}`]);
    });
  });

  describe('classifyLine', () => {
    it('matches the most specific prefix first', () => {
      expect(classifyLine('### a')).toBe('header3');
      expect(classifyLine('## a')).toBe('header2');
      expect(classifyLine('# a')).toBe('header1');
      expect(classifyLine('> a')).toBe('quote');
      expect(classifyLine('=>/x')).toBe('link');
      expect(classifyLine('* a')).toBe('list');
    });

    it('needs the space after header, quote and list markers', () => {
      expect(classifyLine('#a')).toBe('text');
      expect(classifyLine('####')).toBe('text');
      expect(classifyLine('>a')).toBe('text');
      expect(classifyLine('*a')).toBe('text');
    });
  });

  describe('parseLinkLine', () => {
    it('splits target and label on whitespace', () => {
      expect(parseLinkLine('=>  gemini://x.y/\tThe   label ')).toEqual({ target: 'gemini://x.y/', label: 'The   label' });
    });

    it('leaves the label out when there is none', () => {
      expect(parseLinkLine('=> /a')).toEqual({ target: '/a' });
    });

    it('returns null without a target', () => {
      expect(parseLinkLine('=>   ')).toBeNull();
    });
  });

  describe('wrapText', () => {
    it('wraps an empty line to one empty line', () => {
      expect(wrapText('', 5)).toEqual(['']);
    });

    it('splits words longer than the width', () => {
      expect(wrapText('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
      expect(wrapText('a abcdefgh', 4)).toEqual(['a', 'abcd', 'efgh']);
    });

    it('collapses runs of whitespace', () => {
      expect(wrapText('a   b\tc', 10)).toEqual(['a b c']);
    });
  });

  describe('renderPlain', () => {
    it('indents lines by the margin and nothing else', () => {
      expect(renderPlain('# a\r\nb\n', 1)).toEqual({ lines: [' # a', ' b'], links: [] });
    });
  });
});
