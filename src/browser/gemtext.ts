/**
 * Gemtext renderer
 *
 * Classifies each line of a text/gemini body, word-wraps it to the
 * terminal width and applies the configured ANSI style. Links are numbered
 * from 1 in document order and collected into the page's link table.
 *
 * Line types (first match wins, outside preformatted blocks):
 *   ###  header3      >   quote
 *   ##   header2      =>  link
 *   #    header1      *   list item
 *   anything else     plain text
 *
 * A line starting with ``` toggles preformatted mode and is not shown.
 */

import type { StyleCategory, StyleSet } from './config';

export const RESET = '\x1b[0m';

export type LineType = 'header1' | 'header2' | 'header3' | 'quote' | 'link' | 'list' | 'text';

export interface Link {
  index: number;
  target: string;
  label: string;
}

export interface RenderOptions {
  /** Terminal columns. */
  columns: number;
  margin: number;
  styles: StyleSet;
}

export interface RenderedDocument {
  lines: string[];
  links: Link[];
}

export function sgr(style: string): string {
  return style ? `\x1b[${style}m` : '';
}

/**
 * Apply a style to one run of text. An empty style leaves the text bare.
 */
function styled(styles: StyleSet, category: StyleCategory, text: string): string {
  const prefix = sgr(styles[category]);
  return prefix ? `${prefix}${text}${RESET}` : text;
}

export function classifyLine(line: string): LineType {
  if (line.startsWith('### ')) return 'header3';
  if (line.startsWith('## ')) return 'header2';
  if (line.startsWith('# ')) return 'header1';
  if (line.startsWith('> ')) return 'quote';
  if (line.startsWith('=>')) return 'link';
  if (line.startsWith('* ')) return 'list';
  return 'text';
}

/**
 * Split a link line into target and optional label.
 */
export function parseLinkLine(line: string): { target: string; label?: string } | null {
  const rest = line.substring(2).trim();
  if (!rest) return null;

  const match = /^(\S+)(?:\s+(.*))?$/.exec(rest);
  if (!match) return null;

  const label = match[2]?.trim();
  return label ? { target: match[1], label } : { target: match[1] };
}

/**
 * Greedy word wrap. Words longer than the width are split; an empty line
 * wraps to a single empty line.
 */
export function wrapText(text: string, width: number): string[] {
  const limit = Math.max(1, width);
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  if (words.length === 0) return [''];

  const lines: string[] = [];
  let current = '';

  for (let word of words) {
    while (word.length > limit) {
      if (current) {
        lines.push(current);
        current = '';
      }
      lines.push(word.substring(0, limit));
      word = word.substring(limit);
    }
    if (!word) continue;

    if (!current) {
      current = word;
    } else if (current.length + 1 + word.length <= limit) {
      current += ` ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }

  if (current) lines.push(current);
  return lines;
}

/**
 * Wrap `text` behind a bullet: the first physical line carries the styled
 * bullet, the following ones are indented to line up with the text.
 */
function bulleted(
  pad: string,
  bullet: string,
  bulletStyle: StyleCategory,
  textStyle: StyleCategory,
  text: string,
  width: number,
  styles: StyleSet,
): string[] {
  const indent = ' '.repeat(bullet.length + 1);
  return wrapText(text, width - indent.length).map((chunk, i) =>
    i === 0
      ? `${pad}${styled(styles, bulletStyle, bullet)} ${styled(styles, textStyle, chunk)}`
      : `${pad}${indent}${styled(styles, textStyle, chunk)}`,
  );
}

export function renderGemtext(body: string, options: RenderOptions): RenderedDocument {
  const { margin, styles } = options;
  const width = options.columns - 2 * margin;
  const pad = ' '.repeat(Math.max(0, margin));

  const lines: string[] = [];
  const links: Link[] = [];
  let preformatted = false;

  const source = body.split('\n');
  if (source.length > 0 && source[source.length - 1] === '') source.pop();

  for (const rawLine of source) {
    const line = rawLine.replace(/\r$/, '');

    if (line.startsWith('```')) {
      preformatted = !preformatted;
      continue;
    }

    if (preformatted) {
      lines.push(`${pad}${line}`);
      continue;
    }

    const type = classifyLine(line);
    switch (type) {
      case 'header3':
      case 'header2':
      case 'header1': {
        const text = line.substring(type === 'header3' ? 4 : type === 'header2' ? 3 : 2);
        for (const chunk of wrapText(text, width)) {
          lines.push(`${pad}${styled(styles, type, chunk)}`);
        }
        break;
      }

      case 'quote':
        for (const chunk of wrapText(line.substring(2), width - 2)) {
          lines.push(`${pad}${styled(styles, 'quote', `> ${chunk}`)}`);
        }
        break;

      case 'link': {
        const parsed = parseLinkLine(line);
        if (!parsed) {
          lines.push(...wrapText(line, width).map((chunk) => `${pad}${chunk}`));
          break;
        }
        const link: Link = {
          index: links.length + 1,
          target: parsed.target,
          label: parsed.label ?? parsed.target,
        };
        links.push(link);
        lines.push(...bulleted(pad, `[${link.index}]`, 'link-bullet', 'link-text', link.label, width, styles));
        break;
      }

      case 'list':
        lines.push(...bulleted(pad, '•', 'list-bullet', 'list-text', line.substring(2), width, styles));
        break;

      case 'text':
        if (line.trim().length === 0) {
          lines.push('');
        } else {
          lines.push(...wrapText(line, width).map((chunk) => `${pad}${chunk}`));
        }
        break;
    }
  }

  return { lines, links };
}

/**
 * Non-gemtext bodies are shown as they are, with the left margin only.
 */
export function renderPlain(body: string, margin: number): RenderedDocument {
  const pad = ' '.repeat(Math.max(0, margin));
  const source = body.split('\n');
  if (source.length > 0 && source[source.length - 1] === '') source.pop();
  return {
    lines: source.map((line) => `${pad}${line.replace(/\r$/, '')}`),
    links: [],
  };
}
