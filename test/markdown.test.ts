import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isRemoteUrl, normalizeTableRows } from '../src/hwpx/converters/content-translator.js';
import { parseMarkdown } from '../src/hwpx/converters/markdown-parser.js';
import { convertMarkdownFile, defaultOutputPath, markdownToHwpx } from '../src/hwpx/converters/markdown-to-hwpx.js';
import { HwpxErrorCode } from '../src/hwpx/errors.js';
import { pngBytes } from './fixtures.js';

const SAMPLE = [
  '# Title *here*',
  '',
  'Some **bold** and _it_ text with `code` and [link](https://example.test).',
  '',
  '- one',
  '  - nested',
  '- two',
  '',
  '1. first',
  '2. second',
  '',
  '| A | B |',
  '|---|---|',
  '| 1 | 2 |',
  '',
  '```ts',
  'const x = 1;',
  '```',
  '',
  '> quoted',
  '> line',
  '',
  '---',
  '',
  '![Alt text](img.png)',
  '',
  '<div>raw</div>',
  '',
].join('\n');

let tmp: string;

beforeEach(async () => {
  tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'hwpx-md-'));
});

afterEach(async () => {
  await fs.rm(tmp, { recursive: true, force: true });
});

describe('parseMarkdown', () => {
  it('maps every supported block and drops raw html', () => {
    expect(parseMarkdown(SAMPLE)).toEqual([
      { kind: 'heading', level: 1, spans: [{ text: 'Title ' }, { text: 'here', italic: true }] },
      {
        kind: 'paragraph',
        spans: [
          { text: 'Some ' },
          { text: 'bold', bold: true },
          { text: ' and ' },
          { text: 'it', italic: true },
          { text: ' text with ' },
          { text: 'code', code: true },
          { text: ' and ' },
          { text: 'link', link: 'https://example.test' },
          { text: '.' },
        ],
      },
      {
        kind: 'list',
        ordered: false,
        items: [
          { spans: [{ text: 'one' }], level: 0 },
          { spans: [{ text: 'nested' }], level: 1 },
          { spans: [{ text: 'two' }], level: 0 },
        ],
      },
      {
        kind: 'list',
        ordered: true,
        items: [
          { spans: [{ text: 'first' }], level: 0 },
          { spans: [{ text: 'second' }], level: 0 },
        ],
      },
      { kind: 'table', headers: ['A', 'B'], rows: [['1', '2']] },
      { kind: 'code', language: 'ts', value: 'const x = 1;' },
      { kind: 'blockquote', spans: [{ text: 'quoted line' }] },
      { kind: 'thematicBreak' },
      { kind: 'image', url: 'img.png', alt: 'Alt text' },
    ]);
  });

  it('nests formatting and turns hard breaks into spaces', () => {
    expect(parseMarkdown('***both*** ~~gone~~  \nnext')).toEqual([
      {
        kind: 'paragraph',
        spans: [
          { text: 'both', italic: true, bold: true },
          { text: ' ' },
          { text: 'gone', strike: true },
          { text: ' ' },
          { text: 'next' },
        ],
      },
    ]);
  });

  it('keeps an image inside text as its alt text', () => {
    expect(parseMarkdown('see ![chart](c.png) here')).toEqual([
      { kind: 'paragraph', spans: [{ text: 'see ' }, { text: 'chart' }, { text: ' here' }] },
    ]);
  });
});

describe('normalizeTableRows', () => {
  it('pads short rows and truncates long ones', () => {
    expect(normalizeTableRows(['a', 'b'], [['1'], ['1', '2', '3'], ['x', 'y']])).toEqual([
      ['1', ''],
      ['1', '2'],
      ['x', 'y'],
    ]);
  });
});

describe('isRemoteUrl', () => {
  it.each(['https://example.test/a.png', 'HTTP://example.test/a.png', 'data:image/png;base64,AAAA'])('%s is remote', (url) => {
    expect(isRemoteUrl(url)).toBe(true);
  });

  it.each(['img.png', '../img.png', '/abs/img.png', 'file:///abs/img.png', 'C:\\img.png', 'd:/pics/img.png'])(
    '%s is local',
    (url) => {
      expect(isRemoteUrl(url)).toBe(false);
    },
  );
});

describe('markdownToHwpx', () => {
  it('translates the sample into document blocks', async () => {
    const doc = await markdownToHwpx(SAMPLE, { baseDir: tmp });
    expect(doc.blocks.map((b) => b.kind)).toEqual([
      'heading',
      'paragraph',
      'listItem',
      'listItem',
      'listItem',
      'listItem',
      'listItem',
      'table',
      'paragraph',
      'blockquote',
      'horizontalRule',
      'paragraph',
    ]);
  });

  it('replaces a missing local image with its alt text', async () => {
    const doc = await markdownToHwpx('![Alt text](missing.png)', { baseDir: tmp });
    expect(doc.blocks.map((b) => b.kind)).toEqual(['paragraph']);
    expect(doc.previewText()).toBe('Alt text');
    expect(doc.binaryItems).toHaveLength(0);
  });

  it('embeds a local image relative to the base directory', async () => {
    await fs.writeFile(path.join(tmp, 'pic.png'), pngBytes(10, 20));
    const doc = await markdownToHwpx('![](pic.png)', { baseDir: tmp });
    const [block] = doc.blocks;
    expect(block).toMatchObject({ kind: 'image', alt: 'pic.png', width: 750, height: 1500 });
    expect(doc.binaryItems.map((item) => item.href)).toEqual(['BinData/image1.png']);
  });

  it('does not fetch remote images', async () => {
    const doc = await markdownToHwpx('![Logo](https://example.test/logo.png)');
    expect(doc.blocks.map((b) => b.kind)).toEqual(['paragraph']);
    expect(doc.previewText()).toBe('Logo');
  });

  it('appends a table of contents when asked', async () => {
    const doc = await markdownToHwpx('# A\n\n## B', { toc: { title: null, separator: false } });
    expect(doc.blocks.map((b) => b.kind)).toEqual(['heading', 'heading', 'paragraph', 'paragraph']);
    expect(doc.previewText()).toBe('A B A     B');
  });

  it('applies style and page options', async () => {
    const doc = await markdownToHwpx('text', { page: { preset: 'Letter' }, style: { fontSizeBody: 1100 } });
    expect(doc.pageSetup.width).toBe(61200);
    expect(doc.styleConfig.fontSizeBody).toBe(1100);
  });
});

describe('convertMarkdownFile', () => {
  it('writes the archive beside the input by default', async () => {
    const input = path.join(tmp, 'notes.md');
    await fs.writeFile(input, '# Notes\n\nBody\n');
    const output = await convertMarkdownFile(input);
    expect(output).toBe(path.join(tmp, 'notes.hwpx'));
    const bytes = await fs.readFile(output);
    expect(bytes.toString('ascii', 0, 2)).toBe('PK');
  });

  it('reports an unreadable input file', async () => {
    await expect(convertMarkdownFile(path.join(tmp, 'nope.md'))).rejects.toMatchObject({
      code: HwpxErrorCode.INPUT_READ_FAILED,
    });
  });
});

describe('defaultOutputPath', () => {
  it.each([
    ['docs/Notes.MD', 'docs/Notes.hwpx'],
    ['readme', 'readme.hwpx'],
    ['page.markdown', 'page.markdown.hwpx'],
  ])('%s -> %s', (input, expected) => {
    expect(defaultOutputPath(input)).toBe(expected);
  });
});
