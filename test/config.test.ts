import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadWriterConfig, parseWriterConfig, writerOptions } from '../src/config.js';
import { markdownToHwpx } from '../src/hwpx/converters/markdown-to-hwpx.js';
import { HwpxError, HwpxErrorCode } from '../src/hwpx/errors.js';

let tmp: string;

beforeEach(async () => {
  tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'hwpx-config-'));
});

afterEach(async () => {
  await fs.rm(tmp, { recursive: true, force: true });
});

function configError(value: unknown): HwpxError {
  try {
    parseWriterConfig(value, 'test.json');
  } catch (error) {
    if (error instanceof HwpxError) return error;
    throw error;
  }
  throw new Error('expected parseWriterConfig to throw');
}

describe('loadWriterConfig', () => {
  it('returns an empty config when the file is missing', () => {
    expect(loadWriterConfig(path.join(tmp, 'hwpx.config.json'))).toEqual({});
  });

  it('loads a valid file and feeds the converter', async () => {
    const file = path.join(tmp, 'hwpx.config.json');
    await fs.writeFile(
      file,
      JSON.stringify({ style: { fontSizeBody: 1100 }, page: { preset: 'Letter' }, seed: 7, toc: true }),
    );
    const config = loadWriterConfig(file);
    expect(config).toEqual({ style: { fontSizeBody: 1100 }, page: { preset: 'Letter' }, seed: 7, toc: true });

    const doc = await markdownToHwpx('# One', writerOptions(config));
    expect(doc.styleConfig.fontSizeBody).toBe(1100);
    expect(doc.pageSetup.width).toBe(61200);
    expect(doc.seed).toBe(7);
    expect(doc.blocks.map((b) => b.kind)).toEqual(['heading', 'paragraph', 'paragraph', 'horizontalRule']);
  });

  it('rejects a file that is not JSON', async () => {
    const file = path.join(tmp, 'hwpx.config.json');
    await fs.writeFile(file, '{ style: ');
    expect(() => loadWriterConfig(file)).toThrow(expect.objectContaining({ code: HwpxErrorCode.CONFIG_INVALID }));
  });
});

describe('parseWriterConfig', () => {
  it('names an unknown page preset', () => {
    const error = configError({ page: { preset: 'B5' } });
    expect(error.code).toBe(HwpxErrorCode.CONFIG_INVALID);
    expect(error.message).toBe('Invalid configuration in test.json: page.preset: must be one of A4, Letter, A3');
    expect(error.context?.field).toBe('page.preset');
  });

  it('names unknown top-level keys', () => {
    expect(configError({ colour: 'red' }).context?.field).toBe('colour');
  });

  it('names unknown style keys', () => {
    expect(configError({ style: { fontsize: 10 } }).context?.field).toBe('fontsize');
  });

  it('rejects negative margins', () => {
    expect(configError({ page: { margins: { left: -1 } } }).context?.field).toBe('page.margins.left');
  });

  it('rejects a table of contents depth out of range', () => {
    expect(configError({ toc: { maxLevel: 7 } }).code).toBe(HwpxErrorCode.CONFIG_INVALID);
  });

  it('accepts an empty object', () => {
    expect(parseWriterConfig({})).toEqual({});
  });
});
