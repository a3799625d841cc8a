/**
 * Markdown -> .hwpx entry points.
 */

import fs from 'fs/promises';
import path from 'path';
import { logger } from '../../utils/logger.js';
import { HwpxDocument, type HwpxDocumentOptions } from '../document.js';
import { HwpxErrorCode, withErrorContext } from '../errors.js';
import type { PackageOptions } from '../package.js';
import { translateContent, type TranslateOptions } from './content-translator.js';
import { parseMarkdown } from './markdown-parser.js';

export interface MarkdownToHwpxOptions extends HwpxDocumentOptions, TranslateOptions {}

export async function markdownToHwpx(markdown: string, options: MarkdownToHwpxOptions = {}): Promise<HwpxDocument> {
    const nodes = parseMarkdown(markdown);
    logger.debug('Parsed markdown', { nodes: nodes.length });
    const doc = new HwpxDocument({ seed: options.seed, style: options.style, page: options.page });
    return translateContent(nodes, doc, { baseDir: options.baseDir, toc: options.toc });
}

/** `notes.md` -> `notes.hwpx`; any other name gets `.hwpx` appended. */
export function defaultOutputPath(inputPath: string): string {
    return inputPath.toLowerCase().endsWith('.md') ? `${inputPath.slice(0, -3)}.hwpx` : `${inputPath}.hwpx`;
}

/**
 * Convert a markdown file and write the archive. Images resolve against
 * the input file's directory unless `baseDir` says otherwise.
 * Returns the output path.
 */
export async function convertMarkdownFile(
    inputPath: string,
    outputPath: string = defaultOutputPath(inputPath),
    options: MarkdownToHwpxOptions & PackageOptions = {},
): Promise<string> {
    const markdown = await withErrorContext(() => fs.readFile(inputPath, 'utf-8'), HwpxErrorCode.INPUT_READ_FAILED, {
        path: inputPath,
    });
    const baseDir = options.baseDir ?? path.dirname(path.resolve(inputPath));
    const doc = await markdownToHwpx(markdown, { ...options, baseDir });
    await doc.save(outputPath, { verify: options.verify });
    return outputPath;
}
