/**
 * ContentNode[] -> HwpxDocument operations.
 *
 * Ragged table rows are padded or cut to the header width before
 * `addTable`, which itself rejects mismatched grids. Images that cannot be
 * read are replaced by a paragraph holding their alt text.
 */

import path from 'path';
import { logger } from '../../utils/logger.js';
import type { HwpxDocument } from '../document.js';
import { HwpxError, HwpxErrorCode } from '../errors.js';
import type { ContentNode, ListItemInput, TableOfContentsOptions, TextSpan } from '../types.js';

export interface TranslateOptions {
    /** Directory local image paths resolve against; defaults to the working directory. */
    baseDir?: string;
    /** Append a table of contents after the body. */
    toc?: boolean | TableOfContentsOptions;
}

const spansText = (spans: readonly TextSpan[]): string => spans.map((s) => s.text).join('');

/** Pad short rows with empty cells and drop cells past the header width. */
export function normalizeTableRows(headers: readonly string[], rows: readonly (readonly string[])[]): string[][] {
    const width = headers.length;
    return rows.map((row, index) => {
        if (row.length === width) return [...row];
        logger.debug('Normalized ragged table row', { row: index, cells: row.length, columns: width });
        return row.length > width ? row.slice(0, width) : [...row, ...Array<string>(width - row.length).fill('')];
    });
}

/** A URL with a scheme other than `file:`; drive-letter paths such as `C:\img.png` are local. */
export function isRemoteUrl(url: string): boolean {
    if (/^[A-Za-z]:[\\/]/.test(url)) return false;
    return /^[a-z][a-z0-9+.-]*:/i.test(url) && !/^file:/i.test(url);
}

function localImagePath(url: string, baseDir: string): string {
    const raw = url.replace(/^file:\/\//i, '');
    let decoded = raw;
    try {
        decoded = decodeURI(raw);
    } catch (error) {
        logger.debug('Image path is not URI-encoded', { url, error: String(error) });
    }
    return path.resolve(baseDir, decoded);
}

async function addImageNode(doc: HwpxDocument, url: string, alt: string, baseDir: string): Promise<void> {
    if (isRemoteUrl(url)) {
        logger.warning('Remote images are not fetched; using alt text', { url });
        doc.addParagraph(alt || url);
        return;
    }
    const file = localImagePath(url, baseDir);
    try {
        await doc.addImageFile(file, alt ? { alt } : {});
    } catch (error) {
        if (!(error instanceof HwpxError) || error.code !== HwpxErrorCode.IMAGE_READ_FAILED) throw error;
        logger.warning('Image not found; using alt text', { url, path: file, error: error.message });
        doc.addParagraph(alt || url);
    }
}

export async function translateContent(
    nodes: readonly ContentNode[],
    doc: HwpxDocument,
    options: TranslateOptions = {},
): Promise<HwpxDocument> {
    const baseDir = options.baseDir ?? process.cwd();

    for (const node of nodes) {
        switch (node.kind) {
            case 'heading':
                doc.addHeading(spansText(node.spans), node.level);
                break;
            case 'paragraph':
                doc.addParagraph(node.spans);
                break;
            case 'list': {
                const items: ListItemInput[] = node.items.map((item) => [item.spans, item.level] as const);
                if (node.ordered) doc.addOrderedList(items);
                else doc.addBulletList(items);
                break;
            }
            case 'table':
                doc.addTable(node.headers, normalizeTableRows(node.headers, node.rows));
                break;
            case 'code':
                doc.addCodeBlock(node.value, node.language);
                break;
            case 'blockquote':
                doc.addBlockquote(node.spans);
                break;
            case 'thematicBreak':
                doc.addHorizontalRule();
                break;
            case 'image':
                await addImageNode(doc, node.url, node.alt, baseDir);
                break;
        }
    }

    if (options.toc) {
        doc.addTableOfContents(options.toc === true ? {} : options.toc);
    }
    return doc;
}
