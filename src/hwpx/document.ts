/**
 * HWPX Document Model
 *
 * The block list and its construction API.
 *
 * Every add* call resolves registry IDs through the mapping tables,
 * checks them against the active registry, and appends; blocks are never
 * reordered or removed. Structural IDs come from the document's own
 * IdGenerator, so independent documents never share ID state.
 *
 * @module hwpx/document
 */

import fs from 'fs/promises';
import path from 'path';
import { logger } from '../utils/logger.js';
import { HwpxBuilder } from './builder.js';
import { serialize } from './builders/index.js';
import {
    BORDER_FILL,
    CHAR_PR,
    DEFAULT_MARGINS,
    HWPX_PATHS,
    PAGE_PRESETS,
    PARA_PR,
    PREVIEW_TEXT_LIMIT,
    STYLE,
    TABLE_CELL_HEIGHT,
    TOC_DEFAULT_MAX_LEVEL,
    TOC_DEFAULT_TITLE,
    TOC_INDENT,
    pixelsToHwpunit,
} from './constants.js';
import { HwpxError, HwpxErrorCode, withErrorContext } from './errors.js';
import { IdGenerator } from './ids.js';
import { HEADING_MAP, LIST_PARA_MAP, TABLE_CELL_MAP, clampHeadingLevel, clampListLevel } from './mappings.js';
import { buildPackage, type PackageOptions } from './package.js';
import { inspectImage } from './parsers/image-info.js';
import { buildRegistry, type Registry } from './registry.js';
import { contentToRuns, regionTextToRuns, runsText, textRun } from './runs.js';
import type { StyleConfig, StyleConfigInput } from './style-config.js';
import type {
    BinaryItem,
    BlockquoteBlock,
    BodyBlock,
    FooterRegionBlock,
    HeaderRegionBlock,
    HeadingBlock,
    HorizontalRuleBlock,
    ImageBlock,
    ImageOptions,
    InlineContent,
    ListItemBlock,
    ListItemInput,
    ListKind,
    PageSetup,
    PageSetupInput,
    ParagraphBlock,
    RegionBlock,
    SerializedPayloads,
    TableBlock,
    TableCell,
    TableOfContentsOptions,
    TextBlock,
} from './types.js';
import {
    assertBlockReferences,
    validateImageDimensions,
    validatePageGeometry,
    validateTableGrid,
} from './validators.js';

export interface HwpxDocumentOptions {
    /** Seed for reproducible structural IDs. */
    seed?: number;
    style?: StyleConfigInput;
    page?: PageSetupInput;
}

/** What the serializer reads from a document. */
export interface DocumentModel {
    readonly blocks: readonly BodyBlock[];
    readonly pageSetup: PageSetup;
    readonly header?: HeaderRegionBlock;
    readonly footer?: FooterRegionBlock;
}

export function resolvePageSetup(input: PageSetupInput = {}): PageSetup {
    const preset = PAGE_PRESETS[input.preset ?? 'A4'];
    if (!preset) {
        throw new HwpxError(`Unknown page preset: ${String(input.preset)}`, HwpxErrorCode.INVALID_ARGUMENT, {
            preset: input.preset,
        });
    }
    const landscape = input.landscape ?? false;
    const width = landscape ? preset.height : preset.width;
    const height = landscape ? preset.width : preset.height;
    const margins = { ...DEFAULT_MARGINS, ...input.margins };
    validatePageGeometry(width, height, margins);
    return { width, height, landscape, margins };
}

export function usableWidth(setup: PageSetup): number {
    return setup.width - setup.margins.left - setup.margins.right;
}

function normalizeListItem(item: ListItemInput): { content: InlineContent; level: number } {
    if (typeof item === 'string') return { content: item, level: 0 };
    if (isLevelTuple(item)) return { content: item[0], level: item[1] };
    return { content: item, level: 0 };
}

function isLevelTuple(item: Exclude<ListItemInput, string>): item is readonly [InlineContent, number] {
    return item.length === 2 && typeof item[1] === 'number';
}

export class HwpxDocument implements DocumentModel {
    private activeRegistry: Registry;
    private readonly ids: IdGenerator;
    private readonly blockList: BodyBlock[] = [];
    private readonly binItems: BinaryItem[] = [];
    private page: PageSetup;
    private headerRegion?: HeaderRegionBlock;
    private footerRegion?: FooterRegionBlock;

    constructor(options: HwpxDocumentOptions = {}) {
        this.ids = new IdGenerator(options.seed);
        this.activeRegistry = buildRegistry(options.style ?? {});
        this.page = resolvePageSetup(options.page);
    }

    static create(options: HwpxDocumentOptions = {}): HwpxDocument {
        return new HwpxDocument(options);
    }

    /** Fluent wrapper over this document. */
    builder(): HwpxBuilder {
        return new HwpxBuilder(this);
    }

    // ─── State ──────────────────────────────────────────────────────────

    get registry(): Registry {
        return this.activeRegistry;
    }

    get styleConfig(): StyleConfig {
        return this.activeRegistry.config;
    }

    get blocks(): readonly BodyBlock[] {
        return this.blockList;
    }

    get binaryItems(): readonly BinaryItem[] {
        return this.binItems;
    }

    get pageSetup(): PageSetup {
        return this.page;
    }

    get header(): HeaderRegionBlock | undefined {
        return this.headerRegion;
    }

    get footer(): FooterRegionBlock | undefined {
        return this.footerRegion;
    }

    get usableWidth(): number {
        return usableWidth(this.page);
    }

    get seed(): number | undefined {
        return this.ids.seed;
    }

    // ─── Settings ───────────────────────────────────────────────────────

    /** Replace the registry with one built from `config`; unset fields take defaults. */
    setStyle(config: StyleConfigInput): this {
        const next = buildRegistry(config);
        for (const block of this.allBlocks()) assertBlockReferences(next, block);
        this.activeRegistry = next;
        return this;
    }

    /** Affects tables and images added afterwards. */
    setPageSetup(input: PageSetupInput): this {
        this.page = resolvePageSetup(input);
        return this;
    }

    // ─── Content ────────────────────────────────────────────────────────

    addHeading(text: string, level: number = 1): HeadingBlock {
        const clamped = clampHeadingLevel(level);
        const mapping = HEADING_MAP[clamped];
        return this.append({
            kind: 'heading',
            level: clamped,
            text,
            paraPrId: mapping.paraPrId,
            styleId: mapping.styleId,
            runs: [textRun(text, mapping.charPrId)],
        });
    }

    addParagraph(content: InlineContent = ''): ParagraphBlock {
        return this.append(this.paragraph(content, PARA_PR.BODY));
    }

    /**
     * Header row plus data rows; every row must have exactly
     * `headers.length` cells. Columns share the usable page width.
     */
    addTable(headers: readonly string[], rows: readonly (readonly string[])[]): TableBlock {
        validateTableGrid(headers, rows);

        const colCount = headers.length;
        const rowCount = rows.length + 1;
        const width = this.usableWidth;
        const colWidth = Math.floor(width / colCount);
        const id = this.ids.next();

        const cell = (text: string, row: number, col: number, header: boolean): TableCell => {
            const map = header ? TABLE_CELL_MAP.header : TABLE_CELL_MAP.body;
            return {
                header,
                row,
                col,
                borderFillId: map.borderFillId,
                width: colWidth,
                height: TABLE_CELL_HEIGHT,
                subListId: this.ids.next(),
                paragraphs: text.split('\n').map((line): ParagraphBlock => ({
                    kind: 'paragraph',
                    paraPrId: TABLE_CELL_MAP.paraPrId,
                    styleId: STYLE.NORMAL,
                    runs: [textRun(line, map.charPrId)],
                })),
            };
        };

        const grid: TableCell[][] = [headers.map((text, col) => cell(text, 0, col, true))];
        rows.forEach((row, r) => grid.push(row.map((text, col) => cell(text, r + 1, col, false))));

        return this.append({
            kind: 'table',
            paraPrId: PARA_PR.BODY,
            styleId: STYLE.NORMAL,
            id,
            rowCount,
            colCount,
            width,
            height: rowCount * TABLE_CELL_HEIGHT,
            borderFillId: BORDER_FILL.TABLE,
            rows: grid,
        });
    }

    /** Items are content or `[content, level]`; levels beyond 2 fold to 2. */
    addBulletList(items: readonly ListItemInput[]): ListItemBlock[] {
        return this.addList('bullet', items);
    }

    addOrderedList(items: readonly ListItemInput[]): ListItemBlock[] {
        return this.addList('ordered', items);
    }

    /** One paragraph per source line; blank lines keep a single space. */
    addCodeBlock(code: string, language: string = ''): ParagraphBlock[] {
        const lines = code.replace(/\r\n?/g, '\n').replace(/\n$/, '').split('\n');
        return lines.map((line) =>
            this.append({
                kind: 'paragraph',
                paraPrId: PARA_PR.CODE,
                styleId: STYLE.NORMAL,
                runs: [textRun(line.length > 0 ? line : ' ', CHAR_PR.CODE_BLOCK)],
                ...(language ? { language } : {}),
            }),
        );
    }

    addBlockquote(content: InlineContent): BlockquoteBlock {
        return this.append({
            kind: 'blockquote',
            paraPrId: PARA_PR.QUOTE,
            styleId: STYLE.NORMAL,
            runs: contentToRuns(content, this.ids),
        });
    }

    addHorizontalRule(): HorizontalRuleBlock {
        return this.append({
            kind: 'horizontalRule',
            paraPrId: PARA_PR.RULE,
            styleId: STYLE.NORMAL,
            runs: [textRun('')],
        });
    }

    /** Page header; `{page}` in a string becomes the page number. */
    setHeader(content: InlineContent): HeaderRegionBlock {
        const region: HeaderRegionBlock = { kind: 'headerRegion', ...this.region(content) };
        assertBlockReferences(this.activeRegistry, region);
        this.headerRegion = region;
        return region;
    }

    /** Page footer; `{page}` in a string becomes the page number. */
    setFooter(content: InlineContent): FooterRegionBlock {
        const region: FooterRegionBlock = { kind: 'footerRegion', ...this.region(content) };
        assertBlockReferences(this.activeRegistry, region);
        this.footerRegion = region;
        return region;
    }

    /**
     * Embed an image from raw bytes. Size defaults to the pixel size
     * (75 HWPUNIT per px), shrunk to the usable width when wider.
     */
    addImage(data: Uint8Array, options: ImageOptions = {}): ImageBlock {
        validateImageDimensions(options.width, options.height);
        const image = inspectImage(data);
        if (!image.recognized) {
            logger.warning('Unrecognized image data, using fallback size', {
                format: image.format,
                width: image.width,
                height: image.height,
            });
        }

        const naturalWidth = pixelsToHwpunit(image.width);
        const naturalHeight = pixelsToHwpunit(image.height);
        const { width, height } = this.fitImage(naturalWidth, naturalHeight, options);

        const itemId = this.ids.nextName('image');
        this.binItems.push({
            id: itemId,
            href: `${HWPX_PATHS.BIN_DATA_FOLDER}/${itemId}.${image.extension}`,
            mediaType: image.mediaType,
            data,
        });

        return this.append({
            kind: 'image',
            paraPrId: PARA_PR.BODY,
            styleId: STYLE.NORMAL,
            charPrId: CHAR_PR.BODY,
            picId: this.ids.next(),
            instId: this.ids.next(),
            itemId,
            width,
            height,
            originalWidth: naturalWidth,
            originalHeight: naturalHeight,
            ...(options.alt !== undefined ? { alt: options.alt } : {}),
        });
    }

    /** Read an image file and embed it; alt text defaults to the file name. */
    async addImageFile(filePath: string, options: ImageOptions = {}): Promise<ImageBlock> {
        const data = await withErrorContext(() => fs.readFile(filePath), HwpxErrorCode.IMAGE_READ_FAILED, {
            path: filePath,
        });
        return this.addImage(data, { alt: path.basename(filePath), ...options });
    }

    /**
     * One body paragraph per heading added so far (up to `maxLevel`),
     * indented by level, between an optional title and separator rule.
     */
    addTableOfContents(options: TableOfContentsOptions = {}): BodyBlock[] {
        const maxLevel = options.maxLevel ?? TOC_DEFAULT_MAX_LEVEL;
        const title = options.title === undefined ? TOC_DEFAULT_TITLE : options.title;
        const headings = this.blockList.filter(
            (block): block is HeadingBlock => block.kind === 'heading' && block.level <= maxLevel,
        );

        const added: BodyBlock[] = [];
        if (title !== null) {
            added.push(this.append(this.paragraph([{ text: title, bold: true }], PARA_PR.BODY)));
        }
        for (const heading of headings) {
            added.push(this.addParagraph(`${TOC_INDENT.repeat(heading.level - 1)}${heading.text}`));
        }
        if (options.separator ?? true) {
            added.push(this.addHorizontalRule());
        }
        return added;
    }

    // ─── Output ─────────────────────────────────────────────────────────

    /** header.xml and section0.xml for the current state. */
    serialize(): SerializedPayloads {
        return serialize(this.activeRegistry, this);
    }

    /** Non-blank run texts joined by spaces, cut to the preview limit. */
    previewText(): string {
        const texts: string[] = [];
        const collect = (runsOf: { runs: TextBlock['runs'] }): void => {
            const text = runsText(runsOf.runs);
            if (text.trim()) texts.push(text);
        };
        for (const block of this.blockList) {
            if (block.kind === 'table') {
                block.rows.forEach((row) => row.forEach((c) => c.paragraphs.forEach(collect)));
            } else if (block.kind !== 'image') {
                collect(block);
            }
        }
        return texts.join(' ').slice(0, PREVIEW_TEXT_LIMIT);
    }

    /** The complete .hwpx archive. */
    async toBuffer(options: PackageOptions = {}): Promise<Buffer> {
        return buildPackage(this, options);
    }

    async save(outputPath: string, options: PackageOptions = {}): Promise<void> {
        const buf = await this.toBuffer(options);
        await withErrorContext(() => fs.writeFile(outputPath, buf), HwpxErrorCode.PACKAGE_FAILED, {
            path: outputPath,
        });
        logger.info(`Saved HWPX document to ${outputPath}`, { blocks: this.blockList.length, bytes: buf.length });
    }

    // ─── Internals ──────────────────────────────────────────────────────

    private append<T extends BodyBlock>(block: T): T {
        assertBlockReferences(this.activeRegistry, block);
        this.blockList.push(block);
        return block;
    }

    private paragraph(content: InlineContent, paraPrId: number): ParagraphBlock {
        return { kind: 'paragraph', paraPrId, styleId: STYLE.NORMAL, runs: contentToRuns(content, this.ids) };
    }

    private addList(listKind: ListKind, items: readonly ListItemInput[]): ListItemBlock[] {
        return items.map((item) => {
            const { content, level } = normalizeListItem(item);
            const clamped = clampListLevel(level);
            return this.append({
                kind: 'listItem',
                listKind,
                level: clamped,
                paraPrId: LIST_PARA_MAP[listKind][clamped],
                styleId: STYLE.NORMAL,
                runs: contentToRuns(content, this.ids),
            });
        });
    }

    private region(content: InlineContent): Omit<RegionBlock, 'kind'> {
        const runs = typeof content === 'string' ? regionTextToRuns(content) : contentToRuns(content, this.ids);
        return {
            id: this.ids.next(),
            subListId: this.ids.next(),
            paragraphs: [{ kind: 'paragraph', paraPrId: PARA_PR.BODY, styleId: STYLE.NORMAL, runs }],
        };
    }

    private fitImage(naturalWidth: number, naturalHeight: number, options: ImageOptions): { width: number; height: number } {
        const ratio = naturalHeight / naturalWidth;
        if (options.width !== undefined && options.height !== undefined) {
            return { width: Math.round(options.width), height: Math.round(options.height) };
        }
        if (options.width !== undefined) {
            return { width: Math.round(options.width), height: Math.round(options.width * ratio) };
        }
        if (options.height !== undefined) {
            return { width: Math.round(options.height / ratio), height: Math.round(options.height) };
        }
        const maxWidth = this.usableWidth;
        if (naturalWidth > maxWidth) {
            return { width: maxWidth, height: Math.round(maxWidth * ratio) };
        }
        return { width: naturalWidth, height: naturalHeight };
    }

    private *allBlocks(): Generator<BodyBlock | RegionBlock> {
        yield* this.blockList;
        if (this.headerRegion) yield this.headerRegion;
        if (this.footerRegion) yield this.footerRegion;
    }
}
