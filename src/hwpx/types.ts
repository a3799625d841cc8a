/**
 * HWPX Types
 *
 * Registry records, document blocks and runs, plus the parser node
 * shapes consumed by the content translator.
 *
 * @module hwpx/types
 */

import type { PagePreset } from './constants.js';

// ═══════════════════════════════════════════════════════════════════════
// Property records (header.xml)
// ═══════════════════════════════════════════════════════════════════════

export type FontLang = 'HANGUL' | 'LATIN' | 'HANJA' | 'JAPANESE' | 'OTHER' | 'SYMBOL' | 'USER';

export interface FontRecord {
    id: number;
    face: string;
    type: 'TTF';
}

export interface FontFaceRecord {
    lang: FontLang;
    fonts: readonly FontRecord[];
}

/** Font index per language group. */
export interface FontRef {
    hangul: number;
    latin: number;
    hanja: number;
    japanese: number;
    other: number;
    symbol: number;
    user: number;
}

export type BorderLineType = 'NONE' | 'SOLID';

export interface BorderLine {
    type: BorderLineType;
    width: string;
    color: string;
}

export interface BorderFillRecord {
    kind: 'borderFill';
    id: number;
    left: BorderLine;
    right: BorderLine;
    top: BorderLine;
    bottom: BorderLine;
    /** `null` renders as faceColor="none". */
    fillColor: string | null;
}

export interface CharPropertyRecord {
    kind: 'charPr';
    id: number;
    /** HWPUNIT, 1000 = 10pt */
    height: number;
    textColor: string;
    shadeColor: string;
    borderFillIdRef: number;
    fontRef: FontRef;
    bold: boolean;
    italic: boolean;
    underline: { type: 'NONE' | 'BOTTOM'; color: string };
    strikeout: 'NONE' | 'CONTINUOUS';
}

export type HorizontalAlign = 'LEFT' | 'CENTER' | 'RIGHT' | 'JUSTIFY';
export type ParaHeadingType = 'NONE' | 'OUTLINE' | 'NUMBER' | 'BULLET';

export interface ParaMargin {
    intent: number;
    left: number;
    right: number;
    prev: number;
    next: number;
}

export interface ParaPropertyRecord {
    kind: 'paraPr';
    id: number;
    tabPrIdRef: number;
    align: HorizontalAlign;
    heading: { type: ParaHeadingType; idRef: number; level: number };
    keepWithNext: boolean;
    keepLines: boolean;
    margin: ParaMargin;
    /** Percent of the font height. */
    lineSpacing: number;
    borderFillIdRef: number;
}

export interface StyleRecord {
    kind: 'style';
    id: number;
    type: 'PARA';
    name: string;
    engName: string;
    paraPrIdRef: number;
    charPrIdRef: number;
    nextStyleIdRef: number;
    langId: number;
}

export interface ParaHeadRecord {
    level: number;
    autoIndent: boolean;
    textOffset: number;
    numFormat: 'DIGIT' | 'BULLET';
    charPrIdRef: number;
}

export interface NumberingRecord {
    kind: 'numbering';
    id: number;
    start: number;
    paraHeads: readonly ParaHeadRecord[];
}

export interface BulletRecord {
    kind: 'bullet';
    id: number;
    char: string;
    checkedChar: string;
    paraHeads: readonly ParaHeadRecord[];
}

export type PropertyRecord =
    | CharPropertyRecord
    | ParaPropertyRecord
    | BorderFillRecord
    | StyleRecord
    | NumberingRecord
    | BulletRecord;

export type PropertyKind = PropertyRecord['kind'];

// ═══════════════════════════════════════════════════════════════════════
// Runs
// ═══════════════════════════════════════════════════════════════════════

export interface TextRun {
    kind: 'text';
    charPrId: number;
    text: string;
}

export interface FieldBeginRun {
    kind: 'fieldBegin';
    charPrId: number;
    fieldId: number;
    url: string;
}

export interface FieldEndRun {
    kind: 'fieldEnd';
    charPrId: number;
    fieldId: number;
}

/** Automatic page number, used inside header/footer regions. */
export interface PageNumberRun {
    kind: 'pageNumber';
    charPrId: number;
}

export type Run = TextRun | FieldBeginRun | FieldEndRun | PageNumberRun;

/** A hyperlink is always this triplet, never a lone run. */
export type LinkRuns = readonly [FieldBeginRun, TextRun, FieldEndRun];

// ═══════════════════════════════════════════════════════════════════════
// Blocks
// ═══════════════════════════════════════════════════════════════════════

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;
export type ListKind = 'bullet' | 'ordered';
export type ListLevel = 0 | 1 | 2;

interface TextBlockBase {
    paraPrId: number;
    styleId?: number;
    runs: Run[];
}

export interface HeadingBlock extends TextBlockBase {
    kind: 'heading';
    level: HeadingLevel;
    text: string;
}

export interface ParagraphBlock extends TextBlockBase {
    kind: 'paragraph';
    /** Set on each line of a fenced code block. */
    language?: string;
}

export interface ListItemBlock extends TextBlockBase {
    kind: 'listItem';
    listKind: ListKind;
    level: ListLevel;
}

export interface BlockquoteBlock extends TextBlockBase {
    kind: 'blockquote';
}

export interface HorizontalRuleBlock extends TextBlockBase {
    kind: 'horizontalRule';
}

export interface TableCell {
    header: boolean;
    row: number;
    col: number;
    borderFillId: number;
    width: number;
    height: number;
    subListId: number;
    paragraphs: ParagraphBlock[];
}

export interface TableBlock {
    kind: 'table';
    paraPrId: number;
    styleId?: number;
    id: number;
    rowCount: number;
    colCount: number;
    width: number;
    height: number;
    borderFillId: number;
    rows: TableCell[][];
}

export interface ImageBlock {
    kind: 'image';
    paraPrId: number;
    styleId?: number;
    charPrId: number;
    picId: number;
    instId: number;
    /** Binary item name, e.g. `image1`. */
    itemId: string;
    /** HWPUNIT */
    width: number;
    height: number;
    /** HWPUNIT of the unscaled picture. */
    originalWidth: number;
    originalHeight: number;
    alt?: string;
}

export interface HeaderRegionBlock {
    kind: 'headerRegion';
    id: number;
    subListId: number;
    paragraphs: ParagraphBlock[];
}

export interface FooterRegionBlock {
    kind: 'footerRegion';
    id: number;
    subListId: number;
    paragraphs: ParagraphBlock[];
}

export type TextBlock = HeadingBlock | ParagraphBlock | ListItemBlock | BlockquoteBlock | HorizontalRuleBlock;
export type BodyBlock = TextBlock | TableBlock | ImageBlock;
export type RegionBlock = HeaderRegionBlock | FooterRegionBlock;
export type Block = BodyBlock | RegionBlock;

// ═══════════════════════════════════════════════════════════════════════
// Document-level data
// ═══════════════════════════════════════════════════════════════════════

export interface PageMargins {
    left: number;
    right: number;
    top: number;
    bottom: number;
    header: number;
    footer: number;
    gutter: number;
}

export interface PageSetup {
    width: number;
    height: number;
    landscape: boolean;
    margins: PageMargins;
}

export interface PageSetupInput {
    preset?: PagePreset;
    landscape?: boolean;
    margins?: Partial<PageMargins>;
}

export interface BinaryItem {
    id: string;
    href: string;
    mediaType: string;
    data: Uint8Array;
}

// ═══════════════════════════════════════════════════════════════════════
// Construction inputs
// ═══════════════════════════════════════════════════════════════════════

export interface TextSpan {
    text: string;
    bold?: boolean;
    italic?: boolean;
    code?: boolean;
    strike?: boolean;
    /** Target URL; renders as a hyperlink field. */
    link?: string;
}

export type InlineContent = string | readonly TextSpan[];

/** `[content, level]` or bare content at level 0. */
export type ListItemInput = InlineContent | readonly [InlineContent, number];

export interface ImageOptions {
    /** HWPUNIT; height follows the aspect ratio when omitted. */
    width?: number;
    height?: number;
    alt?: string;
}

export interface TableOfContentsOptions {
    /** `null` omits the title paragraph. */
    title?: string | null;
    separator?: boolean;
    maxLevel?: number;
}

// ═══════════════════════════════════════════════════════════════════════
// Parser output (content translator input)
// ═══════════════════════════════════════════════════════════════════════

export interface ContentListItem {
    spans: TextSpan[];
    /** Raw nesting depth; the document clamps it. */
    level: number;
}

export type ContentNode =
    | { kind: 'heading'; level: number; spans: TextSpan[] }
    | { kind: 'paragraph'; spans: TextSpan[] }
    | { kind: 'list'; ordered: boolean; items: ContentListItem[] }
    | { kind: 'table'; headers: string[]; rows: string[][] }
    | { kind: 'code'; language: string; value: string }
    | { kind: 'blockquote'; spans: TextSpan[] }
    | { kind: 'thematicBreak' }
    | { kind: 'image'; url: string; alt: string };

// ═══════════════════════════════════════════════════════════════════════
// Serialized output
// ═══════════════════════════════════════════════════════════════════════

export interface SerializedPayloads {
    /** Contents/header.xml */
    header: string;
    /** Contents/section0.xml */
    section: string;
}
