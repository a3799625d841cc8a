/**
 * Property registry: the closed set of formatting records written to
 * header.xml.
 *
 * A registry is built whole from a StyleConfig and deep-frozen; a style
 * change builds a new one rather than patching records in place.
 * BorderFill IDs start at 1, every other record kind starts at 0.
 *
 * @module hwpx/registry
 */

import { BORDER_FILL, BULLET_ID, CHAR_PR, NUMBERING_ID, PARA_PR, STYLE } from './constants.js';
import { HwpxError, HwpxErrorCode } from './errors.js';
import { verifyMappings } from './mappings.js';
import { parseStyleConfig, type StyleConfig, type StyleConfigInput } from './style-config.js';
import type {
    BorderFillRecord,
    BorderLine,
    BulletRecord,
    CharPropertyRecord,
    FontFaceRecord,
    FontLang,
    FontRef,
    NumberingRecord,
    ParaHeadRecord,
    ParaPropertyRecord,
    PropertyKind,
    StyleRecord,
} from './types.js';

export interface Registry {
    readonly config: StyleConfig;
    readonly fontFaces: readonly FontFaceRecord[];
    readonly borderFills: readonly BorderFillRecord[];
    readonly charProperties: readonly CharPropertyRecord[];
    readonly paraProperties: readonly ParaPropertyRecord[];
    readonly styles: readonly StyleRecord[];
    readonly numberings: readonly NumberingRecord[];
    readonly bullets: readonly BulletRecord[];
}

// ═══════════════════════════════════════════════════════════════════════
// Fonts
// ═══════════════════════════════════════════════════════════════════════

const FONT_LANGS: readonly FontLang[] = ['HANGUL', 'LATIN', 'HANJA', 'JAPANESE', 'OTHER', 'SYMBOL', 'USER'];

const BODY_FONT = 0;
const CODE_FONT = 1;

function fontRef(index: number): FontRef {
    return { hangul: index, latin: index, hanja: index, japanese: index, other: index, symbol: index, user: index };
}

function buildFontFaces(cfg: StyleConfig): FontFaceRecord[] {
    return FONT_LANGS.map((lang): FontFaceRecord => ({
        lang,
        fonts: [
            { id: BODY_FONT, face: cfg.fontBody, type: 'TTF' },
            { id: CODE_FONT, face: cfg.fontCode, type: 'TTF' },
        ],
    }));
}

// ═══════════════════════════════════════════════════════════════════════
// Border fills (1-based)
// ═══════════════════════════════════════════════════════════════════════

const NO_LINE: BorderLine = { type: 'NONE', width: '0.1 mm', color: '#000000' };
const TABLE_LINE: BorderLine = { type: 'SOLID', width: '0.12 mm', color: '#000000' };

function borderFill(
    id: number,
    fillColor: string | null,
    sides: Partial<Pick<BorderFillRecord, 'left' | 'right' | 'top' | 'bottom'>> = {},
): BorderFillRecord {
    return {
        kind: 'borderFill',
        id,
        left: sides.left ?? NO_LINE,
        right: sides.right ?? NO_LINE,
        top: sides.top ?? NO_LINE,
        bottom: sides.bottom ?? NO_LINE,
        fillColor,
    };
}

function buildBorderFills(cfg: StyleConfig): BorderFillRecord[] {
    const boxed = { left: TABLE_LINE, right: TABLE_LINE, top: TABLE_LINE, bottom: TABLE_LINE };
    return [
        borderFill(BORDER_FILL.NONE, null),
        borderFill(BORDER_FILL.DEFAULT, null),
        borderFill(BORDER_FILL.TABLE, null, boxed),
        borderFill(BORDER_FILL.TABLE_HEADER, cfg.colorTableHeaderBg, boxed),
        borderFill(BORDER_FILL.CODE_BLOCK, cfg.colorCodeBlockBg),
        borderFill(BORDER_FILL.CODE_INLINE, cfg.colorCodeBg),
        borderFill(BORDER_FILL.RULE, null, { bottom: { type: 'SOLID', width: '0.4 mm', color: cfg.colorRule } }),
        borderFill(BORDER_FILL.QUOTE, null, { left: { type: 'SOLID', width: '0.7 mm', color: cfg.colorRule } }),
    ];
}

// ═══════════════════════════════════════════════════════════════════════
// Character properties
// ═══════════════════════════════════════════════════════════════════════

function charPr(
    id: number,
    height: number,
    textColor: string,
    extra: Partial<Omit<CharPropertyRecord, 'kind' | 'id' | 'height' | 'textColor'>> = {},
): CharPropertyRecord {
    return {
        kind: 'charPr',
        id,
        height,
        textColor,
        shadeColor: 'none',
        borderFillIdRef: BORDER_FILL.DEFAULT,
        fontRef: fontRef(BODY_FONT),
        bold: false,
        italic: false,
        underline: { type: 'NONE', color: '#000000' },
        strikeout: 'NONE',
        ...extra,
    };
}

function buildCharProperties(cfg: StyleConfig): CharPropertyRecord[] {
    const headingSizes = [cfg.fontSizeH1, cfg.fontSizeH2, cfg.fontSizeH3, cfg.fontSizeH4, cfg.fontSizeH5, cfg.fontSizeH6];
    const code = fontRef(CODE_FONT);
    return [
        charPr(CHAR_PR.BODY, cfg.fontSizeBody, cfg.colorBody),
        charPr(CHAR_PR.BOLD, cfg.fontSizeBody, cfg.colorBody, { bold: true }),
        charPr(CHAR_PR.ITALIC, cfg.fontSizeBody, cfg.colorBody, { italic: true }),
        charPr(CHAR_PR.BOLD_ITALIC, cfg.fontSizeBody, cfg.colorBody, { bold: true, italic: true }),
        ...headingSizes.map((size, i) => charPr(CHAR_PR.H1 + i, size, cfg.colorHeading, { bold: true })),
        charPr(CHAR_PR.INLINE_CODE, cfg.fontSizeCode, cfg.colorCodeText, {
            fontRef: code,
            borderFillIdRef: BORDER_FILL.CODE_INLINE,
        }),
        charPr(CHAR_PR.CODE_BLOCK, cfg.fontSizeCode, cfg.colorCodeBlockText, { fontRef: code }),
        charPr(CHAR_PR.TABLE_HEADER, cfg.fontSizeTable, cfg.colorTableHeaderText, { bold: true }),
        charPr(CHAR_PR.TABLE_BODY, cfg.fontSizeTable, cfg.colorBody),
        charPr(CHAR_PR.LINK, cfg.fontSizeBody, cfg.colorLink, {
            underline: { type: 'BOTTOM', color: cfg.colorLink },
        }),
        charPr(CHAR_PR.STRIKETHROUGH, cfg.fontSizeBody, cfg.colorBody, { strikeout: 'CONTINUOUS' }),
    ];
}

// ═══════════════════════════════════════════════════════════════════════
// Paragraph properties
// ═══════════════════════════════════════════════════════════════════════

function paraPr(
    id: number,
    lineSpacing: number,
    extra: Partial<Omit<ParaPropertyRecord, 'kind' | 'id' | 'lineSpacing' | 'margin'>> & {
        margin?: Partial<ParaPropertyRecord['margin']>;
    } = {},
): ParaPropertyRecord {
    const { margin, ...rest } = extra;
    return {
        kind: 'paraPr',
        id,
        tabPrIdRef: 1,
        align: 'LEFT',
        heading: { type: 'NONE', idRef: 0, level: 0 },
        keepWithNext: false,
        keepLines: false,
        lineSpacing,
        borderFillIdRef: BORDER_FILL.DEFAULT,
        ...rest,
        margin: { intent: 0, left: 0, right: 0, prev: 0, next: 0, ...margin },
    };
}

/** [prev, next] spacing per heading level. */
const HEADING_SPACING: readonly (readonly [number, number])[] = [
    [2400, 400],
    [1800, 400],
    [1200, 300],
    [1000, 200],
    [800, 200],
    [600, 200],
];

const LIST_INDENT = 800;

function buildParaProperties(cfg: StyleConfig): ParaPropertyRecord[] {
    const ls = cfg.lineSpacing;
    const listItem = (id: number, type: 'BULLET' | 'NUMBER', level: number): ParaPropertyRecord =>
        paraPr(id, ls, {
            heading: { type, idRef: type === 'BULLET' ? BULLET_ID : NUMBERING_ID, level },
            margin: { intent: LIST_INDENT, left: LIST_INDENT * (level + 1), next: 200 },
        });

    const records: ParaPropertyRecord[] = [
        paraPr(PARA_PR.BODY, ls, { margin: { next: 500 } }),
        ...HEADING_SPACING.map(([prev, next], i) =>
            paraPr(PARA_PR.H1 + i, ls, {
                heading: { type: 'OUTLINE', idRef: 0, level: i },
                keepWithNext: true,
                keepLines: true,
                margin: { prev, next },
            }),
        ),
        paraPr(PARA_PR.CODE, cfg.lineSpacingCode, {
            margin: { left: 400, right: 400 },
            borderFillIdRef: BORDER_FILL.CODE_BLOCK,
        }),
        listItem(PARA_PR.BULLET, 'BULLET', 0),
        paraPr(PARA_PR.TABLE, cfg.lineSpacingTable, { align: 'CENTER' }),
        listItem(PARA_PR.ORDERED, 'NUMBER', 0),
        listItem(PARA_PR.BULLET_L2, 'BULLET', 1),
        listItem(PARA_PR.BULLET_L3, 'BULLET', 2),
        listItem(PARA_PR.ORDERED_L2, 'NUMBER', 1),
        listItem(PARA_PR.ORDERED_L3, 'NUMBER', 2),
        paraPr(PARA_PR.RULE, ls, { margin: { prev: 200, next: 200 }, borderFillIdRef: BORDER_FILL.RULE }),
        paraPr(PARA_PR.QUOTE, ls, { margin: { left: 1000, next: 200 }, borderFillIdRef: BORDER_FILL.QUOTE }),
    ];
    return records;
}

// ═══════════════════════════════════════════════════════════════════════
// Styles, numbering, bullets
// ═══════════════════════════════════════════════════════════════════════

function buildStyles(): StyleRecord[] {
    const style = (id: number, name: string, engName: string, paraPrIdRef: number, charPrIdRef: number): StyleRecord => ({
        kind: 'style',
        id,
        type: 'PARA',
        name,
        engName,
        paraPrIdRef,
        charPrIdRef,
        nextStyleIdRef: STYLE.NORMAL,
        langId: 1042,
    });
    return [
        style(STYLE.NORMAL, '본문', 'Normal', PARA_PR.BODY, CHAR_PR.BODY),
        ...[1, 2, 3, 4, 5, 6].map((n) =>
            style(STYLE.NORMAL + n, `제목 ${n}`, `Heading ${n}`, PARA_PR.BODY + n, CHAR_PR.BOLD_ITALIC + n),
        ),
    ];
}

const PARA_HEAD_LEVELS = 10;

function paraHeads(numFormat: 'DIGIT' | 'BULLET'): ParaHeadRecord[] {
    return Array.from({ length: PARA_HEAD_LEVELS }, (_, i): ParaHeadRecord =>
        numFormat === 'DIGIT'
            ? { level: i + 1, autoIndent: false, textOffset: 35, numFormat, charPrIdRef: CHAR_PR.BOLD }
            : { level: i + 1, autoIndent: true, textOffset: 50, numFormat, charPrIdRef: CHAR_PR.BODY },
    );
}

function buildNumberings(): NumberingRecord[] {
    return [{ kind: 'numbering', id: NUMBERING_ID, start: 0, paraHeads: paraHeads('DIGIT') }];
}

function buildBullets(): BulletRecord[] {
    return [{ kind: 'bullet', id: BULLET_ID, char: '●', checkedChar: '●', paraHeads: paraHeads('BULLET') }];
}

// ═══════════════════════════════════════════════════════════════════════
// Build + lookup
// ═══════════════════════════════════════════════════════════════════════

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) deepFreeze(child);
    }
    return value;
}

function assertIdBase(kind: PropertyKind, records: readonly { id: number }[], base: 0 | 1): void {
    records.forEach((record, index) => {
        if (record.id !== index + base) {
            throw new HwpxError(
                `${kind} record at position ${index} has id ${record.id}, expected ${index + base}`,
                HwpxErrorCode.DANGLING_REFERENCE,
                { kind, index, id: record.id },
            );
        }
    });
}

/**
 * Build a complete registry from a (partial) style configuration.
 * Deterministic: equal configs give structurally equal registries.
 */
export function buildRegistry(config: StyleConfigInput | StyleConfig = {}): Registry {
    const cfg = parseStyleConfig(config);
    const registry: Registry = {
        config: cfg,
        fontFaces: buildFontFaces(cfg),
        borderFills: buildBorderFills(cfg),
        charProperties: buildCharProperties(cfg),
        paraProperties: buildParaProperties(cfg),
        styles: buildStyles(),
        numberings: buildNumberings(),
        bullets: buildBullets(),
    };

    assertIdBase('borderFill', registry.borderFills, 1);
    assertIdBase('charPr', registry.charProperties, 0);
    assertIdBase('paraPr', registry.paraProperties, 0);
    assertIdBase('style', registry.styles, 0);
    assertIdBase('numbering', registry.numberings, 0);
    assertIdBase('bullet', registry.bullets, 0);

    return deepFreeze(registry);
}

function recordsOf(registry: Registry, kind: PropertyKind): readonly { id: number }[] {
    switch (kind) {
        case 'charPr':
            return registry.charProperties;
        case 'paraPr':
            return registry.paraProperties;
        case 'borderFill':
            return registry.borderFills;
        case 'style':
            return registry.styles;
        case 'numbering':
            return registry.numberings;
        case 'bullet':
            return registry.bullets;
    }
}

/** Whether `id` names an existing record of `kind`. */
export function hasRecord(registry: Registry, kind: PropertyKind, id: number): boolean {
    return recordsOf(registry, kind).some((record) => record.id === id);
}

/** Throws DANGLING_REFERENCE unless `id` resolves. */
export function assertRecord(registry: Registry, kind: PropertyKind, id: number, where: string): void {
    if (!hasRecord(registry, kind, id)) {
        throw new HwpxError(`${where} references unknown ${kind} id ${id}`, HwpxErrorCode.DANGLING_REFERENCE, {
            kind,
            id,
            where,
        });
    }
}

export const DEFAULT_REGISTRY: Registry = buildRegistry();

verifyMappings((kind, id) => hasRecord(DEFAULT_REGISTRY, kind, id));
