/**
 * Fixed ID mapping tables.
 *
 * Content kinds resolve to registry IDs only through these tables;
 * `verifyMappings` checks them against a registry once at startup.
 */

import { CHAR_PR, PARA_PR, STYLE, BORDER_FILL } from './constants.js';
import { HwpxError, HwpxErrorCode } from './errors.js';
import type { HeadingLevel, ListKind, ListLevel, PropertyKind, TextSpan } from './types.js';

export interface HeadingMapping {
    paraPrId: number;
    styleId: number;
    charPrId: number;
}

export const HEADING_LEVELS: readonly HeadingLevel[] = [1, 2, 3, 4, 5, 6];
export const LIST_LEVELS: readonly ListLevel[] = [0, 1, 2];
export const LIST_KINDS: readonly ListKind[] = ['bullet', 'ordered'];

export const HEADING_MAP: Readonly<Record<HeadingLevel, HeadingMapping>> = {
    1: { paraPrId: PARA_PR.H1, styleId: STYLE.H1, charPrId: CHAR_PR.H1 },
    2: { paraPrId: PARA_PR.H2, styleId: STYLE.H2, charPrId: CHAR_PR.H2 },
    3: { paraPrId: PARA_PR.H3, styleId: STYLE.H3, charPrId: CHAR_PR.H3 },
    4: { paraPrId: PARA_PR.H4, styleId: STYLE.H4, charPrId: CHAR_PR.H4 },
    5: { paraPrId: PARA_PR.H5, styleId: STYLE.H5, charPrId: CHAR_PR.H5 },
    6: { paraPrId: PARA_PR.H6, styleId: STYLE.H6, charPrId: CHAR_PR.H6 },
};

export const LIST_PARA_MAP: Readonly<Record<ListKind, Readonly<Record<ListLevel, number>>>> = {
    bullet: { 0: PARA_PR.BULLET, 1: PARA_PR.BULLET_L2, 2: PARA_PR.BULLET_L3 },
    ordered: { 0: PARA_PR.ORDERED, 1: PARA_PR.ORDERED_L2, 2: PARA_PR.ORDERED_L3 },
};

export const TABLE_CELL_MAP = {
    header: { borderFillId: BORDER_FILL.TABLE_HEADER, charPrId: CHAR_PR.TABLE_HEADER },
    body: { borderFillId: BORDER_FILL.TABLE, charPrId: CHAR_PR.TABLE_BODY },
    paraPrId: PARA_PR.TABLE,
} as const;

/** charPr for a span; code wins over link, link over emphasis. */
export function charPrForSpan(span: TextSpan): number {
    if (span.code) return CHAR_PR.INLINE_CODE;
    if (span.link !== undefined) return CHAR_PR.LINK;
    if (span.strike) return CHAR_PR.STRIKETHROUGH;
    if (span.bold && span.italic) return CHAR_PR.BOLD_ITALIC;
    if (span.bold) return CHAR_PR.BOLD;
    if (span.italic) return CHAR_PR.ITALIC;
    return CHAR_PR.BODY;
}

export function clampHeadingLevel(level: number): HeadingLevel {
    const n = Number.isFinite(level) ? Math.trunc(level) : 1;
    return HEADING_LEVELS[Math.min(Math.max(n, 1), 6) - 1];
}

export function clampListLevel(level: number): ListLevel {
    const n = Number.isFinite(level) ? Math.trunc(level) : 0;
    return LIST_LEVELS[Math.min(Math.max(n, 0), LIST_LEVELS.length - 1)];
}

/**
 * Check every table entry is present and resolves in `has`.
 * Runs once when the default registry is built.
 */
export function verifyMappings(has: (kind: PropertyKind, id: number) => boolean): void {
    const missing: string[] = [];
    const check = (label: string, kind: PropertyKind, id: number | undefined): void => {
        if (id === undefined || !has(kind, id)) missing.push(`${label} -> ${kind} ${String(id)}`);
    };

    for (const level of HEADING_LEVELS) {
        const entry: HeadingMapping | undefined = HEADING_MAP[level];
        check(`heading ${level} paraPr`, 'paraPr', entry?.paraPrId);
        check(`heading ${level} style`, 'style', entry?.styleId);
        check(`heading ${level} charPr`, 'charPr', entry?.charPrId);
    }
    for (const kind of LIST_KINDS) {
        for (const level of LIST_LEVELS) {
            check(`${kind} list level ${level}`, 'paraPr', LIST_PARA_MAP[kind]?.[level]);
        }
    }
    check('table header fill', 'borderFill', TABLE_CELL_MAP.header.borderFillId);
    check('table header char', 'charPr', TABLE_CELL_MAP.header.charPrId);
    check('table body fill', 'borderFill', TABLE_CELL_MAP.body.borderFillId);
    check('table body char', 'charPr', TABLE_CELL_MAP.body.charPrId);
    check('table cell para', 'paraPr', TABLE_CELL_MAP.paraPrId);

    if (missing.length > 0) {
        throw new HwpxError(`Incomplete ID mapping tables: ${missing.join('; ')}`, HwpxErrorCode.DANGLING_REFERENCE, {
            missing,
        });
    }
}
