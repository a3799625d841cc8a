/**
 * HWPX Constants
 *
 * @module hwpx/constants
 */

// ═══════════════════════════════════════════════════════════════════════
// XML namespaces
// ═══════════════════════════════════════════════════════════════════════

export const NAMESPACES = {
    HA: 'http://www.hancom.co.kr/hwpml/2011/app',
    HP: 'http://www.hancom.co.kr/hwpml/2011/paragraph',
    HS: 'http://www.hancom.co.kr/hwpml/2011/section',
    HC: 'http://www.hancom.co.kr/hwpml/2011/core',
    HH: 'http://www.hancom.co.kr/hwpml/2011/head',
    HV: 'http://www.hancom.co.kr/hwpml/2011/version',
    HPF: 'http://www.hancom.co.kr/schema/2011/hpf',
    OPF: 'http://www.idpf.org/2007/opf/',
    OCF: 'urn:oasis:names:tc:opendocument:xmlns:container',
    ODF: 'urn:oasis:names:tc:opendocument:xmlns:manifest:1.0',
    DC: 'http://purl.org/dc/elements/1.1/',
    RDF: 'http://www.w3.org/1999/02/22-rdf-syntax-ns#',
    PKG: 'http://www.hancom.co.kr/hwpml/2016/meta/pkg#',
} as const;

// ═══════════════════════════════════════════════════════════════════════
// Units (HWPUNIT: 1/7200 inch)
// ═══════════════════════════════════════════════════════════════════════

export const HWPUNIT_PER_PT = 100;
export const HWPUNIT_PER_INCH = 7200;
export const HWPUNIT_PER_MM = 283.46;

/** One screen pixel at 96 DPI. */
export const PX_TO_HWPUNIT = 75;

export function pixelsToHwpunit(px: number): number {
    return Math.round(px * PX_TO_HWPUNIT);
}

export function mmToHwpunit(mm: number): number {
    return Math.round(mm * HWPUNIT_PER_MM);
}

// ═══════════════════════════════════════════════════════════════════════
// Property IDs (BorderFill is 1-based, everything else 0-based)
// ═══════════════════════════════════════════════════════════════════════

export const CHAR_PR = {
    BODY: 0,
    BOLD: 1,
    ITALIC: 2,
    BOLD_ITALIC: 3,
    H1: 4,
    H2: 5,
    H3: 6,
    H4: 7,
    H5: 8,
    H6: 9,
    INLINE_CODE: 10,
    CODE_BLOCK: 11,
    TABLE_HEADER: 12,
    TABLE_BODY: 13,
    LINK: 14,
    STRIKETHROUGH: 15,
} as const;

export const PARA_PR = {
    BODY: 0,
    H1: 1,
    H2: 2,
    H3: 3,
    H4: 4,
    H5: 5,
    H6: 6,
    CODE: 7,
    BULLET: 8,
    TABLE: 9,
    ORDERED: 10,
    BULLET_L2: 11,
    BULLET_L3: 12,
    ORDERED_L2: 13,
    ORDERED_L3: 14,
    RULE: 15,
    QUOTE: 16,
} as const;

export const BORDER_FILL = {
    NONE: 1,
    DEFAULT: 2,
    TABLE: 3,
    TABLE_HEADER: 4,
    CODE_BLOCK: 5,
    CODE_INLINE: 6,
    RULE: 7,
    QUOTE: 8,
} as const;

export const STYLE = {
    NORMAL: 0,
    H1: 1,
    H2: 2,
    H3: 3,
    H4: 4,
    H5: 5,
    H6: 6,
} as const;

export const NUMBERING_ID = 0;
export const BULLET_ID = 0;

/** Deepest list level; levels run 0..MAX_LIST_LEVEL. */
export const MAX_LIST_LEVEL = 2;

// ═══════════════════════════════════════════════════════════════════════
// Page setup
// ═══════════════════════════════════════════════════════════════════════

export const PAGE_PRESETS = {
    A4: { width: 59530, height: 84190 },
    Letter: { width: 61200, height: 79200 },
    A3: { width: 84190, height: 119055 },
} as const;

export type PagePreset = keyof typeof PAGE_PRESETS;

export const DEFAULT_MARGINS = {
    left: 8504,
    right: 8504,
    top: 5668,
    bottom: 4252,
    header: 4252,
    footer: 4252,
    gutter: 0,
} as const;

// ═══════════════════════════════════════════════════════════════════════
// Tables and images
// ═══════════════════════════════════════════════════════════════════════

export const TABLE_CELL_HEIGHT = 1000;
export const TABLE_CELL_MARGIN = { left: 510, right: 510, top: 141, bottom: 141 } as const;
export const TABLE_OUT_MARGIN = { left: 0, right: 0, top: 0, bottom: 1417 } as const;

/** Used when image bytes are not a recognized format. */
export const FALLBACK_IMAGE = { format: 'png', width: 200, height: 100 } as const;

// ═══════════════════════════════════════════════════════════════════════
// Table of contents
// ═══════════════════════════════════════════════════════════════════════

export const TOC_DEFAULT_TITLE = '목차';
export const TOC_DEFAULT_MAX_LEVEL = 6;
export const TOC_INDENT = '    ';

// ═══════════════════════════════════════════════════════════════════════
// Package paths
// ═══════════════════════════════════════════════════════════════════════

export const MIMETYPE = 'application/hwp+zip';

export const HWPX_PATHS = {
    MIMETYPE: 'mimetype',
    VERSION: 'version.xml',
    SETTINGS: 'settings.xml',
    CONTAINER: 'META-INF/container.xml',
    MANIFEST: 'META-INF/manifest.xml',
    CONTAINER_RDF: 'META-INF/container.rdf',
    CONTENT_HPF: 'Contents/content.hpf',
    HEADER: 'Contents/header.xml',
    SECTION: 'Contents/section0.xml',
    PREVIEW_TEXT: 'Preview/PrvText.txt',
    BIN_DATA_FOLDER: 'BinData',
} as const;

export const PREVIEW_TEXT_LIMIT = 200;
