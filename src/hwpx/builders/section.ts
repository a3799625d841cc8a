/**
 * Body payload (Contents/section0.xml).
 *
 * The first run of the first paragraph carries the section properties
 * (page size and margins), the single-column control and the page
 * header/footer controls. When the body starts with a table or a picture,
 * or is empty, an empty paragraph is written first to carry them.
 */

import { NAMESPACES } from '../constants.js';
import { HwpxErrorCode, unreachable } from '../errors.js';
import type { BodyBlock, PageSetup, RegionBlock } from '../types.js';
import { renderImage } from './image.js';
import { renderLeadParagraph, renderParagraph } from './paragraph.js';
import { renderTable } from './table.js';

export interface SectionInput {
    readonly blocks: readonly BodyBlock[];
    readonly pageSetup: PageSetup;
    readonly header?: RegionBlock;
    readonly footer?: RegionBlock;
}

const NOTE_PROPERTIES = (tag: string, numberFormat: string, place: string, betweenNotes: number): string[] => [
    `        <hp:${tag}>`,
    `          <hp:autoNumFormat type="${numberFormat}" userChar="" prefixChar="" suffixChar="" supscript="1" />`,
    '          <hp:noteLine length="-1" type="SOLID" width="0.25 mm" color="#000000" />',
    `          <hp:noteSpacing betweenNotes="${betweenNotes}" belowLine="0" aboveLine="1000" />`,
    '          <hp:numbering type="CONTINUOUS" newNum="1" />',
    `          <hp:placement place="${place}" beneathText="0" />`,
    `        </hp:${tag}>`,
];

const PAGE_BORDER_FILLS = ['BOTH', 'EVEN', 'ODD'].flatMap((type) => [
    `        <hp:pageBorderFill type="${type}" borderFillIDRef="1" textBorder="PAPER" headerInside="0"` +
        ' footerInside="0" fillArea="PAPER">',
    '          <hp:offset left="1417" right="1417" top="1417" bottom="1417" />',
    '        </hp:pageBorderFill>',
]);

/** Section properties; `landscape` is WIDELY for portrait pages and NARROWLY for landscape ones. */
export function renderSecPr(setup: PageSetup): string {
    const m = setup.margins;
    return [
        `<hp:secPr xmlns:hp="${NAMESPACES.HP}" id="" textDirection="HORIZONTAL" spaceColumns="1134" tabStop="8000"` +
            ' tabStopVal="4000" tabStopUnit="HWPUNIT" outlineShapeIDRef="1" memoShapeIDRef="1"' +
            ' textVerticalWidthHead="0" masterPageCnt="0">',
        '        <hp:grid lineGrid="0" charGrid="0" wonggojiFormat="0" />',
        '        <hp:startNum pageStartsOn="BOTH" page="0" pic="0" tbl="0" equation="0" />',
        '        <hp:visibility hideFirstHeader="0" hideFirstFooter="0" hideFirstMasterPage="0" border="SHOW_ALL"' +
            ' fill="SHOW_ALL" hideFirstPageNum="0" hideFirstEmptyLine="0" showLineNumber="0" />',
        '        <hp:lineNumberShape restartType="0" countBy="0" distance="0" startNumber="0" />',
        `        <hp:pagePr landscape="${setup.landscape ? 'NARROWLY' : 'WIDELY'}" width="${setup.width}"` +
            ` height="${setup.height}" gutterType="LEFT_ONLY">`,
        `          <hp:margin header="${m.header}" footer="${m.footer}" gutter="${m.gutter}" left="${m.left}"` +
            ` right="${m.right}" top="${m.top}" bottom="${m.bottom}" />`,
        '        </hp:pagePr>',
        ...NOTE_PROPERTIES('footNotePr', 'DIGIT', 'EACH_COLUMN', 283),
        ...NOTE_PROPERTIES('endNotePr', 'ROMAN_SMALL', 'END_OF_DOCUMENT', 0),
        ...PAGE_BORDER_FILLS,
        '      </hp:secPr>',
    ].join('\n');
}

export const COLUMN_CTRL =
    `\n      <hp:ctrl xmlns:hp="${NAMESPACES.HP}">\n` +
    '        <hp:colPr id="" type="NEWSPAPER" layout="LEFT" colCount="1" sameSz="1" sameGap="0" />\n' +
    '      </hp:ctrl>\n    ';

/** Header or footer control holding the region's paragraphs in a sub-list. */
export function renderRegionCtrl(region: RegionBlock, setup: PageSetup): string {
    const isHeader = region.kind === 'headerRegion';
    const tag = isHeader ? 'header' : 'footer';
    const textWidth = setup.width - setup.margins.left - setup.margins.right;
    const textHeight = isHeader ? setup.margins.header : setup.margins.footer;
    const hasPageNumber = region.paragraphs.some((p) => p.runs.some((run) => run.kind === 'pageNumber'));
    return (
        `<hp:ctrl><hp:${tag} id="${region.id}" applyPageType="BOTH">` +
        `<hp:subList id="${region.subListId}" textDirection="HORIZONTAL" lineWrap="BREAK"` +
        ` vertAlign="${isHeader ? 'TOP' : 'BOTTOM'}" linkListIDRef="0" linkListNextIDRef="0"` +
        ` textWidth="${textWidth}" textHeight="${textHeight}" hasTextRef="0" hasNumRef="${hasPageNumber ? 1 : 0}">` +
        region.paragraphs.map((p) => renderParagraph(p)).join('') +
        `</hp:subList></hp:${tag}></hp:ctrl>`
    );
}

function renderBlock(block: BodyBlock, lead: string): string {
    switch (block.kind) {
        case 'heading':
        case 'paragraph':
        case 'listItem':
        case 'blockquote':
        case 'horizontalRule':
            return renderParagraph(block, lead);
        case 'table':
            return renderTable(block);
        case 'image':
            return renderImage(block);
        default:
            return unreachable(block, HwpxErrorCode.UNKNOWN_BLOCK_KIND, 'block kind');
    }
}

export function renderSectionXml(input: SectionInput): string {
    let lead =
        renderSecPr(input.pageSetup) +
        COLUMN_CTRL +
        (input.header ? renderRegionCtrl(input.header, input.pageSetup) : '') +
        (input.footer ? renderRegionCtrl(input.footer, input.pageSetup) : '');

    const lines = [
        '<?xml version="1.0" encoding="utf-8"?>',
        `<hs:sec xmlns:hp="${NAMESPACES.HP}" xmlns:hs="${NAMESPACES.HS}" xmlns:hc="${NAMESPACES.HC}">`,
    ];
    const first = input.blocks[0];
    if (first === undefined || first.kind === 'table' || first.kind === 'image') {
        lines.push(renderLeadParagraph(lead));
        lead = '';
    }
    for (const block of input.blocks) {
        lines.push(renderBlock(block, lead));
        lead = '';
    }
    lines.push('</hs:sec>');
    return lines.join('\n');
}
