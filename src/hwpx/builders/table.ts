/**
 * Table rendering: a paragraph holding one `hp:tbl` inside its run.
 */

import { TABLE_CELL_MARGIN, TABLE_OUT_MARGIN } from '../constants.js';
import type { TableBlock, TableCell } from '../types.js';
import { openParagraph, renderParagraph } from './paragraph.js';

const margin = (m: { left: number; right: number; top: number; bottom: number }): string =>
    `left="${m.left}" right="${m.right}" top="${m.top}" bottom="${m.bottom}"`;

export function renderTableCell(cell: TableCell): string {
    return [
        `<hp:tc name="" header="${cell.header ? 1 : 0}" hasMargin="0" protect="0" editable="0" dirty="0"` +
            ` borderFillIDRef="${cell.borderFillId}">`,
        `<hp:subList id="${cell.subListId}" textDirection="HORIZONTAL" lineWrap="BREAK" vertAlign="TOP"` +
            ' linkListIDRef="0" linkListNextIDRef="0" textWidth="0" textHeight="0" hasTextRef="0" hasNumRef="0">',
        ...cell.paragraphs.map((p) => renderParagraph(p)),
        '</hp:subList>',
        `<hp:cellAddr colAddr="${cell.col}" rowAddr="${cell.row}"/>`,
        '<hp:cellSpan colSpan="1" rowSpan="1"/>',
        `<hp:cellSz width="${cell.width}" height="${cell.height}"/>`,
        `<hp:cellMargin ${margin(TABLE_CELL_MARGIN)}/>`,
        '</hp:tc>',
    ].join('');
}

export function renderTable(table: TableBlock): string {
    const rows = table.rows.map((row) => `<hp:tr>${row.map(renderTableCell).join('')}</hp:tr>`);
    return [
        openParagraph(table.paraPrId, table.styleId),
        '<hp:run charPrIDRef="0">',
        `<hp:tbl id="${table.id}" zOrder="0" numberingType="TABLE" textWrap="TOP_AND_BOTTOM" textFlow="BOTH_SIDES"` +
            ` lock="0" dropcapstyle="None" pageBreak="CELL" repeatHeader="1" rowCnt="${table.rowCount}"` +
            ` colCnt="${table.colCount}" cellSpacing="0" borderFillIDRef="${table.borderFillId}" noAdjust="0">`,
        `<hp:sz width="${table.width}" widthRelTo="ABSOLUTE" height="${table.height}" heightRelTo="ABSOLUTE" protect="0"/>`,
        '<hp:pos treatAsChar="0" affectLSpacing="0" flowWithText="1" allowOverlap="0" holdAnchorAndSO="0"' +
            ' vertRelTo="PARA" horzRelTo="COLUMN" vertAlign="TOP" horzAlign="LEFT" vertOffset="0" horzOffset="0"/>',
        `<hp:outMargin ${margin(TABLE_OUT_MARGIN)}/>`,
        `<hp:inMargin ${margin(TABLE_CELL_MARGIN)}/>`,
        ...rows,
        '</hp:tbl>',
        '</hp:run>',
        '</hp:p>',
    ].join('');
}
