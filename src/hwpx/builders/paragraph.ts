/**
 * Paragraph and run rendering for section0.xml.
 */

import { STYLE } from '../constants.js';
import { HwpxErrorCode, unreachable } from '../errors.js';
import type { FieldBeginRun, FieldEndRun, ParagraphBlock, Run, TextBlock } from '../types.js';
import { escapeXml } from '../utils/escaping.js';

/** Hancom's field command form of a URL: colons escaped, fixed option suffix. */
export function hyperlinkCommand(url: string): string {
    return `${url.replace(/:/g, '\\:')};1;0;0;`;
}

function renderFieldBegin(run: FieldBeginRun): string {
    return (
        `<hp:ctrl><hp:fieldBegin id="${run.fieldId}" type="HYPERLINK" name="" editable="0" dirty="0" zorder="-1"` +
        ` fieldid="${run.fieldId}"><hp:parameters cnt="3" name="">` +
        '<hp:integerParam name="Prop">0</hp:integerParam>' +
        `<hp:stringParam name="Command">${escapeXml(hyperlinkCommand(run.url))}</hp:stringParam>` +
        `<hp:stringParam name="Path">${escapeXml(run.url)}</hp:stringParam>` +
        '</hp:parameters></hp:fieldBegin></hp:ctrl>'
    );
}

function renderFieldEnd(run: FieldEndRun): string {
    return `<hp:ctrl><hp:fieldEnd beginIDRef="${run.fieldId}" fieldid="${run.fieldId}"/></hp:ctrl>`;
}

const PAGE_NUMBER_CTRL =
    '<hp:ctrl><hp:autoNum num="1" numType="PAGE">' +
    '<hp:autoNumFormat type="DIGIT" userChar="" prefixChar="" suffixChar="" supscript="0"/>' +
    '</hp:autoNum></hp:ctrl>';

/**
 * One `hp:run`. `lead` is inserted ahead of the run's own content; the
 * section uses it to put page setup into the first run.
 */
export function renderRun(run: Run, lead: string = ''): string {
    let body: string;
    switch (run.kind) {
        case 'text':
            body = `<hp:t>${escapeXml(run.text)}</hp:t>`;
            break;
        case 'fieldBegin':
            body = renderFieldBegin(run);
            break;
        case 'fieldEnd':
            body = renderFieldEnd(run);
            break;
        case 'pageNumber':
            body = PAGE_NUMBER_CTRL;
            break;
        default:
            return unreachable(run, HwpxErrorCode.UNKNOWN_RUN_KIND, 'run kind');
    }
    return `<hp:run charPrIDRef="${run.charPrId}">${lead}${body}</hp:run>`;
}

export function openParagraph(paraPrId: number, styleId: number = STYLE.NORMAL): string {
    return `<hp:p paraPrIDRef="${paraPrId}" styleIDRef="${styleId}" pageBreak="0" columnBreak="0" merged="0">`;
}

export function renderParagraph(block: TextBlock | ParagraphBlock, lead: string = ''): string {
    const runs = block.runs.map((run, i) => renderRun(run, i === 0 ? lead : ''));
    if (runs.length === 0 && lead) runs.push(`<hp:run charPrIDRef="0">${lead}</hp:run>`);
    return `${openParagraph(block.paraPrId, block.styleId)}${runs.join('')}</hp:p>`;
}

/** Paragraph with no text whose only run carries `lead`. */
export function renderLeadParagraph(lead: string): string {
    return `${openParagraph(0)}<hp:run charPrIDRef="0">${lead}</hp:run></hp:p>`;
}
