/**
 * Turns strings and formatted spans into runs,
 * expanding each link into its field-begin/text/field-end triplet.
 */

import { CHAR_PR } from './constants.js';
import type { IdGenerator } from './ids.js';
import { charPrForSpan } from './mappings.js';
import type { InlineContent, LinkRuns, PageNumberRun, Run, TextRun, TextSpan } from './types.js';

/** Placeholder replaced by the automatic page number in header/footer text. */
export const PAGE_NUMBER_TOKEN = '{page}';

export function textRun(text: string, charPrId: number = CHAR_PR.BODY): TextRun {
    return { kind: 'text', charPrId, text };
}

export function linkRuns(text: string, url: string, ids: IdGenerator): LinkRuns {
    const fieldId = ids.next();
    return [
        { kind: 'fieldBegin', charPrId: CHAR_PR.LINK, fieldId, url },
        textRun(text, CHAR_PR.LINK),
        { kind: 'fieldEnd', charPrId: CHAR_PR.LINK, fieldId },
    ];
}

export function spansToRuns(spans: readonly TextSpan[], ids: IdGenerator): Run[] {
    const runs: Run[] = [];
    for (const span of spans) {
        if (span.link !== undefined && !span.code) {
            runs.push(...linkRuns(span.text, span.link, ids));
        } else {
            runs.push(textRun(span.text, charPrForSpan(span)));
        }
    }
    return runs;
}

/**
 * A plain string becomes one run with `charPrId`; spans keep their own
 * formatting. An empty span list still yields one empty run.
 */
export function contentToRuns(content: InlineContent, ids: IdGenerator, charPrId: number = CHAR_PR.BODY): Run[] {
    if (typeof content === 'string') return [textRun(content, charPrId)];
    const runs = spansToRuns(content, ids);
    return runs.length > 0 ? runs : [textRun('', charPrId)];
}

/** Split region text on PAGE_NUMBER_TOKEN into text and page-number runs. */
export function regionTextToRuns(text: string): Run[] {
    const runs: Run[] = [];
    text.split(PAGE_NUMBER_TOKEN).forEach((part, i) => {
        if (i > 0) {
            const pageNumber: PageNumberRun = { kind: 'pageNumber', charPrId: CHAR_PR.BODY };
            runs.push(pageNumber);
        }
        if (part.length > 0) runs.push(textRun(part));
    });
    return runs.length > 0 ? runs : [textRun('')];
}

/** Concatenated visible text of `runs`; field markers contribute nothing. */
export function runsText(runs: readonly Run[]): string {
    return runs.map((run) => (run.kind === 'text' ? run.text : '')).join('');
}
