/**
 * Markdown -> ContentNode[] using remark (CommonMark + GFM).
 *
 * Soft line breaks inside a paragraph become spaces. Raw HTML is dropped.
 */

import type { Blockquote, List, Paragraph, PhrasingContent, Root, RootContent, Table, TableCell } from 'mdast';
import remarkGfm from 'remark-gfm';
import remarkParse from 'remark-parse';
import { unified } from 'unified';
import { logger } from '../../utils/logger.js';
import type { ContentListItem, ContentNode, TextSpan } from '../types.js';

type SpanStyle = Omit<TextSpan, 'text'>;

const flattenWhitespace = (text: string): string => text.replace(/\s*\n\s*/g, ' ');

/** Visible text of inline content, formatting ignored. */
export function phrasingText(nodes: readonly PhrasingContent[]): string {
    return nodes
        .map((node): string => {
            switch (node.type) {
                case 'text':
                case 'inlineCode':
                    return flattenWhitespace(node.value);
                case 'break':
                    return ' ';
                case 'image':
                case 'imageReference':
                    return node.alt ?? '';
                case 'strong':
                case 'emphasis':
                case 'delete':
                case 'link':
                case 'linkReference':
                    return phrasingText(node.children);
                default:
                    return '';
            }
        })
        .join('');
}

export function phrasingToSpans(nodes: readonly PhrasingContent[], style: SpanStyle = {}): TextSpan[] {
    const spans: TextSpan[] = [];
    for (const node of nodes) {
        switch (node.type) {
            case 'text':
                spans.push({ text: flattenWhitespace(node.value), ...style });
                break;
            case 'break':
                spans.push({ text: ' ', ...style });
                break;
            case 'strong':
                spans.push(...phrasingToSpans(node.children, { ...style, bold: true }));
                break;
            case 'emphasis':
                spans.push(...phrasingToSpans(node.children, { ...style, italic: true }));
                break;
            case 'delete':
                spans.push(...phrasingToSpans(node.children, { ...style, strike: true }));
                break;
            case 'inlineCode':
                spans.push({ text: node.value, ...style, code: true });
                break;
            case 'link':
                spans.push({ text: phrasingText(node.children), ...style, link: node.url });
                break;
            case 'linkReference':
                spans.push(...phrasingToSpans(node.children, style));
                break;
            case 'image':
            case 'imageReference':
                if (node.alt) spans.push({ text: node.alt, ...style });
                break;
            default:
                // html, footnoteReference
                break;
        }
    }
    return spans;
}

/** A paragraph whose only non-blank child is an image. */
function standaloneImage(paragraph: Paragraph): ContentNode | undefined {
    const meaningful = paragraph.children.filter((c) => !(c.type === 'text' && c.value.trim() === ''));
    const only = meaningful[0];
    if (meaningful.length === 1 && only !== undefined && only.type === 'image') {
        return { kind: 'image', url: only.url, alt: only.alt ?? '' };
    }
    return undefined;
}

function flattenList(list: List, level: number, items: ContentListItem[]): void {
    for (const item of list.children) {
        const spans: TextSpan[] = [];
        const nested: List[] = [];
        for (const child of item.children) {
            if (child.type === 'list') {
                nested.push(child);
            } else if (child.type === 'paragraph' || child.type === 'heading') {
                if (spans.length > 0) spans.push({ text: ' ' });
                spans.push(...phrasingToSpans(child.children));
            }
        }
        items.push({ spans, level });
        for (const child of nested) flattenList(child, level + 1, items);
    }
}

const cellText = (cell: TableCell): string => phrasingText(cell.children).trim();

function tableNode(table: Table): ContentNode {
    const [head, ...body] = table.children;
    return {
        kind: 'table',
        headers: head ? head.children.map(cellText) : [],
        rows: body.map((row) => row.children.map(cellText)),
    };
}

/** Paragraphs inside a quote join into one run of spans, separated by spaces. */
function quoteSpans(quote: Blockquote): TextSpan[] {
    const spans: TextSpan[] = [];
    const visit = (nodes: readonly RootContent[]): void => {
        for (const node of nodes) {
            if (node.type === 'paragraph' || node.type === 'heading') {
                if (spans.length > 0) spans.push({ text: ' ' });
                spans.push(...phrasingToSpans(node.children));
            } else if ('children' in node) {
                visit(node.children);
            }
        }
    };
    visit(quote.children);
    return spans;
}

function toContentNode(node: RootContent): ContentNode | undefined {
    switch (node.type) {
        case 'heading':
            return { kind: 'heading', level: node.depth, spans: phrasingToSpans(node.children) };
        case 'paragraph':
            return standaloneImage(node) ?? { kind: 'paragraph', spans: phrasingToSpans(node.children) };
        case 'list': {
            const items: ContentListItem[] = [];
            flattenList(node, 0, items);
            return { kind: 'list', ordered: node.ordered === true, items };
        }
        case 'table':
            return tableNode(node);
        case 'code':
            return { kind: 'code', language: node.lang ?? '', value: node.value };
        case 'blockquote':
            return { kind: 'blockquote', spans: quoteSpans(node) };
        case 'thematicBreak':
            return { kind: 'thematicBreak' };
        default:
            logger.debug('Dropped markdown node', { type: node.type });
            return undefined;
    }
}

export function parseMarkdownTree(markdown: string): Root {
    return unified().use(remarkParse).use(remarkGfm).parse(markdown);
}

export function parseMarkdown(markdown: string): ContentNode[] {
    const nodes: ContentNode[] = [];
    for (const child of parseMarkdownTree(markdown).children) {
        const node = toContentNode(child);
        if (node) nodes.push(node);
    }
    return nodes;
}
