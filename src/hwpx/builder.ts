/**
 * Fluent construction: `doc.builder().heading('Title').paragraph('...').save(path)`.
 */

import type { HwpxDocument } from './document.js';
import type { StyleConfigInput } from './style-config.js';
import type { ImageOptions, InlineContent, ListItemInput, PageSetupInput, TableOfContentsOptions } from './types.js';

export class HwpxBuilder {
    constructor(readonly document: HwpxDocument) {}

    heading(text: string, level: number = 1): this {
        this.document.addHeading(text, level);
        return this;
    }

    paragraph(content: InlineContent = ''): this {
        this.document.addParagraph(content);
        return this;
    }

    table(headers: readonly string[], rows: readonly (readonly string[])[]): this {
        this.document.addTable(headers, rows);
        return this;
    }

    bulletList(items: readonly ListItemInput[]): this {
        this.document.addBulletList(items);
        return this;
    }

    orderedList(items: readonly ListItemInput[]): this {
        this.document.addOrderedList(items);
        return this;
    }

    codeBlock(code: string, language: string = ''): this {
        this.document.addCodeBlock(code, language);
        return this;
    }

    blockquote(content: InlineContent): this {
        this.document.addBlockquote(content);
        return this;
    }

    horizontalRule(): this {
        this.document.addHorizontalRule();
        return this;
    }

    header(content: InlineContent): this {
        this.document.setHeader(content);
        return this;
    }

    footer(content: InlineContent): this {
        this.document.setFooter(content);
        return this;
    }

    image(data: Uint8Array, options?: ImageOptions): this {
        this.document.addImage(data, options);
        return this;
    }

    tableOfContents(options?: TableOfContentsOptions): this {
        this.document.addTableOfContents(options);
        return this;
    }

    style(config: StyleConfigInput): this {
        this.document.setStyle(config);
        return this;
    }

    pageSetup(input: PageSetupInput): this {
        this.document.setPageSetup(input);
        return this;
    }

    build(): HwpxDocument {
        return this.document;
    }

    async save(outputPath: string): Promise<void> {
        await this.document.save(outputPath);
    }
}
