export { normalizeTableRows, translateContent, type TranslateOptions } from './content-translator.js';
export { parseMarkdown, parseMarkdownTree, phrasingText, phrasingToSpans } from './markdown-parser.js';
export {
    convertMarkdownFile,
    defaultOutputPath,
    markdownToHwpx,
    type MarkdownToHwpxOptions,
} from './markdown-to-hwpx.js';
