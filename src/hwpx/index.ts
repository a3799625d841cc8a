/**
 * HWPX Writer Library: Public API
 *
 * Re-exports the symbols external consumers need. Render functions,
 * validators and the mapping tables are consumed by sibling modules.
 *
 * @module hwpx
 */

// ── Document construction ───────────────────────────────────────────────────
export { HwpxDocument, resolvePageSetup, usableWidth } from './document.js';
export type { DocumentModel, HwpxDocumentOptions } from './document.js';
export { HwpxBuilder } from './builder.js';
export { IdGenerator } from './ids.js';
export { PAGE_NUMBER_TOKEN } from './runs.js';

// ── Registry and styling ────────────────────────────────────────────────────
export { buildRegistry, DEFAULT_REGISTRY, hasRecord } from './registry.js';
export type { Registry } from './registry.js';
export { DEFAULT_STYLE_CONFIG, parseStyleConfig, StyleConfigSchema } from './style-config.js';
export type { StyleConfig, StyleConfigInput } from './style-config.js';
export { BORDER_FILL, CHAR_PR, PAGE_PRESETS, PARA_PR, STYLE } from './constants.js';
export type { PagePreset } from './constants.js';

// ── Output ──────────────────────────────────────────────────────────────────
export { serialize } from './builders/serialize.js';
export { buildPackage, packageEntries } from './package.js';
export type { PackageEntry, PackageOptions, PackageSource } from './package.js';
export { inspectImage } from './parsers/image-info.js';
export type { ImageFormat, ImageInfo } from './parsers/image-info.js';

// ── Markdown ────────────────────────────────────────────────────────────────
export { convertMarkdownFile, markdownToHwpx, parseMarkdown, translateContent } from './converters/index.js';
export type { MarkdownToHwpxOptions, TranslateOptions } from './converters/index.js';

// ── Types ───────────────────────────────────────────────────────────────────
export type {
  Block,
  BodyBlock,
  ContentNode,
  ImageOptions,
  InlineContent,
  ListItemInput,
  PageMargins,
  PageSetup,
  PageSetupInput,
  Run,
  SerializedPayloads,
  TableOfContentsOptions,
  TextSpan,
} from './types.js';

// ── Errors ──────────────────────────────────────────────────────────────────
export { HwpxError, HwpxErrorCode } from './errors.js';
