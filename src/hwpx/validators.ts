/**
 * HWPX Validation Utilities
 *
 * Reference checks for blocks, table grid checks, page/image argument
 * checks, archive entry paths and XML well-formedness.
 *
 * @module hwpx/validators
 */

import { DOMParser } from '@xmldom/xmldom';
import { HwpxError, HwpxErrorCode, unreachable } from './errors.js';
import { assertRecord, type Registry } from './registry.js';
import type { Block, PageMargins, ParagraphBlock, Run } from './types.js';

const MARGIN_NAMES: readonly (keyof PageMargins)[] = ['left', 'right', 'top', 'bottom', 'header', 'footer', 'gutter'];

function assertRuns(registry: Registry, runs: readonly Run[], where: string): void {
  runs.forEach((run, i) => assertRecord(registry, 'charPr', run.charPrId, `${where} run ${i}`));
}

function assertParagraphs(registry: Registry, paragraphs: readonly ParagraphBlock[], where: string): void {
  paragraphs.forEach((p, i) => assertBlockReferences(registry, p, `${where} paragraph ${i}`));
}

/**
 * Every ID a block carries must resolve in `registry`.
 * Throws DANGLING_REFERENCE on the first one that does not.
 */
export function assertBlockReferences(registry: Registry, block: Block, where: string = block.kind): void {
  switch (block.kind) {
    case 'heading':
    case 'paragraph':
    case 'listItem':
    case 'blockquote':
    case 'horizontalRule':
      assertRecord(registry, 'paraPr', block.paraPrId, where);
      if (block.styleId !== undefined) assertRecord(registry, 'style', block.styleId, where);
      assertRuns(registry, block.runs, where);
      return;
    case 'table':
      assertRecord(registry, 'paraPr', block.paraPrId, where);
      if (block.styleId !== undefined) assertRecord(registry, 'style', block.styleId, where);
      assertRecord(registry, 'borderFill', block.borderFillId, where);
      for (const row of block.rows) {
        for (const cell of row) {
          const at = `${where} cell (${cell.row}, ${cell.col})`;
          assertRecord(registry, 'borderFill', cell.borderFillId, at);
          assertParagraphs(registry, cell.paragraphs, at);
        }
      }
      return;
    case 'image':
      assertRecord(registry, 'paraPr', block.paraPrId, where);
      if (block.styleId !== undefined) assertRecord(registry, 'style', block.styleId, where);
      assertRecord(registry, 'charPr', block.charPrId, where);
      return;
    case 'headerRegion':
    case 'footerRegion':
      assertParagraphs(registry, block.paragraphs, where);
      return;
    default:
      return unreachable(block, HwpxErrorCode.UNKNOWN_BLOCK_KIND, 'block kind');
  }
}

/** Header width fixes the column count; every row must match it exactly. */
export function validateTableGrid(headers: readonly string[], rows: readonly (readonly string[])[]): void {
  if (headers.length === 0) {
    throw new HwpxError('Table must have at least one column', HwpxErrorCode.TABLE_GRID_MISMATCH, { columns: 0 });
  }
  rows.forEach((row, index) => {
    if (row.length !== headers.length) {
      throw new HwpxError(
        `Table row ${index} has ${row.length} cells, expected ${headers.length}`,
        HwpxErrorCode.TABLE_GRID_MISMATCH,
        { row: index, cells: row.length, columns: headers.length },
      );
    }
  });
}

/** Validate optional image width and height (must be positive and finite). */
export function validateImageDimensions(width?: number, height?: number): void {
  if (width !== undefined && (width <= 0 || !Number.isFinite(width))) {
    throw new HwpxError('Image width must be a positive finite number', HwpxErrorCode.INVALID_ARGUMENT, { width });
  }
  if (height !== undefined && (height <= 0 || !Number.isFinite(height))) {
    throw new HwpxError('Image height must be a positive finite number', HwpxErrorCode.INVALID_ARGUMENT, { height });
  }
}

/** Margins must be non-negative and leave a positive usable width. */
export function validatePageGeometry(width: number, height: number, margins: PageMargins): void {
  for (const name of MARGIN_NAMES) {
    const value = margins[name];
    if (!Number.isInteger(value) || value < 0) {
      throw new HwpxError(`Page margin ${name} must be a non-negative integer`, HwpxErrorCode.INVALID_ARGUMENT, {
        margin: name,
        value,
      });
    }
  }
  const usable = width - margins.left - margins.right;
  if (usable <= 0 || height <= 0) {
    throw new HwpxError('Page margins leave no usable width', HwpxErrorCode.INVALID_ARGUMENT, { width, usable });
  }
}

/** Archive entry names must be relative, forward-slashed and free of `..`. */
export function assertSafeEntryPath(name: string): void {
  const unsafe =
    name.length === 0 ||
    name.startsWith('/') ||
    name.includes('\\') ||
    /^[A-Za-z]:/.test(name) ||
    name.split('/').some((segment) => segment === '..' || segment === '.');
  if (unsafe) {
    throw new HwpxError(`Unsafe archive entry path: ${name}`, HwpxErrorCode.UNSAFE_ENTRY_PATH, { name });
  }
}

/** Parse `xml` and throw MALFORMED_XML on the first error the parser reports. */
export function assertWellFormedXml(xml: string, name: string): void {
  const problems: string[] = [];
  const record = (msg: string): void => {
    problems.push(msg);
  };
  const parser = new DOMParser({
    // xmldom 0.8 reports unclosed and mismatched tags as warnings
    errorHandler: { warning: record, error: record, fatalError: record },
  });
  let hasRoot = false;
  try {
    hasRoot = Boolean(parser.parseFromString(xml, 'text/xml').documentElement);
  } catch (error) {
    record(error instanceof Error ? error.message : String(error));
  }
  if (problems.length > 0 || !hasRoot) {
    throw new HwpxError(`Malformed XML in ${name}: ${problems[0] ?? 'no root element'}`, HwpxErrorCode.MALFORMED_XML, {
      name,
      problems,
    });
  }
}
