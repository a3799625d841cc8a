/**
 * Style customization
 *
 * One explicit configuration value; every field is optional and falls back
 * to the default listed here. Sizes are HWPUNIT (100 = 1pt), line spacing
 * is a percentage.
 *
 * @module hwpx/style-config
 */

import { z } from 'zod';
import { HwpxError, HwpxErrorCode } from './errors.js';

const fontName = z.string().trim().min(1).max(64);
const fontSize = z.number().int().min(100).max(40000);
const color = z.string().regex(/^#[0-9A-Fa-f]{6}$/, 'must be a #RRGGBB color');
const lineSpacing = z.number().int().min(50).max(500);

export const StyleConfigSchema = z
  .object({
    fontBody: fontName.default('나눔고딕'),
    fontCode: fontName.default('나눔고딕코딩'),

    fontSizeBody: fontSize.default(1000),
    fontSizeH1: fontSize.default(2200),
    fontSizeH2: fontSize.default(1800),
    fontSizeH3: fontSize.default(1400),
    fontSizeH4: fontSize.default(1200),
    fontSizeH5: fontSize.default(1100),
    fontSizeH6: fontSize.default(1000),
    fontSizeCode: fontSize.default(900),
    fontSizeTable: fontSize.default(900),

    colorBody: color.default('#000000'),
    colorHeading: color.default('#323E4F'),
    colorCodeText: color.default('#E74C3C'),
    colorCodeBg: color.default('#F5F5F5'),
    colorCodeBlockText: color.default('#333333'),
    colorCodeBlockBg: color.default('#F8F8F8'),
    colorTableHeaderText: color.default('#FFFFFF'),
    colorTableHeaderBg: color.default('#4472C4'),
    colorLink: color.default('#0000FF'),
    colorRule: color.default('#BFBFBF'),

    lineSpacing: lineSpacing.default(160),
    lineSpacingCode: lineSpacing.default(130),
    lineSpacingTable: lineSpacing.default(130),
  })
  .strict();

export type StyleConfig = Readonly<z.output<typeof StyleConfigSchema>>;
export type StyleConfigInput = z.input<typeof StyleConfigSchema>;

/**
 * Validate a configuration value and fill in defaults.
 * Throws CONFIG_INVALID naming the first offending field.
 */
export function parseStyleConfig(input: unknown = {}): StyleConfig {
  const result = StyleConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues;
    const first = issues[0];
    const field =
      first.code === 'unrecognized_keys' ? first.keys.join(', ') : first.path.join('.') || '(root)';
    throw new HwpxError(`Invalid style configuration: ${field}: ${first.message}`, HwpxErrorCode.CONFIG_INVALID, {
      field,
      issues: issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  return Object.freeze(result.data);
}

export const DEFAULT_STYLE_CONFIG: StyleConfig = parseStyleConfig();
