import fs from 'fs';
import path from 'path';
import process from 'process';
import { z } from 'zod';
import { PAGE_PRESETS, type PagePreset } from './hwpx/constants.js';
import type { MarkdownToHwpxOptions } from './hwpx/converters/markdown-to-hwpx.js';
import { HwpxError, HwpxErrorCode } from './hwpx/errors.js';
import { StyleConfigSchema } from './hwpx/style-config.js';
import { logger } from './utils/logger.js';

export const CONFIG_FILE_NAME = 'hwpx.config.json';
export const CONFIG_FILE = path.join(process.cwd(), CONFIG_FILE_NAME);

const margin = z.number().int().nonnegative();
const presetNames = Object.keys(PAGE_PRESETS).filter((name): name is PagePreset => name in PAGE_PRESETS);

const PageSetupSchema = z
    .object({
        preset: z
            .string()
            .refine((name): name is PagePreset => presetNames.some((p) => p === name), {
                message: `must be one of ${presetNames.join(', ')}`,
            })
            .optional(),
        landscape: z.boolean().optional(),
        margins: z
            .object({
                left: margin.optional(),
                right: margin.optional(),
                top: margin.optional(),
                bottom: margin.optional(),
                header: margin.optional(),
                footer: margin.optional(),
                gutter: margin.optional(),
            })
            .strict()
            .optional(),
    })
    .strict();

const TocSchema = z.union([
    z.boolean(),
    z
        .object({
            title: z.string().nullable().optional(),
            separator: z.boolean().optional(),
            maxLevel: z.number().int().min(1).max(6).optional(),
        })
        .strict(),
]);

export const WriterConfigSchema = z
    .object({
        style: StyleConfigSchema.partial().optional(),
        page: PageSetupSchema.optional(),
        seed: z.number().int().optional(),
        toc: TocSchema.optional(),
    })
    .strict();

export type WriterConfig = z.output<typeof WriterConfigSchema>;

/** Validate an already-parsed config value; throws CONFIG_INVALID naming the field. */
export function parseWriterConfig(value: unknown, source: string = '(inline)'): WriterConfig {
    const result = WriterConfigSchema.safeParse(value);
    if (result.success) return result.data;

    const first = result.error.issues[0];
    const field =
        first.code === 'unrecognized_keys' ? first.keys.join(', ') : first.path.join('.') || '(root)';
    throw new HwpxError(`Invalid configuration in ${source}: ${field}: ${first.message}`, HwpxErrorCode.CONFIG_INVALID, {
        source,
        field,
        issues: result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
}

/**
 * Load writer settings from `configPath` (default `hwpx.config.json` in
 * the working directory). A missing file yields an empty config.
 */
export function loadWriterConfig(configPath: string = CONFIG_FILE): WriterConfig {
    if (!fs.existsSync(configPath)) {
        logger.debug('No config file, using defaults', { path: configPath });
        return {};
    }

    const content = fs.readFileSync(configPath, 'utf8');
    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (error) {
        throw new HwpxError(
            `Invalid JSON in ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
            HwpxErrorCode.CONFIG_INVALID,
            { source: configPath },
        );
    }

    const config = parseWriterConfig(raw, configPath);
    logger.info(`Loaded config from ${configPath}`, { keys: Object.keys(config) });
    return config;
}

/** Conversion options carried by a loaded config. */
export function writerOptions(config: WriterConfig): MarkdownToHwpxOptions {
    return { seed: config.seed, style: config.style, page: config.page, toc: config.toc };
}
