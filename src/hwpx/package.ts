/**
 * HWPX Packaging
 *
 * Assembles the OPC-style ZIP container. `mimetype` must be the first
 * entry and stored uncompressed; every other entry is deflated.
 *
 * @module hwpx/package
 */

import PizZip from 'pizzip';
import { logger } from '../utils/logger.js';
import {
    renderContainerRdf,
    renderContainerXml,
    renderContentHpf,
    renderManifestXml,
    renderPreviewText,
    renderSettingsXml,
    renderVersionXml,
} from './builders/index.js';
import { HWPX_PATHS, MIMETYPE } from './constants.js';
import { HwpxErrorCode, withErrorContext } from './errors.js';
import type { BinaryItem, SerializedPayloads } from './types.js';
import { assertSafeEntryPath, assertWellFormedXml } from './validators.js';

export interface PackageOptions {
    /** Parse every XML payload before zipping and fail on the first malformed one. */
    verify?: boolean;
}

/** What the packager needs from a document. */
export interface PackageSource {
    serialize(): SerializedPayloads;
    previewText(): string;
    readonly binaryItems: readonly BinaryItem[];
}

export interface PackageEntry {
    name: string;
    data: string | Uint8Array;
}

/** Entries in archive order, `mimetype` first and binaries last. */
export function packageEntries(source: PackageSource): PackageEntry[] {
    const { header, section } = source.serialize();
    return [
        { name: HWPX_PATHS.MIMETYPE, data: MIMETYPE },
        { name: HWPX_PATHS.VERSION, data: renderVersionXml() },
        { name: HWPX_PATHS.SETTINGS, data: renderSettingsXml() },
        { name: HWPX_PATHS.CONTAINER, data: renderContainerXml() },
        { name: HWPX_PATHS.MANIFEST, data: renderManifestXml() },
        { name: HWPX_PATHS.CONTAINER_RDF, data: renderContainerRdf() },
        { name: HWPX_PATHS.CONTENT_HPF, data: renderContentHpf(source.binaryItems) },
        { name: HWPX_PATHS.HEADER, data: header },
        { name: HWPX_PATHS.SECTION, data: section },
        { name: HWPX_PATHS.PREVIEW_TEXT, data: renderPreviewText(source.previewText()) },
        ...source.binaryItems.map((item) => ({ name: item.href, data: item.data })),
    ];
}

const isXmlEntry = (entry: PackageEntry): entry is { name: string; data: string } =>
    typeof entry.data === 'string' && /\.(xml|hpf|rdf)$/.test(entry.name);

export async function buildPackage(source: PackageSource, options: PackageOptions = {}): Promise<Buffer> {
    const entries = packageEntries(source);
    for (const entry of entries) assertSafeEntryPath(entry.name);
    if (options.verify) {
        for (const entry of entries) {
            if (isXmlEntry(entry)) assertWellFormedXml(entry.data, entry.name);
        }
    }

    return withErrorContext(
        async () => {
            const zip = new PizZip();
            for (const entry of entries) {
                zip.file(entry.name, entry.data, {
                    compression: entry.name === HWPX_PATHS.MIMETYPE ? 'STORE' : 'DEFLATE',
                });
            }
            const buf: Buffer = zip.generate({ type: 'nodebuffer', compression: 'DEFLATE' });
            logger.debug('Packaged HWPX archive', { entries: entries.length, bytes: buf.length });
            return buf;
        },
        HwpxErrorCode.PACKAGE_FAILED,
        { entries: entries.length },
    );
}
