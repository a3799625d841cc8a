/**
 * Image format and pixel size from magic bytes.
 *
 * Unknown data never fails: it resolves to FALLBACK_IMAGE and is
 * reported through `recognized: false`.
 */

import { FALLBACK_IMAGE } from '../constants.js';

export type ImageFormat = 'png' | 'jpg' | 'gif' | 'bmp';

export interface ImageInfo {
    format: ImageFormat;
    mediaType: string;
    extension: string;
    width: number;
    height: number;
    recognized: boolean;
}

const MEDIA_TYPES: Readonly<Record<ImageFormat, string>> = {
    png: 'image/png',
    jpg: 'image/jpeg',
    gif: 'image/gif',
    bmp: 'image/bmp',
};

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/** JPEG start-of-frame markers that carry the frame size. */
const JPEG_SOF_MARKERS = new Set([0xc0, 0xc1, 0xc2]);

function info(format: ImageFormat, width: number, height: number): ImageInfo {
    if (width <= 0 || height <= 0) return fallback();
    return { format, mediaType: MEDIA_TYPES[format], extension: format, width, height, recognized: true };
}

function fallback(): ImageInfo {
    return {
        format: FALLBACK_IMAGE.format,
        mediaType: MEDIA_TYPES[FALLBACK_IMAGE.format],
        extension: FALLBACK_IMAGE.format,
        width: FALLBACK_IMAGE.width,
        height: FALLBACK_IMAGE.height,
        recognized: false,
    };
}

function isPng(buf: Buffer): boolean {
    return buf.length >= 24 && PNG_SIGNATURE.every((byte, i) => buf[i] === byte);
}

function readJpegSize(buf: Buffer): { width: number; height: number } | null {
    let offset = 2;
    while (offset + 9 < buf.length) {
        if (buf[offset] !== 0xff) {
            offset++;
            continue;
        }
        const marker = buf[offset + 1];
        if (JPEG_SOF_MARKERS.has(marker)) {
            return { height: buf.readUInt16BE(offset + 5), width: buf.readUInt16BE(offset + 7) };
        }
        // Standalone markers carry no length field.
        if (marker === 0xd8 || marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7) || marker === 0xff) {
            offset += marker === 0xff ? 1 : 2;
            continue;
        }
        offset += 2 + buf.readUInt16BE(offset + 2);
    }
    return null;
}

/**
 * Detect format and pixel dimensions.
 * A bottom-up BMP stores a negative height; it is returned as positive.
 */
export function inspectImage(data: Uint8Array): ImageInfo {
    const buf = Buffer.from(data.buffer, data.byteOffset, data.byteLength);

    if (isPng(buf)) {
        return info('png', buf.readUInt32BE(16), buf.readUInt32BE(20));
    }

    if (buf.length >= 4 && buf[0] === 0xff && buf[1] === 0xd8) {
        const size = readJpegSize(buf);
        return size ? info('jpg', size.width, size.height) : fallback();
    }

    if (buf.length >= 10 && buf.toString('ascii', 0, 4) === 'GIF8') {
        return info('gif', buf.readUInt16LE(6), buf.readUInt16LE(8));
    }

    if (buf.length >= 26 && buf[0] === 0x42 && buf[1] === 0x4d) {
        return info('bmp', Math.abs(buf.readInt32LE(18)), Math.abs(buf.readInt32LE(22)));
    }

    return fallback();
}
