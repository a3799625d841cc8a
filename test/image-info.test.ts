import { describe, expect, it } from 'vitest';
import { inspectImage } from '../src/hwpx/parsers/image-info.js';
import { pngBytes } from './fixtures.js';

const FALLBACK = { format: 'png', mediaType: 'image/png', extension: 'png', width: 200, height: 100, recognized: false };

function padded(bytes: number[], length: number): Uint8Array {
  const out = new Uint8Array(length);
  out.set(bytes);
  return out;
}

describe('inspectImage', () => {
  it('reads PNG dimensions from the header chunk', () => {
    expect(inspectImage(pngBytes(640, 480))).toEqual({
      format: 'png',
      mediaType: 'image/png',
      extension: 'png',
      width: 640,
      height: 480,
      recognized: true,
    });
  });

  it('reads GIF dimensions', () => {
    const buf = Buffer.alloc(10);
    buf.write('GIF89a', 0, 'ascii');
    buf.writeUInt16LE(32, 6);
    buf.writeUInt16LE(16, 8);
    expect(inspectImage(buf)).toMatchObject({ format: 'gif', mediaType: 'image/gif', width: 32, height: 16 });
  });

  it('normalizes the negative height of a bottom-up BMP', () => {
    const buf = Buffer.alloc(26);
    buf.write('BM', 0, 'ascii');
    buf.writeInt32LE(40, 18);
    buf.writeInt32LE(-30, 22);
    expect(inspectImage(buf)).toMatchObject({ format: 'bmp', width: 40, height: 30, recognized: true });
  });

  it('finds the JPEG frame size after other segments', () => {
    const jpeg = padded(
      [0xff, 0xd8, 0xff, 0xe0, 0x00, 0x04, 0x00, 0x00, 0xff, 0xc0, 0x00, 0x11, 0x08, 0x00, 0x20, 0x00, 0x40],
      24,
    );
    expect(inspectImage(jpeg)).toMatchObject({
      format: 'jpg',
      mediaType: 'image/jpeg',
      extension: 'jpg',
      width: 64,
      height: 32,
    });
  });

  it('falls back for unknown bytes', () => {
    expect(inspectImage(Uint8Array.from([0x00, 0x01, 0x02]))).toEqual(FALLBACK);
    expect(inspectImage(new Uint8Array(0))).toEqual(FALLBACK);
  });

  it('falls back for a zero-sized PNG', () => {
    expect(inspectImage(pngBytes(0, 10))).toEqual(FALLBACK);
  });

  it('falls back for a JPEG without a frame header', () => {
    expect(inspectImage(padded([0xff, 0xd8, 0xff, 0xd9], 8))).toEqual(FALLBACK);
  });

  it('reads a view into a larger buffer', () => {
    const outer = new Uint8Array(40);
    outer.set(pngBytes(7, 9), 8);
    expect(inspectImage(outer.subarray(8, 32))).toMatchObject({ width: 7, height: 9 });
  });
});
