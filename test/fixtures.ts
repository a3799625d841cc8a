import { DOMParser } from '@xmldom/xmldom';
import { NAMESPACES } from '../src/hwpx/constants.js';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/** Smallest byte sequence inspectImage reads as a PNG of the given size. */
export function pngBytes(width: number, height: number): Uint8Array {
  const buf = Buffer.alloc(24);
  PNG_SIGNATURE.forEach((byte, i) => buf.writeUInt8(byte, i));
  buf.writeUInt32BE(13, 8);
  buf.write('IHDR', 12, 'ascii');
  buf.writeUInt32BE(width, 16);
  buf.writeUInt32BE(height, 20);
  return new Uint8Array(buf);
}

export function parseXml(xml: string): Document {
  return new DOMParser().parseFromString(xml, 'text/xml');
}

export function hp(doc: Document, localName: string): Element[] {
  return Array.from(doc.getElementsByTagNameNS(NAMESPACES.HP, localName));
}

export function hh(doc: Document, localName: string): Element[] {
  return Array.from(doc.getElementsByTagNameNS(NAMESPACES.HH, localName));
}

export function childElements(el: Element): Element[] {
  return Array.from(el.childNodes).filter((n): n is Element => n.nodeType === 1);
}
