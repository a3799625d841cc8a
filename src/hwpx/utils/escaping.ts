/**
 * XML Escaping Utilities
 *
 * Pure functions for escaping text content and attribute values.
 *
 * @module hwpx/utils/escaping
 */

const XML_TEXT_ESCAPE_MAP: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
};

const XML_ATTR_ESCAPE_MAP: Readonly<Record<string, string>> = {
  ...XML_TEXT_ESCAPE_MAP,
  '"': '&quot;',
  "'": '&apos;',
};

/** Escape XML special characters in element text. */
export function escapeXml(text: string): string {
  return text.replace(/[&<>]/g, (ch) => XML_TEXT_ESCAPE_MAP[ch] || ch);
}

/** Escape a value for a double-quoted XML attribute. */
export function escapeXmlAttr(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => XML_ATTR_ESCAPE_MAP[ch] || ch);
}

/** Numeric character reference, e.g. `●` -> `&#x25CF;`. */
export function toCharRef(ch: string): string {
  const code = ch.codePointAt(0) ?? 0;
  return `&#x${code.toString(16).toUpperCase()};`;
}
